/**
 * WAPI object shapes and their conversion to domain types
 */

import { Type, type Static, type TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

import type {
  AttributeDefinition,
  NetworkView,
  TargetNetwork,
} from "../types/index.js";

export const NETWORK_RETURN_FIELDS = "network,comment,extattrs";
export const NETWORK_VIEW_RETURN_FIELDS = "name,comment";
export const ATTRIBUTE_DEF_RETURN_FIELDS = "name,type,comment";

// ============================================================================
// Schemas
// ============================================================================

export const WapiNetworkSchema = Type.Object({
  _ref: Type.String(),
  network: Type.String(),
  comment: Type.Optional(Type.String()),
  extattrs: Type.Optional(Type.Record(Type.String(), Type.Unknown())),
});

export const WapiNetworkPageSchema = Type.Object({
  result: Type.Array(WapiNetworkSchema),
  next_page_id: Type.Optional(Type.String()),
});

export const WapiNetworkViewSchema = Type.Object({
  name: Type.String(),
  comment: Type.Optional(Type.String()),
});

export const WapiAttributeDefSchema = Type.Object({
  name: Type.String(),
  type: Type.String(),
  comment: Type.Optional(Type.String()),
});

export const WapiNetworkListSchema = Type.Array(WapiNetworkSchema);
export const WapiNetworkViewListSchema = Type.Array(WapiNetworkViewSchema);
export const WapiAttributeDefListSchema = Type.Array(WapiAttributeDefSchema);

export const WapiRefSchema = Type.Object({ _ref: Type.String() });

export type WapiNetwork = Static<typeof WapiNetworkSchema>;

// ============================================================================
// Decoding
// ============================================================================

/**
 * Check `data` against `schema`, failing with the first mismatch
 */
export function decode<T extends TSchema>(
  schema: T,
  data: unknown,
  what: string
): Static<T> {
  if (Value.Check(schema, data)) return data;

  const [first] = [...Value.Errors(schema, data)];
  const detail =
    first === undefined ? "" : ` (${first.path || "/"}: ${first.message})`;
  throw new Error(`Unexpected ${what} response from DDI store${detail}`);
}

/**
 * Pull the object reference out of a create/update response, which is
 * either the bare reference string or a `{ _ref }` envelope.
 */
export function extractRef(data: unknown, what: string): string {
  if (typeof data === "string" && data !== "") return data;
  return decode(WapiRefSchema, data, what)._ref;
}

export function toTargetNetwork(network: WapiNetwork): TargetNetwork {
  return {
    cidr: network.network,
    ref: network._ref,
    extendedAttributes: network.extattrs ?? {},
    comment: network.comment ?? "",
  };
}

export function toNetworkView(
  view: Static<typeof WapiNetworkViewSchema>
): NetworkView {
  return view.comment === undefined
    ? { name: view.name }
    : { name: view.name, comment: view.comment };
}

export function toAttributeDefinition(
  definition: Static<typeof WapiAttributeDefSchema>
): AttributeDefinition {
  return definition.comment === undefined
    ? { name: definition.name, type: definition.type }
    : {
        name: definition.name,
        type: definition.type,
        comment: definition.comment,
      };
}
