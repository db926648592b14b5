/**
 * Inventory API Routes
 */

import { Type, type Static } from "@sinclair/typebox";

import { collectTagKeys, parseInventory } from "../../inventory/parser.js";
import {
  NetworkRecordSchema,
  createResponseSchema,
} from "../schemas/common.js";

import type { FastifyInstance } from "fastify";

// ============================================================================
// Schemas
// ============================================================================

const ParseInventoryBodySchema = Type.Object({
  /** CSV text with a header row */
  content: Type.String({ minLength: 1 }),
  invalidSubnets: Type.Optional(
    Type.Union([Type.Literal("error"), Type.Literal("skip")])
  ),
});

type ParseInventoryBody = Static<typeof ParseInventoryBodySchema>;

const ParseInventoryResponseSchema = createResponseSchema(
  Type.Object({
    records: Type.Array(NetworkRecordSchema),
    tagKeys: Type.Array(Type.String()),
  })
);

// ============================================================================
// Route Registration
// ============================================================================

export function registerInventoryRoutes(app: FastifyInstance): void {
  // POST /inventory/parse - Parse an inventory export into canonical records
  app.post<{ Body: ParseInventoryBody }>(
    "/inventory/parse",
    {
      schema: {
        summary: "Parse inventory export",
        description:
          "Parses CSV inventory text into canonical network records and lists the tag keys found",
        tags: ["Inventory"],
        body: ParseInventoryBodySchema,
        response: {
          200: ParseInventoryResponseSchema,
        },
      },
    },
    (request) => {
      const records = parseInventory(request.body.content, {
        invalidSubnets: request.body.invalidSubnets,
      });
      return { data: { records, tagKeys: collectTagKeys(records) } };
    }
  );
}
