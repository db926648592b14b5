/**
 * DDI Target API Routes
 */

import { Type, type Static } from "@sinclair/typebox";

import { requireDdiClient, type ServerContext } from "../context.js";
import {
  AttributeTypeSchema,
  createResponseSchema,
} from "../schemas/common.js";

import type { FastifyInstance } from "fastify";

// ============================================================================
// Schemas
// ============================================================================

const NetworkViewSchema = Type.Object({
  name: Type.String(),
  comment: Type.Optional(Type.String()),
});

const AttributeDefinitionSchema = Type.Object({
  name: Type.String(),
  type: Type.String(),
  comment: Type.Optional(Type.String()),
});

const CreateAttributeBodySchema = Type.Object({
  name: Type.String({ minLength: 1 }),
  type: Type.Optional(AttributeTypeSchema),
  comment: Type.Optional(Type.String()),
});

type CreateAttributeBody = Static<typeof CreateAttributeBodySchema>;

// ============================================================================
// Route Registration
// ============================================================================

export function registerTargetRoutes(
  app: FastifyInstance,
  context: ServerContext
): void {
  // GET /target/views - Network views in the DDI store
  app.get(
    "/target/views",
    {
      schema: {
        summary: "List network views",
        tags: ["Target"],
        response: {
          200: createResponseSchema(Type.Array(NetworkViewSchema)),
        },
      },
    },
    async () => {
      const views = await requireDdiClient(context).getNetworkViews();
      return { data: views };
    }
  );

  // GET /target/attributes - Extensible attribute definitions
  app.get(
    "/target/attributes",
    {
      schema: {
        summary: "List extensible attributes",
        tags: ["Target"],
        response: {
          200: createResponseSchema(Type.Array(AttributeDefinitionSchema)),
        },
      },
    },
    async () => {
      const attributes =
        await requireDdiClient(context).getExtensibleAttributes();
      return { data: attributes };
    }
  );

  // POST /target/attributes - Define a new extensible attribute
  app.post<{ Body: CreateAttributeBody }>(
    "/target/attributes",
    {
      schema: {
        summary: "Create extensible attribute",
        description:
          "Names must start with a letter, use only letters, digits and underscores, and not be reserved",
        tags: ["Target"],
        body: CreateAttributeBodySchema,
        response: {
          201: createResponseSchema(Type.Object({ ref: Type.String() })),
        },
      },
    },
    async (request, reply) => {
      const ref = await requireDdiClient(context).createExtensibleAttribute(
        request.body
      );
      return reply.status(201).send({ data: { ref } });
    }
  );
}
