/**
 * Attribute Mapping API Routes
 */

import { Type, type Static } from "@sinclair/typebox";

import { DEFAULT_THRESHOLD } from "../../mapping/attribute-mapper.js";
import { requireDdiClient, type ServerContext } from "../context.js";
import { createResponseSchema } from "../schemas/common.js";

import type { FastifyInstance } from "fastify";

// ============================================================================
// Schemas
// ============================================================================

const SuggestMappingsBodySchema = Type.Object({
  sourceKeys: Type.Array(Type.String({ minLength: 1 }), { minItems: 1 }),
  /** Attribute names to match against; fetched from the DDI store if absent */
  targetKeys: Type.Optional(Type.Array(Type.String())),
  threshold: Type.Optional(Type.Number({ minimum: 0, maximum: 1 })),
});

type SuggestMappingsBody = Static<typeof SuggestMappingsBodySchema>;

const MappingSuggestionSchema = Type.Object({
  suggestions: Type.Array(
    Type.Object({
      sourceKey: Type.String(),
      targetKey: Type.String(),
      confidence: Type.Number(),
      exactMatch: Type.Boolean(),
    })
  ),
  canCreateNew: Type.Boolean(),
});

const SuggestMappingsResponseSchema = createResponseSchema(
  Type.Record(Type.String(), MappingSuggestionSchema)
);

// ============================================================================
// Route Registration
// ============================================================================

export function registerMappingRoutes(
  app: FastifyInstance,
  context: ServerContext
): void {
  // POST /mappings/suggestions - Suggest attribute names for tag keys
  app.post<{ Body: SuggestMappingsBody }>(
    "/mappings/suggestions",
    {
      schema: {
        summary: "Suggest attribute mappings",
        description:
          "Suggests up to three DDI extensible attributes for each source tag key",
        tags: ["Mappings"],
        body: SuggestMappingsBodySchema,
        response: {
          200: SuggestMappingsResponseSchema,
        },
      },
    },
    async (request) => {
      const { sourceKeys, threshold = DEFAULT_THRESHOLD } = request.body;

      const targetKeys =
        request.body.targetKeys ??
        (await requireDdiClient(context).getExtensibleAttributes()).map(
          (definition) => definition.name
        );

      return {
        data: context.mapper.suggestMappings(sourceKeys, targetKeys, threshold),
      };
    }
  );
}
