/**
 * API Routes Registration
 */

import { Type } from "@sinclair/typebox";

import { registerInventoryRoutes } from "./inventory.js";
import { registerJobRoutes } from "./jobs.js";
import { registerMappingRoutes } from "./mappings.js";
import { registerReconciliationRoutes } from "./reconciliations.js";
import { registerTargetRoutes } from "./target.js";

import type { ServerContext } from "../context.js";
import type { FastifyInstance } from "fastify";

// Health check response schema
const HealthResponseSchema = Type.Object(
  {
    status: Type.Literal("ok"),
    ddiConfigured: Type.Boolean(),
  },
  {
    examples: [{ status: "ok", ddiConfigured: true }],
  }
);

/**
 * Register all API v1 routes
 */
export async function registerApiRoutes(
  app: FastifyInstance,
  context: ServerContext
): Promise<void> {
  // Health check (no version prefix)
  app.get(
    "/health",
    {
      schema: {
        summary: "Health check",
        description: "Returns the health status of the API",
        tags: ["Health"],
        response: {
          200: HealthResponseSchema,
        },
      },
    },
    () => ({ status: "ok" as const, ddiConfigured: context.ddi !== null })
  );

  // API v1 routes
  await app.register(
    (api) => {
      registerInventoryRoutes(api);
      registerMappingRoutes(api, context);
      registerReconciliationRoutes(api, context);
      registerJobRoutes(api, context);
      registerTargetRoutes(api, context);
    },
    { prefix: "/api/v1" }
  );
}
