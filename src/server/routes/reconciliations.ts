/**
 * Reconciliation API Routes
 */

import { Type, type Static } from "@sinclair/typebox";

import { canonicalizeRecords } from "../../inventory/parser.js";
import { reconcile, summarize } from "../../services/reconcile/engine.js";
import { requireDdiClient, type ServerContext } from "../context.js";
import {
  MappingTableSchema,
  NetworkRecordSchema,
  NetworkViewNameSchema,
  ReconciledRecordSchema,
  createResponseSchema,
} from "../schemas/common.js";

import type { FastifyInstance } from "fastify";

// ============================================================================
// Schemas
// ============================================================================

const ReconcileBodySchema = Type.Object({
  records: Type.Array(NetworkRecordSchema),
  networkView: NetworkViewNameSchema,
  mappings: Type.Optional(MappingTableSchema),
  pageSize: Type.Optional(Type.Integer({ minimum: 1, maximum: 10_000 })),
});

type ReconcileBody = Static<typeof ReconcileBodySchema>;

const ReconcileResponseSchema = createResponseSchema(
  Type.Object({
    summary: Type.Object({
      total: Type.Integer(),
      new: Type.Integer(),
      existing: Type.Integer(),
      conflicting: Type.Integer(),
    }),
    result: Type.Object({
      new: Type.Array(ReconciledRecordSchema),
      existing: Type.Array(ReconciledRecordSchema),
      conflicting: Type.Array(ReconciledRecordSchema),
    }),
  })
);

// ============================================================================
// Route Registration
// ============================================================================

export function registerReconciliationRoutes(
  app: FastifyInstance,
  context: ServerContext
): void {
  // POST /reconciliations - Diff records against a network view
  app.post<{ Body: ReconcileBody }>(
    "/reconciliations",
    {
      schema: {
        summary: "Reconcile records",
        description:
          "Classifies each record as new, existing or conflicting against the networks in a DDI network view",
        tags: ["Reconciliation"],
        body: ReconcileBodySchema,
        response: {
          200: ReconcileResponseSchema,
        },
      },
    },
    async (request) => {
      const { networkView, mappings, pageSize } = request.body;
      const records = canonicalizeRecords(request.body.records);
      const ddi = requireDdiClient(context);

      const targets = await ddi.listNetworksBatched(networkView, pageSize);
      const result = reconcile(records, targets, { mappings });

      request.log.info(
        { networkView, ...summarize(result) },
        "Reconciled records"
      );
      return { data: { summary: summarize(result), result } };
    }
  );
}
