/**
 * Sync Job API Routes
 *
 * Apply requests are queued and run in the background; clients poll the job
 * by id for progress and outcome.
 */

import { Type, type Static } from "@sinclair/typebox";

import { canonicalizeRecords } from "../../inventory/parser.js";
import {
  MappingTableSchema,
  NetworkRecordSchema,
  NetworkViewNameSchema,
  SyncJobSchema,
  SyncJobStateSchema,
  createResponseSchema,
} from "../schemas/common.js";

import type { SyncJob } from "../../types/index.js";
import type { SyncJobDto } from "../../types/api.js";
import type { ServerContext } from "../context.js";
import type { FastifyInstance } from "fastify";

// ============================================================================
// Schemas
// ============================================================================

const SubmitJobBodySchema = Type.Object({
  records: Type.Array(NetworkRecordSchema, { minItems: 1 }),
  networkView: NetworkViewNameSchema,
  mappings: Type.Optional(MappingTableSchema),
});

type SubmitJobBody = Static<typeof SubmitJobBodySchema>;

const SubmitJobResponseSchema = createResponseSchema(
  Type.Object({
    jobId: Type.String(),
  })
);

const JobIdParamsSchema = Type.Object({
  jobId: Type.String({ minLength: 1 }),
});

type JobIdParams = Static<typeof JobIdParamsSchema>;

const ListJobsQuerySchema = Type.Object({
  state: Type.Optional(SyncJobStateSchema),
  limit: Type.Optional(Type.Integer({ minimum: 1, maximum: 500, default: 50 })),
});

type ListJobsQuery = Static<typeof ListJobsQuerySchema>;

const CancelJobResponseSchema = createResponseSchema(
  Type.Object({
    jobId: Type.String(),
    cancelled: Type.Boolean(),
  })
);

// ============================================================================
// Helper Functions
// ============================================================================

export function formatJob(job: SyncJob): SyncJobDto {
  return {
    id: job.id,
    networkView: job.networkView,
    state: job.state,
    progress: job.progress,
    outcome: job.outcome,
    error: job.error ?? null,
    createdAt: job.createdAt.toISOString(),
    startedAt: job.startedAt?.toISOString() ?? null,
    completedAt: job.completedAt?.toISOString() ?? null,
  };
}

// ============================================================================
// Route Registration
// ============================================================================

export function registerJobRoutes(
  app: FastifyInstance,
  context: ServerContext
): void {
  // POST /jobs - Queue an apply job
  app.post<{ Body: SubmitJobBody }>(
    "/jobs",
    {
      schema: {
        summary: "Submit sync job",
        description:
          "Queues the records for creation or update in a DDI network view. Jobs for the same view run one at a time.",
        tags: ["Jobs"],
        body: SubmitJobBodySchema,
        response: {
          202: SubmitJobResponseSchema,
        },
      },
    },
    async (request, reply) => {
      const { networkView, mappings = {} } = request.body;
      const records = canonicalizeRecords(request.body.records);

      const jobId = await context.queue.submit({
        records,
        networkView,
        mappings,
      });

      return reply
        .status(202)
        .header("location", `/api/v1/jobs/${jobId}`)
        .send({ data: { jobId } });
    }
  );

  // GET /jobs - Recent jobs, newest first
  app.get<{ Querystring: ListJobsQuery }>(
    "/jobs",
    {
      schema: {
        summary: "List sync jobs",
        tags: ["Jobs"],
        querystring: ListJobsQuerySchema,
        response: {
          200: createResponseSchema(Type.Array(SyncJobSchema)),
        },
      },
    },
    async (request) => {
      const jobs = await context.queue.list(request.query);
      return { data: jobs.map(formatJob) };
    }
  );

  // GET /jobs/:jobId - Job state, progress and outcome
  app.get<{ Params: JobIdParams }>(
    "/jobs/:jobId",
    {
      schema: {
        summary: "Get sync job",
        tags: ["Jobs"],
        params: JobIdParamsSchema,
        response: {
          200: createResponseSchema(SyncJobSchema),
        },
      },
    },
    async (request) => {
      const job = await context.queue.getStatus(request.params.jobId);
      return { data: formatJob(job) };
    }
  );

  // DELETE /jobs/:jobId - Cancel a pending or running job
  app.delete<{ Params: JobIdParams }>(
    "/jobs/:jobId",
    {
      schema: {
        summary: "Cancel sync job",
        description:
          "Requests cancellation. `cancelled` is false when the job had already finished.",
        tags: ["Jobs"],
        params: JobIdParamsSchema,
        response: {
          200: CancelJobResponseSchema,
        },
      },
    },
    async (request) => {
      const { jobId } = request.params;
      const cancelled = await context.queue.cancel(jobId);
      return { data: { jobId, cancelled } };
    }
  );
}
