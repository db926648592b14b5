import { describe, it, expect, beforeEach, afterEach } from "vitest";

import { buildServer } from "../../../../src/server/app.js";
import {
  createTestContext,
  wapiPath,
  type TestContext,
} from "../../../fixtures/server.js";

import type { FastifyInstance } from "fastify";

describe("server/routes/target", () => {
  let test: TestContext;
  let app: FastifyInstance;

  beforeEach(async () => {
    test = createTestContext();
    app = await buildServer(test.context, { logger: false });
  });

  afterEach(async () => {
    await app.close();
    await test.agent.close();
  });

  // ============================================================================
  // Target
  // ============================================================================

  describe("GET /api/v1/target/views", () => {
    it("should list the store's network views", async () => {
      test.store
        .intercept({ path: wapiPath("networkview"), method: "GET" })
        .reply(200, [{ name: "default" }, { name: "lab", comment: "Lab" }]);

      const response = await app.inject({
        method: "GET",
        url: "/api/v1/target/views",
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        data: [{ name: "default" }, { name: "lab", comment: "Lab" }],
      });
    });

    it("should report an unconfigured store as 503", async () => {
      const bare = createTestContext({ ddi: false });
      const bareApp = await buildServer(bare.context, { logger: false });

      const response = await bareApp.inject({
        method: "GET",
        url: "/api/v1/target/views",
      });

      expect(response.statusCode).toBe(503);
      expect(response.json()).toMatchObject({
        error: "NOT_CONFIGURED",
        message:
          "DDI store is not configured; set DDI_HOST, DDI_USERNAME and DDI_PASSWORD",
      });

      await bareApp.close();
      await bare.agent.close();
    });

    it("should report an unavailable store as 502", async () => {
      test.store
        .intercept({ path: wapiPath("networkview"), method: "GET" })
        .reply(503, "busy")
        .times(3);

      const response = await app.inject({
        method: "GET",
        url: "/api/v1/target/views",
      });

      expect(response.statusCode).toBe(502);
      expect(response.json()).toMatchObject({
        error: "UPSTREAM_UNAVAILABLE",
        details: { status: 503, attempts: 3 },
      });
    });
  });

  describe("POST /api/v1/target/attributes", () => {
    it("should create the attribute definition", async () => {
      test.store
        .intercept({ path: wapiPath("extensibleattributedef"), method: "POST" })
        .reply(201, JSON.stringify("extensibleattributedef/b25l:cost_center"));

      const response = await app.inject({
        method: "POST",
        url: "/api/v1/target/attributes",
        payload: { name: "cost_center" },
      });

      expect(response.statusCode).toBe(201);
      expect(response.json()).toEqual({
        data: { ref: "extensibleattributedef/b25l:cost_center" },
      });
    });

    it("should reject reserved names without calling the store", async () => {
      const response = await app.inject({
        method: "POST",
        url: "/api/v1/target/attributes",
        payload: { name: "comment" },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toMatchObject({
        error: "VALIDATION_ERROR",
        message: "Attribute name 'comment' is reserved",
      });
    });
  });

  // ============================================================================
  // Mappings
  // ============================================================================

  describe("POST /api/v1/mappings/suggestions", () => {
    it("should rank the given attribute names", async () => {
      const response = await app.inject({
        method: "POST",
        url: "/api/v1/mappings/suggestions",
        payload: { sourceKeys: ["createdby"], targetKeys: ["created_by", "owner"] },
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        data: {
          createdby: {
            suggestions: [
              {
                sourceKey: "createdby",
                targetKey: "created_by",
                confidence: 0.95,
                exactMatch: false,
              },
            ],
            canCreateNew: true,
          },
        },
      });
    });

    it("should fall back to the store's attribute definitions", async () => {
      test.store
        .intercept({ path: wapiPath("extensibleattributedef"), method: "GET" })
        .reply(200, [
          { name: "Environment", type: "STRING" },
          { name: "Owner", type: "STRING" },
        ]);

      const response = await app.inject({
        method: "POST",
        url: "/api/v1/mappings/suggestions",
        payload: { sourceKeys: ["environment"] },
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toMatchObject({
        data: {
          environment: {
            suggestions: [{ targetKey: "Environment", exactMatch: true }],
          },
        },
      });
    });
  });

  // ============================================================================
  // Reconciliation
  // ============================================================================

  describe("POST /api/v1/reconciliations", () => {
    it("should classify records against the view", async () => {
      test.store
        .intercept({
          path: wapiPath(
            "network",
            (params) => params.get("network_view") === "default"
          ),
          method: "GET",
        })
        .reply(200, {
          result: [
            {
              _ref: "network/ZG5z:10.0.0.0/24/default",
              network: "10.0.0.0/24",
              extattrs: { environment: { value: "staging" } },
            },
          ],
        });

      const response = await app.inject({
        method: "POST",
        url: "/api/v1/reconciliations",
        payload: {
          records: [
            {
              subnet: "10.0.0.0/24",
              account: "123",
              region: "us-east-1",
              tags: { Environment: "prod" },
              rawFields: {},
            },
            {
              subnet: "10.0.1.0/24",
              account: "123",
              region: "us-east-1",
              tags: {},
              rawFields: {},
            },
          ],
          networkView: "default",
          mappings: { Environment: "environment" },
        },
      });

      expect(response.statusCode).toBe(200);
      const body = response.json();
      expect(body.data.summary).toEqual({
        total: 2,
        new: 1,
        existing: 0,
        conflicting: 1,
      });
      expect(body.data.result.new).toMatchObject([{ subnet: "10.0.1.0/24" }]);
      expect(body.data.result.conflicting).toMatchObject([
        {
          subnet: "10.0.0.0/24",
          targetRef: "network/ZG5z:10.0.0.0/24/default",
          attributeConflicts: [
            {
              attribute: "environment",
              sourceValue: "prod",
              targetValue: "staging",
            },
          ],
        },
      ]);
    });
  });
});
