import Fastify, { type FastifyInstance } from "fastify";
import { describe, it, expect, beforeAll, afterAll } from "vitest";

import {
  AuthenticationError,
  ConfigurationError,
  NotFoundError,
  TransientError,
  ValidationError,
} from "../../../../src/errors.js";
import { errorHandler } from "../../../../src/server/plugins/error-handler.js";

describe("server/plugins/error-handler", () => {
  // ============================================================================
  // Error classes
  // ============================================================================

  describe("error classes", () => {
    it("should carry a code and an HTTP status", () => {
      expect(new ValidationError("bad")).toMatchObject({
        name: "ValidationError",
        code: "VALIDATION_ERROR",
        statusCode: 400,
      });
      expect(new ConfigurationError("unset")).toMatchObject({
        name: "ConfigurationError",
        code: "NOT_CONFIGURED",
        statusCode: 503,
      });
      expect(new NotFoundError("gone")).toMatchObject({
        name: "NotFoundError",
        code: "NOT_FOUND",
        statusCode: 404,
      });
      expect(new AuthenticationError()).toMatchObject({
        name: "AuthenticationError",
        code: "AUTHENTICATION_FAILED",
        statusCode: 502,
        message: "Authentication with the DDI store failed",
      });
    });

    it("should keep the last upstream response on TransientError", () => {
      const cause = new Error("socket hang up");
      const error = new TransientError("failed", { attempts: 3, cause });

      expect(error.status).toBeUndefined();
      expect(error.attempts).toBe(3);
      expect(error.cause).toBe(cause);
    });
  });

  // ============================================================================
  // Error Handler Plugin Tests
  // ============================================================================

  describe("errorHandler plugin", () => {
    let app: FastifyInstance;

    beforeAll(async () => {
      app = Fastify({ logger: false });
      await app.register(errorHandler);

      app.get("/validation-error", async () => {
        throw new ValidationError("Invalid subnet in 1 row(s)", {
          invalidRows: [{ row: 2, subnet: "x", reason: "empty subnet" }],
        });
      });

      app.get("/not-configured", async () => {
        throw new ConfigurationError("DDI store is not configured");
      });

      app.get("/not-found", async () => {
        throw new NotFoundError("Sync job 'x' not found");
      });

      app.get("/auth", async () => {
        throw new AuthenticationError();
      });

      app.get("/transient", async () => {
        throw new TransientError(
          "DDI request GET network failed after 3 attempts: 503 - busy",
          { status: 503, body: "busy", attempts: 3 }
        );
      });

      app.get("/generic-error", async () => {
        throw new Error("Something went wrong");
      });

      app.get("/client-error", async () => {
        throw Object.assign(new Error("Unsupported Media Type"), {
          statusCode: 415,
        });
      });

      app.get("/fastify-validation", async () => {
        throw Object.assign(new Error("Validation failed"), {
          validation: [{ keyword: "type", message: "must be string" }],
        });
      });

      await app.ready();
    });

    afterAll(async () => {
      await app.close();
    });

    it("should handle ValidationError with details", async () => {
      const response = await app.inject({
        method: "GET",
        url: "/validation-error",
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toEqual({
        error: "VALIDATION_ERROR",
        message: "Invalid subnet in 1 row(s)",
        details: {
          invalidRows: [{ row: 2, subnet: "x", reason: "empty subnet" }],
        },
        requestId: expect.any(String),
      });
    });

    it("should handle ConfigurationError", async () => {
      const response = await app.inject({
        method: "GET",
        url: "/not-configured",
      });

      expect(response.statusCode).toBe(503);
      expect(response.json()).toMatchObject({
        error: "NOT_CONFIGURED",
        message: "DDI store is not configured",
      });
    });

    it("should handle NotFoundError", async () => {
      const response = await app.inject({ method: "GET", url: "/not-found" });

      expect(response.statusCode).toBe(404);
      expect(response.json()).toMatchObject({
        error: "NOT_FOUND",
        message: "Sync job 'x' not found",
      });
    });

    it("should report rejected credentials as a bad gateway", async () => {
      const response = await app.inject({ method: "GET", url: "/auth" });

      expect(response.statusCode).toBe(502);
      expect(response.json()).toMatchObject({
        error: "AUTHENTICATION_FAILED",
        message: "Authentication with the DDI store failed",
      });
    });

    it("should report exhausted retries with the upstream status", async () => {
      const response = await app.inject({ method: "GET", url: "/transient" });

      expect(response.statusCode).toBe(502);
      expect(response.json()).toMatchObject({
        error: "UPSTREAM_UNAVAILABLE",
        details: { status: 503, attempts: 3 },
      });
    });

    it("should keep the status of other client errors", async () => {
      const response = await app.inject({ method: "GET", url: "/client-error" });

      expect(response.statusCode).toBe(415);
      expect(response.json()).toMatchObject({
        error: "BAD_REQUEST",
        message: "Unsupported Media Type",
      });
    });

    it("should handle generic errors with 500 status", async () => {
      const response = await app.inject({
        method: "GET",
        url: "/generic-error",
      });

      expect(response.statusCode).toBe(500);
      expect(response.json()).toMatchObject({
        error: "INTERNAL_ERROR",
        message: "An unexpected error occurred",
      });
    });

    it("should handle Fastify validation errors", async () => {
      const response = await app.inject({
        method: "GET",
        url: "/fastify-validation",
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toMatchObject({
        error: "VALIDATION_ERROR",
        message: "Invalid request parameters",
        details: {
          validation: [{ keyword: "type", message: "must be string" }],
        },
      });
    });

    it("should handle unknown routes with 404", async () => {
      const response = await app.inject({
        method: "POST",
        url: "/unknown-route",
      });

      expect(response.statusCode).toBe(404);
      expect(response.json()).toMatchObject({
        error: "NOT_FOUND",
        message: "Route POST /unknown-route not found",
      });
    });
  });
});
