/**
 * Fastify error handler plugin
 *
 * Maps the shared error taxonomy onto ApiError responses.
 */

import fp from "fastify-plugin";

import {
  AuthenticationError,
  ConfigurationError,
  NotFoundError,
  TransientError,
  ValidationError,
} from "../../errors.js";

import type { ApiError } from "../../types/api.js";
import type {
  FastifyInstance,
  FastifyError,
  FastifyRequest,
  FastifyReply,
} from "fastify";

type DomainError =
  | ValidationError
  | ConfigurationError
  | NotFoundError
  | AuthenticationError
  | TransientError;

function isDomainError(error: unknown): error is DomainError {
  return (
    error instanceof ValidationError ||
    error instanceof ConfigurationError ||
    error instanceof NotFoundError ||
    error instanceof AuthenticationError ||
    error instanceof TransientError
  );
}

/**
 * Details safe to hand to API clients. Upstream failures keep the store's
 * status and the attempt count, never its body or our credentials.
 */
function detailsOf(error: DomainError): Record<string, unknown> | undefined {
  if (error instanceof TransientError) {
    return { status: error.status ?? null, attempts: error.attempts };
  }
  if (error instanceof ValidationError || error instanceof ConfigurationError) {
    return error.details;
  }
  return undefined;
}

function sendError(
  reply: FastifyReply,
  statusCode: number,
  body: ApiError
): FastifyReply {
  return reply.status(statusCode).send(body);
}

// ============================================================================
// Error Handler Plugin
// ============================================================================

function errorHandlerPlugin(fastify: FastifyInstance): void {
  fastify.setErrorHandler(
    (error: FastifyError, request: FastifyRequest, reply: FastifyReply) => {
      const requestId = request.id;

      // Schema validation of params, query or body
      if (error.validation) {
        return sendError(reply, 400, {
          error: "VALIDATION_ERROR",
          message: "Invalid request parameters",
          details: { validation: error.validation },
          requestId,
        });
      }

      if (isDomainError(error)) {
        if (error.statusCode >= 500) {
          request.log.warn({ err: error }, "Request failed on DDI store");
        }
        return sendError(reply, error.statusCode, {
          error: error.code,
          message: error.message,
          details: detailsOf(error),
          requestId,
        });
      }

      // Malformed JSON bodies, unsupported media types and the like
      const status = error.statusCode ?? 500;
      if (status >= 400 && status < 500) {
        return sendError(reply, status, {
          error: status === 404 ? "NOT_FOUND" : "BAD_REQUEST",
          message: error.message,
          requestId,
        });
      }

      request.log.error(error, "Unhandled error");
      return sendError(reply, 500, {
        error: "INTERNAL_ERROR",
        message: "An unexpected error occurred",
        requestId,
      });
    }
  );

  fastify.setNotFoundHandler((request, reply) =>
    sendError(reply, 404, {
      error: "NOT_FOUND",
      message: `Route ${request.method} ${request.url} not found`,
      requestId: request.id,
    })
  );
}

export const errorHandler = fp(errorHandlerPlugin, {
  name: "error-handler",
});
