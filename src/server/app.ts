import Fastify, { type FastifyInstance } from "fastify";

import { fastifyLoggerConfig } from "../logger.js";
import { errorHandler } from "./plugins/error-handler.js";
import { registerApiRoutes } from "./routes/index.js";

import type { ServerContext } from "./context.js";

export interface BuildServerOptions {
  /** Fastify logger settings; defaults to the shared pino configuration */
  logger?: boolean | typeof fastifyLoggerConfig;
  /** Largest accepted request body, in bytes */
  bodyLimit?: number;
}

/**
 * Build the HTTP server without starting it
 */
export async function buildServer(
  context: ServerContext,
  options: BuildServerOptions = {}
): Promise<FastifyInstance> {
  const app = Fastify({
    logger: options.logger ?? fastifyLoggerConfig,
    bodyLimit: options.bodyLimit ?? 20 * 1024 * 1024,
  });

  // Register error handler
  await app.register(errorHandler);

  // Register API routes
  await registerApiRoutes(app, context);

  return app;
}
