/**
 * DDI client configuration
 */

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

import { ConfigurationError } from "../errors.js";

// ============================================================================
// Schema
// ============================================================================

export const DdiClientConfigSchema = Type.Object({
  host: Type.String({ pattern: "^https?://[^\\s/]+" }),
  username: Type.String({ minLength: 1 }),
  password: Type.String({ minLength: 1 }),
  apiVersion: Type.String({ pattern: "^\\d+(\\.\\d+)*$" }),
  apiRoot: Type.String({ minLength: 1 }),
  verifyTls: Type.Boolean(),
  requestsPerSecond: Type.Number({ exclusiveMinimum: 0 }),
  maxConnections: Type.Integer({ minimum: 1 }),
  maxConnectionsPerHost: Type.Integer({ minimum: 1 }),
  dnsCacheTtlMs: Type.Integer({ minimum: 0 }),
  connectTimeoutMs: Type.Integer({ minimum: 1 }),
  totalTimeoutMs: Type.Integer({ minimum: 1 }),
  maxAttempts: Type.Integer({ minimum: 1 }),
  retryDelayMs: Type.Integer({ minimum: 0 }),
  maxQueuedRequests: Type.Integer({ minimum: 0 }),
});

export type DdiClientConfig = Static<typeof DdiClientConfigSchema>;

/** Connection settings; everything but the credentials has a default */
export type DdiClientSettings = Pick<
  DdiClientConfig,
  "host" | "username" | "password"
> &
  Partial<Omit<DdiClientConfig, "host" | "username" | "password">>;

export const DDI_CLIENT_DEFAULTS = {
  apiVersion: "2.13.1",
  apiRoot: "wapi",
  verifyTls: true,
  requestsPerSecond: 10,
  maxConnections: 100,
  maxConnectionsPerHost: 30,
  dnsCacheTtlMs: 300_000,
  connectTimeoutMs: 10_000,
  totalTimeoutMs: 30_000,
  maxAttempts: 3,
  retryDelayMs: 1_000,
  maxQueuedRequests: 10_000,
} satisfies Omit<DdiClientConfig, "host" | "username" | "password">;

// ============================================================================
// Resolution
// ============================================================================

/**
 * Apply defaults to `settings` and validate the result
 *
 * @throws ConfigurationError listing every invalid field
 */
export function resolveDdiClientConfig(
  settings: DdiClientSettings
): DdiClientConfig {
  const candidate: Record<string, unknown> = { ...DDI_CLIENT_DEFAULTS };
  for (const [key, value] of Object.entries(settings)) {
    if (value !== undefined) candidate[key] = value;
  }

  if (!Value.Check(DdiClientConfigSchema, candidate)) {
    const errors = [...Value.Errors(DdiClientConfigSchema, candidate)].map(
      (error) => `${error.path || "/"}: ${error.message}`
    );
    throw new ConfigurationError("Invalid DDI client configuration", {
      errors,
    });
  }

  return {
    ...candidate,
    host: candidate.host.replace(/\/+$/, ""),
    apiRoot: candidate.apiRoot.replace(/^\/+|\/+$/g, ""),
  };
}
