/**
 * Process configuration read from the environment (dotenv is loaded by the
 * logger module, which every entry point imports first).
 */

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

import { resolveDdiClientConfig, type DdiClientConfig } from "./ddi/config.js";
import { ConfigurationError } from "./errors.js";

const ServerConfigSchema = Type.Object({
  port: Type.Integer({ minimum: 0, maximum: 65535 }),
  host: Type.String({ minLength: 1 }),
  dbPath: Type.String({ minLength: 1 }),
});

export type ServerConfig = Static<typeof ServerConfigSchema>;

type Env = Record<string, string | undefined>;

function readEnv(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value === undefined || value === "" ? undefined : value;
}

function readNumber(env: Env, name: string): number | undefined {
  const value = readEnv(env, name);
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (Number.isNaN(parsed)) {
    throw new ConfigurationError(`${name} must be a number, got '${value}'`);
  }
  return parsed;
}

function readBoolean(env: Env, name: string): boolean | undefined {
  const value = readEnv(env, name)?.toLowerCase();
  if (value === undefined) return undefined;
  if (["1", "true", "yes", "on"].includes(value)) return true;
  if (["0", "false", "no", "off"].includes(value)) return false;
  throw new ConfigurationError(`${name} must be a boolean, got '${value}'`);
}

/**
 * Target store settings from DDI_* variables.
 *
 * Returns null when DDI_HOST is unset (no target configured). Throws
 * ConfigurationError when the host is set but the rest is missing or
 * invalid.
 */
export function loadDdiConfig(env: Env = process.env): DdiClientConfig | null {
  const host = readEnv(env, "DDI_HOST");
  if (host === undefined) return null;

  const username = readEnv(env, "DDI_USERNAME");
  const password = readEnv(env, "DDI_PASSWORD");
  const missing = [
    username === undefined ? "DDI_USERNAME" : null,
    password === undefined ? "DDI_PASSWORD" : null,
  ].filter((name): name is string => name !== null);
  if (username === undefined || password === undefined) {
    throw new ConfigurationError(
      `DDI_HOST is set but ${missing.join(" and ")} is missing`,
      { missing }
    );
  }

  return resolveDdiClientConfig({
    host,
    username,
    password,
    apiVersion: readEnv(env, "DDI_API_VERSION"),
    verifyTls: readBoolean(env, "DDI_VERIFY_TLS"),
    requestsPerSecond: readNumber(env, "DDI_RATE_LIMIT"),
  });
}

export function loadServerConfig(env: Env = process.env): ServerConfig {
  const candidate = {
    port: readNumber(env, "PORT") ?? 3000,
    host: readEnv(env, "HOST") ?? "0.0.0.0",
    dbPath: readEnv(env, "DB_PATH") ?? "./data/jobs.db",
  };

  if (!Value.Check(ServerConfigSchema, candidate)) {
    const errors = [...Value.Errors(ServerConfigSchema, candidate)].map(
      (error) => `${error.path}: ${error.message}`
    );
    throw new ConfigurationError("Invalid server configuration", { errors });
  }
  return candidate;
}
