import { describe, it, expect } from "vitest";

import { loadDdiConfig, loadServerConfig } from "../../../src/config.js";
import {
  DDI_CLIENT_DEFAULTS,
  resolveDdiClientConfig,
} from "../../../src/ddi/config.js";
import { ConfigurationError } from "../../../src/errors.js";

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error("Expected function to throw");
}

const CREDENTIALS = {
  host: "https://ddi.test",
  username: "admin",
  password: "test-secret",
};

describe("ddi/config", () => {
  describe("resolveDdiClientConfig", () => {
    it("should apply defaults", () => {
      expect(resolveDdiClientConfig(CREDENTIALS)).toEqual({
        ...DDI_CLIENT_DEFAULTS,
        ...CREDENTIALS,
      });
    });

    it("should ignore undefined overrides and trim slashes", () => {
      const config = resolveDdiClientConfig({
        ...CREDENTIALS,
        host: "https://ddi.test//",
        apiRoot: "/wapi/",
        maxAttempts: undefined,
      });

      expect(config.host).toBe("https://ddi.test");
      expect(config.apiRoot).toBe("wapi");
      expect(config.maxAttempts).toBe(3);
    });

    it("should list every invalid field", () => {
      const error = captureError(() =>
        resolveDdiClientConfig({
          ...CREDENTIALS,
          host: "ddi.test",
          maxConnections: 0,
        })
      );

      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error).toMatchObject({
        message: "Invalid DDI client configuration",
      });
      const details =
        error instanceof ConfigurationError ? error.details : undefined;
      const errors: unknown = details?.errors;
      expect(Array.isArray(errors)).toBe(true);
      if (!Array.isArray(errors)) return;
      expect(errors.some((line) => String(line).startsWith("/host:"))).toBe(
        true
      );
      expect(
        errors.some((line) => String(line).startsWith("/maxConnections:"))
      ).toBe(true);
    });
  });

  describe("loadDdiConfig", () => {
    it("should return null when no host is set", () => {
      expect(loadDdiConfig({})).toBeNull();
      expect(loadDdiConfig({ DDI_HOST: "  " })).toBeNull();
    });

    it("should name the missing credentials", () => {
      const error = captureError(() =>
        loadDdiConfig({ DDI_HOST: "https://ddi.test", DDI_USERNAME: "admin" })
      );

      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error).toMatchObject({
        message: "DDI_HOST is set but DDI_PASSWORD is missing",
        details: { missing: ["DDI_PASSWORD"] },
      });
    });

    it("should read optional settings", () => {
      const config = loadDdiConfig({
        DDI_HOST: "https://ddi.test",
        DDI_USERNAME: "admin",
        DDI_PASSWORD: "test-secret",
        DDI_API_VERSION: "2.12",
        DDI_VERIFY_TLS: "off",
        DDI_RATE_LIMIT: "2.5",
      });

      expect(config).toMatchObject({
        host: "https://ddi.test",
        apiVersion: "2.12",
        verifyTls: false,
        requestsPerSecond: 2.5,
      });
    });

    it("should reject malformed flags and numbers", () => {
      const base = {
        DDI_HOST: "https://ddi.test",
        DDI_USERNAME: "admin",
        DDI_PASSWORD: "test-secret",
      };

      expect(() => loadDdiConfig({ ...base, DDI_VERIFY_TLS: "maybe" })).toThrow(
        "DDI_VERIFY_TLS must be a boolean, got 'maybe'"
      );
      expect(() => loadDdiConfig({ ...base, DDI_RATE_LIMIT: "fast" })).toThrow(
        "DDI_RATE_LIMIT must be a number, got 'fast'"
      );
    });
  });

  describe("loadServerConfig", () => {
    it("should apply defaults", () => {
      expect(loadServerConfig({})).toEqual({
        port: 3000,
        host: "0.0.0.0",
        dbPath: "./data/jobs.db",
      });
    });

    it("should reject an out-of-range port", () => {
      expect(() => loadServerConfig({ PORT: "70000" })).toThrow(
        ConfigurationError
      );
    });
  });
});
