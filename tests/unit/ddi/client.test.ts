import { MockAgent, type MockPool } from "undici";
import { describe, it, expect, beforeEach, afterEach } from "vitest";

import {
  DdiClient,
  checkAttributeName,
  withDdiClient,
} from "../../../src/ddi/client.js";
import {
  AuthenticationError,
  ConfigurationError,
  TransientError,
  ValidationError,
} from "../../../src/errors.js";

import type { NetworkCandidate } from "../../../src/types/index.js";

const ORIGIN = "https://ddi.test";
const API = "/wapi/v2.13.1";

const SETTINGS = {
  host: ORIGIN,
  username: "admin",
  password: "test-secret",
  retryDelayMs: 0,
  requestsPerSecond: 1000,
};

// ============================================================================
// Helpers
// ============================================================================

function endpoint(
  object: string,
  check: (params: URLSearchParams) => boolean = () => true
): (path: string) => boolean {
  return (path) => {
    const url = new URL(path, ORIGIN);
    return url.pathname === `${API}/${object}` && check(url.searchParams);
  };
}

function jsonBody(options: { body?: unknown }): unknown {
  return typeof options.body === "string" ? JSON.parse(options.body) : null;
}

function field(body: unknown, name: string): unknown {
  if (typeof body !== "object" || body === null) return undefined;
  return new Map(Object.entries(body)).get(name);
}

function wapiNetwork(cidr: string, extattrs: Record<string, unknown> = {}) {
  return {
    _ref: `network/ZG5z:${cidr}/default`,
    network: cidr,
    extattrs,
  };
}

describe("ddi/client", () => {
  let agent: MockAgent;
  let store: MockPool;
  let client: DdiClient;

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
    store = agent.get(ORIGIN);
    client = new DdiClient(SETTINGS, { dispatcher: agent });
  });

  afterEach(async () => {
    await client.close();
    await agent.close();
  });

  // ============================================================================
  // Construction
  // ============================================================================

  describe("constructor", () => {
    it("should reject an invalid configuration", () => {
      expect(() => new DdiClient({ ...SETTINGS, host: "ddi.test" })).toThrow(
        ConfigurationError
      );
    });

    it("should not open its own pool when given a dispatcher", () => {
      expect(client.isConnected).toBe(false);
    });
  });

  // ============================================================================
  // Request execution
  // ============================================================================

  describe("request", () => {
    it("should send basic credentials", async () => {
      const token = Buffer.from("admin:test-secret").toString("base64");
      const expected = `Basic ${token}`;
      store
        .intercept({
          path: endpoint("networkview"),
          method: "GET",
          headers: { authorization: expected },
        })
        .reply(200, [{ name: "default", comment: "Default view" }]);

      await expect(client.getNetworkViews()).resolves.toEqual([
        { name: "default", comment: "Default view" },
      ]);
    });

    it("should fail at once on 401", async () => {
      let calls = 0;
      store
        .intercept({ path: endpoint("networkview"), method: "GET" })
        .reply(() => {
          calls++;
          return { statusCode: 401, data: "Unauthorized" };
        })
        .persist();

      await expect(client.getNetworkViews()).rejects.toBeInstanceOf(
        AuthenticationError
      );
      expect(calls).toBe(1);
    });

    it("should give up after maxAttempts failed responses", async () => {
      let calls = 0;
      store
        .intercept({ path: endpoint("networkview"), method: "GET" })
        .reply(() => {
          calls++;
          return { statusCode: 503, data: "busy" };
        })
        .persist();

      const error: unknown = await client
        .getNetworkViews()
        .catch((error: unknown) => error);

      expect(error).toBeInstanceOf(TransientError);
      expect(error).toMatchObject({
        message:
          "DDI request GET networkview failed after 3 attempts: 503 - busy",
        status: 503,
        body: "busy",
        attempts: 3,
      });
      expect(calls).toBe(3);
    });

    it("should retry transport errors", async () => {
      store
        .intercept({ path: endpoint("networkview"), method: "GET" })
        .replyWithError(new Error("socket hang up"))
        .persist();

      const error: unknown = await client
        .getNetworkViews()
        .catch((error: unknown) => error);

      expect(error).toBeInstanceOf(TransientError);
      expect(error).toMatchObject({ status: undefined, attempts: 3 });
    });

    it("should succeed when a retry does", async () => {
      store
        .intercept({ path: endpoint("networkview"), method: "GET" })
        .reply(500, "oops")
        .times(2);
      store
        .intercept({ path: endpoint("networkview"), method: "GET" })
        .reply(200, [{ name: "lab" }]);

      await expect(client.getNetworkViews()).resolves.toEqual([
        { name: "lab" },
      ]);
    });

    it("should not send anything once the signal has aborted", async () => {
      let calls = 0;
      store
        .intercept({ path: endpoint("networkview"), method: "GET" })
        .reply(() => {
          calls++;
          return { statusCode: 200, data: [] };
        })
        .persist();
      const controller = new AbortController();
      controller.abort();

      await expect(
        client.getNetworkViews(controller.signal)
      ).rejects.toMatchObject({ name: "AbortError" });
      expect(calls).toBe(0);
    });

    it("should reject a response of the wrong shape", async () => {
      store
        .intercept({ path: endpoint("networkview"), method: "GET" })
        .reply(200, [{ nope: 1 }]);

      await expect(client.getNetworkViews()).rejects.toThrow(
        "Unexpected network view response from DDI store"
      );
    });
  });

  describe("testConnection", () => {
    it("should resolve true when the grid answers", async () => {
      store.intercept({ path: endpoint("grid"), method: "GET" }).reply(200, []);
      await expect(client.testConnection()).resolves.toBe(true);
    });

    it("should resolve false when the store is unreachable", async () => {
      store
        .intercept({ path: endpoint("grid"), method: "GET" })
        .reply(503, "down")
        .persist();
      await expect(client.testConnection()).resolves.toBe(false);
    });

    it("should still throw on bad credentials", async () => {
      store.intercept({ path: endpoint("grid"), method: "GET" }).reply(401, "");
      await expect(client.testConnection()).rejects.toBeInstanceOf(
        AuthenticationError
      );
    });
  });

  // ============================================================================
  // Networks
  // ============================================================================

  describe("listNetworksBatched", () => {
    const paged = (params: URLSearchParams): boolean =>
      params.get("network_view") === "default" &&
      params.get("_paging") === "1" &&
      params.get("_return_as_object") === "1" &&
      params.get("_max_results") === "2";

    it("should follow next_page_id until the last page", async () => {
      let calls = 0;
      const page = (data: object) => () => {
        calls++;
        return { statusCode: 200, data };
      };

      store
        .intercept({
          path: endpoint("network", (p) => paged(p) && !p.has("_page_id")),
          method: "GET",
        })
        .reply(
          page({
            result: [wapiNetwork("10.0.0.0/24"), wapiNetwork("10.0.1.0/24")],
            next_page_id: "p2",
          })
        );
      store
        .intercept({
          path: endpoint(
            "network",
            (p) => paged(p) && p.get("_page_id") === "p2"
          ),
          method: "GET",
        })
        .reply(
          page({
            result: [wapiNetwork("10.0.2.0/24"), wapiNetwork("10.0.3.0/24")],
            next_page_id: "p3",
          })
        );
      store
        .intercept({
          path: endpoint(
            "network",
            (p) => paged(p) && p.get("_page_id") === "p3"
          ),
          method: "GET",
        })
        .reply(page({ result: [wapiNetwork("10.0.4.0/24")] }));

      const networks = await client.listNetworksBatched("default", 2);

      expect(networks.map((network) => network.cidr)).toEqual([
        "10.0.0.0/24",
        "10.0.1.0/24",
        "10.0.2.0/24",
        "10.0.3.0/24",
        "10.0.4.0/24",
      ]);
      expect(calls).toBe(3);
    });

    it("should stop on an empty next_page_id", async () => {
      store
        .intercept({ path: endpoint("network"), method: "GET" })
        .reply(200, { result: [wapiNetwork("10.0.0.0/24")], next_page_id: "" });

      const networks = await client.listNetworksBatched("default", 2);
      expect(networks).toHaveLength(1);
    });

    it("should accept a store that ignores paging", async () => {
      store
        .intercept({ path: endpoint("network"), method: "GET" })
        .reply(200, [wapiNetwork("10.0.0.0/24"), wapiNetwork("10.0.1.0/24")]);

      const networks = await client.listNetworksBatched("default", 2);
      expect(networks).toHaveLength(2);
    });
  });

  describe("getNetworkBySubnet", () => {
    it("should resolve null when the subnet is absent", async () => {
      store
        .intercept({
          path: endpoint("network", (p) => p.get("network") === "10.0.0.0/24"),
          method: "GET",
        })
        .reply(200, []);

      await expect(
        client.getNetworkBySubnet("10.0.0.0/24", "default")
      ).resolves.toBeNull();
    });

    it("should convert the first match", async () => {
      store
        .intercept({
          path: endpoint(
            "network",
            (p) =>
              p.get("network") === "10.0.1.0/24" &&
              p.get("network_view") === "default"
          ),
          method: "GET",
        })
        .reply(200, [
          wapiNetwork("10.0.1.0/24", { environment: { value: "prod" } }),
        ]);

      await expect(
        client.getNetworkBySubnet("10.0.1.0/24", "default")
      ).resolves.toEqual({
        cidr: "10.0.1.0/24",
        ref: "network/ZG5z:10.0.1.0/24/default",
        extendedAttributes: { environment: { value: "prod" } },
        comment: "",
      });
    });
  });

  describe("createNetwork", () => {
    it("should return the reference from the response body", async () => {
      let sent: unknown;
      store
        .intercept({ path: endpoint("network"), method: "POST" })
        .reply((options) => {
          sent = jsonBody(options);
          return {
            statusCode: 201,
            data: JSON.stringify("network/ZG5z:10.0.0.0/24/default"),
          };
        });

      const ref = await client.createNetwork({
        subnet: "10.0.0.0/24",
        networkView: "default",
        comment: "Account: 123, Region: us-east-1",
        extattrs: { environment: { value: "prod" } },
      });

      expect(ref).toBe("network/ZG5z:10.0.0.0/24/default");
      expect(sent).toEqual({
        network: "10.0.0.0/24",
        network_view: "default",
        comment: "Account: 123, Region: us-east-1",
        extattrs: { environment: { value: "prod" } },
      });
    });

    it("should prefer the Location header", async () => {
      let sent: unknown;
      store
        .intercept({ path: endpoint("network"), method: "POST" })
        .reply((options) => {
          sent = jsonBody(options);
          return {
            statusCode: 201,
            data: "",
            responseOptions: {
              headers: { location: "network/ZG5z:10.0.9.0/24/lab" },
            },
          };
        });

      const ref = await client.createNetwork({
        subnet: "10.0.9.0/24",
        networkView: "lab",
        extattrs: {},
      });

      expect(ref).toBe("network/ZG5z:10.0.9.0/24/lab");
      expect(sent).toEqual({
        network: "10.0.9.0/24",
        network_view: "lab",
        comment: "",
      });
    });
  });

  describe("updateNetwork", () => {
    it("should put to the reference, adding the object prefix", async () => {
      let sent: unknown;
      store
        .intercept({
          path: endpoint("network/ZG5z:10.0.0.0/24/default"),
          method: "PUT",
        })
        .reply((options) => {
          sent = jsonBody(options);
          return {
            statusCode: 200,
            data: JSON.stringify("network/ZG5z:10.0.0.0/24/default"),
          };
        });

      const ref = await client.updateNetwork("ZG5z:10.0.0.0/24/default", {
        extattrs: { owner: { value: "ops" } },
      });

      expect(ref).toBe("network/ZG5z:10.0.0.0/24/default");
      expect(sent).toEqual({ extattrs: { owner: { value: "ops" } } });
    });

    it("should fall back to the path on an empty response", async () => {
      store
        .intercept({
          path: endpoint("network/ZG5z:10.0.0.0/24/default"),
          method: "PUT",
        })
        .reply(200, "");

      await expect(
        client.updateNetwork("network/ZG5z:10.0.0.0/24/default", {
          comment: "x",
        })
      ).resolves.toBe("network/ZG5z:10.0.0.0/24/default");
    });
  });

  describe("createNetworksBatch", () => {
    const candidates: NetworkCandidate[] = Array.from(
      { length: 12 },
      (_, index) => ({ subnet: `10.0.${String(index)}.0/24` })
    );

    it("should count every candidate as created or failed", async () => {
      store
        .intercept({ path: endpoint("network"), method: "POST" })
        .reply((options) => {
          const subnet = field(jsonBody(options), "network");
          if (subnet === "10.0.3.0/24") {
            return { statusCode: 400, data: "bad" };
          }
          if (subnet === "10.0.7.0/24") {
            return { statusCode: 401, data: "" };
          }
          return {
            statusCode: 201,
            data: JSON.stringify(`network/ZG5z:${String(subnet)}/default`),
          };
        })
        .persist();

      const result = await client.createNetworksBatch(candidates, "default", {
        batchSize: 5,
        batchDelayMs: 0,
      });

      expect(result).toEqual({
        createdCount: 10,
        failedCount: 2,
        errors: [
          "Failed to create network 10.0.3.0/24: DDI request POST network failed after 3 attempts: 400 - bad",
          "Failed to create network 10.0.7.0/24: Authentication with the DDI store failed",
        ],
      });
    });

    it("should reject a batch size below 1", async () => {
      await expect(
        client.createNetworksBatch(candidates, "default", { batchSize: 0 })
      ).rejects.toBeInstanceOf(ValidationError);
    });
  });

  describe("searchNetworksByAttribute", () => {
    it("should filter on the attribute", async () => {
      store
        .intercept({
          path: endpoint(
            "network",
            (p) =>
              p.get("*Environment") === "prod" &&
              p.get("network_view") === "default"
          ),
          method: "GET",
        })
        .reply(200, [wapiNetwork("10.0.0.0/24")]);

      const networks = await client.searchNetworksByAttribute(
        "Environment",
        "prod",
        "default"
      );
      expect(networks.map((network) => network.cidr)).toEqual(["10.0.0.0/24"]);
    });
  });

  // ============================================================================
  // Extensible attributes
  // ============================================================================

  describe("extensible attributes", () => {
    it("should list definitions", async () => {
      store
        .intercept({ path: endpoint("extensibleattributedef"), method: "GET" })
        .reply(200, [
          { name: "Owner", type: "STRING", comment: "Team" },
          { name: "Tier", type: "ENUM" },
        ]);

      await expect(client.getExtensibleAttributes()).resolves.toEqual([
        { name: "Owner", type: "STRING", comment: "Team" },
        { name: "Tier", type: "ENUM" },
      ]);
    });

    it("should create a definition with defaults", async () => {
      let sent: unknown;
      store
        .intercept({ path: endpoint("extensibleattributedef"), method: "POST" })
        .reply((options) => {
          sent = jsonBody(options);
          return {
            statusCode: 201,
            data: JSON.stringify("extensibleattributedef/b25l:Owner"),
          };
        });

      await expect(
        client.createExtensibleAttribute({ name: "Owner" })
      ).resolves.toBe("extensibleattributedef/b25l:Owner");
      expect(sent).toEqual({ name: "Owner", type: "STRING", comment: "" });
    });

    it("should refuse bad names without calling the store", async () => {
      await expect(
        client.createExtensibleAttribute({ name: "network" })
      ).rejects.toThrow("Attribute name 'network' is reserved");
      await expect(
        client.createExtensibleAttribute({ name: "1abc" })
      ).rejects.toBeInstanceOf(ValidationError);
    });
  });

  describe("checkAttributeName", () => {
    it("should accept well-formed names", () => {
      expect(checkAttributeName("Cost_Center2")).toBeNull();
    });

    it("should explain what is wrong", () => {
      expect(checkAttributeName("")).toBe("Attribute name is required");
      expect(checkAttributeName("a".repeat(65))).toBe(
        "Attribute name must be at most 64 characters"
      );
      expect(checkAttributeName("has-dash")).toBe(
        "Attribute name must start with a letter and contain only letters, digits and underscores"
      );
      expect(checkAttributeName("Comment")).toBe(
        "Attribute name 'Comment' is reserved"
      );
    });
  });

  describe("withDdiClient", () => {
    it("should resolve with the callback result", async () => {
      store.intercept({ path: endpoint("grid"), method: "GET" }).reply(200, []);

      await expect(
        withDdiClient(SETTINGS, (ddi) => ddi.testConnection(), {
          dispatcher: agent,
        })
      ).resolves.toBe(true);
    });

    it("should pass errors through", async () => {
      await expect(
        withDdiClient(SETTINGS, () => Promise.reject(new Error("boom")), {
          dispatcher: agent,
        })
      ).rejects.toThrow("boom");
    });
  });
});
