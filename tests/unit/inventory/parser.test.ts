import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { describe, it, expect } from "vitest";

import { ValidationError } from "../../../src/errors.js";
import {
  canonicalizeRecords,
  collectTagKeys,
  parseInventory,
  parseTags,
  readInventoryFile,
} from "../../../src/inventory/parser.js";

import type { NetworkRecord } from "../../../src/types/index.js";

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error("Expected function to throw");
}

const INVENTORY_CSV = [
  "Subnet,Account,Region,Tags,Name",
  '10.0.0.5/24,123,us-east-1,"{""env"":""prod"",""Owner"":""ops""}",web',
  "10.0.1.0/24,123,us-east-1,app=api;CostCenter=42,api",
  "10.0.2.0/24,456,eu-west-1,env:dev,",
].join("\n");

describe("inventory/parser", () => {
  // ============================================================================
  // Tag parsing
  // ============================================================================

  describe("parseTags", () => {
    it("should parse a JSON object", () => {
      expect(parseTags('{"env":"prod","team":"net"}')).toEqual({
        env: "prod",
        team: "net",
      });
    });

    it("should stringify non-string JSON values", () => {
      expect(parseTags('{"n":1,"b":true,"a":null,"o":{"x":1}}')).toEqual({
        n: "1",
        b: "true",
        a: "",
        o: '{"x":1}',
      });
    });

    it("should parse key=value pairs separated by commas or semicolons", () => {
      expect(parseTags("env=prod, team=net;tier = web")).toEqual({
        env: "prod",
        team: "net",
        tier: "web",
      });
    });

    it("should split on the first separator only", () => {
      expect(parseTags("url=http://x")).toEqual({ url: "http://x" });
      expect(parseTags("k=a=b")).toEqual({ k: "a=b" });
    });

    it("should parse key:value pairs", () => {
      expect(parseTags("a:1, b:2")).toEqual({ a: "1", b: "2" });
    });

    it("should read the same tags from every supported format", () => {
      const expected = { k1: "v1", k2: "v2" };
      expect(parseTags("k1=v1,k2=v2")).toEqual(expected);
      expect(parseTags("k1:v1;k2:v2")).toEqual(expected);
      expect(parseTags('{"k1":"v1","k2":"v2"}')).toEqual(expected);
    });

    it("should return no tags for empty or unparsable cells", () => {
      expect(parseTags("")).toEqual({});
      expect(parseTags(undefined)).toEqual({});
      expect(parseTags("just text")).toEqual({});
      expect(parseTags("{broken")).toEqual({});
    });
  });

  // ============================================================================
  // Inventory parsing
  // ============================================================================

  describe("parseInventory", () => {
    it("should parse records in input order with canonical subnets", () => {
      const records = parseInventory(INVENTORY_CSV);

      expect(records.map((record) => record.subnet)).toEqual([
        "10.0.0.0/24",
        "10.0.1.0/24",
        "10.0.2.0/24",
      ]);
      expect(records[0]).toEqual({
        subnet: "10.0.0.0/24",
        account: "123",
        region: "us-east-1",
        tags: { env: "prod", Owner: "ops" },
        rawFields: {
          Subnet: "10.0.0.5/24",
          Account: "123",
          Region: "us-east-1",
          Tags: '{"env":"prod","Owner":"ops"}',
          Name: "web",
        },
      });
      expect(records[1]?.tags).toEqual({ app: "api", CostCenter: "42" });
      expect(records[2]?.tags).toEqual({ env: "dev" });
      expect(records[2]?.rawFields.Name).toBe("");
    });

    it("should accept a Buffer with a byte order mark", () => {
      const content = Buffer.from(
        "\uFEFFsubnet,account,region,tag\n10.9.0.0/16,1,r1,\n"
      );
      const records = parseInventory(content);

      expect(records).toHaveLength(1);
      expect(records[0]?.subnet).toBe("10.9.0.0/16");
      expect(records[0]?.tags).toEqual({});
    });

    it("should report every missing column", () => {
      const error = captureError(() =>
        parseInventory("subnet,region\n10.0.0.0/24,r1\n")
      );

      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toMatchObject({
        message: "Missing required columns: account, TAG",
        details: { missingColumns: ["account", "TAG"] },
      });
    });

    it("should reject text that is not valid CSV", () => {
      const unclosedQuote =
        'subnet,account,region,TAG\n10.0.0.0/24,1,us,"env=prod\n';
      const error = captureError(() => parseInventory(unclosedQuote));

      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toMatchObject({
        message: "Inventory file could not be read as CSV",
        details: { reason: expect.stringContaining("Quote Not Closed") },
      });
    });

    it("should reject an empty file", () => {
      const error = captureError(() => parseInventory(""));

      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toMatchObject({
        message: "Missing required columns: subnet, account, region, TAG",
      });
    });

    const WITH_INVALID = [
      "subnet,account,region,tag",
      "10.0.0.0/24,1,r,",
      "999.0.0.0/24,1,r,",
      ",1,r,",
      "10.0.1.0/33,1,r,",
    ].join("\n");

    it("should reject invalid subnets with their row numbers", () => {
      const error = captureError(() => parseInventory(WITH_INVALID));

      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toMatchObject({
        message: "Invalid subnet in 2 row(s)",
        details: {
          invalidRows: [
            {
              row: 3,
              subnet: "999.0.0.0/24",
              reason: "invalid IPv4 address '999.0.0.0'",
            },
            {
              row: 5,
              subnet: "10.0.1.0/33",
              reason: "prefix length must be between /8 and /32",
            },
          ],
        },
      });
    });

    it("should drop invalid rows in skip mode", () => {
      const records = parseInventory(WITH_INVALID, { invalidSubnets: "skip" });

      expect(records.map((record) => record.subnet)).toEqual(["10.0.0.0/24"]);
    });
  });

  describe("readInventoryFile", () => {
    it("should read and parse a file from disk", async () => {
      const dir = await mkdtemp(join(tmpdir(), "inventory-"));
      try {
        const path = join(dir, "export.csv");
        await writeFile(path, INVENTORY_CSV);

        const records = await readInventoryFile(path);
        expect(records).toHaveLength(3);
      } finally {
        await rm(dir, { recursive: true, force: true });
      }
    });
  });

  describe("collectTagKeys", () => {
    it("should return sorted, de-duplicated keys", () => {
      expect(collectTagKeys(parseInventory(INVENTORY_CSV))).toEqual([
        "CostCenter",
        "Owner",
        "app",
        "env",
      ]);
    });
  });

  describe("canonicalizeRecords", () => {
    const record = (subnet: string): NetworkRecord => ({
      subnet,
      account: "123",
      region: "us-east-1",
      tags: {},
      rawFields: {},
    });

    it("should canonicalize without mutating the input", () => {
      const input = [record("10.0.0.9/24")];
      const output = canonicalizeRecords(input);

      expect(output[0]?.subnet).toBe("10.0.0.0/24");
      expect(input[0]?.subnet).toBe("10.0.0.9/24");
    });

    it("should list invalid records by 1-based position", () => {
      const error = captureError(() =>
        canonicalizeRecords([record("10.0.0.0/24"), record("bad")])
      );

      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toMatchObject({
        message: "Invalid subnet in 1 record(s)",
        details: {
          invalidRows: [
            { row: 2, subnet: "bad", reason: "invalid IPv4 address 'bad'" },
          ],
        },
      });
    });
  });
});
