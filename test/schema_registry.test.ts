import { describe, expect, it, beforeAll } from "vitest";
import { RegistryError } from "../src/errors.js";
import { SchemaRegistry, createRegistry } from "../src/schema/registry.js";
import { SCHEMA_DIR } from "../src/paths.js";

describe("schema registry", () => {
  let registry: SchemaRegistry;

  beforeAll(() => {
    registry = createRegistry(SCHEMA_DIR);
  });

  it("discovers all schema files", () => {
    expect(registry.names()).toEqual(["audit", "discovery", "proposal", "registry"]);
  });

  it("reads versions from $id", () => {
    expect(registry.versions()).toEqual({ audit: "1.0.0", discovery: "1.0.0", proposal: "1.0.0", registry: "1.0.0" });
  });

  it("shares a default instance", () => {
    expect(createRegistry()).toBe(createRegistry());
  });

  it("throws for an unknown schema", () => {
    expect(() => registry.getValidator("nope")).toThrow(RegistryError);
  });

  describe("registry schema", () => {
    it("accepts records with unmodeled fields", () => {
      const { valid } = registry.validate("registry", {
        version: "2.1",
        experiments: { r1: { run_id: "r1", flowcell: "FC1", total_reads: 10, custom: [1, 2] } },
      });
      expect(valid).toBe(true);
    });

    it("rejects a mistyped modeled field", () => {
      const { valid, errors } = registry.validate("registry", { experiments: { r1: { total_reads: "ten" } } });
      expect(valid).toBe(false);
      expect(errors).toContain("total_reads");
    });

    it("requires experiments", () => {
      expect(registry.validate("registry", { version: "2.1" }).valid).toBe(false);
    });
  });

  describe("discovery schema", () => {
    it("accepts a bare list and a wrapped list", () => {
      expect(registry.validate("discovery", [{ path: "/a" }]).valid).toBe(true);
      expect(registry.validate("discovery", { experiments: [{ path: "/a", pod5_files: 3 }] }).valid).toBe(true);
    });

    it("requires a path and non-negative counts", () => {
      expect(registry.validate("discovery", [{ id: "r1" }]).valid).toBe(false);
      expect(registry.validate("discovery", [{ path: "/a", pod5_files: -1 }]).valid).toBe(false);
    });
  });

  describe("proposal schema", () => {
    it("rejects an unknown approval status", () => {
      const { valid } = registry.validate("proposal", {
        version: "1.0",
        id: "proposal_20240101_000000",
        generated_at: "2024-01-01T00:00:00Z",
        summary: { new_count: 0, updated_count: 0, removed_count: 0, unchanged_count: 0 },
        changes: {},
        approval_status: "merged",
      });
      expect(valid).toBe(false);
    });
  });

  it("assertValid names the document in its error", () => {
    expect(() => registry.assertValid("audit", { entries: "no" }, "audit.json")).toThrow(
      /^audit\.json does not match audit schema/,
    );
  });
});
