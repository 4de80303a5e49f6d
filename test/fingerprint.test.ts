import { describe, expect, it } from "vitest";
import { createHash } from "node:crypto";
import { fingerprint, FINGERPRINT_LENGTH, hasIdentity } from "../src/registry/fingerprint.js";

describe("fingerprint", () => {
  const identity = { flowcell: "FAQ00001", device: "MN10001", experiment_name: "tumor_a", date: "2024-01-01", time: "10:00" };

  it("is the first 16 hex chars of sha256 over pipe-joined identity fields", () => {
    const expected = createHash("sha256").update("FAQ00001|MN10001|tumor_a|2024-01-01|10:00").digest("hex").slice(0, 16);
    expect(fingerprint(identity)).toBe(expected);
    expect(fingerprint(identity)).toMatch(/^[0-9a-f]{16}$/);
    expect(FINGERPRINT_LENGTH).toBe(16);
  });

  it("is deterministic", () => {
    expect(fingerprint({ ...identity })).toBe(fingerprint(identity));
  });

  it("ignores fields outside the identity tuple", () => {
    const a = { ...identity, run_id: "r1", total_reads: 10, current_path: "/a" };
    const b = { ...identity, run_id: "r2", total_reads: 99, current_path: "/b" };
    expect(fingerprint(a)).toBe(fingerprint(b));
  });

  it("treats missing fields as empty strings", () => {
    expect(fingerprint({})).toBe(fingerprint({ flowcell: "", device: "", experiment_name: "", date: "", time: "" }));
    expect(fingerprint({ flowcell: "FAQ00001" })).toBe(fingerprint({ flowcell: "FAQ00001", time: "" }));
  });

  it("changes when any identity field changes", () => {
    const base = fingerprint(identity);
    expect(fingerprint({ ...identity, flowcell: "FAQ00002" })).not.toBe(base);
    expect(fingerprint({ ...identity, device: "MN10002" })).not.toBe(base);
    expect(fingerprint({ ...identity, experiment_name: "tumor_b" })).not.toBe(base);
    expect(fingerprint({ ...identity, date: "2024-01-02" })).not.toBe(base);
    expect(fingerprint({ ...identity, time: "10:01" })).not.toBe(base);
  });
});

describe("hasIdentity", () => {
  it("is false only when every identity field is empty", () => {
    expect(hasIdentity({})).toBe(false);
    expect(hasIdentity({ flowcell: "", device: "", experiment_name: "", date: "", time: "" })).toBe(false);
    expect(hasIdentity({ time: "10:00" })).toBe(true);
  });
});
