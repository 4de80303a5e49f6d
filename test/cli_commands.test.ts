import { describe, expect, it, beforeEach, afterEach, vi } from "vitest";
import fs from "node:fs";
import path from "node:path";
import os from "node:os";
import { PassThrough } from "node:stream";
import { auditCommand, formatAuditEntry } from "../src/commands/audit.js";
import { openContext, defaultActor, type CommandContext } from "../src/commands/context.js";
import { EXIT } from "../src/commands/exit-codes.js";
import { Output, parseFormat } from "../src/commands/output.js";
import {
  applyCommand,
  approveCommand,
  listProposalsCommand,
  rejectCommand,
  resolveProposalId,
  reviewCommand,
} from "../src/commands/proposals.js";
import { reconcileCommand } from "../src/commands/reconcile.js";
import { addCommand, bestCommand, getCommand, parseCriteria, searchCommand, statsCommand } from "../src/commands/registry.js";
import { validateAll } from "../src/commands/validate.js";

const NOW = new Date("2024-03-05T07:00:00.000Z");

const BASE_YAML = `schema_version: "1.0.0"
registry_path: state/experiments.json
proposals_dir: state/proposals
approved_dir: state/approved
audit_path: state/audit.json
audit_max_entries: 50
lock_timeout_ms: 2000
stale_lock_age_ms: 60000
ignore_patterns: []
`;

const R1 = {
  run_id: "r1",
  flowcell: "FC1",
  device: "MN1",
  experiment_name: "e1",
  date: "2024-01-01",
  time: "10:00",
  current_path: "/data/r1",
  total_reads: 10,
};

describe("exit-codes", () => {
  it("defines all required exit codes", () => {
    expect(EXIT).toEqual({ SUCCESS: 0, FAILURE: 1, NOT_FOUND: 2, INVALID_ARGS: 3, STATE_CONFLICT: 4 });
  });
});

describe("output", () => {
  it("parses formats", () => {
    expect(parseFormat(undefined)).toBe("human");
    expect(parseFormat("jsonl")).toBe("jsonl");
    expect(parseFormat("xml")).toBeNull();
  });

  it("writes human lines and routes errors to stderr", () => {
    const stdout = new PassThrough();
    const stderr = new PassThrough();
    const out = new Output("human", stdout, stderr);
    out.emit("hello", { level: "info", code: "X" });
    out.error("NOT_FOUND", "missing thing");
    expect(String(stdout.read())).toBe("hello\n");
    expect(String(stderr.read())).toBe("missing thing\n");
  });

  it("writes one JSON object per line in jsonl mode", () => {
    const stdout = new PassThrough();
    const out = new Output("jsonl", stdout, new PassThrough());
    out.info("OK", "done", { n: 1 });
    out.error("STATE", "nope");
    expect(String(stdout.read()).split("\n")).toEqual([
      JSON.stringify({ level: "info", code: "OK", message: "done", n: 1 }),
      JSON.stringify({ level: "error", code: "STATE", message: "nope" }),
      "",
    ]);
  });
});

describe("defaultActor", () => {
  it("falls back through USER and USERNAME", () => {
    expect(defaultActor({ USER: "alice" })).toBe("alice");
    expect(defaultActor({ USERNAME: "bob" })).toBe("bob");
    expect(defaultActor({})).toBe("unknown");
  });
});

describe("parseCriteria", () => {
  it("coerces numeric and boolean literals", () => {
    expect(parseCriteria(["a=true", "b=1.5", "c=x=y", "d=FC1"])).toEqual({
      ok: true,
      value: { a: true, b: 1.5, c: "x=y", d: "FC1" },
    });
  });

  it("rejects terms without a key", () => {
    expect(parseCriteria(["flowcell"])).toEqual({ ok: false, code: "INVALID_ARGS", error: "Expected key=value, got: flowcell" });
    expect(parseCriteria(["=x"]).ok).toBe(false);
  });
});

describe("commands", () => {
  let tmpDir: string;
  let configDir: string;
  let ctx: CommandContext;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "ontreg-cmd-"));
    configDir = path.join(tmpDir, "config");
    fs.mkdirSync(configDir);
    fs.writeFileSync(path.join(configDir, "base.yaml"), BASE_YAML);
    ctx = openContext({ configDir, cwd: tmpDir, processEnv: {}, now: () => NOW });
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  function writeFile(name: string, content: unknown): string {
    const file = path.join(tmpDir, name);
    fs.writeFileSync(file, typeof content === "string" ? content : JSON.stringify(content));
    return file;
  }

  it("resolves config paths against the working directory", () => {
    expect(ctx.config.registry_path).toBe(path.join(tmpDir, "state/experiments.json"));
    expect(ctx.store.path).toBe(path.join(tmpDir, "state/experiments.json"));
    expect(ctx.audit.path).toBe(path.join(tmpDir, "state/audit.json"));
  });

  describe("add", () => {
    it("reports each record and audits the batch once", async () => {
      const file = writeFile("records.json", [R1, R1, { flowcell: "FC1" }]);
      const res = await addCommand(ctx, { file, actor: "tester" });

      expect(res).toEqual({
        ok: true,
        added: 1,
        merged: 0,
        skipped: 2,
        items: [
          { input: "r1", outcome: "added", runId: "r1", message: "Added r1" },
          { input: "r1", outcome: "duplicate", runId: "r1", message: "Duplicate run_id r1" },
          { input: "", outcome: "invalid", runId: null, message: "Missing run_id" },
        ],
      });
      expect(ctx.audit.entries()).toEqual([
        {
          timestamp: "2024-03-05T07:00:00.000Z",
          action: "add",
          record_id: "records.json",
          actor: "tester",
          changes: [{ run_id: "r1", kind: "added", message: "Added r1" }],
        },
      ]);
    });

    it("accepts a run_id mapping in YAML", async () => {
      const file = writeFile("records.yaml", "experiments:\n  r2:\n    flowcell: FC2\n    current_path: /data/r2\n");
      const res = await addCommand(ctx, { file, actor: "tester" });
      expect(res.ok && res.added).toBe(1);
      expect(ctx.store.get("r2")?.flowcell).toBe("FC2");
    });

    it("writes no audit entry when nothing changed", async () => {
      const file = writeFile("records.json", [{ flowcell: "FC1" }]);
      await addCommand(ctx, { file, actor: "tester" });
      expect(ctx.audit.entries()).toEqual([]);
    });

    it("reports a missing or unreadable file", async () => {
      expect(await addCommand(ctx, { file: path.join(tmpDir, "none.json"), actor: "t" })).toMatchObject({
        ok: false,
        code: "NOT_FOUND",
      });
      const bad = writeFile("bad.json", "{oops");
      expect(await addCommand(ctx, { file: bad, actor: "t" })).toMatchObject({ ok: false, code: "INVALID_ARGS" });
      const scalar = writeFile("scalar.yaml", "42\n");
      expect(await addCommand(ctx, { file: scalar, actor: "t" })).toEqual({
        ok: false,
        code: "INVALID_ARGS",
        error: `No experiment records in ${scalar}`,
      });
    });
  });

  describe("queries", () => {
    beforeEach(async () => {
      const file = writeFile("records.json", [R1, { ...R1, run_id: "r3", time: "11:00", current_path: "/data/r3", total_reads: 5 }]);
      await addCommand(ctx, { file, actor: "tester" });
    });

    it("gets one record or reports it missing", () => {
      const found = getCommand(ctx, "r1");
      expect(found.ok && found.value.flowcell).toBe("FC1");
      expect(getCommand(ctx, "zz")).toEqual({ ok: false, code: "NOT_FOUND", error: "No experiment with run_id zz" });
    });

    it("searches with typed terms", () => {
      const res = searchCommand(ctx, ["flowcell=FC1", "total_reads=10"]);
      expect(res.ok && res.value.map((r) => r.run_id)).toEqual(["r1"]);
    });

    it("picks the best version of a flowcell", () => {
      const res = bestCommand(ctx, "FC1");
      expect(res.ok && res.value.run_id).toBe("r1");
      expect(bestCommand(ctx, "FC9")).toEqual({ ok: false, code: "NOT_FOUND", error: "No experiments on flowcell FC9" });
    });

    it("derives stats", () => {
      expect(statsCommand(ctx)).toMatchObject({ total_experiments: 2, unique_flowcells: 1, merge_candidates: 1, total_reads: 15 });
    });
  });

  describe("proposal workflow", () => {
    beforeEach(async () => {
      await addCommand(ctx, { file: writeFile("records.json", [R1]), actor: "tester" });
    });

    const discovery = [
      { id: "r1", path: "/data/r1", pod5_files: 7 },
      { id: "r2", path: "/data/r2", flow_cell_id: "FC2", instrument: "MN2", started: "2024-02-01T08:00:00Z" },
    ];

    it("reconciles, approves, applies and commits", async () => {
      const created = await reconcileCommand(ctx, { file: writeFile("scan.json", discovery) });
      if (!created.ok) throw new Error(created.error);
      expect(created.proposal.id).toBe("proposal_20240305_070000");
      expect(created.proposal.summary).toMatchObject({ total_discovered: 2, new_count: 1, updated_count: 1 });
      expect(fs.existsSync(created.path)).toBe(true);

      const review = reviewCommand(ctx, {});
      if (!review.ok) throw new Error(review.error);
      expect(review.report.split("\n")).toContain("    pod5_files: 0 -> 7");

      expect(await applyCommand(ctx, { actor: "tester" })).toEqual({
        ok: false,
        code: "STATE",
        error: "Proposal proposal_20240305_070000 cannot apply from status pending",
      });

      const approved = await approveCommand(ctx, { latest: true, actor: "tester" });
      expect(approved.ok && approved.proposal.approval_status).toBe("approved");

      const git = {
        checkIsRepo: vi.fn().mockResolvedValue(true),
        add: vi.fn().mockResolvedValue(undefined),
        status: vi.fn().mockResolvedValue({ staged: ["experiments.json"] }),
        commit: vi.fn().mockResolvedValue({ commit: "abc1234" }),
      };
      const applied = await applyCommand(ctx, { actor: "tester", commit: true, git });
      if (!applied.ok) throw new Error(applied.error);
      expect(applied.alreadyApplied).toBe(false);
      expect(applied.outcome).toMatchObject({ added: 1, updated: 1 });
      expect(applied.commit).toEqual({ sha: "abc1234" });
      expect(git.add).toHaveBeenCalledWith(["experiments.json", "audit.json"]);

      expect(ctx.store.get("r1")?.pod5_files).toBe(7);
      expect(ctx.store.get("r2")).toMatchObject({ flowcell: "FC2", device: "MN2", date: "2024-02-01", time: "08:00" });

      const again = await applyCommand(ctx, { actor: "tester", commit: true, git });
      expect(again).toMatchObject({ ok: true, alreadyApplied: true, commit: null });
      expect(git.commit).toHaveBeenCalledTimes(1);

      const entries = auditCommand(ctx, 10);
      expect(entries.map((e) => e.action)).toEqual(["add", "apply"]);
      expect(formatAuditEntry(entries[1])).toBe(
        "2024-03-05T07:00:00.000Z  apply  proposal_20240305_070000  tester  2 change(s)",
      );
      expect(listProposalsCommand(ctx).map((p) => p.status)).toEqual(["applied"]);
    });

    it("rejects a proposal by id", async () => {
      const created = await reconcileCommand(ctx, { file: writeFile("scan.json", discovery) });
      if (!created.ok) throw new Error(created.error);
      const res = await rejectCommand(ctx, { id: created.proposal.id, actor: "tester", reason: "wrong share" });
      expect(res.ok && res.proposal.rejection_reason).toBe("wrong share");
    });

    it("leaves runs under an unreachable scan root unverified", async () => {
      const created = await reconcileCommand(ctx, {
        file: writeFile("scan.json", []),
        provenance: { scan_paths: ["/data"] },
        oracle: () => "absent",
        rootOracle: () => "absent",
      });
      if (!created.ok) throw new Error(created.error);
      expect(created.proposal.summary).toMatchObject({ removed_count: 0, unchanged_count: 1, unverified_count: 1 });
    });

    it("marks runs removed when the scan root is reachable", async () => {
      const created = await reconcileCommand(ctx, {
        file: writeFile("scan.json", []),
        provenance: { scan_paths: ["/data"] },
        oracle: () => "absent",
        rootOracle: () => "present",
      });
      if (!created.ok) throw new Error(created.error);
      expect(created.proposal.removed.map((e) => e.id)).toEqual(["r1"]);
    });

    it("rejects a discovery snapshot that fails the schema", async () => {
      const res = await reconcileCommand(ctx, { file: writeFile("scan.json", [{ id: "x" }]) });
      expect(res.ok).toBe(false);
      if (!res.ok) {
        expect(res.code).toBe("INVALID_ARGS");
        expect(res.error).toMatch(/^Discovery snapshot invalid/);
      }
    });
  });

  describe("proposal selection", () => {
    it("needs a stored proposal", () => {
      expect(resolveProposalId(ctx, {})).toMatchObject({ ok: false, code: "NOT_FOUND" });
    });

    it("refuses an id together with --latest", () => {
      expect(resolveProposalId(ctx, { id: "proposal_20240101_000000", latest: true })).toMatchObject({
        ok: false,
        code: "INVALID_ARGS",
      });
    });
  });

  describe("validate", () => {
    it("passes a fresh workspace", () => {
      expect(validateAll({ configDir, cwd: tmpDir, processEnv: {} })).toEqual({ ok: true, checked: ["config"] });
    });

    it("flags a registry document that breaks the schema", () => {
      fs.mkdirSync(path.join(tmpDir, "state"), { recursive: true });
      fs.writeFileSync(path.join(tmpDir, "state/experiments.json"), JSON.stringify({ experiments: { r1: { total_reads: "x" } } }));
      const res = validateAll({ configDir, cwd: tmpDir, processEnv: {} });
      expect(res.ok).toBe(false);
      if (!res.ok) expect(res.errors.map((e) => e.code)).toEqual(["REGISTRY_INVALID"]);
    });

    it("reports a missing config directory", () => {
      const res = validateAll({ configDir: path.join(tmpDir, "nope"), cwd: tmpDir, processEnv: {} });
      expect(res.ok).toBe(false);
      if (!res.ok) expect(res.errors[0].code).toBe("CONFIG_DIR_MISSING");
    });
  });
});
