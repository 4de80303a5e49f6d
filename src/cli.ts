#!/usr/bin/env node

import { Command } from "commander";
import { RegistryError, errorMessage } from "./errors.js";
import { auditCommand, DEFAULT_AUDIT_LIMIT, formatAuditEntry } from "./commands/audit.js";
import { defaultActor, openContext, type CommandContext } from "./commands/context.js";
import { EXIT, type ExitCode } from "./commands/exit-codes.js";
import { Output, parseFormat, type OutputFormat } from "./commands/output.js";
import {
  applyCommand,
  approveCommand,
  listProposalsCommand,
  rejectCommand,
  reviewCommand,
} from "./commands/proposals.js";
import { reconcileCommand } from "./commands/reconcile.js";
import { addCommand, bestCommand, getCommand, searchCommand, statsCommand } from "./commands/registry.js";
import { validateAll } from "./commands/validate.js";
import type { ExperimentRecord } from "./types/record.js";

type GlobalOpts = { config?: string; env?: string; format: string };

const FAILURE_EXIT: Record<string, ExitCode> = {
  NOT_FOUND: EXIT.NOT_FOUND,
  INVALID_ARGS: EXIT.INVALID_ARGS,
  STATE: EXIT.STATE_CONFLICT,
};

const program = new Command();

program
  .name("ontreg")
  .description("Nanopore experiment registry and discovery reconciliation")
  .version("0.1.0")
  .option("--config <dir>", "Config directory (default: bundled config/)")
  .option("--env <name>", "Config overlay to apply, e.g. shared")
  .option("--format <format>", "Output format: human|jsonl", "human");

function output(): Output {
  const format: OutputFormat | null = parseFormat(program.opts<GlobalOpts>().format);
  if (format === null) {
    process.stderr.write(`Unknown --format: ${program.opts<GlobalOpts>().format}\n`);
    process.exit(EXIT.INVALID_ARGS);
  }
  return new Output(format);
}

function context(): CommandContext {
  const g = program.opts<GlobalOpts>();
  return openContext({ configDir: g.config, env: g.env });
}

function fail(out: Output, code: string, error: string): never {
  out.error(code, error);
  process.exit(FAILURE_EXIT[code] ?? EXIT.FAILURE);
}

function recordLine(r: ExperimentRecord): string {
  const when = [r.date, r.time].filter(Boolean).join(" ");
  const flags = [r.is_canonical ? "canonical" : "", r.status === "archived" ? "archived" : ""].filter(Boolean).join(",");
  return [r.run_id, r.flowcell ?? "", r.device ?? "", r.experiment_name ?? "", when, flags].join("  ").trimEnd();
}

program
  .command("validate")
  .description("Validate config, registry, audit log and stored proposals")
  .action(() => {
    const out = output();
    const g = program.opts<GlobalOpts>();
    const res = validateAll({ configDir: g.config, env: g.env });
    if (!res.ok) {
      out.diagnostics(res.errors);
      process.exit(EXIT.FAILURE);
    }
    out.info("OK", "OK", { checked: res.checked });
  });

program
  .command("stats")
  .description("Show registry statistics")
  .action(() => {
    const out = output();
    const stats = statsCommand(context());
    const human = Object.entries(stats)
      .map(([k, v]) => `${k.padEnd(24)} ${v}`)
      .join("\n");
    out.emit(human, { level: "info", code: "STATS", ...stats });
  });

program
  .command("get")
  .description("Show one experiment")
  .argument("<runId>", "Run id")
  .action((runId: string) => {
    const out = output();
    const res = getCommand(context(), runId);
    if (!res.ok) fail(out, res.code, res.error);
    out.emit(JSON.stringify(res.value, null, 2), { level: "info", code: "RECORD", record: res.value });
  });

program
  .command("search")
  .description("Find experiments whose fields equal every key=value term")
  .argument("<terms...>", "Search terms, e.g. flowcell=FAL12345 device=MN1")
  .action((terms: string[]) => {
    const out = output();
    const res = searchCommand(context(), terms);
    if (!res.ok) fail(out, res.code, res.error);
    if (res.value.length === 0 && out.format === "human") console.log("No matching experiments.");
    for (const r of res.value) out.emit(recordLine(r), { level: "info", code: "RECORD", record: r });
  });

program
  .command("flowcells")
  .description("List flowcells with their run counts")
  .action(() => {
    const out = output();
    for (const { flowcell, runs } of context().store.flowcellRunCounts()) {
      out.emit(`${flowcell}  ${runs}`, { level: "info", code: "FLOWCELL", flowcell, runs });
    }
  });

program
  .command("devices")
  .description("List devices")
  .action(() => {
    const out = output();
    for (const device of context().store.listDevices()) {
      out.emit(device, { level: "info", code: "DEVICE", device });
    }
  });

program
  .command("best")
  .description("Select the best version among runs on a flowcell")
  .argument("<flowcell>", "Flowcell id")
  .action((flowcell: string) => {
    const out = output();
    const res = bestCommand(context(), flowcell);
    if (!res.ok) fail(out, res.code, res.error);
    out.emit(recordLine(res.value), { level: "info", code: "BEST", record: res.value });
  });

program
  .command("add")
  .description("Register experiments from a JSON or YAML file")
  .argument("<file>", "Records file")
  .option("--force", "Insert even when run_id or fingerprint already exists")
  .option("--by <actor>", "Actor recorded in the audit log")
  .action(async (file: string, opts: { force?: boolean; by?: string }) => {
    const out = output();
    const res = await addCommand(context(), { file, force: opts.force, actor: opts.by ?? defaultActor() });
    if (!res.ok) fail(out, res.code, res.error);
    for (const item of res.items) {
      out.emit(`${item.outcome.padEnd(9)} ${item.message}`, { level: "info", code: item.outcome.toUpperCase(), ...item });
    }
    out.info("ADD_DONE", `Added ${res.added}, merged ${res.merged}, skipped ${res.skipped}`, {
      added: res.added,
      merged: res.merged,
      skipped: res.skipped,
    });
  });

program
  .command("reconcile")
  .description("Compare a discovery snapshot with the registry and write a pending proposal")
  .argument("<discovered>", "Discovery snapshot (JSON or YAML)")
  .option("--job-id <id>", "Scan job id")
  .option("--job-node <node>", "Host the scan ran on")
  .option("--duration <seconds>", "Scan duration in seconds")
  .option("--scan-path <path...>", "Scan roots; runs under an unreachable root are not removed")
  .action(async (discovered: string, opts: { jobId?: string; jobNode?: string; duration?: string; scanPath?: string[] }) => {
    const out = output();
    const duration = opts.duration === undefined ? 0 : Number(opts.duration);
    if (Number.isNaN(duration)) fail(out, "INVALID_ARGS", `--duration must be a number, got: ${opts.duration}`);

    const res = await reconcileCommand(context(), {
      file: discovered,
      provenance: {
        job_id: opts.jobId ?? "",
        job_node: opts.jobNode ?? "",
        scan_duration_seconds: duration,
        scan_paths: opts.scanPath ?? [],
      },
    });
    if (!res.ok) fail(out, res.code, res.error);
    const s = res.proposal.summary;
    out.info(
      "PROPOSAL_CREATED",
      `Proposal ${res.proposal.id}: ${s.new_count} new, ${s.updated_count} updated, ${s.removed_count} removed, ${s.unchanged_count} unchanged (${s.unverified_count} unverified)`,
      { id: res.proposal.id, path: res.path, summary: s },
    );
  });

program
  .command("proposals")
  .description("List stored proposals, newest first")
  .action(() => {
    const out = output();
    const list = listProposalsCommand(context());
    if (list.length === 0 && out.format === "human") console.log("No proposals found.");
    for (const p of list) {
      const s = p.summary;
      out.emit(`${p.id}  ${p.status.padEnd(8)}  +${s.new_count} ~${s.updated_count} -${s.removed_count}`, {
        level: "info",
        code: "PROPOSAL",
        ...p,
      });
    }
  });

program
  .command("review")
  .description("Show the review report for a proposal")
  .argument("[id]", "Proposal id (default: latest)")
  .option("--latest", "Use the newest proposal")
  .action((id: string | undefined, opts: { latest?: boolean }) => {
    const out = output();
    const res = reviewCommand(context(), { id, latest: opts.latest });
    if (!res.ok) fail(out, res.code, res.error);
    out.emit(res.report, { level: "info", code: "PROPOSAL", proposal: res.proposal });
  });

program
  .command("approve")
  .description("Approve a pending proposal")
  .argument("[id]", "Proposal id (default: latest)")
  .option("--latest", "Use the newest proposal")
  .option("--by <actor>", "Approver")
  .action(async (id: string | undefined, opts: { latest?: boolean; by?: string }) => {
    const out = output();
    const res = await approveCommand(context(), { id, latest: opts.latest, actor: opts.by ?? defaultActor() });
    if (!res.ok) fail(out, res.code, res.error);
    out.info("APPROVED", `Proposal ${res.proposal.id} approved by ${res.proposal.approved_by ?? "unknown"}`, {
      id: res.proposal.id,
      status: res.proposal.approval_status,
    });
  });

program
  .command("reject")
  .description("Reject a pending proposal")
  .argument("[id]", "Proposal id (default: latest)")
  .option("--latest", "Use the newest proposal")
  .option("--by <actor>", "Reviewer")
  .option("--reason <text>", "Why the proposal was rejected")
  .action(async (id: string | undefined, opts: { latest?: boolean; by?: string; reason?: string }) => {
    const out = output();
    const res = await rejectCommand(context(), {
      id,
      latest: opts.latest,
      actor: opts.by ?? defaultActor(),
      reason: opts.reason,
    });
    if (!res.ok) fail(out, res.code, res.error);
    out.info("REJECTED", `Proposal ${res.proposal.id} rejected`, { id: res.proposal.id, status: res.proposal.approval_status });
  });

program
  .command("apply")
  .description("Apply an approved proposal to the registry")
  .argument("[id]", "Proposal id (default: latest)")
  .option("--latest", "Use the newest proposal")
  .option("--by <actor>", "Actor recorded in the audit log")
  .option("--commit", "Commit the registry and audit log to git (local only)")
  .action(async (id: string | undefined, opts: { latest?: boolean; by?: string; commit?: boolean }) => {
    const out = output();
    const res = await applyCommand(context(), {
      id,
      latest: opts.latest,
      actor: opts.by ?? defaultActor(),
      commit: opts.commit,
    });
    if (!res.ok) fail(out, res.code, res.error);

    if (res.alreadyApplied || !res.outcome) {
      out.info("ALREADY_APPLIED", `Proposal ${res.proposal.id} was already applied at ${res.proposal.applied_at ?? "unknown"}`, {
        id: res.proposal.id,
      });
      return;
    }
    const o = res.outcome;
    out.info(
      "APPLIED",
      `Proposal ${res.proposal.id} applied: ${o.added} added, ${o.merged} merged, ${o.updated} updated, ${o.archived} archived, ${o.skipped} skipped`,
      { id: res.proposal.id, added: o.added, merged: o.merged, updated: o.updated, archived: o.archived, skipped: o.skipped },
    );
    if (res.commit?.sha) out.info("COMMITTED", `Committed ${res.commit.sha}`, { sha: res.commit.sha });
    else if (res.commit?.skipped) out.info("COMMIT_SKIPPED", res.commit.skipped);
    else if (res.commit) out.info("COMMIT_EMPTY", "Nothing to commit");
  });

program
  .command("audit")
  .description("Show the newest audit entries")
  .option("--limit <n>", "Number of entries", String(DEFAULT_AUDIT_LIMIT))
  .action((opts: { limit: string }) => {
    const out = output();
    const limit = Number.parseInt(opts.limit, 10);
    if (!Number.isInteger(limit) || limit < 1) fail(out, "INVALID_ARGS", `--limit must be a positive integer, got: ${opts.limit}`);
    for (const entry of auditCommand(context(), limit)) {
      out.emit(formatAuditEntry(entry), { level: "info", code: "AUDIT", ...entry });
    }
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  const code = err instanceof RegistryError ? err.code : "FAILURE";
  process.stderr.write(JSON.stringify({ ok: false, code, error: errorMessage(err) }) + "\n");
  process.exit(EXIT.FAILURE);
});
