import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";
import { RegistryError } from "../errors.js";
import { entryToRecord } from "../reconcile/entry.js";
import { createRegistry, type SchemaRegistry } from "../schema/registry.js";
import { atomicWriteFile } from "../storage/atomic.js";
import { withFsLock, type LockOptions } from "../storage/fs-lock.js";
import { proposalFromDocument, proposalToDocument } from "./document.js";
import { uniqueProposalId } from "./proposal-id.js";
import { nextStatus, type ProposalEvent } from "./state-machine.js";
import type { AuditLog } from "../audit/audit-log.js";
import type { RecordStore } from "../registry/record-store.js";
import type { ExperimentRecord } from "../types/record.js";
import type { AuditChange } from "../types/audit.js";
import type { ApprovalStatus, ExperimentEntry, Proposal, ProposalSummary } from "../types/proposal.js";

export type ProposalManagerOptions = LockOptions & {
  proposalsDir: string;
  /** Applied proposals are copied here when set. */
  approvedDir?: string;
  schemas?: SchemaRegistry;
  now?: () => Date;
};

export type ProposalFailure = { ok: false; code: "NOT_FOUND" | "STATE"; error: string };

export type TransitionResult = { ok: true; proposal: Proposal } | ProposalFailure;

export type ApplyOutcome = {
  added: number;
  merged: number;
  updated: number;
  archived: number;
  skipped: number;
  changes: AuditChange[];
};

export type ApplyResult =
  | { ok: true; proposal: Proposal; alreadyApplied: false; outcome: ApplyOutcome }
  | { ok: true; proposal: Proposal; alreadyApplied: true; outcome: null }
  | ProposalFailure;

export type ProposalListing = {
  id: string;
  status: ApprovalStatus;
  generated_at: string;
  summary: ProposalSummary;
};

/**
 * Persists reconciliation proposals and drives them through
 * pending → approved → applied (or pending → rejected).
 *
 * Each proposal is one YAML document, rewritten under its own lock on every
 * transition so the workflow survives restarts.
 */
export class ProposalManager {
  private readonly schemas: SchemaRegistry;
  private readonly now: () => Date;

  constructor(private readonly opts: ProposalManagerOptions) {
    this.schemas = opts.schemas ?? createRegistry();
    this.now = opts.now ?? (() => new Date());
  }

  pathFor(id: string): string {
    if (!id || id.includes("/") || id.includes("\\") || id.includes("..")) {
      throw new RegistryError("NOT_FOUND", `Invalid proposal id: ${id}`);
    }
    return path.join(this.opts.proposalsDir, `${id}.yaml`);
  }

  /** Persist a freshly generated proposal; its id gains a suffix if taken. */
  async create(proposal: Proposal): Promise<Proposal> {
    if (proposal.approval_status !== "pending") {
      throw new RegistryError("STATE", `Proposal ${proposal.id} must be pending to be created (current: ${proposal.approval_status})`);
    }
    fs.mkdirSync(this.opts.proposalsDir, { recursive: true });
    const stored: Proposal = { ...proposal, id: uniqueProposalId(proposal.id, this.opts.proposalsDir) };
    await withFsLock(this.pathFor(stored.id), this.opts, () => this.write(stored));
    return stored;
  }

  load(id: string): Proposal | null {
    const file = this.pathFor(id);
    if (!fs.existsSync(file)) return null;

    const raw: unknown = YAML.parse(fs.readFileSync(file, "utf8"));
    this.schemas.assertValid("proposal", raw, file);
    if (!isObject(raw)) {
      throw new RegistryError("SCHEMA", `Proposal ${id} is not a mapping: ${file}`);
    }
    return proposalFromDocument(raw);
  }

  /** Every stored proposal, newest first. */
  list(): ProposalListing[] {
    return this.ids().map((id) => {
      const p = this.load(id);
      if (!p) throw new RegistryError("NOT_FOUND", `Proposal ${id} disappeared while listing`);
      return { id: p.id, status: p.approval_status, generated_at: p.generated_at, summary: p.summary };
    });
  }

  latestId(): string | null {
    return this.ids()[0] ?? null;
  }

  latest(): Proposal | null {
    const id = this.latestId();
    return id ? this.load(id) : null;
  }

  approve(id: string, actor: string): Promise<TransitionResult> {
    return this.transition(id, "approve", (p) => {
      p.approved_at = this.timestamp();
      p.approved_by = actor;
    });
  }

  reject(id: string, actor: string, reason?: string): Promise<TransitionResult> {
    return this.transition(id, "reject", (p) => {
      p.rejected_at = this.timestamp();
      p.rejected_by = actor;
      p.rejection_reason = reason ?? null;
    });
  }

  /**
   * Apply an approved proposal to the registry exactly once.
   *
   * New entries go through `RecordStore.add` (dedup rules included), updated
   * entries have their count changes written field by field, removed entries
   * are archived rather than deleted, and only once none of the record's
   * paths survives. One `apply` audit entry lists every mutation. A proposal
   * that already carries `applied_at` is a no-op.
   */
  async apply(id: string, ctx: { store: RecordStore; audit: AuditLog; actor: string }): Promise<ApplyResult> {
    return withFsLock(this.pathFor(id), this.opts, async (): Promise<ApplyResult> => {
      const proposal = this.load(id);
      if (!proposal) return notFound(id);

      if (proposal.applied_at !== null || proposal.approval_status === "applied") {
        return { ok: true, proposal, alreadyApplied: true, outcome: null };
      }
      if (nextStatus(proposal.approval_status, "apply") === null) {
        return illegal(id, "apply", proposal.approval_status);
      }

      const outcome = await applyToStore(proposal, ctx.store);

      const appliedAt = this.timestamp();
      proposal.approval_status = "applied";
      proposal.applied_at = appliedAt;
      proposal.applied_by = ctx.actor;
      await this.write(proposal);

      await ctx.audit.append({
        timestamp: appliedAt,
        action: "apply",
        record_id: proposal.id,
        actor: ctx.actor,
        changes: outcome.changes,
      });

      if (this.opts.approvedDir) {
        fs.mkdirSync(this.opts.approvedDir, { recursive: true });
        fs.copyFileSync(this.pathFor(id), path.join(this.opts.approvedDir, `${id}.yaml`));
      }

      return { ok: true, proposal, alreadyApplied: false, outcome };
    });
  }

  private async transition(id: string, event: ProposalEvent, mutate: (p: Proposal) => void): Promise<TransitionResult> {
    return withFsLock(this.pathFor(id), this.opts, async (): Promise<TransitionResult> => {
      const proposal = this.load(id);
      if (!proposal) return notFound(id);

      const next = nextStatus(proposal.approval_status, event);
      if (next === null) return illegal(id, event, proposal.approval_status);

      mutate(proposal);
      proposal.approval_status = next;
      await this.write(proposal);
      return { ok: true, proposal };
    });
  }

  private async write(proposal: Proposal): Promise<void> {
    const doc = proposalToDocument(proposal);
    this.schemas.assertValid("proposal", doc, `Proposal ${proposal.id}`);
    await atomicWriteFile(this.pathFor(proposal.id), YAML.stringify(doc));
  }

  /** Proposal ids on disk, newest first (ids sort by generation time). */
  private ids(): string[] {
    if (!fs.existsSync(this.opts.proposalsDir)) return [];
    return fs
      .readdirSync(this.opts.proposalsDir, { withFileTypes: true })
      .filter((e) => e.isFile() && e.name.endsWith(".yaml"))
      .map((e) => e.name.replace(/\.yaml$/, ""))
      .sort()
      .reverse();
  }

  private timestamp(): string {
    return this.now().toISOString();
  }
}

async function applyToStore(proposal: Proposal, store: RecordStore): Promise<ApplyOutcome> {
  const outcome: ApplyOutcome = { added: 0, merged: 0, updated: 0, archived: 0, skipped: 0, changes: [] };
  const skip = (runId: string, message: string): void => {
    outcome.skipped++;
    outcome.changes.push({ run_id: runId, kind: "skipped", message });
  };

  store.reload();

  for (const entry of proposal.new) {
    if (!entry.id) {
      skip("", `New entry at ${entry.path} has no run_id`);
      continue;
    }
    const res = await store.add(entryToRecord(entry), { force: false });
    if (res.outcome === "added") {
      outcome.added++;
      outcome.changes.push({ run_id: entry.id, kind: "added", message: res.message });
    } else if (res.outcome === "merged" || res.outcome === "restored") {
      outcome.merged++;
      outcome.changes.push({ run_id: res.runId ?? entry.id, kind: "merged", new_value: entry.path, message: res.message });
    } else {
      skip(entry.id, res.message);
    }
  }

  // Built once, after new entries have folded their paths into existing records.
  const byPath = store.currentByPath();
  const lookup = (entry: ExperimentEntry): ExperimentRecord | null =>
    byPath.get(entry.path) ?? (entry.id ? store.get(entry.id) : null);

  for (const entry of proposal.updated) {
    const record = lookup(entry);
    if (!record) {
      skip(entry.id, `No registry record at ${entry.path}`);
      continue;
    }
    const res = await store.applyChanges(record.run_id, entry.changes ?? []);
    if (!res.ok) {
      skip(record.run_id, res.error);
      continue;
    }
    if (res.applied.length > 0) outcome.updated++;
    for (const change of res.applied) {
      outcome.changes.push({ run_id: record.run_id, kind: "updated", field: change.field, old_value: change.old_value, new_value: change.new_value });
    }
  }

  // A record is archived only when every one of its locations was confirmed gone.
  const gone = new Set(proposal.removed.map((e) => e.path));
  for (const entry of proposal.removed) {
    const record = lookup(entry);
    if (!record) {
      skip(entry.id, `No registry record at ${entry.path}`);
      continue;
    }
    const remaining = record.all_paths.filter((p) => !gone.has(p));
    if (remaining.length > 0) {
      skip(record.run_id, `${entry.path} is gone but ${record.run_id} is still at ${remaining.join(", ")}`);
      continue;
    }
    const reason = entry.removal_reason || "directory_not_found";
    const res = await store.archive(record.run_id, reason);
    if (!res.ok) {
      skip(record.run_id, res.error);
    } else if (res.changed) {
      outcome.archived++;
      outcome.changes.push({ run_id: record.run_id, kind: "archived", field: "status", old_value: "active", new_value: "archived", message: reason });
    }
  }

  return outcome;
}

function notFound(id: string): ProposalFailure {
  return { ok: false, code: "NOT_FOUND", error: `Proposal not found: ${id}` };
}

function illegal(id: string, event: ProposalEvent, status: ApprovalStatus): ProposalFailure {
  return { ok: false, code: "STATE", error: `Proposal ${id} cannot ${event} from status ${status}` };
}

function isObject(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}
