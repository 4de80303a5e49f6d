import { createRegistry, type SchemaRegistry } from "../schema/registry.js";
import { atomicWriteJson, readJsonIfExists } from "../storage/atomic.js";
import { withFsLock, type LockOptions } from "../storage/fs-lock.js";
import { fingerprint, hasIdentity } from "./fingerprint.js";
import { RegistryIndexes } from "./indexes.js";
import { dateTimeKey, selectBest } from "./merge-selector.js";
import { recordFromDocument, recordToDocument } from "./record-codec.js";
import type { ExperimentChange } from "../types/proposal.js";
import type {
  ExperimentRecord,
  ExperimentRecordInput,
  IdentityFields,
  RegistryDocument,
  RegistryStats,
} from "../types/record.js";

export const REGISTRY_VERSION = "2.1";

export type RecordStoreOptions = LockOptions & {
  registryPath: string;
  schemas?: SchemaRegistry;
  now?: () => Date;
};

export type AddOutcome = "added" | "merged" | "restored" | "duplicate" | "invalid";

export type AddResult = {
  added: boolean;
  outcome: AddOutcome;
  /** The record that now holds the input, or null when the input was rejected. */
  runId: string | null;
  message: string;
};

export type UpdateResult =
  | { ok: true; runId: string; applied: ExperimentChange[] }
  | { ok: false; runId: string; error: string };

export type ArchiveResult = { ok: true; runId: string; changed: boolean } | { ok: false; runId: string; error: string };

type Mutation<T> = { result: T; changed: boolean };

/**
 * Canonical set of experiment records, keyed by run_id, persisted as a single
 * JSON document.
 *
 * Every mutation holds `<registryPath>.lock`, reloads the document from disk,
 * applies the change and rewrites the whole document atomically. A failed
 * write is thrown to the caller and leaves memory ahead of disk until the next
 * reload.
 */
export class RecordStore {
  private experiments = new Map<string, ExperimentRecord>();
  private indexes = new RegistryIndexes();
  private readonly schemas: SchemaRegistry;
  private readonly now: () => Date;

  private constructor(private readonly opts: RecordStoreOptions) {
    this.schemas = opts.schemas ?? createRegistry();
    this.now = opts.now ?? (() => new Date());
  }

  /** Load the registry document at `registryPath`, or start empty if absent. */
  static open(opts: RecordStoreOptions): RecordStore {
    const store = new RecordStore(opts);
    store.reload();
    return store;
  }

  get path(): string {
    return this.opts.registryPath;
  }

  /** Re-read the document and rebuild every index from its records. */
  reload(): void {
    const raw = readJsonIfExists(this.opts.registryPath);
    this.experiments = new Map();
    if (raw !== null) {
      this.schemas.assertValid("registry", raw, this.opts.registryPath);
      const experiments = isObject(raw) && isObject(raw.experiments) ? raw.experiments : {};
      for (const [runId, value] of Object.entries(experiments)) {
        if (isObject(value)) this.experiments.set(runId, recordFromDocument(runId, value));
      }
    }
    this.reindex();
  }

  exists(runId: string): boolean {
    return this.experiments.has(runId);
  }

  /** Owner of the record's fingerprint; always null for a record with no identity fields. */
  existsByFingerprint(record: IdentityFields): string | null {
    if (!hasIdentity(record)) return null;
    return this.indexes.byFingerprint.get(fingerprint(record)) ?? null;
  }

  /**
   * Insert a record unless it duplicates one already held.
   *
   * A known run_id, or a fingerprint owned by another run_id, folds the input's
   * paths into the existing record and reports `added: false`. `force` skips
   * both checks and overwrites.
   */
  async add(input: ExperimentRecordInput, opts: { force?: boolean } = {}): Promise<AddResult> {
    if (!input.run_id) {
      return { added: false, outcome: "invalid", runId: null, message: "Missing run_id" };
    }
    return this.mutate(() => this.addInMemory(input, opts.force ?? false));
  }

  /** Set each changed count field on the record to its discovered value. */
  async applyChanges(runId: string, changes: readonly ExperimentChange[]): Promise<UpdateResult> {
    return this.mutate((): Mutation<UpdateResult> => {
      const record = this.experiments.get(runId);
      if (!record) {
        return { result: { ok: false, runId, error: `No experiment with run_id ${runId}` }, changed: false };
      }

      const applied: ExperimentChange[] = [];
      for (const change of changes) {
        const old = record[change.field] ?? 0;
        if (old === change.new_value) continue;
        record[change.field] = change.new_value;
        applied.push({ field: change.field, old_value: old, new_value: change.new_value });
      }
      if (applied.length > 0) record.updated_at = this.timestamp();
      return { result: { ok: true, runId, applied }, changed: applied.length > 0 };
    });
  }

  /** Soft-delete: the record stays in the registry flagged as archived. */
  async archive(runId: string, reason: string): Promise<ArchiveResult> {
    return this.mutate((): Mutation<ArchiveResult> => {
      const record = this.experiments.get(runId);
      if (!record) {
        return { result: { ok: false, runId, error: `No experiment with run_id ${runId}` }, changed: false };
      }
      if (record.status === "archived") {
        return { result: { ok: true, runId, changed: false }, changed: false };
      }

      const now = this.timestamp();
      record.status = "archived";
      record.archived_reason = reason;
      record.archived_at = now;
      record.updated_at = now;
      return { result: { ok: true, runId, changed: true }, changed: true };
    });
  }

  get(runId: string): ExperimentRecord | null {
    const record = this.experiments.get(runId);
    return record ? structuredClone(record) : null;
  }

  all(): ExperimentRecord[] {
    return [...this.experiments.values()].map((r) => structuredClone(r));
  }

  /**
   * Linear scan for records whose persisted fields equal every given value.
   * Undefined criteria are ignored.
   */
  search(criteria: Record<string, unknown>): ExperimentRecord[] {
    const active = Object.entries(criteria).filter(([, v]) => v !== undefined);
    return this.all().filter((record) => {
      const doc = recordToDocument(record);
      return active.every(([key, value]) => doc[key] === value);
    });
  }

  findByDevice(device: string): ExperimentRecord[] {
    return this.lookup(this.indexes.byDevice.get(device));
  }

  findByExperiment(name: string): ExperimentRecord[] {
    return this.lookup(this.indexes.byExperiment.get(name));
  }

  /** Active record that lists `path` among its locations. */
  findByPath(path: string): ExperimentRecord | null {
    return this.currentByPath().get(path) ?? null;
  }

  listFlowcells(): string[] {
    return [...this.indexes.byFlowcell.keys()].sort();
  }

  listDevices(): string[] {
    return [...this.indexes.byDevice.keys()].sort();
  }

  /** Flowcell → number of runs recorded on it. */
  flowcellRunCounts(): Array<{ flowcell: string; runs: number }> {
    return this.listFlowcells().map((flowcell) => ({
      flowcell,
      runs: this.indexes.byFlowcell.get(flowcell)?.length ?? 0,
    }));
  }

  /** Every run sharing `flowcell`, oldest first by date and time. */
  mergeCandidates(flowcell: string): ExperimentRecord[] {
    return this.lookup(this.indexes.byFlowcell.get(flowcell)).sort((a, b) => {
      const ka = dateTimeKey(a);
      const kb = dateTimeKey(b);
      return ka === kb ? 0 : ka < kb ? -1 : 1;
    });
  }

  bestVersion(flowcell: string): ExperimentRecord | null {
    const candidates = this.mergeCandidates(flowcell);
    return candidates.length > 0 ? selectBest(candidates) : null;
  }

  /** Every location of every active record, mapped to one copy of that record. */
  currentByPath(): Map<string, ExperimentRecord> {
    const byPath = new Map<string, ExperimentRecord>();
    for (const record of this.experiments.values()) {
      if (record.status !== "active") continue;
      const copy = structuredClone(record);
      for (const p of copy.all_paths) byPath.set(p, copy);
    }
    return byPath;
  }

  stats(): RegistryStats {
    const records = [...this.experiments.values()];
    let mergeCandidates = 0;
    for (const ids of this.indexes.byFlowcell.values()) {
      if (ids.length > 1) mergeCandidates++;
    }

    return {
      total_experiments: records.length,
      unique_run_ids: this.experiments.size,
      unique_flowcells: this.indexes.byFlowcell.size,
      unique_devices: this.indexes.byDevice.size,
      unique_experiment_names: this.indexes.byExperiment.size,
      canonical_count: records.filter((r) => r.is_canonical).length,
      with_qc_data: records.filter((r) => Boolean(r.extra.pct_signal_positive)).length,
      with_pod5: records.filter((r) => r.has_pod5).length,
      merge_candidates: mergeCandidates,
      total_reads: records.reduce((sum, r) => sum + (r.total_reads ?? 0), 0),
      archived_count: records.filter((r) => r.status === "archived").length,
    };
  }

  toDocument(): RegistryDocument {
    const experiments: Record<string, Record<string, unknown>> = {};
    for (const [runId, record] of this.experiments) {
      experiments[runId] = recordToDocument(record);
    }
    return {
      version: REGISTRY_VERSION,
      updated: this.timestamp(),
      stats: this.stats(),
      indexes: this.indexes.snapshot(),
      experiments,
    };
  }

  private addInMemory(input: ExperimentRecordInput, force: boolean): Mutation<AddResult> {
    const runId = input.run_id;
    const incomingPaths = pathsOf(input);

    const existing = this.experiments.get(runId);
    if (existing && !force) {
      const merged = mergePaths(existing, incomingPaths);
      const restored = existing.status === "archived";
      if (restored) {
        existing.status = "active";
        delete existing.archived_reason;
        delete existing.archived_at;
      }
      if (!merged && !restored) {
        return { result: { added: false, outcome: "duplicate", runId, message: `Duplicate run_id ${runId}` }, changed: false };
      }
      existing.updated_at = this.timestamp();
      const message = restored ? `Restored archived run_id ${runId}` : `Updated paths for existing run_id ${runId}`;
      return { result: { added: false, outcome: restored ? "restored" : "merged", runId, message }, changed: true };
    }

    const ownerId = this.existsByFingerprint(input);
    const owner = ownerId !== null && ownerId !== runId ? this.experiments.get(ownerId) : undefined;
    if (owner && !force) {
      const merged = mergePaths(owner, incomingPaths);
      if (merged) owner.updated_at = this.timestamp();
      return {
        result: {
          added: false,
          outcome: merged ? "merged" : "duplicate",
          runId: owner.run_id,
          message: `Equivalent to existing ${owner.run_id} (same fingerprint)`,
        },
        changed: merged,
      };
    }

    const now = this.timestamp();
    const { all_paths: _paths, status, extra, ...fields } = input;
    const record: ExperimentRecord = {
      ...fields,
      run_id: runId,
      all_paths: incomingPaths,
      status: status ?? "active",
      extra: { ...extra },
      registered_at: now,
      updated_at: now,
    };
    this.experiments.set(runId, record);
    return { result: { added: true, outcome: "added", runId, message: `Added ${runId}` }, changed: true };
  }

  private async mutate<T>(fn: () => Mutation<T>): Promise<T> {
    return withFsLock(this.opts.registryPath, this.opts, async () => {
      this.reload();
      const { result, changed } = fn();
      if (changed) {
        this.reindex();
        await atomicWriteJson(this.opts.registryPath, this.toDocument());
      }
      return result;
    });
  }

  private reindex(): void {
    this.indexes = RegistryIndexes.fromRecords(this.experiments.values());
  }

  private lookup(runIds: readonly string[] | undefined): ExperimentRecord[] {
    const out: ExperimentRecord[] = [];
    for (const id of runIds ?? []) {
      const record = this.experiments.get(id);
      if (record) out.push(structuredClone(record));
    }
    return out;
  }

  private timestamp(): string {
    return this.now().toISOString();
  }
}

/** Locations an incoming record claims, deduplicated in first-seen order. */
function pathsOf(input: ExperimentRecordInput): string[] {
  const candidates = [...(input.all_paths ?? []), input.canonical_path, input.current_path];
  const out: string[] = [];
  for (const p of candidates) {
    if (p && !out.includes(p)) out.push(p);
  }
  return out;
}

/** Append unseen paths; existing entries are never dropped. */
function mergePaths(record: ExperimentRecord, paths: readonly string[]): boolean {
  let changed = false;
  for (const p of paths) {
    if (!record.all_paths.includes(p)) {
      record.all_paths.push(p);
      changed = true;
    }
  }
  return changed;
}

function isObject(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}
