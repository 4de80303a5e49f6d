import { minimatch } from "minimatch";
import { fsPathOracle, type PathOracle } from "./path-oracle.js";
import { parseEntry } from "./entry.js";
import { proposalIdFor } from "../proposal/proposal-id.js";
import { COUNT_FIELDS, type CountField } from "../types/record.js";
import type { ExperimentChange, ExperimentEntry, Proposal, ProposalSummary, ScanProvenance } from "../types/proposal.js";

export const PROPOSAL_VERSION = "1.0";

/** The parts of a registry record reconciliation looks at. */
export type ComparableRecord = Partial<Record<CountField, number>> & {
  run_id?: string;
  sample_id?: string;
  flowcell?: string;
};

export type CompareOptions = {
  oracle?: PathOracle;
  generatedAt?: Date;
  provenance?: Partial<ScanProvenance>;
  /** minimatch globs; matching paths are left out on both sides. */
  ignorePatterns?: readonly string[];
};

/**
 * Three-way diff of a discovery snapshot against the registry, keyed by path.
 *
 * Every path in either input lands in exactly one of new / updated / removed /
 * unchanged. A registry path missing from the scan is only "removed" when the
 * oracle confirms it is gone; when the oracle cannot tell, the entry stays in
 * unchanged with `presence: "unknown"`.
 */
export function compareExperiments(
  discovered: readonly ExperimentEntry[],
  current: ReadonlyMap<string, ComparableRecord>,
  opts: CompareOptions = {},
): Proposal {
  const oracle = opts.oracle ?? fsPathOracle;
  const generatedAt = opts.generatedAt ?? new Date();
  const ignored = (p: string): boolean => (opts.ignorePatterns ?? []).some((g) => minimatch(p, g, { dot: true }));

  // Later scan results for the same path replace earlier ones.
  const scanned = new Map<string, ExperimentEntry>();
  for (const entry of discovered) {
    if (!ignored(entry.path)) scanned.set(entry.path, entry);
  }

  const registered = new Map<string, ComparableRecord>();
  for (const [p, record] of current) {
    if (!ignored(p)) registered.set(p, record);
  }

  const out: Pick<Proposal, "new" | "updated" | "removed" | "unchanged"> = { new: [], updated: [], removed: [], unchanged: [] };
  let unverified = 0;

  for (const [p, entry] of scanned) {
    const record = registered.get(p);
    if (!record) {
      out.new.push({ ...entry });
      continue;
    }

    const changes = detectChanges(entry, record);
    const matched = { ...entry, id: entry.id || record.run_id || "" };
    if (changes.length > 0) {
      out.updated.push({ ...matched, changes });
    } else {
      out.unchanged.push(matched);
    }
  }

  for (const [p, record] of registered) {
    if (scanned.has(p)) continue;

    const entry = entryFromRecord(p, record);
    const presence = oracle(p);
    if (presence === "absent") {
      out.removed.push({ ...entry, removal_reason: "directory_not_found" });
    } else if (presence === "unknown") {
      unverified++;
      out.unchanged.push({ ...entry, presence });
    } else {
      out.unchanged.push(entry);
    }
  }

  const summary: ProposalSummary = {
    total_discovered: scanned.size,
    current_in_registry: registered.size,
    new_count: out.new.length,
    updated_count: out.updated.length,
    removed_count: out.removed.length,
    unchanged_count: out.unchanged.length,
    unverified_count: unverified,
  };

  return {
    version: PROPOSAL_VERSION,
    id: proposalIdFor(generatedAt),
    generated_at: generatedAt.toISOString(),
    job_id: opts.provenance?.job_id ?? "",
    job_node: opts.provenance?.job_node ?? "",
    scan_duration_seconds: opts.provenance?.scan_duration_seconds ?? 0,
    scan_paths: [...(opts.provenance?.scan_paths ?? [])],
    summary,
    ...out,
    approval_status: "pending",
    approved_at: null,
    approved_by: null,
    rejected_at: null,
    rejected_by: null,
    rejection_reason: null,
    applied_at: null,
    applied_by: null,
  };
}

/** Count fields whose discovered value differs from the registry's. */
export function detectChanges(discovered: ExperimentEntry, current: ComparableRecord): ExperimentChange[] {
  const changes: ExperimentChange[] = [];
  for (const field of COUNT_FIELDS) {
    const newValue = discovered[field] || 0;
    const oldValue = current[field] || 0;
    if (newValue !== oldValue) {
      changes.push({ field, old_value: oldValue, new_value: newValue });
    }
  }
  return changes;
}

function entryFromRecord(p: string, record: ComparableRecord): ExperimentEntry {
  const entry = parseEntry({
    id: record.run_id,
    path: p,
    sample_id: record.sample_id,
    flow_cell_id: record.flowcell,
    metadata_source: "registry",
  });
  for (const field of COUNT_FIELDS) entry[field] = record[field] || 0;
  return entry;
}
