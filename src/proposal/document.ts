import { parseEntry } from "../reconcile/entry.js";
import { COUNT_FIELDS, type CountField } from "../types/record.js";
import type {
  ApprovalStatus,
  ExperimentChange,
  ExperimentEntry,
  Proposal,
  ProposalDocument,
  ProposalSummary,
} from "../types/proposal.js";

const STATUSES: readonly ApprovalStatus[] = ["pending", "approved", "rejected", "applied"];

/** Serialized form. Unchanged entries are kept only as a count. */
export function proposalToDocument(proposal: Proposal): ProposalDocument {
  return {
    version: proposal.version,
    id: proposal.id,
    generated_at: proposal.generated_at,
    job_id: proposal.job_id,
    job_node: proposal.job_node,
    scan_duration_seconds: proposal.scan_duration_seconds,
    scan_paths: proposal.scan_paths,
    summary: proposal.summary,
    changes: {
      new: proposal.new.map(compactEntry),
      updated: proposal.updated.map(compactEntry),
      removed: proposal.removed.map(compactEntry),
    },
    unchanged_count: proposal.summary.unchanged_count,
    approval_status: proposal.approval_status,
    approved_at: proposal.approved_at,
    approved_by: proposal.approved_by,
    rejected_at: proposal.rejected_at,
    rejected_by: proposal.rejected_by,
    rejection_reason: proposal.rejection_reason,
    applied_at: proposal.applied_at,
    applied_by: proposal.applied_by,
  };
}

/** Decode a schema-checked proposal document. */
export function proposalFromDocument(raw: Record<string, unknown>): Proposal {
  const changes = isObject(raw.changes) ? raw.changes : {};
  const summary = isObject(raw.summary) ? raw.summary : {};

  return {
    version: str(raw.version) || "1.0",
    id: str(raw.id),
    generated_at: str(raw.generated_at),
    job_id: str(raw.job_id),
    job_node: str(raw.job_node),
    scan_duration_seconds: num(raw.scan_duration_seconds),
    scan_paths: Array.isArray(raw.scan_paths) ? raw.scan_paths.filter((p): p is string => typeof p === "string") : [],
    summary: parseSummary(summary, num(raw.unchanged_count)),
    new: entries(changes.new),
    updated: entries(changes.updated),
    removed: entries(changes.removed),
    unchanged: [],
    approval_status: parseStatus(raw.approval_status),
    approved_at: nullableStr(raw.approved_at),
    approved_by: nullableStr(raw.approved_by),
    rejected_at: nullableStr(raw.rejected_at),
    rejected_by: nullableStr(raw.rejected_by),
    rejection_reason: nullableStr(raw.rejection_reason),
    applied_at: nullableStr(raw.applied_at),
    applied_by: nullableStr(raw.applied_by),
  };
}

function compactEntry(entry: ExperimentEntry): ExperimentEntry {
  const { changes, removal_reason, presence, ...rest } = entry;
  const out: ExperimentEntry = { ...rest };
  if (changes && changes.length > 0) out.changes = changes;
  if (removal_reason) out.removal_reason = removal_reason;
  if (presence) out.presence = presence;
  return out;
}

function entries(v: unknown): ExperimentEntry[] {
  if (!Array.isArray(v)) return [];
  return v.filter(isObject).map((raw) => {
    const entry = parseEntry(raw);
    const changes = parseChanges(raw.changes);
    if (changes.length > 0) entry.changes = changes;
    if (typeof raw.removal_reason === "string" && raw.removal_reason) entry.removal_reason = raw.removal_reason;
    if (raw.presence === "present" || raw.presence === "absent" || raw.presence === "unknown") entry.presence = raw.presence;
    return entry;
  });
}

function parseChanges(v: unknown): ExperimentChange[] {
  if (!Array.isArray(v)) return [];
  const out: ExperimentChange[] = [];
  for (const c of v) {
    if (!isObject(c) || !isCountField(c.field)) continue;
    out.push({ field: c.field, old_value: num(c.old_value), new_value: num(c.new_value) });
  }
  return out;
}

function parseSummary(s: Record<string, unknown>, unchangedCount: number): ProposalSummary {
  return {
    total_discovered: num(s.total_discovered),
    current_in_registry: num(s.current_in_registry),
    new_count: num(s.new_count),
    updated_count: num(s.updated_count),
    removed_count: num(s.removed_count),
    unchanged_count: typeof s.unchanged_count === "number" ? s.unchanged_count : unchangedCount,
    unverified_count: num(s.unverified_count),
  };
}

function parseStatus(v: unknown): ApprovalStatus {
  return STATUSES.find((s) => s === v) ?? "pending";
}

function isCountField(v: unknown): v is CountField {
  return COUNT_FIELDS.some((f) => f === v);
}

function isObject(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function str(v: unknown): string {
  return typeof v === "string" ? v : "";
}

function nullableStr(v: unknown): string | null {
  return typeof v === "string" ? v : null;
}

function num(v: unknown): number {
  return typeof v === "number" && Number.isFinite(v) ? v : 0;
}
