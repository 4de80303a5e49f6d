import { COUNT_FIELDS, IDENTITY_FIELDS, type ExperimentRecord, type RecordStatus } from "../types/record.js";

const STRING_FIELDS = [
  ...IDENTITY_FIELDS,
  "sample_id",
  "canonical_path",
  "current_path",
  "discovered_at",
  "registered_at",
  "updated_at",
  "archived_reason",
  "archived_at",
] as const;

const NUMBER_FIELDS = [...COUNT_FIELDS, "total_reads", "total_bases", "num_merged"] as const;

const BOOLEAN_FIELDS = ["has_pod5", "has_summary", "is_canonical"] as const;

const MODELED_FIELDS = new Set<string>([
  "run_id",
  "all_paths",
  "status",
  ...STRING_FIELDS,
  ...NUMBER_FIELDS,
  ...BOOLEAN_FIELDS,
]);

/**
 * Decode a persisted experiment. Fields the registry does not model (or that
 * carry an unexpected type) land in `extra` and are written back as-is.
 */
export function recordFromDocument(runId: string, raw: Record<string, unknown>): ExperimentRecord {
  const record: ExperimentRecord = {
    run_id: typeof raw.run_id === "string" && raw.run_id ? raw.run_id : runId,
    all_paths: Array.isArray(raw.all_paths) ? raw.all_paths.filter((p): p is string => typeof p === "string") : [],
    status: parseStatus(raw.status),
    extra: {},
  };

  for (const key of STRING_FIELDS) {
    const v = raw[key];
    if (typeof v === "string") record[key] = v;
  }
  for (const key of NUMBER_FIELDS) {
    const v = raw[key];
    if (typeof v === "number" && Number.isFinite(v)) record[key] = v;
  }
  for (const key of BOOLEAN_FIELDS) {
    const v = raw[key];
    if (typeof v === "boolean") record[key] = v;
  }

  for (const [key, value] of Object.entries(raw)) {
    if (!MODELED_FIELDS.has(key) || !isModeledValue(record, key)) {
      record.extra[key] = value;
    }
  }
  return record;
}

/** Encode a record for the registry document, extra fields first. */
export function recordToDocument(record: ExperimentRecord): Record<string, unknown> {
  const { extra, ...modeled } = record;
  const out: Record<string, unknown> = { ...extra };
  for (const [key, value] of Object.entries(modeled)) {
    if (value !== undefined) out[key] = value;
  }
  return out;
}

function isModeledValue(record: ExperimentRecord, key: string): boolean {
  if (key === "status") return true;
  return Object.prototype.hasOwnProperty.call(record, key);
}

function parseStatus(v: unknown): RecordStatus {
  return v === "archived" ? "archived" : "active";
}
