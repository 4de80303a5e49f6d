import type { ExperimentEntry } from "../types/proposal.js";
import type { ExperimentRecordInput } from "../types/record.js";

/**
 * Normalize one discovered item. Only `path` is required; every other field
 * defaults to "" or 0 so sparse scanner output never breaks comparison.
 */
export function parseEntry(raw: Record<string, unknown>): ExperimentEntry {
  return {
    id: str(raw.id) || str(raw.run_id),
    path: str(raw.path),
    sample_id: str(raw.sample_id),
    flow_cell_id: str(raw.flow_cell_id) || str(raw.flowcell_id),
    protocol_group_id: str(raw.protocol_group_id),
    protocol: str(raw.protocol),
    instrument: str(raw.instrument),
    started: str(raw.started),
    acquisition_stopped: str(raw.acquisition_stopped),
    metadata_source: str(raw.metadata_source) || "final_summary",
    pod5_files: count(raw.pod5_files),
    fast5_files: count(raw.fast5_files),
    fastq_files: count(raw.fastq_files),
    bam_files: count(raw.bam_files),
    discovered_at: str(raw.discovered_at),
  };
}

/** Accept either a bare list of entries or `{ experiments: [...] }`. */
export function parseDiscovered(raw: unknown): ExperimentEntry[] {
  const list = Array.isArray(raw) ? raw : isObject(raw) && Array.isArray(raw.experiments) ? raw.experiments : [];
  return list.filter(isObject).map(parseEntry);
}

/**
 * Registry record for a newly discovered run. Flowcell and device come from the
 * scan hints; date and time are split out of the `started` timestamp.
 */
export function entryToRecord(entry: ExperimentEntry): ExperimentRecordInput {
  const { date, time } = splitStarted(entry.started);
  const record: ExperimentRecordInput = {
    run_id: entry.id,
    flowcell: entry.flow_cell_id,
    device: entry.instrument,
    experiment_name: entry.protocol_group_id || entry.sample_id,
    date,
    time,
    sample_id: entry.sample_id,
    pod5_files: entry.pod5_files,
    fast5_files: entry.fast5_files,
    fastq_files: entry.fastq_files,
    bam_files: entry.bam_files,
    has_pod5: entry.pod5_files > 0,
    current_path: entry.path,
  };
  if (entry.discovered_at) record.discovered_at = entry.discovered_at;
  return record;
}

/** "2024-01-01T10:00:00Z" → { date: "2024-01-01", time: "10:00" } */
export function splitStarted(started: string): { date: string; time: string } {
  const m = /^(\d{4}-\d{2}-\d{2})[T ](\d{2}:\d{2})/.exec(started);
  if (m) return { date: m[1], time: m[2] };
  return { date: started.slice(0, 10), time: "" };
}

function str(v: unknown): string {
  return typeof v === "string" ? v : "";
}

function count(v: unknown): number {
  return typeof v === "number" && Number.isFinite(v) ? v : 0;
}

function isObject(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}
