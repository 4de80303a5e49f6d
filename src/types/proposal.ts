import type { CountField } from "./record.js";

/** Discovery proposal: a reviewable reconciliation result. */
export type ApprovalStatus = "pending" | "approved" | "rejected" | "applied";

export type Presence = "present" | "absent" | "unknown";

export type ExperimentChange = {
  field: CountField;
  old_value: number;
  new_value: number;
};

/** A run as observed by a filesystem scan. */
export type ExperimentEntry = {
  id: string;
  path: string;
  sample_id: string;
  flow_cell_id: string;
  protocol_group_id: string;
  protocol: string;
  instrument: string;
  started: string;
  acquisition_stopped: string;
  metadata_source: string;
  pod5_files: number;
  fast5_files: number;
  fastq_files: number;
  bam_files: number;
  discovered_at: string;
  changes?: ExperimentChange[];
  removal_reason?: string;
  presence?: Presence;
};

export type ProposalSummary = {
  total_discovered: number;
  current_in_registry: number;
  new_count: number;
  updated_count: number;
  removed_count: number;
  unchanged_count: number;
  unverified_count: number;
};

export type ScanProvenance = {
  job_id: string;
  job_node: string;
  scan_duration_seconds: number;
  scan_paths: string[];
};

export type Proposal = ScanProvenance & {
  version: string;
  id: string;
  generated_at: string;
  summary: ProposalSummary;
  new: ExperimentEntry[];
  updated: ExperimentEntry[];
  removed: ExperimentEntry[];
  unchanged: ExperimentEntry[];
  approval_status: ApprovalStatus;
  approved_at: string | null;
  approved_by: string | null;
  rejected_at: string | null;
  rejected_by: string | null;
  rejection_reason: string | null;
  applied_at: string | null;
  applied_by: string | null;
};

/** On-disk proposal document. Unchanged entries are stored as a count only. */
export type ProposalDocument = ScanProvenance & {
  version: string;
  id: string;
  generated_at: string;
  summary: ProposalSummary;
  changes: {
    new: ExperimentEntry[];
    updated: ExperimentEntry[];
    removed: ExperimentEntry[];
  };
  unchanged_count: number;
  approval_status: ApprovalStatus;
  approved_at: string | null;
  approved_by: string | null;
  rejected_at: string | null;
  rejected_by: string | null;
  rejection_reason: string | null;
  applied_at: string | null;
  applied_by: string | null;
};
