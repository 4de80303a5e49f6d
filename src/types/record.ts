/** Experiment record: one physical sequencing run as known to the registry. */
export type RecordStatus = "active" | "archived";

/** File-count fields compared between a discovery snapshot and the registry. */
export const COUNT_FIELDS = ["pod5_files", "fast5_files", "fastq_files", "bam_files"] as const;

export type CountField = (typeof COUNT_FIELDS)[number];

/** Fields hashed together into the record fingerprint, in order. */
export const IDENTITY_FIELDS = ["flowcell", "device", "experiment_name", "date", "time"] as const;

export type IdentityField = (typeof IDENTITY_FIELDS)[number];

export type IdentityFields = Partial<Record<IdentityField, string>>;

export type ExperimentRecord = IdentityFields &
  Partial<Record<CountField, number>> & {
    run_id: string;
    sample_id?: string;
    total_reads?: number;
    total_bases?: number;
    has_pod5?: boolean;
    has_summary?: boolean;
    is_canonical?: boolean;
    num_merged?: number;
    canonical_path?: string;
    current_path?: string;
    discovered_at?: string;
    all_paths: string[];
    registered_at?: string;
    updated_at?: string;
    status: RecordStatus;
    archived_reason?: string;
    archived_at?: string;
    /** Persisted fields this registry does not model; written back untouched. */
    extra: Record<string, unknown>;
  };

/** A record as handed to `RecordStore.add`; provenance fields are optional. */
export type ExperimentRecordInput = Omit<ExperimentRecord, "all_paths" | "status" | "extra"> & {
  all_paths?: string[];
  status?: RecordStatus;
  extra?: Record<string, unknown>;
};

export type RegistryStats = {
  total_experiments: number;
  unique_run_ids: number;
  unique_flowcells: number;
  unique_devices: number;
  unique_experiment_names: number;
  canonical_count: number;
  with_qc_data: number;
  with_pod5: number;
  merge_candidates: number;
  total_reads: number;
  archived_count: number;
};

export type RegistryIndexSnapshot = {
  by_flowcell: Record<string, string[]>;
  by_device: Record<string, string[]>;
  by_experiment: Record<string, string[]>;
};

/** On-disk registry document. `stats` and `indexes` are informational only. */
export type RegistryDocument = {
  version: string;
  updated: string;
  stats: RegistryStats;
  indexes: RegistryIndexSnapshot;
  experiments: Record<string, Record<string, unknown>>;
};
