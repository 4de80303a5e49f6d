/** Configuration types for the layered config system. */
export type RegistryConfig = {
  schema_version: string;
  registry_path: string;
  proposals_dir: string;
  approved_dir: string;
  audit_path: string;
  audit_max_entries: number;
  lock_timeout_ms: number;
  stale_lock_age_ms: number;
  ignore_patterns: string[];
  git_repo?: string;
};
