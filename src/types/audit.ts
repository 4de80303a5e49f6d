/** Audit trail entry: one applied mutation batch against the registry. */
export type AuditAction = "add" | "apply";

export type AuditChange = {
  run_id: string;
  kind: "added" | "merged" | "updated" | "archived" | "skipped";
  field?: string;
  old_value?: unknown;
  new_value?: unknown;
  message?: string;
};

export type AuditEntry = {
  timestamp: string;
  action: AuditAction;
  record_id: string;
  actor: string;
  changes: AuditChange[];
};

export type AuditDocument = {
  entries: AuditEntry[];
};
