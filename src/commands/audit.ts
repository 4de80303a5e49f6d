import type { AuditEntry } from "../types/audit.js";
import type { CommandContext } from "./context.js";

export const DEFAULT_AUDIT_LIMIT = 20;

export function auditCommand(ctx: CommandContext, limit: number = DEFAULT_AUDIT_LIMIT): AuditEntry[] {
  return ctx.audit.tail(limit);
}

/** One line per entry: when, what, who, and how many records it touched. */
export function formatAuditEntry(entry: AuditEntry): string {
  return `${entry.timestamp}  ${entry.action}  ${entry.record_id}  ${entry.actor}  ${entry.changes.length} change(s)`;
}
