import { createRegistry, type SchemaRegistry } from "../schema/registry.js";
import { atomicWriteJson, readJsonIfExists } from "../storage/atomic.js";
import { withFsLock, type LockOptions } from "../storage/fs-lock.js";
import type { AuditDocument, AuditEntry } from "../types/audit.js";

export const DEFAULT_AUDIT_MAX_ENTRIES = 1000;

export type AuditLogOptions = LockOptions & {
  auditPath: string;
  maxEntries?: number;
  schemas?: SchemaRegistry;
};

/**
 * Append-only, size-bounded history of registry mutations. Only the newest
 * `maxEntries` survive; older entries are dropped first. Diagnostic, not
 * authoritative: the registry document is the source of truth.
 */
export class AuditLog {
  private readonly maxEntries: number;
  private readonly schemas: SchemaRegistry;

  constructor(private readonly opts: AuditLogOptions) {
    this.maxEntries = Math.max(1, opts.maxEntries ?? DEFAULT_AUDIT_MAX_ENTRIES);
    this.schemas = opts.schemas ?? createRegistry();
  }

  get path(): string {
    return this.opts.auditPath;
  }

  async append(entry: AuditEntry): Promise<void> {
    await withFsLock(this.opts.auditPath, this.opts, async () => {
      const entries = this.read();
      entries.push(structuredClone(entry));
      const doc: AuditDocument = { entries: entries.slice(-this.maxEntries) };
      await atomicWriteJson(this.opts.auditPath, doc);
    });
  }

  /** Replay of retained entries, oldest first. */
  entries(): AuditEntry[] {
    return this.read();
  }

  /** The newest `limit` entries, oldest first. */
  tail(limit: number): AuditEntry[] {
    return limit > 0 ? this.read().slice(-limit) : [];
  }

  private read(): AuditEntry[] {
    const raw = readJsonIfExists(this.opts.auditPath);
    if (raw === null) return [];
    this.schemas.assertValid("audit", raw, this.opts.auditPath);
    return isAuditDocument(raw) ? raw.entries : [];
  }
}

function isAuditDocument(v: unknown): v is AuditDocument {
  return typeof v === "object" && v !== null && "entries" in v && Array.isArray(v.entries);
}
