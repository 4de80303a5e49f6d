import path from "node:path";
import { AuditLog } from "../audit/audit-log.js";
import { loadConfig, resolveConfigPaths } from "../config/loader.js";
import { ProposalManager } from "../proposal/manager.js";
import { RecordStore } from "../registry/record-store.js";
import { createRegistry, type SchemaRegistry } from "../schema/registry.js";
import type { RegistryConfig } from "../types/config.js";

export type ContextOptions = {
  configDir?: string;
  env?: string;
  cwd?: string;
  processEnv?: NodeJS.ProcessEnv;
  now?: () => Date;
};

/** Everything a command needs, wired from one resolved config. */
export type CommandContext = {
  config: RegistryConfig;
  schemas: SchemaRegistry;
  store: RecordStore;
  audit: AuditLog;
  proposals: ProposalManager;
  now: () => Date;
};

export function openContext(opts: ContextOptions = {}): CommandContext {
  const cwd = opts.cwd ?? process.cwd();
  const configDir = opts.configDir ? path.resolve(cwd, opts.configDir) : undefined;
  const config = resolveConfigPaths(loadConfig(opts.env, configDir, opts.processEnv ?? process.env), cwd);
  const schemas = createRegistry();
  const now = opts.now ?? (() => new Date());
  const lock = { timeoutMs: config.lock_timeout_ms, staleAgeMs: config.stale_lock_age_ms };

  return {
    config,
    schemas,
    now,
    store: RecordStore.open({ registryPath: config.registry_path, schemas, now, ...lock }),
    audit: new AuditLog({ auditPath: config.audit_path, maxEntries: config.audit_max_entries, schemas, ...lock }),
    proposals: new ProposalManager({
      proposalsDir: config.proposals_dir,
      approvedDir: config.approved_dir,
      schemas,
      now,
      ...lock,
    }),
  };
}

/** Operator name recorded on approvals and audit entries. */
export function defaultActor(env: NodeJS.ProcessEnv = process.env): string {
  return env.USER || env.USERNAME || "unknown";
}
