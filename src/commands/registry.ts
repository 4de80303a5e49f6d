import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";
import { errorMessage } from "../errors.js";
import { recordFromDocument } from "../registry/record-codec.js";
import type { AddOutcome } from "../registry/record-store.js";
import type { AuditChange } from "../types/audit.js";
import type { ExperimentRecord, RegistryStats } from "../types/record.js";
import type { CommandContext } from "./context.js";

export type LookupResult<T> = { ok: true; value: T } | { ok: false; code: "NOT_FOUND" | "INVALID_ARGS"; error: string };

export function statsCommand(ctx: CommandContext): RegistryStats {
  return ctx.store.stats();
}

export function getCommand(ctx: CommandContext, runId: string): LookupResult<ExperimentRecord> {
  const record = ctx.store.get(runId);
  if (!record) return { ok: false, code: "NOT_FOUND", error: `No experiment with run_id ${runId}` };
  return { ok: true, value: record };
}

/**
 * Parse `key=value` search terms. Integer, decimal and boolean literals are
 * compared as such; everything else as a string.
 */
export function parseCriteria(terms: readonly string[]): LookupResult<Record<string, unknown>> {
  const criteria: Record<string, unknown> = {};
  for (const term of terms) {
    const eq = term.indexOf("=");
    if (eq <= 0) return { ok: false, code: "INVALID_ARGS", error: `Expected key=value, got: ${term}` };
    criteria[term.slice(0, eq)] = parseLiteral(term.slice(eq + 1));
  }
  return { ok: true, value: criteria };
}

function parseLiteral(raw: string): unknown {
  if (raw === "true") return true;
  if (raw === "false") return false;
  if (/^-?\d+(\.\d+)?$/.test(raw)) return Number(raw);
  return raw;
}

export function searchCommand(ctx: CommandContext, terms: readonly string[]): LookupResult<ExperimentRecord[]> {
  const parsed = parseCriteria(terms);
  if (!parsed.ok) return parsed;
  return { ok: true, value: ctx.store.search(parsed.value) };
}

export function bestCommand(ctx: CommandContext, flowcell: string): LookupResult<ExperimentRecord> {
  const best = ctx.store.bestVersion(flowcell);
  if (!best) return { ok: false, code: "NOT_FOUND", error: `No experiments on flowcell ${flowcell}` };
  return { ok: true, value: best };
}

export type AddItem = { input: string; outcome: AddOutcome; runId: string | null; message: string };

export type AddCommandResult =
  | { ok: true; items: AddItem[]; added: number; merged: number; skipped: number }
  | { ok: false; code: "NOT_FOUND" | "INVALID_ARGS"; error: string };

/**
 * Register every record in a JSON or YAML file. The file holds a list of
 * records, a run_id → record mapping, or either under `experiments`.
 * Records that changed the registry are written to the audit log as one
 * `add` entry.
 */
export async function addCommand(
  ctx: CommandContext,
  opts: { file: string; force?: boolean; actor: string },
): Promise<AddCommandResult> {
  if (!fs.existsSync(opts.file)) {
    return { ok: false, code: "NOT_FOUND", error: `Records file not found: ${opts.file}` };
  }

  let raw: unknown;
  try {
    raw = parseDataFile(opts.file);
  } catch (e) {
    return { ok: false, code: "INVALID_ARGS", error: `Failed to parse ${opts.file}: ${errorMessage(e)}` };
  }

  const records = recordsFrom(raw);
  if (records === null) {
    return { ok: false, code: "INVALID_ARGS", error: `No experiment records in ${opts.file}` };
  }

  const items: AddItem[] = [];
  const changes: AuditChange[] = [];
  for (const record of records) {
    const res = await ctx.store.add(record, { force: opts.force ?? false });
    items.push({ input: record.run_id, outcome: res.outcome, runId: res.runId, message: res.message });
    if (res.outcome === "added") {
      changes.push({ run_id: record.run_id, kind: "added", message: res.message });
    } else if (res.outcome === "merged" || res.outcome === "restored") {
      changes.push({ run_id: res.runId ?? record.run_id, kind: "merged", message: res.message });
    }
  }

  if (changes.length > 0) {
    await ctx.audit.append({
      timestamp: ctx.now().toISOString(),
      action: "add",
      record_id: path.basename(opts.file),
      actor: opts.actor,
      changes,
    });
  }

  const added = items.filter((i) => i.outcome === "added").length;
  const merged = items.filter((i) => i.outcome === "merged" || i.outcome === "restored").length;
  return { ok: true, items, added, merged, skipped: items.length - added - merged };
}

/** Read a JSON or YAML document; YAML is a superset, `.json` only selects the stricter parser. */
export function parseDataFile(file: string): unknown {
  const text = fs.readFileSync(file, "utf8");
  return file.endsWith(".json") ? JSON.parse(text) : YAML.parse(text);
}

function recordsFrom(raw: unknown): ExperimentRecord[] | null {
  const body = isObject(raw) && "experiments" in raw ? raw.experiments : raw;
  if (Array.isArray(body)) {
    return body.filter(isObject).map((r) => recordFromDocument("", r));
  }
  if (isObject(body)) {
    return Object.entries(body)
      .filter((entry): entry is [string, Record<string, unknown>] => isObject(entry[1]))
      .map(([runId, r]) => recordFromDocument(runId, r));
  }
  return null;
}

function isObject(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}
