import fs from "node:fs";
import { errorMessage } from "../errors.js";
import { compareExperiments } from "../reconcile/compare.js";
import { parseDiscovered } from "../reconcile/entry.js";
import { fsPathOracle, guardScanRoots, type PathOracle } from "../reconcile/path-oracle.js";
import type { Proposal, ScanProvenance } from "../types/proposal.js";
import type { CommandContext } from "./context.js";
import { parseDataFile } from "./registry.js";

export type ReconcileOptions = {
  file: string;
  provenance?: Partial<ScanProvenance>;
  /** Existence check for registry paths missing from the scan. */
  oracle?: PathOracle;
  /** Existence check for the scan roots themselves. */
  rootOracle?: PathOracle;
};

export type ReconcileResult =
  | { ok: true; proposal: Proposal; path: string }
  | { ok: false; code: "NOT_FOUND" | "INVALID_ARGS"; error: string };

/**
 * Diff a discovery snapshot against the registry and store the result as a
 * pending proposal. When scan roots are known, paths under a root that is
 * itself unreachable are reported as unverified instead of removed.
 */
export async function reconcileCommand(ctx: CommandContext, opts: ReconcileOptions): Promise<ReconcileResult> {
  if (!fs.existsSync(opts.file)) {
    return { ok: false, code: "NOT_FOUND", error: `Discovery file not found: ${opts.file}` };
  }

  let raw: unknown;
  try {
    raw = parseDataFile(opts.file);
  } catch (e) {
    return { ok: false, code: "INVALID_ARGS", error: `Failed to parse ${opts.file}: ${errorMessage(e)}` };
  }

  const check = ctx.schemas.validate("discovery", raw);
  if (!check.valid) {
    return { ok: false, code: "INVALID_ARGS", error: `Discovery snapshot invalid (${opts.file}): ${check.errors}` };
  }

  const scanRoots = opts.provenance?.scan_paths ?? [];
  const base = opts.oracle ?? fsPathOracle;
  const oracle = scanRoots.length > 0 ? guardScanRoots(base, scanRoots, opts.rootOracle) : base;

  const proposal = compareExperiments(parseDiscovered(raw), ctx.store.currentByPath(), {
    oracle,
    generatedAt: ctx.now(),
    provenance: opts.provenance,
    ignorePatterns: ctx.config.ignore_patterns,
  });

  const stored = await ctx.proposals.create(proposal);
  return { ok: true, proposal: stored, path: ctx.proposals.pathFor(stored.id) };
}
