import fs from "node:fs";
import { isErrnoException } from "../storage/atomic.js";
import type { Presence } from "../types/proposal.js";

/** Answers whether a registry path still exists on disk. */
export type PathOracle = (path: string) => Presence;

/**
 * Filesystem-backed oracle. Only ENOENT/ENOTDIR count as absence; any other
 * failure (unmounted share, permissions, I/O) is reported as "unknown".
 */
export const fsPathOracle: PathOracle = (p) => {
  try {
    fs.statSync(p);
    return "present";
  } catch (e) {
    if (isErrnoException(e) && (e.code === "ENOENT" || e.code === "ENOTDIR")) return "absent";
    return "unknown";
  }
};

/**
 * Wrap an oracle so paths under a scan root that is itself missing report
 * "unknown": an unmounted share must not turn its runs into removals.
 */
export function guardScanRoots(oracle: PathOracle, scanRoots: readonly string[], rootOracle: PathOracle = fsPathOracle): PathOracle {
  const rootState = new Map<string, Presence>();
  const stateOf = (root: string): Presence => {
    let state = rootState.get(root);
    if (state === undefined) {
      state = rootOracle(root);
      rootState.set(root, state);
    }
    return state;
  };

  return (p) => {
    const root = scanRoots.find((r) => isUnder(p, r));
    if (root !== undefined && stateOf(root) !== "present") return "unknown";
    return oracle(p);
  };
}

function isUnder(p: string, root: string): boolean {
  const prefix = root.endsWith("/") ? root : `${root}/`;
  return p === root || p.startsWith(prefix);
}
