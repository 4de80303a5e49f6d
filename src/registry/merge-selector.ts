import { RegistryError } from "../errors.js";
import type { ExperimentRecord } from "../types/record.js";

/** One ranking step: a named key extractor, compared descending. */
export type RankingCriterion = {
  name: string;
  key: (record: ExperimentRecord) => number | string;
};

/** `date_time` sort key shared with merge-candidate ordering. */
export function dateTimeKey(record: ExperimentRecord): string {
  return `${record.date ?? ""}_${record.time ?? ""}`;
}

/**
 * Best-version preference when no candidate is already a merge product:
 * more data, then raw signal available, then operator-flagged canonical,
 * then most recent.
 */
export const RANKING_CRITERIA: readonly RankingCriterion[] = [
  { name: "total_reads", key: (r) => r.total_reads ?? 0 },
  { name: "has_pod5", key: (r) => (r.has_pod5 ? 1 : 0) },
  { name: "is_canonical", key: (r) => (r.is_canonical ? 1 : 0) },
  { name: "date_time", key: dateTimeKey },
];

/** A record that already subsumes others wins outright. */
export const MERGED_CRITERIA: readonly RankingCriterion[] = [
  { name: "num_merged", key: (r) => r.num_merged ?? 1 },
];

export function compareBy(criteria: readonly RankingCriterion[], a: ExperimentRecord, b: ExperimentRecord): number {
  for (const { key } of criteria) {
    const order = compareKeys(key(a), key(b));
    if (order !== 0) return order;
  }
  return 0;
}

function compareKeys(a: number | string, b: number | string): number {
  if (typeof a === "number" && typeof b === "number") return Math.sign(a - b);
  const sa = String(a);
  const sb = String(b);
  if (sa === sb) return 0;
  return sa < sb ? -1 : 1;
}

/** Highest-ranked record; on a full tie the earlier one in input order wins. */
export function maxBy(records: readonly ExperimentRecord[], criteria: readonly RankingCriterion[]): ExperimentRecord {
  let best = records[0];
  for (const candidate of records.slice(1)) {
    if (compareBy(criteria, candidate, best) > 0) best = candidate;
  }
  return best;
}

/**
 * Pick the single best representative among records that describe the same
 * flowcell. Callers handle the empty case; passing none is an error.
 */
export function selectBest(candidates: readonly ExperimentRecord[]): ExperimentRecord {
  if (candidates.length === 0) {
    throw new RegistryError("EMPTY_CANDIDATES", "selectBest requires at least one candidate");
  }

  const merged = candidates.filter((r) => (r.num_merged ?? 1) > 1);
  if (merged.length > 0) return maxBy(merged, MERGED_CRITERIA);

  return maxBy(candidates, RANKING_CRITERIA);
}
