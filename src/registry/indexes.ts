import { fingerprint, hasIdentity } from "./fingerprint.js";
import type { ExperimentRecord, RegistryIndexSnapshot } from "../types/record.js";

/**
 * Secondary indexes over the record set. Pure projections: always rebuilt by
 * replaying records, never loaded from the persisted snapshot.
 */
export class RegistryIndexes {
  readonly byFlowcell = new Map<string, string[]>();
  readonly byDevice = new Map<string, string[]>();
  readonly byExperiment = new Map<string, string[]>();
  readonly byFingerprint = new Map<string, string>();

  static fromRecords(records: Iterable<ExperimentRecord>): RegistryIndexes {
    const indexes = new RegistryIndexes();
    for (const record of records) indexes.add(record);
    return indexes;
  }

  add(record: ExperimentRecord): void {
    const runId = record.run_id;
    appendUnique(this.byFlowcell, record.flowcell, runId);
    appendUnique(this.byDevice, record.device, runId);
    appendUnique(this.byExperiment, record.experiment_name, runId);
    if (hasIdentity(record)) this.byFingerprint.set(fingerprint(record), runId);
  }

  snapshot(): RegistryIndexSnapshot {
    return {
      by_flowcell: Object.fromEntries(this.byFlowcell),
      by_device: Object.fromEntries(this.byDevice),
      by_experiment: Object.fromEntries(this.byExperiment),
    };
  }
}

function appendUnique(index: Map<string, string[]>, key: string | undefined, runId: string): void {
  if (!key) return;
  const ids = index.get(key);
  if (!ids) {
    index.set(key, [runId]);
  } else if (!ids.includes(runId)) {
    ids.push(runId);
  }
}
