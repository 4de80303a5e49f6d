import { createHash } from "node:crypto";
import { IDENTITY_FIELDS, type IdentityFields } from "../types/record.js";

export const FINGERPRINT_LENGTH = 16;

/**
 * Stable content key over the identity fields of a record. Two records with the
 * same flowcell, device, experiment name, date and time share a fingerprint no
 * matter which paths or metrics they carry. Missing fields hash as "".
 */
export function fingerprint(record: IdentityFields): string {
  const key = IDENTITY_FIELDS.map((f) => record[f] ?? "").join("|");
  return createHash("sha256").update(key).digest("hex").slice(0, FINGERPRINT_LENGTH);
}

/** False when every identity field is empty; such records share one fingerprint and must not dedup on it. */
export function hasIdentity(record: IdentityFields): boolean {
  return IDENTITY_FIELDS.some((f) => Boolean(record[f]));
}
