import { loadAjv } from "../schema/ajv.js";
import type { RegistryConfig } from "../types/config.js";

/** Config schema: required fields with usable values. */
const CONFIG_SCHEMA = {
  type: "object",
  required: [
    "schema_version",
    "registry_path",
    "proposals_dir",
    "approved_dir",
    "audit_path",
    "audit_max_entries",
    "lock_timeout_ms",
    "stale_lock_age_ms",
    "ignore_patterns",
  ],
  properties: {
    schema_version: { type: "string", minLength: 1 },
    registry_path: { type: "string", minLength: 1 },
    proposals_dir: { type: "string", minLength: 1 },
    approved_dir: { type: "string", minLength: 1 },
    audit_path: { type: "string", minLength: 1 },
    audit_max_entries: { type: "integer", minimum: 1 },
    lock_timeout_ms: { type: "integer", minimum: 0 },
    stale_lock_age_ms: { type: "integer", minimum: 1000 },
    ignore_patterns: { type: "array", items: { type: "string" } },
    git_repo: { type: "string", minLength: 1 },
  },
};

export type ConfigValidationResult =
  | { valid: true; errors: null; config: RegistryConfig }
  | { valid: false; errors: string };

const ajv = loadAjv();
const validate = ajv.compile(CONFIG_SCHEMA);

function isRegistryConfig(config: unknown): config is RegistryConfig {
  return validate(config);
}

/** Validate a loaded config against the config schema. */
export function validateConfig(config: unknown): ConfigValidationResult {
  if (isRegistryConfig(config)) {
    return { valid: true, errors: null, config };
  }
  return { valid: false, errors: ajv.errorsText(validate.errors) };
}
