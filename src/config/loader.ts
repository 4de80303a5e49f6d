import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";
import { RegistryError } from "../errors.js";
import { CONFIG_DIR } from "../paths.js";
import { validateConfig } from "./validator.js";
import type { RegistryConfig } from "../types/config.js";

export const ENV_PREFIX = "ONT_REGISTRY_";

/**
 * Deep merge two objects. `override` values take precedence.
 * Arrays are replaced, not concatenated.
 */
function deepMerge(base: Record<string, unknown>, override: Record<string, unknown>): Record<string, unknown> {
  const result = { ...base };
  for (const [key, val] of Object.entries(override)) {
    const prev = result[key];
    if (isObject(val) && isObject(prev)) {
      result[key] = deepMerge(prev, val);
    } else if (val !== undefined) {
      result[key] = val;
    }
  }
  return result;
}

/** Load a YAML file and return parsed object, or empty object if not found. */
function loadYaml(filePath: string): Record<string, unknown> {
  if (!fs.existsSync(filePath)) return {};
  const parsed: unknown = YAML.parse(fs.readFileSync(filePath, "utf8"));
  if (parsed === null || parsed === undefined) return {};
  if (!isObject(parsed)) {
    throw new RegistryError("CONFIG", `Config file is not a mapping: ${filePath}`);
  }
  return parsed;
}

/**
 * Apply ONT_REGISTRY_ prefixed environment variable overrides.
 * ONT_REGISTRY_LOCK_TIMEOUT_MS=9000 → lock_timeout_ms: 9000. Values are coerced
 * to the type already present (numbers, comma-separated lists).
 */
function applyEnvOverrides(config: Record<string, unknown>, env: NodeJS.ProcessEnv): Record<string, unknown> {
  const result = { ...config };
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;
    const configKey = key.slice(ENV_PREFIX.length).toLowerCase();
    const current = result[configKey];
    if (typeof current === "number" && value.trim() !== "" && !Number.isNaN(Number(value))) {
      result[configKey] = Number(value);
    } else if (Array.isArray(current)) {
      result[configKey] = value.split(",").map((s) => s.trim()).filter((s) => s.length > 0);
    } else {
      result[configKey] = value;
    }
  }
  return result;
}

/**
 * Merge config layers without validating: base.yaml ← {envName}.yaml ← env vars.
 */
export function loadRawConfig(envName?: string, configDir?: string, env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const dir = configDir ?? CONFIG_DIR;

  let merged = loadYaml(path.join(dir, "base.yaml"));
  if (envName) {
    merged = deepMerge(merged, loadYaml(path.join(dir, `${envName}.yaml`)));
  }
  return applyEnvOverrides(merged, env);
}

/**
 * Load layered config: base.yaml ← env.yaml ← environment variables.
 *
 * @param envName - Optional environment name (e.g., "shared").
 *                  Loads `config/{envName}.yaml` as override layer.
 * @param configDir - Optional config directory path override.
 */
export function loadConfig(envName?: string, configDir?: string, env: NodeJS.ProcessEnv = process.env): RegistryConfig {
  const raw = loadRawConfig(envName, configDir, env);
  const result = validateConfig(raw);
  if (!result.valid) {
    throw new RegistryError("CONFIG", `Invalid configuration: ${result.errors}`);
  }
  return result.config;
}

/** Resolve every filesystem path in the config against `cwd`. */
export function resolveConfigPaths(config: RegistryConfig, cwd: string): RegistryConfig {
  return {
    ...config,
    registry_path: path.resolve(cwd, config.registry_path),
    proposals_dir: path.resolve(cwd, config.proposals_dir),
    approved_dir: path.resolve(cwd, config.approved_dir),
    audit_path: path.resolve(cwd, config.audit_path),
    git_repo: config.git_repo ? path.resolve(cwd, config.git_repo) : undefined,
  };
}

function isObject(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}
