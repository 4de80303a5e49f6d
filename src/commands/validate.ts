import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";
import { loadRawConfig, resolveConfigPaths } from "../config/loader.js";
import { validateConfig } from "../config/validator.js";
import { errorMessage } from "../errors.js";
import { createRegistry, type SchemaName } from "../schema/registry.js";
import { diag, type Diagnostic } from "./output.js";

export type ValidateResult = { ok: true; checked: string[] } | { ok: false; errors: Diagnostic[] };

/**
 * Check the layered config and every document it points at: the registry,
 * the audit log and each stored proposal.
 */
export function validateAll(opts: {
  configDir?: string;
  env?: string;
  cwd?: string;
  processEnv?: NodeJS.ProcessEnv;
}): ValidateResult {
  const cwd = opts.cwd ?? process.cwd();
  const configDir = opts.configDir ? path.resolve(cwd, opts.configDir) : undefined;
  if (configDir && !fs.existsSync(configDir)) {
    return { ok: false, errors: [diag("error", "CONFIG_DIR_MISSING", `Config directory not found: ${configDir}`)] };
  }

  let raw: Record<string, unknown>;
  try {
    raw = loadRawConfig(opts.env, configDir, opts.processEnv ?? process.env);
  } catch (e) {
    return { ok: false, errors: [diag("error", "CONFIG_READ_FAILED", `Failed to read config: ${errorMessage(e)}`)] };
  }

  const validated = validateConfig(raw);
  if (!validated.valid) {
    return { ok: false, errors: [diag("error", "CONFIG_INVALID", `Config invalid: ${validated.errors}`)] };
  }

  const config = resolveConfigPaths(validated.config, cwd);
  const schemas = createRegistry();
  const errors: Diagnostic[] = [];
  const checked: string[] = ["config"];

  const check = (name: SchemaName, file: string, parse: (text: string) => unknown): void => {
    if (!fs.existsSync(file)) return;
    let doc: unknown;
    try {
      doc = parse(fs.readFileSync(file, "utf8"));
    } catch (e) {
      errors.push(diag("error", "DOCUMENT_READ_FAILED", `Failed to parse ${file}: ${errorMessage(e)}`, { path: file }));
      return;
    }
    const res = schemas.validate(name, doc);
    if (!res.valid) {
      errors.push(diag("error", `${name.toUpperCase()}_INVALID`, `${file} does not match ${name} schema: ${res.errors}`, { path: file }));
      return;
    }
    checked.push(file);
  };

  check("registry", config.registry_path, JSON.parse);
  check("audit", config.audit_path, JSON.parse);
  if (fs.existsSync(config.proposals_dir)) {
    for (const name of fs.readdirSync(config.proposals_dir).sort()) {
      if (name.endsWith(".yaml")) check("proposal", path.join(config.proposals_dir, name), (t) => YAML.parse(t));
    }
  }

  if (errors.length > 0) return { ok: false, errors };
  return { ok: true, checked };
}
