import { describe, expect, it, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import path from "node:path";
import os from "node:os";
import { loadConfig, loadRawConfig, resolveConfigPaths } from "../src/config/loader.js";
import { validateConfig } from "../src/config/validator.js";
import { RegistryError } from "../src/errors.js";
import { CONFIG_DIR } from "../src/paths.js";

const NO_ENV: NodeJS.ProcessEnv = {};

describe("config loader", () => {
  it("loads base config with all required fields", () => {
    const config = loadConfig(undefined, CONFIG_DIR, NO_ENV);
    expect(config.schema_version).toBe("1.0.0");
    expect(config.registry_path).toBe(".ont-registry/experiments.json");
    expect(config.audit_max_entries).toBe(1000);
    expect(config.lock_timeout_ms).toBe(5000);
    expect(config.ignore_patterns).toEqual(["**/.Trash*/**", "**/lost+found/**"]);
  });

  it("merges env-specific config over base", () => {
    const config = loadConfig("shared", CONFIG_DIR, NO_ENV);
    expect(config.registry_path).toBe("/nfs/sequencing_data/.ont-registry/experiments.json");
    expect(config.lock_timeout_ms).toBe(15000);
    // base fields still present
    expect(config.stale_lock_age_ms).toBe(300000);
    expect(config.ignore_patterns).toHaveLength(2);
  });

  it("applies environment variable overrides with type coercion", () => {
    const config = loadConfig(undefined, CONFIG_DIR, {
      ONT_REGISTRY_REGISTRY_PATH: "/tmp/override.json",
      ONT_REGISTRY_LOCK_TIMEOUT_MS: "9000",
      ONT_REGISTRY_IGNORE_PATTERNS: "**/tmp/**, **/scratch/**",
      UNRELATED: "x",
    });
    expect(config.registry_path).toBe("/tmp/override.json");
    expect(config.lock_timeout_ms).toBe(9000);
    expect(config.ignore_patterns).toEqual(["**/tmp/**", "**/scratch/**"]);
  });

  it("env vars override env-specific yaml", () => {
    const config = loadConfig("shared", CONFIG_DIR, { ONT_REGISTRY_LOCK_TIMEOUT_MS: "1" });
    expect(config.lock_timeout_ms).toBe(1);
  });

  it("returns base config when env yaml does not exist", () => {
    const config = loadConfig("nonexistent-env", CONFIG_DIR, NO_ENV);
    expect(config.registry_path).toBe(".ont-registry/experiments.json");
  });

  it("throws a CONFIG error when a value has the wrong type", () => {
    expect(() => loadConfig(undefined, CONFIG_DIR, { ONT_REGISTRY_LOCK_TIMEOUT_MS: "soon" })).toThrow(RegistryError);
    expect(loadRawConfig(undefined, CONFIG_DIR, { ONT_REGISTRY_LOCK_TIMEOUT_MS: "soon" }).lock_timeout_ms).toBe("soon");
  });

  describe("custom config dir", () => {
    let tmpDir: string;

    beforeEach(() => {
      tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "ontreg-config-"));
      fs.copyFileSync(path.join(CONFIG_DIR, "base.yaml"), path.join(tmpDir, "base.yaml"));
    });

    afterEach(() => {
      fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    it("replaces arrays instead of concatenating", () => {
      fs.writeFileSync(path.join(tmpDir, "lab.yaml"), "ignore_patterns:\n  - \"**/staging/**\"\ngit_repo: /srv/registry\n");
      const config = loadConfig("lab", tmpDir, NO_ENV);
      expect(config.ignore_patterns).toEqual(["**/staging/**"]);
      expect(config.git_repo).toBe("/srv/registry");
    });

    it("rejects a config file that is not a mapping", () => {
      fs.writeFileSync(path.join(tmpDir, "broken.yaml"), "- just\n- a list\n");
      expect(() => loadConfig("broken", tmpDir, NO_ENV)).toThrow(/not a mapping/);
    });
  });
});

describe("resolveConfigPaths", () => {
  it("resolves relative paths against the working directory", () => {
    const config = resolveConfigPaths(loadConfig(undefined, CONFIG_DIR, NO_ENV), "/work");
    expect(config.registry_path).toBe("/work/.ont-registry/experiments.json");
    expect(config.proposals_dir).toBe("/work/.ont-registry/sync/proposals");
    expect(config.approved_dir).toBe("/work/.ont-registry/sync/approved");
    expect(config.audit_path).toBe("/work/.ont-registry/audit.json");
    expect(config.git_repo).toBeUndefined();
  });

  it("keeps absolute paths", () => {
    const config = resolveConfigPaths(loadConfig("shared", CONFIG_DIR, NO_ENV), "/work");
    expect(config.registry_path).toBe("/nfs/sequencing_data/.ont-registry/experiments.json");
  });
});

describe("config validator", () => {
  it("validates a correct base config", () => {
    const res = validateConfig(loadRawConfig(undefined, CONFIG_DIR, NO_ENV));
    expect(res.valid).toBe(true);
    expect(res.errors).toBeNull();
  });

  it("rejects config missing required fields", () => {
    const res = validateConfig({ schema_version: "1.0.0" });
    expect(res.valid).toBe(false);
    expect(res.errors).toContain("must have required property");
  });

  it("rejects a non-positive audit bound", () => {
    const raw = { ...loadRawConfig(undefined, CONFIG_DIR, NO_ENV), audit_max_entries: 0 };
    expect(validateConfig(raw).valid).toBe(false);
  });
});
