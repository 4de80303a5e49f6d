import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

/**
 * Directory holding package.json. Sources run from src/ under the test runner
 * and from dist/src/ once built, so walk up instead of assuming a depth.
 */
export function packageRoot(): string {
  let dir = path.dirname(fileURLToPath(import.meta.url));
  for (;;) {
    if (fs.existsSync(path.join(dir, "package.json"))) return dir;
    const parent = path.dirname(dir);
    if (parent === dir) throw new Error(`package.json not found above ${fileURLToPath(import.meta.url)}`);
    dir = parent;
  }
}

export const SCHEMA_DIR = path.join(packageRoot(), "schemas");
export const CONFIG_DIR = path.join(packageRoot(), "config");
