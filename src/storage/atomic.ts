import fs from "node:fs";
import { mkdir, open, rename, unlink, type FileHandle } from "node:fs/promises";
import { dirname } from "node:path";
import { RegistryError } from "../errors.js";

/**
 * Write a document by writing a sibling temp file, fsyncing it, and renaming it
 * over the target. Readers see either the old or the new document.
 */
export async function atomicWriteFile(path: string, payload: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  const tmp = `${path}.tmp.${process.pid}.${Date.now()}`;

  let fh: FileHandle | null = null;
  try {
    fh = await open(tmp, "w");
    await fh.writeFile(payload, "utf8");
    await fh.sync();
    await fh.close();
    fh = null;

    await rename(tmp, path);
  } catch (e) {
    // Clean up temporary file on error
    try {
      if (fh) await fh.close();
      await unlink(tmp);
    } catch {
      // Temp file may never have been created
    }
    throw new RegistryError("IO", `Failed to write ${path}: ${e instanceof Error ? e.message : String(e)}`, { cause: e });
  }
}

export async function atomicWriteJson(path: string, data: unknown): Promise<void> {
  await atomicWriteFile(path, JSON.stringify(data, null, 2) + "\n");
}

/** Read and parse a JSON document, or return null when the file does not exist. */
export function readJsonIfExists(path: string): unknown | null {
  let raw: string;
  try {
    raw = fs.readFileSync(path, "utf8");
  } catch (e) {
    if (isErrnoException(e) && e.code === "ENOENT") return null;
    throw new RegistryError("IO", `Failed to read ${path}: ${e instanceof Error ? e.message : String(e)}`, { cause: e });
  }
  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch (e) {
    throw new RegistryError("SCHEMA", `Malformed JSON in ${path}: ${e instanceof Error ? e.message : String(e)}`, { cause: e });
  }
}

export function isErrnoException(e: unknown): e is NodeJS.ErrnoException {
  return e instanceof Error && "code" in e;
}
