export type RegistryErrorCode =
  | "IDENTITY"
  | "NOT_FOUND"
  | "STATE"
  | "IO"
  | "LOCK_TIMEOUT"
  | "SCHEMA"
  | "EMPTY_CANDIDATES"
  | "CONFIG";

/**
 * Error raised by the registry core. `code` is stable and safe to switch on;
 * the message names the record or proposal and the offending field or state.
 */
export class RegistryError extends Error {
  constructor(
    readonly code: RegistryErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "RegistryError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
