export type OutputFormat = "human" | "jsonl";

export type Diagnostic = {
  level: "error" | "warn" | "info";
  code: string;
  message: string;
  path?: string;
  details?: Record<string, unknown>;
};

export function diag(
  level: Diagnostic["level"],
  code: string,
  message: string,
  extra?: Pick<Diagnostic, "path" | "details">,
): Diagnostic {
  return { level, code, message, ...extra };
}

export function parseFormat(value: string | undefined): OutputFormat | null {
  if (value === undefined || value === "human") return "human";
  if (value === "jsonl") return "jsonl";
  return null;
}

/**
 * Writes command results either as plain lines or as one JSON object per line.
 * Streams are injectable so commands can be exercised without a process.
 */
export class Output {
  constructor(
    readonly format: OutputFormat,
    private readonly stdout: NodeJS.WritableStream = process.stdout,
    private readonly stderr: NodeJS.WritableStream = process.stderr,
  ) {}

  /** Emit a record: `human` text for people, `data` for machines. */
  emit(human: string, data: Record<string, unknown>): void {
    if (this.format === "jsonl") {
      this.stdout.write(JSON.stringify(data) + "\n");
    } else {
      this.stdout.write(human + "\n");
    }
  }

  info(code: string, message: string, data: Record<string, unknown> = {}): void {
    this.emit(message, { level: "info", code, message, ...data });
  }

  error(code: string, message: string, data: Record<string, unknown> = {}): void {
    if (this.format === "jsonl") {
      this.stdout.write(JSON.stringify({ level: "error", code, message, ...data }) + "\n");
    } else {
      this.stderr.write(message + "\n");
    }
  }

  diagnostics(list: readonly Diagnostic[]): void {
    for (const d of list) {
      if (d.level === "error") this.error(d.code, d.message, d.path ? { path: d.path } : {});
      else this.emit(d.message, { ...d });
    }
  }
}
