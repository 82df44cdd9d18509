import { redactSensitiveInfo, sanitizeLogMessage } from "./redact.js";

export type OutputFormat = "human" | "jsonl";

export type Diagnostic = {
  level: "error" | "warn" | "info";
  code: string;
  message: string;
  stage?: string;
  path?: string;
  details?: Record<string, unknown>;
};

export type Sink = {
  out: (line: string) => void;
  err: (line: string) => void;
};

const processSink: Sink = {
  out: (line) => process.stdout.write(line + "\n"),
  err: (line) => process.stderr.write(line + "\n"),
};

/**
 * Writes diagnostics as human-readable lines or one JSON object per line.
 * Everything passes through redaction first.
 */
export class Reporter {
  private readonly secrets: string[] = [];
  private readonly history: Diagnostic[] = [];

  constructor(
    readonly format: OutputFormat = "human",
    private readonly sink: Sink = processSink,
  ) {}

  /** Register a literal value that must never reach the output. */
  addSecret(value: string): void {
    if (value) this.secrets.push(value);
  }

  emit(d: Diagnostic): void {
    const clean: Diagnostic = {
      ...d,
      message: sanitizeLogMessage(redactSensitiveInfo(d.message, this.secrets)),
    };
    this.history.push(clean);

    if (this.format === "jsonl") {
      this.sink.out(JSON.stringify(clean));
      return;
    }

    const prefix = clean.stage ? `[${clean.stage}] ` : "";
    const line = `${prefix}${clean.message}`;
    if (clean.level === "info") this.sink.out(line);
    else this.sink.err(`${clean.level}: ${line}`);
  }

  info(code: string, message: string, extra?: Omit<Diagnostic, "level" | "code" | "message">): void {
    this.emit({ level: "info", code, message, ...extra });
  }

  warn(code: string, message: string, extra?: Omit<Diagnostic, "level" | "code" | "message">): void {
    this.emit({ level: "warn", code, message, ...extra });
  }

  error(code: string, message: string, extra?: Omit<Diagnostic, "level" | "code" | "message">): void {
    this.emit({ level: "error", code, message, ...extra });
  }

  /** Diagnostics emitted so far, after redaction. */
  diagnostics(): readonly Diagnostic[] {
    return this.history;
  }
}

/** A reporter that only records; used where output is not wanted. */
export function silentReporter(): Reporter {
  return new Reporter("jsonl", { out: () => undefined, err: () => undefined });
}
