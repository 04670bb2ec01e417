import { writeFile } from "fs/promises";
import ora, { type Ora } from "ora";
import { decodeBase64Json, truncate } from "../lib/encoding.js";
import { errorMessage, type ExitCode } from "../lib/errors.js";
import type { EndpointTarget, HeaderEntries } from "../lib/http.js";
import { createLogger, type Logger } from "../utils/logger.js";
import { exitCodeFor, type RunResult } from "./result.js";

/**
 * text: progress lines on stdout. json: one document on stdout at the end.
 * quiet: nothing on stdout; the exit code carries the result.
 */
export type OutputMode = "text" | "json" | "quiet";

export function resolveOutputMode(options: { json?: boolean; quiet?: boolean }): OutputMode {
  if (options.json) {
    return "json";
  }
  return options.quiet ? "quiet" : "text";
}

export interface ReporterOptions {
  mode: OutputMode;
  verbose?: boolean;
  stdout?: NodeJS.WritableStream;
  stderr?: NodeJS.WritableStream;
  color?: boolean;
  /** Persists response bodies for `--output` */
  writeFile?: (path: string, data: string) => Promise<void>;
}

/**
 * Owns stdout and stderr for one command so output formats never mix.
 */
export class Reporter {
  readonly mode: OutputMode;
  readonly logger: Logger;
  private readonly verboseRequested: boolean;
  private readonly stdout: NodeJS.WritableStream;
  private readonly stderr: NodeJS.WritableStream;
  private readonly persist: (path: string, data: string) => Promise<void>;

  constructor(options: ReporterOptions) {
    this.mode = options.mode;
    this.verboseRequested = options.verbose ?? false;
    this.stdout = options.stdout ?? process.stdout;
    this.stderr = options.stderr ?? process.stderr;
    this.persist = options.writeFile ?? ((path, data) => writeFile(path, data));
    this.logger = createLogger({
      stdout: this.stdout,
      silent: this.mode !== "text",
      color: options.color,
    });
  }

  /** Progress lines are shown */
  get human(): boolean {
    return this.mode === "text";
  }

  /** Full request/response dumps are shown */
  get verbose(): boolean {
    return this.human && this.verboseRequested;
  }

  spinner(text: string): Ora {
    return ora({ text, stream: this.stderr, isSilent: !this.human });
  }

  dumpRequest(target: EndpointTarget): void {
    if (!this.verbose) {
      return;
    }
    const lines = ["→ Request:", `${target.method} ${target.url}`];
    for (const [name, value] of Object.entries(target.headers)) {
      lines.push(`${name}: ${value}`);
    }
    lines.push("");
    if (target.body !== undefined) {
      lines.push(target.body);
    }
    this.writeLines(this.stdout, lines);
  }

  dumpResponse(response: {
    statusCode: number;
    statusText: string;
    headers: HeaderEntries;
    body: string;
  }): void {
    if (!this.verbose) {
      return;
    }
    const lines = ["← Response:", `HTTP ${response.statusCode} ${response.statusText}`.trimEnd()];
    for (const [name, value] of response.headers) {
      lines.push(`  ${name}: ${value}`);
    }
    lines.push("", response.body, "");
    this.writeLines(this.stdout, lines);
  }

  /**
   * Shows a base64 payment header and, when it decodes, its JSON.
   */
  printEncodedHeader(name: string, value: string | undefined): void {
    if (!this.human || value === undefined) {
      return;
    }
    this.logger.log(`${name}: ${truncate(value, 60)}...`);
    const decoded = decodeBase64Json(value);
    if (decoded) {
      const pretty = JSON.stringify(decoded, null, 2).replace(/\n/g, "\n  ");
      this.logger.log(`${name} (decoded):\n  ${pretty}`);
    }
  }

  /**
   * Writes lines to stdout regardless of mode; used for interactive prompts.
   */
  print(lines: string[]): void {
    this.writeLines(this.stdout, lines);
  }

  /** Warnings always go to stderr */
  warning(message: string): void {
    this.writeLines(this.stderr, [`${this.logger.chalk.yellow("Warning:")} ${message}`]);
  }

  /**
   * Writes a response body to `path` when one was requested. A failed write
   * is reported as a warning only.
   */
  async saveOutput(path: string | undefined, body: string): Promise<void> {
    if (!path || body === "") {
      return;
    }
    try {
      await this.persist(path, body);
    } catch (error) {
      this.warning(`failed to write to ${path}: ${errorMessage(error)}`);
    }
  }

  printVersion(name: string, version: string): void {
    if (this.mode === "json") {
      this.writeLines(this.stdout, [JSON.stringify({ version })]);
    } else {
      this.writeLines(this.stdout, [`${name} ${version}`]);
    }
  }

  /**
   * Prints a failure to stderr in text and quiet modes.
   */
  printError(message: string, hint?: string): void {
    if (this.mode === "json") {
      return;
    }
    const lines = [`${this.logger.chalk.red("Error:")} ${message}`];
    if (hint) {
      lines.push(hint);
    }
    this.writeLines(this.stderr, lines);
  }

  /**
   * Prints any document as the single JSON output.
   */
  printJson(document: unknown): void {
    this.writeLines(this.stdout, [JSON.stringify(document, null, 2)]);
  }

  /**
   * Emits the final run result and returns the exit code for it.
   *
   * @param result - The finished run result
   * @param hint - Extra text shown under an error in text mode
   * @returns The process exit code
   */
  emit(result: RunResult, hint?: string): ExitCode {
    if (this.mode === "json") {
      this.printJson(result);
    } else if (result.status === "error" && result.error) {
      this.printError(result.error, hint);
    }
    return exitCodeFor(result.status);
  }

  private writeLines(stream: NodeJS.WritableStream, lines: string[]): void {
    stream.write(`${lines.join("\n")}\n`);
  }
}
