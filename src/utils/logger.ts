import { Chalk } from "chalk";

export interface LoggerOptions {
  stdout?: NodeJS.WritableStream;
  /** Drop every line; used for JSON and quiet output */
  silent?: boolean;
  /** Force colour on or off; detected from the terminal when unset */
  color?: boolean;
}

export type Logger = ReturnType<typeof createLogger>;

/**
 * Creates the styled progress logger used by the commands.
 *
 * @param options - Output stream, silence and colour settings
 * @returns The logger
 */
export function createLogger(options: LoggerOptions = {}) {
  const stdout = options.stdout ?? process.stdout;
  const silent = options.silent ?? false;
  const chalk =
    options.color === undefined ? new Chalk() : new Chalk({ level: options.color ? 1 : 0 });

  const write = (line: string) => {
    if (!silent) {
      stdout.write(`${line}\n`);
    }
  };

  return {
    chalk,
    silent,
    success: (message: string) => write(`${chalk.green("✓")} ${message}`),
    error: (message: string) => write(`${chalk.red("✗")} ${message}`),
    info: (message: string) => write(`${chalk.blue("ℹ")} ${message}`),
    warn: (message: string) => write(`${chalk.yellow("⚠")} ${message}`),
    log: (message: string) => write(message),
    header: (message: string) => {
      write(`\n${chalk.bold.underline(message)}`);
    },
    keyValue: (key: string, value: string) => {
      write(`  ${chalk.gray(key + ":")} ${value}`);
    },
  };
}
