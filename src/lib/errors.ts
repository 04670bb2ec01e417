/**
 * @fileoverview Error codes, error classes and process exit codes for pay-probe
 */

/**
 * Process exit codes. Agents and scripts branch on these.
 */
export const EXIT_CODES = {
  /** Payment accepted, probe completed, or the run stopped on purpose */
  SUCCESS: 0,
  /** Network, configuration or unexpected failure */
  ERROR: 1,
  /** The settlement authority declined the payment */
  PAYMENT_REJECTED: 2,
  /** The endpoint answered 200 without payment */
  FREE_ROUTE: 3,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * Error codes for failures that end a command.
 */
export const ERROR_CODES = {
  /** Missing or malformed input: URL, credential, network name, duration */
  CONFIG: "CONFIG",
  /** DNS, TLS, connection or timeout failure on an outbound request */
  TRANSPORT: "TRANSPORT",
  /** JSON-RPC call failed or returned an error member */
  RPC: "RPC",
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

export interface CliErrorOptions {
  cause?: unknown;
  /** Extra line shown under the error in text mode */
  hint?: string;
}

export class CliError extends Error {
  readonly code: ErrorCode;
  readonly hint?: string;

  constructor(code: ErrorCode, message: string, options: CliErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = "CliError";
    this.code = code;
    this.hint = options.hint;
  }
}

export class ConfigError extends CliError {
  constructor(message: string, options?: CliErrorOptions) {
    super(ERROR_CODES.CONFIG, message, options);
    this.name = "ConfigError";
  }
}

export class TransportError extends CliError {
  constructor(message: string, options?: CliErrorOptions) {
    super(ERROR_CODES.TRANSPORT, message, options);
    this.name = "TransportError";
  }
}

export class RpcError extends CliError {
  constructor(message: string, options?: CliErrorOptions) {
    super(ERROR_CODES.RPC, message, options);
    this.name = "RpcError";
  }
}

/**
 * Extracts a printable message from anything thrown.
 *
 * @param error - The caught value
 * @returns The error message, or its string form
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Returns the hint attached to a CliError, if any.
 *
 * @param error - The caught value
 * @returns The hint text or undefined
 */
export function errorHint(error: unknown): string | undefined {
  return error instanceof CliError ? error.hint : undefined;
}
