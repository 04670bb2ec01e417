import axios, {
  AxiosHeaders,
  type AxiosAdapter,
  type AxiosInstance,
  type AxiosRequestConfig,
  type AxiosResponse,
} from "axios";
import { Agent } from "https";
import { ConfigError, TransportError } from "./errors.js";

/**
 * The request under test. Frozen once built.
 */
export interface EndpointTarget {
  readonly url: string;
  readonly method: string;
  readonly body?: string;
  readonly headers: Readonly<Record<string, string>>;
}

export interface EndpointTargetInput {
  url: string;
  /** Explicit method; when absent a body implies POST */
  method?: string;
  data?: string;
  /** "Key: Value" strings */
  headers?: string[];
}

export type HeaderEntries = ReadonlyArray<readonly [string, string]>;

/**
 * Parses "Key: Value" header strings. Entries without a colon are ignored and
 * a later entry replaces an earlier one with the same key.
 *
 * @param lines - Raw header strings
 * @returns Header map
 */
export function parseHeaders(lines: readonly string[]): Record<string, string> {
  const headers: Record<string, string> = {};
  for (const line of lines) {
    const separator = line.indexOf(":");
    if (separator === -1) {
      continue;
    }
    const key = line.slice(0, separator).trim();
    if (key === "") {
      continue;
    }
    const existing = Object.keys(headers).find(name => name.toLowerCase() === key.toLowerCase());
    if (existing !== undefined) {
      delete headers[existing];
    }
    headers[key] = line.slice(separator + 1).trim();
  }
  return headers;
}

/**
 * The request method: the given one upper-cased, else POST with a body and
 * GET without.
 */
export function resolveMethod(method: string | undefined, data: string | undefined): string {
  if (method === undefined) {
    return data ? "POST" : "GET";
  }
  return method.trim().toUpperCase() || "GET";
}

/**
 * Validates the URL and builds an immutable endpoint target.
 *
 * @param input - URL, method, body and header strings from the command line
 * @returns The endpoint target
 * @throws ConfigError when the URL is not an absolute http(s) URL
 */
export function createEndpointTarget(input: EndpointTargetInput): EndpointTarget {
  let parsed: URL;
  try {
    parsed = new URL(input.url);
  } catch {
    throw new ConfigError(`invalid URL: ${input.url}`);
  }
  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new ConfigError(`unsupported URL scheme: ${parsed.protocol}`);
  }

  return Object.freeze({
    url: input.url,
    method: resolveMethod(input.method, input.data),
    body: input.data ? input.data : undefined,
    headers: Object.freeze(parseHeaders(input.headers ?? [])),
  });
}

/**
 * Axios request options for a target.
 *
 * @param target - The endpoint target
 * @returns Request config with a fresh header object
 */
export function toRequestConfig(target: EndpointTarget): AxiosRequestConfig {
  return {
    url: target.url,
    method: target.method,
    data: target.body,
    headers: { ...target.headers },
  };
}

export interface TransportOptions {
  /** Skip TLS certificate verification */
  insecure?: boolean;
  /** Per-request timeout; 0 disables it */
  timeoutMs: number;
  /** Replaces the network adapter (tests) */
  adapter?: AxiosAdapter;
}

/**
 * Connection-level settings shared by the probe and payment phases. Every
 * client created here uses the same agent, so TLS policy is set once.
 */
export class HttpTransport {
  readonly agent: Agent;
  readonly timeoutMs: number;
  private readonly adapter?: AxiosAdapter;
  private plainClient?: AxiosInstance;

  constructor(options: TransportOptions) {
    this.agent = new Agent({ rejectUnauthorized: !options.insecure });
    this.timeoutMs = options.timeoutMs;
    this.adapter = options.adapter;
  }

  /**
   * Client that resolves on every status code.
   *
   * @returns The shared plain client
   */
  get client(): AxiosInstance {
    this.plainClient ??= this.createClient(() => true);
    return this.plainClient;
  }

  /**
   * Builds a new client on the shared agent.
   *
   * @param validateStatus - Which statuses resolve rather than reject
   * @returns A new axios instance
   */
  createClient(validateStatus: (status: number) => boolean): AxiosInstance {
    return axios.create({
      httpsAgent: this.agent,
      timeout: this.timeoutMs,
      validateStatus,
      responseType: "text",
      transformResponse: [(data: unknown) => data],
      ...(this.adapter ? { adapter: this.adapter } : {}),
    });
  }
}

/**
 * Response body as text.
 *
 * @param data - `response.data` from a text-mode request
 * @returns The body string ("" when empty)
 */
export function responseBody(data: unknown): string {
  if (data === undefined || data === null) {
    return "";
  }
  if (typeof data === "string") {
    return data;
  }
  if (Buffer.isBuffer(data)) {
    return data.toString("utf-8");
  }
  return JSON.stringify(data);
}

/**
 * Reads a response header case-insensitively.
 *
 * @param headers - Response headers
 * @param name - Header name
 * @returns The value, or undefined when missing or empty
 */
export function readHeader(headers: AxiosResponse["headers"], name: string): string | undefined {
  const value = headers instanceof AxiosHeaders ? headers.get(name) : headers[name.toLowerCase()];
  return typeof value === "string" && value !== "" ? value : undefined;
}

/**
 * Flattens response headers into name/value pairs for dumps.
 *
 * @param headers - Response headers
 * @returns Header entries in arrival order
 */
export function headerEntries(headers: AxiosResponse["headers"]): HeaderEntries {
  const raw = headers instanceof AxiosHeaders ? headers.toJSON() : headers;
  const entries: Array<readonly [string, string]> = [];
  for (const [name, value] of Object.entries(raw)) {
    if (Array.isArray(value)) {
      value.forEach(item => entries.push([name, String(item)]));
    } else if (value !== undefined && value !== null) {
      entries.push([name, String(value)]);
    }
  }
  return entries;
}

const NETWORK_HINTS: Record<string, string> = {
  ENOTFOUND: "Could not resolve hostname. Check the URL.",
  ECONNREFUSED: "Connection refused. Is the server running?",
  DEPTH_ZERO_SELF_SIGNED_CERT: "Self-signed certificate. Use --insecure to skip verification.",
  SELF_SIGNED_CERT_IN_CHAIN: "Self-signed certificate. Use --insecure to skip verification.",
  UNABLE_TO_VERIFY_LEAF_SIGNATURE: "Certificate could not be verified. Use --insecure to skip verification.",
};

/**
 * Wraps a failed request in a TransportError.
 *
 * @param error - What the request threw
 * @param timeoutMs - The timeout in force, for the message
 * @param prefix - Optional message prefix such as "payment request failed"
 * @returns The transport error
 */
export function toTransportError(error: unknown, timeoutMs: number, prefix?: string): TransportError {
  let message: string;
  let hint: string | undefined;

  if (axios.isAxiosError(error)) {
    const timedOut = error.code === "ECONNABORTED" || error.code === "ETIMEDOUT";
    message = timedOut ? `request timed out after ${timeoutMs}ms` : error.message;
    hint = error.code ? NETWORK_HINTS[error.code] : undefined;
  } else {
    message = error instanceof Error ? error.message : String(error);
  }

  return new TransportError(prefix ? `${prefix}: ${message}` : message, { cause: error, hint });
}
