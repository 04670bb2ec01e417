import axios, { type AxiosAdapter, type AxiosInstance } from "axios";
import { z } from "zod";
import { RpcError } from "../lib/errors.js";
import { parseJsonObject } from "../lib/encoding.js";
import { responseBody } from "../lib/http.js";
import { RPC_TIMEOUT_MS } from "../utils/config.js";

export interface JsonRpcRequest {
  jsonrpc: "2.0";
  id: number;
  method: string;
  params: unknown[];
}

const JsonRpcResponseSchema = z.object({
  jsonrpc: z.string().optional(),
  id: z.union([z.number(), z.string(), z.null()]).optional(),
  result: z.unknown().optional(),
  error: z
    .object({
      code: z.number().optional(),
      message: z.string(),
    })
    .optional(),
});

export interface RpcClientOptions {
  timeoutMs?: number;
  /** Replaces the network adapter (tests) */
  adapter?: AxiosAdapter;
}

/**
 * Minimal JSON-RPC 2.0 client over HTTP POST.
 */
export class RpcClient {
  private readonly http: AxiosInstance;
  private nextId = 1;

  constructor(options: RpcClientOptions = {}) {
    this.http = axios.create({
      timeout: options.timeoutMs ?? RPC_TIMEOUT_MS,
      headers: { "Content-Type": "application/json" },
      responseType: "text",
      transformResponse: [(data: unknown) => data],
      validateStatus: () => true,
      ...(options.adapter ? { adapter: options.adapter } : {}),
    });
  }

  /**
   * Sends one request and returns its `result` member.
   *
   * @param url - RPC endpoint
   * @param method - RPC method name
   * @param params - Positional parameters
   * @returns The result value
   * @throws RpcError on transport failure, malformed responses or an `error` member
   */
  async call(url: string, method: string, params: unknown[]): Promise<unknown> {
    const request: JsonRpcRequest = { jsonrpc: "2.0", id: this.nextId++, method, params };

    let text: string;
    try {
      const response = await this.http.post(url, JSON.stringify(request));
      text = responseBody(response.data);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new RpcError(`rpc call failed: ${message}`, { cause: error });
    }

    const parsed = JsonRpcResponseSchema.safeParse(parseJsonObject(text));
    if (!parsed.success) {
      throw new RpcError("invalid rpc response");
    }
    if (parsed.data.error) {
      throw new RpcError(`rpc error: ${parsed.data.error.message}`);
    }
    return parsed.data.result;
  }

  /**
   * Read-only contract call against the given block.
   *
   * @param url - RPC endpoint
   * @param call - Target contract and call data
   * @param block - Block tag
   * @returns The hex return data
   */
  async ethCall(url: string, call: { to: string; data: string }, block = "latest"): Promise<string> {
    const result = await this.call(url, "eth_call", [call, block]);
    if (result === undefined || result === null) {
      return "0x";
    }
    if (typeof result !== "string") {
      throw new RpcError("invalid rpc response");
    }
    return result;
  }
}
