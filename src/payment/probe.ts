import { HttpStatusCode, type AxiosResponse } from "axios";
import { decodeBase64Json } from "../lib/encoding.js";
import {
  headerEntries,
  readHeader,
  responseBody,
  toRequestConfig,
  toTransportError,
  type EndpointTarget,
  type HeaderEntries,
  type HttpTransport,
} from "../lib/http.js";

export const PAYMENT_REQUIRED_HEADER = "PAYMENT-REQUIRED";

/**
 * What the unauthenticated request returned. Never mutated.
 */
export interface ProbeOutcome {
  readonly statusCode: number;
  readonly statusText: string;
  readonly paymentRequired: boolean;
  /** Decoded PAYMENT-REQUIRED document; absent when missing or undecodable */
  readonly paymentRequirements?: Readonly<Record<string, unknown>>;
  /** The header exactly as received */
  readonly encodedRequirements?: string;
  readonly headers: HeaderEntries;
  readonly body: string;
}

export type ProbeClassification = "free" | "payment_required" | "unclassified";

export function classifyProbe(statusCode: number): ProbeClassification {
  if (statusCode === HttpStatusCode.PaymentRequired) {
    return "payment_required";
  }
  if (statusCode === HttpStatusCode.Ok) {
    return "free";
  }
  return "unclassified";
}

/**
 * Sends the request without payment and records the outcome.
 *
 * @param transport - Shared transport
 * @param target - The endpoint under test
 * @returns The probe outcome
 * @throws TransportError when no response arrives
 */
export async function probeEndpoint(
  transport: HttpTransport,
  target: EndpointTarget,
): Promise<ProbeOutcome> {
  let response: AxiosResponse;
  try {
    response = await transport.client.request(toRequestConfig(target));
  } catch (error) {
    throw toTransportError(error, transport.timeoutMs);
  }

  const paymentRequired = response.status === HttpStatusCode.PaymentRequired;
  const encodedRequirements = readHeader(response.headers, PAYMENT_REQUIRED_HEADER);

  return Object.freeze({
    statusCode: response.status,
    statusText: response.statusText,
    paymentRequired,
    paymentRequirements: paymentRequired ? decodeBase64Json(encodedRequirements) : undefined,
    encodedRequirements,
    headers: headerEntries(response.headers),
    body: responseBody(response.data),
  });
}
