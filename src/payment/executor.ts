import axios, { HttpStatusCode, type AxiosInstance, type AxiosResponse } from "axios";
import { ConfigError, errorMessage } from "../lib/errors.js";
import { decodeBase64Json, parseJsonObject } from "../lib/encoding.js";
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
import { PRIVATE_KEY_ENV, PRIVATE_KEY_HINT } from "../utils/config.js";
import type { PaymentScheme, PaymentSigner } from "./scheme.js";

export const PAYMENT_RESPONSE_HEADER = "PAYMENT-RESPONSE";

/**
 * Result of the paid retry. Never mutated.
 */
export interface PaymentOutcome {
  readonly statusCode: number;
  readonly statusText: string;
  readonly accepted: boolean;
  readonly signer: string;
  /** Decoded PAYMENT-RESPONSE settlement document */
  readonly paymentResponse?: Readonly<Record<string, unknown>>;
  readonly encodedResponse?: string;
  readonly headers: HeaderEntries;
  readonly body: string;
}

export type PaymentClassification = "accepted" | "rejected" | "unexpected";

export function classifyPayment(statusCode: number): PaymentClassification {
  if (statusCode === HttpStatusCode.Ok) {
    return "accepted";
  }
  if (statusCode === HttpStatusCode.PaymentRequired) {
    return "rejected";
  }
  return "unexpected";
}

/**
 * Derives the signer, turning library failures into a ConfigError.
 *
 * @param scheme - Payment scheme
 * @param privateKey - Raw key from the environment
 * @param missingKeyMessage - Error message when no key is set
 * @returns The signer
 */
export function createSigner<TSigner extends PaymentSigner>(
  scheme: PaymentScheme<TSigner>,
  privateKey: string | undefined,
  missingKeyMessage = `${PRIVATE_KEY_ENV} is required for Step 2 (payment)`,
): TSigner {
  if (!privateKey) {
    throw new ConfigError(missingKeyMessage, { hint: PRIVATE_KEY_HINT });
  }
  try {
    return scheme.createSigner(privateKey);
  } catch (error) {
    throw new ConfigError(`failed to create signer: ${errorMessage(error)}`, { cause: error });
  }
}

export interface ExecutePaymentOptions<TSigner extends PaymentSigner> {
  transport: HttpTransport;
  target: EndpointTarget;
  scheme: PaymentScheme<TSigner>;
  privateKey: string | undefined;
  /** Called once the signer exists, before the request goes out */
  onSigner?: (signer: TSigner) => void;
}

/**
 * Re-sends the request through a paying transport and records the outcome.
 *
 * @param options - Transport, target, payment scheme and credential
 * @returns The payment outcome
 * @throws ConfigError for a missing or malformed key, TransportError when no response arrives
 */
export async function executePayment<TSigner extends PaymentSigner>(
  options: ExecutePaymentOptions<TSigner>,
): Promise<PaymentOutcome> {
  const { transport, target, scheme } = options;

  const signer = createSigner(scheme, options.privateKey);
  options.onSigner?.(signer);

  // 402 must reject so the payment interceptor sees it.
  const rawBodies = new WeakMap<AxiosResponse, string>();
  const client = scheme.wrapTransport(
    exposePaymentRequiredBody(
      transport.createClient(status => status !== HttpStatusCode.PaymentRequired),
      rawBodies,
    ),
    signer,
  );

  let response: AxiosResponse;
  try {
    response = await client.request(toRequestConfig(target));
  } catch (error) {
    if (axios.isAxiosError(error) && error.response) {
      response = error.response;
    } else {
      throw toTransportError(error, transport.timeoutMs, "payment request failed");
    }
  }

  const encodedResponse = readHeader(response.headers, PAYMENT_RESPONSE_HEADER);

  return Object.freeze({
    statusCode: response.status,
    statusText: response.statusText,
    accepted: response.status === HttpStatusCode.Ok,
    signer: signer.address,
    paymentResponse: decodeBase64Json(encodedResponse),
    encodedResponse,
    headers: headerEntries(response.headers),
    body: rawBodies.get(response) ?? responseBody(response.data),
  });
}

/**
 * Hands the payment interceptor a parsed 402 body, where older endpoints put
 * their payment requirements. Registered before the interceptor so it runs
 * first; the text as received is kept in `rawBodies`.
 *
 * @param client - Client about to be wrapped
 * @param rawBodies - Receives the original body of each parsed response
 * @returns The same client
 */
function exposePaymentRequiredBody(
  client: AxiosInstance,
  rawBodies: WeakMap<AxiosResponse, string>,
): AxiosInstance {
  client.interceptors.response.use(undefined, (error: unknown) => {
    const response = axios.isAxiosError(error) ? error.response : undefined;
    if (response?.status === HttpStatusCode.PaymentRequired && typeof response.data === "string") {
      const parsed = parseJsonObject(response.data);
      if (parsed) {
        rawBodies.set(response, response.data);
        response.data = parsed;
      }
    }
    return Promise.reject(error);
  });
  return client;
}
