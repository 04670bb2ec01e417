import * as readline from "readline";
import { parseJsonObject } from "../lib/encoding.js";
import {
  PaymentRequiredSchema,
  optionAmount,
  optionAssetName,
  type PaymentRequiredDocument,
} from "../lib/schemas.js";

export const CONFIRM_PROMPT = "Proceed with payment? [y/N] ";

export function isAffirmative(answer: string): boolean {
  return answer.trim().toLowerCase().startsWith("y");
}

/**
 * Reads the payment requirements from the decoded header, falling back to
 * a JSON 402 body.
 *
 * @param requirements - Decoded PAYMENT-REQUIRED document, if any
 * @param body - Raw 402 response body
 * @returns The parsed document, or undefined
 */
export function resolvePaymentRequirements(
  requirements: Readonly<Record<string, unknown>> | undefined,
  body: string,
): PaymentRequiredDocument | undefined {
  for (const candidate of [requirements, parseJsonObject(body)]) {
    const parsed = PaymentRequiredSchema.safeParse(candidate);
    if (parsed.success) {
      return parsed.data;
    }
  }
  return undefined;
}

/**
 * Lines describing what the endpoint asks to be paid.
 *
 * @param requirements - Decoded PAYMENT-REQUIRED document, if any
 * @param body - Raw 402 response body
 * @returns Summary lines, without trailing newlines
 */
export function summarizePayment(
  requirements: Readonly<Record<string, unknown>> | undefined,
  body: string,
): string[] {
  const lines = ["", "--- Payment Summary ---"];
  const document = resolvePaymentRequirements(requirements, body);
  if (!document) {
    lines.push("Payment requirements unavailable.");
    return lines;
  }

  if (document.resource?.url) {
    lines.push(`Resource: ${document.resource.url}`);
  }
  for (const option of document.accepts) {
    lines.push(`Cost:     ${optionAmount(option) ?? "?"} ${optionAssetName(option)} (atomic units)`);
    lines.push(`Network:  ${option.network}`);
    lines.push(`Pay to:   ${option.payTo}`);
  }
  return lines;
}

/**
 * Asks the operator to confirm on one line of input. End of input declines.
 *
 * @param input - Where the answer comes from
 * @param output - Where the prompt goes
 * @returns Whether the answer starts with "y"
 */
export function confirmPayment(
  input: NodeJS.ReadableStream,
  output: NodeJS.WritableStream,
): Promise<boolean> {
  return new Promise(resolve => {
    const rl = readline.createInterface({ input, output, terminal: false });
    let answered = false;

    rl.on("close", () => {
      if (!answered) {
        resolve(false);
      }
    });

    rl.question(CONFIRM_PROMPT, answer => {
      answered = true;
      rl.close();
      resolve(isAffirmative(answer));
    });
  });
}
