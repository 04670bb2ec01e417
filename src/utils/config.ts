import { config } from "dotenv";
import { resolve } from "path";
import { ConfigError } from "../lib/errors.js";

export const PRIVATE_KEY_ENV = "EVM_PRIVATE_KEY";

export const DEFAULT_TIMEOUT = "30s";
export const DEFAULT_TIMEOUT_MS = 30_000;
export const RPC_TIMEOUT_MS = 10_000;

export const PRIVATE_KEY_HINT = `Set it with: export ${PRIVATE_KEY_ENV}=0x...`;

/**
 * Loads `.env` from the working directory. Variables already set in the
 * environment win.
 */
export function loadEnv(): void {
  config({ path: resolve(process.cwd(), ".env") });
}

export function getPrivateKey(env: NodeJS.ProcessEnv = process.env): string | undefined {
  const key = env[PRIVATE_KEY_ENV]?.trim();
  return key ? key : undefined;
}

const UNIT_MS: Record<string, number> = {
  ms: 1,
  s: 1_000,
  m: 60_000,
  h: 3_600_000,
};

const DURATION_PART = /(\d+(?:\.\d+)?)(ms|s|m|h)/g;

/**
 * Parses a duration such as "30s", "500ms", "1m30s" or a bare number of seconds.
 *
 * @param value - The duration text
 * @returns Milliseconds
 * @throws ConfigError when the text is not a duration
 */
export function parseDuration(value: string): number {
  const text = value.trim();
  if (/^\d+(?:\.\d+)?$/.test(text)) {
    return Math.round(Number(text) * 1_000);
  }

  let total = 0;
  let consumed = "";
  for (const match of text.matchAll(DURATION_PART)) {
    const [part, amount, unit] = match;
    total += Number(amount) * UNIT_MS[unit];
    consumed += part;
  }

  if (consumed === "" || consumed !== text) {
    throw new ConfigError(`invalid duration: ${value}`);
  }
  return Math.round(total);
}
