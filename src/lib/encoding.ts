export const Base64EncodedRegex = /^[A-Za-z0-9+/]*={0,2}$/;

/**
 * Decodes a base64 header value carrying a JSON object.
 *
 * Bad base64, bad JSON or a non-object document yields undefined.
 *
 * @param value - The raw header value
 * @returns The decoded object, or undefined when it cannot be decoded
 */
export function decodeBase64Json(value: string | undefined): Record<string, unknown> | undefined {
  if (!value) {
    return undefined;
  }

  const trimmed = value.trim();
  if (trimmed === "" || !Base64EncodedRegex.test(trimmed)) {
    return undefined;
  }

  try {
    const parsed: unknown = JSON.parse(Buffer.from(trimmed, "base64").toString("utf-8"));
    if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
      return undefined;
    }
    return { ...parsed };
  } catch {
    return undefined;
  }
}

/**
 * Encodes a JSON value as a base64 header value.
 *
 * @param value - Any JSON-serialisable value
 * @returns Base64 of the UTF-8 JSON text
 */
export function encodeBase64Json(value: unknown): string {
  return Buffer.from(JSON.stringify(value), "utf-8").toString("base64");
}

/**
 * Parses JSON text into an object, or undefined when it is not one.
 *
 * @param text - Candidate JSON text
 * @returns The parsed object or undefined
 */
export function parseJsonObject(text: string): Record<string, unknown> | undefined {
  try {
    const parsed: unknown = JSON.parse(text);
    if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
      return undefined;
    }
    return { ...parsed };
  } catch {
    return undefined;
  }
}

/**
 * Cuts a string to at most `length` characters.
 *
 * @param value - Text to shorten
 * @param length - Maximum length
 * @returns The prefix of `value`
 */
export function truncate(value: string, length: number): string {
  return value.length <= length ? value : value.slice(0, length);
}
