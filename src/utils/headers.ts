/**
 * Header helpers
 */

import type { HttpHeaders } from "@/types";
import { REDACTED_HEADER_VALUE, SENSITIVE_HEADER_NAMES } from "@/constants";

/**
 * Copy of `headers` safe to log: credential-bearing values replaced
 */
export function redactHeaders(headers: Readonly<HttpHeaders>): HttpHeaders {
  const redacted: HttpHeaders = {};
  for (const [name, value] of Object.entries(headers)) {
    redacted[name] = SENSITIVE_HEADER_NAMES.includes(name.toLowerCase())
      ? REDACTED_HEADER_VALUE
      : value;
  }
  return redacted;
}

/**
 * Merge header maps left to right; later names win case-insensitively
 */
export function mergeHeaders(...sources: (Readonly<HttpHeaders> | undefined)[]): HttpHeaders {
  const merged = new Map<string, [string, string]>();
  for (const source of sources) {
    if (!source) continue;
    for (const [name, value] of Object.entries(source)) {
      merged.set(name.toLowerCase(), [name, value]);
    }
  }
  return Object.fromEntries(merged.values());
}

export function hasHeader(headers: Readonly<HttpHeaders>, name: string): boolean {
  const wanted = name.toLowerCase();
  return Object.keys(headers).some((key) => key.toLowerCase() === wanted);
}
