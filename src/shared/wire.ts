/**
 * Wire-format constants and lossless JSON handling.
 *
 * `JSON.parse` silently rounds integers beyond 2^53, which corrupts chat and
 * user identifiers. Payloads are parsed with lossless-json instead: safe
 * integers and floats stay `number`, larger integers become `bigint`.
 */

import { isInteger, parse, stringify } from "lossless-json";

export const INT32_MIN = -(2 ** 31);
export const INT32_MAX = 2 ** 31 - 1;

export const INT64_MIN = -(2n ** 63n);
export const INT64_MAX = 2n ** 63n - 1n;

/** Number parser for lossless-json. */
export function parseNumber(text: string): number | bigint {
  if (isInteger(text)) {
    const asNumber = Number(text);
    return Number.isSafeInteger(asNumber) ? asNumber : BigInt(text);
  }
  return Number.parseFloat(text);
}

/**
 * Parse a raw payload into a document tree.
 * Throws the parser's own error on malformed input.
 */
export function parseDocument(text: string): unknown {
  return parse(text, null, parseNumber);
}

/**
 * Serialize a document (or a decoded value) back to JSON text without
 * losing bigint precision.
 */
export function stringifyDocument(value: unknown, indent?: number): string {
  return stringify(value, undefined, indent) ?? "null";
}
