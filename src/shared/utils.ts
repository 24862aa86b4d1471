/**
 * Shared utility functions for tg-schema.
 */

import type { FieldPath } from "./types.js";

/** Narrow to a plain JSON object (not an array, not null). */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Append an object key to a path. */
export function childPath(parent: FieldPath, key: string): FieldPath {
  return parent === "" ? key : `${parent}.${key}`;
}

/** Append an array index to a path. */
export function indexPath(parent: FieldPath, index: number): FieldPath {
  return `${parent}[${index}]`;
}

/** Human-readable path; the root has no name of its own. */
export function formatPath(path: FieldPath): string {
  return path === "" ? "<root>" : path;
}

/**
 * Name the JSON kind of a value for error messages.
 * Integers and floats are told apart so `expected int32, found float` reads well.
 */
export function describeValue(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  if (typeof value === "bigint") return "integer";
  if (typeof value === "number") return Number.isInteger(value) ? "integer" : "float";
  return typeof value;
}

/**
 * Truncate a string to a maximum length, adding ellipsis if needed.
 */
export function truncate(str: string, maxLen: number): string {
  if (str.length <= maxLen) return str;
  return str.slice(0, maxLen - 3) + "...";
}
