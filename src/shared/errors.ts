/**
 * Decode error hierarchy.
 *
 * Decoding never throws: these are returned inside a failed `DecodeResult`.
 * Check `code` for programmatic handling and `path` for the offending field.
 */

import type { FieldPath } from "./types.js";
import { formatPath } from "./utils.js";

export type DecodeErrorCode =
  | "MISSING_REQUIRED_FIELD"
  | "TYPE_MISMATCH"
  | "INTEGER_OUT_OF_RANGE"
  | "NO_MATCHING_VARIANT"
  | "AMBIGUOUS_VARIANT"
  | "UNKNOWN_FIELD"
  | "MALFORMED_INPUT";

export class DecodeError extends Error {
  declare readonly code: DecodeErrorCode;

  readonly path: FieldPath;

  constructor(message: string, code: DecodeErrorCode, path: FieldPath, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DecodeError";
    this.code = code;
    this.path = path;
    Object.setPrototypeOf(this, DecodeError.prototype);
  }
}

export class MissingRequiredFieldError extends DecodeError {
  declare readonly code: "MISSING_REQUIRED_FIELD";

  constructor(path: FieldPath) {
    super(`Missing required field ${formatPath(path)}`, "MISSING_REQUIRED_FIELD", path);
    this.name = "MissingRequiredFieldError";
    Object.setPrototypeOf(this, MissingRequiredFieldError.prototype);
  }
}

export class TypeMismatchError extends DecodeError {
  declare readonly code: "TYPE_MISMATCH";

  readonly expected: string;
  readonly actual: string;

  constructor(path: FieldPath, expected: string, actual: string) {
    super(`Type mismatch at ${formatPath(path)}: expected ${expected}, found ${actual}`, "TYPE_MISMATCH", path);
    this.name = "TypeMismatchError";
    this.expected = expected;
    this.actual = actual;
    Object.setPrototypeOf(this, TypeMismatchError.prototype);
  }
}

export class IntegerOutOfRangeError extends DecodeError {
  declare readonly code: "INTEGER_OUT_OF_RANGE";

  readonly value: bigint | number;
  readonly width: string;

  constructor(path: FieldPath, value: bigint | number, width: string) {
    super(`Integer ${value.toString()} at ${formatPath(path)} does not fit ${width}`, "INTEGER_OUT_OF_RANGE", path);
    this.name = "IntegerOutOfRangeError";
    this.value = value;
    this.width = width;
    Object.setPrototypeOf(this, IntegerOutOfRangeError.prototype);
  }
}

export class NoMatchingVariantError extends DecodeError {
  declare readonly code: "NO_MATCHING_VARIANT";

  readonly group: string;
  readonly presentFields: readonly string[];

  constructor(path: FieldPath, group: string, presentFields: readonly string[]) {
    super(
      `No ${group} variant matches ${formatPath(path)} with fields {${presentFields.join(", ")}}`,
      "NO_MATCHING_VARIANT",
      path,
    );
    this.name = "NoMatchingVariantError";
    this.group = group;
    this.presentFields = presentFields;
    Object.setPrototypeOf(this, NoMatchingVariantError.prototype);
  }
}

export class AmbiguousVariantError extends DecodeError {
  declare readonly code: "AMBIGUOUS_VARIANT";

  readonly group: string;
  readonly candidates: readonly string[];

  constructor(path: FieldPath, group: string, candidates: readonly string[]) {
    super(
      `Ambiguous ${group} at ${formatPath(path)}: matches ${candidates.join(", ")}`,
      "AMBIGUOUS_VARIANT",
      path,
    );
    this.name = "AmbiguousVariantError";
    this.group = group;
    this.candidates = candidates;
    Object.setPrototypeOf(this, AmbiguousVariantError.prototype);
  }
}

/** Raised in strict mode only. */
export class UnknownFieldError extends DecodeError {
  declare readonly code: "UNKNOWN_FIELD";

  readonly key: string;

  constructor(path: FieldPath, key: string) {
    super(`Unknown field ${formatPath(path)}`, "UNKNOWN_FIELD", path);
    this.name = "UnknownFieldError";
    this.key = key;
    Object.setPrototypeOf(this, UnknownFieldError.prototype);
  }
}

/** Wraps a parser failure; the original error is kept as `cause`. */
export class MalformedInputError extends DecodeError {
  declare readonly code: "MALFORMED_INPUT";

  constructor(cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Malformed input: ${detail}`, "MALFORMED_INPUT", "", { cause });
    this.name = "MalformedInputError";
    Object.setPrototypeOf(this, MalformedInputError.prototype);
  }
}

/**
 * A modeling defect found while building a registry (dangling reference,
 * duplicate name, empty variant group). Thrown, since it is a programming error.
 */
export class RegistryError extends Error {
  readonly typeName: string;

  constructor(message: string, typeName: string) {
    super(message);
    this.name = "RegistryError";
    this.typeName = typeName;
    Object.setPrototypeOf(this, RegistryError.prototype);
  }
}
