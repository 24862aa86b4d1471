/**
 * Core types for tg-schema.
 *
 * Every decode pass consumes an untyped document tree and yields either a
 * typed, immutable value or a single error carrying the field path.
 */

import type { DecodeError } from "./errors.js";

/** A field path such as `chat.pinned_message.from.id` or `photo[2].file_id`. */
export type FieldPath = string;

/** A parsed JSON-like document. `bigint` only appears for integers beyond 2^53. */
export type DocumentValue =
  | string
  | number
  | bigint
  | boolean
  | null
  | readonly DocumentValue[]
  | DocumentObject;

export interface DocumentObject {
  readonly [key: string]: DocumentValue;
}

/** Resolved member of a variant group. */
export interface Variant<K extends string, T> {
  readonly kind: K;
  readonly value: T;
}

export interface DecodeOptions {
  /** Reject unknown fields and unrecognized enum values instead of recording them. */
  strict?: boolean;
  /** Where the document sits inside an enclosing one; prefixes every reported path. */
  path?: FieldPath;
}

/** A key present in the input that the entity at `entityPath` does not declare. */
export interface UnknownField {
  path: FieldPath;
  entityPath: FieldPath;
  key: string;
  value: DocumentValue;
}

/** A string accepted by an open enum that is not one of its declared values. */
export interface UnknownEnumValue {
  path: FieldPath;
  value: string;
}

export interface DecodeSuccess<T> {
  ok: true;
  value: T;
  unknownFields: readonly UnknownField[];
  unknownEnumValues: readonly UnknownEnumValue[];
}

export interface DecodeFailure {
  ok: false;
  error: DecodeError;
}

export type DecodeResult<T> = DecodeSuccess<T> | DecodeFailure;

export interface EncodeOptions {
  /** Unknown fields captured by a previous decode, re-inserted by path. */
  unknownFields?: readonly UnknownField[];
  /** The `path` the value was decoded at, so captured unknown fields line up. */
  path?: FieldPath;
}
