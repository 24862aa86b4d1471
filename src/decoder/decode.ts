/**
 * Record decoding.
 *
 * One pass, fail fast: the first problem aborts decoding and is reported
 * with its full field path. Unknown keys are collected (lenient) or rejected
 * (strict). Every object and array produced is frozen.
 */

import type { EntityDefinition, IntegerWidth, SchemaTable, TypeDescriptor, VariantDefinition } from "../schema/fields.js";
import { describeDescriptor, selectAlternative } from "../schema/fields.js";
import {
  DecodeError,
  IntegerOutOfRangeError,
  MissingRequiredFieldError,
  TypeMismatchError,
  UnknownFieldError,
} from "../shared/errors.js";
import type {
  DecodeOptions,
  DecodeResult,
  DocumentValue,
  FieldPath,
  UnknownEnumValue,
  UnknownField,
} from "../shared/types.js";
import { childPath, describeValue, indexPath, isRecord } from "../shared/utils.js";
import { INT32_MAX, INT32_MIN, INT64_MAX, INT64_MIN } from "../shared/wire.js";
import { resolveVariant } from "./variant.js";

interface DecodeContext {
  readonly schema: SchemaTable;
  readonly strict: boolean;
  readonly unknownFields: UnknownField[];
  readonly unknownEnumValues: UnknownEnumValue[];
}

/**
 * Decode `document` as `descriptor`. Never throws a `DecodeError`: it is
 * returned in the failed result.
 */
export function decodeDocument(
  schema: SchemaTable,
  descriptor: TypeDescriptor,
  document: unknown,
  options: DecodeOptions,
): DecodeResult<unknown> {
  const ctx: DecodeContext = {
    schema,
    strict: options.strict === true,
    unknownFields: [],
    unknownEnumValues: [],
  };

  try {
    const value = decodeValue(ctx, descriptor, document, options.path ?? "");
    return {
      ok: true,
      value,
      unknownFields: Object.freeze(ctx.unknownFields),
      unknownEnumValues: Object.freeze(ctx.unknownEnumValues),
    };
  } catch (err) {
    if (err instanceof DecodeError) {
      return { ok: false, error: err };
    }
    throw err;
  }
}

function decodeValue(ctx: DecodeContext, descriptor: TypeDescriptor, value: unknown, path: FieldPath): unknown {
  switch (descriptor.kind) {
    case "string":
    case "boolean":
      if (typeof value !== descriptor.kind) throw mismatch(path, descriptor, value);
      return value;

    case "float":
      if (typeof value === "bigint") return Number(value);
      if (typeof value !== "number" || !Number.isFinite(value)) throw mismatch(path, descriptor, value);
      return value;

    case "integer":
      return decodeInteger(descriptor.width, value, path);

    case "literal":
      if (value !== descriptor.value) throw mismatch(path, descriptor, value);
      return value;

    case "enum": {
      if (typeof value !== "string") throw mismatch(path, descriptor, value);
      if (descriptor.values.includes(value)) return value;
      if (!descriptor.open || ctx.strict) throw mismatch(path, descriptor, value);
      ctx.unknownEnumValues.push({ path, value });
      return value;
    }

    case "array": {
      if (!Array.isArray(value)) throw mismatch(path, descriptor, value);
      const items = value.map((item: unknown, i) => decodeValue(ctx, descriptor.items, item, indexPath(path, i)));
      return Object.freeze(items);
    }

    case "oneOf": {
      const alternative = selectAlternative(descriptor.members, value);
      if (alternative === undefined) throw mismatch(path, descriptor, value);
      return decodeValue(ctx, alternative, value, path);
    }

    case "ref": {
      const definition = ctx.schema.lookup(descriptor.name);
      if (definition === undefined) {
        // build() rejects dangling references; reaching this means a foreign descriptor.
        throw new TypeMismatchError(path, descriptor.name, "unregistered type");
      }
      return definition.kind === "entity"
        ? decodeEntity(ctx, definition, value, path)
        : decodeVariant(ctx, definition, value, path);
    }
  }
}

function decodeEntity(
  ctx: DecodeContext,
  definition: EntityDefinition,
  value: unknown,
  path: FieldPath,
): Readonly<Record<string, unknown>> {
  if (!isRecord(value)) throw new TypeMismatchError(path, definition.name, describeValue(value));

  const out: Record<string, unknown> = {};
  for (const field of definition.fields) {
    const raw = value[field.name];
    const fieldPath = childPath(path, field.name);

    // null is treated as absent, as the Bot API never distinguishes the two.
    if (raw === undefined || raw === null) {
      if (field.required) throw new MissingRequiredFieldError(fieldPath);
      continue;
    }
    out[field.name] = decodeValue(ctx, field.descriptor, raw, fieldPath);
  }

  // Undeclared keys count even when null: they are drift all the same.
  for (const [key, raw] of Object.entries(value)) {
    if (definition.fieldIndex.has(key) || raw === undefined) continue;
    const fieldPath = childPath(path, key);
    if (ctx.strict) throw new UnknownFieldError(fieldPath, key);
    ctx.unknownFields.push({
      path: fieldPath,
      entityPath: path,
      key,
      value: toDocumentValue(raw, fieldPath),
    });
  }

  return Object.freeze(out);
}

function decodeVariant(
  ctx: DecodeContext,
  definition: VariantDefinition,
  value: unknown,
  path: FieldPath,
): Readonly<{ kind: string; value: unknown }> {
  if (!isRecord(value)) throw new TypeMismatchError(path, definition.name, describeValue(value));

  const member = resolveVariant(ctx.schema, definition, value, path);
  return Object.freeze({
    kind: member.name,
    value: decodeEntity(ctx, member, value, path),
  });
}

function decodeInteger(width: IntegerWidth, value: unknown, path: FieldPath): number | bigint {
  let integer: bigint;
  if (typeof value === "bigint") {
    integer = value;
  } else if (typeof value === "number" && Number.isSafeInteger(value)) {
    integer = BigInt(value);
  } else if (typeof value === "number" && Number.isInteger(value)) {
    // Already rounded by whoever parsed it; the exact value is gone.
    throw new TypeMismatchError(path, width, `imprecise integer ${value}`);
  } else {
    throw new TypeMismatchError(path, width, describeValue(value));
  }

  switch (width) {
    case "int32":
      if (integer < BigInt(INT32_MIN) || integer > BigInt(INT32_MAX)) {
        throw new IntegerOutOfRangeError(path, integer, width);
      }
      return Number(integer);
    case "int64":
      if (integer < INT64_MIN || integer > INT64_MAX) {
        throw new IntegerOutOfRangeError(path, integer, width);
      }
      return integer;
    case "time":
      if (integer < 0n || integer > BigInt(Number.MAX_SAFE_INTEGER)) {
        throw new IntegerOutOfRangeError(path, integer, width);
      }
      return Number(integer);
  }
}

/**
 * Copy an arbitrary input value into a frozen document tree.
 * @throws TypeMismatchError for values JSON cannot carry
 */
export function toDocumentValue(value: unknown, path: FieldPath): DocumentValue {
  if (
    value === null ||
    typeof value === "string" ||
    typeof value === "boolean" ||
    typeof value === "bigint" ||
    (typeof value === "number" && Number.isFinite(value))
  ) {
    return value;
  }
  if (Array.isArray(value)) {
    return Object.freeze(value.map((item: unknown, i) => toDocumentValue(item, indexPath(path, i))));
  }
  if (isRecord(value)) {
    const out: Record<string, DocumentValue> = {};
    for (const [key, item] of Object.entries(value)) {
      out[key] = toDocumentValue(item, childPath(path, key));
    }
    return Object.freeze(out);
  }
  throw new TypeMismatchError(path, "JSON value", describeValue(value));
}

function mismatch(path: FieldPath, descriptor: TypeDescriptor, value: unknown): TypeMismatchError {
  // Quote the offending string where the field expects specific strings.
  const quote = typeof value === "string" && (descriptor.kind === "literal" || descriptor.kind === "enum");
  const actual = quote ? JSON.stringify(value) : describeValue(value);
  return new TypeMismatchError(path, describeDescriptor(descriptor), actual);
}
