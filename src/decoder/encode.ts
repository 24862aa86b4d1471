/**
 * Encoding: the inverse of decoding.
 *
 * Produces a document that decodes back to an equal value. Variant wrappers
 * are unwrapped, absent optionals stay absent, and unknown fields captured
 * by a previous decode are put back where they were found.
 */

import type { EntityDefinition, SchemaTable, TypeDescriptor } from "../schema/fields.js";
import { describeDescriptor, selectAlternative } from "../schema/fields.js";
import { MissingRequiredFieldError, TypeMismatchError } from "../shared/errors.js";
import type { DocumentValue, EncodeOptions, FieldPath, UnknownField } from "../shared/types.js";
import { childPath, describeValue, indexPath, isRecord } from "../shared/utils.js";

interface EncodeContext {
  readonly schema: SchemaTable;
  readonly unknownByEntity: ReadonlyMap<FieldPath, readonly UnknownField[]>;
}

/**
 * @throws DecodeError when the value does not match the schema
 */
export function encodeDocument(
  schema: SchemaTable,
  descriptor: TypeDescriptor,
  value: unknown,
  options: EncodeOptions,
): DocumentValue {
  const unknownByEntity = new Map<FieldPath, UnknownField[]>();
  for (const field of options.unknownFields ?? []) {
    const list = unknownByEntity.get(field.entityPath) ?? [];
    list.push(field);
    unknownByEntity.set(field.entityPath, list);
  }
  return encodeValue({ schema, unknownByEntity }, descriptor, value, options.path ?? "");
}

function encodeValue(ctx: EncodeContext, descriptor: TypeDescriptor, value: unknown, path: FieldPath): DocumentValue {
  switch (descriptor.kind) {
    case "string":
      if (typeof value !== "string") throw mismatch(path, descriptor, value);
      return value;

    case "literal":
      if (value !== descriptor.value) throw mismatch(path, descriptor, value);
      return descriptor.value;

    case "enum":
      if (typeof value !== "string") throw mismatch(path, descriptor, value);
      if (!descriptor.open && !descriptor.values.includes(value)) throw mismatch(path, descriptor, value);
      return value;

    case "boolean":
      if (typeof value !== "boolean") throw mismatch(path, descriptor, value);
      return value;

    case "float":
    case "integer":
      if (typeof value === "bigint") {
        // Ids that fit a double are written as plain numbers.
        return value >= BigInt(Number.MIN_SAFE_INTEGER) && value <= BigInt(Number.MAX_SAFE_INTEGER)
          ? Number(value)
          : value;
      }
      if (typeof value !== "number") throw mismatch(path, descriptor, value);
      return value;

    case "array":
      if (!Array.isArray(value)) throw mismatch(path, descriptor, value);
      return value.map((item: unknown, i) => encodeValue(ctx, descriptor.items, item, indexPath(path, i)));

    case "oneOf": {
      const alternative = selectAlternative(descriptor.members, value);
      if (alternative === undefined) throw mismatch(path, descriptor, value);
      return encodeValue(ctx, alternative, value, path);
    }

    case "ref": {
      const definition = ctx.schema.lookup(descriptor.name);
      if (definition === undefined) {
        throw new TypeMismatchError(path, descriptor.name, "unregistered type");
      }
      if (definition.kind === "entity") {
        return encodeEntity(ctx, definition, value, path);
      }

      const kind = isRecord(value) ? value["kind"] : undefined;
      if (!isRecord(value) || typeof kind !== "string" || !definition.members.includes(kind)) {
        throw new TypeMismatchError(path, `${definition.name} variant`, describeValue(value));
      }
      return encodeEntity(ctx, ctx.schema.entity(kind), value["value"], path);
    }
  }
}

function encodeEntity(
  ctx: EncodeContext,
  definition: EntityDefinition,
  value: unknown,
  path: FieldPath,
): DocumentValue {
  if (!isRecord(value)) throw new TypeMismatchError(path, definition.name, describeValue(value));

  const out: Record<string, DocumentValue> = {};
  for (const field of definition.fields) {
    const item = value[field.name];
    const fieldPath = childPath(path, field.name);
    if (item === undefined) {
      if (field.required) throw new MissingRequiredFieldError(fieldPath);
      continue;
    }
    out[field.name] = encodeValue(ctx, field.descriptor, item, fieldPath);
  }

  for (const extra of ctx.unknownByEntity.get(path) ?? []) {
    if (!(extra.key in out)) out[extra.key] = extra.value;
  }
  return out;
}

function mismatch(path: FieldPath, descriptor: TypeDescriptor, value: unknown): TypeMismatchError {
  const actual = typeof value === "string" ? JSON.stringify(value) : describeValue(value);
  return new TypeMismatchError(path, describeDescriptor(descriptor), actual);
}
