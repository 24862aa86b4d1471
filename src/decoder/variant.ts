/**
 * Variant-group resolution.
 *
 * The Bot API sends no tag for most sum types, so a member is chosen by the
 * shape of the input:
 *
 *   1. A member is a candidate when all of its required fields are present
 *      and every present field it declares has a compatible shape.
 *   2. A single candidate wins.
 *   3. Among several, the one whose required-field set strictly contains
 *      every other candidate's wins (most specific).
 *   4. Anything else is an error. Declaration order never breaks a tie.
 */

import {
  selectAlternative,
  type EntityDefinition,
  type SchemaTable,
  type TypeDescriptor,
  type VariantDefinition,
} from "../schema/fields.js";
import { AmbiguousVariantError, NoMatchingVariantError } from "../shared/errors.js";
import type { FieldPath } from "../shared/types.js";
import { isRecord } from "../shared/utils.js";

export function resolveVariant(
  schema: SchemaTable,
  group: VariantDefinition,
  value: Readonly<Record<string, unknown>>,
  path: FieldPath,
): EntityDefinition {
  const present = presentFields(value);
  const candidates = group.members
    .map((name) => schema.entity(name))
    .filter((member) => isCandidate(member, value, present));

  const [only] = candidates;
  if (only !== undefined && candidates.length === 1) return only;

  if (candidates.length === 0) {
    throw new NoMatchingVariantError(path, group.name, [...present].sort());
  }

  const winner = mostSpecific(candidates);
  if (winner === undefined) {
    throw new AmbiguousVariantError(
      path,
      group.name,
      candidates.map((c) => c.name),
    );
  }
  return winner;
}

/** Keys whose value is neither null nor undefined. */
export function presentFields(value: Readonly<Record<string, unknown>>): Set<string> {
  const present = new Set<string>();
  for (const [key, item] of Object.entries(value)) {
    if (item !== null && item !== undefined) present.add(key);
  }
  return present;
}

function isCandidate(
  member: EntityDefinition,
  value: Readonly<Record<string, unknown>>,
  present: ReadonlySet<string>,
): boolean {
  for (const name of member.requiredFields) {
    if (!present.has(name)) return false;
  }
  for (const field of member.fields) {
    if (present.has(field.name) && !isCompatible(field.descriptor, value[field.name])) return false;
  }
  return true;
}

/**
 * Shallow shape check. Integer range is deliberately not part of it:
 * an out-of-range id still selects its member and then fails to decode
 * with a precise error.
 */
export function isCompatible(descriptor: TypeDescriptor, value: unknown): boolean {
  switch (descriptor.kind) {
    case "string":
      return typeof value === "string";
    case "boolean":
      return typeof value === "boolean";
    case "float":
      return typeof value === "number" || typeof value === "bigint";
    case "integer":
      return typeof value === "bigint" || (typeof value === "number" && Number.isInteger(value));
    case "literal":
      return value === descriptor.value;
    case "enum":
      return typeof value === "string" && (descriptor.open || descriptor.values.includes(value));
    case "ref":
      return isRecord(value);
    case "array":
      return Array.isArray(value) && value.every((item: unknown) => isCompatible(descriptor.items, item));
    case "oneOf": {
      const alternative = selectAlternative(descriptor.members, value);
      return alternative !== undefined && isCompatible(alternative, value);
    }
  }
}

function mostSpecific(candidates: readonly EntityDefinition[]): EntityDefinition | undefined {
  return candidates.find((candidate) =>
    candidates.every(
      (other) => other === candidate || isStrictSuperset(candidate.requiredFields, other.requiredFields),
    ),
  );
}

function isStrictSuperset(outer: ReadonlySet<string>, inner: ReadonlySet<string>): boolean {
  if (outer.size <= inner.size) return false;
  for (const name of inner) {
    if (!outer.has(name)) return false;
  }
  return true;
}
