/**
 * Field type descriptors.
 *
 * A descriptor is plain data the decoder interprets at run time. The
 * `FieldType<T>` wrapper carries the TypeScript type a descriptor decodes to,
 * so a registry definition is checked against its entity interface at
 * compile time.
 */

import type { Variant } from "../shared/types.js";

export type IntegerWidth = "int32" | "int64" | "time";

export type TypeDescriptor =
  | { readonly kind: "string" }
  | { readonly kind: "boolean" }
  | { readonly kind: "float" }
  | { readonly kind: "integer"; readonly width: IntegerWidth }
  | { readonly kind: "literal"; readonly value: string }
  | { readonly kind: "enum"; readonly values: readonly string[]; readonly open: boolean }
  | { readonly kind: "ref"; readonly name: string }
  | { readonly kind: "array"; readonly items: TypeDescriptor }
  /** Untagged scalar alternatives, e.g. a chat id or a `@username`. */
  | { readonly kind: "oneOf"; readonly members: readonly TypeDescriptor[] };

export interface FieldType<T> {
  readonly descriptor: TypeDescriptor;
  /** Phantom: never set at run time. */
  readonly _output?: T;
}

export interface FieldSpec<T, R extends boolean> {
  readonly type: FieldType<T>;
  readonly required: R;
}

/** An enum that also admits values added upstream after this schema was written. */
export type OpenEnum<V extends string> = V | (string & {});

/**
 * The field table an entity with TypeScript shape `T` must declare:
 * one entry per property, required exactly when the property is.
 */
export type FieldMap<T> = {
  readonly [K in keyof T]-?: undefined extends T[K]
    ? FieldSpec<Exclude<T[K], undefined>, false>
    : FieldSpec<T[K], true>;
};

/** Member names of a variant-group type. */
export type VariantKinds<T> = T extends Variant<infer K, unknown> ? K : never;

export interface FieldDefinition {
  readonly name: string;
  readonly descriptor: TypeDescriptor;
  readonly required: boolean;
}

export interface EntityDefinition {
  readonly kind: "entity";
  readonly name: string;
  readonly fields: readonly FieldDefinition[];
  readonly fieldIndex: ReadonlyMap<string, FieldDefinition>;
  readonly requiredFields: ReadonlySet<string>;
}

export interface VariantDefinition {
  readonly kind: "variant";
  readonly name: string;
  readonly members: readonly string[];
}

export type TypeDefinition = EntityDefinition | VariantDefinition;

/** Read-only view of a registry's definitions, as the decoder sees it. */
export interface SchemaTable {
  lookup(name: string): TypeDefinition | undefined;
  entity(name: string): EntityDefinition;
}

export function required<T>(type: FieldType<T>): FieldSpec<T, true> {
  return { type, required: true };
}

export function optional<T>(type: FieldType<T>): FieldSpec<T, false> {
  return { type, required: false };
}

function fieldType<T>(descriptor: TypeDescriptor): FieldType<T> {
  return { descriptor };
}

/** Human-readable name of a descriptor, used in `expected ...` messages. */
export function describeDescriptor(descriptor: TypeDescriptor): string {
  switch (descriptor.kind) {
    case "integer":
      return descriptor.width;
    case "literal":
      return JSON.stringify(descriptor.value);
    case "enum":
      return `one of ${descriptor.values.map((v) => JSON.stringify(v)).join(" | ")}`;
    case "ref":
      return descriptor.name;
    case "array":
      return `array of ${describeDescriptor(descriptor.items)}`;
    case "oneOf":
      return descriptor.members.map(describeDescriptor).join(" | ");
    default:
      return descriptor.kind;
  }
}

export type ScalarKind = "string" | "boolean" | "number";

/** The JSON kind a scalar descriptor accepts; undefined for refs, arrays and unions. */
export function scalarKind(descriptor: TypeDescriptor): ScalarKind | undefined {
  switch (descriptor.kind) {
    case "string":
    case "literal":
    case "enum":
      return "string";
    case "boolean":
      return "boolean";
    case "float":
    case "integer":
      return "number";
    default:
      return undefined;
  }
}

/** The `oneOf` alternative matching the JSON kind of `value`. */
export function selectAlternative(members: readonly TypeDescriptor[], value: unknown): TypeDescriptor | undefined {
  const kind = typeof value === "bigint" ? "number" : typeof value;
  return members.find((member) => scalarKind(member) === kind);
}

/**
 * Field type constructors bound to a type map `M` (type name → TypeScript
 * type), so `ref("User")` is typed as `M["User"]`.
 *
 * @example
 * ```typescript
 * const t = fieldTypes<TelegramTypes>();
 * const from = optional(t.ref("User"));
 * ```
 */
export function fieldTypes<M>() {
  return {
    string: (): FieldType<string> => fieldType({ kind: "string" }),
    boolean: (): FieldType<boolean> => fieldType({ kind: "boolean" }),
    float: (): FieldType<number> => fieldType({ kind: "float" }),
    int32: (): FieldType<number> => fieldType({ kind: "integer", width: "int32" }),
    int64: (): FieldType<bigint> => fieldType({ kind: "integer", width: "int64" }),
    /** UNIX time in seconds. */
    time: (): FieldType<number> => fieldType({ kind: "integer", width: "time" }),
    literal: <L extends string>(value: L): FieldType<L> => fieldType({ kind: "literal", value }),
    enumOf: <V extends string>(values: readonly V[]): FieldType<V> =>
      fieldType({ kind: "enum", values: [...values], open: false }),
    openEnum: <V extends string>(values: readonly V[]): FieldType<OpenEnum<V>> =>
      fieldType({ kind: "enum", values: [...values], open: true }),
    ref: <K extends keyof M & string>(name: K): FieldType<M[K]> => fieldType({ kind: "ref", name }),
    array: <T>(items: FieldType<T>): FieldType<readonly T[]> =>
      fieldType({ kind: "array", items: items.descriptor }),
    /** The first alternative whose JSON kind matches the input decodes it. Scalars only. */
    oneOf: <A, B>(first: FieldType<A>, second: FieldType<B>): FieldType<A | B> =>
      fieldType({ kind: "oneOf", members: [first.descriptor, second.descriptor] }),
  };
}
