/**
 * Type Registry.
 *
 * Built once through `RegistryBuilder`, validated, then frozen. A registry
 * has no mutation API: it is shared by reference across every decode call.
 *
 * @example
 * ```typescript
 * const registry = new RegistryBuilder<Types>()
 *   .entity("User", { id: required(t.int64()), name: optional(t.string()) })
 *   .build();
 *
 * const result = registry.decode(document, "User");
 * if (result.ok) console.log(result.value.id);
 * ```
 */

import { decodeDocument } from "../decoder/decode.js";
import { encodeDocument } from "../decoder/encode.js";
import { MalformedInputError, RegistryError } from "../shared/errors.js";
import type { DecodeOptions, DecodeResult, DocumentValue, EncodeOptions } from "../shared/types.js";
import { isRecord } from "../shared/utils.js";
import { parseDocument } from "../shared/wire.js";
import {
  scalarKind,
  type EntityDefinition,
  type FieldDefinition,
  type FieldMap,
  type FieldType,
  type ScalarKind,
  type SchemaTable,
  type TypeDefinition,
  type TypeDescriptor,
  type VariantDefinition,
  type VariantKinds,
} from "./fields.js";

export class RegistryBuilder<M> {
  private readonly definitions = new Map<string, TypeDefinition>();

  /** Declare an entity; `fields` must list every property of `M[K]`. */
  entity<K extends keyof M & string>(name: K, fields: FieldMap<M[K]>): this {
    this.assertFree(name);

    const list: FieldDefinition[] = [];
    for (const [fieldName, spec] of Object.entries(fields)) {
      const candidate: unknown = spec;
      if (!isFieldSpec(candidate)) {
        throw new RegistryError(`${name}.${fieldName} is not a field spec`, name);
      }
      list.push(
        Object.freeze({
          name: fieldName,
          descriptor: candidate.type.descriptor,
          required: candidate.required,
        }),
      );
    }

    const definition: EntityDefinition = Object.freeze({
      kind: "entity" as const,
      name,
      fields: Object.freeze(list),
      fieldIndex: new Map(list.map((f) => [f.name, f])),
      requiredFields: new Set(list.filter((f) => f.required).map((f) => f.name)),
    });
    this.definitions.set(name, definition);
    return this;
  }

  /** Declare a variant group whose members are entities resolved by shape. */
  variant<K extends keyof M & string>(name: K, members: readonly VariantKinds<M[K]>[]): this {
    this.assertFree(name);

    const definition: VariantDefinition = Object.freeze({
      kind: "variant" as const,
      name,
      members: Object.freeze([...members]),
    });
    this.definitions.set(name, definition);
    return this;
  }

  /**
   * Validate every definition and produce the immutable registry.
   * @throws RegistryError on dangling references, empty or duplicate variant members, overlapping alternatives
   */
  build(): TypeRegistry<M> {
    for (const definition of this.definitions.values()) {
      if (definition.kind === "entity") {
        for (const field of definition.fields) {
          this.assertDescriptor(field.descriptor, `${definition.name}.${field.name}`, definition.name);
        }
        continue;
      }

      if (definition.members.length === 0) {
        throw new RegistryError(`Variant group ${definition.name} has no members`, definition.name);
      }
      const seen = new Set<string>();
      for (const member of definition.members) {
        if (seen.has(member)) {
          throw new RegistryError(`Variant group ${definition.name} lists ${member} twice`, definition.name);
        }
        seen.add(member);
        const target = this.definitions.get(member);
        if (target?.kind !== "entity") {
          throw new RegistryError(
            `Variant group ${definition.name} member ${member} is not a registered entity`,
            definition.name,
          );
        }
      }
    }
    return new TypeRegistry<M>(new Map(this.definitions));
  }

  private assertFree(name: string): void {
    if (this.definitions.has(name)) {
      throw new RegistryError(`Type ${name} is already defined`, name);
    }
  }

  private assertDescriptor(descriptor: TypeDescriptor, where: string, owner: string): void {
    if (descriptor.kind === "array") {
      this.assertDescriptor(descriptor.items, `${where}[]`, owner);
    } else if (descriptor.kind === "ref" && !this.definitions.has(descriptor.name)) {
      throw new RegistryError(`${where} references unknown type ${descriptor.name}`, owner);
    } else if (descriptor.kind === "enum" && descriptor.values.length === 0) {
      throw new RegistryError(`${where} declares an empty enum`, owner);
    } else if (descriptor.kind === "oneOf") {
      // Alternatives are told apart by JSON kind alone.
      const kinds = new Set<ScalarKind>();
      for (const member of descriptor.members) {
        const kind = scalarKind(member);
        if (kind === undefined) {
          throw new RegistryError(`${where} alternatives must be scalars`, owner);
        }
        if (kinds.has(kind)) {
          throw new RegistryError(`${where} has more than one ${kind} alternative`, owner);
        }
        kinds.add(kind);
        this.assertDescriptor(member, where, owner);
      }
    }
  }
}

function isFieldSpec(value: unknown): value is { type: FieldType<unknown>; required: boolean } {
  if (!isRecord(value) || typeof value["required"] !== "boolean") return false;
  const type = value["type"];
  return isRecord(type) && isRecord(type["descriptor"]);
}

export class TypeRegistry<M> implements SchemaTable {
  private readonly definitions: ReadonlyMap<string, TypeDefinition>;

  constructor(definitions: ReadonlyMap<string, TypeDefinition>) {
    this.definitions = definitions;
    Object.freeze(this);
  }

  lookup(name: string): TypeDefinition | undefined {
    return this.definitions.get(name);
  }

  entity(name: string): EntityDefinition {
    const definition = this.definitions.get(name);
    if (definition?.kind !== "entity") {
      throw new RegistryError(`${name} is not a registered entity`, name);
    }
    return definition;
  }

  has(name: string): name is keyof M & string {
    return this.definitions.has(name);
  }

  /** All definitions in declaration order. */
  describe(): readonly TypeDefinition[] {
    return [...this.definitions.values()];
  }

  decode<K extends keyof M & string>(document: unknown, type: K, options?: DecodeOptions): DecodeResult<M[K]> {
    return this.decodeAs<M[K]>(document, { descriptor: { kind: "ref", name: type } }, options);
  }

  /** Decode a root of any field type, e.g. `t.array(t.ref("Update"))`. */
  decodeAs<T>(document: unknown, type: FieldType<T>, options?: DecodeOptions): DecodeResult<T> {
    // Every definition was checked against its interface by FieldMap, so a
    // successful tree has type T.
    return decodeDocument(this, type.descriptor, document, options ?? {}) as DecodeResult<T>;
  }

  /** Parse raw JSON text losslessly, then decode. */
  decodeJson<K extends keyof M & string>(text: string, type: K, options?: DecodeOptions): DecodeResult<M[K]> {
    let document: unknown;
    try {
      document = parseDocument(text);
    } catch (err) {
      return { ok: false, error: new MalformedInputError(err) };
    }
    return this.decode(document, type, options);
  }

  /**
   * Turn a decoded value back into a document.
   * @throws DecodeError when `value` does not match the schema
   */
  encode<K extends keyof M & string>(value: M[K], type: K, options?: EncodeOptions): DocumentValue {
    return this.encodeAs<M[K]>(value, { descriptor: { kind: "ref", name: type } }, options);
  }

  encodeAs<T>(value: T, type: FieldType<T>, options?: EncodeOptions): DocumentValue {
    return encodeDocument(this, type.descriptor, value, options ?? {});
  }
}
