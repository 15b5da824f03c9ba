/**
 * Entity Descriptors
 *
 * Immutable per-kind metadata produced by the schema compiler. Every tree
 * node carries one; all generic operations dispatch over it.
 */

import type { FieldKind, ItemKind } from "./types.js";

export interface FieldDescriptor {
  readonly name: string;
  readonly kind: FieldKind;
  readonly required: boolean;
  readonly description?: string;
}

export interface EntityDescriptorInit {
  name: string;
  version: string;
  group?: string;
  document?: boolean;
  description?: string;
  required: Array<{ name: string; kind: FieldKind; description?: string }>;
  optional: Array<{ name: string; kind: FieldKind; description?: string }>;
}

export class EntityDescriptor {
  readonly key: string;
  readonly name: string;
  readonly version: string;
  readonly group?: string;
  readonly document: boolean;
  readonly description?: string;
  readonly required: readonly FieldDescriptor[];
  readonly optional: readonly FieldDescriptor[];
  /** Required fields first, then optional, each in declared order. */
  readonly fields: readonly FieldDescriptor[];
  private readonly byName: ReadonlyMap<string, FieldDescriptor>;

  constructor(init: EntityDescriptorInit) {
    this.key = descriptorKey(init.version, init.name);
    this.name = init.name;
    this.version = init.version;
    this.group = init.group;
    this.document = init.document ?? false;
    this.description = init.description;
    this.required = Object.freeze(
      init.required.map((f) => Object.freeze({ ...f, required: true }))
    );
    this.optional = Object.freeze(
      init.optional.map((f) => Object.freeze({ ...f, required: false }))
    );
    this.fields = Object.freeze([...this.required, ...this.optional]);
    this.byName = new Map(this.fields.map((f) => [f.name, f]));
    Object.freeze(this);
  }

  /** The `apiVersion` value documents of this kind carry. */
  get apiVersion(): string {
    return this.group ? `${this.group}/${this.version}` : this.version;
  }

  field(name: string): FieldDescriptor | undefined {
    return this.byName.get(name);
  }

  has(name: string): boolean {
    return this.byName.has(name);
  }

  /**
   * Default a new node gives the field: a document's `apiVersion` and
   * `kind` markers. Undefined for every other field.
   */
  defaultFor(name: string): string | undefined {
    if (!this.document || !this.has(name)) return undefined;
    if (name === "apiVersion") return this.apiVersion;
    if (name === "kind") return this.name;
    return undefined;
  }

  toString(): string {
    return this.key;
  }
}

export function descriptorKey(version: string, name: string): string {
  return `${version}/${name}`;
}

/** Kind name part of a descriptor key: `v1/ObjectMeta` → `ObjectMeta`. */
export function refName(ref: string): string {
  return ref.slice(ref.lastIndexOf("/") + 1);
}

export function isContainerKind(kind: FieldKind): boolean {
  return kind.type === "list" || kind.type === "map";
}

export function describeKind(kind: FieldKind | ItemKind): string {
  switch (kind.type) {
    case "scalar":
      return kind.scalar;
    case "object":
      return refName(kind.ref);
    case "list":
      return `list of ${describeKind(kind.items)}`;
    case "map":
      return "dict of string";
  }
}
