/**
 * Tree Nodes
 *
 * A TreeNode is a live instance of one EntityDescriptor. Each declared
 * field holds a scalar, a nested node, a list of nodes/scalars, a string
 * map, or null when absent. Optional containers start out empty rather
 * than null; the two states are kept apart so the type checker can tell
 * "unset" from "nulled container".
 *
 * Ownership is exclusive: a node accepted through set/append belongs to
 * exactly one parent and can never contain itself.
 */

import type { EntityDescriptor, FieldDescriptor } from "./descriptor.js";
import {
  AbsentValueError,
  InvalidArgumentError,
  OwnershipError,
  UnexpectedValueError,
  UnknownFieldError,
} from "./errors.js";
import type { Scalar } from "./types.js";

export type StringMap = Record<string, Scalar>;
export type ListValue = Array<TreeNode | Scalar>;
export type FieldValue = Scalar | TreeNode | ListValue | StringMap | null;
export type FieldInit = Record<string, FieldValue | undefined>;

export function isScalar(value: unknown): value is Scalar {
  return (
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  );
}

export function isStringMap(value: unknown): value is StringMap {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof TreeNode)
  );
}

/** Short human name for the runtime kind of a value. */
export function describeValue(value: unknown): string {
  if (value === null || value === undefined) return "null";
  if (value instanceof TreeNode) return value.descriptor.name;
  if (Array.isArray(value)) return "list";
  if (typeof value === "number") {
    return Number.isInteger(value) ? "integer" : "number";
  }
  if (typeof value === "object") return "dict";
  return typeof value;
}

function initialValue(field: FieldDescriptor): FieldValue {
  if (field.required) return null;
  switch (field.kind.type) {
    case "list":
      return [];
    case "map":
      return {};
    default:
      return null;
  }
}

function nodesOf(value: FieldValue): TreeNode[] {
  if (value instanceof TreeNode) return [value];
  if (Array.isArray(value)) {
    return value.filter((item): item is TreeNode => item instanceof TreeNode);
  }
  return [];
}

function copyValue(value: FieldValue): FieldValue {
  if (value instanceof TreeNode) return value.dup();
  if (Array.isArray(value)) {
    return value.map((item) => (item instanceof TreeNode ? item.dup() : item));
  }
  if (isStringMap(value)) return { ...value };
  return value;
}

export class TreeNode {
  readonly descriptor: EntityDescriptor;
  private readonly values = new Map<string, FieldValue>();
  private owner: TreeNode | null = null;

  constructor(descriptor: EntityDescriptor, init: FieldInit = {}) {
    this.descriptor = descriptor;
    for (const field of descriptor.fields) {
      this.values.set(
        field.name,
        descriptor.defaultFor(field.name) ?? initialValue(field)
      );
    }
    for (const [name, value] of Object.entries(init)) {
      if (value !== undefined) this.set(name, value);
    }
  }

  get parent(): TreeNode | null {
    return this.owner;
  }

  get(name: string): FieldValue {
    this.requireField(name);
    return this.values.get(name) ?? null;
  }

  set(name: string, value: FieldValue): this {
    this.requireField(name);
    if (value === undefined) {
      throw new InvalidArgumentError(
        `Cannot set "${name}" to undefined; use null for an absent value`,
        name
      );
    }
    const replaced = nodesOf(this.values.get(name) ?? null);
    const next = this.prepare(name, value, new Set(replaced));
    for (const node of replaced) {
      node.owner = null;
    }
    for (const node of nodesOf(next)) {
      node.owner = this;
    }
    this.values.set(name, next);
    return this;
  }

  unset(name: string): this {
    return this.set(name, null);
  }

  /** Append to a list field, adopting any nodes. Creates the list if absent. */
  append(name: string, ...items: Array<TreeNode | Scalar>): this {
    const current = this.get(name);
    if (current !== null && !Array.isArray(current)) {
      throw new UnexpectedValueError("list", describeValue(current), [name]);
    }
    // nodes already in the list are not being replaced
    const prepared = this.prepare(name, items, new Set());
    const added = Array.isArray(prepared) ? prepared : [];
    for (const node of nodesOf(added)) {
      node.owner = this;
    }
    if (current === null) {
      this.values.set(name, added);
    } else {
      current.push(...added);
    }
    return this;
  }

  isSet(name: string): boolean {
    return this.get(name) !== null;
  }

  child(name: string): TreeNode {
    const value = this.present(name);
    if (!(value instanceof TreeNode)) {
      throw new UnexpectedValueError("entity", describeValue(value), [name]);
    }
    return value;
  }

  /** The live list stored in a field. */
  list(name: string): ListValue {
    const value = this.present(name);
    if (!Array.isArray(value)) {
      throw new UnexpectedValueError("list", describeValue(value), [name]);
    }
    return value;
  }

  /** The node elements of a list field, as a new array. */
  children(name: string): TreeNode[] {
    return this.list(name).map((item, i) => {
      if (!(item instanceof TreeNode)) {
        throw new UnexpectedValueError("entity", describeValue(item), [name, i]);
      }
      return item;
    });
  }

  /** The live map stored in a field. */
  map(name: string): StringMap {
    const value = this.present(name);
    if (!isStringMap(value)) {
      throw new UnexpectedValueError("dict", describeValue(value), [name]);
    }
    return value;
  }

  scalar(name: string): Scalar | null {
    const value = this.get(name);
    if (value !== null && !isScalar(value)) {
      throw new UnexpectedValueError("scalar", describeValue(value), [name]);
    }
    return value;
  }

  /** Declared fields with their current values, in descriptor order. */
  entries(): Array<[FieldDescriptor, FieldValue]> {
    return this.descriptor.fields.map((field) => [
      field,
      this.values.get(field.name) ?? null,
    ]);
  }

  /** Deep copy sharing nothing with this node. */
  dup(): TreeNode {
    const copy = new TreeNode(this.descriptor);
    for (const [field, value] of this.entries()) {
      copy.set(field.name, copyValue(value));
    }
    return copy;
  }

  equals(other: unknown): boolean {
    return other instanceof TreeNode && valuesEqual(this, other);
  }

  toString(): string {
    const occupied = this.entries().filter(([, value]) => value !== null);
    return `TreeNode(${this.descriptor.key}, ${occupied.length} fields set)`;
  }

  private requireField(name: string): void {
    if (!this.descriptor.has(name)) {
      throw new UnknownFieldError(name, [name], this.descriptor.key);
    }
  }

  private present(name: string): FieldValue {
    const value = this.get(name);
    if (value === null) {
      throw new AbsentValueError([name]);
    }
    return value;
  }

  /**
   * Validate and copy an incoming value. `replacing` holds the nodes the
   * field gives up; those are the only nodes this node may re-adopt.
   */
  private prepare(
    name: string,
    value: FieldValue,
    replacing: ReadonlySet<TreeNode>
  ): FieldValue {
    if (value instanceof TreeNode) {
      this.checkClaim(value, replacing);
      return value;
    }
    if (Array.isArray(value)) {
      const seen = new Set<TreeNode>();
      value.forEach((item, i) => {
        if (item === null || item === undefined) {
          throw new InvalidArgumentError(
            `List field "${name}" cannot hold an absent element (index ${i})`,
            name
          );
        }
        if (item instanceof TreeNode) {
          if (seen.has(item)) {
            throw new OwnershipError(
              `${item.descriptor.key} node appears more than once in "${name}" (index ${i}); dup() it first`
            );
          }
          seen.add(item);
          this.checkClaim(item, replacing);
        }
      });
      return [...value];
    }
    if (isStringMap(value)) {
      for (const [key, item] of Object.entries(value)) {
        if (item === null || item === undefined) {
          throw new InvalidArgumentError(
            `Map field "${name}" cannot hold an absent value (key "${key}")`,
            name
          );
        }
      }
      return { ...value };
    }
    return value;
  }

  private checkClaim(child: TreeNode, replacing: ReadonlySet<TreeNode>): void {
    if (child.owner === this && !replacing.has(child)) {
      throw new OwnershipError(
        `${child.descriptor.key} node is already held by this ${this.descriptor.key} node; dup() it first`
      );
    }
    if (child.owner !== null && child.owner !== this) {
      throw new OwnershipError(
        `${child.descriptor.key} node already belongs to a ${child.owner.descriptor.key} node; dup() it first`
      );
    }
    for (let node: TreeNode | null = this; node; node = node.owner) {
      if (node === child) {
        throw new OwnershipError(
          `Adopting this ${child.descriptor.key} node would create a cycle`
        );
      }
    }
  }
}

/** Own-property lookup; inherited names such as `constructor` are not keys. */
export function hasKey(map: StringMap, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(map, key);
}

/** Recursive, kind-aware equality of two field values. */
export function valuesEqual(a: FieldValue, b: FieldValue): boolean {
  if (a === b) return true;
  if (a instanceof TreeNode || b instanceof TreeNode) {
    if (!(a instanceof TreeNode && b instanceof TreeNode)) return false;
    if (a.descriptor.key !== b.descriptor.key) return false;
    return a.descriptor.fields.every((field) =>
      valuesEqual(a.get(field.name), b.get(field.name))
    );
  }
  if (Array.isArray(a) || Array.isArray(b)) {
    if (!(Array.isArray(a) && Array.isArray(b))) return false;
    return (
      a.length === b.length && a.every((item, i) => valuesEqual(item, b[i]))
    );
  }
  if (isStringMap(a) && isStringMap(b)) {
    const keys = Object.keys(a);
    return (
      keys.length === Object.keys(b).length &&
      keys.every((key) => hasKey(b, key) && a[key] === b[key])
    );
  }
  return false;
}
