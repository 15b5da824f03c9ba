/**
 * Generic form: plain nested objects, arrays and scalars, as produced by
 * JSON.parse or a YAML loader.
 */

import { EntityDescriptor } from "../descriptor.js";
import {
  InvalidArgumentError,
  MissingFieldError,
  StructureError,
  UnknownKindError,
} from "../errors.js";
import type { Logger } from "../logger.js";
import { TreeNode, describeValue, isScalar, isStringMap } from "../node.js";
import type { FieldInit, FieldValue, StringMap } from "../node.js";
import type { DescriptorRegistry } from "../registry.js";
import { formatPath } from "../types.js";
import type { FieldKind, ItemKind, PathSegment } from "../types.js";

export type GenericValue =
  | string
  | number
  | boolean
  | null
  | GenericValue[]
  | GenericMap;

export interface GenericMap {
  [key: string]: GenericValue;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Clean generic form of a tree: absent fields and empty optional
 * containers are left out; required containers are kept even when empty.
 * An unset document marker is written as null.
 */
export function toGeneric(node: unknown): GenericMap {
  if (!(node instanceof TreeNode)) {
    throw new InvalidArgumentError(
      `Expected a TreeNode, got ${describeValue(node)}`,
      "node"
    );
  }
  return nodeToGeneric(node);
}

function nodeToGeneric(node: TreeNode): GenericMap {
  const out: GenericMap = {};
  for (const [field, value] of node.entries()) {
    if (value === null) {
      // an unset document marker stays unset on the way back
      if (node.descriptor.defaultFor(field.name) !== undefined) {
        out[field.name] = null;
      }
      continue;
    }
    if (value instanceof TreeNode) {
      out[field.name] = nodeToGeneric(value);
    } else if (Array.isArray(value)) {
      if (value.length === 0 && !field.required) continue;
      out[field.name] = value.map((item) =>
        item instanceof TreeNode ? nodeToGeneric(item) : item
      );
    } else if (isStringMap(value)) {
      if (Object.keys(value).length === 0 && !field.required) continue;
      out[field.name] = { ...value };
    } else {
      out[field.name] = value;
    }
  }
  return out;
}

export class GenericReader {
  constructor(
    private readonly registry: DescriptorRegistry,
    private readonly logger?: Logger
  ) {}

  /**
   * Rebuild a tree. Without a target the descriptor is chosen from the
   * apiVersion/kind markers. Fails fast; never returns a partial tree.
   */
  read(value: unknown, target?: EntityDescriptor | string): TreeNode {
    if (value instanceof TreeNode || !isPlainObject(value)) {
      throw new InvalidArgumentError(
        `Expected a generic mapping, got ${describeValue(value)}`,
        "value"
      );
    }
    return this.build(this.select(value, target), value, []);
  }

  private select(
    value: Record<string, unknown>,
    target: EntityDescriptor | string | undefined
  ): EntityDescriptor {
    if (target instanceof EntityDescriptor) return target;
    if (typeof target === "string") return this.registry.resolve(target);
    if (target !== undefined) {
      throw new InvalidArgumentError(
        "target must be an EntityDescriptor or a descriptor key",
        "target"
      );
    }

    const { apiVersion, kind } = value;
    if (typeof apiVersion !== "string" || typeof kind !== "string") {
      throw new UnknownKindError(
        typeof apiVersion === "string" ? apiVersion : undefined,
        typeof kind === "string" ? kind : undefined
      );
    }
    const descriptor = this.registry.lookup(apiVersion, kind);
    if (!descriptor) {
      throw new UnknownKindError(apiVersion, kind);
    }
    return descriptor;
  }

  private build(
    descriptor: EntityDescriptor,
    raw: Record<string, unknown>,
    path: PathSegment[]
  ): TreeNode {
    const init: FieldInit = {};
    for (const field of descriptor.fields) {
      const fieldPath = [...path, field.name];
      const rawValue = raw[field.name];
      if (rawValue === undefined || rawValue === null) {
        if (field.required) {
          throw new MissingFieldError(descriptor.key, field.name, fieldPath);
        }
        if (rawValue === null && descriptor.defaultFor(field.name) !== undefined) {
          init[field.name] = null;
        }
        continue;
      }
      init[field.name] = this.convert(field.kind, rawValue, fieldPath);
    }

    for (const key of Object.keys(raw)) {
      if (!descriptor.has(key)) {
        this.logger?.debug(
          `Ignoring unknown field "${key}" of ${descriptor.key}`,
          { path: formatPath(path) }
        );
      }
    }

    return new TreeNode(descriptor, init);
  }

  private convert(
    kind: FieldKind | ItemKind,
    raw: unknown,
    path: PathSegment[]
  ): FieldValue {
    switch (kind.type) {
      case "scalar":
        if (!isScalar(raw)) throw this.shapeError(kind.scalar, raw, path);
        return raw;

      case "object":
        if (!isPlainObject(raw)) throw this.shapeError("mapping", raw, path);
        return this.build(this.registry.resolve(kind.ref), raw, path);

      case "list": {
        if (!Array.isArray(raw)) throw this.shapeError("list", raw, path);
        const items = kind.items;
        return raw.map((item: unknown, i) => {
          const itemPath = [...path, i];
          if (items.type === "object") {
            if (!isPlainObject(item)) {
              throw this.shapeError("mapping", item, itemPath);
            }
            return this.build(this.registry.resolve(items.ref), item, itemPath);
          }
          if (!isScalar(item)) throw this.shapeError(items.scalar, item, itemPath);
          return item;
        });
      }

      case "map": {
        if (!isPlainObject(raw)) throw this.shapeError("mapping", raw, path);
        const map: StringMap = {};
        for (const [key, item] of Object.entries(raw)) {
          if (!isScalar(item)) {
            throw this.shapeError("scalar", item, [...path, key]);
          }
          map[key] = item;
        }
        return map;
      }
    }
  }

  private shapeError(
    expected: string,
    actual: unknown,
    path: PathSegment[]
  ): StructureError {
    return new StructureError(
      `Expected ${expected} at ${formatPath(path)}, got ${describeValue(actual)}`,
      path
    );
  }
}
