/**
 * Type Checker
 *
 * Walks a tree comparing occupied fields against their declared kinds.
 * Never throws for conformance problems; returns warnings instead and
 * leaves the tree usable.
 */

import { describeKind, isContainerKind } from "./descriptor.js";
import type { EntityDescriptor, FieldDescriptor } from "./descriptor.js";
import { TreeNode, describeValue, isScalar, isStringMap } from "./node.js";
import type { FieldValue } from "./node.js";
import type { ItemKind, PathSegment, ScalarKind } from "./types.js";

export interface TypeWarning {
  descriptor: EntityDescriptor;
  field: string;
  path: PathSegment[];
  message: string;
}

function scalarMatches(kind: ScalarKind, value: unknown): boolean {
  switch (kind) {
    case "string":
      return typeof value === "string";
    case "boolean":
      return typeof value === "boolean";
    case "integer":
      return typeof value === "number" && Number.isInteger(value);
    case "number":
      return typeof value === "number";
  }
}

export class TypeChecker {
  check(root: TreeNode): TypeWarning[] {
    const warnings: TypeWarning[] = [];
    this.checkNode(root, [], warnings);
    return warnings;
  }

  private checkNode(
    node: TreeNode,
    base: PathSegment[],
    warnings: TypeWarning[]
  ): void {
    for (const [field, value] of node.entries()) {
      const path = [...base, field.name];
      const warn = (message: string, at: PathSegment[] = path): void => {
        warnings.push({
          descriptor: node.descriptor,
          field: field.name,
          path: at,
          message,
        });
      };

      if (value === null) {
        this.checkAbsent(field, warn);
        continue;
      }

      switch (field.kind.type) {
        case "scalar":
          if (!scalarMatches(field.kind.scalar, value)) {
            warn(
              `Attribute ${field.name} was ${describeValue(value)} but expecting ${field.kind.scalar}`
            );
          }
          break;

        case "object":
          if (this.matchesRef(field.kind.ref, value)) {
            this.checkNode(value, path, warnings);
          } else {
            warn(
              `Attribute ${field.name} was ${describeValue(value)} but expecting ${describeKind(field.kind)}`
            );
          }
          break;

        case "list":
          this.checkList(field, field.kind.items, value, path, warnings, warn);
          break;

        case "map":
          this.checkMap(field, value, path, warn);
          break;
      }
    }
  }

  private checkAbsent(
    field: FieldDescriptor,
    warn: (message: string) => void
  ): void {
    if (field.required) {
      warn(
        `Attribute ${field.name} was absent but should have been ${describeKind(field.kind)}`
      );
    } else if (isContainerKind(field.kind)) {
      const empty = field.kind.type === "map" ? "empty dict" : "empty list";
      warn(
        `Attribute ${field.name} was null; an unset container should be an ${empty}`
      );
    }
  }

  private checkList(
    field: FieldDescriptor,
    items: ItemKind,
    value: FieldValue,
    path: PathSegment[],
    warnings: TypeWarning[],
    warn: (message: string, at?: PathSegment[]) => void
  ): void {
    if (!Array.isArray(value)) {
      warn(
        `Attribute ${field.name} was ${describeValue(value)} but expecting ${describeKind(field.kind)}`
      );
      return;
    }
    if (field.required && value.length === 0) {
      warn(`Required attribute ${field.name} has no elements`);
      return;
    }

    value.forEach((item, i) => {
      const itemPath = [...path, i];
      if (items.type === "object") {
        if (this.matchesRef(items.ref, item)) {
          this.checkNode(item, itemPath, warnings);
        } else {
          warn(
            `Element ${i} of ${field.name} was ${describeValue(item)} but expecting ${describeKind(items)}`,
            itemPath
          );
        }
      } else if (!scalarMatches(items.scalar, item)) {
        warn(
          `Element ${i} of ${field.name} was ${describeValue(item)} but expecting ${items.scalar}`,
          itemPath
        );
      }
    });
  }

  private checkMap(
    field: FieldDescriptor,
    value: FieldValue,
    path: PathSegment[],
    warn: (message: string, at?: PathSegment[]) => void
  ): void {
    if (!isStringMap(value)) {
      warn(
        `Attribute ${field.name} was ${describeValue(value)} but expecting ${describeKind(field.kind)}`
      );
      return;
    }
    const keys = Object.keys(value);
    if (field.required && keys.length === 0) {
      warn(`Required attribute ${field.name} has no entries`);
      return;
    }
    for (const key of keys) {
      if (!isScalar(value[key])) {
        warn(
          `Entry ${key} of ${field.name} was ${describeValue(value[key])} but expecting a scalar`,
          [...path, key]
        );
      }
    }
  }

  private matchesRef(ref: string, value: unknown): value is TreeNode {
    return value instanceof TreeNode && value.descriptor.key === ref;
  }
}

export function typeWarnings(root: TreeNode): TypeWarning[] {
  return new TypeChecker().check(root);
}
