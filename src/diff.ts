/**
 * Diff Engine
 *
 * Structural comparison of two trees. Depth-first, in descriptor field
 * order; one record per difference found. This is an equality diff, not a
 * minimal edit script: no reordering heuristics, and a length or key-set
 * mismatch stops descent into that container.
 */

import { TreeNode, describeValue, hasKey, isStringMap } from "./node.js";
import type { FieldValue, ListValue, StringMap } from "./node.js";
import { formatPath } from "./types.js";
import type { PathSegment, Scalar } from "./types.js";

export type DiffKind =
  | "incompatible-types"
  | "type-mismatch"
  | "value-mismatch"
  | "length-mismatch"
  | "element-mismatch"
  | "key-mismatch"
  | "item-mismatch";

export interface DiffRecord {
  path: PathSegment[];
  kind: DiffKind;
  report: string;
}

type Category = "absent" | "node" | "list" | "map" | "scalar";

function categoryOf(value: FieldValue): Category {
  if (value === null) return "absent";
  if (value instanceof TreeNode) return "node";
  if (Array.isArray(value)) return "list";
  if (isStringMap(value)) return "map";
  return "scalar";
}

function show(value: FieldValue): string {
  if (value instanceof TreeNode) return value.descriptor.name;
  return JSON.stringify(value) ?? String(value);
}

export class DiffEngine {
  diff(a: TreeNode, b: TreeNode): DiffRecord[] {
    const records: DiffRecord[] = [];
    this.diffNodes(a, b, [], records);
    return records;
  }

  private diffNodes(
    a: TreeNode,
    b: TreeNode,
    path: PathSegment[],
    records: DiffRecord[]
  ): void {
    if (a.descriptor.key !== b.descriptor.key) {
      records.push({
        path,
        kind: "incompatible-types",
        report: `Incompatible types at ${formatPath(path)}: ${a.descriptor.key} vs ${b.descriptor.key}`,
      });
      return;
    }
    for (const field of a.descriptor.fields) {
      this.diffValues(
        a.get(field.name),
        b.get(field.name),
        [...path, field.name],
        records
      );
    }
  }

  private diffValues(
    a: FieldValue,
    b: FieldValue,
    path: PathSegment[],
    records: DiffRecord[]
  ): void {
    const ca = categoryOf(a);
    const cb = categoryOf(b);

    if (ca === "absent" || cb === "absent") {
      if (ca !== cb) {
        records.push({
          path,
          kind: "value-mismatch",
          report: `Value mismatch at ${formatPath(path)}: ${show(a)} vs ${show(b)}`,
        });
      }
      return;
    }

    if (ca !== cb) {
      records.push({
        path,
        kind: "incompatible-types",
        report: `Incompatible types at ${formatPath(path)}: ${describeValue(a)} vs ${describeValue(b)}`,
      });
      return;
    }

    if (a instanceof TreeNode && b instanceof TreeNode) {
      this.diffNodes(a, b, path, records);
    } else if (Array.isArray(a) && Array.isArray(b)) {
      this.diffLists(a, b, path, records);
    } else if (isStringMap(a) && isStringMap(b)) {
      this.diffMaps(a, b, path, records);
    } else if (ca === "scalar") {
      this.diffScalars(a, b, path, records);
    }
  }

  private diffScalars(
    a: FieldValue,
    b: FieldValue,
    path: PathSegment[],
    records: DiffRecord[]
  ): void {
    if (typeof a !== typeof b) {
      records.push({
        path,
        kind: "type-mismatch",
        report: `Type mismatch at ${formatPath(path)}: ${typeof a} vs ${typeof b}`,
      });
    } else if (a !== b) {
      records.push({
        path,
        kind: "value-mismatch",
        report: `Value mismatch at ${formatPath(path)}: ${show(a)} vs ${show(b)}`,
      });
    }
  }

  private diffLists(
    a: ListValue,
    b: ListValue,
    path: PathSegment[],
    records: DiffRecord[]
  ): void {
    if (a.length !== b.length) {
      records.push({
        path,
        kind: "length-mismatch",
        report: `Length mismatch at ${formatPath(path)}: ${a.length} vs ${b.length}`,
      });
      return;
    }

    a.forEach((x, i) => {
      const y = b[i];
      const itemPath = [...path, i];
      if (x instanceof TreeNode && y instanceof TreeNode) {
        if (x.descriptor.key !== y.descriptor.key) {
          records.push({
            path: itemPath,
            kind: "element-mismatch",
            report: `Element mismatch at ${formatPath(itemPath)}: ${x.descriptor.key} vs ${y.descriptor.key}`,
          });
        } else {
          this.diffNodes(x, y, itemPath, records);
        }
      } else if (
        x instanceof TreeNode ||
        y instanceof TreeNode ||
        typeof x !== typeof y
      ) {
        records.push({
          path: itemPath,
          kind: "element-mismatch",
          report: `Element mismatch at ${formatPath(itemPath)}: ${describeValue(x)} vs ${describeValue(y)}`,
        });
      } else if (x !== y) {
        records.push({
          path: itemPath,
          kind: "value-mismatch",
          report: `Value mismatch at ${formatPath(itemPath)}: ${show(x)} vs ${show(y)}`,
        });
      }
    });
  }

  private diffMaps(
    a: StringMap,
    b: StringMap,
    path: PathSegment[],
    records: DiffRecord[]
  ): void {
    const onlyA = Object.keys(a).filter((key) => !hasKey(b, key));
    const onlyB = Object.keys(b).filter((key) => !hasKey(a, key));
    if (onlyA.length > 0 || onlyB.length > 0) {
      const keys = [...onlyA, ...onlyB].sort();
      records.push({
        path,
        kind: "key-mismatch",
        report: `Key mismatch at ${formatPath(path)}: keys not in both: ${keys.join(", ")}`,
      });
      return;
    }

    for (const key of Object.keys(a)) {
      const x: Scalar | undefined = a[key];
      const y: Scalar | undefined = b[key];
      if (x !== y) {
        const itemPath = [...path, key];
        records.push({
          path: itemPath,
          kind: "item-mismatch",
          report: `Item mismatch at ${formatPath(itemPath)}: ${JSON.stringify(x)} vs ${JSON.stringify(y)}`,
        });
      }
    }
  }
}

/** Every structural difference between `a` and `b`; empty when equal. */
export function diff(a: TreeNode, b: TreeNode): DiffRecord[] {
  return new DiffEngine().diff(a, b);
}
