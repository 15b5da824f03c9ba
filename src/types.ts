/**
 * Shared value and kind types
 */

/** One step of a path: a field name / map key, or a list index. */
export type PathSegment = string | number;

export type Scalar = string | number | boolean;

export type ScalarKind = "string" | "integer" | "number" | "boolean";

export interface ScalarFieldKind {
  type: "scalar";
  scalar: ScalarKind;
}

/** Reference to another descriptor by key, e.g. `v1/ObjectMeta`. */
export interface ObjectFieldKind {
  type: "object";
  ref: string;
}

export type ItemKind = ScalarFieldKind | ObjectFieldKind;

export interface ListFieldKind {
  type: "list";
  items: ItemKind;
}

export interface MapFieldKind {
  type: "map";
}

export type FieldKind =
  | ScalarFieldKind
  | ObjectFieldKind
  | ListFieldKind
  | MapFieldKind;

export function formatPath(path: readonly PathSegment[]): string {
  if (path.length === 0) return "<root>";
  return path
    .map((segment, i) =>
      typeof segment === "number"
        ? `[${segment}]`
        : i === 0
          ? segment
          : `.${segment}`
    )
    .join("");
}
