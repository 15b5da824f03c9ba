/**
 * Source rendering
 *
 * Renders a tree as a TypeScript/JavaScript expression that rebuilds it
 * from per-descriptor constructors, e.g. `Pod({ metadata: ObjectMeta({...}) })`.
 * Constructor names come from `DescriptorRegistry.symbolFor`, so evaluating
 * the text against `registry.constructors()` yields an equal tree.
 */

import type { EntityDescriptor } from "../descriptor.js";
import { InvalidArgumentError, UnsupportedStyleError } from "../errors.js";
import { TreeNode, describeValue, isStringMap } from "../node.js";
import type { FieldValue } from "../node.js";
import type { Scalar } from "../types.js";

export type SourceStyle = "expanded" | "compact";

export const SOURCE_STYLES: readonly SourceStyle[] = ["expanded", "compact"];

export type SymbolResolver = (descriptor: EntityDescriptor) => string;

export interface SourceOptions {
  style?: string;
  /** Emit `<assignTo> = <expression>`; must be an identifier or dotted name. */
  assignTo?: string;
}

const IDENTIFIER = /^[A-Za-z_$][\w$]*$/;
const ASSIGN_TARGET = /^[A-Za-z_$][\w$]*(\.[A-Za-z_$][\w$]*)*$/;

export function isSourceStyle(value: string): value is SourceStyle {
  return SOURCE_STYLES.some((style) => style === value);
}

function renderKey(key: string): string {
  // a literal __proto__ key would set the prototype instead
  if (key === "__proto__") return `["__proto__"]`;
  return IDENTIFIER.test(key) ? key : JSON.stringify(key);
}

function renderScalar(value: Scalar): string {
  if (typeof value === "string") return JSON.stringify(value);
  if (typeof value === "number" && Object.is(value, -0)) return "-0";
  return String(value);
}

export abstract class SourceRenderer {
  constructor(protected readonly symbolFor: SymbolResolver) {}

  abstract render(node: TreeNode): string;

  /**
   * Fields that make it into the constructor call. Required fields are
   * always written so the call is complete. An optional container that was
   * nulled, or a document marker that was unset, is written as null so the
   * constructor does not fill in its default.
   */
  protected sourceFields(node: TreeNode): Array<[string, FieldValue]> {
    const fields: Array<[string, FieldValue]> = [];
    for (const [field, value] of node.entries()) {
      if (field.required) {
        fields.push([field.name, value]);
        continue;
      }
      if (Array.isArray(value)) {
        if (value.length > 0) fields.push([field.name, value]);
      } else if (isStringMap(value)) {
        if (Object.keys(value).length > 0) fields.push([field.name, value]);
      } else if (value !== null) {
        fields.push([field.name, value]);
      } else if (
        field.kind.type === "list" ||
        field.kind.type === "map" ||
        node.descriptor.defaultFor(field.name) !== undefined
      ) {
        fields.push([field.name, null]);
      }
    }
    return fields;
  }

  protected key(name: string): string {
    return renderKey(name);
  }

  protected scalar(value: Scalar): string {
    return renderScalar(value);
  }
}

export class ExpandedRenderer extends SourceRenderer {
  private readonly unit = "  ";

  render(node: TreeNode): string {
    return this.renderNode(node, 0);
  }

  private renderNode(node: TreeNode, depth: number): string {
    const symbol = this.symbolFor(node.descriptor);
    const fields = this.sourceFields(node);
    if (fields.length === 0) return `${symbol}({})`;

    const pad = this.unit.repeat(depth + 1);
    const lines = fields.map(
      ([name, value]) =>
        `${pad}${this.key(name)}: ${this.renderValue(value, depth + 1)},`
    );
    return `${symbol}({\n${lines.join("\n")}\n${this.unit.repeat(depth)}})`;
  }

  private renderValue(value: FieldValue, depth: number): string {
    if (value === null) return "null";
    if (value instanceof TreeNode) return this.renderNode(value, depth);

    const pad = this.unit.repeat(depth + 1);
    const close = this.unit.repeat(depth);
    if (Array.isArray(value)) {
      if (value.length === 0) return "[]";
      const items = value.map(
        (item) => `${pad}${this.renderValue(item, depth + 1)},`
      );
      return `[\n${items.join("\n")}\n${close}]`;
    }
    if (isStringMap(value)) {
      const entries = Object.entries(value);
      if (entries.length === 0) return "{}";
      const lines = entries.map(
        ([key, item]) => `${pad}${this.key(key)}: ${this.scalar(item)},`
      );
      return `{\n${lines.join("\n")}\n${close}}`;
    }
    return this.scalar(value);
  }
}

export class CompactRenderer extends SourceRenderer {
  render(node: TreeNode): string {
    const symbol = this.symbolFor(node.descriptor);
    const fields = this.sourceFields(node).map(
      ([name, value]) => `${this.key(name)}: ${this.renderValue(value)}`
    );
    return fields.length === 0
      ? `${symbol}({})`
      : `${symbol}({ ${fields.join(", ")} })`;
  }

  private renderValue(value: FieldValue): string {
    if (value === null) return "null";
    if (value instanceof TreeNode) return this.render(value);
    if (Array.isArray(value)) {
      return `[${value.map((item) => this.renderValue(item)).join(", ")}]`;
    }
    if (isStringMap(value)) {
      const entries = Object.entries(value);
      if (entries.length === 0) return "{}";
      const body = entries
        .map(([key, item]) => `${this.key(key)}: ${this.scalar(item)}`)
        .join(", ");
      return `{ ${body} }`;
    }
    return this.scalar(value);
  }
}

export function rendererFor(
  style: string,
  symbolFor: SymbolResolver
): SourceRenderer {
  if (!isSourceStyle(style)) {
    throw new UnsupportedStyleError(style, SOURCE_STYLES);
  }
  switch (style) {
    case "expanded":
      return new ExpandedRenderer(symbolFor);
    case "compact":
      return new CompactRenderer(symbolFor);
  }
}

export function renderSource(
  node: unknown,
  symbolFor: SymbolResolver,
  style: string,
  assignTo?: string
): string {
  if (!(node instanceof TreeNode)) {
    throw new InvalidArgumentError(
      `Expected a TreeNode, got ${describeValue(node)}`,
      "node"
    );
  }
  if (assignTo !== undefined && !ASSIGN_TARGET.test(assignTo)) {
    throw new InvalidArgumentError(
      `"${assignTo}" is not a valid assignment target`,
      "assignTo"
    );
  }
  const expression = rendererFor(style, symbolFor).render(node);
  return assignTo === undefined ? expression : `${assignTo} = ${expression}`;
}
