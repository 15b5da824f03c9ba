/**
 * Descriptor Registry
 *
 * Loads the schema compiler's JSON output into an immutable set of
 * EntityDescriptors keyed by (version, kind). Loaded once, never mutated.
 */

import { closeSync, openSync, readFileSync } from "fs";
import { z } from "zod";
import { EntityDescriptor, descriptorKey } from "./descriptor.js";
import type { EntityDescriptorInit } from "./descriptor.js";
import { RegistryError, UnknownKindError } from "./errors.js";
import type { Logger } from "./logger.js";
import { TreeNode } from "./node.js";
import type { FieldInit } from "./node.js";
import type { FieldKind } from "./types.js";

const scalarKindSchema = z.object({
  type: z.literal("scalar"),
  scalar: z.enum(["string", "integer", "number", "boolean"]),
});

const objectKindSchema = z.object({
  type: z.literal("object"),
  ref: z.string().min(1),
});

const fieldKindSchema = z.discriminatedUnion("type", [
  scalarKindSchema,
  objectKindSchema,
  z.object({
    type: z.literal("list"),
    items: z.discriminatedUnion("type", [scalarKindSchema, objectKindSchema]),
  }),
  z.object({ type: z.literal("map") }),
]);

const fieldSchema = z.object({
  name: z.string().min(1),
  kind: fieldKindSchema,
  description: z.string().optional(),
});

const descriptorSchema = z.object({
  name: z.string().min(1),
  version: z.string().min(1),
  group: z.string().min(1).optional(),
  document: z.boolean().optional(),
  description: z.string().optional(),
  required: z.array(fieldSchema).default([]),
  optional: z.array(fieldSchema).default([]),
});

const registryFileSchema = z.object({
  descriptors: z.array(descriptorSchema),
});

export type NodeConstructor = (init?: FieldInit) => TreeNode;

function referencedKeys(kind: FieldKind): string[] {
  switch (kind.type) {
    case "object":
      return [kind.ref];
    case "list":
      return kind.items.type === "object" ? [kind.items.ref] : [];
    default:
      return [];
  }
}

export class DescriptorRegistry {
  private readonly byKey = new Map<string, EntityDescriptor>();
  private readonly symbols = new Map<string, string>();

  constructor(definitions: Iterable<EntityDescriptorInit>) {
    const issues: string[] = [];

    for (const definition of definitions) {
      const descriptor = new EntityDescriptor(definition);
      if (this.byKey.has(descriptor.key)) {
        issues.push(`duplicate descriptor ${descriptor.key}`);
        continue;
      }
      const seen = new Set<string>();
      for (const field of descriptor.fields) {
        if (seen.has(field.name)) {
          issues.push(`duplicate field ${descriptor.key}.${field.name}`);
        }
        seen.add(field.name);
      }
      this.byKey.set(descriptor.key, descriptor);
    }

    for (const descriptor of this.byKey.values()) {
      for (const field of descriptor.fields) {
        for (const ref of referencedKeys(field.kind)) {
          if (!this.byKey.has(ref)) {
            issues.push(
              `${descriptor.key}.${field.name} references unknown descriptor ${ref}`
            );
          }
        }
      }
    }

    if (issues.length > 0) {
      throw new RegistryError("Invalid descriptor registry", issues);
    }

    const nameCounts = new Map<string, number>();
    for (const descriptor of this.byKey.values()) {
      nameCounts.set(descriptor.name, (nameCounts.get(descriptor.name) ?? 0) + 1);
    }
    for (const descriptor of this.byKey.values()) {
      const unique = nameCounts.get(descriptor.name) === 1;
      this.symbols.set(
        descriptor.key,
        unique
          ? descriptor.name
          : `${descriptor.name}_${descriptor.version.replace(/\W/g, "_")}`
      );
    }

    Object.freeze(this);
  }

  /** Validate and build a registry from parsed compiler output. */
  static fromJSON(raw: unknown, logger?: Logger): DescriptorRegistry {
    const result = registryFileSchema.safeParse(raw);
    if (!result.success) {
      throw new RegistryError(
        "Malformed registry definition",
        result.error.issues.map(
          (issue) => `${issue.path.join(".")}: ${issue.message}`
        )
      );
    }
    const registry = new DescriptorRegistry(result.data.descriptors);
    logger?.info(`Loaded ${registry.size} entity descriptors`);
    return registry;
  }

  /** Read a registry file written by the schema compiler. */
  static load(path: string, logger?: Logger): DescriptorRegistry {
    let text: string;
    try {
      const fd = openSync(path, "r");
      try {
        text = readFileSync(fd, "utf-8");
      } finally {
        closeSync(fd);
      }
    } catch (error) {
      throw new RegistryError(
        `Cannot read registry file ${path}: ${
          error instanceof Error ? error.message : String(error)
        }`,
        [],
        { cause: error }
      );
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      throw new RegistryError(
        `Registry file ${path} is not valid JSON: ${
          error instanceof Error ? error.message : String(error)
        }`,
        [],
        { cause: error }
      );
    }
    logger?.debug(`Read registry file ${path}`);
    return DescriptorRegistry.fromJSON(raw, logger);
  }

  get size(): number {
    return this.byKey.size;
  }

  has(key: string): boolean {
    return this.byKey.has(key);
  }

  descriptors(): EntityDescriptor[] {
    return [...this.byKey.values()];
  }

  /**
   * Find the descriptor for a document's apiVersion/kind markers. A group
   * prefix (`apps/v1`) is dropped when the full apiVersion is not a key.
   */
  lookup(apiVersion: string, kind: string): EntityDescriptor | undefined {
    const exact = this.byKey.get(descriptorKey(apiVersion, kind));
    if (exact) return exact;
    const slash = apiVersion.lastIndexOf("/");
    if (slash < 0) return undefined;
    const candidate = this.byKey.get(
      descriptorKey(apiVersion.slice(slash + 1), kind)
    );
    if (candidate && candidate.apiVersion === apiVersion) return candidate;
    return candidate && candidate.group === undefined ? candidate : undefined;
  }

  resolve(key: string): EntityDescriptor {
    const descriptor = this.byKey.get(key);
    if (!descriptor) {
      const slash = key.lastIndexOf("/");
      throw new UnknownKindError(
        slash < 0 ? undefined : key.slice(0, slash),
        key.slice(slash + 1)
      );
    }
    return descriptor;
  }

  create(key: string, init?: FieldInit): TreeNode {
    return new TreeNode(this.resolve(key), init);
  }

  /** Identifier used for a descriptor's constructor in synthesized source. */
  symbolFor(descriptor: EntityDescriptor): string {
    const symbol = this.symbols.get(descriptor.key);
    if (symbol === undefined) {
      throw new UnknownKindError(descriptor.version, descriptor.name);
    }
    return symbol;
  }

  /** One constructor per descriptor, keyed by its source symbol. */
  constructors(): Record<string, NodeConstructor> {
    const result: Record<string, NodeConstructor> = {};
    for (const descriptor of this.byKey.values()) {
      result[this.symbolFor(descriptor)] = (init) =>
        new TreeNode(descriptor, init);
    }
    return result;
  }
}
