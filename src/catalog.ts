/**
 * Catalog Indexer
 *
 * Pre-order index of the occupied fields of a tree, used for name-based
 * queries. A catalog is cached per root and is NOT refreshed when the tree
 * changes; call repopulateCatalog() after mutating.
 */

import type { EntityDescriptor } from "./descriptor.js";
import { InvalidArgumentError } from "./errors.js";
import type { Logger } from "./logger.js";
import { TreeNode, isStringMap } from "./node.js";
import type { PathSegment } from "./types.js";

export interface CatalogEntry {
  name: string;
  /** Path from the root to the value; ends with the field name, or its index for list elements. */
  path: PathSegment[];
  /** Descriptor of the node holding the field. */
  owner: EntityDescriptor;
  /** Path from the root to the holding node. */
  ownerPath: PathSegment[];
}

/** Ancestor segments, as a list or a dotted string like `containers.1.lifecycle`. */
export type Following = string | readonly PathSegment[];

const catalogs = new WeakMap<TreeNode, Catalog>();

export class Catalog {
  private readonly byName = new Map<string, CatalogEntry[]>();

  private constructor(readonly entries: readonly CatalogEntry[]) {
    for (const entry of entries) {
      const list = this.byName.get(entry.name);
      if (list) {
        list.push(entry);
      } else {
        this.byName.set(entry.name, [entry]);
      }
    }
  }

  static build(root: TreeNode): Catalog {
    const entries: CatalogEntry[] = [];
    collect(root, [], entries);
    return new Catalog(entries);
  }

  find(name: unknown, following?: unknown): CatalogEntry[] {
    if (typeof name !== "string") {
      throw new InvalidArgumentError(
        `name must be a string, got ${typeof name}`,
        "name"
      );
    }
    const matches = this.byName.get(name) ?? [];
    if (following === undefined) return [...matches];

    const segments = parseFollowing(following);
    return matches.filter((entry) =>
      isSubsequence(segments, entry.ownerPath)
    );
  }
}

function collect(
  node: TreeNode,
  base: PathSegment[],
  entries: CatalogEntry[]
): void {
  for (const [field, value] of node.entries()) {
    if (value === null) continue;
    if (Array.isArray(value)) {
      value.forEach((item, i) => {
        const path = [...base, field.name, i];
        entries.push({
          name: field.name,
          path,
          owner: node.descriptor,
          ownerPath: base,
        });
        if (item instanceof TreeNode) collect(item, path, entries);
      });
      continue;
    }
    if (isStringMap(value) && Object.keys(value).length === 0) continue;
    const path = [...base, field.name];
    entries.push({
      name: field.name,
      path,
      owner: node.descriptor,
      ownerPath: base,
    });
    if (value instanceof TreeNode) collect(value, path, entries);
  }
}

/** Normalize a `following` argument to a list of names and indices. */
export function parseFollowing(following: unknown): PathSegment[] {
  if (typeof following === "string") {
    if (following === "") return [];
    return following.split(".").map((segment) => {
      if (segment === "") {
        throw new InvalidArgumentError(
          `following "${following}" has an empty segment`,
          "following"
        );
      }
      return /^\d+$/.test(segment) ? Number(segment) : segment;
    });
  }

  if (Array.isArray(following)) {
    return following.map((segment: unknown, i) => {
      if (typeof segment === "string") return segment;
      if (
        typeof segment === "number" &&
        Number.isInteger(segment) &&
        segment >= 0
      ) {
        return segment;
      }
      throw new InvalidArgumentError(
        `following[${i}] must be a field name or a non-negative integer index`,
        "following"
      );
    });
  }

  throw new InvalidArgumentError(
    "following must be a list of names/indices or a dotted string",
    "following"
  );
}

/** True when `needle` appears in `haystack` in order, not necessarily adjacent. */
function isSubsequence(
  needle: readonly PathSegment[],
  haystack: readonly PathSegment[]
): boolean {
  let matched = 0;
  for (const segment of haystack) {
    if (matched === needle.length) break;
    if (segment === needle[matched]) matched++;
  }
  return matched === needle.length;
}

/** Walk the tree now, without touching the cached catalog. */
export function buildCatalog(root: TreeNode): readonly CatalogEntry[] {
  return Catalog.build(root).entries;
}

export function catalogFor(root: TreeNode): Catalog {
  let catalog = catalogs.get(root);
  if (!catalog) {
    catalog = Catalog.build(root);
    catalogs.set(root, catalog);
  }
  return catalog;
}

export function repopulateCatalog(root: TreeNode, logger?: Logger): Catalog {
  const catalog = Catalog.build(root);
  catalogs.set(root, catalog);
  logger?.debug(`Rebuilt catalog for ${root.descriptor.key}`, {
    entries: catalog.entries.length,
  });
  return catalog;
}

/**
 * All catalog entries for fields called `name`, optionally restricted to
 * those whose holding path contains the `following` segments in order.
 */
export function findByName(
  root: TreeNode,
  name: string,
  following?: Following
): CatalogEntry[] {
  return catalogFor(root).find(name, following);
}
