/**
 * Multi-document YAML streams
 */

import { closeSync, openSync, readFileSync } from "fs";
import YAML from "yaml";
import { InvalidArgumentError, StructureError } from "../errors.js";
import type { Logger } from "../logger.js";
import { isPlainObject } from "./generic.js";
import type { GenericMap } from "./generic.js";

/** Exactly one of `path`, `fd` (an open file descriptor) or `text`. */
export interface YamlSource {
  path?: string;
  fd?: number;
  text?: string;
}

export function readYamlSource(source: YamlSource): string {
  const given = (["path", "fd", "text"] as const).filter(
    (key) => source[key] !== undefined
  );
  if (given.length !== 1) {
    throw new InvalidArgumentError(
      given.length === 0
        ? "A YAML source needs one of path, fd or text"
        : `A YAML source takes only one of path, fd or text (got ${given.join(", ")})`,
      "source"
    );
  }

  if (typeof source.text === "string") return source.text;
  if (typeof source.fd === "number") {
    const fd = source.fd;
    return readOrThrow(`fd ${fd}`, () => readFileSync(fd, "utf-8"));
  }
  if (typeof source.path === "string") {
    const path = source.path;
    return readOrThrow(path, () => {
      const fd = openSync(path, "r");
      try {
        return readFileSync(fd, "utf-8");
      } finally {
        closeSync(fd);
      }
    });
  }
  throw new InvalidArgumentError(
    "YAML source path/text must be strings and fd a number",
    "source"
  );
}

function readOrThrow(label: string, read: () => string): string {
  try {
    return read();
  } catch (error) {
    throw new InvalidArgumentError(
      `Cannot read YAML source ${label}: ${
        error instanceof Error ? error.message : String(error)
      }`,
      "source",
      { cause: error }
    );
  }
}

/** Parse every non-empty document of a stream, in stream order. */
export function parseYamlDocuments(text: string, logger?: Logger): GenericMap[] {
  const documents: GenericMap[] = [];
  let index = 0;

  for (const doc of YAML.parseAllDocuments(text)) {
    const [first] = doc.errors;
    if (first) {
      throw new StructureError(
        `YAML syntax error in document ${index}: ${first.message}`,
        [index],
        { cause: first }
      );
    }
    const value: unknown = doc.toJS();
    if (value === null || value === undefined) {
      logger?.debug(`Skipping empty YAML document ${index}`);
    } else if (isGenericMap(value)) {
      documents.push(value);
    } else {
      throw new StructureError(
        `YAML document ${index} is not a mapping`,
        [index]
      );
    }
    index++;
  }

  return documents;
}

function isGenericMap(value: unknown): value is GenericMap {
  return isPlainObject(value);
}

export function stringifyYamlDocuments(
  documents: readonly GenericMap[],
  lineWidth: number
): string {
  return documents
    .map((doc) => `---\n${YAML.stringify(doc, { lineWidth })}`)
    .join("");
}
