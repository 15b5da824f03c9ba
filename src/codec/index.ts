/**
 * Tree Codec
 *
 * Converts trees to and from generic form, JSON, multi-document YAML and
 * constructor-call source. Decoding builds a complete new tree or throws;
 * encoding never mutates its input.
 */

import type { EntityDescriptor } from "../descriptor.js";
import { InvalidArgumentError, StructureError } from "../errors.js";
import { Logger } from "../logger.js";
import { resolveConfig } from "../config.js";
import type { ResolvedConfig, RuntimeConfig } from "../config.js";
import { TreeNode, describeValue } from "../node.js";
import type { DescriptorRegistry } from "../registry.js";
import { GenericReader, toGeneric } from "./generic.js";
import type { GenericMap } from "./generic.js";
import { renderSource } from "./source.js";
import type { SourceOptions } from "./source.js";
import {
  parseYamlDocuments,
  readYamlSource,
  stringifyYamlDocuments,
} from "./yaml.js";
import type { YamlSource } from "./yaml.js";

export type DecodeTarget = EntityDescriptor | string;

export class TreeCodec {
  readonly config: ResolvedConfig;
  private readonly logger: Logger;
  private readonly reader: GenericReader;

  constructor(
    private readonly registry: DescriptorRegistry,
    config: RuntimeConfig = {}
  ) {
    this.config = resolveConfig(config);
    this.logger = new Logger("codec", this.config.logLevel, this.config.logSink);
    this.reader = new GenericReader(registry, this.logger.child("generic"));
  }

  toGeneric(node: unknown): GenericMap {
    return toGeneric(node);
  }

  fromGeneric(value: unknown, target?: DecodeTarget): TreeNode {
    return this.reader.read(value, target);
  }

  toJson(node: unknown, indent: number = this.config.jsonIndent): string {
    return JSON.stringify(toGeneric(node), null, indent);
  }

  fromJson(text: string, target?: DecodeTarget): TreeNode {
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      throw new StructureError(
        `Invalid JSON: ${error instanceof Error ? error.message : String(error)}`,
        [],
        { cause: error }
      );
    }
    return this.fromGeneric(raw, target);
  }

  /** One `---`-prefixed YAML document per tree, in order. */
  toYaml(nodes: unknown): string {
    const list: unknown[] = Array.isArray(nodes) ? nodes : [nodes];
    const documents = list.map((node, i) => {
      if (!(node instanceof TreeNode)) {
        throw new InvalidArgumentError(
          `toYaml expects trees; item ${i} is ${describeValue(node)}`,
          "nodes"
        );
      }
      return toGeneric(node);
    });
    return stringifyYamlDocuments(documents, this.config.yamlLineWidth);
  }

  /** Generic form of each non-empty document in a YAML stream. */
  yamlDocuments(source: YamlSource): GenericMap[] {
    const text = readYamlSource(source);
    const documents = parseYamlDocuments(text, this.logger);
    this.logger.debug(`Parsed ${documents.length} YAML documents`, {
      source: source.path ?? (source.fd !== undefined ? `fd ${source.fd}` : "text"),
    });
    return documents;
  }

  /** Decode every document of a YAML stream, selecting descriptors by apiVersion/kind. */
  fromYaml(source: YamlSource): TreeNode[] {
    return this.yamlDocuments(source).map((doc) => this.fromGeneric(doc));
  }

  toSource(node: unknown, options: SourceOptions = {}): string {
    return renderSource(
      node,
      (descriptor) => this.registry.symbolFor(descriptor),
      options.style ?? this.config.sourceStyle,
      options.assignTo
    );
  }
}

export { toGeneric } from "./generic.js";
export type { GenericMap, GenericValue } from "./generic.js";
export type { YamlSource } from "./yaml.js";
export type { SourceOptions, SourceStyle } from "./source.js";
export { SOURCE_STYLES } from "./source.js";
