/**
 * Runtime configuration
 *
 * Callers pass a partial config; anything left out falls back to the
 * environment, then to the defaults below.
 */

import { z } from "zod";
import { ConfigurationError } from "./errors.js";
import { LOG_LEVELS, consoleSink } from "./logger.js";
import type { LogLevel, LogSink } from "./logger.js";
import { SOURCE_STYLES } from "./codec/source.js";
import type { SourceStyle } from "./codec/source.js";

export const LOG_LEVEL_ENV = "SCHEMATREE_LOG_LEVEL";

export interface RuntimeConfig {
  logLevel?: LogLevel;
  sourceStyle?: string;
  jsonIndent?: number;
  yamlLineWidth?: number;
  logSink?: LogSink;
}

export interface ResolvedConfig {
  logLevel: LogLevel;
  sourceStyle: SourceStyle;
  jsonIndent: number;
  yamlLineWidth: number;
  logSink: LogSink;
}

const configSchema = z.object({
  logLevel: z.enum(["debug", "info", "warn", "error", "silent"]),
  sourceStyle: z.enum(["expanded", "compact"]),
  jsonIndent: z.number().int().min(0).max(10),
  yamlLineWidth: z.number().int().min(0),
});

export function resolveConfig(
  config: RuntimeConfig = {},
  env: NodeJS.ProcessEnv = process.env
): ResolvedConfig {
  const envLevel = env[LOG_LEVEL_ENV];
  const candidate = {
    logLevel: config.logLevel ?? (envLevel ? envLevel.toLowerCase() : "warn"),
    sourceStyle: config.sourceStyle ?? "expanded",
    jsonIndent: config.jsonIndent ?? 2,
    yamlLineWidth: config.yamlLineWidth ?? 80,
  };

  const result = configSchema.safeParse(candidate);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join(".")}: ${issue.message}`
    );
    throw new ConfigurationError(
      `Invalid configuration (${issues.join("; ")}); log levels: ${LOG_LEVELS.join(", ")}; styles: ${SOURCE_STYLES.join(", ")}`
    );
  }

  return {
    ...result.data,
    logSink: config.logSink ?? consoleSink,
  };
}
