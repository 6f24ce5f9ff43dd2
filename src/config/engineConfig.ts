import process from "node:process";
import { z } from "zod";

import { LOG_LEVELS, StructuredLogger, parseRedactionDirectives } from "../logger.js";
import { type EnvSource, readBool, readEnum, readInt, readOptionalString } from "./env.js";

/** Schema validating the engine configuration assembled from the environment. */
export const RuleEngineConfigSchema = z
  .object({
    logLevel: z.enum(LOG_LEVELS),
    logFile: z.string().min(1).nullable(),
    logMaxBytes: z.number().int().min(1),
    logMaxFiles: z.number().int().min(1).max(100),
    logRedact: z.string().nullable(),
    logStdout: z.boolean(),
  })
  .strict();

export type RuleEngineConfig = z.infer<typeof RuleEngineConfigSchema>;

export const DEFAULT_RULE_ENGINE_CONFIG: RuleEngineConfig = {
  logLevel: "warn",
  logFile: null,
  logMaxBytes: 5 * 1024 * 1024,
  logMaxFiles: 5,
  logRedact: null,
  logStdout: true,
};

/**
 * Reads the `RULES_*` variables. Invalid literals fall back to the defaults
 * the same way the env readers do.
 */
export function loadRuleEngineConfig(env: EnvSource = process.env): RuleEngineConfig {
  return RuleEngineConfigSchema.parse({
    logLevel: readEnum("RULES_LOG_LEVEL", LOG_LEVELS, DEFAULT_RULE_ENGINE_CONFIG.logLevel, env),
    logFile: readOptionalString("RULES_LOG_FILE", env) ?? null,
    logMaxBytes: readInt("RULES_LOG_MAX_BYTES", DEFAULT_RULE_ENGINE_CONFIG.logMaxBytes, { min: 1 }, env),
    logMaxFiles: readInt("RULES_LOG_MAX_FILES", DEFAULT_RULE_ENGINE_CONFIG.logMaxFiles, { min: 1, max: 100 }, env),
    logRedact: readOptionalString("RULES_LOG_REDACT", env) ?? null,
    logStdout: readBool("RULES_LOG_STDOUT", DEFAULT_RULE_ENGINE_CONFIG.logStdout, env),
  });
}

/** Build the logger described by `config`. */
export function createEngineLogger(config: RuleEngineConfig): StructuredLogger {
  const redaction = parseRedactionDirectives(config.logRedact ?? undefined);
  return new StructuredLogger({
    minLevel: config.logLevel,
    logFile: config.logFile,
    maxFileSizeBytes: config.logMaxBytes,
    maxFileCount: config.logMaxFiles,
    redactSecrets: redaction.tokens,
    redactionEnabled: redaction.enabled,
    stdout: config.logStdout,
  });
}

let defaultLogger: StructuredLogger | null = null;

/** Logger used by runs that do not supply one. Built lazily from the environment. */
export function getDefaultEngineLogger(): StructuredLogger {
  if (!defaultLogger) {
    defaultLogger = createEngineLogger(loadRuleEngineConfig());
  }
  return defaultLogger;
}

/** Replace (or with `null`, reset) the default logger. */
export function setDefaultEngineLogger(logger: StructuredLogger | null): void {
  defaultLogger = logger;
}
