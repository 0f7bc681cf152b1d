import { ALGORITHM_IDS, type AlgorithmId } from "../algorithms/result.js";
import { LOG_LEVELS, type LogLevel } from "../logger.js";
import { readEnum, readOptionalString, type EnvSource } from "./env.js";

/** Algorithm selections accepted by the CLI: either algorithm, or both side by side. */
export const ALGORITHM_CHOICES = [...ALGORITHM_IDS, "both"] as const;
export type AlgorithmChoice = AlgorithmId | "both";

export const OUTPUT_FORMATS = ["text", "json"] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export interface RuntimeConfig {
  readonly logLevel: LogLevel;
  readonly logFile: string | null;
  readonly algorithm: AlgorithmChoice;
  readonly format: OutputFormat;
}

/**
 * Resolves the runtime configuration from `PATHLAB_*` variables. Unknown
 * values fall back to the defaults rather than failing.
 */
export function loadRuntimeConfig(env: EnvSource = process.env): RuntimeConfig {
  return {
    logLevel: readEnum("PATHLAB_LOG_LEVEL", LOG_LEVELS, "warn", env),
    logFile: readOptionalString("PATHLAB_LOG_FILE", env) ?? null,
    algorithm: readEnum("PATHLAB_ALGORITHM", ALGORITHM_CHOICES, "dijkstra", env),
    format: readEnum("PATHLAB_FORMAT", OUTPUT_FORMATS, "text", env),
  };
}
