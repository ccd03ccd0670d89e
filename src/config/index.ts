/**
 * Application configuration.
 * Reads the environment once and exposes typed values.
 */

import type { LogLevel } from "../logging/index.js";
import { optionalEnv, optionalEnvBool, optionalEnvChoice } from "./env.js";

export { ConfigError } from "./env.js";

export * from "./docgen/index.js";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export interface AppConfig {
  /** Minimum log level */
  readonly logLevel: LogLevel;
  /** Also append log lines to a file under logDir */
  readonly logToFile: boolean;
  readonly logDir: string;
  /** Directory holding xap_<version>.hjson definition layers */
  readonly definitionsDir: string;
  /** Directory receiving the generated Markdown */
  readonly docsDir: string;
}

/**
 * Load application configuration from the environment.
 *
 * @throws ConfigError if LOG_LEVEL or LOG_TO_FILE holds an unsupported value
 */
export function loadAppConfig(): AppConfig {
  return {
    logLevel: optionalEnvChoice("LOG_LEVEL", LOG_LEVELS, "info"),
    logToFile: optionalEnvBool("LOG_TO_FILE", false),
    logDir: optionalEnv("LOG_DIR", "output/logs"),
    definitionsDir: optionalEnv("XAP_DEFINITIONS_DIR", "data/xap"),
    docsDir: optionalEnv("XAP_DOCS_DIR", "docs"),
  };
}
