#!/usr/bin/env node
/**
 * CLI command that generates the XAP protocol reference.
 *
 * Merges every xap_<version>.hjson layer in the definitions directory in
 * version order, writes one Markdown document per version and an index
 * document linking them all.
 *
 * Usage:
 *   npx tsx src/cli/generate-docs.ts [options]
 *   npm run generate-docs -- [options]
 *
 * Options:
 *   --definitions <dir>  Definition layers (default: $XAP_DEFINITIONS_DIR or data/xap)
 *   --output <dir>       Output directory (default: $XAP_DOCS_DIR or docs)
 *   --config <path>      JSON file overriding generator settings
 *   --check              Assemble every document without writing files
 *   --verbose            Debug-level logging
 *   -h, --help           Show help
 *
 * Exit codes:
 *   0 - All documents generated
 *   1 - Configuration, parse, render or assembly failure
 */

import { readFileSync } from "node:fs";
import { parseArgs } from "node:util";

import { FileSystemSink, MemorySink, type DocumentSink } from "../assembly/index.js";
import {
  ConfigError,
  DEFAULT_DOCGEN_CONFIG,
  DocGenConfigError,
  loadAppConfig,
  loadDocGenConfig,
  type AppConfig,
} from "../config/index.js";
import { DirectoryLayerProvider, LayerDiscoveryError } from "../layers/index.js";
import { createLogger, initRunId, type Logger } from "../logging/index.js";
import { formatDiagnostic, generateDocs } from "../pipeline/index.js";

// ============================================================
// CLI Parsing
// ============================================================

const HELP = `
Usage: xap-docgen [options]

Options:
  --definitions <dir>  Definition layers (default: $XAP_DEFINITIONS_DIR or data/xap)
  --output <dir>       Output directory (default: $XAP_DOCS_DIR or docs)
  --config <path>      JSON file overriding generator settings
  --check              Assemble every document without writing files
  --verbose            Debug-level logging
  -h, --help           Show this help message
`;

export interface CliOptions {
  definitions: string;
  output: string;
  config?: string;
  check: boolean;
  verbose: boolean;
  help: boolean;
}

export function parseCliArgs(args: string[], appConfig: AppConfig): CliOptions {
  const { values } = parseArgs({
    args,
    options: {
      definitions: { type: "string", default: appConfig.definitionsDir },
      output: { type: "string", default: appConfig.docsDir },
      config: { type: "string" },
      check: { type: "boolean", default: false },
      verbose: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  return {
    definitions: values.definitions ?? appConfig.definitionsDir,
    output: values.output ?? appConfig.docsDir,
    config: values.config,
    check: values.check ?? false,
    verbose: values.verbose ?? false,
    help: values.help ?? false,
  };
}

/**
 * Generator settings: defaults, overlaid with the top-level fields of an
 * optional JSON file.
 */
function readDocGenConfig(path: string | undefined) {
  if (path === undefined) {
    return loadDocGenConfig(DEFAULT_DOCGEN_CONFIG);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    throw new ConfigError(
      `Cannot read generator config ${path}: ${err instanceof Error ? err.message : String(err)}`
    );
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new ConfigError(`Generator config ${path} must contain a JSON object`);
  }
  return loadDocGenConfig({ ...DEFAULT_DOCGEN_CONFIG, ...parsed });
}

// ============================================================
// Run
// ============================================================

/**
 * Run the generator with the given arguments and return the exit code.
 */
export function runGenerateDocs(
  args: string[],
  appConfig: AppConfig = loadAppConfig(),
  logger?: Logger
): number {
  const options = parseCliArgs(args, appConfig);

  if (options.help) {
    console.log(HELP);
    return 0;
  }

  const log =
    logger ??
    createLogger({
      level: options.verbose ? "debug" : appConfig.logLevel,
      file: appConfig.logToFile,
      logDir: appConfig.logDir,
    });

  try {
    const config = readDocGenConfig(options.config);
    const provider = new DirectoryLayerProvider(options.definitions, config.layers);
    const sink: DocumentSink = options.check ? new MemorySink() : new FileSystemSink(options.output);

    log.info("Generating protocol documentation", {
      definitions: provider.directory,
      output: options.check ? "(check only)" : options.output,
    });

    const result = generateDocs({ provider, sink, config, logger: log });

    if (!result.success) {
      console.error(formatDiagnostic(result.error));
      return 1;
    }

    log.info("Generation complete", { documents: result.documents.length });
    return 0;
  } catch (err) {
    if (err instanceof DocGenConfigError) {
      console.error(err.format());
      return 1;
    }
    if (err instanceof ConfigError || err instanceof LayerDiscoveryError) {
      log.error(err.message);
      return 1;
    }
    throw err;
  }
}

function main(): void {
  initRunId();

  let appConfig: AppConfig;
  try {
    appConfig = loadAppConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(`Configuration error: ${err.message}`);
      process.exit(1);
    }
    throw err;
  }

  process.exit(runGenerateDocs(process.argv.slice(2), appConfig));
}

// Only run when executed directly (not imported by tests)
const isDirectExecution = process.argv[1] !== undefined &&
  (process.argv[1].endsWith("generate-docs.ts") ||
   process.argv[1].endsWith("generate-docs.js") ||
   process.argv[1].endsWith("xap-docgen"));

if (isDirectExecution) {
  main();
}
