/**
 * Generator configuration module.
 *
 * Usage:
 *   import { loadDocGenConfig, DEFAULT_DOCGEN_CONFIG } from "./config/docgen/index.js";
 *
 *   const config = loadDocGenConfig(DEFAULT_DOCGEN_CONFIG);
 *
 *   const custom = loadDocGenConfig({
 *     ...DEFAULT_DOCGEN_CONFIG,
 *     resetSentinel: "!clear!",
 *   });
 */

export type {
  DocGenConfig,
  ReservedSection,
  ReservedSections,
  LayerNaming,
  OutputNaming,
} from "./schema.js";

export {
  DocGenConfigSchema,
  ReservedSectionSchema,
  ReservedSectionsSchema,
  LayerNamingSchema,
  OutputNamingSchema,
} from "./schema.js";

export {
  loadDocGenConfig,
  validateDocGenConfig,
  DocGenConfigError,
  type ConfigValidationIssue,
} from "./loader.js";

export { DEFAULT_DOCGEN_CONFIG } from "./defaults.js";
