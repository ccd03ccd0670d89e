export {
  generateDocs,
  formatDiagnostic,
  type GenerateOptions,
  type GenerateResult,
  type GeneratedDocument,
  type DocGenError,
} from "./generate.js";
