export {
  parseLayer,
  versionFromStem,
  DirectoryLayerProvider,
  StaticLayerProvider,
  InputParseError,
  LayerDiscoveryError,
  type Layer,
  type LayerSource,
  type LayerProvider,
  type LayerParseIssue,
} from "./loader.js";
export { DefinitionTreeSchema, DefinitionValueSchema, ScalarSchema } from "./schema.js";
