export {
  refreshSections,
  SectionRenderError,
  type SectionOptions,
  type RefreshResult,
} from "./sections.js";
export {
  renderDefinitionTable,
  renderResponseFlags,
  fillResponseFlagBits,
  RESPONSE_FLAG_BITS,
  UNUSED_BIT_PLACEHOLDER,
  type TableResult,
} from "./tables.js";
