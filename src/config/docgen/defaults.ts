/**
 * Default generator configuration, matching the layout of the XAP
 * definition files (data/xap/xap_<version>.hjson → docs/xap_<version>.md).
 */

import type { DocGenConfig } from "./schema.js";

export const DEFAULT_DOCGEN_CONFIG: DocGenConfig = {
  resetSentinel: "!reset!",
  documentationKey: "documentation",
  orderKey: "order",

  reservedSections: {
    typeDocs: { sourceKey: "type_docs", sectionKey: "!type_docs!" },
    termDefinitions: { sourceKey: "term_definitions", sectionKey: "!term_definitions!" },
    responseFlags: { sourceKey: "response_flags", sectionKey: "!response_flags!" },
  },

  layers: {
    prefix: "xap_",
    extension: ".hjson",
  },

  output: {
    extension: ".md",
    indexFileName: "xap_protocol.md",
    indexTitle: "XAP Protocol Reference",
    versionLabel: "XAP Version",
  },
};
