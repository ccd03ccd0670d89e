/**
 * Documentation generation run.
 *
 * Layers are folded strictly in provider order. For each layer:
 *
 *   1. parse the source into a validated tree
 *   2. merge it into the cumulative tree
 *   3. re-render the derived sections whose source keys are present
 *   4. assemble the ordered sections and write `<stem>.md`
 *
 * After the last layer the index document is written. The first failure
 * ends the run; documents already written for earlier layers stay on
 * disk and nothing further is written.
 */

import Hjson from "hjson";

import { type DocumentSink, assembleDocument, buildIndexDocument, MissingSectionError } from "../assembly/index.js";
import type { DocGenConfig } from "../config/docgen/schema.js";
import { type LayerProvider, type Layer, parseLayer, InputParseError } from "../layers/index.js";
import type { Logger } from "../logging/index.js";
import { mergeTrees } from "../merge/index.js";
import { refreshSections, SectionRenderError } from "../render/index.js";
import type { DefinitionTree } from "../types/tree.js";

export type DocGenError = InputParseError | SectionRenderError | MissingSectionError;

export interface GenerateOptions {
  provider: LayerProvider;
  sink: DocumentSink;
  config: Readonly<DocGenConfig>;
  logger: Logger;
}

export interface GeneratedDocument {
  fileName: string;
  stem: string;
  version: string;
  /** Section keys in the order they were written */
  sections: string[];
}

export type GenerateResult =
  | {
      success: true;
      documents: GeneratedDocument[];
      indexFileName: string;
      /** Cumulative tree after the last layer; null when there were no layers */
      tree: DefinitionTree | null;
    }
  | {
      success: false;
      error: DocGenError;
      /** Documents written before the failure */
      documents: GeneratedDocument[];
    };

/**
 * Run the merge → render → assemble loop over every layer the provider
 * yields and write the index.
 */
export function generateDocs(options: GenerateOptions): GenerateResult {
  const { provider, sink, config } = options;
  const logger = options.logger.child("generate");
  const documents: GeneratedDocument[] = [];
  const fail = (error: DocGenError): GenerateResult => {
    logger.error(error.message, { documentsWritten: documents.length });
    return { success: false, error, documents };
  };

  const sources = provider.sources();
  logger.info("Discovered definition layers", { count: sources.length });

  let cumulative: DefinitionTree | null = null;

  for (const [position, source] of sources.entries()) {
    let layer: Layer;
    try {
      layer = parseLayer(source, position, config.layers);
    } catch (err) {
      if (err instanceof InputParseError) return fail(err);
      throw err;
    }

    cumulative = mergeTrees(cumulative, layer.tree, { resetSentinel: config.resetSentinel });

    const refreshed = refreshSections(cumulative, config);
    if (!refreshed.success) return fail(refreshed.error);
    cumulative = refreshed.tree;
    for (const key of refreshed.rendered) {
      logger.debug("Rendered section", { layer: layer.stem, section: key });
    }

    const assembled = assembleDocument(cumulative, config);
    if (!assembled.success) return fail(assembled.error);

    const fileName = `${layer.stem}${config.output.extension}`;
    sink.write(fileName, assembled.text);
    documents.push({
      fileName,
      stem: layer.stem,
      version: layer.version,
      sections: assembled.sections,
    });
    logger.info("Wrote layer document", {
      layer: layer.name,
      file: fileName,
      sections: assembled.sections.length,
    });
  }

  sink.write(config.output.indexFileName, buildIndexDocument(documents, config.output));
  logger.info("Wrote index document", {
    file: config.output.indexFileName,
    entries: documents.length,
  });

  return { success: true, documents, indexFileName: config.output.indexFileName, tree: cumulative };
}

/**
 * Human-readable failure report. Errors raised after a merge include the
 * cumulative tree, serialized as Hjson.
 */
export function formatDiagnostic(error: DocGenError): string {
  const report = error.format();
  if (error instanceof InputParseError) {
    return report;
  }
  return `${report}\n\nCumulative definition state:\n${Hjson.stringify(error.tree)}`;
}
