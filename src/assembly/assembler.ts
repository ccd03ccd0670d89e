/**
 * Document assembly.
 *
 * A layer's document is the concatenation of the sections named by
 * `documentation.order`, each trimmed and followed by a blank line. The
 * index document links every layer document, newest version first.
 */

import {
  type DefinitionTree,
  formatCell,
  getEntry,
  isSequence,
  isTree,
} from "../types/tree.js";
import { compareVersions } from "../types/version.js";

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export class MissingSectionError extends Error {
  constructor(
    /** Order entry (or structural key) that could not be resolved */
    public readonly sectionKey: string,
    public readonly reason: string,
    /** Cumulative tree at the time of failure, for diagnostics */
    public readonly tree: DefinitionTree
  ) {
    super(`Cannot assemble document: section "${sectionKey}" ${reason}`);
    this.name = "MissingSectionError";
  }

  format(): string {
    return `Document assembly failed:\n  - ${this.sectionKey}: ${this.reason}`;
  }
}

// ---------------------------------------------------------------------------
// Layer documents
// ---------------------------------------------------------------------------

export interface AssemblyOptions {
  documentationKey: string;
  orderKey: string;
}

export type AssembleResult =
  | { success: true; text: string; sections: string[] }
  | { success: false; error: MissingSectionError };

/**
 * Concatenate the documentation sections of a cumulative tree in order.
 */
export function assembleDocument(tree: DefinitionTree, options: AssemblyOptions): AssembleResult {
  const { documentationKey, orderKey } = options;
  const fail = (sectionKey: string, reason: string): AssembleResult => ({
    success: false,
    error: new MissingSectionError(sectionKey, reason, tree),
  });

  const documentation = getEntry(tree, documentationKey);
  if (!isTree(documentation)) {
    return fail(documentationKey, "is not defined by any layer");
  }

  const order = getEntry(documentation, orderKey);
  if (!isSequence(order)) {
    return fail(`${documentationKey}.${orderKey}`, "must be a list of section keys");
  }

  const parts: string[] = [];
  const sections: string[] = [];

  for (const entry of order) {
    if (typeof entry !== "string") {
      return fail(formatCell(entry), "is not a section key");
    }

    const text = getEntry(documentation, entry);
    if (text === undefined) {
      return fail(entry, "is listed in the order but has no text");
    }
    if (typeof text !== "string") {
      return fail(entry, "must be text");
    }

    parts.push(text.trim(), "\n\n");
    sections.push(entry);
  }

  return { success: true, text: parts.join(""), sections };
}

// ---------------------------------------------------------------------------
// Index document
// ---------------------------------------------------------------------------

export interface IndexEntry {
  /** Document file name, used as the link target */
  fileName: string;
  /** Display version, e.g. "0.2.0" */
  version: string;
}

export interface IndexOptions {
  indexTitle: string;
  versionLabel: string;
}

/**
 * Build the index document listing every layer document, highest
 * version first regardless of the order entries are passed in.
 */
export function buildIndexDocument(entries: readonly IndexEntry[], options: IndexOptions): string {
  const lines = [...entries]
    .sort((a, b) => compareVersions(b.version, a.version))
    .map((entry) => `* [${options.versionLabel} ${entry.version}](${entry.fileName})\n`);

  return `# ${options.indexTitle}\n\n${lines.join("")}`;
}
