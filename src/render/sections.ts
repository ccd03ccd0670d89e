/**
 * Refresh of derived documentation sections.
 *
 * After every merge the cumulative tree may carry source keys
 * (`type_docs`, `term_definitions`, `response_flags`) whose rendered text
 * belongs under reserved keys of the documentation subtree. Once a source
 * key appears it stays in the tree, so its section is re-rendered for
 * every later layer too.
 */

import type { ReservedSection, ReservedSections } from "../config/docgen/schema.js";
import { type DefinitionTree, getEntry, isTree, withEntry } from "../types/tree.js";
import {
  fillResponseFlagBits,
  renderDefinitionTable,
  renderResponseFlags,
  type TableResult,
} from "./tables.js";

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export class SectionRenderError extends Error {
  constructor(
    public readonly sourceKey: string,
    public readonly reason: string,
    /** Cumulative tree at the time of failure, for diagnostics */
    public readonly tree: DefinitionTree
  ) {
    super(`Cannot render section from "${sourceKey}": ${reason}`);
    this.name = "SectionRenderError";
  }

  format(): string {
    return `Section rendering failed:\n  - ${this.sourceKey}: ${this.reason}`;
  }
}

// ---------------------------------------------------------------------------
// Options / results
// ---------------------------------------------------------------------------

export interface SectionOptions {
  documentationKey: string;
  reservedSections: ReservedSections;
}

export type RefreshResult =
  | {
      success: true;
      tree: DefinitionTree;
      /** Documentation keys written during this refresh, in render order */
      rendered: string[];
    }
  | { success: false; error: SectionRenderError };

type SectionRenderer = (
  source: DefinitionTree,
  section: ReservedSection
) => { success: true; text: string; source: DefinitionTree } | { success: false; reason: string };

// ---------------------------------------------------------------------------
// Renderers
// ---------------------------------------------------------------------------

const renderTableSection: SectionRenderer = (source) => ({
  success: true,
  text: renderDefinitionTable(source),
  source,
});

/**
 * The filled-in placeholder bits are written back into the source so
 * later layers merge onto them.
 */
const renderFlagsSection: SectionRenderer = (source, section) => {
  const bits = getEntry(source, "bits");
  if (!isTree(bits)) {
    return { success: false, reason: `"${section.sourceKey}.bits" must be a mapping of bit numbers` };
  }

  const filled = fillResponseFlagBits(bits);
  const table: TableResult = renderResponseFlags(filled);
  if (!table.success) return table;

  return { success: true, text: table.text, source: withEntry(source, "bits", filled) };
};

// ---------------------------------------------------------------------------
// Refresh
// ---------------------------------------------------------------------------

/**
 * Re-render every reserved section whose source key is present.
 *
 * Returns a new tree; the input is not modified.
 */
export function refreshSections(tree: DefinitionTree, options: SectionOptions): RefreshResult {
  const { documentationKey, reservedSections } = options;
  const plan: Array<[ReservedSection, SectionRenderer]> = [
    [reservedSections.typeDocs, renderTableSection],
    [reservedSections.termDefinitions, renderTableSection],
    [reservedSections.responseFlags, renderFlagsSection],
  ];

  let current = tree;
  const rendered: string[] = [];

  for (const [section, render] of plan) {
    const source = getEntry(current, section.sourceKey);
    if (source === undefined) continue;

    const fail = (reason: string): RefreshResult => ({
      success: false,
      error: new SectionRenderError(section.sourceKey, reason, current),
    });

    if (!isTree(source)) {
      return fail("expected a mapping");
    }

    const documentation = getEntry(current, documentationKey);
    if (!isTree(documentation)) {
      return fail(`tree has no "${documentationKey}" mapping to receive the section`);
    }

    const result = render(source, section);
    if (!result.success) {
      return fail(result.reason);
    }

    current = withEntry(current, section.sourceKey, result.source);
    current = withEntry(
      current,
      documentationKey,
      withEntry(documentation, section.sectionKey, result.text)
    );
    rendered.push(section.sectionKey);
  }

  return { success: true, tree: current, rendered };
}
