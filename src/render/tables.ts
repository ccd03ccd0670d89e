/**
 * Markdown table renderers for derived documentation sections.
 *
 * All renderers are pure: the same tree state always yields the same
 * text, so they can run after every merge.
 */

import {
  type DefinitionTree,
  type DefinitionValue,
  formatCell,
  getEntry,
  isTree,
  withEntry,
} from "../types/tree.js";
import { compareOrdinal } from "../types/version.js";

// ---------------------------------------------------------------------------
// Results
// ---------------------------------------------------------------------------

export type TableResult =
  | { success: true; text: string }
  | { success: false; reason: string };

// ---------------------------------------------------------------------------
// Name / Definition tables
// ---------------------------------------------------------------------------

/**
 * Render a name → description mapping as a two-column table, rows sorted
 * by name. Used for both the type catalog and the term glossary.
 */
export function renderDefinitionTable(definitions: DefinitionTree): string {
  const rows = Object.entries(definitions)
    .sort(([a], [b]) => compareOrdinal(a, b))
    .map(([name, description]) => `| _${name}_ | ${formatCell(description)} |`);

  return `| Name | Definition |\n| -- | -- |\n${rows.join("\n")}\n`;
}

// ---------------------------------------------------------------------------
// Response flags
// ---------------------------------------------------------------------------

/** Bit positions in table order, most significant first. */
export const RESPONSE_FLAG_BITS = [7, 6, 5, 4, 3, 2, 1, 0] as const;

/** Name and description used for bits no layer defines. */
export const UNUSED_BIT_PLACEHOLDER = "-";

/**
 * Add a placeholder entry for every bit 0..7 the mapping lacks. Present
 * entries are kept untouched; missing ones are appended in ascending
 * bit order.
 */
export function fillResponseFlagBits(bits: DefinitionTree): DefinitionTree {
  let filled = bits;
  for (let bit = 0; bit < 8; bit++) {
    const key = String(bit);
    if (getEntry(filled, key) === undefined) {
      filled = withEntry(filled, key, {
        name: UNUSED_BIT_PLACEHOLDER,
        description: UNUSED_BIT_PLACEHOLDER,
      });
    }
  }
  return filled;
}

function bitField(
  entry: DefinitionValue | undefined,
  bit: number,
  field: "name" | "description"
): { success: true; value: string } | { success: false; reason: string } {
  if (!isTree(entry)) {
    return { success: false, reason: `bit ${bit} must be a mapping with name and description` };
  }
  const value = getEntry(entry, field);
  if (value === undefined) {
    return { success: false, reason: `bit ${bit} has no ${field}` };
  }
  return { success: true, value: formatCell(value) };
}

/**
 * Render response flag bits as a single-row table of names followed by a
 * bullet per named bit. Expects every bit 0..7 to be present; run
 * fillResponseFlagBits() first.
 */
export function renderResponseFlags(bits: DefinitionTree): TableResult {
  const names: string[] = [];
  const bullets: string[] = [];

  for (const bit of RESPONSE_FLAG_BITS) {
    const entry = getEntry(bits, String(bit));
    const name = bitField(entry, bit, "name");
    if (!name.success) return name;
    names.push(name.value);

    if (name.value !== UNUSED_BIT_PLACEHOLDER) {
      const description = bitField(entry, bit, "description");
      if (!description.success) return description;
      bullets.push(`\n* \`Bit ${bit}\`: ${description.value}`);
    }
  }

  const header = `| ${RESPONSE_FLAG_BITS.map((bit) => `Bit ${bit}`).join(" | ")} |`;
  const dividers = `|${RESPONSE_FLAG_BITS.map(() => "--").join("|")}|`;
  const nameRow = `| ${names.join(" | ")} |`;

  return { success: true, text: `${header}\n${dividers}\n${nameRow}\n${bullets.join("")}\n` };
}
