/**
 * Layered merge of definition trees.
 *
 * Later layers override scalars, append to sequences and merge nested
 * trees key by key. The reset sentinel discards what earlier layers
 * contributed:
 *
 *   { "!reset!": true, ... }   as a tree entry replaces the whole subtree
 *   ["!reset!", ...]           as the first sequence element replaces the sequence
 *
 * A sentinel anywhere else is ordinary data. Inputs are never mutated;
 * every result is a fresh tree.
 */

import {
  type DefinitionSequence,
  type DefinitionTree,
  type DefinitionValue,
  classify,
  cloneTree,
  cloneValue,
  hasEntry,
  isSequence,
  isTree,
  withoutEntry,
} from "../types/tree.js";

export const DEFAULT_RESET_SENTINEL = "!reset!";

export interface MergeOptions {
  /** Reserved reset token. Default: "!reset!" */
  resetSentinel?: string;
}

/**
 * True when the sequence opens with the reset sentinel. An empty
 * sequence never resets.
 */
export function isResetSequence(sequence: DefinitionSequence, sentinel: string): boolean {
  return sequence.length > 0 && sequence[0] === sentinel;
}

function mergeEntry(
  current: DefinitionValue,
  incoming: DefinitionValue,
  sentinel: string
): DefinitionValue {
  const classified = classify(incoming);

  switch (classified.kind) {
    case "tree": {
      const tree = classified.value;
      if (hasEntry(tree, sentinel) || !isTree(current)) {
        return withoutEntry(cloneTree(tree), sentinel);
      }
      return withoutEntry(mergeWith(current, tree, sentinel), sentinel);
    }
    case "sequence": {
      const sequence = classified.value;
      if (!isSequence(current)) {
        return cloneValue(sequence);
      }
      if (isResetSequence(sequence, sentinel)) {
        return cloneValue(sequence.slice(1));
      }
      return [...current, ...cloneValue(sequence)];
    }
    case "scalar":
      return classified.value;
  }
}

function mergeWith(existing: DefinitionTree, incoming: DefinitionTree, sentinel: string): DefinitionTree {
  const merged = new Map<string, DefinitionValue>(Object.entries(cloneTree(existing)));

  for (const [key, value] of Object.entries(incoming)) {
    const current = merged.get(key);
    merged.set(
      key,
      current === undefined ? cloneValue(value) : mergeEntry(current, value, sentinel)
    );
  }

  return Object.fromEntries(merged);
}

/**
 * Merge one layer into the tree accumulated so far.
 *
 * With `existing` null the result is a copy of `incoming`. Otherwise
 * each incoming key is applied by the kind of its incoming value: trees
 * merge recursively, sequences append (or reset), scalars replace. A key
 * missing from `existing` is copied as-is.
 */
export function mergeTrees(
  existing: DefinitionTree | null,
  incoming: DefinitionTree,
  options: MergeOptions = {}
): DefinitionTree {
  if (existing === null) {
    return cloneTree(incoming);
  }
  return mergeWith(existing, incoming, options.resetSentinel ?? DEFAULT_RESET_SENTINEL);
}

/**
 * Fold layers left to right: merge(merge(merge(null, L1), L2), L3)...
 * An empty list yields an empty tree.
 */
export function mergeLayers(
  layers: readonly DefinitionTree[],
  options: MergeOptions = {}
): DefinitionTree {
  return (
    layers.reduce<DefinitionTree | null>(
      (accumulated, layer) => mergeTrees(accumulated, layer, options),
      null
    ) ?? {}
  );
}
