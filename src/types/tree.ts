/**
 * Definition tree value model.
 *
 * A definition file parses to a tree of scalars, sequences and nested
 * trees. Every consumer (merger, renderers, assembler) dispatches on
 * `kindOf()` rather than probing values ad hoc.
 */

export type Scalar = string | number | boolean | null;

export type DefinitionValue = Scalar | DefinitionSequence | DefinitionTree;

export type DefinitionSequence = DefinitionValue[];

export interface DefinitionTree {
  [key: string]: DefinitionValue;
}

export type ValueKind = "scalar" | "sequence" | "tree";

/**
 * Tagged view of a value, for exhaustive switches.
 */
export type ClassifiedValue =
  | { kind: "scalar"; value: Scalar }
  | { kind: "sequence"; value: DefinitionSequence }
  | { kind: "tree"; value: DefinitionTree };

export function isSequence(value: DefinitionValue | undefined): value is DefinitionSequence {
  return Array.isArray(value);
}

export function isTree(value: DefinitionValue | undefined): value is DefinitionTree {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function kindOf(value: DefinitionValue): ValueKind {
  return classify(value).kind;
}

export function classify(value: DefinitionValue): ClassifiedValue {
  if (isSequence(value)) return { kind: "sequence", value };
  if (isTree(value)) return { kind: "tree", value };
  return { kind: "scalar", value };
}

/**
 * Deep copy a value. The copy shares no mutable state with the original.
 */
export function cloneValue<T extends DefinitionValue>(value: T): T {
  return structuredClone(value);
}

export function cloneTree(tree: DefinitionTree): DefinitionTree {
  return structuredClone(tree);
}

/**
 * Own-property lookup; a key such as "constructor" never resolves through
 * the prototype chain.
 */
export function getEntry(tree: DefinitionTree, key: string): DefinitionValue | undefined {
  return Object.hasOwn(tree, key) ? tree[key] : undefined;
}

export function hasEntry(tree: DefinitionTree, key: string): boolean {
  return Object.hasOwn(tree, key);
}

/**
 * Return a copy of `tree` without `key`. Key order of the remaining
 * entries is kept.
 */
export function withoutEntry(tree: DefinitionTree, key: string): DefinitionTree {
  return Object.fromEntries(Object.entries(tree).filter(([k]) => k !== key));
}

/**
 * Return a copy of `tree` with `key` set. An existing key keeps its
 * position; a new key is appended.
 */
export function withEntry(tree: DefinitionTree, key: string, value: DefinitionValue): DefinitionTree {
  return Object.fromEntries(new Map(Object.entries(tree)).set(key, value));
}

/**
 * Render a value as table-cell text.
 */
export function formatCell(value: DefinitionValue): string {
  const classified = classify(value);
  switch (classified.kind) {
    case "scalar":
      return String(classified.value);
    case "sequence":
    case "tree":
      return JSON.stringify(classified.value);
  }
}

/**
 * Deep freeze a value to enforce runtime immutability.
 */
export function deepFreeze<T extends DefinitionValue>(value: T): Readonly<T> {
  if (isSequence(value)) {
    for (const item of value) deepFreeze(item);
  } else if (isTree(value)) {
    for (const item of Object.values(value)) deepFreeze(item);
  }
  return Object.freeze(value);
}
