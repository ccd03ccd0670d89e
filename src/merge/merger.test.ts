/**
 * Layered Merge Tests
 *
 * Run with: node --import tsx --test src/merge/merger.test.ts
 *
 * These tests verify:
 *   1. Sequences append, or reset when led by the sentinel
 *   2. Nested trees merge key by key, or reset when holding the sentinel
 *   3. Scalars are replaced and new keys are copied in
 *   4. Inputs are never mutated and results share no state with them
 *   5. Left-to-right folding over many layers
 */

import { strict as assert } from "node:assert";
import { test } from "node:test";

import { mergeTrees, mergeLayers, isResetSequence } from "./merger.js";
import { type DefinitionTree, deepFreeze, isSequence, isTree } from "../types/tree.js";

// ═══════════════════════════════════════════════════════════════════════════
// SEQUENCES
// ═══════════════════════════════════════════════════════════════════════════

test("sequences append in layer order", () => {
  const result = mergeTrees({ a: [1, 2] }, { a: [3, 4] });
  assert.deepEqual(result, { a: [1, 2, 3, 4] });
});

test("leading reset sentinel replaces the sequence", () => {
  const result = mergeTrees({ a: [1, 2] }, { a: ["!reset!", 3] });
  assert.deepEqual(result, { a: [3] });
});

test("reset sentinel alone clears the sequence", () => {
  const result = mergeTrees({ a: [1, 2] }, { a: ["!reset!"] });
  assert.deepEqual(result, { a: [] });
});

test("sentinel after the first element is appended as data", () => {
  const result = mergeTrees({ a: [1] }, { a: [2, "!reset!", 3] });
  assert.deepEqual(result, { a: [1, 2, "!reset!", 3] });
});

test("empty incoming sequence appends nothing", () => {
  const result = mergeTrees({ a: [1, 2] }, { a: [] });
  assert.deepEqual(result, { a: [1, 2] });
});

test("isResetSequence guards empty sequences", () => {
  assert.equal(isResetSequence([], "!reset!"), false);
  assert.equal(isResetSequence(["!reset!"], "!reset!"), true);
  assert.equal(isResetSequence(["x", "!reset!"], "!reset!"), false);
});

test("sequence replaces a scalar held by an earlier layer", () => {
  const result = mergeTrees({ a: "text" }, { a: [1] });
  assert.deepEqual(result, { a: [1] });
});

test("sequences of trees append without merging elements", () => {
  const result = mergeTrees(
    { routes: [{ id: 1, name: "version" }] },
    { routes: [{ id: 1, name: "capabilities" }] }
  );
  assert.deepEqual(result, {
    routes: [
      { id: 1, name: "version" },
      { id: 1, name: "capabilities" },
    ],
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// NESTED TREES
// ═══════════════════════════════════════════════════════════════════════════

test("nested trees merge key-wise and keep untouched keys", () => {
  const result = mergeTrees({ a: { x: 1, y: 2 } }, { a: { y: 3 } });
  assert.deepEqual(result, { a: { x: 1, y: 3 } });
});

test("reset sentinel key replaces the subtree and is stripped", () => {
  const result = mergeTrees({ a: { x: 1 } }, { a: { "!reset!": true, z: 9 } });
  assert.deepEqual(result, { a: { z: 9 } });
});

test("merge recurses through several levels", () => {
  const existing: DefinitionTree = {
    routes: { "0x00": { name: "version", return: "u32" } },
  };
  const incoming: DefinitionTree = {
    routes: { "0x00": { description: "Protocol version" }, "0x01": { name: "caps" } },
  };

  assert.deepEqual(mergeTrees(existing, incoming), {
    routes: {
      "0x00": { name: "version", return: "u32", description: "Protocol version" },
      "0x01": { name: "caps" },
    },
  });
});

test("sequence inside a nested tree appends", () => {
  const result = mergeTrees({ doc: { order: ["intro"] } }, { doc: { order: ["types"] } });
  assert.deepEqual(result, { doc: { order: ["intro", "types"] } });
});

test("nested reset sentinel deeper down only resets its own subtree", () => {
  const result = mergeTrees(
    { outer: { keep: 1, inner: { old: true } } },
    { outer: { inner: { "!reset!": true, fresh: true } } }
  );
  assert.deepEqual(result, { outer: { keep: 1, inner: { fresh: true } } });
});

test("tree replaces a scalar held by an earlier layer", () => {
  const result = mergeTrees({ a: 5 }, { a: { b: 1 } });
  assert.deepEqual(result, { a: { b: 1 } });
});

test("new key is copied as-is, sentinel included", () => {
  const result = mergeTrees({}, { a: { "!reset!": true, b: 1 } });
  assert.deepEqual(result, { a: { "!reset!": true, b: 1 } });
});

test("custom sentinel is honored", () => {
  const result = mergeTrees(
    { a: [1], b: { x: 1 } },
    { a: ["!clear!", 2], b: { "!clear!": true, y: 2 } },
    { resetSentinel: "!clear!" }
  );
  assert.deepEqual(result, { a: [2], b: { y: 2 } });
});

// ═══════════════════════════════════════════════════════════════════════════
// SCALARS AND KEYS
// ═══════════════════════════════════════════════════════════════════════════

test("scalars are replaced by the later layer", () => {
  const result = mergeTrees({ a: 1, b: "x" }, { a: 2 });
  assert.deepEqual(result, { a: 2, b: "x" });
});

test("scalar replaces a sequence", () => {
  const result = mergeTrees({ a: [1, 2] }, { a: null });
  assert.deepEqual(result, { a: null });
});

test("existing keys keep their position, new keys follow", () => {
  const result = mergeTrees({ first: 1, second: 2 }, { third: 3, first: 10 });
  assert.deepEqual(Object.keys(result), ["first", "second", "third"]);
});

// ═══════════════════════════════════════════════════════════════════════════
// OWNERSHIP
// ═══════════════════════════════════════════════════════════════════════════

test("null existing yields an equal but independent copy", () => {
  const incoming: DefinitionTree = { a: { b: [1, 2] } };
  const result = mergeTrees(null, incoming);

  assert.deepEqual(result, incoming);
  assert.notEqual(result, incoming);

  const nested = result["a"];
  assert.ok(isTree(nested));
  const list = nested["b"];
  assert.ok(isSequence(list));
  list.push(3);

  assert.deepEqual(incoming, { a: { b: [1, 2] } });
});

test("inputs are not mutated by a reset merge", () => {
  const existing: DefinitionTree = { a: { x: 1 }, s: [1] };
  const incoming: DefinitionTree = { a: { "!reset!": true, z: 9 }, s: ["!reset!", 2] };

  mergeTrees(existing, incoming);

  assert.deepEqual(existing, { a: { x: 1 }, s: [1] });
  assert.deepEqual(incoming, { a: { "!reset!": true, z: 9 }, s: ["!reset!", 2] });
});

test("frozen inputs merge without error", () => {
  const existing = deepFreeze<DefinitionTree>({ a: [1] });
  const incoming = deepFreeze<DefinitionTree>({ a: [2] });
  assert.deepEqual(mergeTrees(existing, incoming), { a: [1, 2] });
});

// ═══════════════════════════════════════════════════════════════════════════
// FOLDING
// ═══════════════════════════════════════════════════════════════════════════

test("mergeLayers folds left to right", () => {
  const result = mergeLayers([
    { version: "0.0.1", items: ["a"], info: { x: 1 } },
    { version: "0.1.0", items: ["b"], info: { y: 2 } },
    { version: "0.2.0", items: ["!reset!", "c"], info: { "!reset!": true, z: 3 } },
  ]);

  assert.deepEqual(result, { version: "0.2.0", items: ["c"], info: { z: 3 } });
});

test("mergeLayers over no layers yields an empty tree", () => {
  assert.deepEqual(mergeLayers([]), {});
});
