/**
 * Definition Layer Loader Tests
 *
 * Run with: node --import tsx --test src/layers/loader.test.ts
 *
 * These tests verify:
 *   1. Hjson layers parse into frozen, validated trees
 *   2. Syntax, shape and __proto__ key problems raise InputParseError
 *   3. Directory discovery filters by name and orders by version
 */

import { strict as assert } from "node:assert";
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { after, before, test } from "node:test";

import { isTree } from "../types/tree.js";
import {
  DirectoryLayerProvider,
  InputParseError,
  LayerDiscoveryError,
  StaticLayerProvider,
  parseLayer,
  versionFromStem,
  type LayerSource,
} from "./loader.js";

// ═══════════════════════════════════════════════════════════════════════════
// FIXTURES
// ═══════════════════════════════════════════════════════════════════════════

const NAMING = { prefix: "xap_", extension: ".hjson" };

const BASE_LAYER = `{
  # Base definitions
  version: "0.0.1"
  type_docs: {
    u8: An unsigned 8-bit integer
  }
  documentation: {
    order: ["page_header", "!type_docs!"]
    page_header:
      '''
      # XAP Version 0.0.1
      '''
  }
  enabled: true
  count: 3
  parent: null
}`;

function source(stem: string, text: string): LayerSource {
  return { name: `${stem}.hjson`, stem, read: () => text };
}

// ═══════════════════════════════════════════════════════════════════════════
// PARSING
// ═══════════════════════════════════════════════════════════════════════════

test("Hjson layer parses into a definition tree", () => {
  const layer = parseLayer(source("xap_0.0.1", BASE_LAYER), 0, NAMING);

  assert.equal(layer.name, "xap_0.0.1.hjson");
  assert.equal(layer.stem, "xap_0.0.1");
  assert.equal(layer.version, "0.0.1");
  assert.equal(layer.position, 0);
  assert.deepEqual(layer.tree, {
    version: "0.0.1",
    type_docs: { u8: "An unsigned 8-bit integer" },
    documentation: {
      order: ["page_header", "!type_docs!"],
      page_header: "# XAP Version 0.0.1",
    },
    enabled: true,
    count: 3,
    parent: null,
  });
});

test("parsed layers are deeply frozen", () => {
  const layer = parseLayer(source("xap_0.0.1", BASE_LAYER), 0, NAMING);
  const documentation = layer.tree["documentation"];

  assert.ok(Object.isFrozen(layer));
  assert.ok(Object.isFrozen(layer.tree));
  assert.ok(isTree(documentation));
  assert.ok(Object.isFrozen(documentation));
  assert.ok(Object.isFrozen(documentation["order"]));
});

test("invalid Hjson raises InputParseError", () => {
  assert.throws(
    () => parseLayer(source("xap_0.1.0", "{ a: [1, 2 "), 1, NAMING),
    (err: unknown) => {
      assert.ok(err instanceof InputParseError);
      assert.equal(err.source, "xap_0.1.0.hjson");
      assert.equal(err.issues.length, 1);
      assert.deepEqual(err.issues[0]?.path, []);
      return true;
    }
  );
});

test("top-level list raises InputParseError with a root issue", () => {
  assert.throws(
    () => parseLayer(source("xap_0.1.0", "[1, 2]"), 1, NAMING),
    (err: unknown) => {
      assert.ok(err instanceof InputParseError);
      assert.equal(
        err.format(),
        "Definition layer xap_0.1.0.hjson could not be parsed:\n  - (root): Expected object, received array"
      );
      return true;
    }
  );
});

test("__proto__ key raises InputParseError instead of being dropped", () => {
  assert.throws(
    () => parseLayer(source("xap_0.1.0", '{ "__proto__": "x", a: 1 }'), 1, NAMING),
    (err: unknown) => {
      assert.ok(err instanceof InputParseError);
      assert.equal(
        err.format(),
        'Definition layer xap_0.1.0.hjson could not be parsed:\n  - __proto__: Key "__proto__" is not allowed'
      );
      return true;
    }
  );
});

test("nested __proto__ mapping is reported at its path", () => {
  const text = `{
  type_docs: {
    u8: byte
    __proto__: { polluted: true }
  }
}`;

  assert.throws(
    () => parseLayer(source("xap_0.1.0", text), 1, NAMING),
    (err: unknown) => {
      assert.ok(err instanceof InputParseError);
      assert.deepEqual(err.issues, [
        { path: ["type_docs", "__proto__"], message: 'Key "__proto__" is not allowed' },
      ]);
      return true;
    }
  );
});

test("comments in a layer do not become definition keys", () => {
  const layer = parseLayer(source("xap_0.0.1", BASE_LAYER), 0, NAMING);
  assert.deepEqual(Object.keys(layer.tree), [
    "version",
    "type_docs",
    "documentation",
    "enabled",
    "count",
    "parent",
  ]);
});

test("unreadable source raises InputParseError", () => {
  const broken: LayerSource = {
    name: "xap_0.2.0.hjson",
    stem: "xap_0.2.0",
    read: () => {
      throw new Error("permission denied");
    },
  };

  assert.throws(
    () => parseLayer(broken, 0, NAMING),
    (err: unknown) => {
      assert.ok(err instanceof InputParseError);
      assert.equal(err.issues[0]?.message, "read failed: permission denied");
      return true;
    }
  );
});

test("versionFromStem strips the prefix only when present", () => {
  assert.equal(versionFromStem("xap_0.2.1", NAMING), "0.2.1");
  assert.equal(versionFromStem("draft", NAMING), "draft");
});

// ═══════════════════════════════════════════════════════════════════════════
// PROVIDERS
// ═══════════════════════════════════════════════════════════════════════════

let definitionsDir = "";

before(() => {
  definitionsDir = mkdtempSync(join(tmpdir(), "xap-layers-"));
  for (const version of ["0.10.0", "0.2.0", "0.9.0", "0.0.1"]) {
    writeFileSync(join(definitionsDir, `xap_${version}.hjson`), `{ version: "${version}" }`);
  }
  writeFileSync(join(definitionsDir, "notes.txt"), "not a layer");
  writeFileSync(join(definitionsDir, "other_0.1.0.hjson"), "{}");
  writeFileSync(join(definitionsDir, "xap_0.3.0.json"), "{}");
  mkdirSync(join(definitionsDir, "xap_9.9.9.hjson"));
});

after(() => {
  rmSync(definitionsDir, { recursive: true, force: true });
});

test("directory provider lists matching files in version order", () => {
  const provider = new DirectoryLayerProvider(definitionsDir, NAMING);
  const stems = provider.sources().map((s) => s.stem);

  assert.deepEqual(stems, ["xap_0.0.1", "xap_0.2.0", "xap_0.9.0", "xap_0.10.0"]);
});

test("directory provider sources read file contents", () => {
  const provider = new DirectoryLayerProvider(definitionsDir, NAMING);
  const [first] = provider.sources();

  assert.ok(first);
  assert.equal(first.name, "xap_0.0.1.hjson");
  assert.equal(first.read(), '{ version: "0.0.1" }');
});

test("missing definitions directory raises LayerDiscoveryError", () => {
  assert.throws(
    () => new DirectoryLayerProvider(join(definitionsDir, "absent"), NAMING),
    LayerDiscoveryError
  );
});

test("static provider keeps the given order", () => {
  const provider = new StaticLayerProvider([
    { stem: "xap_0.2.0", text: "{}" },
    { stem: "xap_0.1.0", text: "{}" },
  ]);

  assert.deepEqual(
    provider.sources().map((s) => s.name),
    ["xap_0.2.0.hjson", "xap_0.1.0.hjson"]
  );
});
