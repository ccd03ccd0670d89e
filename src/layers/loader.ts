/**
 * Definition layer discovery and parsing.
 *
 * USAGE:
 *
 *   const provider = new DirectoryLayerProvider("data/xap", config.layers);
 *
 *   for (const [position, source] of provider.sources().entries()) {
 *     const layer = parseLayer(source, position, config.layers);
 *     ...
 *   }
 *
 * Sources are ordered by the version encoded in their file name
 * (xap_0.0.1.hjson, xap_0.1.0.hjson, ...), so every run folds layers in
 * the same order.
 */

import { existsSync, readFileSync, readdirSync, statSync } from "node:fs";
import { basename, extname, join, resolve } from "node:path";
import Hjson from "hjson";
import type { ZodIssue } from "zod";

import type { LayerNaming } from "../config/docgen/schema.js";
import { type DefinitionTree, deepFreeze } from "../types/tree.js";
import { compareVersions } from "../types/version.js";
import { DefinitionTreeSchema } from "./schema.js";

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export interface LayerParseIssue {
  /** Path inside the layer; empty for syntax errors */
  path: (string | number)[];
  message: string;
}

export class InputParseError extends Error {
  constructor(
    /** Source file name */
    public readonly source: string,
    public readonly issues: LayerParseIssue[]
  ) {
    super(`Invalid definition layer ${source}: ${issues.length} issue(s)`);
    this.name = "InputParseError";
  }

  format(): string {
    const lines = [`Definition layer ${this.source} could not be parsed:`];
    for (const issue of this.issues) {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      lines.push(`  - ${path}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

export class LayerDiscoveryError extends Error {
  constructor(
    public readonly directory: string,
    message?: string
  ) {
    super(message ?? `Cannot list definition layers in ${directory}`);
    this.name = "LayerDiscoveryError";
  }
}

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * Raw input for one layer.
 */
export interface LayerSource {
  /** File name, e.g. "xap_0.1.0.hjson" */
  name: string;
  /** File name without extension, e.g. "xap_0.1.0" */
  stem: string;
  read(): string;
}

export interface LayerProvider {
  /** Sources in merge order. */
  sources(): LayerSource[];
}

/**
 * A parsed, validated and frozen layer.
 */
export interface Layer {
  readonly name: string;
  readonly stem: string;
  /** Stem without the layer prefix, e.g. "0.1.0" */
  readonly version: string;
  /** Index in the merge order */
  readonly position: number;
  readonly tree: Readonly<DefinitionTree>;
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

export function versionFromStem(stem: string, naming: Pick<LayerNaming, "prefix">): string {
  return stem.startsWith(naming.prefix) ? stem.slice(naming.prefix.length) : stem;
}

function toLayerIssues(issues: ZodIssue[]): LayerParseIssue[] {
  return issues.map((issue) => ({
    path: issue.path.filter(
      (p): p is string | number => typeof p === "string" || typeof p === "number"
    ),
    message: issue.message,
  }));
}

const FORBIDDEN_KEY = "__proto__";

/**
 * Keys of a parsed mapping in source order. Hjson assigns keys with plain
 * property writes, so a `__proto__` key never becomes an own property; with
 * `keepWsc` the parser still records every key it read.
 */
function sourceKeys(mapping: object): string[] {
  const comments: unknown = Reflect.get(mapping, "__COMMENTS__");
  const order: unknown =
    typeof comments === "object" && comments !== null ? Reflect.get(comments, "o") : undefined;
  if (!Array.isArray(order)) return Object.keys(mapping);
  return order.filter((key): key is string => typeof key === "string");
}

function forbiddenKeyIssues(value: unknown, path: (string | number)[]): LayerParseIssue[] {
  if (Array.isArray(value)) {
    return value.flatMap((item: unknown, index) => forbiddenKeyIssues(item, [...path, index]));
  }
  if (typeof value !== "object" || value === null) return [];

  return sourceKeys(value).flatMap((key): LayerParseIssue[] =>
    key === FORBIDDEN_KEY
      ? [{ path: [...path, key], message: `Key "${key}" is not allowed` }]
      : forbiddenKeyIssues(Reflect.get(value, key), [...path, key])
  );
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Read, parse and validate one layer source.
 *
 * @throws InputParseError if the source cannot be read, is not valid
 *         Hjson, uses a `__proto__` key, or is not a mapping of definition
 *         values
 */
export function parseLayer(
  source: LayerSource,
  position: number,
  naming: Pick<LayerNaming, "prefix">
): Layer {
  let text: string;
  try {
    text = source.read();
  } catch (err) {
    throw new InputParseError(source.name, [{ path: [], message: `read failed: ${describeError(err)}` }]);
  }

  let raw: unknown;
  try {
    raw = Hjson.parse(text, { keepWsc: true });
  } catch (err) {
    throw new InputParseError(source.name, [{ path: [], message: describeError(err) }]);
  }

  const forbidden = forbiddenKeyIssues(raw, []);
  if (forbidden.length > 0) {
    throw new InputParseError(source.name, forbidden);
  }

  const result = DefinitionTreeSchema.safeParse(raw);
  if (!result.success) {
    throw new InputParseError(source.name, toLayerIssues(result.error.issues));
  }

  return Object.freeze({
    name: source.name,
    stem: source.stem,
    version: versionFromStem(source.stem, naming),
    position,
    tree: deepFreeze(result.data),
  });
}

// ---------------------------------------------------------------------------
// Providers
// ---------------------------------------------------------------------------

/**
 * Lists `<prefix><version><extension>` files in one directory, ordered by
 * version ascending.
 */
export class DirectoryLayerProvider implements LayerProvider {
  readonly directory: string;
  private readonly naming: LayerNaming;

  constructor(directory: string, naming: LayerNaming) {
    this.directory = resolve(directory);
    this.naming = naming;

    if (!existsSync(this.directory) || !statSync(this.directory).isDirectory()) {
      throw new LayerDiscoveryError(
        this.directory,
        `Definitions directory does not exist: ${this.directory}`
      );
    }
  }

  sources(): LayerSource[] {
    const { prefix, extension } = this.naming;

    return readdirSync(this.directory)
      .filter((name) => name.startsWith(prefix) && extname(name) === extension)
      .filter((name) => statSync(join(this.directory, name)).isFile())
      .map((name) => {
        const path = join(this.directory, name);
        return {
          name,
          stem: basename(name, extension),
          read: () => readFileSync(path, "utf-8"),
        };
      })
      .sort((a, b) =>
        compareVersions(versionFromStem(a.stem, this.naming), versionFromStem(b.stem, this.naming))
      );
  }
}

/**
 * Provider over in-memory texts, taken in the order given.
 */
export class StaticLayerProvider implements LayerProvider {
  private readonly items: LayerSource[];

  constructor(items: ReadonlyArray<{ stem: string; text: string; extension?: string }>) {
    this.items = items.map(({ stem, text, extension = ".hjson" }) => ({
      name: `${stem}${extension}`,
      stem,
      read: () => text,
    }));
  }

  sources(): LayerSource[] {
    return [...this.items];
  }
}
