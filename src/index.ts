/**
 * XAP documentation generator.
 *
 * Folds versioned definition layers into a cumulative tree and renders a
 * Markdown reference per version plus an index.
 */

export * from "./types/tree.js";
export { compareOrdinal, compareVersions } from "./types/version.js";
export * from "./merge/index.js";
export * from "./render/index.js";
export * from "./assembly/index.js";
export * from "./layers/index.js";
export * from "./pipeline/index.js";
export * from "./config/index.js";
export * from "./logging/index.js";
