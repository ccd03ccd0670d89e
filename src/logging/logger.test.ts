/**
 * Logger Tests
 *
 * Run with: node --import tsx --test src/logging/logger.test.ts
 */

import { strict as assert } from "node:assert";
import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { test } from "node:test";

import { createLogger } from "./logger.js";
import { generateRunId, getRunId, initRunId } from "./run-id.js";

const LINE_RE =
  /^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] \[(DEBUG|INFO |WARN |ERROR)\] \[[^\]]+\]( \[[^\]]+\])? .+$/;

test("generated run IDs encode the UTC timestamp", () => {
  const id = generateRunId(new Date("2024-01-15T09:30:12.000Z"));
  assert.match(id, /^20240115T093012-[0-9a-f]{6}$/);
});

test("initRunId sets the current run ID", () => {
  const id = initRunId();
  assert.equal(getRunId(), id);
});

test("file output honors level and scope", () => {
  const logDir = mkdtempSync(join(tmpdir(), "xap-log-"));
  try {
    const logger = createLogger({ level: "info", console: false, file: true, logDir });
    logger.debug("hidden");
    logger.info("Wrote layer document", { file: "xap_0.0.1.md" });
    logger.child("generate").child("render").warn("Scoped");

    const lines = readFileSync(join(logDir, "xap-docgen.log"), "utf-8").trimEnd().split("\n");
    assert.equal(lines.length, 2);
    for (const line of lines) assert.match(line, LINE_RE);
    assert.ok(lines[0]?.endsWith('] Wrote layer document {"file":"xap_0.0.1.md"}'));
    assert.ok(lines[1]?.endsWith("] [generate:render] Scoped"));
  } finally {
    rmSync(logDir, { recursive: true, force: true });
  }
});
