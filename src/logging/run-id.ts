/**
 * Run ID generation and management.
 * Each generator run gets an ID so log lines from one run can be grouped.
 */

import { randomBytes } from "node:crypto";

/**
 * Generate a short, unique run ID.
 * Format: UTC date and time + random suffix (e.g., "20240115T093012-a1b2c3")
 */
export function generateRunId(now: Date = new Date()): string {
  const stamp = now.toISOString().slice(0, 19).replace(/[-:]/g, "");
  return `${stamp}-${randomBytes(3).toString("hex")}`;
}

let currentRunId: string | null = null;

/**
 * Initialize a new run ID. The CLI calls this once before creating its
 * logger.
 */
export function initRunId(): string {
  currentRunId = generateRunId();
  return currentRunId;
}

/**
 * Current run ID, or null before initRunId().
 */
export function getRunId(): string | null {
  return currentRunId;
}
