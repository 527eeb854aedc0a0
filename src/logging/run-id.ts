/**
 * Run ID generation and management.
 * Each workflow run gets a unique run ID for tracing; the process also
 * keeps one for log lines emitted outside any run.
 */

import { randomBytes } from "node:crypto";

/**
 * Generate a short, unique run ID.
 * Format: date prefix + random suffix (e.g., "20240115-a1b2c3")
 */
export function generateRunId(now: Date = new Date()): string {
  const datePart = now.toISOString().slice(0, 10).replace(/-/g, "");
  const randomPart = randomBytes(3).toString("hex");
  return `${datePart}-${randomPart}`;
}

/** Run ID pattern produced by generateRunId */
export const RUN_ID_PATTERN = /^\d{8}-[0-9a-f]{6}$/;

/** Current run ID for this process */
let currentRunId: string | null = null;

/**
 * Initialize the process run ID.
 * Should be called once at startup.
 */
export function initRunId(): string {
  currentRunId = generateRunId();
  return currentRunId;
}

/**
 * Get the process run ID.
 * Returns null if not initialized.
 */
export function getRunId(): string | null {
  return currentRunId;
}
