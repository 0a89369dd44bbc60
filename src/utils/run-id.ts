/**
 * Run identifiers
 * Used to name per-run artifacts; a timestamp alone collides under rapid or
 * concurrent runs, so a random suffix is always appended.
 */

import { randomUUID } from "crypto";

/**
 * Formats a date as a compact UTC stamp, e.g. 20261018T094512Z
 */
export function formatRunTimestamp(date: Date): string {
  return date
    .toISOString()
    .replace(/\.\d{3}Z$/, "Z")
    .replace(/[-:]/g, "");
}

/**
 * Creates a unique run identifier: `<UTC stamp>-<12 hex chars>`
 * @example createRunId(new Date('2026-10-18T09:45:12Z')) => '20261018T094512Z-3f9a0c12b7de'
 */
export function createRunId(now: Date = new Date()): string {
  const suffix = randomUUID().replace(/-/g, "").slice(0, 12);
  return `${formatRunTimestamp(now)}-${suffix}`;
}
