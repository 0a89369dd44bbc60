/**
 * Schema Validator
 * Checks that every required column is present before any computation
 */

import { REQUIRED_COLUMNS } from "../types/index.js";

/**
 * Result of a schema check
 */
export interface SchemaValidationResult {
  valid: boolean;
  /** Required columns not found, in the order they are required */
  missingColumns: string[];
}

/**
 * Compares actual column names against the required list (exact, case-sensitive)
 */
export function validateSchema(
  columns: readonly string[],
  required: readonly string[] = REQUIRED_COLUMNS
): SchemaValidationResult {
  const present = new Set(columns);
  const missingColumns = required.filter((column) => !present.has(column));

  return {
    valid: missingColumns.length === 0,
    missingColumns,
  };
}
