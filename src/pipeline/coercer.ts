/**
 * Numeric Coercer
 * Converts numeric columns in place of their raw values; bad cells degrade to
 * missing (null) and are counted, they never abort the run.
 */

import {
  NUMERIC_COLUMNS,
  type CellValue,
  type QualityReport,
  type RawRecord,
  type RawTable,
} from "../types/index.js";

const DECIMAL_LITERAL = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

/**
 * Reads a cell as a number, or null when it is blank or not numeric
 * @example toNumeric(' 12.5 ') => 12.5
 * @example toNumeric('12 shares') => null
 */
export function toNumeric(value: CellValue): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === "boolean") {
    return value ? 1 : 0;
  }
  if (typeof value === "string") {
    const trimmed = value.trim();
    if (!DECIMAL_LITERAL.test(trimmed)) return null;
    const parsed = Number(trimmed);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

function isBlank(value: CellValue): boolean {
  return value === null || (typeof value === "string" && value.trim() === "");
}

/**
 * Result of numeric coercion
 */
export interface CoercionResult {
  /** Same rows and columns, numeric columns replaced by number | null */
  table: RawTable;
  /** Missing and unparseable counts per coerced column */
  report: QualityReport;
}

/**
 * Coerces the given columns of every row to number | null
 */
export function coerceNumerics(
  table: RawTable,
  columns: readonly string[] = NUMERIC_COLUMNS
): CoercionResult {
  const report: QualityReport = {};
  for (const column of columns) {
    report[column] = { missing: 0, unparseable: 0 };
  }

  const rows = table.rows.map((row) => {
    const coerced: RawRecord = { ...row };

    for (const column of columns) {
      const raw = row[column] ?? null;
      const value = toNumeric(raw);
      coerced[column] = value;

      const quality = report[column];
      if (value === null && quality !== undefined) {
        quality.missing++;
        if (!isBlank(raw)) {
          quality.unparseable++;
        }
      }
    }

    return coerced;
  });

  return {
    table: { ...table, rows },
    report,
  };
}
