/**
 * Builds in-memory spreadsheet fixtures
 */

import * as XLSX from "xlsx";
import type { CellValue } from "../../src/types/index.js";

export const HEADER = ["Buy_Price", "Current_Price", "Quantity", "Risk_Level", "Sector"];

/**
 * Encodes rows (header first) as a single-sheet xlsx workbook
 */
export function buildWorkbook(
  rows: CellValue[][],
  sheetName = "Sheet1"
): Uint8Array {
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet(rows), sheetName);
  const buffer: Buffer = XLSX.write(workbook, { type: "buffer", bookType: "xlsx" });
  return new Uint8Array(buffer);
}

/**
 * Reads every sheet of xlsx bytes as objects keyed by header
 */
export function readSheets(bytes: Uint8Array): {
  sheetNames: string[];
  sheet: (name: string) => Record<string, unknown>[];
} {
  const workbook = XLSX.read(Buffer.from(bytes), { type: "buffer" });
  return {
    sheetNames: workbook.SheetNames,
    sheet: (name) => {
      const ws = workbook.Sheets[name];
      if (ws === undefined) throw new Error(`No sheet ${name}`);
      return XLSX.utils.sheet_to_json<Record<string, unknown>>(ws);
    },
  };
}

/**
 * Fixed clock for deterministic log timestamps
 */
export const FIXED_NOW = new Date("2026-01-05T10:00:00.000Z");
export const fixedClock = (): Date => FIXED_NOW;
