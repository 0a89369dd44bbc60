/**
 * Workbook Exporter
 * Serializes the enriched dataset and both summaries into one xlsx workbook
 */

import * as XLSX from "xlsx";
import {
  OUTPUT_SHEETS,
  type CellValue,
  type EnrichedTable,
  type PortfolioSummary,
  type RawTable,
  type SectorSummaryRow,
} from "../types/index.js";
import { parseWorkbook } from "./parser.js";

const PORTFOLIO_COLUMNS = [
  "Total_Investment",
  "Total_Current_Value",
  "Net_Profit_Loss",
] as const;

const SECTOR_COLUMNS = ["Sector", "Profit_Loss"] as const;

/**
 * Builds the output workbook
 *
 * Sheets, in order: Detailed_Stock_Data, Portfolio_Summary, Sector_Summary.
 * Each sheet starts with a header row; no index column is written.
 */
export function buildOutputWorkbook(
  enriched: EnrichedTable,
  portfolio: PortfolioSummary,
  sectors: readonly SectorSummaryRow[]
): XLSX.WorkBook {
  const workbook = XLSX.utils.book_new();

  const detailed: CellValue[][] = [
    enriched.columns,
    ...enriched.rows.map((row) =>
      enriched.columns.map((column) => row[column] ?? null)
    ),
  ];

  const summary: CellValue[][] = [
    [...PORTFOLIO_COLUMNS],
    PORTFOLIO_COLUMNS.map((column) => portfolio[column]),
  ];

  const bySector: CellValue[][] = [
    [...SECTOR_COLUMNS],
    ...sectors.map((row) => [row.Sector, row.Profit_Loss]),
  ];

  XLSX.utils.book_append_sheet(
    workbook,
    XLSX.utils.aoa_to_sheet(detailed),
    OUTPUT_SHEETS.DETAILED
  );
  XLSX.utils.book_append_sheet(
    workbook,
    XLSX.utils.aoa_to_sheet(summary),
    OUTPUT_SHEETS.PORTFOLIO
  );
  XLSX.utils.book_append_sheet(
    workbook,
    XLSX.utils.aoa_to_sheet(bySector),
    OUTPUT_SHEETS.SECTOR
  );

  return workbook;
}

/**
 * Serializes the output workbook to xlsx bytes
 */
export function exportWorkbook(
  enriched: EnrichedTable,
  portfolio: PortfolioSummary,
  sectors: readonly SectorSummaryRow[]
): Uint8Array {
  const workbook = buildOutputWorkbook(enriched, portfolio, sectors);
  const buffer: Buffer = XLSX.write(workbook, {
    type: "buffer",
    bookType: "xlsx",
    compression: true,
  });
  return new Uint8Array(buffer);
}

/**
 * Reads the Detailed_Stock_Data sheet back from exported bytes
 */
export function readDetailedSheet(bytes: Uint8Array): RawTable {
  return parseWorkbook(bytes, {
    acceptedFormats: new Set(["xlsx"]),
    sheetName: OUTPUT_SHEETS.DETAILED,
  });
}
