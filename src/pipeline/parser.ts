/**
 * Workbook Parser
 * Decodes raw spreadsheet bytes into an in-memory table
 */

import * as XLSX from "xlsx";
import { ParseError, describeError } from "../errors/index.js";
import type {
  CellValue,
  InputFormat,
  PipelineConfig,
  RawRecord,
  RawTable,
} from "../types/index.js";

const ZIP_SIGNATURE = [0x50, 0x4b, 0x03, 0x04];
const OLE2_SIGNATURE = [0xd0, 0xcf, 0x11, 0xe0, 0xa1, 0xb1, 0x1a, 0xe1];

/**
 * Detects the spreadsheet encoding from leading bytes.
 * Anything that is neither a ZIP container (xlsx) nor an OLE2 compound
 * file (xls) is treated as delimited text.
 */
export function detectFormat(bytes: Uint8Array): InputFormat {
  if (startsWith(bytes, ZIP_SIGNATURE)) return "xlsx";
  if (startsWith(bytes, OLE2_SIGNATURE)) return "xls";
  return "csv";
}

function startsWith(bytes: Uint8Array, signature: number[]): boolean {
  if (bytes.length < signature.length) return false;
  return signature.every((byte, i) => bytes[i] === byte);
}

/**
 * Parses spreadsheet bytes into a RawTable
 *
 * The first non-blank row of the selected sheet is the header.
 * @throws ParseError if the bytes are not a readable spreadsheet in an accepted format
 */
export function parseWorkbook(
  bytes: Uint8Array,
  config: Pick<PipelineConfig, "acceptedFormats" | "sheetName">
): RawTable {
  const format = detectFormat(bytes);

  if (!config.acceptedFormats.has(format)) {
    const accepted = Array.from(config.acceptedFormats).join(", ");
    throw new ParseError(
      `Input is not a supported spreadsheet (accepted: ${accepted})`,
      `Detected ${format === "csv" ? "non-spreadsheet or plain-text" : format} content; leading bytes: ${hexPrefix(bytes)}`
    );
  }

  let workbook: XLSX.WorkBook;
  try {
    workbook =
      format === "csv"
        ? XLSX.read(decodeText(bytes), { type: "string", raw: true })
        : XLSX.read(Buffer.from(bytes), { type: "buffer", cellDates: true });
  } catch (error) {
    throw new ParseError(
      `Unable to read ${format} input`,
      describeError(error),
      { cause: error }
    );
  }

  const sheetName = config.sheetName ?? workbook.SheetNames[0];
  if (sheetName === undefined) {
    throw new ParseError("Workbook contains no sheets", `Format: ${format}`);
  }

  const sheet = workbook.Sheets[sheetName];
  if (sheet === undefined) {
    throw new ParseError(
      `Sheet "${sheetName}" not found`,
      `Available sheets: ${workbook.SheetNames.join(", ")}`
    );
  }

  const grid = XLSX.utils
    .sheet_to_json<unknown[]>(sheet, {
      header: 1,
      defval: null,
      raw: true,
      blankrows: false,
    })
    .map((row) => row.map(toCellValue))
    .filter((row) => row.some((cell) => cell !== null && cell !== ""));

  const [headerRow = [], ...dataRows] = grid;
  const width = dataRows.reduce(
    (max, row) => Math.max(max, row.length),
    headerRow.length
  );
  const columns = buildColumnNames(headerRow, width);

  // fromEntries defines own properties, so a "__proto__" header stays a column
  const rows = dataRows.map(
    (row): RawRecord =>
      Object.fromEntries(
        columns.map((column, i): [string, CellValue] => [column, row[i] ?? null])
      )
  );

  return { sheetName, columns, rows };
}

/**
 * Normalizes a decoded cell to a CellValue
 */
export function toCellValue(value: unknown): CellValue {
  if (value === null || value === undefined) return null;
  if (
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  ) {
    return value;
  }
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value.toISOString();
  }
  return String(value);
}

/**
 * Names blank headers `Unnamed: <index>` and suffixes duplicates with `.1`, `.2`, ...
 */
export function buildColumnNames(header: CellValue[], width: number): string[] {
  const seen = new Set<string>();
  const names: string[] = [];

  for (let i = 0; i < width; i++) {
    const cell = header[i] ?? null;
    const base = cell === null || cell === "" ? `Unnamed: ${i}` : String(cell);

    let name = base;
    let suffix = 1;
    while (seen.has(name)) {
      name = `${base}.${suffix}`;
      suffix++;
    }

    seen.add(name);
    names.push(name);
  }

  return names;
}

function decodeText(bytes: Uint8Array): string {
  // TextDecoder drops a leading byte order mark
  return new TextDecoder("utf-8").decode(bytes);
}

function hexPrefix(bytes: Uint8Array, length = 8): string {
  if (bytes.length === 0) return "(empty)";
  return Array.from(bytes.subarray(0, length))
    .map((byte) => byte.toString(16).padStart(2, "0"))
    .join(" ");
}
