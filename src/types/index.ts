/**
 * Core data model and pipeline configuration
 */

// ============================================================================
// Column contract
// ============================================================================

/**
 * Columns that must be present (exact, case-sensitive) before any computation
 */
export const REQUIRED_COLUMNS = [
  "Buy_Price",
  "Current_Price",
  "Quantity",
  "Risk_Level",
  "Sector",
] as const;

export type RequiredColumn = (typeof REQUIRED_COLUMNS)[number];

/**
 * Columns interpreted as numbers; unparseable values become missing
 */
export const NUMERIC_COLUMNS = ["Buy_Price", "Current_Price", "Quantity"] as const;

export type NumericColumn = (typeof NUMERIC_COLUMNS)[number];

/**
 * Columns appended to every record by the enricher, in output order
 */
export const DERIVED_COLUMNS = [
  "Investment_Value",
  "Current_Value",
  "Profit_Loss",
  "Status",
  "High_Risk_Flag",
] as const;

export type DerivedColumn = (typeof DERIVED_COLUMNS)[number];

/**
 * Output sheet names, in workbook order
 */
export const OUTPUT_SHEETS = {
  DETAILED: "Detailed_Stock_Data",
  PORTFOLIO: "Portfolio_Summary",
  SECTOR: "Sector_Summary",
} as const;

// ============================================================================
// Tables
// ============================================================================

/**
 * A single cell as read from the source sheet
 */
export type CellValue = string | number | boolean | null;

/**
 * A source row keyed by column name
 */
export type RawRecord = Record<string, CellValue>;

/**
 * The uploaded table, held fully in memory
 */
export interface RawTable {
  /** Name of the sheet the rows were read from */
  sheetName: string;
  /** Column names in source order */
  columns: string[];
  /** Rows in source order */
  rows: RawRecord[];
}

export type ProfitStatus = "Profit" | "Loss";
export type RiskFlag = "Yes" | "No";

/**
 * Fields computed for every record
 */
export interface DerivedFields {
  Investment_Value: number;
  Current_Value: number;
  Profit_Loss: number;
  Status: ProfitStatus;
  High_Risk_Flag: RiskFlag;
}

/**
 * A source row plus the five derived fields
 */
export type EnrichedRecord = RawRecord & DerivedFields;

/**
 * The validated and enriched dataset
 */
export interface EnrichedTable {
  /** Original columns followed by the derived columns */
  columns: string[];
  rows: EnrichedRecord[];
}

/**
 * Single-row totals across all records
 */
export interface PortfolioSummary {
  Total_Investment: number;
  Total_Current_Value: number;
  Net_Profit_Loss: number;
}

/**
 * Per-sector subtotal of profit/loss
 */
export interface SectorSummaryRow {
  Sector: CellValue;
  Profit_Loss: number;
}

/**
 * Data-quality counts for one numeric column after coercion
 */
export interface ColumnQuality {
  /** Values that are missing after coercion (blank or unparseable) */
  missing: number;
  /** Non-blank values that could not be read as numbers */
  unparseable: number;
}

export type QualityReport = Record<string, ColumnQuality>;

// ============================================================================
// Configuration
// ============================================================================

/**
 * Spreadsheet encodings the parser can be told to accept
 */
export type InputFormat = "xlsx" | "xls" | "csv";

export type LogLevel = "DEBUG" | "INFO" | "WARNING" | "ERROR";

/**
 * Severity order used for level filtering
 */
export const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  DEBUG: 10,
  INFO: 20,
  WARNING: 30,
  ERROR: 40,
};

/**
 * A single run log line
 */
export interface LogEntry {
  timestamp: Date;
  level: LogLevel;
  message: string;
}

/**
 * Pipeline configuration
 */
export interface PipelineConfig {
  /** Encodings accepted by the parser; anything else is a parse failure */
  acceptedFormats: Set<InputFormat>;
  /** Sheet to read (defaults to the first sheet in the workbook) */
  sheetName?: string;
  /** Number of enriched rows exposed as a preview to callers */
  previewRows: number;
  /** Minimum level recorded in the run log */
  logLevel: LogLevel;
  /** Clock used for log timestamps and run identifiers */
  now: () => Date;
  /** Run identifier factory (defaults to timestamp + random suffix) */
  generateRunId?: (now: Date) => string;
  /** Receives every recorded log entry as it is appended */
  onLog?: (entry: LogEntry) => void;
}

/**
 * Creates the default configuration (xlsx only, INFO logging)
 */
export function createDefaultConfig(): PipelineConfig {
  return {
    acceptedFormats: new Set<InputFormat>(["xlsx"]),
    previewRows: 5,
    logLevel: "INFO",
    now: () => new Date(),
  };
}

/**
 * Merges a partial configuration with defaults
 */
export function mergeConfig(partial: Partial<PipelineConfig>): PipelineConfig {
  const defaultConfig = createDefaultConfig();

  return {
    acceptedFormats: partial.acceptedFormats ?? defaultConfig.acceptedFormats,
    sheetName: partial.sheetName ?? defaultConfig.sheetName,
    previewRows: partial.previewRows ?? defaultConfig.previewRows,
    logLevel: partial.logLevel ?? defaultConfig.logLevel,
    now: partial.now ?? defaultConfig.now,
    generateRunId: partial.generateRunId ?? defaultConfig.generateRunId,
    onLog: partial.onLog ?? defaultConfig.onLog,
  };
}
