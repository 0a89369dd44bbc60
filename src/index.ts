/**
 * Portfolio Sheet Pipeline
 * Validates, enriches and summarizes a portfolio spreadsheet, producing a
 * three-sheet workbook and a per-run log transcript
 */

// Re-export types and configuration
export * from "./types/index.js";

// Re-export errors
export {
  PipelineError,
  ParseError,
  SchemaError,
  ProcessingError,
  describeError,
  type AnyPipelineError,
  type PipelineErrorKind,
  type PipelineStage,
} from "./errors/index.js";

// Re-export pipeline steps
export {
  detectFormat,
  parseWorkbook,
  validateSchema,
  toNumeric,
  coerceNumerics,
  isHighRisk,
  deriveRecordFields,
  deriveFields,
  summarizePortfolio,
  summarizeBySector,
  buildOutputWorkbook,
  exportWorkbook,
  readDetailedSheet,
  type SchemaValidationResult,
  type CoercionResult,
} from "./pipeline/index.js";

// Re-export logging
export { RunLog, formatLogEntry, type RunLogOptions } from "./logging/index.js";

// Re-export runner and caller surface
export * from "./core/index.js";

// Re-export artifact sinks
export {
  InMemoryArtifactSink,
  FileSystemArtifactSink,
  exportRunArtifacts,
  type ArtifactSink,
} from "./storage/index.js";

export { createRunId, formatRunTimestamp } from "./utils/index.js";
