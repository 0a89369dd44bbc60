/**
 * Core Pipeline Runner
 * Runs parse → validate → coerce → derive → aggregate → export for one input
 */

import {
  NUMERIC_COLUMNS,
  OUTPUT_SHEETS,
  type EnrichedTable,
  type LogEntry,
  type PipelineConfig,
  type PortfolioSummary,
  type QualityReport,
  type RawTable,
  type SectorSummaryRow,
  createDefaultConfig,
  mergeConfig,
} from "../types/index.js";
import {
  ParseError,
  ProcessingError,
  SchemaError,
  describeError,
  type AnyPipelineError,
  type PipelineStage,
} from "../errors/index.js";
import { RunLog } from "../logging/run-log.js";
import { parseWorkbook } from "../pipeline/parser.js";
import { validateSchema } from "../pipeline/schema-validator.js";
import { coerceNumerics } from "../pipeline/coercer.js";
import { deriveFields } from "../pipeline/enricher.js";
import {
  summarizeBySector,
  summarizePortfolio,
} from "../pipeline/aggregator.js";
import { exportWorkbook } from "../pipeline/exporter.js";
import { createRunId } from "../utils/run-id.js";
import { toCallerResponse, type CallerResponse } from "./response.js";

/**
 * Statistics about a successful run
 */
export interface RunStats {
  /** Data rows read from the input sheet */
  rowCount: number;
  /** Columns in the input sheet */
  columnCount: number;
  /** Missing/unparseable counts per numeric column */
  missingValues: QualityReport;
  /** Processing time in milliseconds */
  processingTimeMs: number;
}

interface RunOutcome {
  runId: string;
  /** Log entries in chronological order, ending with the completion or failure marker */
  log: readonly LogEntry[];
  /** Plain-text log transcript, one `<timestamp> | <LEVEL> | <message>` entry per line */
  logText: string;
}

/**
 * A completed run
 */
export interface PipelineSuccess extends RunOutcome {
  status: "success";
  enriched: EnrichedTable;
  portfolioSummary: PortfolioSummary;
  sectorSummary: SectorSummaryRow[];
  /** xlsx bytes with the three output sheets */
  artifact: Uint8Array;
  stats: RunStats;
}

/**
 * A run that stopped on a parse, schema or processing error
 */
export interface PipelineFailure extends RunOutcome {
  status: "failed";
  error: AnyPipelineError;
}

export type PipelineResult = PipelineSuccess | PipelineFailure;

/**
 * Pipeline runner
 *
 * Holds configuration only; every call to run() gets its own run id,
 * log and intermediate tables, so runs never share mutable state.
 *
 * @example
 * ```typescript
 * const runner = createPipelineRunner({ logLevel: 'DEBUG' });
 * const result = runner.run(await readFile('portfolio.xlsx'));
 *
 * if (result.status === 'success') {
 *   console.log(result.portfolioSummary.Net_Profit_Loss);
 * } else if (result.error.kind === 'SchemaError') {
 *   console.log('Add columns:', result.error.missingColumns);
 * }
 * ```
 */
export class PipelineRunner {
  private readonly config: PipelineConfig;

  constructor(config: PipelineConfig = createDefaultConfig()) {
    this.config = config;
  }

  /**
   * Effective configuration
   */
  getConfig(): PipelineConfig {
    return this.config;
  }

  /**
   * Runs the pipeline on raw spreadsheet bytes
   *
   * Never throws: every failure is returned as a PipelineFailure together
   * with the log collected up to that point.
   */
  run(bytes: Uint8Array): PipelineResult {
    const startTime = performance.now();
    const startedAt = this.config.now();
    const runId = (this.config.generateRunId ?? createRunId)(startedAt);
    const log = new RunLog({
      level: this.config.logLevel,
      now: this.config.now,
      onEntry: this.config.onLog,
    });

    log.info(`Run ${runId} started (${bytes.byteLength} bytes)`);

    // Step 1: Parse
    let table: RawTable;
    try {
      table = parseWorkbook(bytes, this.config);
    } catch (error) {
      const parseError =
        error instanceof ParseError
          ? error
          : new ParseError("Unable to read input", describeError(error), {
              cause: error,
            });
      log.error(`${parseError.message}: ${parseError.detail}`);
      return this.fail(runId, log, parseError);
    }

    log.info(
      `Parsed sheet "${table.sheetName}": ${table.rows.length} rows, ${table.columns.length} columns`
    );
    log.debug(`Columns: ${table.columns.join(", ")}`);

    // Step 2: Validate schema
    const schema = validateSchema(table.columns);
    if (!schema.valid) {
      const schemaError = new SchemaError(schema.missingColumns);
      log.error(schemaError.message);
      return this.fail(runId, log, schemaError);
    }
    log.info("Schema validation passed: all required columns present");

    // Steps 3-6 share one failure boundary
    let stage: PipelineStage = "coerce";
    try {
      // Step 3: Coerce numerics
      const { table: coerced, report } = coerceNumerics(table);
      for (const column of NUMERIC_COLUMNS) {
        const quality = report[column];
        if (quality === undefined) continue;
        log.info(`Missing values in ${column}: ${quality.missing}`);
        if (quality.unparseable > 0) {
          log.warn(
            `${column}: ${quality.unparseable} non-numeric value(s) treated as missing`
          );
        }
      }

      // Step 4: Derive fields
      stage = "derive";
      const enriched = deriveFields(coerced);
      const profitable = enriched.rows.filter(
        (row) => row.Status === "Profit"
      ).length;
      const highRisk = enriched.rows.filter(
        (row) => row.High_Risk_Flag === "Yes"
      ).length;
      log.info(
        `Derived fields for ${enriched.rows.length} rows (${profitable} in profit, ${highRisk} high risk)`
      );

      // Step 5: Aggregate
      stage = "aggregate";
      const portfolioSummary = summarizePortfolio(enriched.rows);
      const sectorSummary = summarizeBySector(enriched.rows);
      log.info(
        `Portfolio totals: investment=${portfolioSummary.Total_Investment}, current=${portfolioSummary.Total_Current_Value}, net=${portfolioSummary.Net_Profit_Loss}`
      );
      log.info(`Sector summary: ${sectorSummary.length} sector(s)`);

      // Step 6: Export
      stage = "export";
      const artifact = exportWorkbook(enriched, portfolioSummary, sectorSummary);
      log.info(
        `Exported workbook (${artifact.byteLength} bytes): ${Object.values(OUTPUT_SHEETS).join(", ")}`
      );

      // Step 7: Finalize
      const processingTimeMs = performance.now() - startTime;
      log.info(`Run ${runId} completed successfully`);

      return {
        status: "success",
        runId,
        enriched,
        portfolioSummary,
        sectorSummary,
        artifact,
        stats: {
          rowCount: table.rows.length,
          columnCount: table.columns.length,
          missingValues: report,
          processingTimeMs,
        },
        log: log.entries,
        logText: log.toText(),
      };
    } catch (error) {
      const processingError = new ProcessingError(stage, error);
      log.error(processingError.message, error);
      return this.fail(runId, log, processingError);
    }
  }

  /**
   * Shapes a result for the caller, previewing `previewRows` enriched rows
   */
  respond(result: PipelineResult): CallerResponse {
    return toCallerResponse(result, { previewRows: this.config.previewRows });
  }

  private fail(
    runId: string,
    log: RunLog,
    error: AnyPipelineError
  ): PipelineFailure {
    log.error(`Run ${runId} failed: ${error.kind}`);
    return {
      status: "failed",
      runId,
      error,
      log: log.entries,
      logText: log.toText(),
    };
  }
}

/**
 * Creates a pipeline runner with the specified configuration
 *
 * @example
 * ```typescript
 * // Defaults: xlsx input only, INFO logging
 * const runner = createPipelineRunner();
 *
 * // Accept CSV as well and mirror log lines to the console
 * const runner = createPipelineRunner({
 *   acceptedFormats: new Set(['xlsx', 'csv']),
 *   onLog: (entry) => console.log(entry.message),
 * });
 * ```
 */
export function createPipelineRunner(
  config?: Partial<PipelineConfig>
): PipelineRunner {
  return new PipelineRunner(mergeConfig(config ?? {}));
}

/**
 * Convenience function for a one-off run
 */
export function runPipeline(
  bytes: Uint8Array,
  config?: Partial<PipelineConfig>
): PipelineResult {
  return createPipelineRunner(config).run(bytes);
}
