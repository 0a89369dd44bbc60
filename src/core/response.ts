/**
 * Caller Response
 * Shapes a pipeline result into what an upload UI or CLI presents
 */

import type { EnrichedRecord } from "../types/index.js";
import type { PipelineErrorKind } from "../errors/index.js";
import type { PipelineResult } from "./pipeline.js";

export const XLSX_MIME_TYPE =
  "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet";
export const LOG_MIME_TYPE = "text/plain";

/**
 * A file offered for download
 */
export interface Downloadable<T extends Uint8Array | string> {
  fileName: string;
  mimeType: string;
  data: T;
}

/**
 * What a caller needs to show a failure
 */
export interface ErrorDetail {
  kind: PipelineErrorKind;
  message: string;
  /** Set for schema errors */
  missingColumns?: string[];
  /** Raw decoder diagnostics, set for parse errors */
  detail?: string;
}

export type CallerResponse =
  | {
      status: "success";
      enrichedPreview: EnrichedRecord[];
      downloadableArtifact: Downloadable<Uint8Array>;
      downloadableLog: Downloadable<string>;
    }
  | {
      status: "failed";
      errorDetail: ErrorDetail;
      downloadableLog: Downloadable<string>;
    };

/**
 * File name of the processed workbook for a run
 */
export function artifactFileName(runId: string): string {
  return `processed_output_${runId}.xlsx`;
}

/**
 * File name of the log transcript for a run
 */
export function logFileName(runId: string): string {
  return `run_log_${runId}.txt`;
}

/**
 * Converts a pipeline result into the caller-facing response
 * @param options.previewRows - Number of enriched rows to include (default: 5)
 */
export function toCallerResponse(
  result: PipelineResult,
  options: { previewRows?: number } = {}
): CallerResponse {
  const downloadableLog: Downloadable<string> = {
    fileName: logFileName(result.runId),
    mimeType: LOG_MIME_TYPE,
    data: result.logText,
  };

  if (result.status === "failed") {
    const { error } = result;
    const errorDetail: ErrorDetail = { kind: error.kind, message: error.message };
    if (error.kind === "SchemaError") {
      errorDetail.missingColumns = [...error.missingColumns];
    } else if (error.kind === "ParseError") {
      errorDetail.detail = error.detail;
    }

    return { status: "failed", errorDetail, downloadableLog };
  }

  return {
    status: "success",
    enrichedPreview: result.enriched.rows.slice(0, options.previewRows ?? 5),
    downloadableArtifact: {
      fileName: artifactFileName(result.runId),
      mimeType: XLSX_MIME_TYPE,
      data: result.artifact,
    },
    downloadableLog,
  };
}
