/**
 * Core Module Exports
 */

export {
  PipelineRunner,
  createPipelineRunner,
  runPipeline,
  type PipelineResult,
  type PipelineSuccess,
  type PipelineFailure,
  type RunStats,
} from "./pipeline.js";

export {
  toCallerResponse,
  artifactFileName,
  logFileName,
  XLSX_MIME_TYPE,
  LOG_MIME_TYPE,
  type CallerResponse,
  type Downloadable,
  type ErrorDetail,
} from "./response.js";
