/**
 * Pipeline error taxonomy
 *
 * Structural problems with the input (unreadable bytes, missing columns) are
 * user-actionable and stop the run before any derived computation. Anything
 * else that goes wrong mid-pipeline is reported as a ProcessingError.
 * Malformed cell values are not errors at all; see the coercer.
 */

export type PipelineStage =
  | "parse"
  | "validate"
  | "coerce"
  | "derive"
  | "aggregate"
  | "export";

export type PipelineErrorKind = "ParseError" | "SchemaError" | "ProcessingError";

/**
 * Base class for every failure surfaced by the pipeline runner
 */
export abstract class PipelineError extends Error {
  abstract readonly kind: PipelineErrorKind;
  abstract readonly stage: PipelineStage;
}

/**
 * The input bytes are not a readable spreadsheet in an accepted format
 */
export class ParseError extends PipelineError {
  readonly kind = "ParseError" as const;
  readonly stage = "parse" as const;
  /** Raw diagnostic text from the decoder */
  readonly detail: string;

  constructor(message: string, detail: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ParseError";
    this.detail = detail;
  }
}

/**
 * Required columns are absent from the input sheet
 */
export class SchemaError extends PipelineError {
  readonly kind = "SchemaError" as const;
  readonly stage = "validate" as const;
  readonly missingColumns: string[];

  constructor(missingColumns: string[]) {
    super(`Missing required columns: ${missingColumns.join(", ")}`);
    this.name = "SchemaError";
    this.missingColumns = missingColumns;
  }
}

/**
 * Unexpected failure while coercing, deriving, aggregating or exporting
 */
export class ProcessingError extends PipelineError {
  readonly kind = "ProcessingError" as const;
  readonly stage: PipelineStage;

  constructor(stage: PipelineStage, cause: unknown) {
    super(`Processing failed during ${stage}: ${describeError(cause)}`, {
      cause,
    });
    this.name = "ProcessingError";
    this.stage = stage;
  }
}

export type AnyPipelineError = ParseError | SchemaError | ProcessingError;

/**
 * Short message for an unknown thrown value
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
