/**
 * Command-line interface
 * Runs the pipeline on a spreadsheet file and writes the workbook and log
 * to an output directory
 */

import { readFile } from "fs/promises";
import { parseArgs } from "util";
import {
  type InputFormat,
  type LogLevel,
  mergeConfig,
} from "./types/index.js";
import { PipelineRunner } from "./core/pipeline.js";
import { FileSystemArtifactSink } from "./storage/filesystem.js";
import { exportRunArtifacts } from "./storage/export.js";
import { describeError } from "./errors/index.js";

const USAGE = `Usage: portfolio-sheet-pipeline <input> [options]

Options:
  -o, --out <dir>        Output directory (default: ./output)
  -s, --sheet <name>     Sheet to read (default: first sheet)
  -f, --format <list>    Accepted input formats, comma-separated: xlsx,xls,csv (default: xlsx)
  -v, --verbose          Include DEBUG entries in the log
  -h, --help             Show this help`;

const INPUT_FORMATS: readonly InputFormat[] = ["xlsx", "xls", "csv"];

/**
 * Console-like output used by the CLI
 */
export interface CliOutput {
  log(message: string): void;
  error(message: string): void;
}

function parseFormats(value: string): Set<InputFormat> {
  const formats = new Set<InputFormat>();
  for (const part of value.split(",")) {
    const name = part.trim().toLowerCase();
    const format = INPUT_FORMATS.find((candidate) => candidate === name);
    if (format === undefined) {
      throw new Error(
        `Unknown format "${part.trim()}" (expected one of: ${INPUT_FORMATS.join(", ")})`
      );
    }
    formats.add(format);
  }
  return formats;
}

function parseCliArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      out: { type: "string", short: "o", default: "output" },
      sheet: { type: "string", short: "s" },
      format: { type: "string", short: "f", default: "xlsx" },
      verbose: { type: "boolean", short: "v", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });
}

/**
 * Runs the CLI
 * @returns Process exit code: 0 on success, 1 on a failed run, 2 on bad usage
 */
export async function main(
  argv: string[],
  output: CliOutput = console
): Promise<number> {
  let parsed: ReturnType<typeof parseCliArgs>;
  try {
    parsed = parseCliArgs(argv);
  } catch (error) {
    output.error(describeError(error));
    output.error(USAGE);
    return 2;
  }

  const { values, positionals } = parsed;
  if (values.help === true) {
    output.log(USAGE);
    return 0;
  }

  const [inputPath] = positionals;
  if (inputPath === undefined || positionals.length > 1) {
    output.error(USAGE);
    return 2;
  }

  let acceptedFormats: Set<InputFormat>;
  try {
    acceptedFormats = parseFormats(values.format ?? "xlsx");
  } catch (error) {
    output.error(describeError(error));
    return 2;
  }

  const logLevel: LogLevel = values.verbose === true ? "DEBUG" : "INFO";
  const runner = new PipelineRunner(
    mergeConfig({ acceptedFormats, sheetName: values.sheet, logLevel })
  );

  let bytes: Uint8Array;
  try {
    bytes = await readFile(inputPath);
  } catch (error) {
    output.error(`Cannot read ${inputPath}: ${describeError(error)}`);
    return 2;
  }

  const result = runner.run(bytes);
  output.log(result.logText);

  const sink = new FileSystemArtifactSink(values.out ?? "output");
  const written = await exportRunArtifacts(result, sink);
  for (const name of written) {
    output.log(`Wrote ${sink.resolve(name)}`);
  }

  if (result.status === "failed") {
    const { error } = result;
    if (error.kind === "SchemaError") {
      output.error(`Missing required columns: ${error.missingColumns.join(", ")}`);
    } else {
      output.error(error.message);
    }
    return 1;
  }

  return 0;
}
