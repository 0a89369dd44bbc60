/**
 * Run artifact export
 * Hands a run's workbook and log transcript to an ArtifactSink
 */

import type { PipelineResult } from "../core/pipeline.js";
import { artifactFileName, logFileName } from "../core/response.js";
import type { ArtifactSink } from "./types.js";

/**
 * Writes the processed workbook (successful runs only) and the log
 * transcript (always) to the sink
 * @returns Names of the artifacts written, workbook first
 */
export async function exportRunArtifacts(
  result: PipelineResult,
  sink: ArtifactSink
): Promise<string[]> {
  const written: string[] = [];

  if (result.status === "success") {
    const name = artifactFileName(result.runId);
    await sink.write(name, result.artifact);
    written.push(name);
  }

  const logName = logFileName(result.runId);
  await sink.write(logName, `${result.logText}\n`);
  written.push(logName);

  return written;
}
