/**
 * Artifact Sink Types
 * Destinations for the files a run produces
 */

/**
 * Destination chosen by the caller for run artifacts
 *
 * Implementations:
 * - InMemoryArtifactSink: For tests and in-process callers
 * - FileSystemArtifactSink: Writes under a base directory (Node.js)
 *
 * @example
 * ```typescript
 * const sink = new InMemoryArtifactSink();
 * const result = runPipeline(bytes);
 * const written = await exportRunArtifacts(result, sink);
 * // ['processed_output_20261018T094512Z-3f9a0c12b7de.xlsx', 'run_log_20261018T094512Z-3f9a0c12b7de.txt']
 * ```
 */
export interface ArtifactSink {
  /**
   * Writes one artifact
   * @param name - File name, unique per run
   * @param data - Binary workbook bytes or text
   */
  write(name: string, data: Uint8Array | string): Promise<void>;
}
