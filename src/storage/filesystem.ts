/**
 * File System Artifact Sink
 * Implements ArtifactSink using Node.js fs/promises
 */

import * as fs from "fs/promises";
import * as nodePath from "path";
import type { ArtifactSink } from "./types.js";

/**
 * Node.js implementation of ArtifactSink
 * Writes every artifact under a caller-chosen base directory
 */
export class FileSystemArtifactSink implements ArtifactSink {
  readonly baseDir: string;

  constructor(baseDir: string) {
    this.baseDir = nodePath.resolve(baseDir);
  }

  /**
   * Writes data to `<baseDir>/<name>`
   * Creates the base directory if it doesn't exist
   */
  async write(name: string, data: Uint8Array | string): Promise<void> {
    const target = this.resolve(name);
    await fs.mkdir(nodePath.dirname(target), { recursive: true });

    if (typeof data === "string") {
      await fs.writeFile(target, data, "utf-8");
    } else {
      await fs.writeFile(target, data);
    }
  }

  /**
   * Absolute path of an artifact; names may not escape the base directory
   */
  resolve(name: string): string {
    const target = nodePath.resolve(this.baseDir, name);
    const relative = nodePath.relative(this.baseDir, target);
    if (relative === "" || relative.startsWith("..") || nodePath.isAbsolute(relative)) {
      throw new Error(`Artifact name escapes the output directory: ${name}`);
    }
    return target;
  }
}
