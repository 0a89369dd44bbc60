/**
 * In-Memory Artifact Sink
 * Map-based implementation for tests and in-process callers
 */

import type { ArtifactSink } from "./types.js";

/**
 * In-memory implementation of ArtifactSink
 *
 * Artifacts are lost when the process exits.
 */
export class InMemoryArtifactSink implements ArtifactSink {
  private artifacts: Map<string, Uint8Array | string> = new Map();

  /**
   * Stores an artifact, replacing any previous one with the same name
   */
  write(name: string, data: Uint8Array | string): Promise<void> {
    this.artifacts.set(name, data);
    return Promise.resolve();
  }

  /**
   * Gets a stored artifact, or null if not found
   */
  get(name: string): Uint8Array | string | null {
    return this.artifacts.get(name) ?? null;
  }

  /**
   * Names of stored artifacts in write order
   */
  list(): string[] {
    return Array.from(this.artifacts.keys());
  }

  /**
   * Clear all stored artifacts (useful for testing)
   */
  clear(): void {
    this.artifacts.clear();
  }

  /**
   * Get the number of stored artifacts (useful for testing)
   */
  get size(): number {
    return this.artifacts.size;
  }
}
