/**
 * Artifact Storage Module
 * Provides sinks for the files a run produces
 */

export type { ArtifactSink } from "./types.js";

export { InMemoryArtifactSink } from "./in-memory.js";
export { FileSystemArtifactSink } from "./filesystem.js";
export { exportRunArtifacts } from "./export.js";
