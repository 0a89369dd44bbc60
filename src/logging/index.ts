/**
 * Logging Module
 */

export { RunLog, formatLogEntry, type RunLogOptions } from "./run-log.js";
