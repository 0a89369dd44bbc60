/**
 * Utils Module
 * Exports utility functions
 */

export * from "./run-id.js";
