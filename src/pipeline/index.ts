/**
 * Pipeline Module
 * Exports all pipeline steps
 */

export * from "./parser.js";
export * from "./schema-validator.js";
export * from "./coercer.js";
export * from "./enricher.js";
export * from "./aggregator.js";
export * from "./exporter.js";
