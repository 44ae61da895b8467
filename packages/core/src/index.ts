/**
 * @protonlink/core
 * Release families, version keys, schemas and utilities for protonlink
 */

// Release families
export * from "./families/index.js";

// Version keys
export * from "./version.js";

// Errors
export * from "./errors.js";

// Schemas
export * from "./schema.js";

// Utilities
export * from "./utils.js";

// Logger
export { createLogEntry, type LogEntry, type LogEntryInput, type LogLevel } from "./logger.js";
