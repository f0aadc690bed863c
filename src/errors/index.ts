/**
 * Errors module
 *
 * Error classes and result types for version parsing and comparison.
 */

export * from "./errors";
