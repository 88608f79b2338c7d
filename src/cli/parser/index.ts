/**
 * CLI Parser - Main entry point
 * Re-exports all parser functions and types
 */

export * from './argumentParser.js';
export * from './helpText.js';
