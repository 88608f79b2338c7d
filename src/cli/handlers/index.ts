/**
 * CLI Handlers - Main entry point
 * Re-exports all handler functions
 */

export * from './batchHandler.js';
export * from './cleanHandler.js';
export * from './envHandler.js';
export * from './exampleHandler.js';
export * from './fetchHandler.js';
export * from './initHandler.js';
