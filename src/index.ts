/**
 * lhd-retrieve - Main entry point
 *
 * Retrieves LHD diagnostic measurement data by running Retrieve.exe and
 * parsing the files it writes.
 *
 * @example
 * ```typescript
 * import { Retriever } from 'lhd-retrieve';
 *
 * const retriever = await Retriever.create();
 * const coil = await retriever.retrieveData({
 *   diagName: 'Mag',
 *   shot: 139400,
 *   subshot: 1,
 *   channel: 32,
 *   timeAxis: true,
 * });
 * await coil.saveCsv('mag_coil_32.csv');
 * ```
 */

// Core types
export type { Channel, RetrieveRequest, RetrieveFlags } from './core/command.js';
export type { DType, SampleArray, TimeArray } from './core/dtype.js';
export type { Metadata, MetadataValue, RetrieveFiles, ParsedRetrieveFiles } from './core/parser.js';
export type { ProcessRunner, RunOptions, RunResult } from './core/runner.js';
export type { ShotDataInit, ShotRecord, ShotSummary } from './core/shotData.js';
export type { RetrieverOptions, RetrieveDataParams, RetrieveChannelsParams } from './core/retriever.js';
export type { RetrieveErrorCode } from './core/errors.js';
export type { HostEnvironment, WslEnvironmentInfo } from './utils/environment.js';
export type { EnvironmentReport } from './utils/retrievePath.js';
export type { RetrieveConfig, OutputFormat } from './utils/config.js';

// Core functions
export { Retriever, resolveRetrievePath } from './core/retriever.js';
export { ShotData } from './core/shotData.js';
export { RetrieveError, isRetrieveError } from './core/errors.js';
export {
  buildRetrieveArgs,
  buildRetrieveOptions,
  createExampleRetrieval,
  makeFilePrefix,
} from './core/command.js';
export { DTYPES, decodeBuffer, isDType, parseDType, shortestFloat32 } from './core/dtype.js';
export {
  parseParameterText,
  parseRetrieveFiles,
  readParameterFile,
  readSamples,
  readTimeAxis,
  synthesizeTimeAxis,
} from './core/parser.js';
export { DEFAULT_TIMEOUT_MS, execFileRunner } from './core/runner.js';

// Environment and Retrieve.exe discovery
export {
  convertWslPathToWindows,
  findWindowsRetrieveExe,
  getWslEnvironmentInfo,
  getWslWindowsPaths,
  isWindowsCompatible,
  isWsl,
  systemHost,
  testRetrieveExe,
} from './utils/environment.js';
export {
  checkWindowsEnvironment,
  getDefaultRetrievePaths,
  setupRetrievePath,
  validateRetrieveExe,
} from './utils/retrievePath.js';

// CLI commands (for programmatic use)
export { fetchCommand, type FetchOptions } from './cli/commands/fetch.js';
export { batchCommand, type BatchOptions } from './cli/commands/batch.js';
export { cleanCommand } from './cli/commands/clean.js';
export { init } from './cli/commands/init.js';
