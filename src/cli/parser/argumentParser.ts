/**
 * Argument parsing utilities for CLI commands
 */

import type { FetchOptions } from '../commands/fetch.js';
import type { BatchOptions } from '../commands/batch.js';
import type { CleanOptions } from '../commands/clean.js';
import type { InitOptions } from '../commands/init.js';
import type { Channel } from '../../core/command.js';
import { RetrieveError } from '../../core/errors.js';
import { parseDType } from '../../core/dtype.js';
import { isOutputFormat, OUTPUT_FORMATS, type OutputFormat } from '../../utils/config.js';

export interface EnvArgs {
  json: boolean;
}

export interface ExampleArgs {
  diagName?: string;
  shot?: number;
  subshot?: number;
  channel?: Channel;
}

function invalid(message: string): RetrieveError {
  return new RetrieveError('INVALID_ARGUMENT', message);
}

function unknownOption(arg: string): RetrieveError {
  return invalid(`Unknown option: ${arg}`);
}

/**
 * Value following an option; options never take another flag as their value
 */
function requireValue(args: string[], index: number, option: string): string {
  const value = args[index + 1];
  if (value === undefined || (value.startsWith('-') && !/^-\d/.test(value))) {
    throw invalid(`Option ${option} requires a value`);
  }
  return value;
}

export function parseInteger(value: string, name: string): number {
  if (!/^[+-]?\d+$/.test(value.trim())) {
    throw invalid(`${name} must be an integer, got "${value}"`);
  }
  return parseInt(value, 10);
}

function parsePositiveInteger(value: string, name: string): number {
  const n = parseInteger(value, name);
  if (n <= 0) {
    throw invalid(`${name} must be positive, got "${value}"`);
  }
  return n;
}

/**
 * Numeric channels become numbers; signal names stay strings
 */
export function parseChannel(value: string): Channel {
  return /^\d+$/.test(value) ? parseInt(value, 10) : value;
}

export function parseList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function parseFormat(value: string): OutputFormat {
  if (!isOutputFormat(value)) {
    throw invalid(`Unknown format "${value}". Expected one of: ${OUTPUT_FORMATS.join(', ')}`);
  }
  return value;
}

/**
 * Parse fetch command arguments:
 *   <diag> <shot> <subshot> <channel> [options]
 */
export function parseFetchArgs(args: string[]): FetchOptions {
  const positional: string[] = [];
  const options: Omit<FetchOptions, 'diagName' | 'shot' | 'subshot' | 'channel'> = {
    timeAxis: false,
    voltageConversion: false,
    calibrated: false,
    quiet: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg.startsWith('-') && !/^-\d/.test(arg)) {
      const key = arg.replace(/^--?/, '');

      switch (key) {
        case 'time-axis':
        case 'T':
          options.timeAxis = true;
          break;
        case 'frame':
        case 'f':
          options.frameNumber = parseInteger(requireValue(args, i, arg), 'Frame number');
          i++;
          break;
        case 'voltage-conversion':
        case 'V':
          options.voltageConversion = true;
          break;
        case 'dtype':
          options.dtype = parseDType(requireValue(args, i, arg));
          i++;
          break;
        case 'out':
        case 'o':
          options.out = requireValue(args, i, arg);
          i++;
          break;
        case 'format':
          options.format = parseFormat(requireValue(args, i, arg));
          i++;
          break;
        case 'retrieve-path':
          options.retrievePath = requireValue(args, i, arg);
          i++;
          break;
        case 'working-dir':
          options.workingDir = requireValue(args, i, arg);
          i++;
          break;
        case 'timeout':
          options.timeoutMs = parsePositiveInteger(requireValue(args, i, arg), 'Timeout');
          i++;
          break;
        case 'calibrated':
          options.calibrated = true;
          break;
        case 'quiet':
        case 'q':
          options.quiet = true;
          break;
        default:
          throw unknownOption(arg);
      }
    } else {
      positional.push(arg);
    }
  }

  if (positional.length !== 4) {
    throw invalid(
      `Expected <diag> <shot> <subshot> <channel>, got ${positional.length} argument${positional.length === 1 ? '' : 's'}`
    );
  }

  const [diagName, shot, subshot, channel] = positional;
  return {
    ...options,
    diagName,
    shot: parseInteger(shot, 'Shot number'),
    subshot: parseInteger(subshot, 'Sub-shot number'),
    channel: parseChannel(channel),
  };
}

/**
 * Parse batch command arguments:
 *   <diag> <subshot> --shots a,b --channels x,y [options]
 */
export function parseBatchArgs(args: string[]): BatchOptions {
  const positional: string[] = [];
  let shots: number[] = [];
  let channels: Channel[] = [];
  const options: Pick<BatchOptions, 'outDir' | 'timeAxis' | 'quiet' | 'retrievePath' | 'workingDir' | 'timeoutMs'> = {
    outDir: 'data',
    timeAxis: true,
    quiet: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg.startsWith('-')) {
      const key = arg.replace(/^--?/, '');

      switch (key) {
        case 'shots':
          shots = parseList(requireValue(args, i, arg)).map((shot) => parseInteger(shot, 'Shot number'));
          i++;
          break;
        case 'channels':
          channels = parseList(requireValue(args, i, arg)).map(parseChannel);
          i++;
          break;
        case 'out-dir':
        case 'o':
          options.outDir = requireValue(args, i, arg);
          i++;
          break;
        case 'no-time-axis':
          options.timeAxis = false;
          break;
        case 'retrieve-path':
          options.retrievePath = requireValue(args, i, arg);
          i++;
          break;
        case 'working-dir':
          options.workingDir = requireValue(args, i, arg);
          i++;
          break;
        case 'timeout':
          options.timeoutMs = parsePositiveInteger(requireValue(args, i, arg), 'Timeout');
          i++;
          break;
        case 'quiet':
        case 'q':
          options.quiet = true;
          break;
        default:
          throw unknownOption(arg);
      }
    } else {
      positional.push(arg);
    }
  }

  if (positional.length !== 2) {
    throw invalid('Expected <diag> <subshot>');
  }
  if (shots.length === 0) {
    throw invalid('At least one shot is required (--shots)');
  }
  if (channels.length === 0) {
    throw invalid('At least one channel is required (--channels)');
  }

  return {
    ...options,
    diagName: positional[0],
    subshot: parseInteger(positional[1], 'Sub-shot number'),
    shots,
    channels,
  };
}

export function parseEnvArgs(args: string[]): EnvArgs {
  const json = args.includes('--json');
  const unknown = args.find((arg) => arg !== '--json');
  if (unknown !== undefined) {
    throw unknownOption(unknown);
  }
  return { json };
}

/**
 * Parse example command arguments: [diag] [shot] [subshot] [channel]
 */
export function parseExampleArgs(args: string[]): ExampleArgs {
  const flag = args.find((arg) => arg.startsWith('-'));
  if (flag !== undefined) {
    throw unknownOption(flag);
  }

  const [diagName, shot, subshot, channel] = args;
  return {
    diagName,
    shot: shot === undefined ? undefined : parseInteger(shot, 'Shot number'),
    subshot: subshot === undefined ? undefined : parseInteger(subshot, 'Sub-shot number'),
    channel: channel === undefined ? undefined : parseChannel(channel),
  };
}

/**
 * Parse clean command arguments
 */
export function parseCleanArgs(args: string[]): CleanOptions {
  const options: CleanOptions = {
    all: false,
    yes: false,
    quiet: false,
  };

  for (const arg of args) {
    switch (arg) {
      case '--all':
        options.all = true;
        break;
      case '--yes':
      case '-y':
        options.yes = true;
        break;
      case '--quiet':
      case '-q':
        options.quiet = true;
        break;
      default:
        if (arg.startsWith('-')) {
          throw unknownOption(arg);
        }
        // First non-option argument is the directory to clean
        if (!options.workingDir) {
          options.workingDir = arg;
        }
    }
  }

  return options;
}

/**
 * Parse init command arguments
 */
export function parseInitArgs(args: string[]): InitOptions {
  const options: InitOptions = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg.startsWith('-')) {
      const key = arg.replace(/^--?/, '');

      switch (key) {
        case 'retrieve-path':
          options.retrievePath = requireValue(args, i, arg);
          i++;
          break;
        case 'working-dir':
          options.workingDir = requireValue(args, i, arg);
          i++;
          break;
        case 'timeout':
          options.timeoutMs = parsePositiveInteger(requireValue(args, i, arg), 'Timeout');
          i++;
          break;
        case 'format':
          options.outputFormat = parseFormat(requireValue(args, i, arg));
          i++;
          break;
        default:
          throw unknownOption(arg);
      }
    } else if (!options.targetDir) {
      // First non-option argument is the project directory
      options.targetDir = arg;
    }
  }

  return options;
}
