/**
 * Retriever - runs Retrieve.exe for one diagnostic channel and turns its
 * output files into ShotData
 *
 * Every call writes its artifacts under a per-call prefix in the working
 * directory and removes them again before returning, whether the call
 * succeeded or not.
 */

import { dirname, join, resolve } from 'node:path';
import {
  buildRetrieveArgs,
  buildRetrieveOptions,
  createExampleRetrieval,
  defaultBaseName,
  formatCommandLine,
  makeFilePrefix,
  OUTPUT_EXTENSIONS,
  TEMPORARY_EXTENSIONS,
  type Channel,
  type RetrieveFlags,
  type RetrieveRequest,
} from './command.js';
import { RetrieveError, errorMessage } from './errors.js';
import { parseRetrieveFiles, type Metadata, type RetrieveFiles } from './parser.js';
import { DEFAULT_TIMEOUT_MS, execFileRunner, type ProcessRunner } from './runner.js';
import { ShotData } from './shotData.js';
import type { DType, TimeArray } from './dtype.js';
import { readEnvSettings } from '../utils/config.js';
import { debugError, warn } from '../utils/debug.js';
import { systemHost, type HostEnvironment } from '../utils/environment.js';
import { findFilesWithPrefix, removeFiles } from '../utils/fsx.js';
import {
  findOnPath,
  getDefaultRetrievePaths,
  RETRIEVE_EXE,
  setupRetrievePath,
  validateRetrieveExe,
} from '../utils/retrievePath.js';

export interface RetrieverOptions {
  /** Retrieve.exe or its install directory; searched for when omitted */
  retrievePath?: string;
  /** Where output files are written; defaults to the executable's directory */
  workingDir?: string;
  timeoutMs?: number;
  runner?: ProcessRunner;
  host?: HostEnvironment;
}

export interface RetrieveDataParams extends RetrieveFlags {
  diagName: string;
  shot: number;
  subshot: number;
  channel: Channel;
  /** Sample type of the .dat file; int16 (with an int8 fallback) when omitted */
  dtype?: DType;
}

export interface RetrieveChannelsParams {
  diagName: string;
  shot: number;
  subshot: number;
  channels: Channel[];
  /** Defaults to true */
  timeAxis?: boolean;
}

interface ResolvedRetriever {
  retrievePath: string;
  workingDir: string;
  timeoutMs: number;
  runner: ProcessRunner;
}

function describe(diagName: string, shot: number, subshot: number, channel: Channel): string {
  return `${diagName} Shot ${shot}.${subshot}, Channel ${channel}`;
}

/**
 * Find Retrieve.exe: the explicit path, then LHD_RETRIEVE_PATH, then the
 * known install locations, then PATH
 */
export async function resolveRetrievePath(
  retrievePath: string | undefined,
  host: HostEnvironment = systemHost
): Promise<string> {
  const explicit = retrievePath ?? readEnvSettings(host).retrievePath;
  if (explicit) {
    return setupRetrievePath(explicit, host);
  }

  const defaults = await getDefaultRetrievePaths(host);
  if (defaults.length > 0) {
    return defaults[0];
  }

  if (await validateRetrieveExe(undefined, host)) {
    const onPath = await findOnPath(RETRIEVE_EXE, host);
    if (onPath) return onPath;
  }

  throw new RetrieveError(
    'RETRIEVE_NOT_FOUND',
    "Retrieve.exe not found. Please ensure it's installed or specify retrievePath. " +
      'For WSL, it should be accessible at /mnt/c/LABCOM/Retrieve/bin/Retrieve.exe'
  );
}

export class Retriever {
  readonly retrievePath: string;
  readonly workingDir: string;
  readonly timeoutMs: number;
  private readonly runner: ProcessRunner;

  constructor(resolved: ResolvedRetriever) {
    this.retrievePath = resolved.retrievePath;
    this.workingDir = resolved.workingDir;
    this.timeoutMs = resolved.timeoutMs;
    this.runner = resolved.runner;
  }

  /**
   * Locate and validate Retrieve.exe, then build a retriever around it
   */
  static async create(options: RetrieverOptions = {}): Promise<Retriever> {
    const host = options.host ?? systemHost;
    const env = readEnvSettings(host);
    const retrievePath = await resolveRetrievePath(options.retrievePath, host);

    return new Retriever({
      retrievePath,
      workingDir: options.workingDir ?? env.workingDir ?? dirname(resolve(retrievePath)),
      timeoutMs: options.timeoutMs ?? env.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      runner: options.runner ?? execFileRunner,
    });
  }

  /**
   * Run Retrieve.exe once and work out which files it produced
   */
  async runRetrieve(request: RetrieveRequest): Promise<RetrieveFiles> {
    const args = buildRetrieveArgs(request);
    const result = await this.runner.run(this.retrievePath, args, {
      cwd: this.workingDir,
      timeoutMs: this.timeoutMs,
    });

    if (result.exitCode !== 0) {
      throw new RetrieveError(
        'RETRIEVE_FAILED',
        `Retrieve.exe failed: ${result.stderr}\n` +
          `Command: ${formatCommandLine(this.retrievePath, args)}\n` +
          `cwd: ${this.workingDir}`,
        { exitCode: result.exitCode, stdout: result.stdout }
      );
    }

    return this.locateOutputFiles(request);
  }

  /**
   * The tool may decorate the requested file name, so with a prefix the first
   * matching .dat decides the base name of all three files
   */
  async locateOutputFiles(request: RetrieveRequest): Promise<RetrieveFiles> {
    if (request.filePrefix) {
      const datFiles = await findFilesWithPrefix(this.workingDir, request.filePrefix, [OUTPUT_EXTENSIONS.data]);
      const base =
        datFiles.length > 0
          ? datFiles[0].slice(0, -OUTPUT_EXTENSIONS.data.length)
          : join(this.workingDir, request.filePrefix);
      return filesFor(base);
    }

    const baseName = defaultBaseName(request.diagName, request.shot, request.subshot, request.channel);
    return filesFor(join(this.workingDir, baseName));
  }

  async retrieveData(params: RetrieveDataParams): Promise<ShotData> {
    const { diagName, shot, subshot, channel } = params;
    const filePrefix = makeFilePrefix(diagName, shot, subshot, channel);

    try {
      const files = await this.runRetrieve({
        diagName,
        shot,
        subshot,
        channel,
        filePrefix,
        options: buildRetrieveOptions(params),
      });
      const { data, time, metadata } = await parseRetrieveFiles(files, params.dtype);

      return new ShotData({
        data,
        time,
        metadata: {
          diag_name: diagName,
          shot,
          subshot,
          channel,
          time_axis: params.timeAxis ?? false,
          frame_number: params.frameNumber ?? null,
          voltage_conversion: params.voltageConversion ?? false,
          dtype: params.dtype ?? null,
          ...metadata,
        },
        description: describe(diagName, shot, subshot, channel),
      });
    } finally {
      await this.cleanupTemporaryFiles(filePrefix);
    }
  }

  /**
   * Delete everything Retrieve.exe wrote under a prefix. Never throws.
   * @returns number of files deleted
   */
  async cleanupTemporaryFiles(filePrefix: string): Promise<number> {
    if (!filePrefix) return 0;

    try {
      const files = await findFilesWithPrefix(this.workingDir, filePrefix, [...TEMPORARY_EXTENSIONS]);
      const { removed, failed } = await removeFiles(files);
      if (failed.length > 0) {
        debugError('retriever', 'cleanupTemporaryFiles', {
          filePrefix,
          workingDir: this.workingDir,
          failed,
        });
      }
      return removed.length;
    } catch (error) {
      debugError('retriever', 'cleanupTemporaryFiles', {
        filePrefix,
        workingDir: this.workingDir,
        message: errorMessage(error),
      });
      return 0;
    }
  }

  /**
   * Retrieve several channels of one shot, one after another. The time axis
   * and parameters of the first channel that succeeds are reused for the
   * rest; channels that fail are reported and left out of the result.
   */
  async retrieveMultipleChannels(params: RetrieveChannelsParams): Promise<Map<Channel, ShotData>> {
    const { diagName, shot, subshot, channels } = params;
    const timeAxis = params.timeAxis ?? true;
    const results = new Map<Channel, ShotData>();
    let shared: { time: TimeArray | null; metadata: Metadata } | undefined;

    for (const channel of channels) {
      const filePrefix = makeFilePrefix(diagName, shot, subshot, channel);

      try {
        const files = await this.runRetrieve({
          diagName,
          shot,
          subshot,
          channel,
          filePrefix,
          options: buildRetrieveOptions({ timeAxis }),
        });
        const { data, time, metadata } = await parseRetrieveFiles(files);

        if (!shared) {
          const { channel: _channel, ...rest } = metadata;
          shared = { time, metadata: rest };
        }

        const sharedTime = shared.time;
        results.set(
          channel,
          new ShotData({
            data,
            time: sharedTime && sharedTime.length === data.length ? sharedTime : time,
            metadata: {
              diag_name: diagName,
              shot,
              subshot,
              channel,
              time_axis: timeAxis,
              ...shared.metadata,
            },
            description: describe(diagName, shot, subshot, channel),
          })
        );
      } catch (error) {
        warn(`Failed to retrieve channel ${channel}: ${errorMessage(error)}`);
      } finally {
        await this.cleanupTemporaryFiles(filePrefix);
      }
    }

    return results;
  }

  createExampleRetrieval(diagName?: string, shot?: number, subshot?: number, channel?: Channel): string {
    return createExampleRetrieval(diagName, shot, subshot, channel);
  }
}

function filesFor(base: string): RetrieveFiles {
  return {
    datFile: `${base}${OUTPUT_EXTENSIONS.data}`,
    prmFile: `${base}${OUTPUT_EXTENSIONS.parameters}`,
    timeFile: `${base}${OUTPUT_EXTENSIONS.time}`,
  };
}
