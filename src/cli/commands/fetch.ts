/**
 * Fetch command - retrieves one channel of one shot and exports it
 */

import { writeFile } from 'node:fs/promises';
import type { Channel } from '../../core/command.js';
import type { DType } from '../../core/dtype.js';
import { Retriever, type RetrieverOptions } from '../../core/retriever.js';
import type { ShotData } from '../../core/shotData.js';
import { resolveSettings, type OutputFormat, type RetrieveConfig } from '../../utils/config.js';
import { debugError, setWarningsSilenced } from '../../utils/debug.js';
import { displayPath } from '../../utils/fsx.js';
import { formatFromExtension, formatShotData } from './formatter.js';

export interface FetchOptions {
  diagName: string;
  shot: number;
  subshot: number;
  channel: Channel;
  timeAxis: boolean;
  frameNumber?: number;
  voltageConversion: boolean;
  dtype?: DType;
  out?: string;
  format?: OutputFormat;
  retrievePath?: string;
  workingDir?: string;
  timeoutMs?: number;
  /** Export data * VResolution + VOffset instead of raw counts */
  calibrated: boolean;
  quiet: boolean;
}

export type RetrieverFactory = (options: RetrieverOptions) => Promise<Retriever>;

export interface CommandDeps {
  createRetriever?: RetrieverFactory;
  /** Directory whose .lhd-retrieve/config.json supplies defaults */
  projectRoot?: string;
}

/**
 * Build a retriever from CLI options over the project config
 */
export async function createConfiguredRetriever(
  options: Pick<FetchOptions, 'retrievePath' | 'workingDir' | 'timeoutMs'>,
  settings: RetrieveConfig,
  deps: CommandDeps = {}
): Promise<Retriever> {
  const create = deps.createRetriever ?? ((o: RetrieverOptions) => Retriever.create(o));
  return create({
    retrievePath: options.retrievePath ?? settings.retrievePath,
    workingDir: options.workingDir ?? settings.workingDir,
    timeoutMs: options.timeoutMs ?? settings.timeoutMs,
  });
}

function formatRange(start: number | null, end: number | null, digits: number): string {
  if (start === null || end === null) return 'n/a';
  return `${start.toFixed(digits)} - ${end.toFixed(digits)}`;
}

export async function fetchCommand(options: FetchOptions, deps: CommandDeps = {}): Promise<ShotData> {
  setWarningsSilenced(options.quiet);

  const settings = await resolveSettings(deps.projectRoot ?? process.cwd());
  const retriever = await createConfiguredRetriever(options, settings, deps);
  const shot = await retriever.retrieveData({
    diagName: options.diagName,
    shot: options.shot,
    subshot: options.subshot,
    channel: options.channel,
    timeAxis: options.timeAxis,
    frameNumber: options.frameNumber,
    voltageConversion: options.voltageConversion,
    dtype: options.dtype,
  });

  const values = options.calibrated ? shot.getVal() : shot.data;

  if (options.out) {
    const format = options.format ?? formatFromExtension(options.out) ?? settings.outputFormat ?? 'csv';
    try {
      await writeFile(options.out, formatShotData(shot, format, values), 'utf-8');
    } catch (error) {
      const err = error as NodeJS.ErrnoException;
      debugError('fetch', 'fetchCommand', {
        out: options.out,
        code: err.code,
        message: err.message,
      });
      throw new Error(`Failed to write "${options.out}": ${err.message}`);
    }

    if (options.quiet) {
      process.stdout.write('✓\n');
    } else {
      console.log(`✅ ${shot.description}: ${shot.length} points -> ${displayPath(options.out)} (${format})`);
    }
    return shot;
  }

  if (options.quiet) {
    process.stdout.write(`${shot.length}\n`);
    return shot;
  }

  const summary = shot.summary();
  console.log(`\n📈 ${shot.description}`);
  console.log(`   Points:     ${summary.points}`);
  console.log(`   Time range: ${formatRange(summary.timeStart, summary.timeEnd, 6)}`);
  console.log(`   Data range: ${formatRange(summary.dataMin, summary.dataMax, 3)}`);
  console.log(`   Parameters: ${Object.keys(shot.metadata).length} fields`);
  console.log('\n💡 Use --out <file> to save the signal.');

  return shot;
}
