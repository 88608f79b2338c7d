/**
 * Batch command - retrieves several channels for several shots, one shot at
 * a time, and writes one CSV per channel plus a per-shot summary.csv
 *
 *   <outDir>/shot_<shot>/<channel>.csv
 *   <outDir>/shot_<shot>/summary.csv
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { Channel } from '../../core/command.js';
import { resolveSettings } from '../../utils/config.js';
import { setWarningsSilenced } from '../../utils/debug.js';
import { displayPath } from '../../utils/fsx.js';
import { createConfiguredRetriever, type CommandDeps } from './fetch.js';

export interface BatchOptions {
  diagName: string;
  subshot: number;
  shots: number[];
  channels: Channel[];
  outDir: string;
  timeAxis: boolean;
  retrievePath?: string;
  workingDir?: string;
  timeoutMs?: number;
  quiet: boolean;
}

export interface BatchSummaryRow {
  shot: number;
  channel: Channel;
  points: number;
  timeStart: number | null;
  timeEnd: number | null;
  dataMin: number | null;
  dataMax: number | null;
  units: string;
}

export interface BatchResult {
  rows: BatchSummaryRow[];
  /** CSV files written, including summaries */
  files: string[];
}

const SUMMARY_HEADER = 'shot,channel,points,time_start,time_end,data_min,data_max,units';

function cell(value: string | number | null): string {
  if (value === null) return '';
  const text = String(value);
  return /[",\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function formatSummaryCsv(rows: BatchSummaryRow[]): string {
  const lines = [SUMMARY_HEADER];
  for (const row of rows) {
    lines.push(
      [row.shot, row.channel, row.points, row.timeStart, row.timeEnd, row.dataMin, row.dataMax, row.units]
        .map(cell)
        .join(',')
    );
  }
  return lines.join('\n') + '\n';
}

export async function batchCommand(options: BatchOptions, deps: CommandDeps = {}): Promise<BatchResult> {
  setWarningsSilenced(options.quiet);

  const settings = await resolveSettings(deps.projectRoot ?? process.cwd());
  const retriever = await createConfiguredRetriever(options, settings, deps);
  const result: BatchResult = { rows: [], files: [] };

  await mkdir(options.outDir, { recursive: true });

  for (const shot of options.shots) {
    if (!options.quiet) {
      console.log(`Processing shot ${shot}...`);
    }
    const shotDir = join(options.outDir, `shot_${shot}`);
    await mkdir(shotDir, { recursive: true });

    const channels = await retriever.retrieveMultipleChannels({
      diagName: options.diagName,
      shot,
      subshot: options.subshot,
      channels: options.channels,
      timeAxis: options.timeAxis,
    });

    const shotRows: BatchSummaryRow[] = [];
    for (const [channel, data] of channels) {
      const csvFile = join(shotDir, `${channel}.csv`);
      await data.saveCsv(csvFile);
      result.files.push(csvFile);
      if (!options.quiet) {
        console.log(`  Saved ${channel} -> ${displayPath(csvFile)}`);
      }

      const { points, timeStart, timeEnd, dataMin, dataMax, units } = data.summary();
      shotRows.push({ shot, channel, points, timeStart, timeEnd, dataMin, dataMax, units });
    }

    const summaryFile = join(shotDir, 'summary.csv');
    await writeFile(summaryFile, formatSummaryCsv(shotRows), 'utf-8');
    result.files.push(summaryFile);
    result.rows.push(...shotRows);
    if (!options.quiet) {
      console.log(`  Summary -> ${displayPath(summaryFile)}`);
    }
  }

  if (options.quiet) {
    process.stdout.write('✓\n');
  } else {
    console.log(`\n✅ Retrieved ${result.rows.length} signal(s) for ${options.shots.length} shot(s)`);
  }

  return result;
}
