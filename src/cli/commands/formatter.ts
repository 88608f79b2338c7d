/**
 * Output Formatter - Serializes retrieved signals for export
 */

import { extname } from 'node:path';
import { sampleAt, toExportList } from '../../core/dtype.js';
import type { ShotData } from '../../core/shotData.js';
import type { OutputFormat } from '../../utils/config.js';

/**
 * Format implied by the output file extension, if any
 */
export function formatFromExtension(out: string): OutputFormat | undefined {
  switch (extname(out).toLowerCase()) {
    case '.csv':
      return 'csv';
    case '.json':
      return 'json';
    case '.ndjson':
    case '.jsonl':
      return 'ndjson';
    default:
      return undefined;
  }
}

/**
 * Format a signal based on format type. `values` replaces the raw samples,
 * e.g. with calibrated voltages.
 */
export function formatShotData(
  shot: ShotData,
  format: OutputFormat,
  values: ArrayLike<number> = shot.data
): string {
  if (format === 'csv') {
    return shot.toCsv(values);
  }

  if (format === 'ndjson') {
    const lines: string[] = [];
    for (let i = 0; i < values.length; i++) {
      lines.push(JSON.stringify({ time: shot.timeAt(i), data: sampleAt(values, i) }));
    }
    return lines.join('\n') + '\n';
  }

  return (
    JSON.stringify(
      {
        description: shot.description,
        units: shot.units,
        metadata: shot.metadata,
        time: shot.time ? toExportList(shot.time) : null,
        data: toExportList(values),
      },
      null,
      2
    ) + '\n'
  );
}
