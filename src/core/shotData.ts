/**
 * ShotData - one retrieved signal with its time axis and parameters
 */

import { writeFile } from 'node:fs/promises';
import { RetrieveError } from './errors.js';
import { toNumber, type Metadata } from './parser.js';
import { sampleAt, type SampleArray, type TimeArray } from './dtype.js';
import { debugError } from '../utils/debug.js';

export interface ShotDataInit {
  data: SampleArray;
  time: TimeArray | null;
  metadata: Metadata;
  units?: string;
  description?: string;
}

export interface ShotRecord {
  time: number | null;
  data: number;
}

export interface ShotSummary {
  points: number;
  timeStart: number | null;
  timeEnd: number | null;
  dataMin: number | null;
  dataMax: number | null;
  units: string;
}

function csvCell(value: number | null): string {
  return value === null ? '' : String(value);
}

export class ShotData {
  readonly data: SampleArray;
  readonly time: TimeArray | null;
  readonly metadata: Metadata;
  readonly units: string;
  readonly description: string;

  private cachedVal?: Float64Array;

  constructor(init: ShotDataInit) {
    this.data = init.data;
    this.time = init.time;
    this.metadata = init.metadata;
    this.units = init.units ?? '';
    this.description = init.description ?? '';
  }

  get length(): number {
    return this.data.length;
  }

  /** Time of sample i, null past the end of the time axis */
  timeAt(index: number): number | null {
    return this.time && index < this.time.length ? sampleAt(this.time, index) : null;
  }

  /**
   * One row per sample; time is null when the signal has no time axis
   */
  toRecords(): ShotRecord[] {
    const records: ShotRecord[] = new Array(this.data.length);
    for (let i = 0; i < this.data.length; i++) {
      records[i] = { time: this.timeAt(i), data: sampleAt(this.data, i) };
    }
    return records;
  }

  toCsv(values: ArrayLike<number> = this.data): string {
    const lines = ['time,data'];
    for (let i = 0; i < values.length; i++) {
      lines.push(`${csvCell(this.timeAt(i))},${csvCell(sampleAt(values, i))}`);
    }
    return lines.join('\n') + '\n';
  }

  async saveCsv(filename: string, values?: ArrayLike<number>): Promise<void> {
    try {
      await writeFile(filename, this.toCsv(values), 'utf-8');
    } catch (error) {
      const err = error as NodeJS.ErrnoException;
      debugError('shotData', 'saveCsv', {
        filename,
        code: err.code,
        message: err.message,
      });
      throw new Error(
        err.code === 'EACCES'
          ? `Permission denied writing to: "${filename}"`
          : `Failed to write CSV file "${filename}": ${err.message}`
      );
    }
  }

  /**
   * Convert raw counts to volts: data * VResolution + VOffset.
   * VCoefficient1 / VCoefficient0 are accepted in place of the resolution and
   * offset; a missing offset is 0.
   */
  getVal(): Float64Array {
    const resolutionRaw =
      'VResolution' in this.metadata
        ? this.metadata.VResolution
        : 'VCoefficient1' in this.metadata
          ? this.metadata.VCoefficient1
          : undefined;

    if (resolutionRaw === undefined) {
      throw new RetrieveError(
        'MISSING_CALIBRATION',
        'VResolution or VCoefficient1 not found in metadata. Cannot convert to voltage.'
      );
    }

    const offsetRaw =
      'VOffset' in this.metadata
        ? this.metadata.VOffset
        : 'VCoefficient0' in this.metadata
          ? this.metadata.VCoefficient0
          : 0;

    const resolution = toNumber(resolutionRaw);
    const offset = toNumber(offsetRaw);
    if (resolution === undefined || offset === undefined) {
      throw new RetrieveError('INVALID_CALIBRATION', 'VResolution or VOffset values are not numeric');
    }

    const out = new Float64Array(this.data.length);
    for (let i = 0; i < this.data.length; i++) {
      out[i] = this.data[i] * resolution + offset;
    }
    return out;
  }

  /** Voltage values, computed once */
  get val(): Float64Array {
    if (!this.cachedVal) {
      this.cachedVal = this.getVal();
    }
    return this.cachedVal;
  }

  get voltage(): Float64Array {
    return this.val;
  }

  summary(): ShotSummary {
    let dataMin: number | null = null;
    let dataMax: number | null = null;
    for (let i = 0; i < this.data.length; i++) {
      const value = sampleAt(this.data, i);
      if (dataMin === null || value < dataMin) dataMin = value;
      if (dataMax === null || value > dataMax) dataMax = value;
    }

    const timeLength = this.time ? this.time.length : 0;
    return {
      points: this.data.length,
      timeStart: timeLength > 0 ? this.timeAt(0) : null,
      timeEnd: timeLength > 0 ? this.timeAt(timeLength - 1) : null,
      dataMin,
      dataMax,
      units: this.units,
    };
  }
}
