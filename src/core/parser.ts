/**
 * Parsers for the artifacts Retrieve.exe leaves in its working directory:
 *
 *   .prm   CSV rows; column 2 is the parameter name, column 3 its value
 *   .dat   raw samples, int16 unless the caller knows better
 *   .time  optional float32 (or float64) time axis
 */

import { readFile } from 'node:fs/promises';
import { RetrieveError, errorMessage } from './errors.js';
import { decodeBuffer, decodeTime, isDType, type DType, type SampleArray, type TimeArray } from './dtype.js';
import { fileExists } from '../utils/fsx.js';
import { debugError, warn } from '../utils/debug.js';

export type MetadataValue = string | number | boolean | null;
export type Metadata = Record<string, MetadataValue>;

export interface RetrieveFiles {
  datFile: string;
  prmFile: string;
  timeFile: string;
}

export interface ParsedRetrieveFiles {
  data: SampleArray;
  /** null when the signal is too large for a time axis to be built */
  time: TimeArray | null;
  metadata: Metadata;
}

/** Above this many samples no time axis is read or generated */
export const MAX_TIME_AXIS_SAMPLES = 10_000_000;

const NUMERIC_LITERAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Split one CSV line, honoring double-quoted fields
 */
export function splitCsvLine(line: string): string[] {
  const fields: string[] = [];
  let current = '';
  let quoted = false;

  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (quoted) {
      if (ch === '"' && line[i + 1] === '"') {
        current += '"';
        i++;
      } else if (ch === '"') {
        quoted = false;
      } else {
        current += ch;
      }
    } else if (ch === '"') {
      quoted = true;
    } else if (ch === ',') {
      fields.push(current);
      current = '';
    } else {
      current += ch;
    }
  }
  fields.push(current);
  return fields.map((field) => field.trim());
}

/**
 * Numeric literals become numbers, anything else stays text
 */
export function coerceValue(raw: string): string | number {
  if (NUMERIC_LITERAL.test(raw)) {
    return Number(raw);
  }
  return raw;
}

/**
 * Interpret a metadata value as a number, or undefined when it is not one
 */
export function toNumber(value: MetadataValue | undefined): number | undefined {
  if (typeof value === 'number') return value;
  if (typeof value === 'string') {
    const text = value.trim();
    if (NUMERIC_LITERAL.test(text)) return Number(text);
  }
  return undefined;
}

export function parseParameterText(text: string): Metadata {
  const metadata: Metadata = {};

  for (const line of text.split(/\r?\n/)) {
    if (line.trim() === '') continue;
    const fields = splitCsvLine(line);
    if (fields.length < 3) continue;
    const key = fields[1];
    if (!key) continue;
    // Defined rather than assigned so keys like __proto__ stay ordinary entries
    Object.defineProperty(metadata, key, {
      value: coerceValue(fields[2]),
      enumerable: true,
      writable: true,
      configurable: true,
    });
  }

  return metadata;
}

/**
 * Read a .prm file. A missing file yields no metadata; an empty or malformed
 * one is reported and yields no metadata.
 */
export async function readParameterFile(prmFile: string): Promise<Metadata> {
  if (!(await fileExists(prmFile))) {
    return {};
  }

  let text: string;
  try {
    text = await readFile(prmFile, 'utf8');
  } catch (error) {
    debugError('parser', 'readParameterFile', { prmFile, message: errorMessage(error) });
    warn(`Parameter file not found: ${prmFile}`);
    return {};
  }

  const metadata = parseParameterText(text);
  if (Object.keys(metadata).length === 0) {
    warn(`Parameter file ${prmFile} is empty or malformed.`);
  }
  return metadata;
}

/**
 * Parse whitespace or comma separated numbers
 */
export function parseTextSamples(text: string): Float64Array {
  const tokens = text.split(/[\s,]+/).filter((token) => token.length > 0);
  const values = new Float64Array(tokens.length);
  tokens.forEach((token, i) => {
    const value = toNumber(token);
    if (value === undefined) {
      throw new Error(`could not convert string to float: '${token}'`);
    }
    values[i] = value;
  });
  return values;
}

async function readBinarySamples(datFile: string, dtype?: DType): Promise<SampleArray> {
  const buffer = await readFile(datFile);

  if (dtype !== undefined) {
    if (!isDType(dtype)) {
      throw new Error(`data type "${String(dtype)}" not understood`);
    }
    return decodeBuffer(buffer, dtype);
  }

  const data = decodeBuffer(buffer, 'int16');
  if (data.length === 0) {
    // A single-byte file still carries one int8 sample
    return Int16Array.from(decodeBuffer(buffer, 'int8'));
  }
  return data;
}

export async function readSamples(datFile: string, dtype?: DType): Promise<SampleArray> {
  if (!(await fileExists(datFile))) {
    throw new RetrieveError('DATA_FILE_NOT_FOUND', `Data file not found: ${datFile}`, { datFile });
  }

  try {
    return await readBinarySamples(datFile, dtype);
  } catch (binaryError) {
    try {
      return parseTextSamples(await readFile(datFile, 'utf8'));
    } catch (textError) {
      throw new RetrieveError(
        'DATA_READ_FAILED',
        `Failed to read data file ${datFile}: ${errorMessage(binaryError)}, ${errorMessage(textError)}`,
        { datFile }
      );
    }
  }
}

/**
 * Read a .time file as float32, falling back to float64. Returns null when the
 * file is missing or unreadable.
 */
export async function readTimeAxis(timeFile: string): Promise<TimeArray | null> {
  if (!(await fileExists(timeFile))) {
    return null;
  }

  try {
    const buffer = await readFile(timeFile);
    const time = decodeTime(buffer, 'float32');
    if (time.length === 0) {
      return decodeTime(buffer, 'float64');
    }
    return time;
  } catch (error) {
    warn(`Failed to read time file ${timeFile}: ${errorMessage(error)}`);
    return null;
  }
}

/**
 * Sampling rate from the parameter file, 1.0 when absent or unusable
 */
export function samplingRateOf(metadata: Metadata): number {
  const raw = 'SamplingRate' in metadata ? metadata.SamplingRate : metadata.sampling_rate;
  const rate = toNumber(raw);
  if (rate === undefined || !Number.isFinite(rate) || rate <= 0) {
    return 1.0;
  }
  return rate;
}

export function synthesizeTimeAxis(length: number, metadata: Metadata): Float64Array {
  const rate = samplingRateOf(metadata);
  const time = new Float64Array(length);
  for (let i = 0; i < length; i++) {
    time[i] = i / rate;
  }
  return time;
}

export async function parseRetrieveFiles(files: RetrieveFiles, dtype?: DType): Promise<ParsedRetrieveFiles> {
  const metadata = await readParameterFile(files.prmFile);
  const data = await readSamples(files.datFile, dtype);

  if (data.length > MAX_TIME_AXIS_SAMPLES) {
    warn('Data size is very large, generating time axis is skipped.');
    return { data, time: null, metadata };
  }

  let time = await readTimeAxis(files.timeFile);
  if (time === null || time.length !== data.length) {
    time = synthesizeTimeAxis(data.length, metadata);
  }

  return { data, time, metadata };
}
