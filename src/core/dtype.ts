/**
 * Sample types and binary decoding
 *
 * Retrieve.exe writes raw little-endian arrays with no header, so the element
 * type has to be known (or guessed) by the reader.
 */

import { RetrieveError } from './errors.js';

export const DTYPES = ['int8', 'uint8', 'int16', 'uint16', 'int32', 'uint32', 'float32', 'float64'] as const;

export type DType = (typeof DTYPES)[number];

export type SampleArray =
  | Int8Array
  | Uint8Array
  | Int16Array
  | Uint16Array
  | Int32Array
  | Uint32Array
  | Float32Array
  | Float64Array;

export type TimeArray = Float32Array | Float64Array;

const ALIASES: Record<string, DType> = {
  i1: 'int8',
  u1: 'uint8',
  i2: 'int16',
  short: 'int16',
  u2: 'uint16',
  i4: 'int32',
  u4: 'uint32',
  f4: 'float32',
  float: 'float32',
  f8: 'float64',
  double: 'float64',
};

export const DTYPE_SIZES: Record<DType, number> = {
  int8: 1,
  uint8: 1,
  int16: 2,
  uint16: 2,
  int32: 4,
  uint32: 4,
  float32: 4,
  float64: 8,
};

export function isDType(value: unknown): value is DType {
  return DTYPES.some((dtype) => dtype === value);
}

/**
 * Accepts canonical names and the short type codes (`i2`, `f4`, ...)
 */
export function parseDType(text: string): DType {
  const key = text.trim().toLowerCase();
  if (isDType(key)) return key;
  const alias = ALIASES[key];
  if (alias) return alias;
  throw new RetrieveError(
    'INVALID_DTYPE',
    `Unsupported dtype "${text}". Expected one of: ${DTYPES.join(', ')}`
  );
}

function allocate(dtype: DType, length: number): SampleArray {
  switch (dtype) {
    case 'int8':
      return new Int8Array(length);
    case 'uint8':
      return new Uint8Array(length);
    case 'int16':
      return new Int16Array(length);
    case 'uint16':
      return new Uint16Array(length);
    case 'int32':
      return new Int32Array(length);
    case 'uint32':
      return new Uint32Array(length);
    case 'float32':
      return new Float32Array(length);
    case 'float64':
      return new Float64Array(length);
  }
}

function reader(view: DataView, dtype: DType): (offset: number) => number {
  switch (dtype) {
    case 'int8':
      return (offset) => view.getInt8(offset);
    case 'uint8':
      return (offset) => view.getUint8(offset);
    case 'int16':
      return (offset) => view.getInt16(offset, true);
    case 'uint16':
      return (offset) => view.getUint16(offset, true);
    case 'int32':
      return (offset) => view.getInt32(offset, true);
    case 'uint32':
      return (offset) => view.getUint32(offset, true);
    case 'float32':
      return (offset) => view.getFloat32(offset, true);
    case 'float64':
      return (offset) => view.getFloat64(offset, true);
  }
}

/**
 * Decode a little-endian buffer. Trailing bytes that do not make up a whole
 * element are dropped.
 */
export function decodeBuffer(buffer: Uint8Array, dtype: DType): SampleArray {
  const size = DTYPE_SIZES[dtype];
  const length = Math.floor(buffer.byteLength / size);
  const out = allocate(dtype, length);
  const view = new DataView(buffer.buffer, buffer.byteOffset, buffer.byteLength);
  const read = reader(view, dtype);

  for (let i = 0; i < length; i++) {
    out[i] = read(i * size);
  }
  return out;
}

export function decodeTime(buffer: Uint8Array, dtype: 'float32' | 'float64'): TimeArray {
  const size = DTYPE_SIZES[dtype];
  const length = Math.floor(buffer.byteLength / size);
  const view = new DataView(buffer.buffer, buffer.byteOffset, buffer.byteLength);
  const out = dtype === 'float32' ? new Float32Array(length) : new Float64Array(length);

  for (let i = 0; i < length; i++) {
    out[i] = dtype === 'float32' ? view.getFloat32(i * size, true) : view.getFloat64(i * size, true);
  }
  return out;
}

/**
 * Shortest decimal that reads back as the same float32, so 0.1 stored as
 * float32 prints as 0.1 rather than its widened double
 */
export function shortestFloat32(value: number): number {
  for (let precision = 1; precision <= 9; precision++) {
    const candidate = Number(value.toPrecision(precision));
    if (Math.fround(candidate) === value) return candidate;
  }
  return value;
}

/**
 * Element as it should be exported
 */
export function sampleAt(values: ArrayLike<number>, index: number): number {
  const value = values[index];
  return values instanceof Float32Array ? shortestFloat32(value) : value;
}

export function toExportList(values: ArrayLike<number>): number[] {
  return Array.from({ length: values.length }, (_, index) => sampleAt(values, index));
}
