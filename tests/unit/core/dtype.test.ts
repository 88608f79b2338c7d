/**
 * Tests for sample type handling
 */

import { describe, it, expect } from 'vitest';
import {
  decodeBuffer,
  decodeTime,
  isDType,
  parseDType,
  sampleAt,
  shortestFloat32,
  toExportList,
} from '../../../src/core/dtype.js';
import { RetrieveError } from '../../../src/core/errors.js';
import { float32Buffer, float64Buffer, int16Buffer } from '../../test-helpers.js';

describe('parseDType', () => {
  it('should accept canonical names', () => {
    expect(parseDType('float32')).toBe('float32');
    expect(parseDType(' INT16 ')).toBe('int16');
  });

  it('should accept short type codes', () => {
    expect(parseDType('i2')).toBe('int16');
    expect(parseDType('f8')).toBe('float64');
    expect(parseDType('u1')).toBe('uint8');
    expect(parseDType('double')).toBe('float64');
  });

  it('should reject unknown types', () => {
    expect(() => parseDType('complex128')).toThrow(RetrieveError);
    expect(() => parseDType('complex128')).toThrow('Unsupported dtype "complex128"');
  });
});

describe('isDType', () => {
  it('should narrow only supported names', () => {
    expect(isDType('int8')).toBe(true);
    expect(isDType('int64')).toBe(false);
    expect(isDType(16)).toBe(false);
  });
});

describe('decodeBuffer', () => {
  it('should decode little-endian int16', () => {
    const data = decodeBuffer(int16Buffer([1, -2, 32767, -32768]), 'int16');
    expect(data).toBeInstanceOf(Int16Array);
    expect(Array.from(data)).toEqual([1, -2, 32767, -32768]);
  });

  it('should drop trailing bytes that do not fill an element', () => {
    const buffer = Buffer.concat([int16Buffer([7, 8]), Buffer.from([0xff])]);
    expect(Array.from(decodeBuffer(buffer, 'int16'))).toEqual([7, 8]);
  });

  it('should decode signed and unsigned bytes', () => {
    const buffer = Buffer.from([0x01, 0xff]);
    expect(Array.from(decodeBuffer(buffer, 'int8'))).toEqual([1, -1]);
    expect(Array.from(decodeBuffer(buffer, 'uint8'))).toEqual([1, 255]);
  });

  it('should decode float32 and float64', () => {
    expect(Array.from(decodeBuffer(float32Buffer([0.5, -1.25]), 'float32'))).toEqual([0.5, -1.25]);
    expect(Array.from(decodeBuffer(float64Buffer([0.1, 2e-7]), 'float64'))).toEqual([0.1, 2e-7]);
  });

  it('should respect the byte offset of a sliced buffer', () => {
    const whole = Buffer.concat([Buffer.from([0x00]), int16Buffer([300, -300])]);
    const slice = whole.subarray(1);
    expect(Array.from(decodeBuffer(slice, 'int16'))).toEqual([300, -300]);
  });

  it('should return an empty array for an empty buffer', () => {
    expect(decodeBuffer(Buffer.alloc(0), 'float64').length).toBe(0);
  });
});

describe('decodeTime', () => {
  it('should decode float32 time values', () => {
    const time = decodeTime(float32Buffer([0, 0.25, 0.5]), 'float32');
    expect(time).toBeInstanceOf(Float32Array);
    expect(Array.from(time)).toEqual([0, 0.25, 0.5]);
  });

  it('should decode float64 time values', () => {
    const time = decodeTime(float64Buffer([0.001]), 'float64');
    expect(time).toBeInstanceOf(Float64Array);
    expect(Array.from(time)).toEqual([0.001]);
  });
});

describe('float32 export', () => {
  it('should print the shortest decimal that reads back as the same float32', () => {
    expect(shortestFloat32(Math.fround(0.1))).toBe(0.1);
    expect(shortestFloat32(Math.fround(1 / 3))).toBe(0.33333334);
    expect(shortestFloat32(0.5)).toBe(0.5);
    expect(shortestFloat32(0)).toBe(0);
  });

  it('should narrow only float32 arrays', () => {
    expect(sampleAt(Float32Array.from([0.2]), 0)).toBe(0.2);
    expect(sampleAt(Float64Array.from([Math.fround(0.2)]), 0)).toBe(Math.fround(0.2));
    expect(toExportList(Float32Array.from([0, 0.1, 0.2]))).toEqual([0, 0.1, 0.2]);
    expect(toExportList(Int16Array.from([-1, 2]))).toEqual([-1, 2]);
  });
});
