import { join } from 'node:path';
import { mkdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';
import type { ProcessRunner, RunOptions, RunResult } from '../src/core/runner.js';
import type { HostEnvironment } from '../src/utils/environment.js';

/**
 * Creates a unique temporary directory for a test.
 */
export async function makeTestDir(testName: string): Promise<string> {
  // Sanitize test name for filesystem
  const sanitized = testName
    .replace(/[^a-z0-9]/gi, '-')
    .toLowerCase()
    .substring(0, 50);

  const uniqueId = randomUUID().substring(0, 8);
  const dir = join(tmpdir(), `lhd-retrieve-${sanitized}-${uniqueId}`);
  await mkdir(dir, { recursive: true });
  return dir;
}

/**
 * Cleans up a test directory
 */
export async function cleanupTestDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export function int16Buffer(values: number[]): Buffer {
  const buffer = Buffer.alloc(values.length * 2);
  values.forEach((value, i) => buffer.writeInt16LE(value, i * 2));
  return buffer;
}

export function float32Buffer(values: number[]): Buffer {
  const buffer = Buffer.alloc(values.length * 4);
  values.forEach((value, i) => buffer.writeFloatLE(value, i * 4));
  return buffer;
}

export function float64Buffer(values: number[]): Buffer {
  const buffer = Buffer.alloc(values.length * 8);
  values.forEach((value, i) => buffer.writeDoubleLE(value, i * 8));
  return buffer;
}

export interface RunCall {
  file: string;
  args: string[];
  options: RunOptions;
}

export type FakeBehavior = (call: RunCall) => Promise<RunResult | undefined> | RunResult | undefined;

/**
 * In-process stand-in for Retrieve.exe: records every call and lets the test
 * write whatever artifacts the real tool would.
 */
export class FakeRunner implements ProcessRunner {
  readonly calls: RunCall[] = [];

  constructor(private readonly behavior: FakeBehavior = () => undefined) {}

  async run(file: string, args: string[], options: RunOptions = {}): Promise<RunResult> {
    const call: RunCall = { file, args, options };
    this.calls.push(call);
    const result = await this.behavior(call);
    return result ?? { exitCode: 0, stdout: '', stderr: '' };
  }
}

export interface Artifacts {
  dat?: Buffer | string;
  prm?: string;
  time?: Buffer;
  extra?: Record<string, string>;
}

/**
 * Behavior that writes <FileName>.dat/.prm/.time into the working directory,
 * the way Retrieve.exe does when given a file name argument
 */
export function writesArtifacts(artifactsFor: (args: string[]) => Artifacts | undefined): FakeBehavior {
  return async ({ args, options }): Promise<RunResult | undefined> => {
    const artifacts = artifactsFor(args);
    const cwd = options.cwd;
    if (!artifacts || !cwd) return;
    const base = join(cwd, args[4]);
    if (artifacts.dat !== undefined) await writeFile(`${base}.dat`, artifacts.dat);
    if (artifacts.prm !== undefined) await writeFile(`${base}.prm`, artifacts.prm);
    if (artifacts.time !== undefined) await writeFile(`${base}.time`, artifacts.time);
    for (const [ext, content] of Object.entries(artifacts.extra ?? {})) {
      await writeFile(`${base}${ext}`, content);
    }
  };
}

export interface FakeHostOptions {
  platform?: NodeJS.Platform;
  procVersion?: string | null;
  existing?: string[];
  executables?: string[];
  env?: Record<string, string>;
}

/**
 * Host stand-in; paths listed in `executables` also exist
 */
export function fakeHost(options: FakeHostOptions = {}): HostEnvironment {
  const executables = new Set(options.executables ?? []);
  const existing = new Set([...(options.existing ?? []), ...executables]);
  const env = options.env ?? {};

  return {
    platform: () => options.platform ?? 'linux',
    osVersion: () => 'test-os-version',
    arch: () => 'x64',
    env: (key) => env[key],
    procVersion: async () => options.procVersion ?? null,
    pathExists: async (path) => existing.has(path),
    isExecutable: async (path) => executables.has(path),
  };
}

export const WSL_PROC_VERSION =
  'Linux version 5.15.153.1-microsoft-standard-WSL2 (root@test) (gcc) #1 SMP';
