/**
 * Tests for CLI commands, run against an in-process Retrieve.exe stand-in
 */

import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import { mkdir, readdir, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { fetchCommand, type FetchOptions } from '../../../src/cli/commands/fetch.js';
import { batchCommand, formatSummaryCsv } from '../../../src/cli/commands/batch.js';
import { cleanCommand } from '../../../src/cli/commands/clean.js';
import { init } from '../../../src/cli/commands/init.js';
import { envCommand, formatEnvironmentReport } from '../../../src/cli/commands/env.js';
import { formatFromExtension, formatShotData } from '../../../src/cli/commands/formatter.js';
import { Retriever, type RetrieverOptions } from '../../../src/core/retriever.js';
import { ShotData } from '../../../src/core/shotData.js';
import { getConfigPath, writeConfig } from '../../../src/utils/config.js';
import { setWarningsSilenced } from '../../../src/utils/debug.js';
import {
  FakeRunner,
  cleanupTestDir,
  fakeHost,
  int16Buffer,
  makeTestDir,
  writesArtifacts,
  type FakeBehavior,
} from '../../test-helpers.js';

const EXE = '/opt/Retrieve/bin/Retrieve.exe';

function logLines(spy: MockInstance<typeof console.log>): unknown[] {
  return spy.mock.calls.map((call) => call[0]);
}

describe('CLI commands', () => {
  let testDir: string;
  let workDir: string;
  let logSpy: MockInstance<typeof console.log>;
  let errorSpy: MockInstance<typeof console.error>;

  beforeEach(async () => {
    testDir = await makeTestDir('commands');
    workDir = join(testDir, 'work');
    await mkdir(workDir);
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    setWarningsSilenced(false);
    await cleanupTestDir(testDir);
  });

  function depsFor(behavior: FakeBehavior) {
    const received: RetrieverOptions[] = [];
    const runner = new FakeRunner(behavior);
    const createRetriever = async (options: RetrieverOptions): Promise<Retriever> => {
      received.push(options);
      return new Retriever({
        retrievePath: EXE,
        workingDir: workDir,
        timeoutMs: options.timeoutMs ?? 1000,
        runner,
      });
    };
    return { deps: { createRetriever, projectRoot: testDir }, received, runner };
  }

  function fetchOptions(overrides: Partial<FetchOptions> = {}): FetchOptions {
    return {
      diagName: 'Mag',
      shot: 139400,
      subshot: 1,
      channel: 32,
      timeAxis: true,
      voltageConversion: false,
      calibrated: false,
      quiet: false,
      ...overrides,
    };
  }

  const coilArtifacts = writesArtifacts(() => ({
    dat: int16Buffer([10, 20]),
    prm: 'Mag,SamplingRate,2\nMag,VResolution,0.5\nMag,VOffset,1\n',
  }));

  describe('fetchCommand', () => {
    it('should print a summary without --out', async () => {
      const { deps } = depsFor(
        writesArtifacts(() => ({ dat: int16Buffer([1, 2, 3]), prm: 'Mag,SamplingRate,1000\n' }))
      );

      const shot = await fetchCommand(fetchOptions(), deps);

      expect(shot.length).toBe(3);
      expect(logLines(logSpy)).toEqual([
        '\n📈 Mag Shot 139400.1, Channel 32',
        '   Points:     3',
        '   Time range: 0.000000 - 0.002000',
        '   Data range: 1.000 - 3.000',
        '   Parameters: 9 fields',
        '\n💡 Use --out <file> to save the signal.',
      ]);
      expect(await readdir(workDir)).toEqual([]);
    });

    it('should write calibrated CSV', async () => {
      const { deps } = depsFor(coilArtifacts);
      const out = join(testDir, 'coil.csv');

      await fetchCommand(fetchOptions({ out, calibrated: true }), deps);

      expect(await readFile(out, 'utf8')).toBe('time,data\n0,6\n0.5,11\n');
      expect(logLines(logSpy)).toEqual([`✅ Mag Shot 139400.1, Channel 32: 2 points -> ${out} (csv)`]);
    });

    it('should take the format from the extension before the config', async () => {
      await writeConfig(testDir, { outputFormat: 'ndjson' });
      const { deps } = depsFor(coilArtifacts);
      const out = join(testDir, 'coil.json');

      await fetchCommand(fetchOptions({ out }), deps);

      const written: unknown = JSON.parse(await readFile(out, 'utf8'));
      expect(written).toMatchObject({
        description: 'Mag Shot 139400.1, Channel 32',
        units: '',
        time: [0, 0.5],
        data: [10, 20],
      });
    });

    it('should fall back to the configured format for unknown extensions', async () => {
      await writeConfig(testDir, { outputFormat: 'ndjson' });
      const { deps } = depsFor(coilArtifacts);
      const out = join(testDir, 'coil.out');

      await fetchCommand(fetchOptions({ out }), deps);

      expect(await readFile(out, 'utf8')).toBe('{"time":0,"data":10}\n{"time":0.5,"data":20}\n');
    });

    it('should let --format override the extension', async () => {
      const { deps } = depsFor(coilArtifacts);
      const out = join(testDir, 'coil.json');

      await fetchCommand(fetchOptions({ out, format: 'csv' }), deps);

      expect(await readFile(out, 'utf8')).toBe('time,data\n0,10\n0.5,20\n');
    });

    it('should print only the point count when quiet', async () => {
      const writeSpy = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
      const { deps } = depsFor(coilArtifacts);

      await fetchCommand(fetchOptions({ quiet: true }), deps);

      expect(writeSpy).toHaveBeenCalledWith('2\n');
      expect(logSpy).not.toHaveBeenCalled();
    });

    it('should pass CLI options over config settings to the retriever', async () => {
      await writeConfig(testDir, { workingDir: '/tmp/from-config', timeoutMs: 1234 });
      const { deps, received, runner } = depsFor(coilArtifacts);

      await fetchCommand(fetchOptions({ timeoutMs: 99, frameNumber: 4 }), deps);

      expect(received).toEqual([{ retrievePath: undefined, workingDir: '/tmp/from-config', timeoutMs: 99 }]);
      expect(runner.calls[0].args).toEqual(['Mag', '139400', '1', '32', 'retrieve_Mag_139400_1_32', '-T', '-f', '4']);
      expect(runner.calls[0].options.timeoutMs).toBe(99);
    });

    it('should fail without calibration parameters when --calibrated', async () => {
      const { deps } = depsFor(writesArtifacts(() => ({ dat: int16Buffer([1]) })));

      await expect(fetchCommand(fetchOptions({ calibrated: true }), deps)).rejects.toThrow(
        'VResolution or VCoefficient1 not found in metadata. Cannot convert to voltage.'
      );
    });
  });

  describe('batchCommand', () => {
    it('should write one CSV per channel and a summary per shot', async () => {
      const artifacts = writesArtifacts((args) => ({
        dat: int16Buffer(args[3] === '1' ? [1, 2] : [3, 4]),
        prm: 'Mag,SamplingRate,2\n',
      }));
      const { deps } = depsFor(async (call) => {
        if (call.args[1] === '101' && call.args[3] === '2') {
          return { exitCode: 1, stdout: '', stderr: 'no data' };
        }
        await artifacts(call);
        return undefined;
      });
      const outDir = join(testDir, 'data');

      const result = await batchCommand(
        {
          diagName: 'Mag',
          subshot: 1,
          shots: [100, 101],
          channels: [1, 2],
          outDir,
          timeAxis: true,
          quiet: false,
        },
        deps
      );

      expect(result.files).toEqual([
        join(outDir, 'shot_100', '1.csv'),
        join(outDir, 'shot_100', '2.csv'),
        join(outDir, 'shot_100', 'summary.csv'),
        join(outDir, 'shot_101', '1.csv'),
        join(outDir, 'shot_101', 'summary.csv'),
      ]);
      expect(await readFile(join(outDir, 'shot_100', '2.csv'), 'utf8')).toBe('time,data\n0,3\n0.5,4\n');
      expect(await readFile(join(outDir, 'shot_100', 'summary.csv'), 'utf8')).toBe(
        'shot,channel,points,time_start,time_end,data_min,data_max,units\n' +
          '100,1,2,0,0.5,1,2,\n' +
          '100,2,2,0,0.5,3,4,\n'
      );
      expect(await readFile(join(outDir, 'shot_101', 'summary.csv'), 'utf8')).toBe(
        'shot,channel,points,time_start,time_end,data_min,data_max,units\n' + '101,1,2,0,0.5,1,2,\n'
      );
      expect(result.rows).toHaveLength(3);
      expect(logLines(logSpy)).toContain('\n✅ Retrieved 3 signal(s) for 2 shot(s)');
      expect(logLines(errorSpy)).toHaveLength(1);
      expect(await readdir(workDir)).toEqual([]);
    });

    it('should quote summary cells that need it', () => {
      expect(
        formatSummaryCsv([
          {
            shot: 1,
            channel: 'a"b',
            points: 0,
            timeStart: null,
            timeEnd: null,
            dataMin: null,
            dataMax: null,
            units: 'V,raw',
          },
        ])
      ).toBe('shot,channel,points,time_start,time_end,data_min,data_max,units\n1,"a""b",0,,,,,"V,raw"\n');
    });
  });

  describe('cleanCommand', () => {
    beforeEach(async () => {
      for (const name of ['retrieve_Mag_1_1_1.dat', 'retrieve_Mag_1_1_1.tmp', 'keep.dat']) {
        await writeFile(join(testDir, name), '');
      }
    });

    it('should only list files in a dry run', async () => {
      const result = await cleanCommand({ workingDir: testDir });

      expect(result.found).toEqual([join(testDir, 'retrieve_Mag_1_1_1.dat'), join(testDir, 'retrieve_Mag_1_1_1.tmp')]);
      expect(result.removed).toEqual([]);
      expect(logLines(logSpy)).toEqual([
        '\n🧹 This will remove:',
        '  - retrieve_Mag_1_1_1.dat',
        '  - retrieve_Mag_1_1_1.tmp',
        '\n💡 Run with --all --yes to confirm and delete these files.',
      ]);
      expect((await readdir(testDir)).sort()).toEqual([
        'keep.dat',
        'retrieve_Mag_1_1_1.dat',
        'retrieve_Mag_1_1_1.tmp',
        'work',
      ]);
    });

    it('should delete with --all --yes', async () => {
      const result = await cleanCommand({ workingDir: testDir, all: true, yes: true });

      expect(result.removed).toHaveLength(2);
      expect((await readdir(testDir)).sort()).toEqual(['keep.dat', 'work']);
      expect(logLines(logSpy)).toContain('\n✅ Cleaned 2 file(s)');
    });

    it('should report an already clean directory', async () => {
      const result = await cleanCommand({ workingDir: workDir });

      expect(result).toEqual({ found: [], removed: [] });
      expect(logLines(logSpy)).toEqual(['✅ No temporary files found to clean']);
    });
  });

  describe('init', () => {
    it('should write the config and keep earlier settings', async () => {
      await init({ targetDir: testDir, retrievePath: '/opt/Retrieve/bin', outputFormat: 'json' });
      const config = await init({ targetDir: testDir, timeoutMs: 5000 });

      expect(config).toEqual({ retrievePath: '/opt/Retrieve/bin', outputFormat: 'json', timeoutMs: 5000 });
      expect(JSON.parse(await readFile(getConfigPath(testDir), 'utf8'))).toEqual(config);
      expect(logLines(logSpy)).toContain(`✅ Wrote ${getConfigPath(testDir)}`);
      expect(logLines(logSpy)).toContain('   timeoutMs: 5000');
    });
  });

  describe('envCommand', () => {
    it('should print the report as JSON', async () => {
      const report = await envCommand({ json: true }, { host: fakeHost({ platform: 'win32' }), runner: new FakeRunner() });

      expect(logLines(logSpy)).toEqual([JSON.stringify(report, null, 2)]);
      expect(report.isWindowsCompatible).toBe(true);
    });

    it('should explain an unsupported host', async () => {
      const report = await envCommand({ json: false }, { host: fakeHost(), runner: new FakeRunner() });

      expect(formatEnvironmentReport(report)).toBe(
        [
          '🖥️  Environment',
          '   OS:                  linux (x64)',
          '   OS version:          test-os-version',
          '   Windows compatible:  no',
          '   Retrieve.exe on PATH: no',
          '   Installed at:        (none of the default locations)',
          '   WSL:                 no',
        ].join('\n')
      );
      expect(logLines(logSpy)).toContain('\n💡 Retrieve.exe needs Windows or WSL.');
    });
  });

  describe('formatter', () => {
    it('should map extensions to formats', () => {
      expect(formatFromExtension('coil.CSV')).toBe('csv');
      expect(formatFromExtension('coil.json')).toBe('json');
      expect(formatFromExtension('coil.jsonl')).toBe('ndjson');
      expect(formatFromExtension('coil.txt')).toBeUndefined();
    });

    it('should write null times in NDJSON without a time axis', () => {
      const shot = new ShotData({ data: Int16Array.from([1, 2]), time: null, metadata: {} });
      expect(formatShotData(shot, 'ndjson')).toBe('{"time":null,"data":1}\n{"time":null,"data":2}\n');
    });

    it('should write float32 times in short form in NDJSON and JSON', () => {
      const shot = new ShotData({
        data: Int16Array.from([1, 2]),
        time: Float32Array.from([0, 0.1]),
        metadata: {},
      });

      expect(formatShotData(shot, 'ndjson')).toBe('{"time":0,"data":1}\n{"time":0.1,"data":2}\n');
      expect(JSON.parse(formatShotData(shot, 'json')).time).toEqual([0, 0.1]);
    });

    it('should include metadata in JSON', () => {
      const shot = new ShotData({
        data: Int16Array.from([5]),
        time: Float64Array.from([0]),
        metadata: { shot: 1, Unit: 'V' },
        units: 'V',
        description: 'Mag Shot 1.1, Channel 1',
      });

      expect(JSON.parse(formatShotData(shot, 'json', [2.5]))).toEqual({
        description: 'Mag Shot 1.1, Channel 1',
        units: 'V',
        metadata: { shot: 1, Unit: 'V' },
        time: [0],
        data: [2.5],
      });
    });
  });
});
