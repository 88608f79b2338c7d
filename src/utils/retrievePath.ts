/**
 * Locating and validating Retrieve.exe
 */

import { basename, delimiter, join } from 'node:path';
import { RetrieveError } from '../core/errors.js';
import { execFileRunner, type ProcessRunner } from '../core/runner.js';
import {
  findWindowsRetrieveExe,
  getWslEnvironmentInfo,
  isWindowsCompatible,
  systemHost,
  WINDOWS_RETRIEVE_PATHS,
  WSL_RETRIEVE_PATHS,
  type HostEnvironment,
  type WslEnvironmentInfo,
} from './environment.js';

export const RETRIEVE_EXE = 'Retrieve.exe';

export interface EnvironmentReport extends Partial<WslEnvironmentInfo> {
  os: string;
  osVersion: string;
  architecture: string;
  isWindowsCompatible: boolean;
  retrieveInPath: boolean;
  defaultPathsAvailable: string[];
}

async function requireWindowsCompatible(host: HostEnvironment): Promise<void> {
  if (!(await isWindowsCompatible(host))) {
    throw new RetrieveError('UNSUPPORTED_PLATFORM', 'This package requires Windows or WSL environment');
  }
}

/**
 * Search the PATH entries for an executable
 */
export async function findOnPath(name: string, host: HostEnvironment = systemHost): Promise<string | null> {
  const pathValue = host.env('PATH') ?? host.env('Path') ?? '';
  const sep = host.platform() === 'win32' ? ';' : delimiter;

  for (const dir of pathValue.split(sep)) {
    if (!dir) continue;
    const candidate = join(dir, name);
    if (await host.isExecutable(candidate)) {
      return candidate;
    }
  }
  return null;
}

/**
 * Check that Retrieve.exe exists and may be executed. Without a path, checks
 * whether it is on PATH.
 */
export async function validateRetrieveExe(
  retrievePath?: string,
  host: HostEnvironment = systemHost
): Promise<boolean> {
  await requireWindowsCompatible(host);

  if (retrievePath) {
    return host.isExecutable(retrievePath);
  }
  return (await findOnPath(RETRIEVE_EXE, host)) !== null;
}

/**
 * Resolve the full path to Retrieve.exe from its install directory (or from
 * the executable path itself)
 */
export async function setupRetrievePath(
  retrieveDir: string,
  host: HostEnvironment = systemHost
): Promise<string> {
  await requireWindowsCompatible(host);

  const pointsAtExe = basename(retrieveDir).toLowerCase() === RETRIEVE_EXE.toLowerCase();
  const retrievePath = pointsAtExe ? retrieveDir : join(retrieveDir, RETRIEVE_EXE);

  if (!(await host.pathExists(retrievePath))) {
    throw new RetrieveError(
      'RETRIEVE_NOT_FOUND',
      pointsAtExe ? `Retrieve.exe not found: ${retrievePath}` : `Retrieve.exe not found in ${retrieveDir}`,
      { retrievePath }
    );
  }

  if (!(await host.isExecutable(retrievePath))) {
    throw new RetrieveError('RETRIEVE_NOT_EXECUTABLE', `Retrieve.exe is not executable: ${retrievePath}`, {
      retrievePath,
    });
  }

  return retrievePath;
}

/**
 * Known install locations that exist on this machine, most likely first
 */
export async function getDefaultRetrievePaths(host: HostEnvironment = systemHost): Promise<string[]> {
  const candidates: string[] = [];

  if (host.platform() === 'win32') {
    candidates.push(...WINDOWS_RETRIEVE_PATHS);
  } else {
    const wslRetrieve = await findWindowsRetrieveExe(host);
    if (wslRetrieve) {
      candidates.push(wslRetrieve);
    }
    candidates.push(...WSL_RETRIEVE_PATHS);
  }

  const existing: string[] = [];
  for (const path of new Set(candidates)) {
    if (await host.pathExists(path)) {
      existing.push(path);
    }
  }
  return existing;
}

/**
 * Describe the host for troubleshooting: OS, Retrieve.exe discovery and, off
 * Windows, the WSL details
 */
export async function checkWindowsEnvironment(
  host: HostEnvironment = systemHost,
  runner: ProcessRunner = execFileRunner
): Promise<EnvironmentReport> {
  const report: EnvironmentReport = {
    os: host.platform(),
    osVersion: host.osVersion(),
    architecture: host.arch(),
    isWindowsCompatible: await isWindowsCompatible(host),
    retrieveInPath: (await findOnPath(RETRIEVE_EXE, host)) !== null,
    defaultPathsAvailable: await getDefaultRetrievePaths(host),
  };

  if (host.platform() !== 'win32') {
    Object.assign(report, await getWslEnvironmentInfo(host, runner));
  }

  return report;
}
