/**
 * Host environment probing
 *
 * Retrieve.exe is a Windows program. It runs natively on Windows and, through
 * interop, from WSL, where the Windows drives are mounted under /mnt.
 */

import { readFile } from 'node:fs/promises';
import { arch, platform, version } from 'node:os';
import { execFileRunner, type ProcessRunner } from '../core/runner.js';
import { fileExists, isExecutable } from './fsx.js';

export interface HostEnvironment {
  platform(): NodeJS.Platform;
  osVersion(): string;
  arch(): string;
  env(key: string): string | undefined;
  /** Contents of /proc/version, null where there is none */
  procVersion(): Promise<string | null>;
  pathExists(path: string): Promise<boolean>;
  isExecutable(path: string): Promise<boolean>;
}

export const systemHost: HostEnvironment = {
  platform: () => platform(),
  osVersion: () => version(),
  arch: () => arch(),
  env: (key) => process.env[key],
  async procVersion() {
    try {
      return await readFile('/proc/version', 'utf8');
    } catch {
      return null;
    }
  },
  pathExists: (path) => fileExists(path),
  isExecutable: (path) => isExecutable(path),
};

export const WINDOWS_RETRIEVE_PATHS = [
  'C:\\LABCOM\\Retrieve\\bin\\Retrieve.exe',
  'C:\\LHD\\Retrieve\\Retrieve.exe',
  'C:\\Program Files\\LHD\\Retrieve\\Retrieve.exe',
  'C:\\Program Files (x86)\\LHD\\Retrieve\\Retrieve.exe',
  '.\\Retrieve.exe',
  '.\\bin\\Retrieve.exe',
] as const;

export const WSL_RETRIEVE_PATHS = [
  '/mnt/c/LABCOM/Retrieve/bin/Retrieve.exe',
  '/mnt/c/LHD/Retrieve/Retrieve.exe',
  '/mnt/c/Program Files/LHD/Retrieve/Retrieve.exe',
  '/mnt/c/Program Files (x86)/LHD/Retrieve/Retrieve.exe',
] as const;

const HELP_CHECK_TIMEOUT_MS = 10_000;

export interface WslEnvironmentInfo {
  isWsl: boolean;
  isWindowsCompatible: boolean;
  platform: string;
  availableWindowsPaths: string[];
  windowsCAccessible?: boolean;
  retrieveExeFound?: string;
  retrieveExeWorking?: boolean;
}

export async function isWsl(host: HostEnvironment = systemHost): Promise<boolean> {
  const procVersion = await host.procVersion();
  if (procVersion === null) return false;
  const lower = procVersion.toLowerCase();
  return lower.includes('microsoft') || lower.includes('wsl');
}

/**
 * Windows, or Linux under WSL
 */
export async function isWindowsCompatible(host: HostEnvironment = systemHost): Promise<boolean> {
  return host.platform() === 'win32' || (await isWsl(host));
}

export async function getWslWindowsPaths(host: HostEnvironment = systemHost): Promise<string[]> {
  if (!(await isWsl(host))) return [];
  return [...WSL_RETRIEVE_PATHS];
}

export async function findWindowsRetrieveExe(host: HostEnvironment = systemHost): Promise<string | null> {
  if (!(await isWsl(host))) return null;

  for (const path of WSL_RETRIEVE_PATHS) {
    if (await host.pathExists(path)) {
      return path;
    }
  }
  return null;
}

/**
 * /mnt/c/LABCOM/Retrieve -> C:\LABCOM\Retrieve
 */
export function convertWslPathToWindows(wslPath: string): string {
  const match = /^\/mnt\/([A-Za-z])(?:\/(.*))?$/.exec(wslPath);
  if (!match) return wslPath;
  const drive = `${match[1].toUpperCase()}:`;
  const rest = (match[2] ?? '').split('/').filter((part) => part.length > 0);
  return `${drive}\\${rest.join('\\')}`;
}

/**
 * Whether the executable can be started at all; a non-zero exit from `-h`
 * still counts.
 */
export async function testRetrieveExe(
  retrievePath: string,
  host: HostEnvironment = systemHost,
  runner: ProcessRunner = execFileRunner
): Promise<boolean> {
  if (!(await host.pathExists(retrievePath))) return false;

  try {
    await runner.run(retrievePath, ['-h'], { timeoutMs: HELP_CHECK_TIMEOUT_MS });
    return true;
  } catch {
    return false;
  }
}

export async function getWslEnvironmentInfo(
  host: HostEnvironment = systemHost,
  runner: ProcessRunner = execFileRunner
): Promise<WslEnvironmentInfo> {
  const wsl = await isWsl(host);
  const info: WslEnvironmentInfo = {
    isWsl: wsl,
    isWindowsCompatible: await isWindowsCompatible(host),
    platform: host.platform(),
    availableWindowsPaths: [],
  };

  if (!wsl) return info;

  for (const path of await getWslWindowsPaths(host)) {
    if (await host.pathExists(path)) {
      info.availableWindowsPaths.push(path);
    }
  }

  info.windowsCAccessible = await host.pathExists('/mnt/c/');

  const found = await findWindowsRetrieveExe(host);
  if (found) {
    info.retrieveExeFound = found;
    info.retrieveExeWorking = await testRetrieveExe(found, host, runner);
  }

  return info;
}
