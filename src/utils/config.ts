/**
 * Utilities for managing lhd-retrieve configuration
 */

import { readFile, writeFile, mkdir, access } from 'node:fs/promises';
import { join } from 'node:path';
import { debugError } from './debug.js';
import { systemHost, type HostEnvironment } from './environment.js';

export type OutputFormat = 'csv' | 'json' | 'ndjson';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['csv', 'json', 'ndjson'];

export interface RetrieveConfig {
  /** Retrieve.exe, or the directory holding it */
  retrievePath?: string;
  /** Where Retrieve.exe writes its output files */
  workingDir?: string;
  /** Per-call timeout in milliseconds */
  timeoutMs?: number;
  /** Default export format for `fetch --out` */
  outputFormat?: OutputFormat;
}

export function isOutputFormat(value: unknown): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

/**
 * Get the config directory path for a project
 */
export function getConfigDir(projectRoot: string): string {
  return join(projectRoot, '.lhd-retrieve');
}

/**
 * Get the config file path for a project
 */
export function getConfigPath(projectRoot: string): string {
  return join(getConfigDir(projectRoot), 'config.json');
}

/**
 * Check if config file exists
 */
export async function configExists(projectRoot: string): Promise<boolean> {
  try {
    await access(getConfigPath(projectRoot));
    return true;
  } catch {
    return false;
  }
}

function parsePositiveInt(value: unknown): number | undefined {
  const n = typeof value === 'string' ? Number(value) : value;
  if (typeof n === 'number' && Number.isInteger(n) && n > 0) {
    return n;
  }
  return undefined;
}

/**
 * Keep only well-formed fields of a parsed config file
 */
export function sanitizeConfig(raw: unknown): RetrieveConfig {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    return {};
  }

  const config: RetrieveConfig = {};
  const field = (key: keyof RetrieveConfig): unknown => Reflect.get(raw, key);

  const retrievePath = field('retrievePath');
  if (typeof retrievePath === 'string' && retrievePath) {
    config.retrievePath = retrievePath;
  }
  const workingDir = field('workingDir');
  if (typeof workingDir === 'string' && workingDir) {
    config.workingDir = workingDir;
  }
  const timeoutMs = parsePositiveInt(field('timeoutMs'));
  if (timeoutMs !== undefined) {
    config.timeoutMs = timeoutMs;
  }
  const outputFormat = field('outputFormat');
  if (isOutputFormat(outputFormat)) {
    config.outputFormat = outputFormat;
  }

  return config;
}

/**
 * Read config from disk
 */
export async function readConfig(projectRoot: string): Promise<RetrieveConfig> {
  try {
    const configPath = getConfigPath(projectRoot);
    const content = await readFile(configPath, 'utf-8');
    return sanitizeConfig(JSON.parse(content));
  } catch {
    return {};
  }
}

/**
 * Write config to disk
 */
export async function writeConfig(projectRoot: string, config: RetrieveConfig): Promise<void> {
  const configDir = getConfigDir(projectRoot);
  const configPath = getConfigPath(projectRoot);

  // Ensure config directory exists
  try {
    await mkdir(configDir, { recursive: true });
  } catch (error) {
    const err = error as NodeJS.ErrnoException;
    debugError('config', 'writeConfig', {
      configDir,
      operation: 'mkdir',
      message: err.message,
      code: err.code,
    });
    throw new Error(`Failed to create config directory "${configDir}": ${err.code === 'EACCES' ? 'Permission denied' : err.message}`);
  }

  try {
    await writeFile(configPath, JSON.stringify(config, null, 2) + '\n', 'utf-8');
  } catch (error) {
    const err = error as NodeJS.ErrnoException;
    debugError('config', 'writeConfig', {
      configPath,
      operation: 'writeFile',
      message: err.message,
      code: err.code,
    });

    let userMessage: string;
    switch (err.code) {
      case 'ENOENT':
        userMessage = `Parent directory not found for: "${configPath}"`;
        break;
      case 'EACCES':
        userMessage = `Permission denied writing to: "${configPath}"`;
        break;
      case 'ENOSPC':
        userMessage = `No space left on device. Cannot write: "${configPath}"`;
        break;
      default:
        userMessage = `Failed to write config file "${configPath}": ${err.message}`;
    }
    throw new Error(userMessage);
  }
}

/**
 * Update config with new values (merges with existing)
 */
export async function updateConfig(projectRoot: string, updates: Partial<RetrieveConfig>): Promise<RetrieveConfig> {
  const existing = await readConfig(projectRoot);
  const merged = { ...existing, ...updates };
  await writeConfig(projectRoot, merged);
  return merged;
}

/**
 * Settings from LHD_RETRIEVE_* environment variables
 */
export function readEnvSettings(host: HostEnvironment = systemHost): RetrieveConfig {
  return sanitizeConfig({
    retrievePath: host.env('LHD_RETRIEVE_PATH'),
    workingDir: host.env('LHD_RETRIEVE_WORKDIR'),
    timeoutMs: host.env('LHD_RETRIEVE_TIMEOUT'),
  });
}

/**
 * Effective settings: the project config file, overridden by the environment
 */
export async function resolveSettings(
  projectRoot: string,
  host: HostEnvironment = systemHost
): Promise<RetrieveConfig> {
  const fileConfig = await readConfig(projectRoot);
  return { ...fileConfig, ...readEnvSettings(host) };
}
