/**
 * Init command - Writes the project's .lhd-retrieve/config.json
 */

import { resolve } from 'node:path';
import { getConfigPath, updateConfig, type OutputFormat, type RetrieveConfig } from '../../utils/config.js';
import { displayPath } from '../../utils/fsx.js';

export interface InitOptions {
  /** Target directory to initialize (default: current directory) */
  targetDir?: string;
  retrievePath?: string;
  workingDir?: string;
  timeoutMs?: number;
  outputFormat?: OutputFormat;
}

/**
 * Create or update the config file, keeping settings that were not passed
 */
export async function init(options: InitOptions = {}): Promise<RetrieveConfig> {
  const targetDir = resolve(options.targetDir || process.cwd());

  console.log('🚀 Initializing lhd-retrieve...\n');

  const updates: Partial<RetrieveConfig> = {};
  if (options.retrievePath) updates.retrievePath = options.retrievePath;
  if (options.workingDir) updates.workingDir = options.workingDir;
  if (options.timeoutMs !== undefined) updates.timeoutMs = options.timeoutMs;
  if (options.outputFormat) updates.outputFormat = options.outputFormat;

  const config = await updateConfig(targetDir, updates);

  console.log(`✅ Wrote ${displayPath(getConfigPath(targetDir))}`);
  const entries = Object.entries(config);
  if (entries.length === 0) {
    console.log('   (no settings yet; Retrieve.exe will be searched for in the default locations)');
  }
  for (const [key, value] of entries) {
    console.log(`   ${key}: ${String(value)}`);
  }

  return config;
}
