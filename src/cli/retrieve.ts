#!/usr/bin/env node

/**
 * lhd-retrieve CLI - Main entry point
 * Routes to fetch, batch, env, example, clean and init
 */

import { readFile } from 'node:fs/promises';
import { join, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import {
  handleBatch,
  handleClean,
  handleEnv,
  handleExample,
  handleFetch,
  handleInit,
} from './handlers/index.js';
import { getMainHelp } from './parser/index.js';
import { errorMessage } from '../core/errors.js';

const COMMANDS: Record<string, (args: string[]) => Promise<void>> = {
  fetch: handleFetch,
  batch: handleBatch,
  env: handleEnv,
  example: handleExample,
  clean: handleClean,
  init: handleInit,
};

async function readVersion(): Promise<string> {
  const __filename = fileURLToPath(import.meta.url);
  const __dirname = dirname(__filename);
  // src/cli and dist/cli both sit two levels below package.json
  const packageJsonPath = join(__dirname, '../../package.json');
  const packageJson: unknown = JSON.parse(await readFile(packageJsonPath, 'utf8'));
  const version: unknown =
    typeof packageJson === 'object' && packageJson !== null ? Reflect.get(packageJson, 'version') : undefined;
  if (typeof version !== 'string') {
    throw new Error(`No version in ${packageJsonPath}`);
  }
  return version;
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);

  // Check for version
  if (args[0] === '--version' || args[0] === '-v') {
    try {
      console.log(`Version: ${await readVersion()}`);
      process.exit(0);
    } catch (error) {
      console.error('❌ Failed to read version:', errorMessage(error));
      process.exit(1);
    }
  }

  // Check for help - only if no args or first arg is help
  if (args.length === 0 || args[0] === '--help' || args[0] === '-h') {
    console.log(getMainHelp());
    process.exit(0);
  }

  const subcommand = args[0];
  const handler = Object.hasOwn(COMMANDS, subcommand) ? COMMANDS[subcommand] : undefined;

  if (!handler) {
    console.error(`❌ Unknown command: ${subcommand}`);
    console.error('Run "lhd-retrieve --help" for usage information');
    process.exit(1);
  }

  await handler(args.slice(1));
}

main().catch((error: unknown) => {
  console.error('❌', errorMessage(error));
  process.exit(1);
});
