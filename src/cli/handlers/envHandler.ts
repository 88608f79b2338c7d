/**
 * Handler for env command
 */

import { envCommand } from '../commands/env.js';
import { parseEnvArgs } from '../parser/argumentParser.js';
import { getEnvHelp } from '../parser/helpText.js';
import { errorMessage } from '../../core/errors.js';

export async function handleEnv(args: string[]): Promise<void> {
  if (args.includes('--help') || args.includes('-h')) {
    console.log(getEnvHelp());
    process.exit(0);
  }

  try {
    await envCommand(parseEnvArgs(args));
  } catch (error) {
    console.error('❌ Environment check failed:', errorMessage(error));
    process.exit(1);
  }
}
