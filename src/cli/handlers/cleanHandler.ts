/**
 * Handler for clean command
 */

import { cleanCommand } from '../commands/clean.js';
import { parseCleanArgs } from '../parser/argumentParser.js';
import { getCleanHelp } from '../parser/helpText.js';
import { errorMessage } from '../../core/errors.js';

export async function handleClean(args: string[]): Promise<void> {
  if (args.includes('--help') || args.includes('-h')) {
    console.log(getCleanHelp());
    process.exit(0);
  }

  try {
    const options = parseCleanArgs(args);
    await cleanCommand(options);
  } catch (error) {
    console.error('❌ Clean failed:', errorMessage(error));
    process.exit(1);
  }
}
