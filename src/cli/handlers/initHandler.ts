/**
 * Handler for init command
 */

import { init } from '../commands/init.js';
import { parseInitArgs } from '../parser/argumentParser.js';
import { getInitHelp } from '../parser/helpText.js';
import { errorMessage } from '../../core/errors.js';

export async function handleInit(args: string[]): Promise<void> {
  if (args.includes('--help') || args.includes('-h')) {
    console.log(getInitHelp());
    process.exit(0);
  }

  try {
    const options = parseInitArgs(args);
    await init(options);
  } catch (error) {
    console.error('❌ Initialization failed:', errorMessage(error));
    process.exit(1);
  }
}
