/**
 * Handler for example command
 */

import { createExampleRetrieval } from '../../core/command.js';
import { errorMessage } from '../../core/errors.js';
import { parseExampleArgs } from '../parser/argumentParser.js';
import { getExampleHelp } from '../parser/helpText.js';

export async function handleExample(args: string[]): Promise<void> {
  if (args.includes('--help') || args.includes('-h')) {
    console.log(getExampleHelp());
    process.exit(0);
  }

  try {
    const { diagName, shot, subshot, channel } = parseExampleArgs(args);
    console.log(createExampleRetrieval(diagName, shot, subshot, channel));
  } catch (error) {
    console.error('❌', errorMessage(error));
    process.exit(1);
  }
}
