/**
 * Handler for fetch command
 */

import { fetchCommand } from '../commands/fetch.js';
import { parseFetchArgs } from '../parser/argumentParser.js';
import { getFetchHelp } from '../parser/helpText.js';
import { errorMessage } from '../../core/errors.js';

export async function handleFetch(args: string[]): Promise<void> {
  if (args.includes('--help') || args.includes('-h')) {
    console.log(getFetchHelp());
    process.exit(0);
  }

  try {
    const options = parseFetchArgs(args);
    await fetchCommand(options);
  } catch (error) {
    console.error('❌ Fetch failed:', errorMessage(error));
    process.exit(1);
  }
}
