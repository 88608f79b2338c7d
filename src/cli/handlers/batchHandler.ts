/**
 * Handler for batch command
 */

import { batchCommand } from '../commands/batch.js';
import { parseBatchArgs } from '../parser/argumentParser.js';
import { getBatchHelp } from '../parser/helpText.js';
import { errorMessage } from '../../core/errors.js';

export async function handleBatch(args: string[]): Promise<void> {
  if (args.includes('--help') || args.includes('-h')) {
    console.log(getBatchHelp());
    process.exit(0);
  }

  try {
    const options = parseBatchArgs(args);
    await batchCommand(options);
  } catch (error) {
    console.error('❌ Batch processing failed:', errorMessage(error));
    process.exit(1);
  }
}
