/**
 * Clean command - Removes temporary files Retrieve.exe left behind
 * Only files named retrieve_*.dat|.prm|.time|.tprm|.tmp are touched
 */

import { resolve, relative } from 'node:path';
import { FILE_PREFIX_ROOT, TEMPORARY_EXTENSIONS } from '../../core/command.js';
import { resolveSettings } from '../../utils/config.js';
import { displayPath, findFilesWithPrefix, removeFiles } from '../../utils/fsx.js';

export interface CleanOptions {
  /** Directory to clean (default: configured working directory, else current) */
  workingDir?: string;
  all?: boolean;
  yes?: boolean;
  quiet?: boolean;
}

export interface CleanResult {
  found: string[];
  removed: string[];
}

/**
 * Find leftover temporary files, returned as absolute paths
 */
export async function findTemporaryFiles(workingDir: string): Promise<string[]> {
  return findFilesWithPrefix(workingDir, FILE_PREFIX_ROOT, [...TEMPORARY_EXTENSIONS]);
}

/**
 * Clean command - lists leftover files, deletes them with --all --yes
 */
export async function cleanCommand(options: CleanOptions): Promise<CleanResult> {
  const settings = await resolveSettings(process.cwd());
  const workingDir = resolve(options.workingDir || settings.workingDir || '.');

  const found = await findTemporaryFiles(workingDir);
  const result: CleanResult = { found, removed: [] };

  // If no files found, exit early
  if (found.length === 0) {
    if (options.quiet) {
      process.stdout.write('✓\n');
    } else {
      console.log('✅ No temporary files found to clean');
    }
    return result;
  }

  // Display what will be removed
  if (!options.quiet) {
    console.log('\n🧹 This will remove:');
    for (const file of found) {
      console.log(`  - ${displayPath(relative(workingDir, file))}`);
    }
  }

  // If --all and --yes flags are provided, proceed with deletion
  if (options.all && options.yes) {
    if (!options.quiet) {
      console.log('\n🗑️  Removing files...\n');
    }

    const { removed, failed } = await removeFiles(found);
    result.removed = removed;

    if (!options.quiet) {
      for (const file of removed) {
        console.log(`   ✓ Removed ${displayPath(relative(workingDir, file))}`);
      }
    }
    // Always show errors
    for (const { path, message } of failed) {
      console.error(`   ✗ Failed to remove ${displayPath(relative(workingDir, path))}: ${message}`);
    }

    if (options.quiet) {
      process.stdout.write('✓\n');
    } else {
      console.log(`\n✅ Cleaned ${removed.length} file(s)`);
    }
  } else if (!options.quiet) {
    // Dry run mode - just show what would be removed
    console.log('\n💡 Run with --all --yes to confirm and delete these files.');
  }

  return result;
}
