/**
 * Process runner - executes the archive client as a child process
 */

import { execFile } from 'node:child_process';
import { RetrieveError } from './errors.js';
import { formatCommandLine } from './command.js';
import { debugError } from '../utils/debug.js';

/** Five minutes, the longest a single archive query is allowed to take */
export const DEFAULT_TIMEOUT_MS = 300_000;

const MAX_OUTPUT_BUFFER = 64 * 1024 * 1024;

export interface RunOptions {
  cwd?: string;
  timeoutMs?: number;
  /** Largest stdout or stderr accepted before the process is killed */
  maxOutputBytes?: number;
}

export interface RunResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

/**
 * Runs one external command. A non-zero exit code resolves; only failures to
 * start or finish the process reject.
 */
export interface ProcessRunner {
  run(file: string, args: string[], options?: RunOptions): Promise<RunResult>;
}

function formatTimeout(timeoutMs: number): string {
  if (timeoutMs % 60_000 === 0) {
    const minutes = timeoutMs / 60_000;
    return `${minutes} minute${minutes === 1 ? '' : 's'}`;
  }
  return `${timeoutMs / 1000} seconds`;
}

export const execFileRunner: ProcessRunner = {
  run(file: string, args: string[], options: RunOptions = {}): Promise<RunResult> {
    const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    const maxOutputBytes = options.maxOutputBytes ?? MAX_OUTPUT_BUFFER;

    return new Promise<RunResult>((resolvePromise, rejectPromise) => {
      execFile(
        file,
        args,
        {
          cwd: options.cwd,
          timeout: timeoutMs,
          encoding: 'utf8',
          maxBuffer: maxOutputBytes,
          windowsHide: true,
        },
        (error, stdout, stderr) => {
          if (!error) {
            resolvePromise({ exitCode: 0, stdout, stderr });
            return;
          }

          const code: unknown = error.code;
          const command = formatCommandLine(file, args);

          if (code === 'ENOENT') {
            rejectPromise(
              new RetrieveError('RETRIEVE_NOT_FOUND', `Retrieve.exe not found: ${file}`, { command })
            );
            return;
          }

          if (code === 'EACCES') {
            rejectPromise(
              new RetrieveError('RETRIEVE_NOT_EXECUTABLE', `Retrieve.exe is not executable: ${file}`, { command })
            );
            return;
          }

          if (typeof code === 'number') {
            resolvePromise({ exitCode: code, stdout, stderr });
            return;
          }

          // execFile sets `killed` here too
          if (code === 'ERR_CHILD_PROCESS_STDIO_MAXBUFFER') {
            rejectPromise(
              new RetrieveError('RETRIEVE_FAILED', `Retrieve.exe output exceeded ${maxOutputBytes} bytes`, {
                command,
                maxOutputBytes,
              })
            );
            return;
          }

          if (error.killed) {
            rejectPromise(
              new RetrieveError('RETRIEVE_TIMEOUT', `Retrieve.exe timeout after ${formatTimeout(timeoutMs)}`, {
                command,
                timeoutMs,
              })
            );
            return;
          }

          debugError('runner', 'execFileRunner.run', {
            command,
            cwd: options.cwd,
            code,
            message: error.message,
          });
          rejectPromise(new RetrieveError('RETRIEVE_FAILED', `Failed to run ${command}: ${error.message}`));
        }
      );
    });
  },
};
