import { spawn } from 'child_process';

import { ConversionFailedError, EngineUnavailableError } from '../errors';

export interface RunCommandOptions {
  /** Human-readable engine name used in error messages. */
  label: string;
  /** Kill the process after this many milliseconds. 0 or undefined waits indefinitely. */
  timeoutMs?: number;
}

export type CommandRunner = (executable: string, args: string[], options: RunCommandOptions) => Promise<void>;

export const runCommand: CommandRunner = (executable, args, options) => {
  return new Promise((resolve, reject) => {
    const child = spawn(executable, args, { stdio: ['ignore', 'ignore', 'pipe'] });

    let stderr = '';
    let timedOut = false;
    const timer = options.timeoutMs && options.timeoutMs > 0
      ? setTimeout(() => {
        timedOut = true;
        child.kill('SIGKILL');
      }, options.timeoutMs)
      : undefined;

    child.stderr.on('data', (chunk: Buffer) => {
      stderr += chunk.toString();
    });

    child.on('error', (error: NodeJS.ErrnoException) => {
      clearTimeout(timer);

      if (error.code === 'ENOENT') {
        reject(new EngineUnavailableError(`${options.label} executable not found at "${executable}".`));
        return;
      }

      reject(new ConversionFailedError(`Failed to launch ${options.label}: ${error.message}`));
    });

    child.on('close', (code: number | null) => {
      clearTimeout(timer);

      if (timedOut) {
        reject(new ConversionFailedError(`${options.label} did not finish within ${options.timeoutMs} ms.`));
        return;
      }

      if (code === 0) {
        resolve();
        return;
      }

      const detail = stderr.trim();
      reject(new ConversionFailedError(`${options.label} exited with code ${code}.`, detail || undefined));
    });
  });
};
