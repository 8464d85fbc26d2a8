import { execFile } from 'child_process';

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

/**
 * Thrown when a command could not be started at all or ran past its timeout.
 * A command that runs and exits non-zero is not an error: see CommandResult.exitCode.
 */
export class CommandLaunchError extends Error {
  constructor(
    message: string,
    readonly code: string | undefined,
    readonly timedOut: boolean
  ) {
    super(message);
    this.name = 'CommandLaunchError';
  }
}

/**
 * Run a binary with arguments (no shell) and capture its output
 */
export function runCommand(
  binary: string,
  args: string[],
  timeoutMs: number
): Promise<CommandResult> {
  return new Promise((resolve, reject) => {
    execFile(
      binary,
      args,
      { timeout: timeoutMs, maxBuffer: 16 * 1024 * 1024, encoding: 'utf-8' },
      (error, stdout, stderr) => {
        if (!error) {
          resolve({ exitCode: 0, stdout, stderr });
          return;
        }

        const code: unknown = error.code;
        if (error.killed || typeof code === 'string') {
          const timedOut = error.killed === true;
          const message = timedOut
            ? `${binary} ${args.join(' ')} timed out after ${timeoutMs}ms`
            : code === 'ENOENT'
              ? `${binary} not found in PATH`
              : error.message;
          reject(new CommandLaunchError(message, typeof code === 'string' ? code : undefined, timedOut));
          return;
        }

        resolve({
          exitCode: typeof code === 'number' ? code : 1,
          stdout,
          stderr,
        });
      }
    );
  });
}
