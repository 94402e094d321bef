import { execFile, spawn } from 'node:child_process';
import { promisify } from 'node:util';

const execFileAsync = promisify(execFile);

export interface CommandOptions {
  cwd: string;
}

export interface CommandRunner {
  /** Runs with inherited stdio and resolves to the exit code. */
  run(command: string, args: string[], options: CommandOptions): Promise<number>;
  /** Resolves to stdout; rejects with `CommandError` on a non-zero exit. */
  capture(command: string, args: string[], options: CommandOptions): Promise<string>;
}

export class CommandError extends Error {
  readonly commandLine: string;
  readonly exitCode: number;
  readonly stderr: string;

  constructor(command: string, args: string[], exitCode: number, stderr = '') {
    const commandLine = [command, ...args].join(' ');
    const detail = stderr.trim();
    super(
      `Command '${commandLine}' exited with status ${exitCode}${detail ? `: ${detail}` : ''}`
    );
    this.name = 'CommandError';
    this.commandLine = commandLine;
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

function readExitCode(error: unknown): number | null {
  if (error instanceof Error && 'code' in error && typeof error.code === 'number') {
    return error.code;
  }
  return null;
}

function readStderr(error: unknown): string {
  if (error instanceof Error && 'stderr' in error && typeof error.stderr === 'string') {
    return error.stderr;
  }
  return '';
}

export async function runChecked(
  runner: CommandRunner,
  command: string,
  args: string[],
  options: CommandOptions
): Promise<void> {
  const exitCode = await runner.run(command, args, options);
  if (exitCode !== 0) {
    throw new CommandError(command, args, exitCode);
  }
}

export const processCommandRunner: CommandRunner = {
  run(command, args, options): Promise<number> {
    return new Promise((resolve, reject) => {
      const child = spawn(command, args, {
        cwd: options.cwd,
        stdio: 'inherit'
      });
      child.once('error', reject);
      child.once('close', (code) => {
        resolve(code ?? 1);
      });
    });
  },

  async capture(command, args, options): Promise<string> {
    try {
      const result = await execFileAsync(command, args, {
        cwd: options.cwd,
        encoding: 'utf8',
        maxBuffer: 16 * 1024 * 1024
      });
      return result.stdout;
    } catch (error) {
      const exitCode = readExitCode(error);
      if (exitCode === null) {
        throw error;
      }
      throw new CommandError(command, args, exitCode, readStderr(error));
    }
  }
};
