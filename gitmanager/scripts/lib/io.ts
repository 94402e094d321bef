import fs from 'fs-extra';
import path from 'node:path';

export interface RunOptions {
  check: boolean;
}

export function getRunOptions(argv: string[]): RunOptions {
  return {
    check: argv.includes('--check')
  };
}

export function repoPath(...parts: string[]): string {
  return path.resolve(process.cwd(), ...parts);
}

export function toPosixRelative(filePath: string): string {
  const relative = path.relative(process.cwd(), filePath).split(path.sep).join('/');
  return relative || '.';
}

/**
 * Like `fs.pathExists`, but does not follow a final symlink, so a dangling
 * link still counts as present.
 */
export async function entryExists(filePath: string): Promise<boolean> {
  try {
    await fs.lstat(filePath);
    return true;
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
