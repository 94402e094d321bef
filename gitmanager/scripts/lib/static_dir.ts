import path from 'node:path';

import { processCommandRunner, type CommandRunner } from './process.js';

export interface StaticDirResolver {
  /**
   * Subdirectory of `workingDir` holding the course's static output, or
   * `null` when the course publishes nothing.
   */
  resolve(workingDir: string): Promise<string | null>;
}

export interface CommandResolverOptions {
  interpreter: string;
  script: string;
  root: string;
}

export function parseStaticDirOutput(stdout: string): string | null {
  const lines = stdout
    .replace(/[\r\n]+$/, '')
    .split(/\r?\n/)
    .filter((line) => line.trim().length > 0);

  if (lines.length === 0) {
    return null;
  }
  if (lines.length > 1) {
    throw new Error(`Static dir resolver printed ${lines.length} lines, expected one`);
  }

  const raw = lines[0].trim();
  if (raw.includes('\\')) {
    throw new Error(`Static dir '${raw}' must not contain a backslash`);
  }
  if (path.posix.isAbsolute(raw) || path.win32.isAbsolute(raw)) {
    throw new Error(`Static dir '${raw}' must be relative to the course directory`);
  }

  const normalized = path.posix.normalize(raw).replace(/\/+$/, '');
  if (normalized === '..' || normalized.startsWith('../')) {
    throw new Error(`Static dir '${raw}' points outside the course directory`);
  }

  return normalized || '.';
}

/** Runs `<interpreter> <script> static <workingDir>` from `root`. */
export function createCommandResolver(
  options: CommandResolverOptions,
  runner: CommandRunner = processCommandRunner
): StaticDirResolver {
  return {
    async resolve(workingDir) {
      const stdout = await runner.capture(
        options.interpreter,
        [options.script, 'static', workingDir],
        { cwd: options.root }
      );
      return parseStaticDirOutput(stdout);
    }
  };
}
