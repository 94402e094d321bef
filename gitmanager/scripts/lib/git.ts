import fs from 'fs-extra';
import path from 'node:path';

import {
  CommandError,
  processCommandRunner,
  runChecked,
  type CommandRunner
} from './process.js';

export interface GitAdapter {
  clone(url: string, branch: string, directory: string): Promise<void>;
  /** Checked-out branch name (also for an unborn branch), `null` on a detached HEAD. */
  currentBranch(directory: string): Promise<string | null>;
  checkout(directory: string, branch: string): Promise<void>;
  pull(directory: string): Promise<void>;
}

export type SyncOutcome =
  | { action: 'cloned' }
  | { action: 'pulled'; switchedFrom: string | null };

export interface SyncRepositoryInput {
  url: string;
  branch: string;
  workingDir: string;
}

export function createGitAdapter(
  runner: CommandRunner = processCommandRunner,
  gitBinary = 'git'
): GitAdapter {
  return {
    async clone(url, branch, directory) {
      await runChecked(runner, gitBinary, ['clone', '-b', branch, url, directory], {
        cwd: path.dirname(directory)
      });
    },

    async currentBranch(directory) {
      let stdout: string;
      try {
        stdout = await runner.capture(gitBinary, ['symbolic-ref', '--short', '-q', 'HEAD'], {
          cwd: directory
        });
      } catch (error) {
        // -q: a detached HEAD exits 1 without a message
        if (error instanceof CommandError && error.exitCode === 1) {
          return null;
        }
        throw error;
      }
      return stdout.trim() || null;
    },

    async checkout(directory, branch) {
      await runChecked(runner, gitBinary, ['checkout', branch], { cwd: directory });
    },

    async pull(directory) {
      await runChecked(runner, gitBinary, ['pull'], { cwd: directory });
    }
  };
}

export async function syncRepository(
  git: GitAdapter,
  input: SyncRepositoryInput
): Promise<SyncOutcome> {
  if (!(await fs.pathExists(input.workingDir))) {
    await fs.ensureDir(path.dirname(input.workingDir));
    await git.clone(input.url, input.branch, input.workingDir);
    return { action: 'cloned' };
  }

  const current = await git.currentBranch(input.workingDir);
  let switchedFrom: string | null = null;
  if (current !== input.branch) {
    await git.checkout(input.workingDir, input.branch);
    switchedFrom = current ?? 'HEAD';
  }

  await git.pull(input.workingDir);
  return { action: 'pulled', switchedFrom };
}
