import fs from 'fs-extra';
import path from 'node:path';

import type { CommandRunner } from './process.js';

export const BUILD_SCRIPT_NAME = 'build.sh';

export type BuildOutcome = { ran: false } | { ran: true; exitCode: number };

export async function runBuildScript(
  runner: CommandRunner,
  workingDir: string,
  shell: string
): Promise<BuildOutcome> {
  if (!(await fs.pathExists(path.join(workingDir, BUILD_SCRIPT_NAME)))) {
    return { ran: false };
  }

  const exitCode = await runner.run(shell, [BUILD_SCRIPT_NAME], { cwd: workingDir });
  return { ran: true, exitCode };
}
