import fs from 'fs-extra';

import { runBuildScript, type BuildOutcome } from './build.js';
import type { PullBuildRequest } from './cli.js';
import { syncRepository, type GitAdapter, type SyncOutcome } from './git.js';
import { toPosixRelative } from './io.js';
import { withKeyLock } from './lock.js';
import {
  lockFilePath,
  staticLinkPath,
  staticLinkTarget,
  workingDirArgument,
  workingDirPath,
  type SyncLayout
} from './paths.js';
import type { CommandRunner } from './process.js';
import { publishStaticLink, type PublishResult } from './publish.js';
import type { StaticDirResolver } from './static_dir.js';

export interface PullBuildDeps {
  git: GitAdapter;
  runner: CommandRunner;
  resolver: StaticDirResolver;
}

export interface PullBuildConfig {
  layout: SyncLayout;
  shell: string;
}

export interface PullBuildResult {
  sync: SyncOutcome;
  build: BuildOutcome;
  staticDir: string | null;
  publish: PublishResult | null;
}

export function describeRequest(request: PullBuildRequest): string {
  return `Processing key=${request.key} id=${request.id} url=${request.url} branch=${request.branch} python=${request.interpreter}`;
}

export function describePublish(result: PublishResult): string {
  const link = toPosixRelative(result.linkPath);
  if (result.action === 'unchanged') {
    return `No changes ${link} -> ${result.target}`;
  }
  const verb = result.action === 'created' ? 'create' : 'replace';
  if (!result.wrote) {
    return `Would ${verb} ${link} -> ${result.target}`;
  }
  return `${result.action === 'created' ? 'Created' : 'Replaced'} ${link} -> ${result.target}`;
}

async function resolveAndPublish(
  request: PullBuildRequest,
  config: PullBuildConfig,
  deps: PullBuildDeps,
  check: boolean
): Promise<{ staticDir: string | null; publish: PublishResult | null }> {
  const staticDir = await deps.resolver.resolve(workingDirArgument(config.layout, request.key));
  if (staticDir === null) {
    return { staticDir, publish: null };
  }

  if (!check) {
    console.log(`Link static dir ${staticDir}`);
  }

  const publish = await publishStaticLink(
    {
      linkPath: staticLinkPath(config.layout, request.key),
      target: staticLinkTarget(config.layout, request.key, staticDir)
    },
    { check }
  );
  return { staticDir, publish };
}

export async function runPullBuild(
  request: PullBuildRequest,
  config: PullBuildConfig,
  deps: PullBuildDeps
): Promise<PullBuildResult> {
  console.log(describeRequest(request));

  const workingDir = workingDirPath(config.layout, request.key);

  return withKeyLock(lockFilePath(config.layout, request.key), async () => {
    const sync = await syncRepository(deps.git, {
      url: request.url,
      branch: request.branch,
      workingDir
    });

    const build = await runBuildScript(deps.runner, workingDir, config.shell);
    if (build.ran && build.exitCode !== 0) {
      console.error(
        `Build script in ${toPosixRelative(workingDir)} exited with status ${build.exitCode}; continuing`
      );
    }

    const { staticDir, publish } = await resolveAndPublish(request, config, deps, false);
    if (publish) {
      console.log(describePublish(publish));
    }

    return { sync, build, staticDir, publish };
  });
}

/** Plans the publication without syncing, building or writing anything. */
export async function checkPullBuild(
  request: PullBuildRequest,
  config: PullBuildConfig,
  deps: PullBuildDeps
): Promise<PublishResult | null> {
  const workingDir = workingDirPath(config.layout, request.key);
  if (!(await fs.pathExists(workingDir))) {
    throw new Error(`${toPosixRelative(workingDir)} does not exist; run without --check first`);
  }

  const { publish } = await resolveAndPublish(request, config, deps, true);
  return publish;
}
