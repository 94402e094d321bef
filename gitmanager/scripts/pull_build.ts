import { parsePullBuildArgs } from './lib/cli.js';
import { createGitAdapter } from './lib/git.js';
import { resolveLayout } from './lib/paths.js';
import { CommandError, processCommandRunner } from './lib/process.js';
import { checkPullBuild, describePublish, runPullBuild } from './lib/pull_build.js';
import { createCommandResolver } from './lib/static_dir.js';

async function main(): Promise<void> {
  const args = parsePullBuildArgs(process.argv.slice(2));
  const config = {
    layout: resolveLayout({ exercisesDir: args.exercisesDir, staticDir: args.staticDir }),
    shell: args.shell
  };
  const deps = {
    git: createGitAdapter(processCommandRunner),
    runner: processCommandRunner,
    resolver: createCommandResolver({
      interpreter: args.request.interpreter,
      script: args.resolverScript,
      root: process.cwd()
    })
  };

  if (args.check) {
    const publish = await checkPullBuild(args.request, config, deps);
    if (publish && publish.action !== 'unchanged') {
      console.error(describePublish(publish));
      process.exit(1);
    }
    console.log('pull_build.ts check passed.');
    return;
  }

  await runPullBuild(args.request, config, deps);
}

main().catch((error) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(error instanceof CommandError ? error.exitCode : 1);
});
