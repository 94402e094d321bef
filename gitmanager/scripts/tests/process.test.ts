import assert from 'node:assert/strict';
import os from 'node:os';
import test from 'node:test';

import { CommandError, processCommandRunner, runChecked } from '../lib/process.js';
import { RecordingRunner } from './fakes.js';

const cwd = os.tmpdir();

test('processCommandRunner.capture returns stdout', async () => {
  const stdout = await processCommandRunner.capture(
    process.execPath,
    ['-e', 'process.stdout.write("site\\n")'],
    { cwd }
  );
  assert.equal(stdout, 'site\n');
});

test('processCommandRunner.capture raises CommandError with exit code and stderr', async () => {
  await assert.rejects(
    processCommandRunner.capture(
      process.execPath,
      ['-e', 'process.stderr.write("boom"); process.exitCode = 4'],
      { cwd }
    ),
    (error: unknown) => {
      assert.ok(error instanceof CommandError);
      assert.equal(error.exitCode, 4);
      assert.equal(error.stderr, 'boom');
      assert.match(error.message, /exited with status 4: boom$/);
      return true;
    }
  );
});

test('processCommandRunner.run resolves to the exit code', async () => {
  assert.equal(await processCommandRunner.run(process.execPath, ['-e', 'process.exit(3)'], { cwd }), 3);
  assert.equal(await processCommandRunner.run(process.execPath, ['-e', ''], { cwd }), 0);
});

test('processCommandRunner.run rejects when the command cannot start', async () => {
  await assert.rejects(
    processCommandRunner.run('definitely-not-a-command-xyz', [], { cwd }),
    { code: 'ENOENT' }
  );
});

test('runChecked turns a non-zero exit into CommandError', async () => {
  const runner = new RecordingRunner({ exitCodes: [128] });
  await assert.rejects(runChecked(runner, 'git', ['pull'], { cwd }), {
    name: 'CommandError',
    exitCode: 128,
    message: "Command 'git pull' exited with status 128"
  });
});
