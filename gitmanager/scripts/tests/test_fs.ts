import fs from 'fs-extra';
import os from 'node:os';
import path from 'node:path';

/** Runs `run` with a fresh course root as cwd, removed afterwards. */
export async function withTempCwd(
  prefix: string,
  run: (root: string) => Promise<void>
): Promise<void> {
  const root = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), prefix)));
  const originalCwd = process.cwd();

  process.chdir(root);
  try {
    await run(root);
  } finally {
    process.chdir(originalCwd);
    await fs.remove(root);
  }
}

export async function writeFixtureFile(
  root: string,
  relativePath: string,
  content: string
): Promise<string> {
  const absolutePath = path.join(root, relativePath);
  await fs.outputFile(absolutePath, content, 'utf8');
  return absolutePath;
}

/** Creates `relativePath` as a symlink to `target`, written verbatim. */
export async function writeFixtureLink(
  root: string,
  relativePath: string,
  target: string
): Promise<string> {
  const linkPath = path.join(root, relativePath);
  await fs.ensureDir(path.dirname(linkPath));
  await fs.symlink(target, linkPath);
  return linkPath;
}
