import fs from 'fs-extra';
import path from 'node:path';

import { entryExists, toPosixRelative, type RunOptions } from './io.js';

export type PublishAction = 'created' | 'replaced' | 'unchanged';

export interface PublishResult {
  action: PublishAction;
  linkPath: string;
  target: string;
  wrote: boolean;
}

export interface StaticLink {
  linkPath: string;
  target: string;
}

async function planPublish(link: StaticLink): Promise<PublishAction> {
  if (!(await entryExists(link.linkPath))) {
    return 'created';
  }

  const stat = await fs.lstat(link.linkPath);
  if (!stat.isSymbolicLink()) {
    throw new Error(
      `Refusing to replace ${toPosixRelative(link.linkPath)}: it exists and is not a symlink`
    );
  }

  const current = await fs.readlink(link.linkPath);
  return current === link.target ? 'unchanged' : 'replaced';
}

export async function publishStaticLink(
  link: StaticLink,
  options: RunOptions = { check: false }
): Promise<PublishResult> {
  const action = await planPublish(link);
  const result = { action, linkPath: link.linkPath, target: link.target };

  if (action === 'unchanged' || options.check) {
    return { ...result, wrote: false };
  }

  await fs.ensureDir(path.dirname(link.linkPath));
  if (action === 'replaced') {
    await fs.remove(link.linkPath);
  }
  await fs.symlink(link.target, link.linkPath);
  return { ...result, wrote: true };
}
