import path from 'node:path';

import { repoPath, toPosixRelative } from './io.js';

export const DEFAULT_EXERCISES_DIR = 'exercises';
export const DEFAULT_STATIC_DIR = 'static';

export interface SyncLayout {
  exercisesDir: string;
  staticDir: string;
}

export function resolveLayout(
  options: { exercisesDir?: string; staticDir?: string } = {}
): SyncLayout {
  return {
    exercisesDir: repoPath(options.exercisesDir ?? DEFAULT_EXERCISES_DIR),
    staticDir: repoPath(options.staticDir ?? DEFAULT_STATIC_DIR)
  };
}

export function workingDirPath(layout: SyncLayout, key: string): string {
  return path.join(layout.exercisesDir, key);
}

export function staticLinkPath(layout: SyncLayout, key: string): string {
  return path.join(layout.staticDir, key);
}

export function lockFilePath(layout: SyncLayout, key: string): string {
  return path.join(layout.exercisesDir, `.${key}.lock`);
}

/** Relative target of `static/<key>`, e.g. `../exercises/<key>/<subdir>`. */
export function staticLinkTarget(layout: SyncLayout, key: string, subdir: string): string {
  const destination = path.join(workingDirPath(layout, key), ...subdir.split('/'));
  return path.relative(layout.staticDir, destination).split(path.sep).join('/');
}

export function workingDirArgument(layout: SyncLayout, key: string): string {
  return toPosixRelative(workingDirPath(layout, key));
}
