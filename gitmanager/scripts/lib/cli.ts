import { getRunOptions } from './io.js';

export const COURSE_KEY_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

export const DEFAULT_RESOLVER_SCRIPT = 'gitmanager/cron.py';
export const DEFAULT_BUILD_SHELL = '/bin/bash';

const KNOWN_OPTIONS = ['exercises-dir', 'static-dir', 'resolver', 'shell'] as const;

type KnownOption = (typeof KNOWN_OPTIONS)[number];

export interface PullBuildRequest {
  interpreter: string;
  key: string;
  id: string;
  url: string;
  branch: string;
}

export interface PullBuildCliArgs {
  request: PullBuildRequest;
  check: boolean;
  exercisesDir?: string;
  staticDir?: string;
  resolverScript: string;
  shell: string;
}

export function parseCliOptionMap(args: string[]): Map<string, string> {
  const options = new Map<string, string>();

  for (let index = 0; index < args.length; index += 1) {
    const keyToken = args[index];
    if (!keyToken.startsWith('--')) {
      throw new Error(`Unexpected argument '${keyToken}'. Expected --key value pairs`);
    }

    const key = keyToken.slice(2).trim();
    if (!key) {
      throw new Error(`Invalid option '${keyToken}'`);
    }

    const value = args[index + 1];
    if (value === undefined || value.startsWith('--')) {
      throw new Error(`Missing value for option '--${key}'`);
    }

    options.set(key, value);
    index += 1;
  }

  return options;
}

function isKnownOption(name: string): name is KnownOption {
  return KNOWN_OPTIONS.some((option) => option === name);
}

export function assertCourseKey(key: string): string {
  if (!COURSE_KEY_PATTERN.test(key)) {
    throw new Error(
      `Invalid course key '${key}'. Expected letters, digits, '.', '_' or '-', e.g. intro-py`
    );
  }
  return key;
}

function requireArgument(value: string | undefined, name: string): string {
  const trimmed = value?.trim() ?? '';
  if (!trimmed) {
    throw new Error(`${name} is required`);
  }
  return trimmed;
}

function requireGitArgument(value: string | undefined, name: string): string {
  const trimmed = requireArgument(value, name);
  if (trimmed.startsWith('-')) {
    throw new Error(`Invalid ${name} '${trimmed}'. It must not start with '-'`);
  }
  return trimmed;
}

export function parsePullBuildArgs(argv: string[]): PullBuildCliArgs {
  const { check } = getRunOptions(argv);
  const rest = argv.filter((token) => token !== '--check');

  const positionalCount = rest.findIndex((token) => token.startsWith('--'));
  const positionals = positionalCount === -1 ? rest : rest.slice(0, positionalCount);
  const optionTokens = positionalCount === -1 ? [] : rest.slice(positionalCount);

  if (positionals.length !== 5) {
    throw new Error(
      `Expected 5 arguments <interpreter> <key> <id> <url> <branch>, got ${positionals.length}`
    );
  }

  const [interpreter, key, id, url, branch] = positionals;
  const options = parseCliOptionMap(optionTokens);

  for (const name of options.keys()) {
    if (!isKnownOption(name)) {
      throw new Error(`Unknown option '--${name}'. Expected ${KNOWN_OPTIONS.map((o) => `--${o}`).join('|')}`);
    }
  }

  return {
    request: {
      interpreter: requireArgument(interpreter, 'interpreter'),
      key: assertCourseKey(key),
      id,
      url: requireGitArgument(url, 'url'),
      branch: requireGitArgument(branch, 'branch')
    },
    check,
    exercisesDir: options.get('exercises-dir'),
    staticDir: options.get('static-dir'),
    resolverScript: options.get('resolver') ?? DEFAULT_RESOLVER_SCRIPT,
    shell: options.get('shell') ?? DEFAULT_BUILD_SHELL
  };
}
