import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import type { RepositoryData } from '../types';

const ENV_NAME = /^[A-Z_][A-Z0-9_]*$/;

export interface BorgInvocation {
  command: string[];
  env: Record<string, string>;
}

export function buildBorgEnv(
  repository: RepositoryData,
  overrides: Record<string, string> = {}
): Record<string, string> {
  const env: Record<string, string> = {
    BORG_PASSPHRASE: repository.passphrase,
    BORG_RELOCATED_REPO_ACCESS_IS_OK: 'yes',
    BORG_UNKNOWN_UNENCRYPTED_REPO_ACCESS_IS_OK: 'yes',
  };
  if (repository.cacheDir) {
    env.BORG_CACHE_DIR = repository.cacheDir;
  }
  for (const [key, value] of Object.entries(overrides)) {
    if (!ENV_NAME.test(key)) {
      throw new Error(`Invalid environment variable name: ${key}`);
    }
    env[key] = value;
  }
  return env;
}

/** Passphrases go in the environment only, never on the command line. */
export function buildBorgCommand(
  binary: string,
  subcommand: string,
  args: readonly string[],
  repository: RepositoryData,
  overrides: Record<string, string> = {}
): BorgInvocation {
  return {
    command: [binary, subcommand, ...args],
    env: buildBorgEnv(repository, overrides),
  };
}

/**
 * Runs `fn` with BORG_KEY_FILE pointing at a private temporary copy of the
 * repository keyfile, removed afterwards.
 */
export async function withKeyfile<T>(
  repository: RepositoryData,
  env: Record<string, string>,
  fn: (env: Record<string, string>) => Promise<T>
): Promise<T> {
  if (!repository.keyfileContent) {
    return fn(env);
  }

  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'borg-key-'));
  const keyfile = path.join(dir, 'key');
  try {
    await fs.writeFile(keyfile, repository.keyfileContent, { mode: 0o600 });
    return await fn({ ...env, BORG_KEY_FILE: keyfile });
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
}

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/** Stamped in UTC. */
export function defaultArchiveName(now: Date = new Date()): string {
  const date = `${now.getUTCFullYear()}${pad(now.getUTCMonth() + 1)}${pad(now.getUTCDate())}`;
  const time = `${pad(now.getUTCHours())}${pad(now.getUTCMinutes())}${pad(now.getUTCSeconds())}`;
  return `backup-${date}-${time}`;
}
