import { z } from 'zod';
import type { LineCallback, ProcessRunner } from '../process/runner';
import type { CloudSyncConfig } from '../types';
import type { CloudSyncProvider, CloudSyncProviderFactory, CloudSyncResult } from './provider';

const rcloneSettings = z.object({
  remote: z.string().min(1),
  flags: z.array(z.string()).default([]),
  transfers: z.number().int().positive().optional(),
});

export type RcloneSettings = z.infer<typeof rcloneSettings>;

export function syncTarget(remote: string, pathPrefix: string): string {
  const prefix = pathPrefix.replace(/^\/+|\/+$/g, '');
  if (!prefix) return remote;
  return remote.endsWith(':') ? `${remote}${prefix}` : `${remote.replace(/\/+$/, '')}/${prefix}`;
}

/** Mirrors the repository directory to an rclone remote. */
export class RcloneSyncProvider implements CloudSyncProvider {
  constructor(
    private readonly runner: ProcessRunner,
    private readonly binary: string,
    private readonly settings: RcloneSettings
  ) {}

  async sync(
    repositoryPath: string,
    pathPrefix: string,
    onOutputLine: LineCallback,
    signal?: AbortSignal
  ): Promise<CloudSyncResult> {
    const command = [
      this.binary,
      'sync',
      repositoryPath,
      syncTarget(this.settings.remote, pathPrefix),
      '--stats',
      '1s',
      '--stats-one-line',
      '--verbose',
    ];
    if (this.settings.transfers !== undefined) {
      command.push('--transfers', String(this.settings.transfers));
    }
    command.push(...this.settings.flags);

    const result = await this.runner.run(command, { signal, onLine: onOutputLine });
    if (result.returnCode === 0) {
      return { success: true };
    }
    return { success: false, error: result.error ?? `rclone exited with code ${result.returnCode}` };
  }
}

export function rcloneProviderFactory(runner: ProcessRunner, binary: string): CloudSyncProviderFactory {
  return (config: CloudSyncConfig) => {
    const parsed = rcloneSettings.safeParse(config.settings);
    if (!parsed.success) {
      const detail = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join(', ');
      throw new Error(`Invalid rclone settings for '${config.name}': ${detail}`);
    }
    return new RcloneSyncProvider(runner, binary, parsed.data);
  };
}
