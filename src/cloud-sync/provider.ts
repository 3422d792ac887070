import type { LineCallback } from '../process/runner';
import type { CloudSyncConfig } from '../types';

export interface CloudSyncResult {
  success: boolean;
  error?: string;
}

export interface CloudSyncProvider {
  sync(
    repositoryPath: string,
    pathPrefix: string,
    onOutputLine: LineCallback,
    signal?: AbortSignal
  ): Promise<CloudSyncResult>;
}

/** Builds a provider from a stored configuration; throws on invalid settings. */
export type CloudSyncProviderFactory = (config: CloudSyncConfig) => CloudSyncProvider;

export type CloudSyncProviderRegistry = ReadonlyMap<string, CloudSyncProviderFactory>;
