import type { NotificationConfig, NotificationPriority, NotificationSeverity } from '../types';

export interface NotificationProvider {
  send(title: string, body: string, severity: NotificationSeverity, priority: NotificationPriority): Promise<boolean>;
}

/** Builds a provider from a stored configuration; throws on invalid settings. */
export type NotificationProviderFactory = (config: NotificationConfig) => NotificationProvider;

export type NotificationProviderRegistry = ReadonlyMap<string, NotificationProviderFactory>;
