import type { AppConfig } from './config';
import type { CloudSyncProviderRegistry } from './cloud-sync/provider';
import { rcloneProviderFactory } from './cloud-sync/rclone';
import { EventBroadcaster } from './events/broadcaster';
import { createTaskExecutors } from './executors';
import { JobManager } from './jobs/manager';
import { JobOrchestrator } from './jobs/orchestrator';
import type { NotificationProviderRegistry } from './notifications/provider';
import { discordProviderFactory, webhookProviderFactory } from './notifications/webhook';
import { JobOutputStore } from './output/buffer';
import { JobStore, PersistenceGateway } from './persistence/gateway';
import { ProcessRunner } from './process/runner';
import { DefaultProcessSpawner, ProcessSpawner } from './process/spawner';
import { AdmissionController } from './queue/admission';
import type { JobEvent } from './types';

export interface ContainerOverrides {
  store: JobStore;
  spawner?: ProcessSpawner;
  fetch?: typeof fetch;
}

/** Builds the object graph once per process; nothing here is a module singleton. */
export function createContainer(config: AppConfig, overrides: ContainerOverrides) {
  const runner = new ProcessRunner(overrides.spawner ?? new DefaultProcessSpawner(), config.terminateTimeoutMs);
  const persistence = new PersistenceGateway(overrides.store);
  const events = new EventBroadcaster<JobEvent>({
    maxQueueSize: config.sseMaxQueueSize,
    keepaliveMs: config.sseKeepaliveMs,
    historySize: config.eventHistorySize,
  });
  const outputs = new JobOutputStore(config.maxOutputLinesPerJob);
  const admission = new AdmissionController({
    maxConcurrentBackups: config.maxConcurrentBackups,
    maxConcurrentOperations: config.maxConcurrentOperations,
    pollIntervalMs: config.queuePollIntervalMs,
  });

  const fetchImpl = overrides.fetch ?? fetch;
  const cloudSyncProviders: CloudSyncProviderRegistry = new Map([
    ['rclone', rcloneProviderFactory(runner, config.rcloneBinary)],
  ]);
  const notificationProviders: NotificationProviderRegistry = new Map([
    ['webhook', webhookProviderFactory(fetchImpl)],
    ['discord', discordProviderFactory(fetchImpl)],
  ]);

  const executors = createTaskExecutors({
    runner,
    persistence,
    cloudSyncProviders,
    notificationProviders,
    borgBinary: config.borgBinary,
    breakLockTimeoutMs: config.breakLockTimeoutMs,
    dryRun: config.dryRun,
  });
  const orchestrator = new JobOrchestrator({ executors, persistence, events, outputs, admission });
  const manager = new JobManager({ orchestrator, persistence, events, outputs, admission });

  return { runner, persistence, events, outputs, admission, orchestrator, manager };
}

export type Container = ReturnType<typeof createContainer>;
