import type { CloudSyncProviderRegistry } from '../cloud-sync/provider';
import type { PersistenceGateway } from '../persistence/gateway';
import type { Job, TaskOf } from '../types';
import { completeTask, errorMessage, failTask, resolveRepository } from './outcome';
import type { ExecutionContext, TaskExecutor } from './types';

export interface CloudSyncExecutorDeps {
  persistence: PersistenceGateway;
  providers: CloudSyncProviderRegistry;
}

export class CloudSyncExecutor implements TaskExecutor<'cloud_sync'> {
  constructor(private readonly deps: CloudSyncExecutorDeps) {}

  async execute(job: Job, task: TaskOf<'cloud_sync'>, _taskIndex: number, context: ExecutionContext): Promise<boolean> {
    const repository = await resolveRepository(job, task, this.deps.persistence);
    if (!repository) return false;
    if (!repository.path) return failTask(task, 'Repository path is required for cloud sync');
    if (!repository.passphrase) return failTask(task, 'Repository passphrase is required for cloud sync');

    const configId = task.parameters.cloud_sync_config_id ?? job.cloudSyncConfigId ?? undefined;
    if (configId === undefined) {
      await context.output('Cloud sync skipped - no configuration');
      return completeTask(task);
    }

    const config = await this.deps.persistence.getCloudSyncConfig(configId);
    if (!config) {
      await context.output(`Cloud sync skipped - configuration ${configId} not found`);
      return completeTask(task);
    }
    if (!config.enabled) {
      await context.output(`Cloud sync skipped - configuration '${config.name}' is disabled`);
      return completeTask(task);
    }

    const factory = this.deps.providers.get(config.provider);
    if (!factory) {
      return failTask(task, `Unknown cloud provider: ${config.provider}`);
    }

    try {
      const provider = factory(config);
      await context.output(`Starting cloud sync to ${config.name} (${config.provider})...`);
      const result = await provider.sync(repository.path, config.pathPrefix, (line) => context.output(line), context.signal);
      if (!result.success) {
        return failTask(task, result.error ?? 'Cloud sync failed');
      }
      await context.output('Cloud sync completed successfully');
      return completeTask(task);
    } catch (err) {
      return failTask(task, `Cloud sync task failed: ${errorMessage(err)}`, -1);
    }
  }
}
