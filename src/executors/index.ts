import type { CloudSyncProviderRegistry } from '../cloud-sync/provider';
import { HookRunner } from '../hooks/runner';
import type { NotificationProviderRegistry } from '../notifications/provider';
import type { PersistenceGateway } from '../persistence/gateway';
import type { ProcessRunner } from '../process/runner';
import type { Job, Task } from '../types';
import { BackupExecutor } from './backup';
import { CheckExecutor } from './check';
import { CloudSyncExecutor } from './cloud-sync';
import { CompactExecutor } from './compact';
import { HookExecutor } from './hook';
import { NotificationExecutor } from './notification';
import { PruneExecutor } from './prune';
import type { ExecutionContext, TaskExecutors } from './types';

export type { ExecutionContext, TaskExecutor, TaskExecutors } from './types';

export interface ExecutorDeps {
  runner: ProcessRunner;
  persistence: PersistenceGateway;
  cloudSyncProviders: CloudSyncProviderRegistry;
  notificationProviders: NotificationProviderRegistry;
  borgBinary: string;
  breakLockTimeoutMs: number;
  dryRun: boolean;
}

export function createTaskExecutors(deps: ExecutorDeps): TaskExecutors {
  const { runner, persistence, borgBinary } = deps;
  return {
    hook: new HookExecutor(new HookRunner(runner)),
    backup: new BackupExecutor({
      runner,
      persistence,
      borgBinary,
      breakLockTimeoutMs: deps.breakLockTimeoutMs,
      dryRun: deps.dryRun,
    }),
    prune: new PruneExecutor({ runner, persistence, borgBinary, dryRun: deps.dryRun }),
    compact: new CompactExecutor({ runner, persistence, borgBinary }),
    check: new CheckExecutor({ runner, persistence, borgBinary }),
    cloud_sync: new CloudSyncExecutor({ persistence, providers: deps.cloudSyncProviders }),
    notification: new NotificationExecutor({ persistence, providers: deps.notificationProviders }),
  } satisfies TaskExecutors;
}

export function dispatchTask(
  executors: TaskExecutors,
  job: Job,
  task: Task,
  taskIndex: number,
  context: ExecutionContext
): Promise<boolean> {
  switch (task.kind) {
    case 'hook':
      return executors.hook.execute(job, task, taskIndex, context);
    case 'backup':
      return executors.backup.execute(job, task, taskIndex, context);
    case 'prune':
      return executors.prune.execute(job, task, taskIndex, context);
    case 'compact':
      return executors.compact.execute(job, task, taskIndex, context);
    case 'check':
      return executors.check.execute(job, task, taskIndex, context);
    case 'cloud_sync':
      return executors.cloud_sync.execute(job, task, taskIndex, context);
    case 'notification':
      return executors.notification.execute(job, task, taskIndex, context);
    default: {
      const unreachable: never = task;
      throw new Error(`Unknown task kind: ${JSON.stringify(unreachable)}`);
    }
  }
}
