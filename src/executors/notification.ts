import { buildNotificationSummary } from '../jobs/summary';
import type { NotificationProviderRegistry } from '../notifications/provider';
import type { PersistenceGateway } from '../persistence/gateway';
import type { Job, TaskOf } from '../types';
import { completeTask, errorMessage, failTask } from './outcome';
import type { ExecutionContext, TaskExecutor } from './types';

export interface NotificationExecutorDeps {
  persistence: PersistenceGateway;
  providers: NotificationProviderRegistry;
}

export class NotificationExecutor implements TaskExecutor<'notification'> {
  constructor(private readonly deps: NotificationExecutorDeps) {}

  async execute(
    job: Job,
    task: TaskOf<'notification'>,
    _taskIndex: number,
    context: ExecutionContext
  ): Promise<boolean> {
    const params = task.parameters;
    const configId = params.notification_config_id ?? job.notificationConfigId ?? undefined;
    if (configId === undefined) {
      return failTask(task, 'No notification configuration');
    }

    const config = await this.deps.persistence.getNotificationConfig(configId);
    if (!config) {
      await context.output(`Notification skipped - configuration ${configId} not found`);
      return completeTask(task);
    }
    if (!config.enabled) {
      await context.output(`Notification skipped - configuration '${config.name}' is disabled`);
      return completeTask(task);
    }

    const factory = this.deps.providers.get(config.provider);
    if (!factory) {
      return failTask(task, `Unknown notification provider: ${config.provider}`);
    }

    const summary = buildNotificationSummary(job);
    const title = params.title ?? summary.title;
    const body = params.message ?? summary.body;
    const severity = params.severity ?? summary.severity;
    const priority = params.priority ?? summary.priority;

    try {
      const provider = factory(config);
      await context.output(`Sending ${config.provider} notification to ${config.name}`);
      await context.output(`Title: ${title}`);
      await context.output(`Severity: ${severity}`);
      await context.output(`Priority: ${priority}`);

      const sent = await provider.send(title, body, severity, priority);
      if (!sent) {
        await context.output('Failed to send notification');
        return failTask(task, `Failed to send notification via ${config.name}`);
      }
      await context.output('Notification sent successfully');
      return completeTask(task);
    } catch (err) {
      return failTask(task, `Notification task failed: ${errorMessage(err)}`);
    }
  }
}
