import type { Job, NotificationPriority, NotificationSeverity } from '../types';
import { countTasks, criticalHookName, isCriticalFailure } from './status';

export interface NotificationSummary {
  title: string;
  body: string;
  severity: NotificationSeverity;
  priority: NotificationPriority;
}

export function repositoryNameOf(job: Job): string {
  for (const task of job.tasks) {
    if (task.parameters.repository_name) return task.parameters.repository_name;
  }
  return 'Unknown';
}

/**
 * Picks exactly one of four outcomes, in precedence order: critical hook
 * failure, backup failure, other failures, success.
 */
export function buildNotificationSummary(job: Job): NotificationSummary {
  const repository = repositoryNameOf(job);
  const { completed, skipped, total } = countTasks(job.tasks);
  const counts = `Tasks Completed: ${completed}, Skipped: ${skipped}, Total: ${total}`;
  const footer = `Job ID: ${job.id}`;

  const criticalHook = job.tasks.find((task) => task.kind === 'hook' && isCriticalFailure(task));
  if (criticalHook) {
    return {
      title: 'Backup Job Failed - Critical Hook Error',
      body: [
        `Backup job for '${repository}' failed due to critical hook failure.`,
        '',
        `Failed Hook: ${criticalHookName(criticalHook)}`,
        counts,
        footer,
      ].join('\n'),
      severity: 'error',
      priority: 'high',
    };
  }

  if (job.tasks.some((task) => task.kind === 'backup' && task.status === 'failed')) {
    return {
      title: 'Backup Job Failed - Backup Error',
      body: [`Backup job for '${repository}' failed during backup process.`, '', counts, footer].join('\n'),
      severity: 'error',
      priority: 'high',
    };
  }

  const failed = job.tasks.filter((task) => task.status === 'failed');
  if (failed.length > 0) {
    return {
      title: 'Backup Job Completed with Warnings',
      body: [
        `Backup job for '${repository}' completed with some task failures.`,
        '',
        `Failed Tasks: ${failed.map((task) => task.kind).join(', ')}`,
        counts,
        footer,
      ].join('\n'),
      severity: 'warning',
      priority: 'normal',
    };
  }

  const successCounts =
    skipped > 0 ? counts : `Tasks Completed: ${completed}, Total: ${total}`;
  return {
    title: 'Backup Job Completed Successfully',
    body: [`Backup job for '${repository}' completed successfully.`, '', successCounts, footer].join('\n'),
    severity: 'success',
    priority: 'normal',
  };
}
