import type { JobStatus, Task } from '../types';

/** A failed backup, or a failed hook that flagged itself critical. */
export function isCriticalFailure(task: Task): boolean {
  if (task.status !== 'failed') return false;
  if (task.kind === 'backup') return true;
  return task.kind === 'hook' && task.parameters.critical_failure === true;
}

export function countTasks(tasks: readonly Task[]) {
  let completed = 0;
  let failed = 0;
  let skipped = 0;
  for (const task of tasks) {
    if (task.status === 'completed') completed++;
    else if (task.status === 'failed') failed++;
    else if (task.status === 'skipped') skipped++;
  }
  return { completed, failed, skipped, total: tasks.length };
}

/**
 * Final status of a job whose run has ended. Any task not in a terminal state
 * means the run ended abnormally.
 */
export function computeFinalStatus(tasks: readonly Task[]): Extract<JobStatus, 'completed' | 'failed'> {
  const { completed, failed, skipped, total } = countTasks(tasks);
  if (failed + completed + skipped !== total) return 'failed';
  return tasks.some(isCriticalFailure) ? 'failed' : 'completed';
}

export function criticalHookName(task: Task): string {
  if (task.kind === 'hook' && task.parameters.failed_critical_hook_name) {
    return task.parameters.failed_critical_hook_name;
  }
  return task.name;
}
