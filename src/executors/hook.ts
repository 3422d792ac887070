import type { HookRunner } from '../hooks/runner';
import type { Job, TaskOf } from '../types';
import { completeTask, errorMessage, failTask } from './outcome';
import type { ExecutionContext, TaskExecutor } from './types';

export class HookExecutor implements TaskExecutor<'hook'> {
  constructor(private readonly hooks: HookRunner) {}

  async execute(job: Job, task: TaskOf<'hook'>, taskIndex: number, context: ExecutionContext): Promise<boolean> {
    const params = task.parameters;
    if (params.hooks.length === 0) {
      await context.output('No hooks configured');
      return completeTask(task);
    }

    try {
      const summary = await this.hooks.runHooks(params.hooks, {
        jobId: job.id,
        taskIndex,
        hookType: params.hook_type,
        repositoryId: job.repositoryId,
        jobFailed: job.tasks.slice(0, taskIndex).some((t) => t.status === 'failed'),
        critical: params.critical,
        signal: context.signal,
        onLine: (line) => context.output(line),
      });

      if (summary.allSuccessful) {
        return completeTask(task);
      }

      const failures = summary.results
        .filter((r) => !r.success)
        .map((r) => `${r.name}: ${r.error}`)
        .join('; ');

      if (summary.criticalFailure) {
        params.critical_failure = true;
        params.failed_critical_hook_name = summary.failedCriticalHookName;
        return failTask(task, `Critical hook execution failed: ${failures}`);
      }
      return failTask(task, `Hook execution failed: ${failures}`);
    } catch (err) {
      return failTask(task, `Hook task failed: ${errorMessage(err)}`, -1);
    }
  }
}
