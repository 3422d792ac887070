import type { EventBroadcaster } from '../events/broadcaster';
import { dispatchTask, ExecutionContext, TaskExecutors } from '../executors';
import { completeTask, errorMessage, failTask } from '../executors/outcome';
import type { JobOutputStore } from '../output/buffer';
import type { PersistenceGateway } from '../persistence/gateway';
import type { AdmissionController } from '../queue/admission';
import type { Job, JobEvent, JobStatus, Task, TaskKind } from '../types';
import { computeFinalStatus, countTasks, criticalHookName, isCriticalFailure } from './status';

export interface OrchestratorDeps {
  executors: TaskExecutors;
  persistence: PersistenceGateway;
  events: EventBroadcaster<JobEvent>;
  outputs: JobOutputStore;
  admission: AdmissionController;
}

/** Task kinds that hold an operation slot while they run. */
const OPERATION_SLOT_KINDS: ReadonlySet<TaskKind> = new Set<TaskKind>(['prune', 'compact', 'check', 'cloud_sync']);

export const CANCELLED_TASK_ERROR = 'Cancelled by user';
export const CANCELLED_SKIP_LINE = 'Task skipped due to job cancellation';

function skipLineFor(task: Task, threw: boolean): string {
  if (threw) return `Task skipped due to critical task exception: ${task.name}`;
  if (task.kind === 'hook') return `Task skipped due to critical hook failure: ${criticalHookName(task)}`;
  return `Task skipped due to critical task failure: ${task.name}`;
}

/**
 * Drives one job through its tasks in order. The first critical failure
 * skips every task still pending; other failures are recorded and the run
 * continues.
 */
export class JobOrchestrator {
  constructor(private readonly deps: OrchestratorDeps) {}

  /** Resolves with the final status. Never rejects. */
  async run(job: Job, signal: AbortSignal = new AbortController().signal): Promise<JobStatus> {
    try {
      await this.runTasks(job, signal);
    } catch (err) {
      console.error(`[orchestrator] Job ${job.id} stopped unexpectedly: ${errorMessage(err)}`);
      job.error = job.error ?? errorMessage(err);
    }
    return this.finish(job, signal.aborted);
  }

  private async runTasks(job: Job, signal: AbortSignal): Promise<void> {
    if (signal.aborted) {
      this.skipRemaining(job, 0, CANCELLED_SKIP_LINE);
      return;
    }

    job.status = 'running';
    this.publishJob(job);
    this.deps.persistence.queueStatusUpdate(job);
    console.log(`[orchestrator] Job ${job.id} running ${job.totalTasks} tasks`);

    for (let index = 0; index < job.tasks.length; index++) {
      const task = job.tasks[index];
      if (task.status !== 'pending') continue;
      if (signal.aborted) {
        this.skipRemaining(job, index, CANCELLED_SKIP_LINE);
        return;
      }

      job.currentTaskIndex = index;
      this.startTask(job, index);

      let threw = false;
      try {
        const ok = await this.execute(job, task, index, signal);
        this.settleOutcome(task, ok);
      } catch (err) {
        threw = true;
        console.error(`[orchestrator] Task ${index} (${task.kind}) of job ${job.id} threw: ${errorMessage(err)}`);
        failTask(task, errorMessage(err), -1);
      }

      if (signal.aborted) {
        this.markCancelled(task);
        this.settleTask(job, index);
        this.skipRemaining(job, index + 1, CANCELLED_SKIP_LINE);
        return;
      }

      this.settleTask(job, index);
      if (isCriticalFailure(task)) {
        console.warn(`[orchestrator] Critical failure in task ${index} (${task.name}) of job ${job.id}`);
        this.skipRemaining(job, index + 1, skipLineFor(task, threw));
        return;
      }
    }
  }

  private startTask(job: Job, index: number): void {
    const task = job.tasks[index];
    task.status = 'running';
    task.startedAt = new Date();
    this.publishTask(job, index);
    this.deps.persistence.queueTaskSnapshot(job);
  }

  /** Settles a task its executor left running, from the executor's result. */
  private settleOutcome(task: Task, ok: boolean): void {
    if (task.status === 'running') {
      if (ok) completeTask(task);
      else failTask(task, `${task.name} failed`);
    }
    if (!task.completedAt) task.completedAt = new Date();
  }

  private markCancelled(task: Task): void {
    if (task.status === 'completed') return;
    task.status = 'failed';
    task.error = CANCELLED_TASK_ERROR;
    if (!task.completedAt) task.completedAt = new Date();
  }

  private async execute(job: Job, task: Task, index: number, signal: AbortSignal): Promise<boolean> {
    const context = this.contextFor(job, task, index, signal);
    if (!OPERATION_SLOT_KINDS.has(task.kind)) {
      return dispatchTask(this.deps.executors, job, task, index, context);
    }
    const permit = await this.deps.admission.acquire('operation', signal);
    try {
      return await dispatchTask(this.deps.executors, job, task, index, context);
    } finally {
      permit.release();
    }
  }

  private contextFor(job: Job, task: Task, index: number, signal: AbortSignal): ExecutionContext {
    return {
      signal,
      output: async (line) => {
        task.outputLines.push(line);
        this.emitLine(job, index, line);
      },
      progress: async (marker) => {
        this.deps.outputs.setProgress(job.id, marker);
      },
    };
  }

  /**
   * Marks every pending task from `from` onward skipped in one synchronous
   * pass, then announces them.
   */
  private skipRemaining(job: Job, from: number, reason: string): void {
    const now = new Date();
    const skipped: number[] = [];
    for (let i = from; i < job.tasks.length; i++) {
      const task = job.tasks[i];
      if (task.status !== 'pending') continue;
      task.status = 'skipped';
      task.completedAt = now;
      task.outputLines.push(reason);
      skipped.push(i);
    }
    if (skipped.length === 0) return;

    for (const i of skipped) {
      this.emitLine(job, i, reason);
      this.publishTask(job, i);
    }
    this.deps.persistence.queueTaskSnapshot(job);
  }

  private settleTask(job: Job, index: number): void {
    this.refreshCounts(job);
    this.publishTask(job, index);
    this.deps.persistence.queueTaskSnapshot(job);
  }

  private async finish(job: Job, cancelled: boolean): Promise<JobStatus> {
    job.status = cancelled ? 'cancelled' : computeFinalStatus(job.tasks);
    job.finishedAt = new Date();
    if (job.status === 'cancelled') {
      job.error = job.error ?? CANCELLED_TASK_ERROR;
    } else if (job.status === 'failed' && !job.error) {
      const critical = job.tasks.find(isCriticalFailure);
      job.error = critical?.error ?? 'Job did not complete all tasks';
    }
    this.refreshCounts(job);

    this.deps.persistence.queueTaskSnapshot(job);
    this.deps.persistence.queueStatusUpdate(job);
    this.publishJob(job);
    console.log(`[orchestrator] Job ${job.id} finished: ${job.status}`);

    await this.deps.persistence.flush(job.id);
    return job.status;
  }

  private refreshCounts(job: Job): void {
    job.totalTasks = job.tasks.length;
    job.completedTasks = countTasks(job.tasks).completed;
  }

  private emitLine(job: Job, taskIndex: number, line: string): void {
    const at = new Date().toISOString();
    this.deps.outputs.append(job.id, { text: line, taskIndex, timestamp: at });
    this.deps.events.publish({ type: 'output_line', jobId: job.id, taskIndex, line, at });
  }

  private publishTask(job: Job, taskIndex: number): void {
    const task = job.tasks[taskIndex];
    this.deps.events.publish({
      type: 'task_status_changed',
      jobId: job.id,
      taskIndex,
      status: task.status,
      returnCode: task.returnCode,
      error: task.error,
      at: new Date().toISOString(),
    });
  }

  private publishJob(job: Job): void {
    this.deps.events.publish({
      type: 'job_status_changed',
      jobId: job.id,
      status: job.status,
      error: job.error,
      at: new Date().toISOString(),
    });
  }
}
