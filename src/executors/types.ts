import type { Job, ProgressMarker, TaskKind, TaskOf } from '../types';

/** Per-task handles the orchestrator gives an executor. */
export interface ExecutionContext {
  readonly signal: AbortSignal;
  output(line: string): Promise<void>;
  progress(marker: ProgressMarker): Promise<void>;
}

/**
 * Runs one task to a terminal state. Implementations set the task's status,
 * return code, error and completion time, and resolve with success.
 */
export interface TaskExecutor<K extends TaskKind> {
  execute(job: Job, task: TaskOf<K>, taskIndex: number, context: ExecutionContext): Promise<boolean>;
}

export type TaskExecutors = { readonly [K in TaskKind]: TaskExecutor<K> };
