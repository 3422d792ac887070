import type { EventBroadcaster } from '../events/broadcaster';
import type { JobOutputStore } from '../output/buffer';
import { isJobFinished, isTaskFinished, Job, JobEvent, JobStatus, KeepaliveEvent, TaskStatus } from '../types';

export type StreamMessage =
  | { type: 'line'; taskIndex: number; text: string; timestamp?: string }
  | { type: 'status'; taskIndex: number | null; status: JobStatus | TaskStatus; error: string | null }
  | { type: 'keepalive'; timestamp: string }
  | { type: 'complete'; status: JobStatus | TaskStatus }
  | { type: 'error'; message: string };

export interface StreamSource {
  getJob(jobId: string): Job | undefined;
  events: EventBroadcaster<JobEvent>;
  outputs: JobOutputStore;
}

function replay(job: Job, outputs: JobOutputStore, taskIndex: number | undefined): StreamMessage[] {
  if (taskIndex === undefined) {
    return outputs
      .lines(job.id)
      .map((line): StreamMessage => ({ type: 'line', taskIndex: line.taskIndex, text: line.text, timestamp: line.timestamp }));
  }
  return job.tasks[taskIndex].outputLines.map((text): StreamMessage => ({ type: 'line', taskIndex, text }));
}

/**
 * Live output of a job, or of one task of a composite job. Replays what has
 * been captured so far, then follows the broadcaster until the job (or task)
 * reaches a terminal state. Aborting `signal` ends the stream quietly.
 */
export async function* streamJobOutput(
  source: StreamSource,
  jobId: string,
  taskIndex?: number,
  signal?: AbortSignal
): AsyncGenerator<StreamMessage, void, undefined> {
  const job = source.getJob(jobId);
  if (!job) {
    yield { type: 'error', message: `Job ${jobId} not found` };
    return;
  }
  if (taskIndex !== undefined) {
    if (job.jobType === 'simple') {
      yield { type: 'error', message: 'Task streaming is only available for composite jobs' };
      return;
    }
    if (!Number.isInteger(taskIndex) || taskIndex < 0 || taskIndex >= job.tasks.length) {
      yield { type: 'error', message: `Task index ${taskIndex} is out of range` };
      return;
    }
  }

  const scopeStatus = (): JobStatus | TaskStatus =>
    taskIndex === undefined ? job.status : job.tasks[taskIndex].status;
  const scopeFinished = (): boolean =>
    taskIndex === undefined ? isJobFinished(job.status) : isTaskFinished(job.tasks[taskIndex].status);

  if (scopeFinished()) {
    yield* replay(job, source.outputs, taskIndex);
    yield { type: 'complete', status: scopeStatus() };
    return;
  }
  if (signal?.aborted) return;

  // Subscribe before taking the snapshot so no line falls between them.
  const subscription = source.events.subscribe(
    (event) =>
      event.jobId === jobId &&
      (taskIndex === undefined || event.type === 'job_status_changed' || event.taskIndex === taskIndex)
  );
  const snapshot = replay(job, source.outputs, taskIndex);
  const onAbort = () => source.events.unsubscribe(subscription);
  signal?.addEventListener('abort', onAbort, { once: true });

  try {
    yield* snapshot;
    for await (const event of subscription) {
      switch (event.type) {
        case 'keepalive':
          yield { type: 'keepalive', timestamp: event.at };
          break;
        case 'output_line':
          yield { type: 'line', taskIndex: event.taskIndex, text: event.line, timestamp: event.at };
          break;
        case 'task_status_changed':
          yield { type: 'status', taskIndex: event.taskIndex, status: event.status, error: event.error };
          if (taskIndex !== undefined && isTaskFinished(event.status)) {
            yield { type: 'complete', status: event.status };
            return;
          }
          break;
        case 'job_status_changed':
          yield { type: 'status', taskIndex: null, status: event.status, error: event.error };
          if (isJobFinished(event.status)) {
            yield { type: 'complete', status: scopeStatus() };
            return;
          }
          break;
      }
    }
  } finally {
    signal?.removeEventListener('abort', onAbort);
    source.events.unsubscribe(subscription);
  }
}

/**
 * Every job's events, starting with the broadcaster's retained history.
 * Runs until `signal` aborts or the broadcaster closes.
 */
export async function* streamAllJobEvents(
  events: EventBroadcaster<JobEvent>,
  signal?: AbortSignal
): AsyncGenerator<JobEvent | KeepaliveEvent, void, undefined> {
  if (signal?.aborted) return;
  const subscription = events.subscribe(undefined, { replay: true });
  const onAbort = () => events.unsubscribe(subscription);
  signal?.addEventListener('abort', onAbort, { once: true });
  try {
    yield* subscription;
  } finally {
    signal?.removeEventListener('abort', onAbort);
    events.unsubscribe(subscription);
  }
}
