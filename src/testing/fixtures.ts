import { jobDefinitionSchema, JobDefinitionInput, TaskDefinitionInput } from '../jobs/definitions';
import { createJob } from '../jobs/factory';
import type { ExecutionContext } from '../executors/types';
import type { Job, ProgressMarker, RepositoryData, Task, TaskKind, TaskOf, TaskStatus } from '../types';

export const TEST_REPOSITORY: RepositoryData = {
  id: 1,
  name: 'primary',
  path: '/srv/borg/primary',
  passphrase: 'test-secret',
  keyfileContent: null,
  cacheDir: null,
};

let counter = 0;

export function buildJob(
  tasks: TaskDefinitionInput[],
  overrides: Omit<JobDefinitionInput, 'tasks'> = {}
): Job {
  counter++;
  const definition = jobDefinitionSchema.parse({ repository_id: 1, ...overrides, tasks });
  return createJob(definition, `job-${counter}`, new Date('2024-01-01T02:00:00.000Z'));
}

/** Sets a task's run state directly for pure status/summary tests. */
export function settle(task: Task, status: TaskStatus, error: string | null = null): Task {
  task.status = status;
  task.error = error;
  task.startedAt = new Date('2024-01-01T02:00:00.000Z');
  task.completedAt = status === 'pending' || status === 'running' ? null : new Date('2024-01-01T02:01:00.000Z');
  return task;
}

function isKind<K extends TaskKind>(task: Task, kind: K): task is TaskOf<K> {
  return task.kind === kind;
}

export function taskOf<K extends TaskKind>(job: Job, index: number, kind: K): TaskOf<K> {
  const task = job.tasks[index];
  if (!isKind(task, kind)) {
    throw new Error(`Task ${index} is ${task.kind}, not ${kind}`);
  }
  return task;
}

/** An ExecutionContext that records what an executor reports. */
export function recordingContext(signal: AbortSignal = new AbortController().signal) {
  const lines: string[] = [];
  const markers: ProgressMarker[] = [];
  const context: ExecutionContext = {
    signal,
    output: async (line) => {
      lines.push(line);
    },
    progress: async (marker) => {
      markers.push(marker);
    },
  };
  return { context, lines, markers };
}
