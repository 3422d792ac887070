import { randomUUID } from 'crypto';
import type { Job, Task } from '../types';
import type { JobDefinition, TaskDefinition } from './definitions';

export function createTask(definition: TaskDefinition, jobId: string, taskOrder: number): Task {
  return {
    ...definition,
    jobId,
    taskOrder,
    status: 'pending',
    outputLines: [],
    returnCode: null,
    error: null,
    startedAt: null,
    completedAt: null,
  };
}

export function createJob(definition: JobDefinition, id: string = randomUUID(), now: Date = new Date()): Job {
  const tasks = definition.tasks.map((task, index) => createTask(task, id, index + 1));
  return {
    id,
    jobType: definition.job_type,
    operation: definition.operation,
    status: 'pending',
    tasks,
    totalTasks: tasks.length,
    completedTasks: 0,
    currentTaskIndex: 0,
    repositoryId: definition.repository_id,
    cloudSyncConfigId: definition.cloud_sync_config_id,
    pruneConfigId: definition.prune_config_id,
    checkConfigId: definition.check_config_id,
    notificationConfigId: definition.notification_config_id,
    startedAt: now,
    finishedAt: null,
    error: null,
  };
}
