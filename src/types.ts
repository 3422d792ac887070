import type { TaskDefinition } from './jobs/definitions';

export type JobType = 'simple' | 'composite';

export type JobOperation = 'backup' | 'restore' | 'list' | 'check' | 'prune' | 'sync' | 'composite';

export type JobStatus = 'pending' | 'running' | 'completed' | 'failed' | 'cancelled';

export type TaskStatus = 'pending' | 'running' | 'completed' | 'failed' | 'skipped';

export type TaskKind = TaskDefinition['kind'];

export interface TaskState {
  jobId: string;
  taskOrder: number;
  status: TaskStatus;
  outputLines: string[];
  returnCode: number | null;
  error: string | null;
  startedAt: Date | null;
  completedAt: Date | null;
}

/**
 * A task is its validated definition plus run state. The union stays
 * discriminated on `kind`, so narrowing a task also narrows its parameters.
 */
export type Task = TaskDefinition & TaskState;

export type TaskOf<K extends TaskKind> = Extract<Task, { kind: K }>;

export interface Job {
  id: string;
  jobType: JobType;
  operation: JobOperation;
  status: JobStatus;
  tasks: Task[];
  totalTasks: number;
  completedTasks: number;
  currentTaskIndex: number;
  repositoryId: number | null;
  cloudSyncConfigId: number | null;
  pruneConfigId: number | null;
  checkConfigId: number | null;
  notificationConfigId: number | null;
  startedAt: Date;
  finishedAt: Date | null;
  error: string | null;
}

export const TERMINAL_JOB_STATUSES: readonly JobStatus[] = ['completed', 'failed', 'cancelled'];

export function isJobFinished(status: JobStatus): boolean {
  return TERMINAL_JOB_STATUSES.includes(status);
}

export const TERMINAL_TASK_STATUSES: readonly TaskStatus[] = ['completed', 'failed', 'skipped'];

export function isTaskFinished(status: TaskStatus): boolean {
  return TERMINAL_TASK_STATUSES.includes(status);
}

export type ProgressMarker =
  | {
      type: 'progress';
      originalSize: number;
      compressedSize: number;
      deduplicatedSize: number;
      fileCount: number;
      path: string;
    }
  | { type: 'archive_name' | 'fingerprint' | 'start_time' | 'end_time'; value: string };

export type JobEvent =
  | { type: 'job_status_changed'; jobId: string; status: JobStatus; error: string | null; at: string }
  | {
      type: 'task_status_changed';
      jobId: string;
      taskIndex: number;
      status: TaskStatus;
      returnCode: number | null;
      error: string | null;
      at: string;
    }
  | { type: 'output_line'; jobId: string; taskIndex: number; line: string; at: string };

export interface KeepaliveEvent {
  type: 'keepalive';
  at: string;
}

export interface RepositoryData {
  id: number;
  name: string;
  path: string;
  passphrase: string;
  keyfileContent: string | null;
  cacheDir: string | null;
}

export interface CloudSyncConfig {
  id: number;
  name: string;
  provider: string;
  enabled: boolean;
  pathPrefix: string;
  settings: Record<string, unknown>;
}

export interface NotificationConfig {
  id: number;
  name: string;
  provider: string;
  enabled: boolean;
  settings: Record<string, unknown>;
}

export type NotificationSeverity = 'success' | 'info' | 'warning' | 'error';

export type NotificationPriority = 'low' | 'normal' | 'high';

export interface JobRecord {
  id: string;
  repository_id: number | null;
  type: JobOperation;
  status: JobStatus;
  job_type: JobType;
  total_tasks: number;
  completed_tasks: number;
  started_at: Date;
  finished_at: Date | null;
  error: string | null;
  cloud_sync_config_id: number | null;
  prune_config_id: number | null;
  check_config_id: number | null;
  notification_config_id: number | null;
}

export interface TaskRecord {
  job_id: string;
  task_type: TaskKind;
  task_name: string;
  status: TaskStatus;
  task_order: number;
  parameters: Record<string, unknown>;
  output: string;
  error: string | null;
  return_code: number | null;
  started_at: Date | null;
  completed_at: Date | null;
}

export interface JobStatusUpdate {
  finishedAt?: Date | null;
  output?: string | null;
  error?: string | null;
}
