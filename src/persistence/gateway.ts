import type {
  CloudSyncConfig,
  Job,
  JobRecord,
  JobStatus,
  JobStatusUpdate,
  NotificationConfig,
  RepositoryData,
  Task,
  TaskRecord,
} from '../types';

/** Storage boundary. `null` means not found; failures throw. */
export interface JobStore {
  insertJob(record: JobRecord): Promise<void>;
  updateJobStatus(jobId: string, status: JobStatus, update: JobStatusUpdate): Promise<boolean>;
  replaceTasks(jobId: string, tasks: TaskRecord[], completedTasks: number): Promise<boolean>;
  findRepository(id: number): Promise<RepositoryData | null>;
  findCloudSyncConfig(id: number): Promise<CloudSyncConfig | null>;
  findNotificationConfig(id: number): Promise<NotificationConfig | null>;
  failInterruptedJobs(jobError: string, taskError: string): Promise<number>;
}

export const INTERRUPTED_JOB_ERROR = 'Job cancelled on startup - was running when application shut down';
export const INTERRUPTED_TASK_ERROR = 'Task cancelled on startup - job was interrupted by application shutdown';

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function toJobRecord(job: Job): JobRecord {
  return {
    id: job.id,
    repository_id: job.repositoryId,
    type: job.operation,
    status: job.status,
    job_type: job.jobType,
    total_tasks: job.totalTasks,
    completed_tasks: job.completedTasks,
    started_at: job.startedAt,
    finished_at: job.finishedAt,
    error: job.error,
    cloud_sync_config_id: job.cloudSyncConfigId,
    prune_config_id: job.pruneConfigId,
    check_config_id: job.checkConfigId,
    notification_config_id: job.notificationConfigId,
  };
}

export function toTaskRecord(task: Task): TaskRecord {
  return {
    job_id: task.jobId,
    task_type: task.kind,
    task_name: task.name,
    status: task.status,
    task_order: task.taskOrder,
    parameters: { ...task.parameters },
    output: task.outputLines.join('\n'),
    error: task.error,
    return_code: task.returnCode,
    started_at: task.startedAt,
    completed_at: task.completedAt,
  };
}

/**
 * Best-effort durability. Every method logs and swallows its own failure, so
 * a storage outage never changes a job's outcome.
 *
 * The `queue*` methods copy the state at call time and append the write to a
 * per-job chain; `flush` waits for that chain.
 */
export class PersistenceGateway {
  private readonly chains = new Map<string, Promise<void>>();

  constructor(private readonly store: JobStore) {}

  async createJobRecord(job: Job): Promise<boolean> {
    return this.writeJobRecord(toJobRecord(job));
  }

  async updateJobStatus(
    jobId: string,
    status: JobStatus,
    finishedAt?: Date | null,
    output?: string | null,
    error?: string | null
  ): Promise<boolean> {
    try {
      const found = await this.store.updateJobStatus(jobId, status, { finishedAt, output, error });
      if (!found) {
        console.warn(`[persistence] Job ${jobId} not found while updating status to ${status}`);
      }
      return found;
    } catch (err) {
      console.error(`[persistence] Failed to update status of job ${jobId}: ${describe(err)}`);
      return false;
    }
  }

  async saveTaskSnapshot(jobId: string, tasks: readonly Task[]): Promise<boolean> {
    return this.writeTasks(jobId, tasks.map(toTaskRecord));
  }

  async getRepositoryData(repositoryId: number): Promise<RepositoryData | undefined> {
    try {
      return (await this.store.findRepository(repositoryId)) ?? undefined;
    } catch (err) {
      console.error(`[persistence] Failed to load repository ${repositoryId}: ${describe(err)}`);
      return undefined;
    }
  }

  async getCloudSyncConfig(configId: number): Promise<CloudSyncConfig | undefined> {
    try {
      return (await this.store.findCloudSyncConfig(configId)) ?? undefined;
    } catch (err) {
      console.error(`[persistence] Failed to load cloud sync config ${configId}: ${describe(err)}`);
      return undefined;
    }
  }

  async getNotificationConfig(configId: number): Promise<NotificationConfig | undefined> {
    try {
      return (await this.store.findNotificationConfig(configId)) ?? undefined;
    } catch (err) {
      console.error(`[persistence] Failed to load notification config ${configId}: ${describe(err)}`);
      return undefined;
    }
  }

  /** Marks jobs left running by a previous process as failed. */
  async recoverInterruptedJobs(): Promise<number> {
    try {
      const count = await this.store.failInterruptedJobs(INTERRUPTED_JOB_ERROR, INTERRUPTED_TASK_ERROR);
      if (count > 0) {
        console.log(`[persistence] Recovered ${count} interrupted jobs (marked as failed)`);
      }
      return count;
    } catch (err) {
      console.error(`[persistence] Interrupted job recovery failed: ${describe(err)}`);
      return 0;
    }
  }

  queueJobRecord(job: Job): void {
    const record = toJobRecord(job);
    this.enqueue(job.id, () => this.writeJobRecord(record));
  }

  queueTaskSnapshot(job: Job): void {
    const records = job.tasks.map(toTaskRecord);
    this.enqueue(job.id, () => this.writeTasks(job.id, records));
  }

  queueStatusUpdate(job: Job): void {
    const { id, status, finishedAt, error } = job;
    this.enqueue(id, () => this.updateJobStatus(id, status, finishedAt, undefined, error));
  }

  async flush(jobId: string): Promise<void> {
    await this.chains.get(jobId);
  }

  private enqueue(jobId: string, write: () => Promise<boolean>): void {
    const previous = this.chains.get(jobId) ?? Promise.resolve();
    const next: Promise<void> = previous.then(write).then(() => {
      if (this.chains.get(jobId) === next) this.chains.delete(jobId);
    });
    this.chains.set(jobId, next);
  }

  private async writeJobRecord(record: JobRecord): Promise<boolean> {
    try {
      await this.store.insertJob(record);
      return true;
    } catch (err) {
      console.error(`[persistence] Failed to create job record ${record.id}: ${describe(err)}`);
      return false;
    }
  }

  private async writeTasks(jobId: string, records: TaskRecord[]): Promise<boolean> {
    const completed = records.filter((r) => r.status === 'completed').length;
    try {
      const found = await this.store.replaceTasks(jobId, records, completed);
      if (!found) {
        console.warn(`[persistence] Job ${jobId} not found while saving tasks`);
      }
      return found;
    } catch (err) {
      console.error(`[persistence] Failed to save tasks of job ${jobId}: ${describe(err)}`);
      return false;
    }
  }
}
