import type { Pool, PoolClient } from 'pg';
import type { JobStore } from '../persistence/gateway';
import type {
  CloudSyncConfig,
  JobRecord,
  JobStatus,
  JobStatusUpdate,
  NotificationConfig,
  RepositoryData,
  TaskRecord,
} from '../types';

interface RepositoryRow {
  id: number;
  name: string;
  path: string;
  passphrase: string;
  keyfile_content: string | null;
  cache_dir: string | null;
}

interface CloudSyncConfigRow {
  id: number;
  name: string;
  provider: string;
  enabled: boolean;
  path_prefix: string;
  settings: Record<string, unknown> | null;
}

interface NotificationConfigRow {
  id: number;
  name: string;
  provider: string;
  enabled: boolean;
  settings: Record<string, unknown> | null;
}

/** JobStore on PostgreSQL; tables come from schema.sql. */
export class PgJobStore implements JobStore {
  constructor(private readonly pool: Pool) {}

  async insertJob(record: JobRecord): Promise<void> {
    await this.pool.query(
      `INSERT INTO jobs (id, repository_id, type, status, job_type, total_tasks, completed_tasks,
                         started_at, finished_at, error, cloud_sync_config_id, prune_config_id,
                         check_config_id, notification_config_id)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14)
       ON CONFLICT (id) DO NOTHING`,
      [
        record.id,
        record.repository_id,
        record.type,
        record.status,
        record.job_type,
        record.total_tasks,
        record.completed_tasks,
        record.started_at,
        record.finished_at,
        record.error,
        record.cloud_sync_config_id,
        record.prune_config_id,
        record.check_config_id,
        record.notification_config_id,
      ]
    );
  }

  async updateJobStatus(jobId: string, status: JobStatus, update: JobStatusUpdate): Promise<boolean> {
    const sets = ['status = $2'];
    const values: unknown[] = [jobId, status];
    if (update.finishedAt !== undefined) {
      values.push(update.finishedAt);
      sets.push(`finished_at = $${values.length}`);
    }
    if (update.output !== undefined) {
      values.push(update.output);
      sets.push(`log_output = $${values.length}`);
    }
    if (update.error !== undefined) {
      values.push(update.error);
      sets.push(`error = $${values.length}`);
    }

    const { rowCount } = await this.pool.query(`UPDATE jobs SET ${sets.join(', ')} WHERE id = $1`, values);
    return (rowCount ?? 0) > 0;
  }

  async replaceTasks(jobId: string, tasks: TaskRecord[], completedTasks: number): Promise<boolean> {
    return this.transaction(async (client) => {
      const { rowCount } = await client.query('SELECT 1 FROM jobs WHERE id = $1 FOR UPDATE', [jobId]);
      if (!rowCount) return false;

      await client.query('DELETE FROM job_tasks WHERE job_id = $1', [jobId]);
      for (const task of tasks) {
        await client.query(
          `INSERT INTO job_tasks (job_id, task_order, task_type, task_name, status, parameters,
                                  output, error, return_code, started_at, completed_at)
           VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11)`,
          [
            jobId,
            task.task_order,
            task.task_type,
            task.task_name,
            task.status,
            JSON.stringify(task.parameters),
            task.output,
            task.error,
            task.return_code,
            task.started_at,
            task.completed_at,
          ]
        );
      }
      await client.query('UPDATE jobs SET total_tasks = $2, completed_tasks = $3 WHERE id = $1', [
        jobId,
        tasks.length,
        completedTasks,
      ]);
      return true;
    });
  }

  async findRepository(id: number): Promise<RepositoryData | null> {
    const { rows } = await this.pool.query<RepositoryRow>(
      'SELECT id, name, path, passphrase, keyfile_content, cache_dir FROM repositories WHERE id = $1',
      [id]
    );
    const row = rows[0];
    if (!row) return null;
    return {
      id: row.id,
      name: row.name,
      path: row.path,
      passphrase: row.passphrase,
      keyfileContent: row.keyfile_content,
      cacheDir: row.cache_dir,
    };
  }

  async findCloudSyncConfig(id: number): Promise<CloudSyncConfig | null> {
    const { rows } = await this.pool.query<CloudSyncConfigRow>(
      'SELECT id, name, provider, enabled, path_prefix, settings FROM cloud_sync_configs WHERE id = $1',
      [id]
    );
    const row = rows[0];
    if (!row) return null;
    return {
      id: row.id,
      name: row.name,
      provider: row.provider,
      enabled: row.enabled,
      pathPrefix: row.path_prefix,
      settings: row.settings ?? {},
    };
  }

  async findNotificationConfig(id: number): Promise<NotificationConfig | null> {
    const { rows } = await this.pool.query<NotificationConfigRow>(
      'SELECT id, name, provider, enabled, settings FROM notification_configs WHERE id = $1',
      [id]
    );
    const row = rows[0];
    if (!row) return null;
    return {
      id: row.id,
      name: row.name,
      provider: row.provider,
      enabled: row.enabled,
      settings: row.settings ?? {},
    };
  }

  async failInterruptedJobs(jobError: string, taskError: string): Promise<number> {
    return this.transaction(async (client) => {
      await client.query(
        `UPDATE job_tasks
         SET status = 'failed', error = $1, completed_at = now()
         WHERE status IN ('pending', 'running')
           AND job_id IN (SELECT id FROM jobs WHERE status = 'running')`,
        [taskError]
      );
      const { rowCount } = await client.query(
        `UPDATE jobs
         SET status = 'failed', error = $1, finished_at = now()
         WHERE status = 'running'`,
        [jobError]
      );
      return rowCount ?? 0;
    });
  }

  private async transaction<T>(work: (client: PoolClient) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      const result = await work(client);
      await client.query('COMMIT');
      return result;
    } catch (err) {
      await client.query('ROLLBACK');
      throw err;
    } finally {
      client.release();
    }
  }
}
