import dotenv from 'dotenv';
dotenv.config();

function intFromEnv(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  return parseInt(value, 10);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env) {
  return {
    port: intFromEnv(env.PORT, 8080),
    databaseUrl: env.DATABASE_URL || '',
    apiToken: env.API_TOKEN || '',
    borgBinary: env.BORG_BINARY || 'borg',
    rcloneBinary: env.RCLONE_BINARY || 'rclone',
    maxConcurrentBackups: intFromEnv(env.MAX_CONCURRENT_BACKUPS, 5),
    maxConcurrentOperations: intFromEnv(env.MAX_CONCURRENT_OPERATIONS, 10),
    queuePollIntervalMs: intFromEnv(env.QUEUE_POLL_INTERVAL_MS, 100),
    maxOutputLinesPerJob: intFromEnv(env.MAX_OUTPUT_LINES_PER_JOB, 1000),
    sseKeepaliveMs: intFromEnv(env.SSE_KEEPALIVE_MS, 30_000),
    sseMaxQueueSize: intFromEnv(env.SSE_MAX_QUEUE_SIZE, 100),
    eventHistorySize: intFromEnv(env.EVENT_HISTORY_SIZE, 50),
    terminateTimeoutMs: intFromEnv(env.TERMINATE_TIMEOUT_MS, 5_000),
    breakLockTimeoutMs: intFromEnv(env.BREAK_LOCK_TIMEOUT_MS, 30_000),
    finishedJobRetentionMs: intFromEnv(env.FINISHED_JOB_RETENTION_MS, 60 * 60 * 1000),
    janitorIntervalMs: intFromEnv(env.JANITOR_INTERVAL_MS, 5 * 60 * 1000),
    dryRun: env.DRY_RUN === 'true',
  };
}

export type AppConfig = ReturnType<typeof loadConfig>;

export const config: AppConfig = loadConfig();

const required = ['databaseUrl', 'apiToken'] as const;

const positive = [
  'port',
  'maxConcurrentBackups',
  'maxConcurrentOperations',
  'queuePollIntervalMs',
  'maxOutputLinesPerJob',
  'sseKeepaliveMs',
  'sseMaxQueueSize',
  'terminateTimeoutMs',
  'breakLockTimeoutMs',
  'janitorIntervalMs',
] as const;

export function validateConfig(cfg: AppConfig = config): void {
  const missing = required.filter((key) => !cfg[key]);
  if (missing.length > 0) {
    throw new Error(`Missing required env vars: ${missing.join(', ')}`);
  }

  const invalid = positive.filter((key) => !Number.isInteger(cfg[key]) || cfg[key] <= 0);
  if (invalid.length > 0) {
    throw new Error(`Invalid numeric env vars: ${invalid.join(', ')}`);
  }
}
