import type { PersistenceGateway } from '../persistence/gateway';
import { buildBorgCommand, defaultArchiveName, withKeyfile } from '../process/borg';
import type { ProcessRunner } from '../process/runner';
import type { Job, RepositoryData, TaskOf } from '../types';
import { applyProcessResult, errorMessage, failTask, resolveRepository } from './outcome';
import type { ExecutionContext, TaskExecutor } from './types';

export interface BackupExecutorDeps {
  runner: ProcessRunner;
  persistence: PersistenceGateway;
  borgBinary: string;
  breakLockTimeoutMs: number;
  dryRun: boolean;
}

type BackupParameters = TaskOf<'backup'>['parameters'];

export function buildCreateArgs(
  params: BackupParameters,
  repositoryPath: string,
  archiveName: string,
  forceDryRun = false
): string[] {
  const dryRun = params.dry_run || forceDryRun;
  const args = dryRun ? ['--list', '--filter', 'AME'] : ['--stats', '--list', '--filter', 'AME'];
  if (params.compression) {
    args.push('--compression', params.compression);
  }
  for (const pattern of params.patterns) {
    args.push(`--pattern=${pattern}`);
  }
  if (dryRun) {
    args.push('--dry-run');
  }
  args.push(`${repositoryPath}::${archiveName}`);
  if (params.source_path) {
    args.push(params.source_path);
  }
  return args;
}

export class BackupExecutor implements TaskExecutor<'backup'> {
  constructor(private readonly deps: BackupExecutorDeps) {}

  async execute(job: Job, task: TaskOf<'backup'>, _taskIndex: number, context: ExecutionContext): Promise<boolean> {
    const repository = await resolveRepository(job, task, this.deps.persistence);
    if (!repository) return false;

    const params = task.parameters;
    const archiveName = params.archive_name ?? defaultArchiveName();

    try {
      const { command, env } = buildBorgCommand(
        this.deps.borgBinary,
        'create',
        buildCreateArgs(params, repository.path, archiveName, this.deps.dryRun),
        repository
      );

      return await withKeyfile(repository, env, async (runEnv) => {
        if (params.ignore_lock) {
          await this.breakLock(repository, runEnv, context);
        }
        const result = await this.deps.runner.run(command, {
          env: runEnv,
          signal: context.signal,
          onLine: (line) => context.output(line),
          onProgress: (marker) => context.progress(marker),
        });
        return applyProcessResult(task, result, 'Backup');
      });
    } catch (err) {
      return failTask(task, `Backup task failed: ${errorMessage(err)}`);
    }
  }

  /** Clears a stale lock before the backup. Failure here only warns. */
  private async breakLock(
    repository: RepositoryData,
    env: Record<string, string>,
    context: ExecutionContext
  ): Promise<void> {
    await context.output('Breaking repository lock...');
    const { command } = buildBorgCommand(this.deps.borgBinary, 'break-lock', [repository.path], repository);
    const result = await this.deps.runner.run(command, {
      env,
      signal: context.signal,
      timeoutMs: this.deps.breakLockTimeoutMs,
      onLine: (line) => context.output(line),
    });
    if (result.returnCode === 0) {
      await context.output('Repository lock removed');
      return;
    }
    const reason = result.error ?? `return code ${result.returnCode}`;
    console.warn(`[backup] break-lock on ${repository.name} failed: ${reason}`);
    await context.output(`Warning: could not break repository lock (${reason}), continuing`);
  }
}
