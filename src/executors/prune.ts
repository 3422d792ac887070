import type { PersistenceGateway } from '../persistence/gateway';
import { buildBorgCommand, withKeyfile } from '../process/borg';
import type { ProcessRunner } from '../process/runner';
import type { Job, TaskOf } from '../types';
import { applyProcessResult, errorMessage, failTask, resolveRepository } from './outcome';
import type { ExecutionContext, TaskExecutor } from './types';

export interface PruneExecutorDeps {
  runner: ProcessRunner;
  persistence: PersistenceGateway;
  borgBinary: string;
  dryRun: boolean;
}

type PruneParameters = TaskOf<'prune'>['parameters'];

const RETENTION_UNITS = ['secondly', 'minutely', 'hourly', 'daily', 'weekly', 'monthly', 'yearly'] as const;

export function buildPruneArgs(params: PruneParameters, repositoryPath: string, forceDryRun = false): string[] {
  const args: string[] = [];
  if (params.keep_within) {
    args.push('--keep-within', params.keep_within);
  }
  for (const unit of RETENTION_UNITS) {
    const count = params[`keep_${unit}` as const];
    if (count !== undefined && count > 0) {
      args.push(`--keep-${unit}`, String(count));
    }
  }

  const dryRun = params.dry_run || forceDryRun;
  if (params.show_stats && !dryRun) args.push('--stats');
  if (params.show_list) args.push('--list');
  if (params.save_space) args.push('--save-space');
  if (params.force_prune) args.push('--force');
  if (dryRun) args.push('--dry-run');

  args.push(repositoryPath);
  return args;
}

export class PruneExecutor implements TaskExecutor<'prune'> {
  constructor(private readonly deps: PruneExecutorDeps) {}

  async execute(job: Job, task: TaskOf<'prune'>, _taskIndex: number, context: ExecutionContext): Promise<boolean> {
    const repository = await resolveRepository(job, task, this.deps.persistence);
    if (!repository) return false;

    try {
      const { command, env } = buildBorgCommand(
        this.deps.borgBinary,
        'prune',
        buildPruneArgs(task.parameters, repository.path, this.deps.dryRun),
        repository
      );
      const result = await withKeyfile(repository, env, (runEnv) =>
        this.deps.runner.run(command, {
          env: runEnv,
          signal: context.signal,
          onLine: (line) => context.output(line),
        })
      );
      return applyProcessResult(task, result, 'Prune');
    } catch (err) {
      return failTask(task, `Prune task failed: ${errorMessage(err)}`, -1);
    }
  }
}
