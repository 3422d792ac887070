import type { PersistenceGateway } from '../persistence/gateway';
import { buildBorgCommand, withKeyfile } from '../process/borg';
import type { ProcessRunner } from '../process/runner';
import type { Job, TaskOf } from '../types';
import { applyProcessResult, errorMessage, failTask, resolveRepository } from './outcome';
import type { ExecutionContext, TaskExecutor } from './types';

export interface CheckExecutorDeps {
  runner: ProcessRunner;
  persistence: PersistenceGateway;
  borgBinary: string;
}

type CheckParameters = TaskOf<'check'>['parameters'];

export interface CheckInvocation {
  args: string[];
  env: Record<string, string>;
}

/**
 * Data verification and archive filters only apply when archives are
 * checked; a time limit only applies to a repository-only check.
 */
export function buildCheckArgs(params: CheckParameters, repositoryPath: string): CheckInvocation {
  const args = ['--verbose', '--progress', '--show-rc'];
  const env: Record<string, string> = {};
  const repositoryOnly = params.check_type === 'repository_only';

  if (repositoryOnly) args.push('--repository-only');
  if (params.check_type === 'archives_only') args.push('--archives-only');
  if (params.verify_data && !repositoryOnly) args.push('--verify-data');
  if (params.repair_mode) {
    args.push('--repair');
    env.BORG_CHECK_I_KNOW_WHAT_I_AM_DOING = 'YES';
  }
  if (params.save_space) args.push('--save-space');
  if (params.max_duration !== undefined && repositoryOnly) {
    args.push('--max-duration', String(params.max_duration));
  }

  if (!repositoryOnly) {
    if (params.archive_prefix) args.push('--prefix', params.archive_prefix);
    if (params.archive_glob) args.push('--glob-archives', params.archive_glob);
    if (params.first_n_archives !== undefined) args.push('--first', String(params.first_n_archives));
    if (params.last_n_archives !== undefined) args.push('--last', String(params.last_n_archives));
  }

  args.push(repositoryPath);
  return { args, env };
}

export class CheckExecutor implements TaskExecutor<'check'> {
  constructor(private readonly deps: CheckExecutorDeps) {}

  async execute(job: Job, task: TaskOf<'check'>, _taskIndex: number, context: ExecutionContext): Promise<boolean> {
    const repository = await resolveRepository(job, task, this.deps.persistence);
    if (!repository) return false;

    try {
      const { args, env: overrides } = buildCheckArgs(task.parameters, repository.path);
      const { command, env } = buildBorgCommand(this.deps.borgBinary, 'check', args, repository, overrides);
      const result = await withKeyfile(repository, env, (runEnv) =>
        this.deps.runner.run(command, {
          env: runEnv,
          signal: context.signal,
          onLine: (line) => context.output(line),
          onProgress: (marker) => context.progress(marker),
        })
      );
      return applyProcessResult(task, result, 'Check');
    } catch (err) {
      return failTask(task, `Check task failed: ${errorMessage(err)}`, -1);
    }
  }
}
