import type { PersistenceGateway } from '../persistence/gateway';
import { buildBorgCommand, withKeyfile } from '../process/borg';
import type { ProcessRunner } from '../process/runner';
import type { Job, TaskOf } from '../types';
import { applyProcessResult, errorMessage, failTask, resolveRepository } from './outcome';
import type { ExecutionContext, TaskExecutor } from './types';

export interface CompactExecutorDeps {
  runner: ProcessRunner;
  persistence: PersistenceGateway;
  borgBinary: string;
}

export class CompactExecutor implements TaskExecutor<'compact'> {
  constructor(private readonly deps: CompactExecutorDeps) {}

  async execute(job: Job, task: TaskOf<'compact'>, _taskIndex: number, context: ExecutionContext): Promise<boolean> {
    const repository = await resolveRepository(job, task, this.deps.persistence);
    if (!repository) return false;

    try {
      const { command, env } = buildBorgCommand(
        this.deps.borgBinary,
        'compact',
        ['--progress', repository.path],
        repository
      );
      const result = await withKeyfile(repository, env, (runEnv) =>
        this.deps.runner.run(command, {
          env: runEnv,
          signal: context.signal,
          onLine: (line) => context.output(line),
        })
      );
      return applyProcessResult(task, result, 'Compact');
    } catch (err) {
      return failTask(task, `Compact task failed: ${errorMessage(err)}`, -1);
    }
  }
}
