import type { PersistenceGateway } from '../persistence/gateway';
import type { ProcessResult } from '../process/runner';
import type { Job, RepositoryData, Task } from '../types';

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function completeTask(task: Task, returnCode = 0): true {
  task.status = 'completed';
  task.returnCode = returnCode;
  task.completedAt = new Date();
  return true;
}

export function failTask(task: Task, error: string, returnCode = 1): false {
  task.status = 'failed';
  task.returnCode = returnCode;
  task.error = error;
  task.completedAt = new Date();
  return false;
}

/** The last few non-empty lines a process printed, for error messages. */
export function outputTail(result: ProcessResult, lines = 5): string {
  const all = [result.stdout, result.stderr]
    .join('\n')
    .split('\n')
    .filter((line) => line.trim() !== '');
  return all.length > 0 ? all.slice(-lines).join('\n') : 'No output captured';
}

export function applyProcessResult(task: Task, result: ProcessResult, label: string): boolean {
  if (result.returnCode === 0) {
    return completeTask(task);
  }
  const error =
    result.error ?? `${label} failed with return code ${result.returnCode}: ${outputTail(result)}`;
  return failTask(task, error, result.returnCode);
}

/**
 * Loads the job's repository fresh from storage. Fails the task and returns
 * undefined when the reference or the record is missing.
 */
export async function resolveRepository(
  job: Job,
  task: Task,
  persistence: PersistenceGateway
): Promise<RepositoryData | undefined> {
  if (job.repositoryId === null) {
    failTask(task, 'Repository ID is missing');
    return undefined;
  }
  const repository = await persistence.getRepositoryData(job.repositoryId);
  if (!repository) {
    failTask(task, 'Repository not found');
    return undefined;
  }
  return repository;
}
