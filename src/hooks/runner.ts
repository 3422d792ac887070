import type { HookConfig } from '../jobs/definitions';
import type { LineCallback, ProcessRunner } from '../process/runner';

export interface HookResult {
  name: string;
  success: boolean;
  returnCode: number;
  critical: boolean;
  error?: string;
}

export interface HookRunSummary {
  results: HookResult[];
  skipped: string[];
  allSuccessful: boolean;
  criticalFailure: boolean;
  failedCriticalHookName?: string;
}

export interface HookRunContext {
  jobId: string;
  taskIndex: number;
  hookType: 'pre' | 'post';
  repositoryId: number | null;
  /** An earlier task in the job failed. */
  jobFailed: boolean;
  /** Every failure counts as critical. */
  critical: boolean;
  signal: AbortSignal;
  onLine: LineCallback;
}

export class HookRunner {
  constructor(private readonly runner: ProcessRunner) {}

  /**
   * Runs hooks in order. A failure stops the list unless that hook allows
   * the rest to continue.
   */
  async runHooks(hooks: readonly HookConfig[], ctx: HookRunContext): Promise<HookRunSummary> {
    const results: HookResult[] = [];
    const skipped: string[] = [];

    for (const hook of hooks) {
      if (ctx.hookType === 'post' && ctx.jobFailed && !hook.run_on_job_failure) {
        skipped.push(hook.name);
        await ctx.onLine(`[${hook.name}] Skipped: an earlier task in this job failed`);
        continue;
      }

      const result = await this.runHook(hook, ctx);
      results.push(result);
      if (!result.success) {
        await ctx.onLine(`[${hook.name}] ERROR: ${result.error}`);
        if (!hook.continue_on_failure) break;
      }
    }

    const criticalFailed = results.find((r) => !r.success && r.critical);
    return {
      results,
      skipped,
      allSuccessful: results.every((r) => r.success),
      criticalFailure: criticalFailed !== undefined,
      failedCriticalHookName: criticalFailed?.name,
    };
  }

  private async runHook(hook: HookConfig, ctx: HookRunContext): Promise<HookResult> {
    const critical = hook.critical || ctx.critical;
    console.log(`[hooks] Running ${ctx.hookType}-hook '${hook.name}' for job ${ctx.jobId}`);

    const env: Record<string, string> = {
      ...hook.environment_vars,
      JOB_ID: ctx.jobId,
      JOB_TASK_INDEX: String(ctx.taskIndex),
      JOB_HOOK_TYPE: ctx.hookType,
      JOB_HOOK_NAME: hook.name,
      JOB_STATUS: ctx.jobFailed ? 'failed' : 'running',
    };
    if (ctx.repositoryId !== null) {
      env.JOB_REPOSITORY_ID = String(ctx.repositoryId);
    }

    const result = await this.runner.run([hook.shell, '-c', hook.command], {
      env,
      signal: ctx.signal,
      timeoutMs: hook.timeout * 1000,
      onLine: hook.log_output ? (line) => ctx.onLine(`[${hook.name}] ${line}`) : undefined,
    });

    if (result.returnCode === 0) {
      return { name: hook.name, success: true, returnCode: 0, critical };
    }

    let error: string;
    if (result.stoppedBy === 'timeout') {
      error = `Hook '${hook.name}' timed out after ${hook.timeout}s`;
    } else if (result.error !== undefined) {
      error = result.error;
    } else {
      const detail = result.stderr.trim() || result.stdout.trim();
      error = `Hook '${hook.name}' exited with code ${result.returnCode}${detail ? `: ${detail}` : ''}`;
    }
    console.warn(`[hooks] ${error}`);
    return { name: hook.name, success: false, returnCode: result.returnCode, critical, error };
  }
}
