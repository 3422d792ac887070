import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { HookRunContext, HookRunner } from './runner';
import { hookConfigSchema, HookConfig } from '../jobs/definitions';
import { ProcessRunner } from '../process/runner';
import { exitsWith, FakeSpawner, hangs } from '../testing/fake-process';

function hook(input: Partial<HookConfig> & { name: string }): HookConfig {
  return hookConfigSchema.parse({ command: `run-${input.name}`, ...input });
}

function setup() {
  const spawner = new FakeSpawner();
  const hooks = new HookRunner(new ProcessRunner(spawner, 50));
  const lines: string[] = [];
  const context = (overrides: Partial<HookRunContext> = {}): HookRunContext => ({
    jobId: 'job-x',
    taskIndex: 0,
    hookType: 'pre',
    repositoryId: 1,
    jobFailed: false,
    critical: false,
    signal: new AbortController().signal,
    onLine: async (line) => {
      lines.push(line);
    },
    ...overrides,
  });
  return { spawner, hooks, lines, context };
}

describe('HookRunner', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('runs each hook through its shell with the job environment', async () => {
    const { spawner, hooks, lines, context } = setup();
    spawner.enqueue(exitsWith(0, 'dumped'), exitsWith(0));

    const summary = await hooks.runHooks(
      [
        hook({ name: 'db-dump', command: 'pg_dump app > /tmp/app.sql', environment_vars: { DUMP_DIR: '/tmp' } }),
        hook({ name: 'flush', command: 'sync', shell: '/bin/bash' }),
      ],
      context()
    );

    expect(summary).toMatchObject({ allSuccessful: true, criticalFailure: false, skipped: [] });
    expect(spawner.commands()).toEqual([
      ['/bin/sh', '-c', 'pg_dump app > /tmp/app.sql'],
      ['/bin/bash', '-c', 'sync'],
    ]);
    expect(spawner.calls[0].request.env).toMatchObject({
      DUMP_DIR: '/tmp',
      JOB_ID: 'job-x',
      JOB_TASK_INDEX: '0',
      JOB_HOOK_TYPE: 'pre',
      JOB_HOOK_NAME: 'db-dump',
      JOB_STATUS: 'running',
      JOB_REPOSITORY_ID: '1',
    });
    expect(lines).toEqual(['[db-dump] dumped']);
  });

  it('stops at the first failing hook', async () => {
    const { spawner, hooks, lines, context } = setup();
    spawner.enqueue(exitsWith(3, 'permission denied'));

    const summary = await hooks.runHooks([hook({ name: 'db-dump' }), hook({ name: 'flush' })], context());

    expect(spawner.calls).toHaveLength(1);
    expect(summary.allSuccessful).toBe(false);
    expect(summary.criticalFailure).toBe(false);
    expect(summary.results).toEqual([
      {
        name: 'db-dump',
        success: false,
        returnCode: 3,
        critical: false,
        error: "Hook 'db-dump' exited with code 3: permission denied",
      },
    ]);
    expect(lines).toEqual([
      '[db-dump] permission denied',
      "[db-dump] ERROR: Hook 'db-dump' exited with code 3: permission denied",
    ]);
  });

  it('moves on past a hook that allows it', async () => {
    const { spawner, hooks, context } = setup();
    spawner.enqueue(exitsWith(1), exitsWith(0));

    const summary = await hooks.runHooks(
      [hook({ name: 'optional', continue_on_failure: true }), hook({ name: 'flush' })],
      context()
    );

    expect(spawner.calls).toHaveLength(2);
    expect(summary.results.map((r) => r.success)).toEqual([false, true]);
  });

  it('names the failing critical hook', async () => {
    const { spawner, hooks, context } = setup();
    spawner.enqueue(exitsWith(0), exitsWith(1));

    const summary = await hooks.runHooks(
      [hook({ name: 'mount' }), hook({ name: 'db-dump', critical: true })],
      context()
    );

    expect(summary.criticalFailure).toBe(true);
    expect(summary.failedCriticalHookName).toBe('db-dump');
  });

  it('treats every hook as critical in a critical task', async () => {
    const { spawner, hooks, context } = setup();
    spawner.enqueue(exitsWith(1));

    const summary = await hooks.runHooks([hook({ name: 'mount' })], context({ critical: true }));

    expect(summary.failedCriticalHookName).toBe('mount');
  });

  it('stops a hook that runs past its timeout', async () => {
    vi.useFakeTimers();
    const { spawner, hooks, context } = setup();
    spawner.enqueue(hangs);

    const running = hooks.runHooks([hook({ name: 'slow', timeout: 1 })], context());
    await vi.advanceTimersByTimeAsync(1_000);
    const summary = await running;

    expect(spawner.calls[0].child.signals).toEqual(['SIGTERM']);
    expect(summary.results[0]).toMatchObject({
      success: false,
      returnCode: 143,
      error: "Hook 'slow' timed out after 1s",
    });
  });

  it('enforces the timeout on a hook that leaves a background job behind', async () => {
    vi.useFakeTimers();
    const { spawner, hooks, context } = setup();
    spawner.enqueue((child) => {
      child.pipesHeldOpen = true;
      child.finish(0);
    });

    const running = hooks.runHooks([hook({ name: 'bg', command: 'sleep 4 &', timeout: 1 })], context());
    await vi.advanceTimersByTimeAsync(1_000);
    const summary = await running;

    expect(spawner.calls[0].child.signals).toEqual(['SIGTERM']);
    expect(summary.results[0]).toMatchObject({
      success: false,
      returnCode: -1,
      error: "Hook 'bg' timed out after 1s",
    });
  });

  it('skips post hooks that should not run after a failure', async () => {
    const { spawner, hooks, lines, context } = setup();

    const summary = await hooks.runHooks(
      [hook({ name: 'notify-ops', run_on_job_failure: false })],
      context({ hookType: 'post', jobFailed: true })
    );

    expect(spawner.calls).toHaveLength(0);
    expect(summary).toMatchObject({ skipped: ['notify-ops'], results: [], allSuccessful: true });
    expect(lines).toEqual(['[notify-ops] Skipped: an earlier task in this job failed']);
  });

  it('runs post hooks after a failure by default and reports the job as failed', async () => {
    const { spawner, hooks, context } = setup();

    await hooks.runHooks([hook({ name: 'unmount' })], context({ hookType: 'post', jobFailed: true }));

    expect(spawner.calls[0].request.env.JOB_STATUS).toBe('failed');
    expect(spawner.calls[0].request.env.JOB_HOOK_TYPE).toBe('post');
  });

  it('keeps hook output out of the task when logging is off', async () => {
    const { spawner, hooks, lines, context } = setup();
    spawner.enqueue(exitsWith(0, 'noisy'));

    await hooks.runHooks([hook({ name: 'quiet', log_output: false })], context());

    expect(lines).toEqual([]);
  });
});
