import { describe, it, expect, vi, beforeEach } from 'vitest';
import { streamAllJobEvents, streamJobOutput, StreamMessage, StreamSource } from './stream';
import { EventBroadcaster } from '../events/broadcaster';
import { buildJob } from '../testing/fixtures';
import { createTestRuntime, StubBehaviour } from '../testing/runtime';
import type { Job, JobEvent, TaskKind } from '../types';

function render(message: StreamMessage): string {
  switch (message.type) {
    case 'line':
      return `line${message.taskIndex}:${message.text}`;
    case 'status':
      return `status${message.taskIndex ?? '-'}:${message.status}`;
    case 'keepalive':
      return 'keepalive';
    case 'complete':
      return `complete:${message.status}`;
    case 'error':
      return `error:${message.message}`;
  }
}

async function collect(stream: AsyncGenerator<StreamMessage, void, undefined>): Promise<string[]> {
  const messages: string[] = [];
  for await (const message of stream) messages.push(render(message));
  return messages;
}

function gate() {
  const holder: { open?: () => void } = {};
  const opened = new Promise<void>((resolve) => {
    holder.open = resolve;
  });
  return { opened, open: () => holder.open?.() };
}

function setup(job: Job, behaviour: Partial<Record<TaskKind, StubBehaviour>> = {}) {
  const runtime = createTestRuntime(behaviour);
  const source: StreamSource = {
    getJob: (id) => (id === job.id ? job : undefined),
    events: runtime.events,
    outputs: runtime.outputs,
  };
  return { ...runtime, source };
}

describe('streamJobOutput', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  it('reports an unknown job as a single error', async () => {
    const job = buildJob([{ name: 'backup', kind: 'backup' }]);
    const { source } = setup(job);

    await expect(collect(streamJobOutput(source, 'missing'))).resolves.toEqual(['error:Job missing not found']);
  });

  it('refuses task scope on a simple job', async () => {
    const job = buildJob([{ name: 'backup', kind: 'backup' }], { job_type: 'simple', operation: 'backup' });
    const { source } = setup(job);

    await expect(collect(streamJobOutput(source, job.id, 0))).resolves.toEqual([
      'error:Task streaming is only available for composite jobs',
    ]);
  });

  it('refuses a task index outside the job', async () => {
    const job = buildJob([{ name: 'backup', kind: 'backup' }]);
    const { source } = setup(job);

    await expect(collect(streamJobOutput(source, job.id, 5))).resolves.toEqual([
      'error:Task index 5 is out of range',
    ]);
    await expect(collect(streamJobOutput(source, job.id, -1))).resolves.toEqual([
      'error:Task index -1 is out of range',
    ]);
  });

  it('replays the captured output of a finished job and completes', async () => {
    const job = buildJob([{ name: 'backup', kind: 'backup' }]);
    const { source, orchestrator, events } = setup(job, {
      backup: async (_task, context) => {
        await context.output('line one');
        await context.output('line two');
        return true;
      },
    });
    await orchestrator.run(job);

    await expect(collect(streamJobOutput(source, job.id))).resolves.toEqual([
      'line0:line one',
      'line0:line two',
      'complete:completed',
    ]);
    await expect(collect(streamJobOutput(source, job.id, 0))).resolves.toEqual([
      'line0:line one',
      'line0:line two',
      'complete:completed',
    ]);
    expect(events.subscriberCount).toBe(0);
  });

  it('replays the backlog of a running job, then follows it to the end', async () => {
    const job = buildJob([{ name: 'backup', kind: 'backup' }]);
    const release = gate();
    const { source, orchestrator, events } = setup(job, {
      backup: async (_task, context) => {
        await context.output('first');
        await release.opened;
        await context.output('second');
        return true;
      },
    });

    const running = orchestrator.run(job);
    await vi.waitFor(() => expect(job.tasks[0].outputLines).toEqual(['first']));
    const streamed = collect(streamJobOutput(source, job.id));
    await vi.waitFor(() => expect(events.subscriberCount).toBe(1));
    release.open();
    await running;

    await expect(streamed).resolves.toEqual([
      'line0:first',
      'line0:second',
      'status0:completed',
      'status-:completed',
      'complete:completed',
    ]);
    expect(events.subscriberCount).toBe(0);
  });

  it('follows a single task and stops when it settles', async () => {
    const job = buildJob([
      { name: 'pre-hooks', kind: 'hook' },
      { name: 'backup', kind: 'backup' },
    ]);
    const release = gate();
    const { source, orchestrator, calls, events } = setup(job, {
      hook: async (_task, context) => {
        await context.output('hook output');
        await release.opened;
        return true;
      },
      backup: async (_task, context) => {
        await context.output('archive done');
        return true;
      },
    });

    const running = orchestrator.run(job);
    await vi.waitFor(() => expect(calls).toHaveBeenCalledWith('hook'));
    const streamed = collect(streamJobOutput(source, job.id, 1));
    await vi.waitFor(() => expect(events.subscriberCount).toBe(1));
    release.open();
    await running;

    await expect(streamed).resolves.toEqual([
      'status1:running',
      'line1:archive done',
      'status1:completed',
      'complete:completed',
    ]);
  });

  it('ends quietly when the consumer goes away', async () => {
    const job = buildJob([{ name: 'backup', kind: 'backup' }]);
    const release = gate();
    const { source, orchestrator, events } = setup(job, {
      backup: async (_task, context) => {
        await context.output('first');
        await release.opened;
        return true;
      },
    });
    const controller = new AbortController();

    const running = orchestrator.run(job);
    await vi.waitFor(() => expect(job.tasks[0].outputLines).toEqual(['first']));
    const streamed = collect(streamJobOutput(source, job.id, undefined, controller.signal));
    await vi.waitFor(() => expect(events.subscriberCount).toBe(1));
    controller.abort();

    await expect(streamed).resolves.toEqual(['line0:first']);
    expect(events.subscriberCount).toBe(0);
    release.open();
    await running;
  });
});

describe('streamAllJobEvents', () => {
  it('replays recent events of every job, then follows live ones until aborted', async () => {
    const events = new EventBroadcaster<JobEvent>({ maxQueueSize: 10, keepaliveMs: 60_000, historySize: 10 });
    const at = '2024-01-01T00:00:00.000Z';
    events.publish({ type: 'output_line', jobId: 'job-a', taskIndex: 0, line: 'one', at });
    events.publish({ type: 'output_line', jobId: 'job-b', taskIndex: 0, line: 'two', at });
    const controller = new AbortController();
    const seen: string[] = [];

    const streaming = (async () => {
      for await (const event of streamAllJobEvents(events, controller.signal)) {
        if (event.type === 'output_line') seen.push(`${event.jobId}:${event.line}`);
        if (seen.length === 3) controller.abort();
      }
    })();
    await vi.waitFor(() => expect(events.subscriberCount).toBe(1));
    events.publish({ type: 'output_line', jobId: 'job-a', taskIndex: 1, line: 'three', at });
    await streaming;

    expect(seen).toEqual(['job-a:one', 'job-b:two', 'job-a:three']);
    expect(events.subscriberCount).toBe(0);
  });

  it('yields nothing once the consumer has gone', async () => {
    const events = new EventBroadcaster<JobEvent>({ maxQueueSize: 10, keepaliveMs: 60_000, historySize: 10 });
    events.publish({ type: 'output_line', jobId: 'job-a', taskIndex: 0, line: 'one', at: '2024-01-01T00:00:00.000Z' });
    const controller = new AbortController();
    controller.abort();

    await expect(streamAllJobEvents(events, controller.signal).next()).resolves.toEqual({ value: undefined, done: true });
    expect(events.subscriberCount).toBe(0);
  });
});
