import type { EventBroadcaster } from '../events/broadcaster';
import { errorMessage } from '../executors/outcome';
import type { JobOutputStore } from '../output/buffer';
import type { PersistenceGateway } from '../persistence/gateway';
import type { AdmissionController, Permit, QueueStats } from '../queue/admission';
import { isJobFinished, Job, JobEvent, JobStatus, KeepaliveEvent, ProgressMarker } from '../types';
import type { JobDefinition } from './definitions';
import { createJob } from './factory';
import type { JobOrchestrator } from './orchestrator';
import { streamAllJobEvents, streamJobOutput, StreamMessage } from './stream';

export interface JobManagerDeps {
  orchestrator: JobOrchestrator;
  persistence: PersistenceGateway;
  events: EventBroadcaster<JobEvent>;
  outputs: JobOutputStore;
  admission: AdmissionController;
}

interface ManagedJob {
  job: Job;
  controller: AbortController;
  done: Promise<JobStatus>;
}

/** In-memory registry of submitted jobs and their run promises. */
export class JobManager {
  private readonly jobs = new Map<string, ManagedJob>();

  constructor(private readonly deps: JobManagerDeps) {}

  submit(definition: JobDefinition): Job {
    const job = createJob(definition);
    const controller = new AbortController();

    this.deps.outputs.create(job.id);
    this.deps.persistence.queueJobRecord(job);
    this.deps.persistence.queueTaskSnapshot(job);
    this.deps.events.publish({
      type: 'job_status_changed',
      jobId: job.id,
      status: job.status,
      error: null,
      at: new Date().toISOString(),
    });
    console.log(`[jobs] Submitted ${job.jobType} job ${job.id} with ${job.totalTasks} tasks`);

    const done = this.execute(job, controller);
    this.jobs.set(job.id, { job, controller, done });
    return job;
  }

  getJob(jobId: string): Job | undefined {
    return this.jobs.get(jobId)?.job;
  }

  /** Newest first. */
  listJobs(): Job[] {
    return [...this.jobs.values()]
      .map((managed) => managed.job)
      .sort((a, b) => b.startedAt.getTime() - a.startedAt.getTime());
  }

  /** False when the job is unknown or already finished. */
  cancel(jobId: string): boolean {
    const managed = this.jobs.get(jobId);
    if (!managed || isJobFinished(managed.job.status)) return false;
    console.log(`[jobs] Cancelling job ${jobId}`);
    managed.controller.abort();
    return true;
  }

  async waitFor(jobId: string): Promise<JobStatus | undefined> {
    return this.jobs.get(jobId)?.done;
  }

  stream(jobId: string, taskIndex?: number, signal?: AbortSignal): AsyncGenerator<StreamMessage, void, undefined> {
    return streamJobOutput(
      { getJob: (id) => this.getJob(id), events: this.deps.events, outputs: this.deps.outputs },
      jobId,
      taskIndex,
      signal
    );
  }

  /** Recent events of every job followed by live ones. */
  streamAll(signal?: AbortSignal): AsyncGenerator<JobEvent | KeepaliveEvent, void, undefined> {
    return streamAllJobEvents(this.deps.events, signal);
  }

  /** Latest progress marker the job's archive tool reported. */
  progress(jobId: string): ProgressMarker | null {
    return this.deps.outputs.progress(jobId);
  }

  queueStats(): QueueStats {
    return this.deps.admission.stats();
  }

  /** Forgets finished jobs older than the retention window. */
  evictFinished(olderThanMs: number, now: number = Date.now()): number {
    let evicted = 0;
    for (const [jobId, { job }] of this.jobs) {
      if (!isJobFinished(job.status) || !job.finishedAt) continue;
      if (now - job.finishedAt.getTime() < olderThanMs) continue;
      this.jobs.delete(jobId);
      this.deps.outputs.clear(jobId);
      evicted++;
    }
    return evicted;
  }

  /** Cancels everything still active and waits for the runs to settle. */
  async shutdown(): Promise<void> {
    const active = [...this.jobs.values()].filter((managed) => !isJobFinished(managed.job.status));
    if (active.length > 0) {
      console.log(`[jobs] Cancelling ${active.length} active jobs for shutdown`);
    }
    for (const managed of active) managed.controller.abort();
    this.deps.admission.shutdown();
    await Promise.all(active.map((managed) => managed.done));
    this.deps.events.close();
  }

  private async execute(job: Job, controller: AbortController): Promise<JobStatus> {
    let permit: Permit | undefined;
    if (job.tasks.some((task) => task.kind === 'backup')) {
      try {
        permit = await this.deps.admission.acquire('backup', controller.signal);
      } catch (err) {
        console.warn(`[jobs] Job ${job.id} was not admitted: ${errorMessage(err)}`);
        controller.abort();
      }
    }

    try {
      return await this.deps.orchestrator.run(job, controller.signal);
    } finally {
      permit?.release();
    }
  }
}
