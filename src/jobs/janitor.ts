import type { PersistenceGateway } from '../persistence/gateway';
import type { JobManager } from './manager';

export interface JanitorOptions {
  intervalMs: number;
  retentionMs: number;
}

/**
 * Recovers jobs a previous process left running, then periodically drops
 * finished jobs from memory once their retention window has passed.
 */
export class JobJanitor {
  private timer: ReturnType<typeof setInterval> | null = null;

  constructor(
    private readonly manager: JobManager,
    private readonly persistence: PersistenceGateway,
    private readonly options: JanitorOptions
  ) {}

  get running(): boolean {
    return this.timer !== null;
  }

  async start(): Promise<void> {
    if (this.timer) return;
    console.log(`[janitor] Started (interval: ${this.options.intervalMs}ms)`);

    await this.persistence.recoverInterruptedJobs();

    this.timer = setInterval(() => {
      this.sweep();
    }, this.options.intervalMs);
  }

  sweep(now: number = Date.now()): number {
    const evicted = this.manager.evictFinished(this.options.retentionMs, now);
    if (evicted > 0) {
      console.log(`[janitor] Evicted ${evicted} finished jobs from memory`);
    }
    return evicted;
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    console.log('[janitor] Stopped');
  }
}
