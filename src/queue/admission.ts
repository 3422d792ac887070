export type SlotKind = 'backup' | 'operation';

export interface Permit {
  readonly kind: SlotKind;
  release(): void;
}

export interface AdmissionOptions {
  maxConcurrentBackups: number;
  maxConcurrentOperations: number;
  pollIntervalMs: number;
}

export interface QueueStats {
  backup: { running: number; queued: number; available: number; max: number };
  operation: { running: number; queued: number; available: number; max: number };
}

interface Waiter {
  grant: (permit: Permit) => void;
  reject: (err: Error) => void;
  detach: () => void;
}

interface Pool {
  max: number;
  running: number;
  waiters: Waiter[];
}

/**
 * Counting gates for backup jobs and for the other process-bound operations.
 * Waiters are admitted first come, first served on each poll tick.
 */
export class AdmissionController {
  private readonly pools: Record<SlotKind, Pool>;
  private timer: ReturnType<typeof setInterval> | null = null;
  private closed = false;

  constructor(private readonly options: AdmissionOptions) {
    this.pools = {
      backup: { max: options.maxConcurrentBackups, running: 0, waiters: [] },
      operation: { max: options.maxConcurrentOperations, running: 0, waiters: [] },
    };
  }

  acquire(kind: SlotKind, signal?: AbortSignal): Promise<Permit> {
    if (this.closed) {
      return Promise.reject(new Error('Admission controller is shut down'));
    }
    if (signal?.aborted) {
      return Promise.reject(new Error('Cancelled while waiting for an admission slot'));
    }

    const pool = this.pools[kind];
    if (pool.waiters.length === 0 && pool.running < pool.max) {
      return Promise.resolve(this.grant(kind));
    }

    return new Promise<Permit>((resolve, reject) => {
      const onAbort = () => {
        const index = pool.waiters.indexOf(waiter);
        if (index >= 0) pool.waiters.splice(index, 1);
        reject(new Error('Cancelled while waiting for an admission slot'));
      };
      const waiter: Waiter = {
        grant: resolve,
        reject,
        detach: () => signal?.removeEventListener('abort', onAbort),
      };
      signal?.addEventListener('abort', onAbort, { once: true });
      pool.waiters.push(waiter);
      console.log(`[admission] Queued for ${kind} slot (${pool.waiters.length} waiting)`);
      this.ensurePolling();
    });
  }

  stats(): QueueStats {
    const describe = (pool: Pool) => ({
      running: pool.running,
      queued: pool.waiters.length,
      available: Math.max(0, pool.max - pool.running),
      max: pool.max,
    });
    return { backup: describe(this.pools.backup), operation: describe(this.pools.operation) };
  }

  shutdown(): void {
    this.closed = true;
    this.stopPolling();
    for (const pool of Object.values(this.pools)) {
      for (const waiter of pool.waiters.splice(0)) {
        waiter.detach();
        waiter.reject(new Error('Admission controller is shut down'));
      }
    }
  }

  private grant(kind: SlotKind): Permit {
    const pool = this.pools[kind];
    pool.running++;
    let released = false;
    return {
      kind,
      release: () => {
        if (released) return;
        released = true;
        pool.running--;
      },
    };
  }

  private poll(): void {
    for (const kind of ['backup', 'operation'] as const) {
      const pool = this.pools[kind];
      while (pool.waiters.length > 0 && pool.running < pool.max) {
        const waiter = pool.waiters.shift();
        if (!waiter) break;
        waiter.detach();
        waiter.grant(this.grant(kind));
      }
    }
    if (this.pools.backup.waiters.length === 0 && this.pools.operation.waiters.length === 0) {
      this.stopPolling();
    }
  }

  private ensurePolling(): void {
    if (this.timer) return;
    this.timer = setInterval(() => this.poll(), this.options.pollIntervalMs);
  }

  private stopPolling(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }
}
