import type { ProgressMarker } from '../types';

/** Fixed-capacity ring; the oldest entry is evicted first. */
export class RingBuffer<T> {
  private readonly items: (T | undefined)[];
  private start = 0;
  private length = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new Error(`Ring buffer capacity must be a positive integer, got ${capacity}`);
    }
    this.items = new Array<T | undefined>(capacity);
  }

  get size(): number {
    return this.length;
  }

  push(item: T): void {
    const end = (this.start + this.length) % this.capacity;
    this.items[end] = item;
    if (this.length < this.capacity) {
      this.length++;
    } else {
      this.start = (this.start + 1) % this.capacity;
    }
  }

  /** Oldest first; `last` limits the read to the newest entries. */
  snapshot(last?: number): T[] {
    const count = last === undefined ? this.length : Math.max(0, Math.min(last, this.length));
    const out: T[] = [];
    for (let i = this.length - count; i < this.length; i++) {
      const item = this.items[(this.start + i) % this.capacity];
      if (item !== undefined) out.push(item);
    }
    return out;
  }
}

export interface OutputLine {
  text: string;
  taskIndex: number;
  timestamp: string;
}

interface JobOutput {
  lines: RingBuffer<OutputLine>;
  progress: ProgressMarker | null;
}

/** Per-job output rings keyed by job id. */
export class JobOutputStore {
  private readonly outputs = new Map<string, JobOutput>();

  constructor(private readonly maxLinesPerJob: number) {}

  create(jobId: string): void {
    if (!this.outputs.has(jobId)) {
      this.outputs.set(jobId, { lines: new RingBuffer(this.maxLinesPerJob), progress: null });
    }
  }

  append(jobId: string, line: OutputLine): void {
    this.create(jobId);
    this.outputs.get(jobId)?.lines.push(line);
  }

  setProgress(jobId: string, marker: ProgressMarker): void {
    this.create(jobId);
    const output = this.outputs.get(jobId);
    if (output) output.progress = marker;
  }

  lines(jobId: string, last?: number): OutputLine[] {
    return this.outputs.get(jobId)?.lines.snapshot(last) ?? [];
  }

  progress(jobId: string): ProgressMarker | null {
    return this.outputs.get(jobId)?.progress ?? null;
  }

  clear(jobId: string): void {
    this.outputs.delete(jobId);
  }
}
