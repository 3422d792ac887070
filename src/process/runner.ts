import os from 'os';
import readline from 'readline';
import type { Readable } from 'stream';
import type { ProgressMarker } from '../types';
import { parseProgressLine } from './progress';
import { redactCommand } from './redact';
import { ChildProcessLike, DefaultProcessSpawner, ProcessSpawner } from './spawner';

export type LineCallback = (line: string) => Promise<void>;
export type ProgressCallback = (marker: ProgressMarker) => Promise<void>;

interface ExitOutcome {
  code: number;
  error?: string;
}

export interface ProcessHandle {
  readonly command: readonly string[];
  readonly child: ChildProcessLike;
  readonly exited: Promise<ExitOutcome>;
  /** Line readers opened by `monitor`. */
  readonly readers: readline.Interface[];
}

export interface ProcessResult {
  returnCode: number;
  stdout: string;
  stderr: string;
  error?: string;
  stoppedBy?: 'cancel' | 'timeout';
}

export interface RunOptions {
  env?: Record<string, string>;
  cwd?: string;
  onLine?: LineCallback;
  onProgress?: ProgressCallback;
  signal?: AbortSignal;
  timeoutMs?: number;
}

function exitCodeFromExitEvent(code: number | null, signal: NodeJS.Signals | null): number {
  if (typeof code === 'number') return code;
  if (signal) {
    const entry = Object.entries(os.constants.signals).find(([name]) => name === signal);
    const n: unknown = entry?.[1];
    if (typeof n === 'number') return 128 + n;
    return 1;
  }
  return 0;
}

function hasExited(child: ChildProcessLike): boolean {
  return child.exitCode !== null || child.signalCode !== null;
}

function pipesOpen(child: ChildProcessLike): boolean {
  return [child.stdout, child.stderr].some((stream) => stream !== null && !stream.readableEnded && !stream.destroyed);
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class ProcessRunner {
  constructor(
    private readonly spawner: ProcessSpawner = new DefaultProcessSpawner(),
    private readonly terminateTimeoutMs = 5_000,
    private readonly drainTimeoutMs = 2_000
  ) {}

  /** Spawns the command. Throws when the spawner rejects the request outright. */
  start(command: readonly string[], env: Record<string, string> = {}, cwd?: string): ProcessHandle {
    if (command.length === 0) {
      throw new Error('Cannot start an empty command');
    }
    console.log(`[process] Starting: ${redactCommand(command)}`);

    const child = this.spawner.spawn(command[0], command.slice(1), {
      env: { ...process.env, ...env },
      cwd,
    });

    const exited = new Promise<ExitOutcome>((resolve) => {
      child.once('exit', (code, signal) => {
        resolve({ code: exitCodeFromExitEvent(code, signal) });
      });
      child.once('error', (err) => {
        resolve({ code: -1, error: `Failed to start process: ${err.message}` });
      });
    });

    return { command, child, exited, readers: [] };
  }

  /** Stops reading output, even while a descendant still holds the pipes. */
  releasePipes(handle: ProcessHandle): void {
    for (const reader of handle.readers) reader.close();
    handle.child.stdout?.destroy();
    handle.child.stderr?.destroy();
  }

  /**
   * Streams stdout and stderr line by line into one callback until the
   * process exits and both streams are drained. Pipes still open
   * `drainTimeoutMs` after the exit are released.
   */
  async monitor(
    handle: ProcessHandle,
    onLine?: LineCallback,
    onProgress?: ProgressCallback
  ): Promise<ProcessResult> {
    const stdout: string[] = [];
    const stderr: string[] = [];

    const consume = async (stream: Readable | null, sink: string[]): Promise<void> => {
      if (!stream) return;
      const lines = readline.createInterface({ input: stream, crlfDelay: Infinity });
      handle.readers.push(lines);
      for await (const line of lines) {
        sink.push(line);
        if (onLine) await onLine(line);
        if (onProgress) {
          const marker = parseProgressLine(line);
          if (marker) await onProgress(marker);
        }
      }
    };

    const reading: Promise<unknown> = Promise.all([
      consume(handle.child.stdout, stdout),
      consume(handle.child.stderr, stderr),
    ]).then(
      () => undefined,
      (err: unknown) => err
    );

    const outcome = await handle.exited;
    if (outcome.error !== undefined) {
      this.releasePipes(handle);
      return { returnCode: outcome.code, stdout: stdout.join('\n'), stderr: stderr.join('\n'), error: outcome.error };
    }

    let drainTimer: NodeJS.Timeout | undefined;
    const drained = await Promise.race([
      reading.then(() => true),
      new Promise<boolean>((resolve) => {
        drainTimer = setTimeout(() => resolve(false), this.drainTimeoutMs);
      }),
    ]);
    clearTimeout(drainTimer);
    if (!drained) {
      console.warn(
        `[process] ${handle.command[0]} exited but its output stayed open for ${this.drainTimeoutMs}ms, closing pipes`
      );
      this.releasePipes(handle);
    }

    const readError = await reading;
    if (readError !== undefined) {
      return {
        returnCode: -1,
        stdout: stdout.join('\n'),
        stderr: stderr.join('\n'),
        error: `Process monitoring error: ${errorMessage(readError)}`,
      };
    }

    return { returnCode: outcome.code, stdout: stdout.join('\n'), stderr: stderr.join('\n') };
  }

  /**
   * SIGTERM to the process group, then SIGKILL once the grace period runs
   * out. A group whose leader already exited is still signalled while it
   * holds the output pipes.
   */
  async terminate(handle: ProcessHandle, timeoutMs = this.terminateTimeoutMs): Promise<boolean> {
    if (hasExited(handle.child)) {
      if (!pipesOpen(handle.child)) return true;
      try {
        this.spawner.kill(handle.child, 'SIGTERM');
      } catch (err) {
        console.error(`[process] Failed to signal the process group of ${handle.command[0]}: ${errorMessage(err)}`);
      }
      return true;
    }

    let grace: NodeJS.Timeout | undefined;
    try {
      this.spawner.kill(handle.child, 'SIGTERM');
      const exitedGracefully = await Promise.race([
        handle.exited.then(() => true),
        new Promise<boolean>((resolve) => {
          grace = setTimeout(() => resolve(false), timeoutMs);
        }),
      ]);
      clearTimeout(grace);
      if (exitedGracefully) return true;

      console.warn(`[process] ${handle.command[0]} ignored SIGTERM for ${timeoutMs}ms, sending SIGKILL`);
      this.spawner.kill(handle.child, 'SIGKILL');
      await handle.exited;
      return true;
    } catch (err) {
      clearTimeout(grace);
      console.error(`[process] Failed to terminate ${handle.command[0]}: ${errorMessage(err)}`);
      return false;
    }
  }

  /**
   * start + monitor with cancellation and an optional time limit. Never
   * throws: spawn failures come back as return code -1.
   */
  async run(command: readonly string[], options: RunOptions = {}): Promise<ProcessResult> {
    if (options.signal?.aborted) {
      return { returnCode: -1, stdout: '', stderr: '', error: 'Process cancelled before start' };
    }

    let handle: ProcessHandle;
    try {
      handle = this.start(command, options.env, options.cwd);
    } catch (err) {
      return { returnCode: -1, stdout: '', stderr: '', error: `Failed to start process: ${errorMessage(err)}` };
    }

    const state: { stopped?: { by: 'cancel' | 'timeout'; reason: string }; stopping?: Promise<boolean> } = {};
    const stop = (by: 'cancel' | 'timeout', reason: string) => {
      if (state.stopping) return;
      state.stopped = { by, reason };
      state.stopping = this.terminate(handle).then((dead) => {
        this.releasePipes(handle);
        return dead;
      });
    };

    const onAbort = () => stop('cancel', 'Process cancelled');
    options.signal?.addEventListener('abort', onAbort, { once: true });
    const timer =
      options.timeoutMs !== undefined
        ? setTimeout(() => stop('timeout', `Process timed out after ${options.timeoutMs}ms`), options.timeoutMs)
        : undefined;

    try {
      const result = await this.monitor(handle, options.onLine, options.onProgress);
      if (state.stopping) await state.stopping;
      const { stopped } = state;
      if (stopped) {
        return {
          ...result,
          returnCode: result.returnCode === 0 ? -1 : result.returnCode,
          error: stopped.reason,
          stoppedBy: stopped.by,
        };
      }
      return result;
    } finally {
      if (timer) clearTimeout(timer);
      options.signal?.removeEventListener('abort', onAbort);
    }
  }
}
