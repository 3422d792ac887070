import { spawn } from 'child_process';
import type { Readable } from 'stream';

/**
 * The part of a ChildProcess the runner relies on. Tests substitute an
 * EventEmitter with PassThrough streams.
 */
export interface ChildProcessLike {
  readonly pid?: number;
  readonly exitCode: number | null;
  readonly signalCode: NodeJS.Signals | null;
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  kill(signal?: NodeJS.Signals): boolean;
  once(event: 'exit', listener: (code: number | null, signal: NodeJS.Signals | null) => void): this;
  once(event: 'error', listener: (err: Error) => void): this;
}

export interface SpawnRequest {
  env: NodeJS.ProcessEnv;
  cwd?: string;
}

export interface ProcessSpawner {
  spawn(command: string, args: string[], request: SpawnRequest): ChildProcessLike;
  /** Signals the child together with every descendant still in its process group. */
  kill(child: ChildProcessLike, signal: NodeJS.Signals): void;
}

const isWindows = process.platform === 'win32';

function isMissingProcess(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ESRCH';
}

/**
 * Starts each command as the leader of its own process group, so that
 * shells and the jobs they leave in the background can be stopped together.
 */
export class DefaultProcessSpawner implements ProcessSpawner {
  spawn(command: string, args: string[], request: SpawnRequest): ChildProcessLike {
    return spawn(command, args, {
      env: request.env,
      cwd: request.cwd,
      stdio: ['ignore', 'pipe', 'pipe'],
      detached: !isWindows,
    });
  }

  kill(child: ChildProcessLike, signal: NodeJS.Signals): void {
    if (!isWindows && child.pid !== undefined) {
      try {
        process.kill(-child.pid, signal);
        return;
      } catch (err) {
        if (!isMissingProcess(err)) throw err;
      }
    }
    child.kill(signal);
  }
}
