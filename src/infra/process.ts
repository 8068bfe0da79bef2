import { spawn as spawnChild } from 'child_process';
import { Readable, Writable } from 'stream';
import { EngineError, errorMessage } from '../core/errors';

export interface SpawnOptions {
  command: string;
  args: string[];
  cwd: string;
  env?: Record<string, string>;
}

/** A running child process with piped stdio. */
export interface AgentProcess {
  readonly pid?: number;
  readonly stdin: Writable;
  readonly stdout: Readable;
  readonly stderr: Readable;
  /** Resolves with the exit code (null when killed by a signal) once the process exits. */
  readonly exited: Promise<number | null>;
  readonly hasExited: boolean;
  kill(signal?: NodeJS.Signals): boolean;
}

export interface ProcessLauncher {
  /** Rejects with `PROCESS_START_FAILED` when the process cannot be started. */
  spawn(opts: SpawnOptions): Promise<AgentProcess>;
}

export class NodeProcessLauncher implements ProcessLauncher {
  spawn(opts: SpawnOptions): Promise<AgentProcess> {
    return new Promise((resolve, reject) => {
      const child = spawnChild(opts.command, opts.args, {
        cwd: opts.cwd,
        env: { ...process.env, ...opts.env },
      });

      let exited = false;
      const exitPromise = new Promise<number | null>((resolveExit) => {
        child.once('close', (code) => {
          exited = true;
          resolveExit(code);
        });
      });

      child.once('error', (err) => {
        reject(new EngineError('PROCESS_START_FAILED', `Failed to start ${opts.command}: ${errorMessage(err)}`, err));
      });

      child.once('spawn', () => {
        resolve({
          pid: child.pid,
          stdin: child.stdin,
          stdout: child.stdout,
          stderr: child.stderr,
          exited: exitPromise,
          get hasExited() {
            return exited;
          },
          kill: (signal) => child.kill(signal),
        });
      });
    });
  }
}

export interface TerminateResult {
  exitCode: number | null;
  /** True when SIGTERM was not enough and SIGKILL was sent. */
  forced: boolean;
}

function waitFor<T>(promise: Promise<T>, timeoutMs: number): Promise<{ value: T } | undefined> {
  return new Promise((resolve) => {
    const timer = setTimeout(() => resolve(undefined), timeoutMs);
    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve({ value });
      },
      () => {
        clearTimeout(timer);
        resolve(undefined);
      }
    );
  });
}

/**
 * SIGTERM, wait up to `timeoutMs`, then SIGKILL and wait once more. Never waits longer than
 * twice the timeout.
 */
export async function terminateProcess(proc: AgentProcess, timeoutMs: number): Promise<TerminateResult> {
  if (proc.hasExited) {
    return { exitCode: await proc.exited, forced: false };
  }

  proc.kill('SIGTERM');
  const graceful = await waitFor(proc.exited, timeoutMs);
  if (graceful) return { exitCode: graceful.value, forced: false };

  proc.kill('SIGKILL');
  const killed = await waitFor(proc.exited, timeoutMs);
  return { exitCode: killed ? killed.value : null, forced: true };
}
