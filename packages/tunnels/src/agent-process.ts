/**
 * AgentProcess — a spawned tunneling agent as an opaque handle.
 *
 * Wraps a ChildProcess so callers only ever terminate it and wait for its
 * exit. The exit listener is attached before the spawn is confirmed, so an
 * agent that dies immediately is still observed, and `waitForExit()` after
 * the fact resolves with the recorded outcome.
 */

import {
  spawn as spawnChild,
  type ChildProcess,
  type SpawnOptions,
} from 'node:child_process';
import { SpawnError, errorMessage } from '@tunnelbot/core';

// ── Types ────────────────────────────────────────────────────────────────

export interface ExitOutcome {
  code: number | null;
  signal: NodeJS.Signals | null;
}

export interface AgentProcess {
  readonly pid: number | undefined;
  /** Ask the process to stop. A no-op once it has exited. */
  terminate(): void;
  waitForExit(): Promise<ExitOutcome>;
}

export type SpawnFn = (
  command: string,
  args: readonly string[],
  options: SpawnOptions,
) => ChildProcess;

export interface SpawnAgentOptions {
  binaryPath: string;
  args: readonly string[];
  /** Grace period between SIGTERM and SIGKILL. Default 5 000 ms. */
  killTimeoutMs?: number;
  /** Options forwarded to child_process.spawn. */
  spawnOptions?: SpawnOptions;
  /** Receives errors the process emits after it started. */
  onError?: (err: Error) => void;
  spawn?: SpawnFn;
}

export const DEFAULT_KILL_TIMEOUT_MS = 5_000;

// ── ChildAgentProcess ────────────────────────────────────────────────────

class ChildAgentProcess implements AgentProcess {
  private outcome: ExitOutcome | null = null;
  private forceKillTimer: ReturnType<typeof setTimeout> | null = null;
  private readonly exit: Promise<ExitOutcome>;

  constructor(
    private readonly proc: ChildProcess,
    private readonly killTimeoutMs: number,
  ) {
    this.exit = new Promise<ExitOutcome>((resolve) => {
      proc.once('exit', (code, signal) => {
        this.outcome = { code, signal };
        if (this.forceKillTimer) {
          clearTimeout(this.forceKillTimer);
          this.forceKillTimer = null;
        }
        resolve(this.outcome);
      });
    });
  }

  get pid(): number | undefined {
    return this.proc.pid;
  }

  terminate(): void {
    if (this.outcome || this.forceKillTimer) return;

    // SIGTERM first, SIGKILL if the agent ignores it.
    this.proc.kill('SIGTERM');
    this.forceKillTimer = setTimeout(() => {
      if (!this.outcome) {
        this.proc.kill('SIGKILL');
      }
    }, this.killTimeoutMs);
    this.forceKillTimer.unref();
  }

  waitForExit(): Promise<ExitOutcome> {
    return this.exit;
  }
}

// ── Spawning ─────────────────────────────────────────────────────────────

/**
 * Spawn the agent and resolve once the OS confirms the process started.
 * Rejects with SpawnError when it could not be started (missing binary,
 * permissions, ...).
 */
export async function spawnAgentProcess(options: SpawnAgentOptions): Promise<AgentProcess> {
  const spawnFn = options.spawn ?? spawnChild;
  const context = { args: [...options.args] };

  let proc: ChildProcess;
  try {
    proc = spawnFn(options.binaryPath, options.args, {
      stdio: 'ignore',
      ...options.spawnOptions,
    });
  } catch (err) {
    throw new SpawnError(errorMessage(err), options.binaryPath, context);
  }

  const agent = new ChildAgentProcess(proc, options.killTimeoutMs ?? DEFAULT_KILL_TIMEOUT_MS);

  await new Promise<void>((resolve, reject) => {
    const onSpawn = () => {
      cleanup();
      resolve();
    };
    const onError = (err: Error) => {
      cleanup();
      reject(new SpawnError(err.message, options.binaryPath, context));
    };
    const cleanup = () => {
      proc.off('spawn', onSpawn);
      proc.off('error', onError);
    };
    proc.once('spawn', onSpawn);
    proc.once('error', onError);
  });

  proc.on('error', (err) => {
    options.onError?.(err);
  });

  return agent;
}

/** Null for a clean exit, otherwise a short description of how it ended. */
export function describeExit(outcome: ExitOutcome): string | null {
  if (outcome.signal) return `killed by signal ${outcome.signal}`;
  if (outcome.code === 0) return null;
  return `exited with code ${outcome.code ?? 'unknown'}`;
}
