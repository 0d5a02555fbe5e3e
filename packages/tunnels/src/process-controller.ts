/**
 * TunnelProcessController — owns the one tunneling agent process.
 *
 * States are `idle` (no process) and `running`. `launch()` and
 * `shutdown()` run under a single Mutex, in the order they were called,
 * and each runs to completion before the next starts:
 *
 *   launch:   [terminate + wait for previous] → spawn → settle → fetch status
 *   shutdown: terminate → wait for exit → clear
 *
 * The settle delay and the exit wait happen while holding the lock, so a
 * shutdown requested mid-launch waits for that launch to finish. The
 * process handle is only touched inside the lock, and a process is always
 * waited for after it was signalled, so at most one agent exists at any
 * instant and none is left unreaped.
 */

import type {
  IObserver,
  ITunnelController,
  ITunnelStatusClient,
  LifecycleEvent,
  LifecycleResult,
  TunnelEndpoint,
  TunnelProfile,
} from '@tunnelbot/core';
import { Mutex, sleep, errorMessage } from '@tunnelbot/core';
import { NoopObserver } from '@tunnelbot/observability';
import {
  spawnAgentProcess,
  describeExit,
  type AgentProcess,
  type ExitOutcome,
} from './agent-process.js';
import { formatEndpointReport } from './report.js';

// ── Types ────────────────────────────────────────────────────────────────

export type ProcessLauncher = (binaryPath: string, args: readonly string[]) => Promise<AgentProcess>;

export interface TunnelProcessControllerOptions {
  /** Path to the agent binary. */
  binaryPath: string;
  /** Pause between spawn and the status query. */
  settleDelayMs: number;
  statusClient: ITunnelStatusClient;
  /** Starts the agent. Defaults to spawnAgentProcess. */
  launcher?: ProcessLauncher;
  /** Defaults to a setTimeout-based sleep. */
  delay?: (ms: number) => Promise<void>;
  observer?: IObserver;
}

interface RunningAgent {
  readonly process: AgentProcess;
  readonly profile: string;
}

export const SHUTDOWN_OK_MESSAGE = 'Shutdown successfully';
export const NO_PROCESS_MESSAGE = 'Failed to shutdown: no running process';

// ── TunnelProcessController ──────────────────────────────────────────────

export class TunnelProcessController implements ITunnelController {
  private readonly lock = new Mutex();
  private readonly launcher: ProcessLauncher;
  private readonly delay: (ms: number) => Promise<void>;
  private readonly observer: IObserver;

  /** The single running agent. Read and written only under `lock`. */
  private current: RunningAgent | null = null;

  constructor(private readonly options: TunnelProcessControllerOptions) {
    this.observer = options.observer ?? new NoopObserver();
    this.delay = options.delay ?? sleep;
    this.launcher =
      options.launcher ??
      ((binaryPath, args) =>
        spawnAgentProcess({
          binaryPath,
          args,
          onError: (err) => this.observer.onError(err, { component: 'agent-process' }),
        }));
  }

  // ── Lifecycle operations ─────────────────────────────────────────────

  launch(profile: TunnelProfile): Promise<LifecycleResult> {
    return this.lock.runExclusive(async () => {
      if (this.current) {
        await this.reap(this.current);
        this.current = null;
      }

      let proc: AgentProcess;
      try {
        proc = await this.launcher(this.options.binaryPath, profile.args);
      } catch (err) {
        this.emit('spawn_failed', { profile: profile.label, details: { error: errorMessage(err) } });
        return { ok: false, reason: 'spawn_failed', message: `Failed to launch: ${errorMessage(err)}` };
      }

      this.current = { process: proc, profile: profile.label };
      this.emit('spawned', { profile: profile.label, pid: proc.pid, details: { args: [...profile.args] } });

      await this.delay(this.options.settleDelayMs);
      this.emit('settled', { profile: profile.label, pid: proc.pid });

      let endpoints: TunnelEndpoint[];
      try {
        endpoints = await this.options.statusClient.fetchStatus();
      } catch (err) {
        // The agent may well be healthy; it stays registered as running.
        this.emit('status_failed', { profile: profile.label, pid: proc.pid, details: { error: errorMessage(err) } });
        return {
          ok: false,
          reason: 'status_fetch_failed',
          message: `Failed to get tunnels status: ${errorMessage(err)}`,
        };
      }

      return { ok: true, message: formatEndpointReport(endpoints) };
    });
  }

  shutdown(): Promise<LifecycleResult> {
    return this.lock.runExclusive(async () => {
      if (!this.current) {
        return { ok: false, reason: 'no_process', message: NO_PROCESS_MESSAGE };
      }

      const outcome = await this.reap(this.current);
      this.current = null;

      const description = describeExit(outcome);
      return {
        ok: true,
        message: description ? `${SHUTDOWN_OK_MESSAGE}: ${description}` : SHUTDOWN_OK_MESSAGE,
      };
    });
  }

  // ── Internal ─────────────────────────────────────────────────────────

  private async reap(agent: RunningAgent): Promise<ExitOutcome> {
    const pid = agent.process.pid;
    this.emit('terminating', { profile: agent.profile, pid });
    agent.process.terminate();
    const outcome = await agent.process.waitForExit();
    this.emit('exited', {
      profile: agent.profile,
      pid,
      details: { code: outcome.code, signal: outcome.signal },
    });
    return outcome;
  }

  private emit(type: LifecycleEvent['type'], fields: Omit<LifecycleEvent, 'type' | 'timestamp'>): void {
    this.observer.onLifecycle({ type, ...fields, timestamp: new Date() });
  }
}
