/**
 * @tunnelbot/tunnels — the tunneling agent: spawning it, reading its local
 * status API, and the controller that keeps at most one of it running.
 */

export { NgrokStatusClient, parseTunnelList, DEFAULT_STATUS_URL } from './status-client.js';
export type { NgrokStatusClientConfig } from './status-client.js';

export { spawnAgentProcess, describeExit, DEFAULT_KILL_TIMEOUT_MS } from './agent-process.js';
export type { AgentProcess, ExitOutcome, SpawnAgentOptions, SpawnFn } from './agent-process.js';

export {
  TunnelProcessController,
  SHUTDOWN_OK_MESSAGE,
  NO_PROCESS_MESSAGE,
} from './process-controller.js';
export type {
  TunnelProcessControllerOptions,
  ProcessLauncher,
} from './process-controller.js';

export { parseProfiles, findProfile, splitArgs, MAX_LABEL_BYTES } from './profiles.js';
export type { ParseProfilesOptions } from './profiles.js';

export { formatEndpointReport, NO_TUNNELS_MESSAGE } from './report.js';

export type {
  ITunnelController,
  ITunnelStatusClient,
  TunnelEndpoint,
  TunnelProfile,
  LifecycleResult,
} from '@tunnelbot/core';
