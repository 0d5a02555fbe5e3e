/**
 * Tunnel contracts — profiles, endpoints, status polling and the
 * lifecycle controller that owns the agent process.
 */

export interface TunnelProfile {
  /** Display label, also used as the callback token of its button. */
  label: string;
  /** Ordered launch arguments, e.g. ['http', '8080']. */
  args: readonly string[];
}

export interface TunnelEndpoint {
  name: string;
  publicUrl: string;
  protocol: string;
}

export interface ITunnelStatusClient {
  /** One request to the agent's status API. Rejects with StatusFetchError. */
  fetchStatus(): Promise<TunnelEndpoint[]>;
}

export type LifecycleFailure = 'spawn_failed' | 'status_fetch_failed' | 'no_process';

export type LifecycleResult =
  | { ok: true; message: string }
  | { ok: false; reason: LifecycleFailure; message: string };

export interface ITunnelController {
  launch(profile: TunnelProfile): Promise<LifecycleResult>;
  shutdown(): Promise<LifecycleResult>;
}
