/**
 * IObserver — observability contract
 *
 * Structured logging for the process lifecycle, chat traffic, security
 * decisions and errors.
 */

export type LifecycleEventType =
  | 'spawned'
  | 'spawn_failed'
  | 'settled'
  | 'status_failed'
  | 'terminating'
  | 'exited';

export interface LifecycleEvent {
  type: LifecycleEventType;
  /** Profile label, when the event belongs to a launch. */
  profile?: string;
  pid?: number;
  details?: Record<string, unknown>;
  timestamp: Date;
}

export interface ChannelMessageEvent {
  channelId: string;
  direction: 'inbound' | 'outbound';
  kind: 'text' | 'callback';
  operatorId?: string;
  messageLength: number;
  timestamp: Date;
}

export interface SecurityEvent {
  type: 'unauthorized' | 'stale_selection';
  details: Record<string, unknown>;
  timestamp: Date;
}

export interface IObserver {
  onLifecycle(event: LifecycleEvent): void;
  onChannelMessage(event: ChannelMessageEvent): void;
  onSecurityEvent(event: SecurityEvent): void;
  onError(error: Error, context: Record<string, unknown>): void;
  flush?(): Promise<void>;
}
