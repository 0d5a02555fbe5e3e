/**
 * Error hierarchy shared by every tunnelbot package.
 *
 * Each subclass pins a stable `code` and folds its identifying field
 * (binary, channel, reason) into `context` so observers can log it without
 * knowing the concrete class.
 */

export class TunnelbotError extends Error {
  readonly code: string;
  readonly context?: Record<string, unknown>;

  constructor(message: string, code: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'TunnelbotError';
    this.code = code;
    this.context = context;
  }
}

export class ConfigError extends TunnelbotError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', context);
    this.name = 'ConfigError';
  }
}

/** The tunneling agent binary could not be started. */
export class SpawnError extends TunnelbotError {
  readonly binary: string;

  constructor(message: string, binary: string, context?: Record<string, unknown>) {
    super(message, 'SPAWN_ERROR', { ...context, binary });
    this.name = 'SpawnError';
    this.binary = binary;
  }
}

export type StatusFetchFailure = 'network' | 'http' | 'payload';

/** The agent's local status API could not be read or understood. */
export class StatusFetchError extends TunnelbotError {
  readonly reason: StatusFetchFailure;

  constructor(message: string, reason: StatusFetchFailure, context?: Record<string, unknown>) {
    super(message, 'STATUS_FETCH_ERROR', { ...context, reason });
    this.name = 'StatusFetchError';
    this.reason = reason;
  }
}

export class ChannelError extends TunnelbotError {
  readonly channel: string;

  constructor(message: string, channel: string, context?: Record<string, unknown>) {
    super(message, 'CHANNEL_ERROR', { ...context, channel });
    this.name = 'ChannelError';
    this.channel = channel;
  }
}

/** Human-readable text for anything thrown. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
