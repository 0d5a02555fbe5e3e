/**
 * ConsoleObserver — structured console logging with ANSI color coding.
 *
 * Formats observability events as human-readable console output, respecting
 * the configured log level. Lifecycle events carry the profile and pid of the
 * agent process; security events name the offending operator.
 */

import type {
  IObserver,
  LifecycleEvent,
  LifecycleEventType,
  ChannelMessageEvent,
  SecurityEvent,
  LogLevel,
} from '@tunnelbot/core';

// ---------------------------------------------------------------------------
// ANSI escape codes
// ---------------------------------------------------------------------------

const RESET = '\x1b[0m';
const BOLD = '\x1b[1m';
const DIM = '\x1b[2m';

const FG = {
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
  white: '\x1b[37m',
  gray: '\x1b[90m',
} as const;

// ---------------------------------------------------------------------------
// Log-level gate
// ---------------------------------------------------------------------------

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

// ---------------------------------------------------------------------------
// Lifecycle event levels
// ---------------------------------------------------------------------------

const LIFECYCLE_LEVEL: Record<LifecycleEventType, LogLevel> = {
  spawned: 'info',
  settled: 'debug',
  terminating: 'debug',
  exited: 'info',
  status_failed: 'warn',
  spawn_failed: 'error',
};

const LEVEL_COLOR: Record<LogLevel, string> = {
  debug: FG.gray,
  info: FG.green,
  warn: FG.yellow,
  error: FG.red,
};

// ---------------------------------------------------------------------------
// ConsoleObserver
// ---------------------------------------------------------------------------

export class ConsoleObserver implements IObserver {
  private readonly minLevel: number;

  constructor(logLevel: LogLevel = 'info') {
    this.minLevel = LEVEL_RANK[logLevel];
  }

  // ---- helpers ------------------------------------------------------------

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= this.minLevel;
  }

  private timestamp(): string {
    return new Date().toISOString();
  }

  private tag(label: string, color: string): string {
    return `${color}${BOLD}[${label}]${RESET}`;
  }

  private write(level: LogLevel, line: string): void {
    if (level === 'error') console.error(line);
    else if (level === 'warn') console.warn(line);
    else console.log(line);
  }

  // ---- IObserver ----------------------------------------------------------

  onLifecycle(event: LifecycleEvent): void {
    const level = LIFECYCLE_LEVEL[event.type];
    if (!this.shouldLog(level)) return;
    const details =
      event.details && Object.keys(event.details).length > 0
        ? ` ${DIM}details=${RESET}${JSON.stringify(event.details)}`
        : '';
    this.write(
      level,
      `${DIM}${this.timestamp()}${RESET} ${this.tag('AGENT', FG.cyan)} ${LEVEL_COLOR[level]}${event.type}${RESET}` +
        (event.profile !== undefined ? ` ${DIM}profile=${RESET}${event.profile}` : '') +
        (event.pid !== undefined ? ` ${DIM}pid=${RESET}${event.pid}` : '') +
        details,
    );
  }

  onChannelMessage(event: ChannelMessageEvent): void {
    if (!this.shouldLog('debug')) return;
    const arrow = event.direction === 'inbound' ? `${FG.green}>>>${RESET}` : `${FG.yellow}<<<${RESET}`;
    console.log(
      `${DIM}${this.timestamp()}${RESET} ${this.tag('MSG', FG.white)} ${arrow}` +
        ` ${DIM}channel=${RESET}${event.channelId}` +
        ` ${DIM}kind=${RESET}${event.kind}` +
        (event.operatorId ? ` ${DIM}operator=${RESET}${event.operatorId}` : '') +
        ` ${DIM}len=${RESET}${event.messageLength}`,
    );
  }

  onSecurityEvent(event: SecurityEvent): void {
    if (!this.shouldLog('warn')) return;
    const color = event.type === 'unauthorized' ? FG.red : FG.yellow;
    console.warn(
      `${DIM}${this.timestamp()}${RESET} ${this.tag('SECURITY', FG.red)} ${color}${event.type}${RESET}` +
        ` ${DIM}details=${RESET}${JSON.stringify(event.details)}`,
    );
  }

  onError(error: Error, context: Record<string, unknown>): void {
    if (!this.shouldLog('error')) return;
    const ctx = Object.keys(context).length > 0 ? ` ${DIM}ctx=${RESET}${JSON.stringify(context)}` : '';
    console.error(
      `${DIM}${this.timestamp()}${RESET} ${this.tag('ERROR', FG.red)} ${BOLD}${error.name}${RESET}: ${error.message}${ctx}`,
    );
  }

  async flush(): Promise<void> {
    // Console output is unbuffered; nothing to flush.
  }
}
