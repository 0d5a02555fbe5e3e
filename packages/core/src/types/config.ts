/**
 * TunnelbotConfig — the shape of ~/.tunnelbot/config.json after defaults,
 * env resolution and validation. Loaded once and frozen.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface TelegramConfig {
  /** Bot API token. Usually written as "${TELEGRAM_BOT_TOKEN}". */
  token: string;
  /** Seconds between getUpdates polls. Must be > 0. */
  pollIntervalSeconds: number;
  /** Override for the Bot API base URL. */
  apiBaseUrl?: string;
}

export interface AgentConfig {
  /** Path to the tunneling agent binary. */
  binaryPath: string;
  /** Base URL of the agent's local status API. */
  statusUrl: string;
  /** Pause after spawn before the first status poll. */
  settleDelaySeconds: number;
}

export interface ObservabilitySection {
  observers: string[];
  logLevel: LogLevel;
}

export interface TunnelbotConfig {
  telegram: TelegramConfig;
  /** Telegram usernames allowed to talk to the bot. */
  operators: string[];
  agent: AgentConfig;
  /** Profile label → launch argument string, in display order. */
  profiles: Record<string, string>;
  observability: ObservabilitySection;
  verbose: boolean;
}
