/**
 * @tunnelbot/channels -- chat transports the bot can run on.
 */

export { TelegramTransport, TELEGRAM_API_BASE, DEFAULT_POLL_INTERVAL_MS } from './telegram.js';
export type { TelegramTransportConfig } from './telegram.js';
