/**
 * TelegramTransport -- the chat transport over the Telegram Bot API.
 *
 * Uses plain fetch() against https://api.telegram.org. Updates arrive by
 * polling getUpdates on a fixed interval with an advancing offset; any
 * webhook left registered on the bot is deleted at start, since Telegram
 * refuses getUpdates while one is set.
 *
 * Messages become `text` events and callback queries (inline button
 * presses) become `callback` events. Everything else is ignored.
 */

import type {
  IChatTransport,
  BotIdentity,
  InboundEvent,
  InlineButton,
  Keyboard,
  MessageRef,
  Sender,
} from '@tunnelbot/core';
import { ChannelError, errorMessage } from '@tunnelbot/core';

export const TELEGRAM_API_BASE = 'https://api.telegram.org';
export const DEFAULT_POLL_INTERVAL_MS = 3_000;

export interface TelegramTransportConfig {
  /** Bot token from @BotFather. */
  token: string;
  pollIntervalMs?: number;
  /** Override for a local Bot API server. */
  apiBaseUrl?: string;
}

type Payload = Record<string, unknown>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function idOf(value: unknown): string | undefined {
  return typeof value === 'number' || typeof value === 'string' ? String(value) : undefined;
}

function stringOf(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function senderOf(from: unknown): Sender {
  if (!isRecord(from)) return {};
  return {
    operatorId: stringOf(from['username']),
    displayName: stringOf(from['first_name']),
  };
}

function messageRefOf(message: unknown): MessageRef | undefined {
  if (!isRecord(message)) return undefined;
  const chat = message['chat'];
  if (!isRecord(chat)) return undefined;
  const chatId = idOf(chat['id']);
  const messageId = idOf(message['message_id']);
  if (chatId === undefined || messageId === undefined) return undefined;
  return { chatId, messageId };
}

function timestampOf(date: unknown): Date {
  return typeof date === 'number' ? new Date(date * 1000) : new Date();
}

export class TelegramTransport implements IChatTransport {
  readonly id = 'telegram';

  private readonly pollIntervalMs: number;
  private readonly apiBase: string;
  private eventHandler: ((event: InboundEvent) => void) | null = null;
  private errorHandler: ((error: Error) => void) | null = null;
  private pollTimer: ReturnType<typeof setTimeout> | null = null;
  private running = false;
  private offset = 0;

  constructor(private readonly config: TelegramTransportConfig) {
    this.pollIntervalMs = config.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.apiBase = (config.apiBaseUrl ?? TELEGRAM_API_BASE).replace(/\/+$/, '');
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  async start(): Promise<BotIdentity> {
    if (!this.config.token) {
      throw new ChannelError('Telegram transport requires a "token"', this.id);
    }
    if (!(this.pollIntervalMs > 0)) {
      throw new ChannelError(`Telegram poll interval must be positive, got ${this.pollIntervalMs}`, this.id);
    }

    const me = await this.call('getMe', {});
    if (!isRecord(me) || idOf(me['id']) === undefined) {
      throw new ChannelError('Telegram API error: getMe returned no bot identity', this.id);
    }
    const username = stringOf(me['username']);
    const identity: BotIdentity = {
      id: String(me['id']),
      username,
      displayName: stringOf(me['first_name']) ?? username ?? String(me['id']),
    };

    await this.call('deleteWebhook', {});

    this.running = true;
    this.schedulePoll(0);
    return identity;
  }

  async stop(): Promise<void> {
    this.running = false;
    if (this.pollTimer) {
      clearTimeout(this.pollTimer);
      this.pollTimer = null;
    }
  }

  onEvent(handler: (event: InboundEvent) => void): void {
    this.eventHandler = handler;
  }

  onError(handler: (error: Error) => void): void {
    this.errorHandler = handler;
  }

  // ---------------------------------------------------------------------------
  // Outbound
  // ---------------------------------------------------------------------------

  async sendMessage(chatId: string, text: string, keyboard?: Keyboard): Promise<void> {
    const payload: Payload = { chat_id: chatId, text };
    if (keyboard) payload['reply_markup'] = this.replyMarkup(keyboard);
    await this.call('sendMessage', payload);
  }

  async sendTypingIndicator(chatId: string): Promise<void> {
    await this.call('sendChatAction', { chat_id: chatId, action: 'typing' });
  }

  async answerCallback(callbackId: string, text?: string): Promise<void> {
    const payload: Payload = { callback_query_id: callbackId };
    if (text !== undefined) payload['text'] = text;
    await this.call('answerCallbackQuery', payload);
  }

  async editMessageText(ref: MessageRef, text: string): Promise<void> {
    // No reply_markup: Telegram drops the inline keyboard.
    await this.call('editMessageText', {
      chat_id: ref.chatId,
      message_id: Number(ref.messageId),
      text,
    });
  }

  // ---------------------------------------------------------------------------
  // Inbound
  // ---------------------------------------------------------------------------

  /** Map one raw Update to an event and hand it to the event handler. */
  handleUpdate(update: unknown): void {
    if (!isRecord(update)) return;

    const event = this.toEvent(update);
    if (!event || !this.eventHandler) return;

    try {
      this.eventHandler(event);
    } catch (err) {
      this.reportError(err);
    }
  }

  private toEvent(update: Record<string, unknown>): InboundEvent | undefined {
    const message = update['message'];
    if (isRecord(message)) {
      const chat = messageRefOf(message);
      if (!chat) return undefined;
      return {
        kind: 'text',
        chat,
        from: senderOf(message['from']),
        text: stringOf(message['text']) ?? '',
        timestamp: timestampOf(message['date']),
      };
    }

    const query = update['callback_query'];
    if (isRecord(query)) {
      const callbackId = idOf(query['id']);
      // Queries from inline-mode messages carry no message to edit.
      const origin = messageRefOf(query['message']);
      if (callbackId === undefined || !origin) return undefined;
      return {
        kind: 'callback',
        callbackId,
        token: stringOf(query['data']) ?? '',
        message: origin,
        from: senderOf(query['from']),
        timestamp: new Date(),
      };
    }

    return undefined;
  }

  private schedulePoll(delayMs: number): void {
    if (!this.running) return;
    this.pollTimer = setTimeout(() => {
      this.pollTimer = null;
      void this.pollOnce().finally(() => this.schedulePoll(this.pollIntervalMs));
    }, delayMs);
  }

  private async pollOnce(): Promise<void> {
    try {
      const updates = await this.call('getUpdates', {
        offset: this.offset,
        timeout: 0,
        allowed_updates: ['message', 'callback_query'],
      });
      if (!Array.isArray(updates)) {
        throw new ChannelError('Telegram API error: getUpdates returned no update list', this.id);
      }
      for (const update of updates) {
        const updateId = isRecord(update) ? update['update_id'] : undefined;
        if (typeof updateId === 'number') {
          this.offset = Math.max(this.offset, updateId + 1);
        }
        if (this.running) this.handleUpdate(update);
      }
    } catch (err) {
      this.reportError(err);
    }
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private replyMarkup(keyboard: Keyboard): Payload {
    if (keyboard.type === 'reply') {
      return {
        keyboard: keyboard.rows.map((row) => row.map((text) => ({ text }))),
        resize_keyboard: true,
      };
    }
    return {
      inline_keyboard: keyboard.rows.map((row) =>
        row.map((button: InlineButton) => ({ text: button.text, callback_data: button.token })),
      ),
    };
  }

  /** Call a Bot API method and return its `result`. */
  private async call(method: string, payload: Payload): Promise<unknown> {
    const url = `${this.apiBase}/bot${this.config.token}/${method}`;

    let res: Response;
    try {
      res = await fetch(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(payload),
      });
    } catch (err) {
      throw new ChannelError(`Telegram API request failed: ${method}: ${errorMessage(err)}`, this.id, { method });
    }

    let body: unknown;
    try {
      body = await res.json();
    } catch (err) {
      throw new ChannelError(
        `Telegram API error: ${method} responded with HTTP ${res.status}`,
        this.id,
        { method, status: res.status, cause: errorMessage(err) },
      );
    }

    if (!isRecord(body) || body['ok'] !== true) {
      const description = isRecord(body) ? stringOf(body['description']) : undefined;
      throw new ChannelError(
        `Telegram API error: ${description ?? `${method} responded with HTTP ${res.status}`}`,
        this.id,
        { method, status: res.status },
      );
    }
    return body['result'];
  }

  private reportError(err: unknown): void {
    const error = err instanceof Error ? err : new ChannelError(errorMessage(err), this.id);
    this.errorHandler?.(error);
  }
}
