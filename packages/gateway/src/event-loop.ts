/**
 * EventLoop -- connects a chat transport to the ConversationRouter.
 *
 * For every inbound event: check the sender against the OperatorGate,
 * show a typing indicator, route, and deliver the reply. Events are
 * handled as they arrive; the controller's lock is what keeps lifecycle
 * work in order.
 *
 * Unauthorized senders and stale button presses get no reply at all.
 * A failed transport call abandons that interaction and is only logged.
 */

import type { IChatTransport, IObserver, InboundEvent } from '@tunnelbot/core';
import { NoopObserver } from '@tunnelbot/observability';
import type { OperatorGate } from '@tunnelbot/security';
import type { ConversationRouter, RouterReply } from './router.js';

export interface EventLoopOptions {
  transport: IChatTransport;
  router: ConversationRouter;
  gate: Pick<OperatorGate, 'authorize'>;
  observer?: IObserver;
}

function chatIdOf(event: InboundEvent): string {
  return event.kind === 'text' ? event.chat.chatId : event.message.chatId;
}

function payloadLength(event: InboundEvent): number {
  return event.kind === 'text' ? event.text.length : event.token.length;
}

export class EventLoop {
  private readonly observer: IObserver;
  private readonly pending = new Set<Promise<void>>();

  constructor(private readonly options: EventLoopOptions) {
    this.observer = options.observer ?? new NoopObserver();
  }

  /** Subscribe to the transport's events and errors. */
  attach(): void {
    const { transport } = this.options;
    transport.onEvent((event) => {
      const task = this.dispatch(event);
      this.pending.add(task);
      void task.finally(() => this.pending.delete(task));
    });
    transport.onError((error) => {
      this.observer.onError(error, { component: 'transport', channel: transport.id });
    });
  }

  /** Resolves once every event handed over so far has been handled. */
  async drain(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending]);
    }
  }

  /** Handle one event end to end. Never rejects. */
  async dispatch(event: InboundEvent): Promise<void> {
    const { transport, gate, router } = this.options;
    const operatorId = event.from.operatorId;

    if (!gate.authorize(operatorId)) {
      this.observer.onSecurityEvent({
        type: 'unauthorized',
        details: { operatorId: operatorId ?? null, displayName: event.from.displayName ?? null, kind: event.kind },
        timestamp: new Date(),
      });
      return;
    }

    this.observer.onChannelMessage({
      channelId: transport.id,
      direction: 'inbound',
      kind: event.kind,
      operatorId,
      messageLength: payloadLength(event),
      timestamp: new Date(),
    });

    const chatId = chatIdOf(event);
    void transport.sendTypingIndicator(chatId).catch((err: unknown) => {
      this.reportError(err, { action: 'sendTypingIndicator', chatId });
    });

    let reply: RouterReply;
    try {
      reply = await router.route(event);
    } catch (err) {
      this.reportError(err, { action: 'route', kind: event.kind });
      return;
    }

    await this.deliver(reply, operatorId);
  }

  // -------------------------------------------------------------------------
  // Private helpers
  // -------------------------------------------------------------------------

  private async deliver(reply: RouterReply, operatorId: string | undefined): Promise<void> {
    const { transport } = this.options;

    switch (reply.kind) {
      case 'drop':
        this.observer.onSecurityEvent({
          type: 'stale_selection',
          details: { operatorId: operatorId ?? null, reason: reply.reason },
          timestamp: new Date(),
        });
        return;

      case 'message':
        try {
          await transport.sendMessage(reply.chatId, reply.text, reply.keyboard);
        } catch (err) {
          this.reportError(err, { action: 'sendMessage', chatId: reply.chatId });
          return;
        }
        this.recordOutbound('text', operatorId, reply.text);
        return;

      case 'callback':
        try {
          await transport.answerCallback(reply.callbackId, reply.toast);
        } catch (err) {
          this.reportError(err, { action: 'answerCallback', callbackId: reply.callbackId });
          return;
        }
        try {
          await transport.editMessageText(reply.edit.ref, reply.edit.text);
        } catch (err) {
          this.reportError(err, { action: 'editMessageText', chatId: reply.edit.ref.chatId });
          return;
        }
        this.recordOutbound('callback', operatorId, reply.edit.text);
        return;
    }
  }

  private recordOutbound(kind: 'text' | 'callback', operatorId: string | undefined, text: string): void {
    this.observer.onChannelMessage({
      channelId: this.options.transport.id,
      direction: 'outbound',
      kind,
      operatorId,
      messageLength: text.length,
      timestamp: new Date(),
    });
  }

  private reportError(err: unknown, context: Record<string, unknown>): void {
    const error = err instanceof Error ? err : new Error(String(err));
    this.observer.onError(error, { component: 'event-loop', channel: this.options.transport.id, ...context });
  }
}
