/**
 * EventLoop tests. The transport is an in-process fake that records every
 * call; the router runs for real against a stub controller.
 */

import { describe, it, expect, vi } from 'vitest';
import type {
  BotIdentity,
  IChatTransport,
  IObserver,
  ITunnelController,
  InboundEvent,
  Keyboard,
  LifecycleResult,
  MessageRef,
  TunnelProfile,
} from '@tunnelbot/core';
import { ChannelError } from '@tunnelbot/core';
import { OperatorGate } from '@tunnelbot/security';
import { EventLoop } from './event-loop.js';
import { ConversationRouter, MAIN_KEYBOARD } from './router.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

type TransportMethod = 'sendMessage' | 'sendTypingIndicator' | 'answerCallback' | 'editMessageText';

class FakeTransport implements IChatTransport {
  readonly id = 'fake';
  readonly calls: string[] = [];
  readonly failing = new Set<TransportMethod>();
  private eventHandler: ((event: InboundEvent) => void) | null = null;
  private errorHandler: ((error: Error) => void) | null = null;

  async start(): Promise<BotIdentity> {
    return { id: '1', displayName: 'fake' };
  }

  async stop(): Promise<void> {}

  onEvent(handler: (event: InboundEvent) => void): void {
    this.eventHandler = handler;
  }

  onError(handler: (error: Error) => void): void {
    this.errorHandler = handler;
  }

  emit(event: InboundEvent): void {
    this.eventHandler?.(event);
  }

  emitError(error: Error): void {
    this.errorHandler?.(error);
  }

  async sendMessage(chatId: string, text: string, keyboard?: Keyboard): Promise<void> {
    this.record('sendMessage', `send ${chatId} ${text} [${keyboard?.type ?? 'none'}]`);
  }

  async sendTypingIndicator(chatId: string): Promise<void> {
    this.record('sendTypingIndicator', `typing ${chatId}`);
  }

  async answerCallback(callbackId: string, text?: string): Promise<void> {
    this.record('answerCallback', `answer ${callbackId} ${text ?? '-'}`);
  }

  async editMessageText(ref: MessageRef, text: string): Promise<void> {
    this.record('editMessageText', `edit ${ref.chatId}/${ref.messageId} ${text}`);
  }

  private record(method: TransportMethod, entry: string): void {
    if (this.failing.has(method)) {
      throw new ChannelError(`Telegram API error: ${method} rejected`, this.id);
    }
    this.calls.push(entry);
  }
}

function createObserver() {
  return {
    onLifecycle: vi.fn(),
    onChannelMessage: vi.fn(),
    onSecurityEvent: vi.fn(),
    onError: vi.fn(),
  } satisfies IObserver;
}

function createController(launch: () => Promise<LifecycleResult> = async () => ({
  ok: true,
  message: '▸ web: https://abc.ngrok.io',
})) {
  return {
    launch: vi.fn(async (_profile: TunnelProfile) => launch()),
    shutdown: vi.fn(async (): Promise<LifecycleResult> => ({ ok: true, message: 'Shutdown successfully' })),
  } satisfies ITunnelController;
}

function setup(controller = createController()) {
  const transport = new FakeTransport();
  const observer = createObserver();
  const router = new ConversationRouter([{ label: 'web', args: ['http', '8080'] }], controller);
  const loop = new EventLoop({
    transport,
    router,
    gate: new OperatorGate({ operators: ['alice'] }),
    observer,
  });
  return { transport, observer, controller, loop };
}

function text(value: string, operatorId: string | null = 'alice'): InboundEvent {
  return {
    kind: 'text',
    chat: { chatId: '42', messageId: '1' },
    from: operatorId === null ? {} : { operatorId },
    text: value,
    timestamp: new Date(),
  };
}

function press(token: string, operatorId: string | null = 'alice'): InboundEvent {
  return {
    kind: 'callback',
    callbackId: 'cb-1',
    token,
    message: { chatId: '42', messageId: '77' },
    from: operatorId === null ? {} : { operatorId },
    timestamp: new Date(),
  };
}

const flush = () => new Promise<void>((resolve) => setImmediate(resolve));

// ---------------------------------------------------------------------------
// Gate
// ---------------------------------------------------------------------------

describe('EventLoop gate', () => {
  it('drops text from unknown operators without a reply', async () => {
    const { transport, observer, loop } = setup();

    await loop.dispatch(text('/start', 'mallory'));

    expect(transport.calls).toEqual([]);
    expect(observer.onSecurityEvent).toHaveBeenCalledWith({
      type: 'unauthorized',
      details: { operatorId: 'mallory', displayName: null, kind: 'text' },
      timestamp: expect.any(Date),
    });
  });

  it('drops senders without a username', async () => {
    const { transport, observer, loop } = setup();

    await loop.dispatch(text('/start', null));

    expect(transport.calls).toEqual([]);
    expect(observer.onSecurityEvent.mock.calls[0]![0]).toMatchObject({
      type: 'unauthorized',
      details: { operatorId: null },
    });
  });

  it('drops button presses from unknown operators', async () => {
    const { transport, controller, loop } = setup();

    await loop.dispatch(press('web', 'mallory'));

    expect(transport.calls).toEqual([]);
    expect(controller.launch).not.toHaveBeenCalled();
  });

  it('accepts operators regardless of case and leading @', async () => {
    const { transport, loop } = setup();

    await loop.dispatch(text('/start', '@Alice'));

    expect(transport.calls).toEqual(['typing 42', 'send 42 Welcome [reply]']);
  });
});

// ---------------------------------------------------------------------------
// Replies
// ---------------------------------------------------------------------------

describe('EventLoop replies', () => {
  it('sends the typing indicator before the reply', async () => {
    const { transport, loop } = setup();

    await loop.dispatch(text('/launch'));

    expect(transport.calls).toEqual(['typing 42', 'send 42 Choose to launch [inline]']);
  });

  it('answers a cancel press and edits the prompt', async () => {
    const { transport, loop } = setup();

    await loop.dispatch(press('/cancel'));

    expect(transport.calls).toEqual(['typing 42', 'answer cb-1 -', 'edit 42/77 Canceled']);
  });

  it('launches on a profile press and shows the report', async () => {
    const { transport, controller, loop } = setup();

    await loop.dispatch(press('web'));

    expect(controller.launch).toHaveBeenCalledWith({ label: 'web', args: ['http', '8080'] });
    expect(transport.calls).toEqual([
      'typing 42',
      'answer cb-1 Launched: web',
      'edit 42/77 ▸ web: https://abc.ngrok.io',
    ]);
  });

  it('logs a stale press and sends nothing else', async () => {
    const { transport, observer, loop } = setup();

    await loop.dispatch(press('gone'));

    expect(transport.calls).toEqual(['typing 42']);
    expect(observer.onSecurityEvent).toHaveBeenCalledWith({
      type: 'stale_selection',
      details: { operatorId: 'alice', reason: 'unrecognized selection "gone"' },
      timestamp: expect.any(Date),
    });
  });

  it('records inbound and outbound traffic', async () => {
    const { observer, loop } = setup();

    await loop.dispatch(text('/start'));

    expect(observer.onChannelMessage.mock.calls.map(([e]) => [e.direction, e.kind, e.messageLength])).toEqual([
      ['inbound', 'text', 6],
      ['outbound', 'text', 7],
    ]);
  });
});

// ---------------------------------------------------------------------------
// Transport failures
// ---------------------------------------------------------------------------

describe('EventLoop transport failures', () => {
  it('still replies when the typing indicator fails', async () => {
    const { transport, observer, loop } = setup();
    transport.failing.add('sendTypingIndicator');

    await loop.dispatch(text('/start'));
    await flush();

    expect(transport.calls).toEqual(['send 42 Welcome [reply]']);
    expect(observer.onError).toHaveBeenCalledWith(expect.any(ChannelError), {
      component: 'event-loop',
      channel: 'fake',
      action: 'sendTypingIndicator',
      chatId: '42',
    });
  });

  it('logs a failed send without throwing', async () => {
    const { transport, observer, loop } = setup();
    transport.failing.add('sendMessage');

    await expect(loop.dispatch(text('/start'))).resolves.toBeUndefined();

    expect(observer.onError).toHaveBeenCalledTimes(1);
    expect(observer.onError.mock.calls[0]![0].message).toBe('Telegram API error: sendMessage rejected');
    expect(observer.onChannelMessage.mock.calls.map(([e]) => e.direction)).toEqual(['inbound']);
  });

  it('abandons the edit when the callback answer fails', async () => {
    const { transport, observer, loop } = setup();
    transport.failing.add('answerCallback');

    await loop.dispatch(press('/cancel'));

    expect(transport.calls).toEqual(['typing 42']);
    expect(observer.onError.mock.calls[0]![1]).toMatchObject({ action: 'answerCallback', callbackId: 'cb-1' });
  });

  it('logs a failed edit', async () => {
    const { transport, observer, loop } = setup();
    transport.failing.add('editMessageText');

    await loop.dispatch(press('/cancel'));

    expect(transport.calls).toEqual(['typing 42', 'answer cb-1 -']);
    expect(observer.onError.mock.calls[0]![1]).toMatchObject({ action: 'editMessageText', chatId: '42' });
  });
});

// ---------------------------------------------------------------------------
// attach / drain
// ---------------------------------------------------------------------------

describe('EventLoop.attach', () => {
  it('handles events from the transport', async () => {
    const { transport, loop } = setup();
    loop.attach();

    transport.emit(text('/start'));
    await loop.drain();

    expect(transport.calls).toEqual(['typing 42', 'send 42 Welcome [reply]']);
  });

  it('forwards transport errors to the observer', () => {
    const { transport, observer, loop } = setup();
    loop.attach();

    const error = new ChannelError('Telegram API error: Conflict', 'fake');
    transport.emitError(error);

    expect(observer.onError).toHaveBeenCalledWith(error, { component: 'transport', channel: 'fake' });
  });

  it('does not hold other events behind a slow launch', async () => {
    let finishLaunch: () => void = () => {};
    const controller = createController(
      () =>
        new Promise<LifecycleResult>((resolve) => {
          finishLaunch = () => resolve({ ok: true, message: 'No tunnels available' });
        }),
    );
    const { transport, loop } = setup(controller);
    loop.attach();

    transport.emit(press('web'));
    transport.emit(text('/start'));
    await flush();

    expect(transport.calls).toEqual(['typing 42', 'typing 42', 'send 42 Welcome [reply]']);

    finishLaunch();
    await loop.drain();

    expect(transport.calls.slice(3)).toEqual(['answer cb-1 Launched: web', 'edit 42/77 No tunnels available']);
  });
});
