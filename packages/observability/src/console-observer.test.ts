import { vi } from 'vitest';
import { ConsoleObserver } from './console-observer.js';
import type { LifecycleEvent, ChannelMessageEvent, SecurityEvent } from '@tunnelbot/core';

function makeLifecycle(overrides: Partial<LifecycleEvent> = {}): LifecycleEvent {
  return {
    type: 'spawned',
    profile: 'web',
    pid: 4242,
    timestamp: new Date(),
    ...overrides,
  };
}

describe('ConsoleObserver', () => {
  let consoleSpy: {
    log: ReturnType<typeof vi.spyOn>;
    error: ReturnType<typeof vi.spyOn>;
    warn: ReturnType<typeof vi.spyOn>;
  };

  beforeEach(() => {
    consoleSpy = {
      log: vi.spyOn(console, 'log').mockImplementation(() => {}),
      error: vi.spyOn(console, 'error').mockImplementation(() => {}),
      warn: vi.spyOn(console, 'warn').mockImplementation(() => {}),
    };
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('log level filtering', () => {
    it('logs info and above at "info" level', () => {
      const observer = new ConsoleObserver('info');
      observer.onLifecycle(makeLifecycle());
      expect(consoleSpy.log).toHaveBeenCalled();
    });

    it('suppresses info at "warn" level', () => {
      const observer = new ConsoleObserver('warn');
      observer.onLifecycle(makeLifecycle());
      expect(consoleSpy.log).not.toHaveBeenCalled();
    });

    it('suppresses debug lifecycle events at "info" level', () => {
      const observer = new ConsoleObserver('info');
      observer.onLifecycle(makeLifecycle({ type: 'terminating' }));
      expect(consoleSpy.log).not.toHaveBeenCalled();
    });

    it('logs everything at "debug" level', () => {
      const observer = new ConsoleObserver('debug');
      observer.onLifecycle(makeLifecycle({ type: 'settled' }));
      expect(consoleSpy.log).toHaveBeenCalled();
    });

    it('defaults to info', () => {
      const observer = new ConsoleObserver();
      observer.onLifecycle(makeLifecycle({ type: 'settled' }));
      observer.onLifecycle(makeLifecycle({ type: 'exited' }));
      expect(consoleSpy.log).toHaveBeenCalledTimes(1);
    });
  });

  describe('onLifecycle', () => {
    it('includes the event type, profile and pid', () => {
      const observer = new ConsoleObserver('info');
      observer.onLifecycle(makeLifecycle());
      const line = consoleSpy.log.mock.calls[0]![0] as string;
      expect(line).toContain('[AGENT]');
      expect(line).toContain('spawned');
      expect(line).toContain('web');
      expect(line).toContain('4242');
    });

    it('includes details when present', () => {
      const observer = new ConsoleObserver('info');
      observer.onLifecycle(makeLifecycle({ type: 'exited', details: { code: 0 } }));
      expect(consoleSpy.log).toHaveBeenCalledWith(expect.stringContaining('{"code":0}'));
    });

    it('writes spawn failures to stderr', () => {
      const observer = new ConsoleObserver('info');
      observer.onLifecycle(makeLifecycle({ type: 'spawn_failed', pid: undefined }));
      expect(consoleSpy.error).toHaveBeenCalledWith(expect.stringContaining('spawn_failed'));
      expect(consoleSpy.log).not.toHaveBeenCalled();
    });

    it('writes status failures as warnings', () => {
      const observer = new ConsoleObserver('info');
      observer.onLifecycle(makeLifecycle({ type: 'status_failed' }));
      expect(consoleSpy.warn).toHaveBeenCalledWith(expect.stringContaining('status_failed'));
    });
  });

  describe('onChannelMessage', () => {
    const event: ChannelMessageEvent = {
      channelId: 'telegram',
      direction: 'inbound',
      kind: 'text',
      operatorId: 'alice',
      messageLength: 7,
      timestamp: new Date(),
    };

    it('is suppressed at info level', () => {
      const observer = new ConsoleObserver('info');
      observer.onChannelMessage(event);
      expect(consoleSpy.log).not.toHaveBeenCalled();
    });

    it('logs direction, operator and length at debug level', () => {
      const observer = new ConsoleObserver('debug');
      observer.onChannelMessage(event);
      const line = consoleSpy.log.mock.calls[0]![0] as string;
      expect(line).toContain('>>>');
      expect(line).toContain('alice');
      expect(line).toContain('7');
    });
  });

  describe('onSecurityEvent', () => {
    const event: SecurityEvent = {
      type: 'unauthorized',
      details: { operatorId: 'mallory' },
      timestamp: new Date(),
    };

    it('logs to console.warn', () => {
      const observer = new ConsoleObserver('info');
      observer.onSecurityEvent(event);
      expect(consoleSpy.warn).toHaveBeenCalledWith(expect.stringContaining('unauthorized'));
      expect(consoleSpy.warn).toHaveBeenCalledWith(expect.stringContaining('mallory'));
    });

    it('is suppressed at error level', () => {
      const observer = new ConsoleObserver('error');
      observer.onSecurityEvent(event);
      expect(consoleSpy.warn).not.toHaveBeenCalled();
    });
  });

  describe('onError', () => {
    it('logs error name, message and context', () => {
      const observer = new ConsoleObserver('error');
      observer.onError(new TypeError('bad value'), { method: 'sendMessage' });
      const line = consoleSpy.error.mock.calls[0]![0] as string;
      expect(line).toContain('TypeError');
      expect(line).toContain('bad value');
      expect(line).toContain('{"method":"sendMessage"}');
    });

    it('omits context when empty', () => {
      const observer = new ConsoleObserver('info');
      observer.onError(new Error('boom'), {});
      const line = consoleSpy.error.mock.calls[0]![0] as string;
      expect(line).not.toContain('ctx=');
    });
  });

  it('flush resolves', async () => {
    const observer = new ConsoleObserver();
    await expect(observer.flush()).resolves.toBeUndefined();
  });
});
