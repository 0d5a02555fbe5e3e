import { describe, it, expect, vi, beforeEach, afterEach, afterAll } from 'vitest';
import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { init } from './init.js';

const TEST_HOME = join(tmpdir(), `tunnelbot-init-test-${Date.now()}-${Math.random().toString(36).slice(2, 8)}`);
const CONFIG_PATH = join(TEST_HOME, 'config.json');

describe('init command', () => {
  const log = vi.spyOn(console, 'log').mockImplementation(() => {});
  let savedHome: string | undefined;

  beforeEach(() => {
    savedHome = process.env['TUNNELBOT_HOME'];
    process.env['TUNNELBOT_HOME'] = TEST_HOME;
  });

  afterEach(() => {
    if (savedHome === undefined) delete process.env['TUNNELBOT_HOME'];
    else process.env['TUNNELBOT_HOME'] = savedHome;
    rmSync(TEST_HOME, { recursive: true, force: true });
  });

  afterAll(() => {
    log.mockRestore();
  });

  it('writes the default config', async () => {
    await init([]);

    expect(existsSync(CONFIG_PATH)).toBe(true);
    const written: unknown = JSON.parse(readFileSync(CONFIG_PATH, 'utf8'));
    expect(written).toMatchObject({
      telegram: { token: '${TELEGRAM_BOT_TOKEN}' },
      agent: { binaryPath: 'ngrok' },
      profiles: {},
    });
  });

  it('leaves an existing config alone', async () => {
    mkdirSync(TEST_HOME, { recursive: true });
    writeFileSync(CONFIG_PATH, '{"operators":["alice"]}');

    await init([]);

    expect(readFileSync(CONFIG_PATH, 'utf8')).toBe('{"operators":["alice"]}');
  });

  it('overwrites with --force', async () => {
    mkdirSync(TEST_HOME, { recursive: true });
    writeFileSync(CONFIG_PATH, '{"operators":["alice"]}');

    await init(['--force']);

    expect(readFileSync(CONFIG_PATH, 'utf8')).toContain('"binaryPath": "ngrok"');
  });
});
