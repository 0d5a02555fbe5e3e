/**
 * Start command -- run the bot until interrupted.
 *
 * Wires the pieces together: Telegram transport → EventLoop (with the
 * OperatorGate) → ConversationRouter → TunnelProcessController. The process
 * then stays alive on the transport's poll timer; SIGINT/SIGTERM end it
 * without touching a running agent.
 */

import type {
  BotIdentity,
  IChatTransport,
  IObserver,
  ITunnelStatusClient,
  TunnelProfile,
  TunnelbotConfig,
} from '@tunnelbot/core';
import { errorMessage } from '@tunnelbot/core';
import { TelegramTransport } from '@tunnelbot/channels';
import { ConversationRouter, EventLoop } from '@tunnelbot/gateway';
import { createObserver } from '@tunnelbot/observability';
import { OperatorGate } from '@tunnelbot/security';
import { NgrokStatusClient, TunnelProcessController, type ProcessLauncher } from '@tunnelbot/tunnels';
import { getConfigPath, getProfiles, loadConfig } from '../config.js';
import { BOLD, CROSS, CYAN, DIM, RED, RESET, WARN, kvRow, sectionHeader } from '../ui.js';

// ---------------------------------------------------------------------------
// Composition
// ---------------------------------------------------------------------------

export interface BotOverrides {
  transport?: IChatTransport;
  statusClient?: ITunnelStatusClient;
  launcher?: ProcessLauncher;
  observer?: IObserver;
}

export interface Bot {
  transport: IChatTransport;
  controller: TunnelProcessController;
  loop: EventLoop;
  observer: IObserver;
  profiles: readonly TunnelProfile[];
}

export function createBot(config: TunnelbotConfig, overrides: BotOverrides = {}): Bot {
  const observer =
    overrides.observer ??
    createObserver({
      observers: config.observability.observers,
      logLevel: config.verbose ? 'debug' : config.observability.logLevel,
    });

  const profiles = getProfiles(config);

  const controller = new TunnelProcessController({
    binaryPath: config.agent.binaryPath,
    settleDelayMs: config.agent.settleDelaySeconds * 1000,
    statusClient:
      overrides.statusClient ?? new NgrokStatusClient({ baseUrl: config.agent.statusUrl, verbose: config.verbose }),
    launcher: overrides.launcher,
    observer,
  });

  const transport =
    overrides.transport ??
    new TelegramTransport({
      token: config.telegram.token,
      pollIntervalMs: config.telegram.pollIntervalSeconds * 1000,
      apiBaseUrl: config.telegram.apiBaseUrl,
    });

  const loop = new EventLoop({
    transport,
    router: new ConversationRouter(profiles, controller),
    gate: new OperatorGate({ operators: config.operators }),
    observer,
  });

  return { transport, controller, loop, observer, profiles };
}

// ---------------------------------------------------------------------------
// CLI entry point
// ---------------------------------------------------------------------------

export async function start(_args: string[], overrides: BotOverrides = {}): Promise<Bot | undefined> {
  let config: TunnelbotConfig;
  try {
    config = loadConfig();
  } catch (err) {
    console.error(`\n  ${RED}Failed to load config:${RESET} ${errorMessage(err)}`);
    console.error(`  ${DIM}Run ${CYAN}tunnelbot init${DIM} to create ${getConfigPath()}.${RESET}\n`);
    process.exitCode = 1;
    return undefined;
  }

  const bot = createBot(config, overrides);
  bot.loop.attach();

  let identity: BotIdentity;
  try {
    identity = await bot.transport.start();
  } catch (err) {
    console.error(`\n  ${CROSS} ${RED}Failed to register the bot:${RESET} ${errorMessage(err)}\n`);
    await bot.observer.flush?.();
    process.exitCode = 1;
    return undefined;
  }

  console.log('');
  console.log(sectionHeader('tunnelbot'));
  console.log(kvRow('Bot', identity.username ? `@${identity.username}` : identity.displayName));
  console.log(kvRow('Operators', config.operators.length > 0 ? config.operators.join(', ') : `${DIM}none${RESET}`));
  console.log(
    kvRow('Profiles', bot.profiles.length > 0 ? bot.profiles.map((p) => p.label).join(', ') : `${DIM}none${RESET}`),
  );
  console.log(kvRow('Agent', config.agent.binaryPath));
  console.log('');
  if (config.operators.length === 0) {
    console.log(`  ${WARN} ${BOLD}No operators configured.${RESET} ${DIM}Every message will be ignored.${RESET}`);
  }
  console.log(`  ${DIM}Listening for commands. Press Ctrl+C to exit.${RESET}\n`);

  return bot;
}
