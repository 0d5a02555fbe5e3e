/**
 * Command dispatch for the tunnelbot binary.
 */

import { constants } from 'node:os';
import { init } from './commands/init.js';
import { profiles } from './commands/profiles.js';
import { start } from './commands/start.js';
import { status } from './commands/status.js';
import { BOLD, CYAN, DIM, RED, RESET } from './ui.js';

export const VERSION = '0.1.0';

const COMMANDS: Record<string, (args: string[]) => Promise<unknown>> = {
  start,
  status,
  profiles,
  init,
};

export function printHelp(): void {
  console.log(`
  ${CYAN}${BOLD}tunnelbot${RESET} ${DIM}v${VERSION}${RESET}
  Launch and stop an ngrok agent from Telegram.

  ${BOLD}Usage${RESET}
    tunnelbot [command]

  ${BOLD}Commands${RESET}
    start       Run the bot (default)
    status      Print the agent's current endpoints
    profiles    List configured tunnel profiles
    init        Write a starter config file
    help        Show this help

  ${BOLD}Options${RESET}
    --version   Print the version
`);
}

/** Run one CLI invocation. Failures are reported through process.exitCode. */
export async function run(argv: string[]): Promise<void> {
  const [command = 'start', ...rest] = argv;

  if (command === '--version' || command === '-v') {
    console.log(VERSION);
    return;
  }
  if (command === 'help' || command === '--help' || command === '-h') {
    printHelp();
    return;
  }

  const handler = COMMANDS[command];
  if (!handler) {
    console.error(`\n  ${RED}Unknown command:${RESET} ${command}`);
    printHelp();
    process.exitCode = 1;
    return;
  }

  await handler(rest);
}

export interface SignalTarget {
  once(signal: NodeJS.Signals, listener: () => void): unknown;
  exit(code: number): never;
}

/** Exit at once on SIGINT/SIGTERM, with the conventional 128 + signal code. */
export function installSignalHandlers(target: SignalTarget = process): void {
  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    target.once(signal, () => {
      target.exit(128 + constants.signals[signal]);
    });
  }
}
