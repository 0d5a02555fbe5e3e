/**
 * Status command -- print the agent's current public endpoints once.
 *
 * Reads the same local status API the bot reports from, so it works
 * whether the agent was started by the bot or by hand.
 */

import type { ITunnelStatusClient, TunnelbotConfig } from '@tunnelbot/core';
import { errorMessage } from '@tunnelbot/core';
import { NgrokStatusClient, formatEndpointReport } from '@tunnelbot/tunnels';
import { loadConfig } from '../config.js';
import { CROSS, CYAN, DIM, RED, RESET, sectionHeader } from '../ui.js';

export async function status(_args: string[], client?: ITunnelStatusClient): Promise<void> {
  let config: TunnelbotConfig;
  try {
    config = loadConfig();
  } catch (err) {
    console.error(`\n  ${RED}Failed to load config:${RESET} ${errorMessage(err)}`);
    console.error(`  ${DIM}Run ${CYAN}tunnelbot init${DIM} to create one.${RESET}\n`);
    process.exitCode = 1;
    return;
  }

  const statusClient = client ?? new NgrokStatusClient({ baseUrl: config.agent.statusUrl, verbose: config.verbose });

  console.log('');
  console.log(sectionHeader('Tunnels'));

  try {
    const endpoints = await statusClient.fetchStatus();
    for (const line of formatEndpointReport(endpoints).split('\n')) {
      console.log(`  ${line}`);
    }
    console.log('');
  } catch (err) {
    console.error(`  ${CROSS} ${RED}Failed to get tunnels status:${RESET} ${errorMessage(err)}\n`);
    process.exitCode = 1;
  }
}
