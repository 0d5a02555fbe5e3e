/**
 * Profiles command -- list the configured tunnel profiles in the order
 * the bot offers them.
 */

import type { TunnelbotConfig } from '@tunnelbot/core';
import { errorMessage } from '@tunnelbot/core';
import { getConfigPath, getProfiles, loadConfig } from '../config.js';
import { CYAN, DIM, RED, RESET, kvRow, sectionHeader } from '../ui.js';

export async function profiles(_args: string[]): Promise<void> {
  let config: TunnelbotConfig;
  try {
    config = loadConfig();
  } catch (err) {
    console.error(`\n  ${RED}Failed to load config:${RESET} ${errorMessage(err)}`);
    console.error(`  ${DIM}Run ${CYAN}tunnelbot init${DIM} to create one.${RESET}\n`);
    process.exitCode = 1;
    return;
  }

  const list = getProfiles(config);

  console.log('');
  console.log(sectionHeader('Profiles'));

  if (list.length === 0) {
    console.log(`  ${DIM}No profiles configured. Add entries under "profiles" in ${getConfigPath()}.${RESET}\n`);
    return;
  }

  const width = Math.max(...list.map((p) => p.label.length)) + 2;
  for (const profile of list) {
    console.log(kvRow(profile.label, `${config.agent.binaryPath} ${profile.args.join(' ')}`, width));
  }
  console.log('');
}
