/**
 * Init command -- write a starter ~/.tunnelbot/config.json.
 *
 * Refuses to overwrite an existing file unless --force is given.
 */

import { configExists, getConfigPath, getDefaultConfig, saveConfig } from '../config.js';
import { CHECK, CYAN, DIM, RESET, YELLOW } from '../ui.js';

export async function init(args: string[]): Promise<void> {
  const force = args.includes('--force');

  if (configExists() && !force) {
    console.log(`\n  ${YELLOW}Config already exists:${RESET} ${getConfigPath()}`);
    console.log(`  ${DIM}Use ${CYAN}tunnelbot init --force${DIM} to overwrite it.${RESET}\n`);
    return;
  }

  saveConfig(getDefaultConfig());

  console.log(`\n  ${CHECK} Wrote ${getConfigPath()}`);
  console.log(`  ${DIM}Next: add your Telegram username to "operators", a profile such as${RESET}`);
  console.log(`  ${DIM}"web": "http 8080" to "profiles", and export TELEGRAM_BOT_TOKEN.${RESET}\n`);
}
