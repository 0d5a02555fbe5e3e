/**
 * Shared CLI styling -- ANSI colors, indicators and the small layout
 * helpers the commands print with.
 */

// ---------------------------------------------------------------------------
// Colors
// ---------------------------------------------------------------------------

export const RESET = '\x1b[0m';
export const BOLD = '\x1b[1m';
export const DIM = '\x1b[2m';
export const GREEN = '\x1b[32m';
export const YELLOW = '\x1b[33m';
export const RED = '\x1b[31m';
export const CYAN = '\x1b[36m';

// ---------------------------------------------------------------------------
// Glyphs
// ---------------------------------------------------------------------------

export const BOX = {
  horizontal: '─',
} as const;

export const CHECK = `${GREEN}✓${RESET}`;
export const CROSS = `${RED}✗${RESET}`;
export const WARN = `${YELLOW}⚠${RESET}`;

// ---------------------------------------------------------------------------
// Layout
// ---------------------------------------------------------------------------

// eslint-disable-next-line no-control-regex
const ANSI_PATTERN = /\x1b\[[0-9;]*m/g;

/** Length of a string as it appears on the terminal. */
export function visibleLength(text: string): number {
  return text.replace(ANSI_PATTERN, '').length;
}

export function sectionHeader(title: string, width = 50): string {
  const rule = BOX.horizontal.repeat(Math.max(0, width - visibleLength(title) - 1));
  return `  ${CYAN}${BOLD}${title}${RESET} ${DIM}${rule}${RESET}`;
}

export function kvRow(label: string, value: string, labelWidth = 14): string {
  return `  ${BOLD}${label.padEnd(labelWidth)}${RESET}${value}`;
}
