/**
 * Tunnel profiles — configured label → argument-string pairs turned into
 * ordered, frozen TunnelProfile values.
 */

import type { TunnelProfile } from '@tunnelbot/core';
import { ConfigError } from '@tunnelbot/core';

/** Telegram rejects callback data longer than 64 bytes. */
export const MAX_LABEL_BYTES = 64;

export interface ParseProfilesOptions {
  /** Labels that would collide with other callback tokens. */
  reservedLabels?: readonly string[];
}

export function splitArgs(value: string): string[] {
  return value.split(/\s+/).filter((token) => token.length > 0);
}

export function parseProfiles(
  profiles: Readonly<Record<string, unknown>>,
  options: ParseProfilesOptions = {},
): readonly TunnelProfile[] {
  const reserved = new Set(options.reservedLabels ?? []);
  const parsed: TunnelProfile[] = [];

  for (const [label, value] of Object.entries(profiles)) {
    if (label.trim().length === 0) {
      throw new ConfigError('profiles: labels must not be empty');
    }
    if (Buffer.byteLength(label, 'utf8') > MAX_LABEL_BYTES) {
      throw new ConfigError(`profiles.${label}: label exceeds ${MAX_LABEL_BYTES} bytes`, { label });
    }
    if (reserved.has(label)) {
      throw new ConfigError(`profiles.${label}: label is reserved`, { label });
    }
    if (typeof value !== 'string') {
      throw new ConfigError(`profiles.${label}: expected a string of launch arguments`, { label });
    }
    const args = splitArgs(value);
    if (args.length === 0) {
      throw new ConfigError(`profiles.${label}: no launch arguments`, { label });
    }
    parsed.push(Object.freeze({ label, args: Object.freeze(args) }));
  }

  return Object.freeze(parsed);
}

export function findProfile(
  profiles: readonly TunnelProfile[],
  label: string,
): TunnelProfile | undefined {
  return profiles.find((profile) => profile.label === label);
}
