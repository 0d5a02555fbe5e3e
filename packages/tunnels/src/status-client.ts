/**
 * NgrokStatusClient — reads the agent's local status API.
 *
 * ngrok exposes its tunnels at http://127.0.0.1:4040/api/tunnels as
 * `{ tunnels: [{ name, public_url, proto, ... }], uri }`. Only the name,
 * public URL and protocol of each tunnel are consumed; anything else in the
 * document is ignored.
 *
 * One request per call and no retry: the caller decides what a failure
 * means. Every failure is a StatusFetchError tagged with its cause.
 */

import type { ITunnelStatusClient, TunnelEndpoint } from '@tunnelbot/core';
import { StatusFetchError, errorMessage } from '@tunnelbot/core';

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export const DEFAULT_STATUS_URL = 'http://127.0.0.1:4040';

export interface NgrokStatusClientConfig {
  /** Base URL of the local API. Default: 'http://127.0.0.1:4040'. */
  baseUrl?: string;
  /** Attach the raw body of unparsable responses to the error context. */
  verbose?: boolean;
}

// ---------------------------------------------------------------------------
// NgrokStatusClient
// ---------------------------------------------------------------------------

export class NgrokStatusClient implements ITunnelStatusClient {
  readonly url: string;
  private readonly verbose: boolean;

  constructor(config: NgrokStatusClientConfig = {}) {
    const base = (config.baseUrl ?? DEFAULT_STATUS_URL).replace(/\/+$/, '');
    this.url = `${base}/api/tunnels`;
    this.verbose = config.verbose ?? false;
  }

  async fetchStatus(): Promise<TunnelEndpoint[]> {
    let response: Response;
    try {
      response = await fetch(this.url, { headers: { accept: 'application/json' } });
    } catch (err) {
      throw new StatusFetchError(`request to ${this.url} failed: ${errorMessage(err)}`, 'network', {
        url: this.url,
      });
    }

    if (!response.ok) {
      throw new StatusFetchError(`${this.url} responded with HTTP ${response.status}`, 'http', {
        url: this.url,
        status: response.status,
      });
    }

    let body: string;
    try {
      body = await response.text();
    } catch (err) {
      throw new StatusFetchError(`reading ${this.url} failed: ${errorMessage(err)}`, 'network', {
        url: this.url,
      });
    }

    let data: unknown;
    try {
      data = JSON.parse(body);
    } catch (err) {
      throw new StatusFetchError(
        `malformed status payload: ${errorMessage(err)}`,
        'payload',
        this.verbose ? { url: this.url, body } : { url: this.url },
      );
    }

    return parseTunnelList(data);
  }
}

// ---------------------------------------------------------------------------
// Payload parsing
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Project a decoded /api/tunnels document onto TunnelEndpoints.
 * Throws StatusFetchError('payload') when the document does not have the
 * expected shape.
 */
export function parseTunnelList(data: unknown): TunnelEndpoint[] {
  const tunnels = isRecord(data) ? data['tunnels'] : undefined;
  if (!Array.isArray(tunnels)) {
    throw new StatusFetchError('malformed status payload: missing "tunnels" list', 'payload');
  }

  return tunnels.map((entry: unknown, index: number) => {
    if (!isRecord(entry)) {
      throw new StatusFetchError(`malformed status payload: tunnels[${index}] is not an object`, 'payload');
    }
    return {
      name: stringField(entry, 'name', index),
      publicUrl: stringField(entry, 'public_url', index),
      protocol: stringField(entry, 'proto', index),
    };
  });
}

/** Absent fields read as ''; a present field of another type is malformed. */
function stringField(entry: Record<string, unknown>, key: string, index: number): string {
  const value = entry[key];
  if (value === undefined || value === null) return '';
  if (typeof value !== 'string') {
    throw new StatusFetchError(`malformed status payload: tunnels[${index}].${key} is not a string`, 'payload');
  }
  return value;
}
