import type { TunnelEndpoint } from '@tunnelbot/core';

export const NO_TUNNELS_MESSAGE = 'No tunnels available';

/** One `▸ name: url` line per endpoint, or NO_TUNNELS_MESSAGE. */
export function formatEndpointReport(endpoints: readonly TunnelEndpoint[]): string {
  if (endpoints.length === 0) return NO_TUNNELS_MESSAGE;
  return endpoints.map((endpoint) => `▸ ${endpoint.name}: ${endpoint.publicUrl}`).join('\n');
}
