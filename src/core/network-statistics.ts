/**
 * Per-host network statistics folded from worker broadcast responses.
 *
 * Each worker reports one entry per remote fetch it made (URL and bytes
 * received). Entries are keyed by URL authority, so fetches from the same
 * host with different credentials or ports are counted separately.
 */

import type { NetworkStatisticsEntry, NetworkStatisticsResponse } from '../types/protocol.js';

export interface HostStatistics {
  /** Number of fetches per authority. */
  requestsByHost: Map<string, number>;
  /** Total bytes received per authority. */
  bytesReceivedByHost: Map<string, number>;
}

/** Concatenate the entries of every response, in response order. */
export function mergeNetworkStatistics(
  responses: readonly NetworkStatisticsResponse[],
): NetworkStatisticsEntry[] {
  return responses.flatMap((response) => response.entry ?? []);
}

/**
 * `[user[:password]@]host[:port]` of a URL, or `''` when it cannot be
 * parsed. Default ports are not included.
 */
export function urlAuthority(url: string): string {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return '';
  }

  let userInfo = '';
  if (parsed.username !== '' || parsed.password !== '') {
    userInfo = parsed.password !== '' ? `${parsed.username}:${parsed.password}@` : `${parsed.username}@`;
  }
  return `${userInfo}${parsed.host}`;
}

/**
 * Count requests and sum bytes per URL authority. Order-independent.
 * String byte counts (int64 in JSON) are summed as numbers.
 */
export function aggregateByHost(entries: readonly NetworkStatisticsEntry[]): HostStatistics {
  const requestsByHost = new Map<string, number>();
  const bytesReceivedByHost = new Map<string, number>();

  for (const entry of entries) {
    const host = urlAuthority(entry.url ?? '');
    requestsByHost.set(host, (requestsByHost.get(host) ?? 0) + 1);
    const bytes = Number(entry.bytes_received ?? 0);
    bytesReceivedByHost.set(host, (bytesReceivedByHost.get(host) ?? 0) + bytes);
  }

  return { requestsByHost, bytesReceivedByHost };
}
