import type { ProbeResult, ProbeSummary } from './types';

/**
 * Count results per resolved host (post-redirect) and per status code.
 * Pure; empty input gives two empty maps.
 */
export function summarize(results: readonly ProbeResult[]): ProbeSummary {
  const hostCounts = new Map<string, number>();
  const statusCounts = new Map<number, number>();

  for (const r of results) {
    hostCounts.set(r.domain, (hostCounts.get(r.domain) ?? 0) + 1);
    statusCounts.set(r.statusCode, (statusCounts.get(r.statusCode) ?? 0) + 1);
  }

  return { hostCounts, statusCounts };
}

/**
 * Host counts sorted by count descending; ties keep host name order.
 */
export function sortedHostCounts(summary: ProbeSummary): Array<[string, number]> {
  return Array.from(summary.hostCounts.entries()).sort(
    (a, b) => b[1] - a[1] || (a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0),
  );
}

export function sortedStatusCounts(summary: ProbeSummary): Array<[number, number]> {
  return Array.from(summary.statusCounts.entries()).sort((a, b) => a[0] - b[0]);
}

export interface SummaryDigest {
  hostsWithResults: number;
  topHost: string | null;
  topHostCount: number;
  successfulResponses: number; // 2xx and 3xx
}

export function describeSummary(summary: ProbeSummary): SummaryDigest {
  const [top] = sortedHostCounts(summary);
  let successfulResponses = 0;
  for (const [status, count] of summary.statusCounts) {
    if (status >= 200 && status < 400) successfulResponses += count;
  }
  return {
    hostsWithResults: summary.hostCounts.size,
    topHost: top ? top[0] : null,
    topHostCount: top ? top[1] : 0,
    successfulResponses,
  };
}
