import dns from 'dns/promises';
import { withTimeout } from './net/timeout';
import { CONFIG } from './config';

/**
 * A records for a host with a timeout. Rejects on NXDOMAIN, SERVFAIL or timeout.
 */
export async function resolveA(host: string, timeoutMs?: number): Promise<string[]> {
  return withTimeout(dns.resolve4(host), timeoutMs ?? CONFIG.DNS_TIMEOUT_MS);
}

/**
 * A records or an empty list; for probes where failure just means "nothing there".
 */
export async function resolveAOrEmpty(host: string, timeoutMs?: number): Promise<string[]> {
  try {
    return await resolveA(host, timeoutMs);
  } catch {
    return [];
  }
}

/**
 * Detect wildcard DNS: three random labels that should not exist. Wildcard when
 * the first resolves and at least one other resolves into the same address set.
 */
export async function detectWildcard(domain: string): Promise<boolean> {
  const randoms = Array.from({ length: 3 }, () =>
    `xzq-${Math.random().toString(36).slice(2, 10)}`
  );
  const allTestIps = await Promise.all(randoms.map((r) => resolveAOrEmpty(`${r}.${domain}`)));

  if (allTestIps.every((ips) => ips.length === 0)) return false;

  const firstSet = new Set(allTestIps[0]);
  let matchCount = 0;
  for (let i = 1; i < allTestIps.length; i++) {
    if (allTestIps[i].length > 0 && allTestIps[i].every((ip) => firstSet.has(ip))) {
      matchCount++;
    }
  }
  return matchCount >= 1 && allTestIps[0].length > 0;
}
