import wordlist from '../data/subdomain-wordlist.json';
import { CONFIG } from './config';
import logger from './logger';
import { detectWildcard, resolveA } from './dns';
import { delayMs } from './net/timeout';
import { baseDomainOf } from './subdomain';
import type { SubdomainRecord } from './types';

export const SUBDOMAIN_WORDLIST: readonly string[] = Object.freeze([...wordlist]);

export interface EnumerateOptions {
  delayMs?: number; // after each successful lookup
  baseDelayMs?: number; // between base domains
  skipWildcard?: boolean;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Unique base domains of a host list, sorted.
 */
export function baseDomains(domains: Iterable<string>): string[] {
  const bases = new Set<string>();
  for (const d of domains) {
    const base = baseDomainOf(d);
    if (base) bases.add(base);
  }
  return Array.from(bases).sort();
}

/**
 * Guess `<word>.<base>` for every word, one lookup at a time.
 * One record per A address; failed lookups produce nothing.
 */
export async function enumerateSubdomains(
  base: string,
  words: readonly string[] = SUBDOMAIN_WORDLIST,
  opts?: EnumerateOptions,
): Promise<SubdomainRecord[]> {
  const pause = opts?.delayMs ?? CONFIG.DNS_ENUM.DELAY_MS;
  const sleep = opts?.sleep ?? delayMs;
  const found: SubdomainRecord[] = [];

  for (const word of words) {
    const subdomain = `${word}.${base}`;
    let ips: string[];
    try {
      ips = await resolveA(subdomain);
    } catch (err) {
      logger.trace({ subdomain, err }, 'no A record');
      continue;
    }
    for (const ip of ips) {
      found.push({ domain: subdomain, ip, method: 'dns_enum' });
      logger.info({ subdomain, ip }, 'subdomain resolved');
    }
    await sleep(pause);
  }
  return found;
}

/**
 * Enumerate every base domain of `domains` in order. Bases answering random
 * labels (wildcard DNS) are skipped unless `skipWildcard` is false.
 */
export async function enumerateAll(
  domains: Iterable<string>,
  words: readonly string[] = SUBDOMAIN_WORDLIST,
  opts?: EnumerateOptions,
): Promise<SubdomainRecord[]> {
  const bases = baseDomains(domains);
  const baseDelay = opts?.baseDelayMs ?? CONFIG.DNS_ENUM.BASE_DELAY_MS;
  const sleep = opts?.sleep ?? delayMs;
  const results: SubdomainRecord[] = [];

  logger.info({ bases: bases.length }, 'enumerating subdomains');
  for (const base of bases) {
    if ((opts?.skipWildcard ?? true) && (await detectWildcard(base))) {
      logger.warn({ base }, 'wildcard DNS detected, skipping base domain');
      continue;
    }
    logger.info({ base }, 'checking base domain');
    results.push(...(await enumerateSubdomains(base, words, opts)));
    await sleep(baseDelay);
  }
  return results;
}
