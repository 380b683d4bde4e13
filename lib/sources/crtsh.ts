import { fetchWithRetry } from '../net/fetchWithRetry';
import { delayMs } from '../net/timeout';
import logger from '../logger';
import { CONFIG } from '../config';

const DEFAULT_HEADERS = { 'User-Agent': 'host-recon/0.1' };

function nameValueOf(entry: unknown): string {
  if (typeof entry !== 'object' || entry === null) return '';
  if ('name_value' in entry && typeof entry.name_value === 'string') return entry.name_value;
  if ('common_name' in entry && typeof entry.common_name === 'string') return entry.common_name;
  return '';
}

/**
 * crt.sh: Certificate Transparency log search for every name under `suffix`.
 * Wildcard names are skipped, not stripped: "*.a.example" says nothing about
 * which labels exist.
 */
export async function fetchCrtSh(suffix: string): Promise<string[]> {
  const target = suffix.trim().toLowerCase().replace(/^\.+/, '');
  const url = `https://crt.sh/?q=%25.${encodeURIComponent(target)}&output=json`;
  try {
    const res = await fetchWithRetry(url, { headers: DEFAULT_HEADERS }, {
      retries: 2,
      backoffMs: 500,
      timeoutMs: CONFIG.HTTP_TIMEOUT_MS * 2,
    });
    if (res.status !== 200) return [];
    const data: unknown = await res.json();
    if (!Array.isArray(data)) return [];
    const names = new Set<string>();
    for (const cert of data) {
      for (const name of nameValueOf(cert).split(/\s+/)) {
        const clean = name.trim().toLowerCase();
        if (!clean || clean.startsWith('*')) continue;
        if (clean === target || clean.endsWith(`.${target}`)) {
          names.add(clean);
        }
      }
    }
    return Array.from(names);
  } catch (err) {
    logger.debug({ err, suffix: target }, 'crtsh fetch error');
    return [];
  }
}

export interface CollectOptions {
  delayMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Union of crt.sh names over several suffixes, sorted.
 */
export async function collectCertificateDomains(suffixes: readonly string[], opts?: CollectOptions): Promise<string[]> {
  const pause = opts?.delayMs ?? CONFIG.CRTSH.DELAY_MS;
  const sleep = opts?.sleep ?? delayMs;
  const all = new Set<string>();

  logger.info({ suffixes }, 'searching certificate transparency logs');
  for (const [i, suffix] of suffixes.entries()) {
    const names = await fetchCrtSh(suffix);
    for (const n of names) all.add(n);
    logger.info({ suffix, found: names.length }, 'crt.sh suffix done');
    if (i < suffixes.length - 1) await sleep(pause);
  }
  logger.info({ domains: all.size }, 'domains found from certificates');
  return Array.from(all).sort();
}

export default fetchCrtSh;
