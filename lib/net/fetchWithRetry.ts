import pLimit from 'p-limit';
import { CONFIG } from '../config';
import logger from '../logger';
import { delayMs } from './timeout';

// Passive sources are queried a few at a time per remote host.
const SOURCE_HOST_CONCURRENCY = 2;

const hostLimitMap = new Map<string, ReturnType<typeof pLimit>>();

function getHostFromUrl(url: string): string {
  try {
    return new URL(url).host;
  } catch {
    return 'default';
  }
}

function getLimitForHost(host: string) {
  let limit = hostLimitMap.get(host);
  if (!limit) {
    limit = pLimit(SOURCE_HOST_CONCURRENCY);
    hostLimitMap.set(host, limit);
  }
  return limit;
}

export interface FetchRetryOptions {
  retries?: number; // total attempts
  backoffMs?: number; // base backoff
  timeoutMs?: number; // per-request timeout
}

/**
 * fetch() with a per-request timeout and exponential backoff on 429/5xx and
 * network errors. Used for passive sources, never for probing targets.
 */
export async function fetchWithRetry(url: string, init?: RequestInit, opts?: FetchRetryOptions): Promise<Response> {
  const retries = opts?.retries ?? 3;
  const base = opts?.backoffMs ?? 200;
  const timeoutMs = opts?.timeoutMs ?? CONFIG.HTTP_TIMEOUT_MS;
  const limit = getLimitForHost(getHostFromUrl(url));

  return limit(() => execWithRetry(url, init, { retries, base, timeoutMs }));
}

async function execWithRetry(url: string, init: RequestInit | undefined, cfg: { retries: number; base: number; timeoutMs: number; }) {
  let attempt = 0;
  while (true) {
    attempt++;
    const controller = new AbortController();
    const id = setTimeout(() => controller.abort(), cfg.timeoutMs);
    try {
      if (typeof globalThis.fetch !== 'function') {
        throw new Error('fetch is not available in this runtime. Node 18+ is required');
      }
      const res = await globalThis.fetch(url, { ...(init || {}), signal: controller.signal });
      clearTimeout(id);
      if (res.status === 429) {
        // rate limited - respect Retry-After if present
        const ra = res.headers.get('retry-after');
        const delay = ra ? parseRetryAfter(ra) : cfg.base * Math.pow(2, attempt - 1);
        if (attempt >= cfg.retries) return res;
        logger.debug({ url, attempt, status: res.status, delay }, 'fetchWithRetry received 429, backing off');
        await delayMs(delay);
        continue;
      }
      if (res.status >= 500) {
        if (attempt >= cfg.retries) return res;
        const delay = cfg.base * Math.pow(2, attempt - 1);
        logger.debug({ url, attempt, status: res.status, delay }, 'fetchWithRetry received 5xx, retrying');
        await delayMs(delay);
        continue;
      }
      return res;
    } catch (err) {
      clearTimeout(id);
      if (err instanceof Error && err.name === 'AbortError') {
        logger.debug({ url, attempt }, 'fetchWithRetry request aborted');
      } else {
        logger.debug({ url, attempt, err }, 'fetchWithRetry network error');
      }
      if (attempt >= cfg.retries) throw err;
      await delayMs(cfg.base * Math.pow(2, attempt - 1));
    }
  }
}

function parseRetryAfter(val: string): number {
  // If numeric -> seconds
  const n = Number(val);
  if (!Number.isNaN(n)) return n * 1000;
  const t = Date.parse(val);
  if (!Number.isNaN(t)) return Math.max(0, t - Date.now());
  return 1000;
}
