import logger from './logger';
import { incProbeRequests, observeProbeLatency } from './metrics';
import { httpGet, HttpGetOptions, HttpResponse } from './net/httpClient';
import { classifyNetworkError, errorMessage } from './net/errors';
import type { CheckOutcome, ProbeResult } from './types';

const TITLE_MAX_LENGTH = 200;
const TITLE_PATTERN = /<title>([\s\S]*?)<\/title>/i;
const UNKNOWN = 'Unknown';

export interface CheckOptions extends HttpGetOptions {
  now?: () => Date;
}

/**
 * Extract the first <title>...</title> pair, trimmed and capped at 200 characters.
 * Missing or unparsable titles yield an empty string.
 */
export function extractTitle(html: string): string {
  try {
    const m = TITLE_PATTERN.exec(html);
    if (!m) return '';
    return Array.from(m[1].trim()).slice(0, TITLE_MAX_LENGTH).join('');
  } catch {
    return '';
  }
}

function charsetOf(contentType: string | undefined): string {
  const m = contentType ? /charset=["']?([\w.:-]+)/i.exec(contentType) : null;
  return m ? m[1].toLowerCase() : 'utf-8';
}

export function decodeBody(body: Buffer, contentType?: string): string {
  try {
    return new TextDecoder(charsetOf(contentType)).decode(body);
  } catch {
    // unknown charset label
    return new TextDecoder('utf-8').decode(body);
  }
}

function hostOf(url: string): string {
  try {
    return new URL(url).host;
  } catch {
    return '';
  }
}

function toProbeResult(url: string, res: HttpResponse, at: Date): ProbeResult {
  const contentType = res.headers['content-type'];
  return {
    url,
    statusCode: res.status,
    finalUrl: res.finalUrl,
    title: extractTitle(decodeBody(res.body, contentType)),
    contentLength: res.body.length,
    server: res.headers['server'] ?? UNKNOWN,
    contentType: contentType ?? UNKNOWN,
    discoveredAt: at.toISOString(),
    domain: hostOf(res.finalUrl),
  };
}

async function attempt(url: string, opts: CheckOptions | undefined): Promise<CheckOutcome> {
  const started = process.hrtime.bigint();
  try {
    const res = await httpGet(url, opts);
    observeProbeLatency(Number(process.hrtime.bigint() - started) / 1e9);
    incProbeRequests('result');
    const now = opts?.now ? opts.now() : new Date();
    return { kind: 'result', result: toProbeResult(url, res, now) };
  } catch (err) {
    const reason = classifyNetworkError(err);
    incProbeRequests(reason);
    return { kind: 'failure', url, reason, message: errorMessage(err) };
  }
}

/**
 * Check one URL. A TLS failure on https:// is retried once over http://
 * for the same host and path; every other failure is returned as-is.
 * Never throws for transport problems.
 */
export async function checkUrl(url: string, opts?: CheckOptions): Promise<CheckOutcome> {
  const outcome = await attempt(url, opts);
  if (outcome.kind === 'result') return outcome;

  if (outcome.reason === 'tls' && url.startsWith('https://')) {
    const httpUrl = `http://${url.slice('https://'.length)}`;
    logger.debug({ url, httpUrl }, 'TLS failure, retrying over http');
    const fallback = await attempt(httpUrl, opts);
    if (fallback.kind === 'result') return fallback;
    logger.debug({ url: httpUrl, reason: fallback.reason, message: fallback.message }, 'check failed');
    return { ...fallback, fallbackFrom: url };
  }

  logger.debug({ url, reason: outcome.reason, message: outcome.message }, 'check failed');
  return outcome;
}

/**
 * Result-or-absent view of `checkUrl`.
 */
export async function check(url: string, opts?: CheckOptions): Promise<ProbeResult | null> {
  const outcome = await checkUrl(url, opts);
  return outcome.kind === 'result' ? outcome.result : null;
}

export default checkUrl;
