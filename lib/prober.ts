import probePaths from '../data/probe-paths.json';
import { CONFIG } from './config';
import logger from './logger';
import { incProbeResults } from './metrics';
import { checkUrl } from './checker';
import { delayMs } from './net/timeout';
import type { CheckFailure, CheckOutcome, HostProbeOutcome, ProbeResult, Scheme } from './types';

export const PROBE_PATHS: readonly string[] = Object.freeze([...probePaths]);

export type ProbeState = 'TRYING_HTTPS' | 'TRYING_HTTP' | 'DONE';

export interface ProbeOptions {
  paths?: readonly string[];
  pacingMs?: number;
  check?: (url: string) => Promise<CheckOutcome>;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * HTTPS is tried first; any kept HTTPS result makes the HTTP pass unnecessary.
 */
export function nextState(state: ProbeState, foundAny: boolean): ProbeState {
  switch (state) {
    case 'TRYING_HTTPS':
      return foundAny ? 'DONE' : 'TRYING_HTTP';
    case 'TRYING_HTTP':
    case 'DONE':
      return 'DONE';
  }
}

export function candidateUrl(scheme: Scheme, host: string, path: string): string {
  return new URL(path, `${scheme}://${host}`).toString();
}

/**
 * Probe one host over the fixed path list.
 *
 * Attempts are strictly sequential and paced. Results with status >= 500 are
 * dropped; a 200 during the HTTPS pass ends that pass early. An unreachable
 * host yields an empty result list.
 */
export async function probeHost(rawHost: string, opts?: ProbeOptions): Promise<HostProbeOutcome> {
  const host = rawHost.trim().toLowerCase();
  const paths = opts?.paths ?? PROBE_PATHS;
  const pacingMs = opts?.pacingMs ?? CONFIG.PROBE.PACING_MS;
  const check = opts?.check ?? ((url: string) => checkUrl(url));
  const sleep = opts?.sleep ?? delayMs;

  const results: ProbeResult[] = [];
  const failures: CheckFailure[] = [];
  let attempts = 0;
  let state: ProbeState = 'TRYING_HTTPS';

  while (state !== 'DONE') {
    const scheme: Scheme = state === 'TRYING_HTTPS' ? 'https' : 'http';

    for (const path of paths) {
      const outcome = await check(candidateUrl(scheme, host, path));
      attempts++;
      await sleep(pacingMs);

      if (outcome.kind === 'failure') {
        failures.push(outcome);
        continue;
      }
      const { result } = outcome;
      if (result.statusCode < 500) results.push(result);
      if (state === 'TRYING_HTTPS' && result.statusCode === 200) break;
    }

    state = nextState(state, results.length > 0);
  }

  incProbeResults(results.length);
  if (results.length) {
    logger.info({ host, found: results.length, attempts }, 'found accessible URLs');
  } else {
    logger.info({ host, attempts, failures: failures.length }, 'no accessible URLs found');
  }

  return { host, results, attempts, failures };
}

export default probeHost;
