import pLimit from 'p-limit';
import { CONFIG } from './config';
import logger from './logger';
import { incHostErrors } from './metrics';
import { probeHost } from './prober';
import type { DispatchReport, HostProbeOutcome } from './types';

export interface DispatchOptions {
  concurrency?: number;
  probe?: (host: string) => Promise<HostProbeOutcome>;
  onHostDone?: (outcome: HostProbeOutcome) => void;
}

/**
 * Probe every host through a pool of `concurrency` workers.
 *
 * All hosts are submitted up front. Each task returns its own outcome and the
 * dispatcher merges it as the task settles, so results arrive in completion
 * order. A task that throws contributes nothing and is recorded in `errors`;
 * it never affects the other tasks.
 */
export async function probeAll(hosts: readonly string[], opts?: DispatchOptions): Promise<DispatchReport> {
  const concurrency = opts?.concurrency ?? CONFIG.CONCURRENCY.DEFAULT;
  const probe = opts?.probe ?? ((host: string) => probeHost(host));
  const limit = pLimit(concurrency);

  const report: DispatchReport = { results: [], outcomes: [], errors: [] };

  logger.info({ hosts: hosts.length, concurrency }, 'starting URL discovery');

  const tasks = hosts.map((host) =>
    limit(() => probe(host)).then(
      (outcome) => {
        report.outcomes.push(outcome);
        report.results.push(...outcome.results);
        try {
          opts?.onHostDone?.(outcome);
        } catch (err) {
          logger.warn({ host, err }, 'onHostDone callback failed');
        }
      },
      (err: unknown) => {
        const error = err instanceof Error ? err : new Error(String(err));
        incHostErrors();
        logger.error({ host, err: error }, 'error probing host');
        report.errors.push({ host, error });
      },
    ),
  );
  await Promise.all(tasks);

  logger.info(
    { hosts: hosts.length, results: report.results.length, errors: report.errors.length },
    'URL discovery finished',
  );
  return report;
}

export default probeAll;
