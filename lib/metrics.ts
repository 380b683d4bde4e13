/**
 * Prometheus metrics for probe runs using `prom-client`.
 *
 * Metrics:
 * - `host_recon_probe_requests_total{outcome}` (Counter): checker calls by outcome
 *   (`result` or a network failure kind such as `tls`, `timeout`, `dns`)
 * - `host_recon_probe_results_total` (Counter): results kept by the host prober
 * - `host_recon_host_errors_total` (Counter): hosts whose probe task threw
 * - `host_recon_probe_latency_seconds` (Histogram): duration of a single GET
 *
 * The CLI can dump `register.metrics()` to a file at the end of a run.
 */

import { Counter, Histogram, register } from 'prom-client';

export const probeRequestsTotal = new Counter({
  name: 'host_recon_probe_requests_total',
  help: 'Total number of single-URL checks, labelled by outcome',
  labelNames: ['outcome'] as const,
});

export const probeResultsTotal = new Counter({
  name: 'host_recon_probe_results_total',
  help: 'Total number of probe results kept (status below 500)',
});

export const hostErrorsTotal = new Counter({
  name: 'host_recon_host_errors_total',
  help: 'Total number of hosts whose probe task failed unexpectedly',
});

export const probeLatency = new Histogram({
  name: 'host_recon_probe_latency_seconds',
  help: 'Histogram of single GET latency in seconds',
  buckets: [0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10, 20],
});

export function incProbeRequests(outcome: string): void {
  probeRequestsTotal.inc({ outcome });
}

export function incProbeResults(count = 1): void {
  probeResultsTotal.inc(count);
}

export function incHostErrors(count = 1): void {
  hostErrorsTotal.inc(count);
}

/**
 * Observe single request latency in seconds.
 */
export function observeProbeLatency(seconds: number): void {
  if (!isFinite(seconds) || seconds < 0) return;
  probeLatency.observe(seconds);
}

export { register };
const metrics = { register, incProbeRequests, incProbeResults, incHostErrors, observeProbeLatency };
export default metrics;
