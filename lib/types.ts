import type { NetworkErrorKind } from './net/errors';

export type Scheme = 'https' | 'http';

/**
 * One HTTP exchange against a candidate URL. Created by the checker,
 * never mutated afterwards.
 */
export interface ProbeResult {
  readonly url: string; // the URL that was requested
  readonly statusCode: number;
  readonly finalUrl: string; // after redirects
  readonly title: string; // <= 200 chars, may be empty
  readonly contentLength: number; // bytes of the response body
  readonly server: string; // "Unknown" when the header is missing
  readonly contentType: string; // "Unknown" when the header is missing
  readonly discoveredAt: string; // ISO timestamp
  readonly domain: string; // host of finalUrl
}

export interface CheckFailure {
  kind: 'failure';
  url: string;
  reason: NetworkErrorKind;
  message: string;
  fallbackFrom?: string; // original https URL when this was the TLS fallback
}

export type CheckOutcome = { kind: 'result'; result: ProbeResult } | CheckFailure;

export interface HostProbeOutcome {
  host: string;
  results: ProbeResult[]; // discovery order
  attempts: number;
  failures: CheckFailure[];
}

export interface HostProbeError {
  host: string;
  error: Error;
}

export interface DispatchReport {
  results: ProbeResult[];
  outcomes: HostProbeOutcome[]; // completion order
  errors: HostProbeError[];
}

export interface ProbeSummary {
  hostCounts: Map<string, number>;
  statusCounts: Map<number, number>;
}

export interface SubdomainRecord {
  domain: string;
  ip: string;
  method: 'dns_enum';
}
