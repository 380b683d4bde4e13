export * from './types';
export { check, checkUrl, extractTitle, decodeBody } from './checker';
export { probeHost, nextState, candidateUrl, PROBE_PATHS } from './prober';
export type { ProbeOptions, ProbeState } from './prober';
export { probeAll } from './dispatcher';
export type { DispatchOptions } from './dispatcher';
export { summarize, sortedHostCounts, sortedStatusCounts, describeSummary } from './aggregator';
export { loadDomains, InputFileError } from './loader';
export { normalizeDomain, isValidHost, baseDomainOf } from './subdomain';
export { fetchCrtSh, collectCertificateDomains } from './sources/crtsh';
export { enumerateSubdomains, enumerateAll, SUBDOMAIN_WORDLIST } from './enumerate';
export { writeProbeReport, writeCleanedDomains, writeMapReport, runTimestamp } from './report';
export { HttpRequestError, classifyNetworkError } from './net/errors';
export type { NetworkErrorKind } from './net/errors';
