import fs from 'fs/promises';
import path from 'path';
import dayjs from 'dayjs';
import { stringify } from 'csv-stringify';
import logger from './logger';
import { sortedHostCounts, sortedStatusCounts } from './aggregator';
import type { ProbeResult, ProbeSummary, SubdomainRecord } from './types';

export const RESULT_COLUMNS = [
  'domain', 'url', 'status_code', 'final_url', 'title',
  'content_length', 'server', 'content_type', 'discovery_time',
] as const;

type Cell = string | number;

export interface ProbeReportFiles {
  results: string;
  domainSummary?: string;
  statusSummary?: string;
}

/**
 * Run timestamp embedded in every output filename, local time.
 */
export function runTimestamp(date: Date = new Date()): string {
  return dayjs(date).format('YYYYMMDD_HHmmss');
}

export function toCsv(header: readonly string[], rows: Cell[][]): Promise<string> {
  return new Promise((resolve, reject) => {
    stringify([[...header], ...rows], (err, output) => {
      if (err) reject(err);
      else resolve(output);
    });
  });
}

async function writeCsv(file: string, header: readonly string[], rows: Cell[][]): Promise<string> {
  await fs.mkdir(path.dirname(file), { recursive: true });
  await fs.writeFile(file, await toCsv(header, rows), 'utf8');
  logger.debug({ file, rows: rows.length }, 'csv written');
  return file;
}

export function resultRow(r: ProbeResult): Cell[] {
  return [r.domain, r.url, r.statusCode, r.finalUrl, r.title, r.contentLength, r.server, r.contentType, r.discoveredAt];
}

/**
 * Full records plus the per-host and per-status summaries. Summaries are
 * only written when there is at least one result.
 */
export async function writeProbeReport(
  dir: string,
  results: readonly ProbeResult[],
  summary: ProbeSummary,
  timestamp: string = runTimestamp(),
): Promise<ProbeReportFiles> {
  const base = path.join(dir, `discovered_urls_${timestamp}`);
  const files: ProbeReportFiles = {
    results: await writeCsv(`${base}.csv`, RESULT_COLUMNS, results.map(resultRow)),
  };
  if (!results.length) return files;

  files.domainSummary = await writeCsv(
    `${base}_domain_summary.csv`,
    ['Domain', 'URLs_Discovered'],
    sortedHostCounts(summary),
  );
  files.statusSummary = await writeCsv(
    `${base}_status_summary.csv`,
    ['Status_Code', 'Count'],
    sortedStatusCounts(summary),
  );
  return files;
}

export async function writeCleanedDomains(dir: string, domains: readonly string[], timestamp: string = runTimestamp()): Promise<string> {
  const rows = [...domains].sort().map((d) => [d]);
  return writeCsv(path.join(dir, `cleaned_domains_${timestamp}.csv`), ['Domain'], rows);
}

export interface MapReportFiles {
  domains: string;
  subdomains?: string;
}

export async function writeMapReport(
  dir: string,
  domains: readonly string[],
  subdomains: readonly SubdomainRecord[],
  timestamp: string = runTimestamp(),
): Promise<MapReportFiles> {
  const files: MapReportFiles = {
    domains: await writeCsv(path.join(dir, `domains_${timestamp}.csv`), ['Domain'], [...domains].sort().map((d) => [d])),
  };
  if (subdomains.length) {
    files.subdomains = await writeCsv(
      path.join(dir, `subdomains_${timestamp}.csv`),
      ['domain', 'ip', 'method'],
      subdomains.map((s) => [s.domain, s.ip, s.method]),
    );
  }
  return files;
}
