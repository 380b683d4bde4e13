#!/usr/bin/env node
import 'dotenv/config';
import fs from 'fs/promises';
import path from 'path';
import logger from '../lib/logger';
import { register } from '../lib/metrics';
import { checkUrl } from '../lib/checker';
import { probeHost } from '../lib/prober';
import { probeAll } from '../lib/dispatcher';
import { describeSummary, summarize } from '../lib/aggregator';
import { InputFileError, loadDomains } from '../lib/loader';
import { collectCertificateDomains } from '../lib/sources/crtsh';
import { enumerateAll } from '../lib/enumerate';
import { runTimestamp, writeCleanedDomains, writeMapReport, writeProbeReport } from '../lib/report';
import { CliCommand, CliUsageError, MapCommand, ProbeCommand, USAGE, parseCliArgs } from './args';

async function writeMetrics(file: string | undefined): Promise<void> {
  if (!file) return;
  await fs.mkdir(path.dirname(path.resolve(file)), { recursive: true });
  await fs.writeFile(file, await register.metrics(), 'utf8');
  logger.info({ file }, 'metrics written');
}

export async function runProbe(cmd: ProbeCommand, now: () => Date = () => new Date()): Promise<number> {
  let domains: string[];
  try {
    domains = await loadDomains(cmd.file);
  } catch (err) {
    if (err instanceof InputFileError) {
      logger.error({ file: err.file }, err.message);
      return 1;
    }
    throw err;
  }
  if (!domains.length) {
    logger.error({ file: cmd.file }, 'no domains to probe');
    return 1;
  }

  const timestamp = runTimestamp(now());
  const cleaned = await writeCleanedDomains(cmd.outDir, domains, timestamp);
  logger.info({ file: cleaned }, 'cleaned domains saved');

  if (cmd.limit !== undefined && domains.length > cmd.limit) {
    logger.info({ total: domains.length, limit: cmd.limit }, 'probing only the first domains');
    domains = domains.slice(0, cmd.limit);
  }

  const started = Date.now();
  const report = await probeAll(domains, {
    concurrency: cmd.concurrency,
    probe: (host) => probeHost(host, {
      pacingMs: cmd.pacingMs,
      check: (url) => checkUrl(url, { timeoutMs: cmd.timeoutMs }),
    }),
  });
  const elapsedSec = (Date.now() - started) / 1000;

  const summary = summarize(report.results);
  const timing = {
    elapsedSec: Number(elapsedSec.toFixed(2)),
    perDomainSec: Number((elapsedSec / domains.length).toFixed(2)),
  };

  if (!report.results.length) {
    logger.warn(
      { hosts: domains.length, hostErrors: report.errors.length, ...timing },
      'no URLs discovered; domains may not exist, be filtered by the network, or be down',
    );
    await writeMetrics(cmd.metricsFile);
    return 0;
  }

  const files = await writeProbeReport(cmd.outDir, report.results, summary, timestamp);
  const digest = describeSummary(summary);
  logger.info(
    {
      urls: report.results.length,
      domainsWithUrls: digest.hostsWithResults,
      mostProductive: digest.topHost,
      mostProductiveCount: digest.topHostCount,
      successfulResponses: digest.successfulResponses,
      hostErrors: report.errors.length,
      files,
      ...timing,
    },
    'discovery complete',
  );
  await writeMetrics(cmd.metricsFile);
  return 0;
}

export async function runMap(cmd: MapCommand, now: () => Date = () => new Date()): Promise<number> {
  const domains = await collectCertificateDomains(cmd.suffixes);
  const subdomains = cmd.enumerate ? await enumerateAll(domains) : [];
  const files = await writeMapReport(cmd.outDir, domains, subdomains, runTimestamp(now()));
  logger.info(
    { domains: domains.length, activeSubdomains: subdomains.length, files },
    'mapping complete',
  );
  await writeMetrics(cmd.metricsFile);
  return 0;
}

export async function main(argv: readonly string[]): Promise<number> {
  let cmd: CliCommand;
  try {
    cmd = parseCliArgs(argv);
  } catch (err) {
    if (err instanceof CliUsageError) {
      process.stderr.write(`Error: ${err.message}\n${USAGE}`);
      return 2;
    }
    throw err;
  }

  switch (cmd.command) {
    case 'help':
      process.stdout.write(USAGE);
      return 0;
    case 'probe':
      return runProbe(cmd);
    case 'map':
      return runMap(cmd);
  }
}

if (require.main === module) {
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      logger.fatal({ err }, 'unexpected failure');
      process.exitCode = 1;
    },
  );
}
