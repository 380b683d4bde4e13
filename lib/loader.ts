import fs from 'fs/promises';
import path from 'path';
import { parse } from 'csv-parse';
import logger from './logger';
import { isValidHost, normalizeDomain } from './subdomain';

/**
 * Raised for input files that cannot be used at all. Fatal for a run:
 * nothing is probed when loading fails.
 */
export class InputFileError extends Error {
  constructor(message: string, readonly file: string) {
    super(message);
    this.name = 'InputFileError';
  }
}

export const DOMAIN_COLUMNS = [
  'Domain', 'domain', 'URL', 'url', 'hostname', 'Hostname', 'site', 'Site', 'website', 'Website',
] as const;

const SAMPLE_SIZE = 1024;
const DELIMITERS = [',', ';', '\t'] as const;

type Row = Record<string, string>;

/**
 * First of comma, semicolon and tab that appears in the sample; comma otherwise.
 */
export function guessDelimiter(sample: string): string {
  return DELIMITERS.find((d) => sample.includes(d)) ?? ',';
}

function isRow(v: unknown): v is Row {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function parseRows(text: string, delimiter: string): Promise<Row[]> {
  return new Promise((resolve, reject) => {
    parse(
      text,
      {
        columns: true,
        delimiter,
        bom: true,
        relax_column_count: true,
        relax_quotes: true,
        skip_empty_lines: true,
      },
      (err, records: unknown) => {
        if (err) return reject(err);
        resolve(Array.isArray(records) ? records.filter(isRow) : []);
      },
    );
  });
}

/**
 * Pick the domain of one row: first non-blank alias column, otherwise the
 * first column whose value looks like a host.
 */
export function domainFromRow(row: Row): string | null {
  for (const col of DOMAIN_COLUMNS) {
    const v = row[col];
    if (typeof v === 'string' && v.trim()) {
      const host = normalizeDomain(v);
      return isValidHost(host) ? host : null;
    }
  }
  for (const value of Object.values(row)) {
    if (typeof value !== 'string' || !value.trim()) continue;
    const candidate = normalizeDomain(value);
    if (isValidHost(candidate)) return candidate;
  }
  return null;
}

export async function validateCsvFile(file: string): Promise<string> {
  if (path.extname(file).toLowerCase() !== '.csv') {
    throw new InputFileError(`Input file must be a CSV file. Got: ${file}`, file);
  }
  let text: string;
  try {
    text = await fs.readFile(file, 'utf8');
  } catch (err) {
    const code = typeof err === 'object' && err !== null && 'code' in err ? err.code : undefined;
    if (code === 'ENOENT') throw new InputFileError(`File not found: ${file}`, file);
    throw new InputFileError(`Error reading CSV file: ${err instanceof Error ? err.message : String(err)}`, file);
  }
  if (!text.slice(0, SAMPLE_SIZE).trim()) {
    throw new InputFileError(`CSV file is empty: ${file}`, file);
  }
  return text;
}

/**
 * Load unique normalized domains from a CSV file, in first-seen order.
 */
export async function loadDomains(file: string): Promise<string[]> {
  const text = await validateCsvFile(file);
  const delimiter = guessDelimiter(text.slice(0, SAMPLE_SIZE));

  let rows: Row[];
  try {
    rows = await parseRows(text, delimiter);
  } catch (err) {
    throw new InputFileError(`Error loading domains: ${err instanceof Error ? err.message : String(err)}`, file);
  }

  const seen = new Set<string>();
  for (const row of rows) {
    const domain = domainFromRow(row);
    if (domain) seen.add(domain);
  }
  const domains = Array.from(seen);

  logger.info({ file, delimiter, domains: domains.length }, 'loaded unique domains');
  if (!domains.length) {
    logger.warn({ accepted: DOMAIN_COLUMNS }, 'no valid domains found; expected a column with domain names');
  }
  return domains;
}

export default loadDomains;
