// Centralized runtime configuration for timeouts, concurrency and pacing.
// Values are read from env with sane defaults and can be overridden in tests.

function envInt(name: string, fallback: number): number {
  const v = process.env[name];
  if (!v) return fallback;
  const n = Number(v);
  return Number.isInteger(n) && n > 0 ? n : fallback;
}

// pauses may be turned off with 0
function envNonNegInt(name: string, fallback: number): number {
  const v = process.env[name];
  if (!v) return fallback;
  const n = Number(v);
  return Number.isInteger(n) && n >= 0 ? n : fallback;
}

const DESKTOP_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36';

export const CONFIG = {
  HTTP_TIMEOUT_MS: envInt('HTTP_TIMEOUT_MS', 15000),
  DNS_TIMEOUT_MS: envInt('DNS_TIMEOUT_MS', 3000),

  CONCURRENCY: {
    DEFAULT: envInt('CONCURRENCY_DEFAULT', 10),
  },

  PROBE: {
    TIMEOUT_MS: envInt('PROBE_TIMEOUT_MS', 10000),
    PACING_MS: envNonNegInt('PROBE_PACING_MS', 100), // pause after every path attempt
    MAX_REDIRECTS: envInt('PROBE_MAX_REDIRECTS', 10),
    USER_AGENT: process.env.PROBE_USER_AGENT || DESKTOP_USER_AGENT,
  },

  CRTSH: {
    DELAY_MS: envNonNegInt('CRTSH_DELAY_MS', 2000),
  },

  DNS_ENUM: {
    DELAY_MS: envNonNegInt('DNS_ENUM_DELAY_MS', 300),
    BASE_DELAY_MS: envNonNegInt('DNS_ENUM_BASE_DELAY_MS', 1000),
  },

  OUTPUT_DIR: process.env.OUTPUT_DIR || 'discovery_results',
};

export default CONFIG;
