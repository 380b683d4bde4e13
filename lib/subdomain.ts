import * as psl from "psl";

/**
 * Normalize an input string to a bare host: protocol, leading "www.",
 * path/query/fragment and port stripped, lowercased.
 * Returns "" when nothing is left.
 */
export function normalizeDomain(input: string): string {
  let s = input.trim();

  s = s.replace(/^https?:\/\//i, "");
  s = s.replace(/^www\./i, "");
  s = s.split(/[/?#]/)[0];
  // drop ":port"
  const colon = s.indexOf(":");
  if (colon !== -1) s = s.slice(0, colon);

  return s.toLowerCase();
}

/**
 * Host shape check: non-empty labels, at least one dot, no whitespace or
 * control characters. Unlisted suffixes pass; psl is not consulted.
 */
export function isValidHost(host: string): boolean {
  if (!host || host.length > 255) return false;
  if (/[\s\x00-\x1f]/.test(host)) return false;
  const labels = host.split(".");
  return labels.length >= 2 && labels.every(Boolean);
}

/**
 * Registrable domain of a host per the public suffix list, or the last
 * two labels when psl has no answer (e.g. unlisted suffixes).
 */
export function baseDomainOf(host: string): string | null {
  const cleaned = host.trim().toLowerCase().replace(/\.+$/, "");
  const parts = cleaned.split(".").filter(Boolean);
  if (parts.length < 2) return null;
  return psl.get(cleaned) ?? parts.slice(-2).join(".");
}
