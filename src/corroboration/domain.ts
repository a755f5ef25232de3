/*
 * Canonical authority domain of a source URL: lower-cased host with a
 * leading "www." removed. Returns '' when the URL cannot be parsed.
 * The result is the independence key for corroboration.
 */
export function normalizeDomain(url: string): string {
  let host: string;
  try {
    host = new URL(url.trim()).hostname.toLowerCase();
  } catch {
    return '';
  }
  return host.startsWith('www.') ? host.slice(4) : host;
}
