/**
 * SignalRadar — URL Normalization
 *
 * Produces the exact-match key for the URL stage of the dedup cascade.
 */

const TRACKING_PARAMS = new Set([
  'fbclid',
  'gclid',
  'mc_cid',
  'mc_eid',
  'ref',
  'ref_src',
  'igshid',
  'si',
  's',
]);

function isTrackingParam(name: string): boolean {
  const key = name.toLowerCase();
  return key.startsWith('utm_') || TRACKING_PARAMS.has(key);
}

/**
 * Scheme-less canonical form: host without "www.", path without a
 * trailing slash, tracking parameters removed, the rest sorted, no fragment.
 * Returns an empty string for empty input.
 */
export function normalizeUrl(url: string): string {
  const trimmed = url.trim();
  if (!trimmed) return '';

  let parsed: URL;
  try {
    parsed = new URL(trimmed);
  } catch {
    return trimmed.toLowerCase();
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    return trimmed.toLowerCase();
  }

  const host = parsed.host.toLowerCase().replace(/^www\./, '');
  const path = parsed.pathname.replace(/\/+$/, '');

  const params = Array.from(parsed.searchParams.entries())
    .filter(([name]) => !isTrackingParam(name))
    .sort(([a, av], [b, bv]) => (a === b ? av.localeCompare(bv) : a < b ? -1 : 1));

  const query = new URLSearchParams(params).toString();
  return `${host}${path}${query ? `?${query}` : ''}`;
}
