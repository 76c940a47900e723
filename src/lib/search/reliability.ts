// Domains with an established editorial record. Anything else scores the default.
const TRUSTED_DOMAINS: Readonly<Record<string, number>> = {
  'wikipedia.org': 0.9,
  'bbc.com': 0.9,
  'timesofindia.com': 0.8,
  'hindustantimes.com': 0.8,
  'thehindu.com': 0.8,
  'indianexpress.com': 0.8,
  'ndtv.com': 0.8,
  'news18.com': 0.7,
  'zeenews.india.com': 0.7,
};

export const DEFAULT_RELIABILITY = 0.6;

/** Reliability of a result's host, matching the domain or any subdomain of it. */
export function sourceReliability(source: string): number {
  const host = source.toLowerCase();
  for (const [domain, score] of Object.entries(TRUSTED_DOMAINS)) {
    if (host === domain || host.endsWith(`.${domain}`)) return score;
  }
  return DEFAULT_RELIABILITY;
}
