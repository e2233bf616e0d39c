import { getDomain } from 'tldts';

import type { RobotsScope } from '../../types.js';

/**
 * Key under which a URL's robots.txt record is cached. With the `domain` scope every
 * subdomain of a registrable domain shares one record; IP addresses and single-label
 * hosts have no registrable domain and key by hostname.
 */
export function robotsCacheKey(url: string | URL, scope: RobotsScope): string {
  const { hostname } = typeof url === 'string' ? new URL(url) : url;

  if (scope === 'host') {
    return hostname;
  }

  return getDomain(hostname) ?? hostname;
}

export function robotsTxtUrl(url: string | URL): string {
  const { origin } = typeof url === 'string' ? new URL(url) : url;
  return `${origin}/robots.txt`;
}
