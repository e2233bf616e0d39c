const CRAWLABLE_PROTOCOLS = new Set(['http:', 'https:']);

/**
 * Resolves `raw` against `base` into the crawler's canonical form, or `null` when the
 * result is not an http(s) URL. The WHATWG parser already lowercases the scheme and host
 * and drops default ports; on top of that the fragment and trailing slashes go, except
 * for the root path.
 */
export function normalizeUrl(raw: string, base?: string | URL): string | null {
  let url: URL;
  try {
    url = new URL(raw, base);
  } catch {
    return null;
  }

  if (!CRAWLABLE_PROTOCOLS.has(url.protocol)) {
    return null;
  }

  url.hash = '';
  if (url.pathname !== '/') {
    url.pathname = url.pathname.replace(/\/+$/, '') || '/';
  }

  return url.href;
}

/** `resolve` collaborator: an href found on `base`, made absolute and normalized. */
export function resolveLink(base: string, relative: string): string | null {
  return normalizeUrl(relative, base);
}
