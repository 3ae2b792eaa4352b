/**
 * URL canonicalization and link filters for the crawler.
 *
 * Canonical form: resolved against its base, http(s) only, scheme and host
 * lowercased, default port dropped, fragment and credentials removed,
 * trailing slashes removed from every path except "/", query kept verbatim.
 * `/a`, `/a/` and `/a#x` all map to the same string.
 */

const ALLOWED_PROTOCOLS = new Set(["http:", "https:"]);

// SSRF Protection: Block internal/private networks
const BLOCKED_HOSTNAMES = [
  "localhost",
  "127.0.0.1",
  "0.0.0.0",
  "[::1]",
  "metadata.google.internal",
  "169.254.169.254", // AWS/GCP metadata
];

const BLOCKED_HOSTNAME_PATTERNS = [
  /^10\.\d+\.\d+\.\d+$/, // 10.x.x.x
  /^172\.(1[6-9]|2\d|3[0-1])\.\d+\.\d+$/, // 172.16-31.x.x
  /^192\.168\.\d+\.\d+$/, // 192.168.x.x
  /\.local$/,
  /\.internal$/,
];

export function normalizeUrl(raw: string, base?: string): string | null {
  let url: URL;
  try {
    url = base === undefined ? new URL(raw.trim()) : new URL(raw.trim(), base);
  } catch {
    return null;
  }

  if (!ALLOWED_PROTOCOLS.has(url.protocol)) {
    return null;
  }

  url.hash = "";
  url.username = "";
  url.password = "";

  if (url.pathname.length > 1 && url.pathname.endsWith("/")) {
    url.pathname = url.pathname.replace(/\/+$/, "") || "/";
  }

  // drops a bare "?"
  if (url.search === "") {
    url.search = "";
  }

  return url.href;
}

export function hostOf(url: string): string {
  try {
    return new URL(url).host;
  } catch {
    return "";
  }
}

export function isSameHost(url: string, host: string): boolean {
  return hostOf(url) === host;
}

/**
 * A skip path matches when the URL path equals it or sits beneath it,
 * so "/cart" skips "/cart" and "/cart/items" but not "/cartography".
 */
export function matchesSkipRule(url: string, skipPaths: readonly string[], skipExtensions?: RegExp): boolean {
  let pathname: string;
  try {
    pathname = new URL(url).pathname.toLowerCase();
  } catch {
    return true;
  }

  if (skipExtensions?.test(pathname)) {
    return true;
  }

  return skipPaths.some((prefix) => {
    const rule = prefix.toLowerCase().replace(/\/+$/, "");
    return pathname === rule || pathname.startsWith(`${rule}/`);
  });
}

export function isBlockedUrl(url: string): boolean {
  try {
    const parsed = new URL(url);
    const hostname = parsed.hostname.toLowerCase();

    if (BLOCKED_HOSTNAMES.includes(hostname)) {
      return true;
    }

    return BLOCKED_HOSTNAME_PATTERNS.some((pattern) => pattern.test(hostname));
  } catch {
    return true; // Block invalid URLs
  }
}
