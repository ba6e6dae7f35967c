/**
 * Path and query-string helpers shared by registration and dispatch.
 */

const SLASH = 47;

/** Strip exactly one trailing slash. */
export function stripTrailingSlash(path: string): string {
  return path.charCodeAt(path.length - 1) === SLASH ? path.slice(0, -1) : path;
}

/**
 * Join a mount prefix and a pattern.
 */
export function joinPath(base: string, path: string): string {
  if (base === "/") {
    return path.startsWith("/") ? path : `/${path}`;
  }
  const normalizedBase = stripTrailingSlash(base);
  const normalizedPath = path.startsWith("/") ? path : `/${path}`;
  return `${normalizedBase}${normalizedPath}`;
}

export interface SplitPath {
  path: string;
  query: string | null;
}

/**
 * Split a raw request target into its normalized path and query string.
 *
 * Text after a second `?` is discarded.
 */
export function splitRawPath(rawPath: string): SplitPath {
  const q = rawPath.indexOf("?");
  if (q === -1) {
    return { path: stripTrailingSlash(rawPath), query: null };
  }
  let end = rawPath.indexOf("?", q + 1);
  if (end === -1) end = rawPath.length;
  return {
    path: stripTrailingSlash(rawPath.slice(0, q)),
    query: rawPath.slice(q + 1, end),
  };
}

/**
 * Parse `a=1&b=2` into a key/value map. Values are kept verbatim: no
 * percent-decoding, no `+` handling. Parts without `=` are dropped and the
 * last duplicate wins.
 */
export function parseQuery(query: string | null): Record<string, string> {
  const args: Record<string, string> = Object.create(null);
  if (!query) return args;

  for (const part of query.split("&")) {
    const eq = part.indexOf("=");
    if (eq === -1) continue;
    args[part.slice(0, eq)] = part.slice(eq + 1);
  }
  return args;
}
