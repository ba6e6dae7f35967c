const HTML_CONTENT_TYPE = "text/html; charset=utf-8";

export const HTML_HEADERS: Readonly<Record<string, string>> = Object.freeze({
  "Content-Type": HTML_CONTENT_TYPE,
});

export const INTERNAL_ERROR_BODY = "Internal Server Error";

/**
 * Path and query of an absolute URL, exactly as written.
 *
 * @example
 * requestTarget("http://localhost:8000/item/a?x=1#top") // "/item/a?x=1"
 */
export function requestTarget(url: string): string {
  const schemeEnd = url.indexOf("://");
  if (schemeEnd === -1) {
    return url.startsWith("/") ? url : "/";
  }
  const pathStart = url.indexOf("/", schemeEnd + 3);
  if (pathStart === -1) {
    return "/";
  }
  const hash = url.indexOf("#", pathStart);
  return hash === -1 ? url.slice(pathStart) : url.slice(pathStart, hash);
}

export function elapsedMs(start: number): number {
  return Math.round((performance.now() - start) * 100) / 100;
}
