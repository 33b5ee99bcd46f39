/**
 * URL normalization and deduplication utilities
 */

import type { SearchResultItem } from "../../interfaces/search-provider";

/**
 * Normalize URL for deduplication
 * Drops query params, fragments, trailing slashes, and the www prefix
 */
export function normalizeUrl(url: string): string {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return url.trim().toLowerCase();
  }

  let hostname = parsed.hostname.toLowerCase();
  if (hostname.startsWith("www.")) {
    hostname = hostname.substring(4);
  }

  let pathname = parsed.pathname;
  if (pathname.endsWith("/") && pathname.length > 1) {
    pathname = pathname.slice(0, -1);
  }

  return `${parsed.protocol}//${hostname}${pathname}`;
}

/**
 * Keep the first result for each normalized URL
 */
export function deduplicateResults<T extends Pick<SearchResultItem, "url">>(
  results: readonly T[],
  seen: Set<string> = new Set()
): T[] {
  const unique: T[] = [];
  for (const result of results) {
    const key = normalizeUrl(result.url);
    if (!seen.has(key)) {
      seen.add(key);
      unique.push(result);
    }
  }
  return unique;
}
