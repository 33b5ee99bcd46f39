/**
 * Brave Search API client
 * Handles authentication, rate limiting, and mapping HTTP failures to ToolErrors
 */

import { ToolError, errorMessage, toToolError } from "../../errors";
import { createLogger, type Logger } from "../../logger";
import type {
  BraveSearchClientOptions,
  BraveSearchResponse,
  BraveSearchResult,
  SearchFilters,
} from "./types";

const BRAVE_SEARCH_API_URL = "https://api.search.brave.com/res/v1/web/search";
const DEFAULT_MIN_REQUEST_INTERVAL = 1000; // 1 second between requests
const DEFAULT_COUNT = 20;

/**
 * Build query string with site filters
 */
export function buildQueryWithFilters(
  query: string,
  filters?: SearchFilters
): string {
  let modifiedQuery = query;

  if (filters?.includeDomains && filters.includeDomains.length > 0) {
    const siteFilters = filters.includeDomains
      .map((domain) => `site:${domain}`)
      .join(" OR ");
    modifiedQuery = `${modifiedQuery} (${siteFilters})`;
  }

  if (filters?.excludeDomains && filters.excludeDomains.length > 0) {
    const excludeFilters = filters.excludeDomains
      .map((domain) => `-site:${domain}`)
      .join(" ");
    modifiedQuery = `${modifiedQuery} ${excludeFilters}`;
  }

  return modifiedQuery.trim();
}

/**
 * URL parameters for one request
 */
export function buildSearchParams(
  query: string,
  filters?: SearchFilters
): URLSearchParams {
  const params = new URLSearchParams({
    q: buildQueryWithFilters(query, filters),
    count: String(filters?.count ?? DEFAULT_COUNT),
  });

  if (filters?.offset) {
    params.append("offset", String(filters.offset));
  }
  if (filters?.country) {
    params.append("country", filters.country);
  }
  if (filters?.language) {
    params.append("search_lang", filters.language);
  }
  if (filters?.safesearch) {
    params.append("safesearch", filters.safesearch);
  }
  return params;
}

/**
 * Map a non-2xx status to the tool failure taxonomy
 */
export function classifyHttpError(status: number, body: string): ToolError {
  const message = `Brave Search API error (${status}): ${body.slice(0, 200)}`;

  if (status === 401 || status === 403) {
    return new ToolError("ToolRejected", message, { status, fatal: true });
  }
  if (status === 429 || status >= 500) {
    return new ToolError("ToolUnavailable", message, { status });
  }
  return new ToolError("ToolRejected", message, { status });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalText(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

/**
 * Pull web results out of a raw Brave payload
 */
export function parseWebResults(data: unknown): BraveSearchResult[] {
  if (!isRecord(data)) {
    throw new ToolError("MalformedResponse", "Brave Search returned a non-object payload");
  }
  // Brave omits `web` entirely when nothing matched
  const web = data.web;
  if (web === undefined) {
    return [];
  }
  if (!isRecord(web) || !Array.isArray(web.results)) {
    throw new ToolError("MalformedResponse", "Brave Search payload has no web results list");
  }

  const results: BraveSearchResult[] = [];
  for (const raw of web.results) {
    if (!isRecord(raw) || typeof raw.url !== "string" || !raw.url) {
      continue;
    }
    results.push({
      title: optionalText(raw.title) ?? "",
      url: raw.url,
      description: optionalText(raw.description) ?? "",
      age: optionalText(raw.age),
      language: optionalText(raw.language),
    });
  }
  return results;
}

export class BraveSearchClient {
  private readonly apiKey: string | null;
  private readonly minRequestIntervalMs: number;
  private readonly baseUrl: string;
  private readonly log: Logger;
  // Earliest time the next request may start; reserved synchronously so
  // concurrent callers queue up instead of firing together
  private nextRequestAt = 0;
  private lastSlot = Number.NEGATIVE_INFINITY;
  private readonly waitingSlots: number[] = [];

  constructor(options: BraveSearchClientOptions = {}) {
    this.apiKey = options.apiKey?.trim() || null;
    this.minRequestIntervalMs =
      options.minRequestIntervalMs ?? DEFAULT_MIN_REQUEST_INTERVAL;
    this.baseUrl = options.baseUrl ?? BRAVE_SEARCH_API_URL;
    this.log = createLogger({ client: "brave-search" }, options.logger);
  }

  /**
   * Search the web using Brave Search API
   */
  async search(
    query: string,
    filters?: SearchFilters,
    signal?: AbortSignal
  ): Promise<BraveSearchResponse> {
    if (!this.apiKey) {
      throw new ToolError("ToolRejected", "Brave Search API key not configured", {
        fatal: true,
      });
    }

    await this.applyRateLimit(signal);

    const params = buildSearchParams(query, filters);
    const url = `${this.baseUrl}?${params.toString()}`;

    let response: Response;
    try {
      response = await fetch(url, {
        method: "GET",
        headers: {
          Accept: "application/json",
          "Accept-Encoding": "gzip",
          "X-Subscription-Token": this.apiKey,
        },
        signal,
      });
    } catch (error) {
      this.log.warn({ error: errorMessage(error) }, "Brave Search request failed");
      throw toToolError(error);
    }

    if (!response.ok) {
      const body = await response.text().catch(() => "");
      const toolError = classifyHttpError(response.status, body);
      this.log.warn(
        { status: response.status, kind: toolError.kind },
        "Brave Search API error"
      );
      throw toolError;
    }

    let data: unknown;
    try {
      data = await response.json();
    } catch (error) {
      throw new ToolError(
        "MalformedResponse",
        `Brave Search returned invalid JSON: ${errorMessage(error)}`
      );
    }

    const results = parseWebResults(data);
    this.log.debug({ query: params.get("q"), results: results.length }, "Brave Search done");

    return {
      query: params.get("q") ?? query,
      results,
      totalResults: results.length,
    };
  }

  /**
   * Wait for this request's slot. A caller aborted while waiting gives its
   * slot back.
   */
  private async applyRateLimit(signal?: AbortSignal): Promise<void> {
    const now = Date.now();
    const slot = Math.max(now, this.nextRequestAt);
    this.nextRequestAt = slot + this.minRequestIntervalMs;
    this.waitingSlots.push(slot);

    const waitTime = slot - now;
    if (waitTime > 0) {
      await new Promise<void>((resolve) => {
        const done = () => {
          clearTimeout(timer);
          signal?.removeEventListener("abort", done);
          resolve();
        };
        const timer = setTimeout(done, waitTime);
        signal?.addEventListener("abort", done, { once: true });
      });
    }

    this.waitingSlots.splice(this.waitingSlots.indexOf(slot), 1);

    if (signal?.aborted) {
      this.releaseSlot();
      throw new ToolError("ToolTimeout", "Search cancelled while waiting for rate limit");
    }
    this.lastSlot = Math.max(this.lastSlot, slot);
  }

  /**
   * Recompute the next free slot from requests that started or still wait
   */
  private releaseSlot(): void {
    const latest = Math.max(this.lastSlot, ...this.waitingSlots);
    this.nextRequestAt = Number.isFinite(latest)
      ? latest + this.minRequestIntervalMs
      : 0;
  }
}
