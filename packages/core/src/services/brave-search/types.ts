/**
 * Type definitions for Brave Search service
 */

import type { SearchFilters } from "../../interfaces/search-provider";
import type { Logger } from "../../logger";

export type { SearchFilters };

/**
 * Single search result from Brave
 */
export interface BraveSearchResult {
  title: string;
  url: string;
  description: string;
  age?: string; // Brave's relative or absolute publish date
  language?: string;
}

/**
 * Brave Search API response
 */
export interface BraveSearchResponse {
  query: string; // Query as sent, with site operators applied
  results: BraveSearchResult[];
  totalResults: number;
}

export interface BraveSearchClientOptions {
  apiKey?: string;
  minRequestIntervalMs?: number; // Spacing between requests (default: 1000)
  baseUrl?: string;
  logger?: Logger;
}
