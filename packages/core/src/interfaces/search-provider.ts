/**
 * Search Provider Interface
 *
 * Abstract interface for web search providers.
 * Allows switching between Brave Search, Google, Bing, etc.
 */

/**
 * Search filters for customizing queries
 */
export interface SearchFilters {
  // Location/language
  country?: string; // ISO 3166-1 alpha-2 country code (e.g., "US", "GB")
  language?: string; // ISO 639-1 language code (e.g., "en", "es")

  // Result configuration
  count?: number; // Number of results to return (default: 20)
  offset?: number; // Pagination offset

  // Content filtering
  safesearch?: "off" | "moderate" | "strict"; // Safe search level

  // Site filtering (applied to query string)
  includeDomains?: string[]; // Domains to prioritize
  excludeDomains?: string[]; // Domains to exclude
}

/**
 * Single search result (provider-agnostic)
 */
export interface SearchResultItem {
  title: string;
  url: string;
  description: string;
  publishedDate?: string;
  language?: string;
}

/**
 * Search response (provider-agnostic)
 */
export interface SearchResponse {
  query: string; // The query that was executed
  results: SearchResultItem[];
  totalResults: number;
}

/**
 * Search Provider interface
 * Implementations throw ToolError on failure.
 */
export interface SearchProvider {
  /**
   * Execute a single web search
   */
  search(
    query: string,
    filters?: SearchFilters,
    signal?: AbortSignal
  ): Promise<SearchResponse>;

  /**
   * Get the provider name
   */
  getName(): string;
}
