/**
 * Brave Search API service
 *
 * Handles web search via Brave Search API with:
 * - Rate limiting (1 request per second by default)
 * - Query filtering and parameter support
 * - Result deduplication
 * - HTTP failures mapped to ToolErrors
 */

export {
  BraveSearchClient,
  buildQueryWithFilters,
  buildSearchParams,
  classifyHttpError,
  parseWebResults,
} from "./client";
export { normalizeUrl, deduplicateResults } from "./deduplication";
export type {
  BraveSearchResult,
  BraveSearchResponse,
  BraveSearchClientOptions,
} from "./types";
