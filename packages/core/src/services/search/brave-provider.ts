/**
 * Brave Search Provider Implementation
 *
 * Adapter that wraps the Brave Search client to implement SearchProvider
 */

import type {
  SearchProvider,
  SearchFilters,
  SearchResultItem,
  SearchResponse,
} from "../../interfaces/search-provider";
import { BraveSearchClient } from "../brave-search/client";
import type {
  BraveSearchClientOptions,
  BraveSearchResponse,
  BraveSearchResult,
} from "../brave-search/types";

/**
 * Brave Search implementation of SearchProvider.
 * No retries here: the worker loop owns retry decisions.
 */
export class BraveSearchProvider implements SearchProvider {
  private readonly client: BraveSearchClient;

  constructor(options: BraveSearchClientOptions | BraveSearchClient = {}) {
    this.client =
      options instanceof BraveSearchClient ? options : new BraveSearchClient(options);
  }

  /**
   * Convert Brave-specific result to generic SearchResultItem
   */
  private convertResult(braveResult: BraveSearchResult): SearchResultItem {
    return {
      title: braveResult.title,
      url: braveResult.url,
      description: braveResult.description,
      publishedDate: braveResult.age,
      language: braveResult.language,
    };
  }

  private convertResponse(braveResponse: BraveSearchResponse): SearchResponse {
    return {
      query: braveResponse.query,
      results: braveResponse.results.map((r) => this.convertResult(r)),
      totalResults: braveResponse.totalResults,
    };
  }

  async search(
    query: string,
    filters?: SearchFilters,
    signal?: AbortSignal
  ): Promise<SearchResponse> {
    const braveResponse = await this.client.search(query, filters, signal);
    return this.convertResponse(braveResponse);
  }

  getName(): string {
    return "Brave Search";
  }
}
