/**
 * Search tool
 *
 * Exposes a SearchProvider as the ToolProvider workers call. One
 * invocation runs one search and condenses the top results into a
 * single piece of text, cited to the first result.
 */

import * as cheerio from "cheerio";
import { ToolError, toToolError } from "../../errors";
import type {
  SearchFilters,
  SearchProvider,
  SearchResultItem,
} from "../../interfaces/search-provider";
import type {
  Instruction,
  ToolInvokeOptions,
  ToolProvider,
  ToolResult,
} from "../../interfaces/tool-provider";
import { deduplicateResults } from "../brave-search/deduplication";

const DEFAULT_TOP_RESULTS = 3;

export interface SearchToolOptions {
  filters?: SearchFilters;
  topResults?: number; // Results condensed into one finding
}

/**
 * Text content of a title or snippet, with tags removed and entities decoded
 */
export function stripHtml(text: string): string {
  const $ = cheerio.load(text, null, false);
  return $.root().text().replace(/\s+/g, " ").trim();
}

function describe(result: SearchResultItem): string {
  const title = stripHtml(result.title);
  const description = stripHtml(result.description);
  if (title && description) {
    return `${title}: ${description}`;
  }
  return title || description;
}

export class SearchToolProvider implements ToolProvider {
  private readonly topResults: number;

  constructor(
    private readonly search: SearchProvider,
    private readonly options: SearchToolOptions = {}
  ) {
    this.topResults = options.topResults ?? DEFAULT_TOP_RESULTS;
  }

  async invoke(
    instruction: Instruction,
    options?: ToolInvokeOptions
  ): Promise<ToolResult> {
    try {
      const response = await this.search.search(
        instruction.query,
        this.options.filters,
        options?.signal
      );

      const results = deduplicateResults(response.results)
        .filter((result) => describe(result).length > 0)
        .slice(0, this.topResults);

      if (results.length === 0) {
        return {
          ok: false,
          error: new ToolError(
            "MalformedResponse",
            `No search results for "${instruction.query}"`
          ),
        };
      }

      const [first] = results;
      const title = stripHtml(first.title);
      return {
        ok: true,
        content: {
          text: results.map(describe).join("\n"),
          source: title ? { url: first.url, title } : { url: first.url },
        },
      };
    } catch (error) {
      return { ok: false, error: toToolError(error) };
    }
  }

  getName(): string {
    return `search:${this.search.getName()}`;
  }
}
