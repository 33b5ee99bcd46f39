import { describe, it, expect, vi } from "vitest";
import { ToolError } from "../errors";
import type {
  SearchProvider,
  SearchResponse,
  SearchResultItem,
} from "../interfaces/search-provider";
import { SearchToolProvider, stripHtml } from "../services/search/search-tool";

function searchReturning(results: SearchResultItem[]) {
  const search = vi.fn(
    async (query: string): Promise<SearchResponse> => ({
      query,
      results,
      totalResults: results.length,
    })
  );
  const provider: SearchProvider = { search, getName: () => "fake" };
  return { provider, search };
}

describe("stripHtml", () => {
  it("removes tags and decodes entities", () => {
    expect(stripHtml("Acme &amp; <strong>Co</strong>&#39;s  story")).toBe("Acme & Co's story");
  });

  it("keeps a bare less-than sign and the text after it", () => {
    expect(stripHtml("Revenue grew <5% while costs > 3% in 2024")).toBe(
      "Revenue grew <5% while costs > 3% in 2024"
    );
  });

  it("decodes numeric and named entities", () => {
    expect(stripHtml("Acme&#8217;s <strong>culture</strong> &hellip;")).toBe(
      "Acme’s culture …"
    );
  });
});

describe("SearchToolProvider", () => {
  it("condenses the top results and cites the first", async () => {
    const { provider, search } = searchReturning([
      { title: "<b>Acme</b> history", url: "https://acme.example/history", description: "Founded in 1990." },
      { title: "Acme duplicate", url: "https://www.acme.example/history/", description: "Same page." },
      { title: "Acme news", url: "https://news.example/acme", description: "" },
      { title: "", url: "https://blog.example/acme", description: "Opened an office in Berlin." },
      { title: "Ignored", url: "https://other.example", description: "Past the limit." },
    ]);
    const tool = new SearchToolProvider(provider, { filters: { count: 5 } });

    const result = await tool.invoke({ query: '"Acme Corp" company history' });

    expect(result).toEqual({
      ok: true,
      content: {
        text: [
          "Acme history: Founded in 1990.",
          "Acme news",
          "Opened an office in Berlin.",
        ].join("\n"),
        source: { url: "https://acme.example/history", title: "Acme history" },
      },
    });
    expect(search).toHaveBeenCalledWith('"Acme Corp" company history', { count: 5 }, undefined);
  });

  it("treats zero results as malformed", async () => {
    const { provider } = searchReturning([]);

    const result = await new SearchToolProvider(provider).invoke({ query: "nothing" });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe("MalformedResponse");
      expect(result.error.message).toBe('No search results for "nothing"');
    }
  });

  it("passes search failures through as values", async () => {
    const provider: SearchProvider = {
      search: async () => {
        throw new ToolError("ToolRejected", "bad token", { fatal: true, status: 401 });
      },
      getName: () => "fake",
    };

    const result = await new SearchToolProvider(provider).invoke({ query: "Acme" });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe("ToolRejected");
      expect(result.error.fatal).toBe(true);
    }
  });

  it("is named after its search provider", () => {
    const { provider } = searchReturning([]);
    expect(new SearchToolProvider(provider).getName()).toBe("search:fake");
  });
});
