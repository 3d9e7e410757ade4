import ddg from "duck-duck-scrape";
import type { EvidenceSearchBackend, RawSearchHit } from "./evidence-search.js";

const HTML_TAG_PATTERN = /<[^>]+>/g;

/** Web search through DuckDuckGo with moderate safe search. */
export function createDuckDuckGoSearchBackend(): EvidenceSearchBackend {
  return async (query, maxResults) => {
    const response = await ddg.search(query, { safeSearch: ddg.SafeSearchType.MODERATE });
    if (response.noResults) {
      return [];
    }
    return response.results.slice(0, Math.max(0, maxResults)).map(
      (result): RawSearchHit => ({
        title: result.title.replace(HTML_TAG_PATTERN, ""),
        href: result.url,
        body: result.description.replace(HTML_TAG_PATTERN, ""),
      }),
    );
  };
}
