/**
 * Research stage: search for sources on a query.
 *
 * The adapter asks a SearchProvider for candidates, then filters them by
 * preferred domain and content length and ranks what is left:
 *
 *   1. higher confidence first
 *   2. then longer content
 *   3. then longer snippet
 *
 * Providers:
 *
 *   mock   deterministic synthetic results, for offline development
 *   store  sources already held in the source store, ranked by how many
 *          query terms they contain
 */

import { ConfigError } from "../config/env.js";
import type { ResearchStageConfig, SearchProviderName } from "../config/pipeline/index.js";
import type { Logger } from "../logging/index.js";
import type { SourceStore } from "../store/index.js";
import { tokenize } from "../store/index.js";
import { BaseStageAdapter, type StageInvocation } from "./adapter.js";
import {
  ResearchRequestSchema,
  type ResearchRequest,
  type ResearchResponse,
  type ResearchResult,
} from "./contracts.js";
import { round2, sourceDomain } from "./text.js";

// ---------------------------------------------------------------------------
// Providers
// ---------------------------------------------------------------------------

export interface SearchOptions {
  query: string;
  maxResults: number;
  signal?: AbortSignal;
}

export interface SearchHit {
  title: string;
  url: string;
  snippet: string;
  content: string;
  confidence: number;
  lastUpdated: string | null;
}

export interface SearchProvider {
  readonly name: SearchProviderName;
  search(options: SearchOptions): Promise<SearchHit[]>;
}

function slugifyQuery(query: string): string {
  return query
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
}

/**
 * Synthetic results: `maxResults` hits on example1.com, example2.com, …
 * with confidence falling by 0.1 per rank.
 */
export class MockSearchProvider implements SearchProvider {
  readonly name = "mock";

  async search({ query, maxResults }: SearchOptions): Promise<SearchHit[]> {
    const slug = slugifyQuery(query) || "query";
    const title = query.charAt(0).toUpperCase() + query.slice(1);

    return Array.from({ length: maxResults }, (_, i) => {
      const rank = i + 1;
      return {
        title: `${title} - Result ${rank}`,
        url: `https://example${rank}.com/${slug}-${rank}`,
        snippet: `This is a sample result for query: ${query}. Result ${rank} contains relevant information about ${query}.`,
        content:
          `Result ${rank} summarizes published material on ${query}. ` +
          `Source ${rank} reports figures collected for ranking position ${rank}.`,
        confidence: round2(Math.max(0.1, 0.9 - i * 0.1)),
        lastUpdated: "2025-01-01",
      };
    });
  }
}

const STORE_PAGE_SIZE = 200;
const SNIPPET_LENGTH = 200;

/**
 * Searches the source store. A source matches when its title or content
 * contains at least one query term; more matching terms rank higher,
 * ties go to the more credible source.
 */
export class StoreSearchProvider implements SearchProvider {
  readonly name = "store";

  constructor(private readonly store: SourceStore) {}

  async search({ query, maxResults, signal }: SearchOptions): Promise<SearchHit[]> {
    const terms = new Set(tokenize(query));
    if (terms.size === 0) return [];

    const scored: { hit: SearchHit; matches: number }[] = [];

    for (let offset = 0; ; offset += STORE_PAGE_SIZE) {
      signal?.throwIfAborted();
      const page = await this.store.search({ limit: STORE_PAGE_SIZE, offset });

      for (const source of page.sources) {
        const words = new Set(tokenize(`${source.title} ${source.content}`));
        let matches = 0;
        for (const term of terms) {
          if (words.has(term)) matches++;
        }
        if (matches === 0) continue;

        const snippet = source.metadata["snippet"];
        scored.push({
          matches,
          hit: {
            title: source.title,
            url: source.url,
            snippet: typeof snippet === "string" ? snippet : source.content.slice(0, SNIPPET_LENGTH),
            content: source.content,
            confidence: source.credibilityScore,
            lastUpdated: source.publishDate,
          },
        });
      }

      if (page.sources.length < STORE_PAGE_SIZE) break;
    }

    return scored
      .sort((a, b) => b.matches - a.matches || b.hit.confidence - a.hit.confidence)
      .slice(0, maxResults)
      .map((s) => s.hit);
  }
}

/**
 * Provider named by the research config. The store provider needs a store.
 */
export function createSearchProvider(
  name: SearchProviderName,
  store?: SourceStore
): SearchProvider {
  switch (name) {
    case "mock":
      return new MockSearchProvider();
    case "store":
      if (!store) {
        throw new ConfigError('Search provider "store" needs a source store');
      }
      return new StoreSearchProvider(store);
  }
}

// ---------------------------------------------------------------------------
// Ranking
// ---------------------------------------------------------------------------

function matchesDomain(domain: string, preferred: readonly string[]): boolean {
  return preferred.some((d) => domain === d || domain.endsWith(`.${d}`));
}

export function rankResults(results: readonly ResearchResult[]): ResearchResult[] {
  return [...results].sort(
    (a, b) =>
      b.confidence - a.confidence ||
      b.content.length - a.content.length ||
      b.snippet.length - a.snippet.length
  );
}

// ---------------------------------------------------------------------------
// Adapter
// ---------------------------------------------------------------------------

export interface ResearchAdapterOptions {
  config: ResearchStageConfig;
  provider: SearchProvider;
  logger?: Logger;
}

export class ResearchAdapter extends BaseStageAdapter<
  typeof ResearchRequestSchema,
  Omit<ResearchResponse, "status">
> {
  private readonly config: ResearchStageConfig;
  private readonly provider: SearchProvider;

  constructor({ config, provider, logger }: ResearchAdapterOptions) {
    super("research", "WebResearcher", ResearchRequestSchema, logger);
    this.config = config;
    this.provider = provider;
  }

  protected async handle(
    request: ResearchRequest,
    { signal }: StageInvocation
  ): Promise<Omit<ResearchResponse, "status">> {
    const maxResults = request.max_results ?? this.config.maxResults;
    const preferred = (request.domains ?? []).map((d) => d.toLowerCase().replace(/^www\./, ""));

    this.logger.info("Searching", { query: request.query, provider: this.provider.name, maxResults });
    const hits = await this.provider.search({ query: request.query, maxResults, signal });

    const results: ResearchResult[] = [];
    for (const hit of hits) {
      const domain = sourceDomain({ url: hit.url });
      if (preferred.length > 0 && !matchesDomain(domain, preferred)) {
        this.logger.debug("Skipping non-preferred domain", { domain });
        continue;
      }
      if (hit.content.length < this.config.minContentLength) {
        this.logger.debug("Skipping short content", { url: hit.url, length: hit.content.length });
        continue;
      }
      results.push({
        title: hit.title,
        url: hit.url,
        snippet: hit.snippet,
        domain,
        content: hit.content,
        confidence: hit.confidence,
        last_updated: hit.lastUpdated,
      });
    }

    const ranked = rankResults(results).slice(0, maxResults);
    this.logger.info("Search complete", { found: hits.length, kept: ranked.length });
    return { query: request.query, results: ranked };
  }
}
