/**
 * Stage adapters: wire contracts, the adapter base, and the built-in
 * research, verification, synthesis and rendering adapters.
 */

import type { PipelineConfig, StageName } from "../config/pipeline/index.js";
import type { Logger } from "../logging/index.js";
import type { SourceStore } from "../store/index.js";
import type { StageAdapter } from "./adapter.js";
import { RenderingAdapter } from "./rendering.js";
import { createSearchProvider, ResearchAdapter, type SearchProvider } from "./research.js";
import { SynthesisAdapter } from "./synthesis.js";
import { VerificationAdapter, type CredibleDomainTable } from "./verification.js";

export * from "./contracts.js";
export {
  BaseStageAdapter,
  errorResponse,
  type StageAdapter,
  type StageInvocation,
} from "./adapter.js";
export {
  createSearchProvider,
  MockSearchProvider,
  rankResults,
  ResearchAdapter,
  StoreSearchProvider,
  type ResearchAdapterOptions,
  type SearchHit,
  type SearchOptions,
  type SearchProvider,
} from "./research.js";
export {
  DEFAULT_CREDIBLE_DOMAINS_PATH,
  extractClaims,
  loadCredibleDomains,
  verifyClaim,
  VerificationAdapter,
  type CredibleDomainTable,
  type VerificationAdapterOptions,
} from "./verification.js";
export {
  categorizeFinding,
  extractKeyPhrases,
  findingImportance,
  suggestResearch,
  SynthesisAdapter,
  timeframeOf,
  trendDescription,
  type SynthesisAdapterOptions,
} from "./synthesis.js";
export {
  buildSections,
  overallConfidence,
  RenderingAdapter,
  reportFilename,
  type RenderingAdapterOptions,
} from "./rendering.js";
export { average, round2, sourceDomain, splitSentences } from "./text.js";

/** One adapter per pipeline stage */
export type StageAdapters = Record<StageName, StageAdapter>;

export interface DefaultAdapterOptions {
  logger?: Logger;
  /** Backs the "store" search provider */
  store?: SourceStore;
  /** Overrides the provider named in the research config */
  searchProvider?: SearchProvider;
  credibleDomains?: CredibleDomainTable;
  clock?: () => Date;
}

/**
 * The built-in adapter for every stage, configured from the pipeline
 * config.
 */
export function createDefaultAdapters(
  config: PipelineConfig,
  options: DefaultAdapterOptions = {}
): StageAdapters {
  const { logger, clock } = options;
  const provider =
    options.searchProvider ?? createSearchProvider(config.research.searchProvider, options.store);

  return {
    research: new ResearchAdapter({ config: config.research, provider, logger }),
    verification: new VerificationAdapter({
      config: config.verification,
      credibleDomains: options.credibleDomains,
      logger,
    }),
    synthesis: new SynthesisAdapter({ config: config.synthesis, logger, clock }),
    rendering: new RenderingAdapter({ config: config.rendering, logger, clock }),
  };
}
