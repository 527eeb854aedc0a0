/**
 * Default pipeline configuration.
 *
 * Values mirror the behavior the pipeline was tuned with: five-minute
 * stage timeouts, two retries for transient failures, three stage
 * executions in flight, and an 0.8 similarity threshold for content
 * duplicates.
 */

import { fileURLToPath } from "node:url";
import type { PipelineConfig } from "./schema.js";

/** `templates/` at the package root, from both src/ and dist/. */
const BUNDLED_TEMPLATE_DIR = fileURLToPath(new URL("../../../templates/", import.meta.url));

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = {
  coordinator: {
    maxConcurrentTasks: 3,
    defaultTimeoutSeconds: 300,
    stageTimeoutsSeconds: {},
    retryAttempts: 2,
    retryBackoffMs: 500,
    retryBackoffMultiplier: 2,
    maxRetryDelayMs: 10_000,
    minSourceCredibility: 0.3,
    proceedWithUnverifiedSources: false,
    historyLimit: 50,
  },

  store: {
    dbPath: "data/sources.db",
    duplicateThreshold: 0.8,
    shingleSize: 3,
    cacheSizeLimit: 1000,
    recentWindowDays: 7,
    defaultSearchLimit: 50,
  },

  research: {
    searchProvider: "mock",
    maxResults: 5,
    minContentLength: 0,
  },

  verification: {
    highCredibilityThreshold: 0.8,
    mediumCredibilityThreshold: 0.5,
    maxClaims: 5,
  },

  synthesis: {
    minSourcesForConsensus: 2,
    maxFindings: 10,
    maxTrends: 5,
    maxAgreements: 5,
    maxDisagreements: 3,
    maxKnowledgeGaps: 5,
  },

  rendering: {
    outputDir: "output/reports",
    templateDir: BUNDLED_TEMPLATE_DIR,
    defaultFormat: "html",
    includeToc: true,
    author: "Research Workflow",
    version: "1.0",
  },
};
