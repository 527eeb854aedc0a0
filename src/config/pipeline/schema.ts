/**
 * Pipeline configuration schema definition.
 *
 * One object governs a coordinator instance and everything it owns: the
 * admission limit, timeouts and retry policy, the source store's dedup
 * and cache settings, and the defaults of the built-in stage adapters.
 *
 * The config is validated once at startup and then treated as read-only.
 * Changing it means constructing a new coordinator.
 */

import { z } from "zod";
import { ReportFormat, SearchProviderName } from "./enums.js";

const Probability = z.number().min(0).max(1);

/**
 * Coordinator scheduling, timeout and retry settings.
 */
export const CoordinatorConfigSchema = z
  .object({
    /** Stage executions allowed in flight across all runs */
    maxConcurrentTasks: z
      .number()
      .int()
      .min(1)
      .describe("Stage executions allowed in flight across all runs"),

    /** Timeout applied to a stage without its own override */
    defaultTimeoutSeconds: z
      .number()
      .positive()
      .describe("Per-stage timeout in seconds"),

    /** Per-stage timeout overrides */
    stageTimeoutsSeconds: z
      .object({
        research: z.number().positive(),
        verification: z.number().positive(),
        synthesis: z.number().positive(),
        rendering: z.number().positive(),
      })
      .partial()
      .strict()
      .describe("Per-stage timeout overrides in seconds"),

    /** Retries after the first attempt; 0 disables retrying */
    retryAttempts: z
      .number()
      .int()
      .min(0)
      .describe("Retries after the first attempt for transient failures"),

    retryBackoffMs: z.number().int().min(0).describe("Delay before the first retry"),

    retryBackoffMultiplier: z
      .number()
      .min(1)
      .describe("Factor applied to the delay after each retry"),

    maxRetryDelayMs: z.number().int().min(0).describe("Upper bound on a single retry delay"),

    /** Sources at or below this domain credibility are dropped before synthesis */
    minSourceCredibility: Probability.describe(
      "Domain credibility a source must exceed to reach synthesis"
    ),

    /** Feed unfiltered research sources to synthesis when verification fails */
    proceedWithUnverifiedSources: z
      .boolean()
      .describe("Whether synthesis may use unverified sources after a verification failure"),

    historyLimit: z
      .number()
      .int()
      .min(1)
      .describe("Number of finished run reports kept for lookup"),
  })
  .strict();

export type CoordinatorConfig = z.infer<typeof CoordinatorConfigSchema>;

/**
 * Source store persistence, dedup and cache settings.
 */
export const StoreConfigSchema = z
  .object({
    /** SQLite file path, or ":memory:" */
    dbPath: z.string().min(1).describe("SQLite database path or :memory:"),

    /** Similarity at or above which a candidate is a content duplicate */
    duplicateThreshold: Probability.describe("Content similarity that marks a duplicate"),

    /** Words per shingle in the similarity measure */
    shingleSize: z.number().int().min(1).max(8).describe("Words per shingle"),

    /** In-memory record cache bound; 0 disables caching */
    cacheSizeLimit: z.number().int().min(0).describe("Maximum cached records"),

    recentWindowDays: z
      .number()
      .int()
      .min(1)
      .describe("Window for the recently-accessed statistic"),

    defaultSearchLimit: z.number().int().min(1).describe("Page size when a search sets no limit"),
  })
  .strict();

export type StoreConfig = z.infer<typeof StoreConfigSchema>;

/**
 * Built-in research adapter settings.
 */
export const ResearchStageConfigSchema = z
  .object({
    searchProvider: SearchProviderName.describe("Search backend used by the research stage"),
    maxResults: z.number().int().min(1).describe("Result cap when the request sets none"),
    minContentLength: z
      .number()
      .int()
      .min(0)
      .describe("Results with shorter content are discarded"),
  })
  .strict();

export type ResearchStageConfig = z.infer<typeof ResearchStageConfigSchema>;

/**
 * Built-in verification adapter settings.
 */
export const VerificationStageConfigSchema = z
  .object({
    highCredibilityThreshold: Probability,
    mediumCredibilityThreshold: Probability,
    maxClaims: z.number().int().min(0).describe("Claims fact-checked per request"),
  })
  .strict()
  .refine((v) => v.mediumCredibilityThreshold <= v.highCredibilityThreshold, {
    message: "mediumCredibilityThreshold must not exceed highCredibilityThreshold",
    path: ["mediumCredibilityThreshold"],
  });

export type VerificationStageConfig = z.infer<typeof VerificationStageConfigSchema>;

/**
 * Built-in synthesis adapter settings.
 */
export const SynthesisStageConfigSchema = z
  .object({
    /** Sources that must share a phrase before it counts as agreement */
    minSourcesForConsensus: z.number().int().min(2),
    maxFindings: z.number().int().min(0),
    maxTrends: z.number().int().min(0),
    maxAgreements: z.number().int().min(0),
    maxDisagreements: z.number().int().min(0),
    maxKnowledgeGaps: z.number().int().min(0),
  })
  .strict();

export type SynthesisStageConfig = z.infer<typeof SynthesisStageConfigSchema>;

/**
 * Built-in rendering adapter settings.
 */
export const RenderingStageConfigSchema = z
  .object({
    outputDir: z.string().min(1).describe("Directory reports are written to"),
    templateDir: z.string().min(1).describe("Directory holding report templates"),
    defaultFormat: ReportFormat,
    includeToc: z.boolean().describe("Default for the table of contents"),
    author: z.string().min(1),
    version: z.string().min(1),
  })
  .strict();

export type RenderingStageConfig = z.infer<typeof RenderingStageConfigSchema>;

/**
 * Complete pipeline configuration schema.
 */
export const PipelineConfigSchema = z
  .object({
    coordinator: CoordinatorConfigSchema,
    store: StoreConfigSchema,
    research: ResearchStageConfigSchema,
    verification: VerificationStageConfigSchema,
    synthesis: SynthesisStageConfigSchema,
    rendering: RenderingStageConfigSchema,
  })
  .strict();

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;

/**
 * Section-wise partial overrides, as read from a JSON file or the
 * environment.
 */
export type PipelineConfigOverrides = {
  [K in keyof PipelineConfig]?: Partial<PipelineConfig[K]>;
};
