/**
 * Stage wire contracts.
 *
 * Request and response payloads exchanged with each stage adapter. Field
 * names are snake_case because they cross the envelope boundary as JSON;
 * everything inside the TypeScript code base uses camelCase.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * STAGES
 * ═══════════════════════════════════════════════════════════════════════════
 *
 *   research      {query, max_results?, domains?}
 *                 → {status, query, results[]}
 *
 *   verification  {content, sources[]}
 *                 → {status, verification}
 *
 *   synthesis     {topic, sources[]}
 *                 → {status, synthesis}
 *
 *   rendering     {synthesis, format?, include_toc?, template?}
 *                 → {status, report, warnings[]}
 *
 * Every adapter answers failures with `{status: "error", error}`.
 */

import { z } from "zod";
import { ReportFormat } from "../config/pipeline/enums.js";

const Score = z.number().min(0).max(1);
const Importance = z.enum(["high", "medium", "low"]);
export type Importance = z.infer<typeof Importance>;

// ---------------------------------------------------------------------------
// Shared
// ---------------------------------------------------------------------------

/**
 * A source as passed between stages. Only `url` is required; stages
 * read what they need and carry unknown keys through untouched.
 */
export const SourceLikeSchema = z
  .object({
    url: z.string().min(1),
    title: z.string().default(""),
    content: z.string().default(""),
    snippet: z.string().default(""),
    domain: z.string().optional(),
    confidence: Score.optional(),
    last_updated: z.string().nullable().optional(),
  })
  .passthrough();

export type SourceLike = z.output<typeof SourceLikeSchema>;

/** Payload of every failed stage response */
export type ErrorResponse = { status: "error"; error: string };

// ---------------------------------------------------------------------------
// Research
// ---------------------------------------------------------------------------

export const ResearchRequestSchema = z
  .object({
    query: z.string().trim().min(1, "query must not be empty"),
    max_results: z.number().int().positive().optional(),
    domains: z.array(z.string().min(1)).optional(),
  })
  .strict();

export type ResearchRequest = z.infer<typeof ResearchRequestSchema>;

export const ResearchResultSchema = z.object({
  title: z.string(),
  url: z.string(),
  snippet: z.string(),
  domain: z.string(),
  content: z.string(),
  confidence: Score,
  last_updated: z.string().nullable(),
});

export type ResearchResult = z.infer<typeof ResearchResultSchema>;

export const ResearchResponseSchema = z.object({
  status: z.literal("success"),
  query: z.string(),
  results: z.array(ResearchResultSchema),
});

export type ResearchResponse = z.infer<typeof ResearchResponseSchema>;

// ---------------------------------------------------------------------------
// Verification
// ---------------------------------------------------------------------------

export const VerificationRequestSchema = z
  .object({
    content: z.string().trim().min(1, "content must not be empty"),
    sources: z.array(SourceLikeSchema),
  })
  .strict();

export type VerificationRequest = z.infer<typeof VerificationRequestSchema>;

export const FactCheckSchema = z.object({
  claim: z.string(),
  sources: z.array(z.string()),
  verification_status: z.enum(["verified", "disputed", "unverified"]),
  confidence: Score,
  explanation: z.string(),
});

export type FactCheck = z.infer<typeof FactCheckSchema>;

export const DomainAssessmentSchema = z.object({
  credibility_score: Score,
  authority_level: Importance,
  bias_rating: z.string(),
  fact_check_rating: z.enum(["verified", "unverified"]),
});

export type DomainAssessment = z.infer<typeof DomainAssessmentSchema>;

export const SourceAnalysisSchema = z.object({
  total_sources: z.number().int().min(0),
  high_credibility: z.number().int().min(0),
  medium_credibility: z.number().int().min(0),
  low_credibility: z.number().int().min(0),
  domains: z.record(DomainAssessmentSchema),
  overall_score: Score,
});

export type SourceAnalysis = z.infer<typeof SourceAnalysisSchema>;

export const VerificationSchema = z.object({
  credibility_score: Score,
  fact_checks: z.array(FactCheckSchema),
  source_analysis: SourceAnalysisSchema,
  recommendations: z.array(z.string()),
  warnings: z.array(z.string()),
});

export type Verification = z.infer<typeof VerificationSchema>;

export const VerificationResponseSchema = z.object({
  status: z.literal("success"),
  verification: VerificationSchema,
});

export type VerificationResponse = z.infer<typeof VerificationResponseSchema>;

// ---------------------------------------------------------------------------
// Synthesis
// ---------------------------------------------------------------------------

export const SynthesisRequestSchema = z
  .object({
    topic: z.string().trim().min(1, "topic must not be empty"),
    sources: z.array(SourceLikeSchema),
  })
  .strict();

export type SynthesisRequest = z.infer<typeof SynthesisRequestSchema>;

export const KeyFindingSchema = z.object({
  finding: z.string(),
  confidence: Score,
  sources: z.array(z.string()),
  category: z.string(),
  importance: Importance,
});

export type KeyFinding = z.infer<typeof KeyFindingSchema>;

export const TrendSchema = z.object({
  trend: z.string(),
  direction: z.enum(["increasing", "decreasing", "stable"]),
  evidence: z.array(z.string()),
  confidence: Score,
  timeframe: z.string(),
});

export type Trend = z.infer<typeof TrendSchema>;

export const AgreementSchema = z.object({
  topic: z.string(),
  consensus_level: Score,
  supporting_sources: z.array(z.string()),
  key_points: z.array(z.string()),
});

export type Agreement = z.infer<typeof AgreementSchema>;

export const ConflictingViewSchema = z.object({
  view: z.enum(["positive", "negative"]),
  statements: z.array(z.object({ sentence: z.string(), url: z.string() })),
});

export type ConflictingView = z.infer<typeof ConflictingViewSchema>;

export const DisagreementSchema = z.object({
  topic: z.string(),
  conflicting_views: z.array(ConflictingViewSchema),
  confidence: Score,
  explanation: z.string(),
});

export type Disagreement = z.infer<typeof DisagreementSchema>;

export const KnowledgeGapSchema = z.object({
  gap: z.string(),
  importance: Importance,
  suggested_research: z.array(z.string()),
  related_topics: z.array(z.string()),
});

export type KnowledgeGap = z.infer<typeof KnowledgeGapSchema>;

export const SynthesisSchema = z.object({
  topic: z.string(),
  executive_summary: z.string(),
  key_findings: z.array(KeyFindingSchema),
  trends: z.array(TrendSchema),
  agreements: z.array(AgreementSchema),
  disagreements: z.array(DisagreementSchema),
  knowledge_gaps: z.array(KnowledgeGapSchema),
  source_count: z.number().int().min(0),
  synthesis_date: z.string(),
});

export type Synthesis = z.infer<typeof SynthesisSchema>;

export const SynthesisResponseSchema = z.object({
  status: z.literal("success"),
  synthesis: SynthesisSchema,
});

export type SynthesisResponse = z.infer<typeof SynthesisResponseSchema>;

// ---------------------------------------------------------------------------
// Rendering
// ---------------------------------------------------------------------------

export const RenderingRequestSchema = z
  .object({
    synthesis: SynthesisSchema,
    format: ReportFormat.optional(),
    include_toc: z.boolean().optional(),
    template: z.string().min(1).optional(),
  })
  .strict();

export type RenderingRequest = z.infer<typeof RenderingRequestSchema>;

export const ReportInfoSchema = z.object({
  filepath: z.string(),
  filename: z.string(),
  format: ReportFormat,
  size: z.number().int().min(0),
  sections: z.number().int().min(0),
});

export type ReportInfo = z.infer<typeof ReportInfoSchema>;

export const RenderingResponseSchema = z.object({
  status: z.literal("success"),
  report: ReportInfoSchema,
  warnings: z.array(z.string()),
});

export type RenderingResponse = z.infer<typeof RenderingResponseSchema>;

// ---------------------------------------------------------------------------
// Response status
// ---------------------------------------------------------------------------

/**
 * The part of any stage response the coordinator inspects.
 */
export const StageStatusSchema = z
  .object({
    status: z.enum(["success", "error"]),
    error: z.string().optional(),
  })
  .passthrough();

export type StageStatus = z.infer<typeof StageStatusSchema>;
