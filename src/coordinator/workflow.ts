/**
 * Data flow between pipeline stages.
 *
 *   research       {query, max_results}
 *        │ results ──────────────► source store
 *        ▼
 *   verification   {content, sources: results}
 *        │ source_analysis.domains → credibility filter
 *        ▼
 *   synthesis      {topic, sources: credible results}
 *        │ synthesis
 *        ▼
 *   rendering      {synthesis, format}
 *
 * Each builder takes the previous stage's parsed response. The
 * coordinator treats a missing response as "no input" and does not call
 * the builder.
 */

import type { ParsedRunRequest } from "./types.js";
import type { SourceInput } from "../store/index.js";
import {
  sourceDomain,
  type RenderingRequest,
  type ResearchRequest,
  type ResearchResult,
  type SynthesisRequest,
  type Verification,
  type VerificationRequest,
} from "../stages/index.js";

/** Credibility assumed for a source whose domain was not assessed */
export const UNKNOWN_DOMAIN_CREDIBILITY = 0.5;

export function researchRequest(request: ParsedRunRequest): ResearchRequest {
  return { query: request.query ?? request.topic, max_results: request.maxSources };
}

/**
 * Verification checks the claims made across the research results
 * against the results themselves.
 */
export function verificationRequest(
  topic: string,
  results: readonly ResearchResult[]
): VerificationRequest {
  const content = [
    `Research on ${topic}.`,
    ...results.map((r) => r.content || r.snippet).filter((text) => text.length > 0),
  ].join("\n\n");
  return { content, sources: [...results] };
}

/**
 * Drop results whose domain credibility is at or below `minCredibility`.
 */
export function filterCredibleSources(
  results: readonly ResearchResult[],
  verification: Verification,
  minCredibility: number
): ResearchResult[] {
  const { domains } = verification.source_analysis;
  return results.filter((result) => {
    const assessed = domains[sourceDomain(result)];
    const score = assessed ? assessed.credibility_score : UNKNOWN_DOMAIN_CREDIBILITY;
    return score > minCredibility;
  });
}

export function synthesisRequest(topic: string, sources: readonly ResearchResult[]): SynthesisRequest {
  return { topic, sources: [...sources] };
}

export function renderingRequest(
  synthesis: RenderingRequest["synthesis"],
  request: ParsedRunRequest
): RenderingRequest {
  return { synthesis, format: request.format };
}

/**
 * Store input for one research result.
 */
export function toSourceInput(result: ResearchResult, runId: string, query: string): SourceInput {
  return {
    url: result.url,
    title: result.title,
    content: result.content,
    publishDate: result.last_updated,
    credibilityScore: result.confidence,
    metadata: { snippet: result.snippet, query, runId },
  };
}
