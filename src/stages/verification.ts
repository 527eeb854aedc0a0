/**
 * Verification stage: assess source credibility and fact-check claims.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * SCORING
 * ═══════════════════════════════════════════════════════════════════════════
 *
 *   Domain credibility
 *     listed in data/credible-domains.json   high → 0.9, medium → 0.6
 *     otherwise by suffix                    .edu/.gov 0.85, .org 0.7,
 *                                            .com 0.6, anything else 0.5
 *     adjustments                            "wiki" +0.1, "blog"/"forum" −0.2
 *
 *   Claims
 *     sentences of the request content that carry a factual marker
 *     ("according to", "%", "million", …), at most `maxClaims`
 *     a source supports a claim when it shares ≥ 30% of the claim's words
 *     verified    ≥ 70% of sources support it
 *     disputed    some support
 *     unverified  none
 *
 *   Overall score = 0.6 × mean domain credibility
 *                 + 0.4 × share of verified claims (0.5 with no claims)
 *
 * With no sources there is nothing to assess: every structure comes back
 * empty and the score is 0.
 */

import { readFileSync } from "node:fs";
import { z } from "zod";

import type { VerificationStageConfig } from "../config/pipeline/index.js";
import { ConfigError } from "../config/env.js";
import type { Logger } from "../logging/index.js";
import { tokenize } from "../store/index.js";
import { BaseStageAdapter } from "./adapter.js";
import {
  VerificationRequestSchema,
  type DomainAssessment,
  type FactCheck,
  type SourceAnalysis,
  type SourceLike,
  type Verification,
  type VerificationRequest,
} from "./contracts.js";
import { average, containsAny, round2, sourceDomain, splitSentences } from "./text.js";

// ---------------------------------------------------------------------------
// Credible domain table
// ---------------------------------------------------------------------------

const CredibleDomainSchema = z.object({
  authority: z.enum(["high", "medium"]),
  bias: z.string().min(1),
});

const CredibleDomainTableSchema = z.record(CredibleDomainSchema);

export type CredibleDomainTable = z.infer<typeof CredibleDomainTableSchema>;

export const DEFAULT_CREDIBLE_DOMAINS_PATH = new URL(
  "../../data/credible-domains.json",
  import.meta.url
);

/**
 * Read and validate a credible-domain table.
 *
 * @throws ConfigError when the file is missing or malformed
 */
export function loadCredibleDomains(path: string | URL = DEFAULT_CREDIBLE_DOMAINS_PATH): CredibleDomainTable {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    throw new ConfigError(
      `Cannot read credible domain table ${String(path)}: ${err instanceof Error ? err.message : String(err)}`
    );
  }
  const result = CredibleDomainTableSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(`Invalid credible domain table ${String(path)}: ${result.error.message}`);
  }
  return result.data;
}

// ---------------------------------------------------------------------------
// Heuristics
// ---------------------------------------------------------------------------

const CLAIM_MARKERS = [
  "according to",
  "research shows",
  "study found",
  "data indicates",
  "percent",
  "%",
  "increase",
  "decrease",
  "million",
  "billion",
] as const;

const CLAIM_SUPPORT_OVERLAP = 0.3;
const VERIFIED_SUPPORT_SHARE = 0.7;
const SOURCE_WEIGHT = 0.6;
const FACT_CHECK_WEIGHT = 0.4;
const MODERATE_SCORE = 0.6;

function lookupDomain(table: CredibleDomainTable, domain: string) {
  const labels = domain.split(".");
  for (let i = 0; i < labels.length - 1; i++) {
    const entry = table[labels.slice(i).join(".")];
    if (entry) return entry;
  }
  return undefined;
}

export function extractClaims(content: string, limit: number): string[] {
  return splitSentences(content)
    .filter((sentence) => containsAny(sentence, CLAIM_MARKERS))
    .slice(0, limit);
}

function supports(claim: string, source: SourceLike): boolean {
  const claimWords = new Set(tokenize(claim));
  if (claimWords.size === 0) return false;
  const sourceWords = new Set(tokenize(`${source.title} ${source.content || source.snippet}`));
  let overlap = 0;
  for (const word of claimWords) {
    if (sourceWords.has(word)) overlap++;
  }
  return overlap >= claimWords.size * CLAIM_SUPPORT_OVERLAP;
}

export function verifyClaim(claim: string, sources: readonly SourceLike[]): FactCheck {
  const supporting = sources.filter((s) => supports(claim, s));
  const base = { claim, sources: supporting.map((s) => s.url) };

  if (supporting.length === 0) {
    return {
      ...base,
      verification_status: "unverified",
      confidence: 0.2,
      explanation: "No supporting evidence found in sources",
    };
  }
  if (supporting.length >= sources.length * VERIFIED_SUPPORT_SHARE) {
    return {
      ...base,
      verification_status: "verified",
      confidence: 0.8,
      explanation: `Supported by ${supporting.length} out of ${sources.length} sources`,
    };
  }
  return {
    ...base,
    verification_status: "disputed",
    confidence: 0.5,
    explanation: `Partially supported by ${supporting.length} out of ${sources.length} sources`,
  };
}

// ---------------------------------------------------------------------------
// Adapter
// ---------------------------------------------------------------------------

export interface VerificationAdapterOptions {
  config: VerificationStageConfig;
  /** Defaults to data/credible-domains.json */
  credibleDomains?: CredibleDomainTable;
  logger?: Logger;
}

export class VerificationAdapter extends BaseStageAdapter<
  typeof VerificationRequestSchema,
  { verification: Verification }
> {
  private readonly config: VerificationStageConfig;
  private readonly credibleDomains: CredibleDomainTable;

  constructor({ config, credibleDomains, logger }: VerificationAdapterOptions) {
    super("verification", "VerificationAgent", VerificationRequestSchema, logger);
    this.config = config;
    this.credibleDomains = credibleDomains ?? loadCredibleDomains();
  }

  assessDomain(domain: string): DomainAssessment {
    const known = lookupDomain(this.credibleDomains, domain);
    if (known) {
      return {
        credibility_score: known.authority === "high" ? 0.9 : 0.6,
        authority_level: known.authority,
        bias_rating: known.bias,
        fact_check_rating: "verified",
      };
    }

    let score = 0.5;
    if (domain.endsWith(".edu") || domain.endsWith(".gov")) score = 0.85;
    else if (domain.endsWith(".org")) score = 0.7;
    else if (domain.endsWith(".com")) score = 0.6;

    if (domain.includes("wiki")) score = Math.min(score + 0.1, 1);
    else if (domain.includes("blog") || domain.includes("forum")) score = Math.max(score - 0.2, 0);
    score = round2(score);

    return {
      credibility_score: score,
      authority_level: this.levelOf(score),
      bias_rating: "neutral",
      fact_check_rating: "unverified",
    };
  }

  analyzeSources(sources: readonly SourceLike[]): SourceAnalysis {
    const analysis: SourceAnalysis = {
      total_sources: sources.length,
      high_credibility: 0,
      medium_credibility: 0,
      low_credibility: 0,
      domains: {},
      overall_score: 0,
    };

    const scores: number[] = [];
    for (const source of sources) {
      const domain = sourceDomain(source);
      const assessment = this.assessDomain(domain);
      analysis.domains[domain] = assessment;
      scores.push(assessment.credibility_score);

      switch (this.levelOf(assessment.credibility_score)) {
        case "high":
          analysis.high_credibility++;
          break;
        case "medium":
          analysis.medium_credibility++;
          break;
        case "low":
          analysis.low_credibility++;
          break;
      }
    }

    analysis.overall_score = round2(average(scores) ?? 0);
    return analysis;
  }

  protected async handle(request: VerificationRequest): Promise<{ verification: Verification }> {
    const { sources } = request;
    this.logger.info("Verifying sources", { sources: sources.length });

    if (sources.length === 0) {
      return {
        verification: {
          credibility_score: 0,
          fact_checks: [],
          source_analysis: this.analyzeSources([]),
          recommendations: [],
          warnings: [],
        },
      };
    }

    const sourceAnalysis = this.analyzeSources(sources);
    const factChecks = extractClaims(request.content, this.config.maxClaims).map((claim) =>
      verifyClaim(claim, sources)
    );

    const verifiedShare =
      factChecks.length === 0
        ? 0.5
        : factChecks.filter((fc) => fc.verification_status === "verified").length / factChecks.length;
    const credibilityScore = round2(
      sourceAnalysis.overall_score * SOURCE_WEIGHT + verifiedShare * FACT_CHECK_WEIGHT
    );

    const { recommendations, warnings } = this.recommend(credibilityScore, sourceAnalysis, factChecks);

    return {
      verification: {
        credibility_score: credibilityScore,
        fact_checks: factChecks,
        source_analysis: sourceAnalysis,
        recommendations,
        warnings,
      },
    };
  }

  private levelOf(score: number): DomainAssessment["authority_level"] {
    if (score >= this.config.highCredibilityThreshold) return "high";
    if (score >= this.config.mediumCredibilityThreshold) return "medium";
    return "low";
  }

  private recommend(
    score: number,
    analysis: SourceAnalysis,
    factChecks: readonly FactCheck[]
  ): { recommendations: string[]; warnings: string[] } {
    const recommendations: string[] = [];
    const warnings: string[] = [];

    if (score >= this.config.highCredibilityThreshold) {
      recommendations.push("Information appears highly credible and well-sourced");
    } else if (score >= MODERATE_SCORE) {
      recommendations.push("Information is moderately credible but verify with additional sources");
    } else {
      recommendations.push("Information has low credibility - seek more reliable sources");
    }

    if (analysis.low_credibility > analysis.high_credibility) {
      recommendations.push("Consider finding more authoritative sources");
      warnings.push("Majority of sources have low credibility ratings");
    }

    const disputed = factChecks.filter((fc) => fc.verification_status === "disputed").length;
    if (disputed > 0) {
      warnings.push(`${disputed} claims have conflicting evidence`);
      recommendations.push("Review disputed claims carefully");
    }

    for (const [domain, info] of Object.entries(analysis.domains)) {
      if (info.bias_rating !== "neutral") {
        recommendations.push(`Be aware of potential bias in ${domain} (${info.bias_rating})`);
      }
    }

    return { recommendations, warnings };
  }
}
