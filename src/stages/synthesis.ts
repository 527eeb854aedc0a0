/**
 * Synthesis stage: combine sources into findings, trends, agreements,
 * disagreements and knowledge gaps.
 *
 * Everything here is sentence-level keyword heuristics. There is no
 * language model behind it and no claim of semantic correctness; the
 * point is a deterministic, inspectable summary of what the sources say.
 *
 * With no sources every list is empty and the executive summary is "".
 */

import type { SynthesisStageConfig } from "../config/pipeline/index.js";
import type { Logger } from "../logging/index.js";
import { BaseStageAdapter } from "./adapter.js";
import {
  SynthesisRequestSchema,
  type Agreement,
  type Disagreement,
  type Importance,
  type KeyFinding,
  type KnowledgeGap,
  type SourceLike,
  type Synthesis,
  type SynthesisRequest,
  type Trend,
} from "./contracts.js";
import { containsAny, sourceDomain, splitSentences, uniqueBy } from "./text.js";

// ═══════════════════════════════════════════════════════════════════════════
// VOCABULARY
// ═══════════════════════════════════════════════════════════════════════════

const FINDING_MARKERS = [
  "found that",
  "shows that",
  "indicates",
  "suggests",
  "concludes",
  "demonstrates",
  "reveals",
  "according to",
  "research shows",
];

const TREND_WORDS: Record<Trend["direction"], readonly string[]> = {
  increasing: ["increase", "rise", "rising", "grow", "growth", "upward", "surge"],
  decreasing: ["decrease", "decline", "fall", "drop", "downward", "reduce"],
  stable: ["stable", "steady", "consistent", "unchanged", "constant"],
};

const CONTRADICTIONS: readonly { label: string; positive: RegExp; negative: RegExp }[] = [
  { label: "growth", positive: /\b(?:increas|rise|rising|grow)/i, negative: /\b(?:decreas|declin|fall)/i },
  { label: "effectiveness", positive: /\b(?:effective|successful)/i, negative: /\b(?:ineffective|unsuccessful)/i },
  { label: "benefits", positive: /\b(?:beneficial|positive)/i, negative: /\b(?:harmful|negative)/i },
  { label: "support", positive: /\b(?:support|agree)/i, negative: /\b(?:oppose|disagree)/i },
];

const GAP_MARKERS = [
  "further research",
  "more studies",
  "unknown",
  "unclear",
  "not well understood",
  "limited data",
  "insufficient evidence",
];

const HIGH_CONFIDENCE_DOMAINS = new Set([
  "nature.com",
  "science.org",
  "sciencedirect.com",
  "pubmed.ncbi.nlm.nih.gov",
  "arxiv.org",
  "reuters.com",
  "apnews.com",
  "bbc.com",
]);

const MEDIUM_CONFIDENCE_DOMAINS = new Set(["wikipedia.org", "forbes.com", "nytimes.com", "npr.org", "medium.com"]);

const KEY_POINT_LENGTH = 200;
const MAX_KEY_POINTS = 3;
const MAX_VIEW_STATEMENTS = 3;

// ═══════════════════════════════════════════════════════════════════════════
// PREPROCESSING
// ═══════════════════════════════════════════════════════════════════════════

interface PreparedSource {
  url: string;
  domain: string;
  confidence: number;
  sentences: string[];
  /** Capitalized two-word phrases, once per source */
  keyPhrases: Set<string>;
}

function stripPunctuation(word: string): string {
  return word.replace(/^[^\p{L}\p{N}]+|[^\p{L}\p{N}]+$/gu, "");
}

function words(text: string): string[] {
  return text
    .split(/\s+/)
    .map(stripPunctuation)
    .filter((w) => w.length > 0);
}

/**
 * Two-word phrases longer than 10 characters containing a capital letter.
 */
export function extractKeyPhrases(text: string): Set<string> {
  const tokens = words(text);
  const phrases = new Set<string>();
  for (let i = 0; i + 1 < tokens.length; i++) {
    const phrase = `${tokens[i]} ${tokens[i + 1]}`;
    if (phrase.length > 10 && /\p{Lu}/u.test(phrase)) phrases.add(phrase);
  }
  return phrases;
}

function domainConfidence(domain: string): number {
  if (HIGH_CONFIDENCE_DOMAINS.has(domain)) return 0.9;
  if (MEDIUM_CONFIDENCE_DOMAINS.has(domain)) return 0.7;
  if (domain.endsWith(".edu") || domain.endsWith(".gov")) return 0.85;
  return 0.5;
}

function prepare(source: SourceLike): PreparedSource {
  const text = source.content || source.snippet;
  const domain = sourceDomain(source);
  return {
    url: source.url,
    domain,
    confidence: source.confidence ?? domainConfidence(domain),
    sentences: splitSentences(text),
    keyPhrases: extractKeyPhrases(text),
  };
}

// ═══════════════════════════════════════════════════════════════════════════
// CLASSIFIERS
// ═══════════════════════════════════════════════════════════════════════════

export function categorizeFinding(sentence: string): string {
  if (containsAny(sentence, ["increase", "rise", "grow", "growth"])) return "growth_trend";
  if (containsAny(sentence, ["decrease", "decline", "fall", "drop"])) return "decline_trend";
  if (containsAny(sentence, ["cost", "price", "expense", "budget"])) return "economic";
  if (containsAny(sentence, ["impact", "effect", "influence"])) return "impact";
  if (containsAny(sentence, ["research", "study", "analysis"])) return "research";
  return "general";
}

export function findingImportance(sentence: string): Importance {
  if (containsAny(sentence, ["significant", "major", "critical", "important"])) return "high";
  if (containsAny(sentence, ["notable", "considerable", "substantial"])) return "medium";
  return "low";
}

function gapImportance(sentence: string): Importance {
  if (containsAny(sentence, ["critical", "essential", "important"])) return "high";
  if (containsAny(sentence, ["useful", "helpful", "valuable"])) return "medium";
  return "low";
}

export function suggestResearch(gap: string): string[] {
  const suggestions: string[] = [];
  if (containsAny(gap, ["cost"])) suggestions.push("Conduct cost-benefit analysis");
  if (containsAny(gap, ["impact"])) suggestions.push("Perform longitudinal impact studies");
  if (containsAny(gap, ["effectiveness"])) suggestions.push("Run controlled experiments");
  if (containsAny(gap, ["long-term"])) suggestions.push("Initiate long-term observational studies");
  if (suggestions.length === 0) suggestions.push("Conduct comprehensive research on this topic");
  return suggestions;
}

/**
 * Words of the sentence around the first trend word: three before,
 * the word itself, three after.
 */
export function trendDescription(sentence: string, direction: Trend["direction"]): string | undefined {
  const tokens = sentence.split(/\s+/).filter((w) => w.length > 0);
  const triggers = TREND_WORDS[direction];
  const index = tokens.findIndex((token) => {
    const word = stripPunctuation(token).toLowerCase();
    return triggers.some((t) => word.startsWith(t));
  });
  if (index < 0) return undefined;
  return tokens.slice(Math.max(0, index - 3), index + 4).join(" ");
}

/**
 * "recent" for years within the last three, the year span for older
 * years, "last_year" for relative mentions, else "unknown".
 */
export function timeframeOf(sentence: string, now: Date): string {
  const years = (sentence.match(/\b(?:19|20)\d{2}\b/g) ?? []).map(Number);
  if (years.length > 0) {
    const newest = Math.max(...years);
    const oldest = Math.min(...years);
    if (newest >= now.getUTCFullYear() - 3) return "recent";
    return oldest === newest ? String(newest) : `${oldest}-${newest}`;
  }
  if (containsAny(sentence, ["last year", "past year"])) return "last_year";
  return "unknown";
}

// ═══════════════════════════════════════════════════════════════════════════
// ADAPTER
// ═══════════════════════════════════════════════════════════════════════════

export interface SynthesisAdapterOptions {
  config: SynthesisStageConfig;
  logger?: Logger;
  /** Time source for `synthesis_date` and timeframes */
  clock?: () => Date;
}

export class SynthesisAdapter extends BaseStageAdapter<
  typeof SynthesisRequestSchema,
  { synthesis: Synthesis }
> {
  private readonly config: SynthesisStageConfig;
  private readonly clock: () => Date;

  constructor({ config, logger, clock }: SynthesisAdapterOptions) {
    super("synthesis", "SynthesizerAgent", SynthesisRequestSchema, logger);
    this.config = config;
    this.clock = clock ?? (() => new Date());
  }

  /**
   * Run every heuristic over the sources.
   */
  synthesize(topic: string, sources: readonly SourceLike[]): Synthesis {
    const now = this.clock();
    const prepared = sources.map(prepare);

    const keyFindings = this.findKeyFindings(prepared);
    const trends = this.findTrends(prepared, now);
    const agreements = this.findAgreements(prepared);
    const disagreements = this.findDisagreements(prepared);
    const knowledgeGaps = this.findKnowledgeGaps(prepared, topic);

    return {
      topic,
      executive_summary:
        prepared.length === 0
          ? ""
          : this.summarize(topic, keyFindings, trends, agreements, disagreements),
      key_findings: keyFindings,
      trends,
      agreements,
      disagreements,
      knowledge_gaps: knowledgeGaps,
      source_count: sources.length,
      synthesis_date: now.toISOString(),
    };
  }

  protected async handle(request: SynthesisRequest): Promise<{ synthesis: Synthesis }> {
    this.logger.info("Synthesizing", { topic: request.topic, sources: request.sources.length });
    const synthesis = this.synthesize(request.topic, request.sources);
    this.logger.info("Synthesis complete", {
      findings: synthesis.key_findings.length,
      trends: synthesis.trends.length,
      agreements: synthesis.agreements.length,
      disagreements: synthesis.disagreements.length,
      gaps: synthesis.knowledge_gaps.length,
    });
    return { synthesis };
  }

  private findKeyFindings(sources: readonly PreparedSource[]): KeyFinding[] {
    const findings: KeyFinding[] = [];
    for (const source of sources) {
      for (const sentence of source.sentences) {
        if (!containsAny(sentence, FINDING_MARKERS)) continue;
        findings.push({
          finding: sentence,
          confidence: source.confidence,
          sources: [source.url],
          category: categorizeFinding(sentence),
          importance: findingImportance(sentence),
        });
      }
    }
    return uniqueBy(findings, (f) => f.finding).slice(0, this.config.maxFindings);
  }

  private findTrends(sources: readonly PreparedSource[], now: Date): Trend[] {
    const trends: Trend[] = [];
    for (const direction of ["increasing", "decreasing", "stable"] as const) {
      for (const source of sources) {
        for (const sentence of source.sentences) {
          const description = trendDescription(sentence, direction);
          if (!description) continue;
          trends.push({
            trend: description,
            direction,
            evidence: [sentence],
            confidence: source.confidence,
            timeframe: timeframeOf(sentence, now),
          });
        }
      }
    }
    return uniqueBy(trends, (t) => t.trend).slice(0, this.config.maxTrends);
  }

  private findAgreements(sources: readonly PreparedSource[]): Agreement[] {
    if (sources.length === 0) return [];

    const byPhrase = new Map<string, PreparedSource[]>();
    for (const source of sources) {
      for (const phrase of source.keyPhrases) {
        const key = phrase.toLowerCase();
        const group = byPhrase.get(key);
        if (group) {
          if (!group.includes(source)) group.push(source);
        } else {
          byPhrase.set(key, [source]);
        }
      }
    }

    const agreements: Agreement[] = [];
    for (const [phrase, mentioning] of byPhrase) {
      if (mentioning.length < this.config.minSourcesForConsensus) continue;

      const keyPoints = new Set<string>();
      for (const source of mentioning) {
        for (const sentence of source.sentences) {
          if (!sentence.toLowerCase().includes(phrase)) continue;
          keyPoints.add(
            sentence.length < KEY_POINT_LENGTH ? sentence : `${sentence.slice(0, KEY_POINT_LENGTH - 3)}...`
          );
        }
      }

      agreements.push({
        topic: phrase,
        consensus_level: Math.min(mentioning.length / sources.length, 1),
        supporting_sources: mentioning.map((s) => s.url),
        key_points: [...keyPoints].slice(0, MAX_KEY_POINTS),
      });
    }

    return agreements
      .sort((a, b) => b.consensus_level - a.consensus_level)
      .slice(0, this.config.maxAgreements);
  }

  private findDisagreements(sources: readonly PreparedSource[]): Disagreement[] {
    const disagreements: Disagreement[] = [];

    for (const { label, positive, negative } of CONTRADICTIONS) {
      const positives: { sentence: string; url: string }[] = [];
      const negatives: { sentence: string; url: string }[] = [];

      for (const source of sources) {
        for (const sentence of source.sentences) {
          if (negative.test(sentence)) negatives.push({ sentence, url: source.url });
          else if (positive.test(sentence)) positives.push({ sentence, url: source.url });
        }
      }

      if (positives.length === 0 || negatives.length === 0) continue;
      disagreements.push({
        topic: `Conflicting views on ${label}`,
        conflicting_views: [
          { view: "positive", statements: positives.slice(0, MAX_VIEW_STATEMENTS) },
          { view: "negative", statements: negatives.slice(0, MAX_VIEW_STATEMENTS) },
        ],
        confidence: 0.7,
        explanation: "Sources present contradictory information on this topic",
      });
    }

    return disagreements.slice(0, this.config.maxDisagreements);
  }

  private findKnowledgeGaps(sources: readonly PreparedSource[], topic: string): KnowledgeGap[] {
    const topicWords = new Set(words(topic.toLowerCase()));
    const gaps: KnowledgeGap[] = [];

    for (const source of sources) {
      for (const sentence of source.sentences) {
        if (!containsAny(sentence, GAP_MARKERS)) continue;
        gaps.push({
          gap: sentence,
          importance: gapImportance(sentence),
          suggested_research: suggestResearch(sentence),
          related_topics: words(sentence)
            .filter((w) => w.length > 5 && !topicWords.has(w.toLowerCase()))
            .slice(0, 3),
        });
      }
    }

    return uniqueBy(gaps, (g) => g.gap).slice(0, this.config.maxKnowledgeGaps);
  }

  private summarize(
    topic: string,
    findings: readonly KeyFinding[],
    trends: readonly Trend[],
    agreements: readonly Agreement[],
    disagreements: readonly Disagreement[]
  ): string {
    const parts = [`This synthesis analyzes ${topic} based on multiple sources.`];

    const highImportance = findings.filter((f) => f.importance === "high").length;
    if (highImportance > 0) {
      parts.push(`Key findings include ${highImportance} high-importance discoveries.`);
    }

    const increasing = trends.filter((t) => t.direction === "increasing").length;
    const decreasing = trends.filter((t) => t.direction === "decreasing").length;
    if (increasing > 0) parts.push(`${increasing} increasing trends were identified.`);
    if (decreasing > 0) parts.push(`${decreasing} decreasing trends were identified.`);

    const strong = agreements.filter((a) => a.consensus_level > 0.7).length;
    if (strong > 0) parts.push(`There is strong consensus on ${strong} key topics.`);

    if (disagreements.length > 0) {
      parts.push(
        `${disagreements.length} areas of disagreement were identified, requiring further investigation.`
      );
    }

    parts.push(
      "Overall, the analysis provides a comprehensive overview of the current state of knowledge on this topic."
    );
    return parts.join(" ");
  }
}
