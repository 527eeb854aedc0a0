/**
 * Stage adapter tests.
 *
 * Run: node --import tsx --test src/stages/stages.test.ts
 *
 * Tests cover:
 *   1. Research: mock and store providers, filtering, failure contract
 *   2. Verification: domain scoring, claim checks, recommendations
 *   3. Synthesis: heuristics and the assembled synthesis
 *   4. Rendering: files, formats, templates and the empty report
 */

import { test, type TestContext } from "node:test";
import { strict as assert } from "node:assert";
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";

import { ConfigError } from "../config/env.js";
import { loadPipelineConfig } from "../config/pipeline/index.js";
import { createEnvelope, type MessageEnvelope } from "../envelope/index.js";
import { TransientError } from "../errors/index.js";
import { SourceStore } from "../store/index.js";
import type { StageAdapter } from "./adapter.js";
import {
  RenderingResponseSchema,
  ResearchResponseSchema,
  SourceLikeSchema,
  SynthesisResponseSchema,
  VerificationResponseSchema,
  type Synthesis,
} from "./contracts.js";
import { createDefaultAdapters } from "./index.js";
import { buildSections, overallConfidence, RenderingAdapter, reportFilename } from "./rendering.js";
import {
  MockSearchProvider,
  ResearchAdapter,
  StoreSearchProvider,
  type SearchProvider,
} from "./research.js";
import {
  categorizeFinding,
  extractKeyPhrases,
  SynthesisAdapter,
  timeframeOf,
  trendDescription,
} from "./synthesis.js";
import { splitSentences } from "./text.js";
import { verifyClaim, VerificationAdapter } from "./verification.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST FIXTURES
// ═══════════════════════════════════════════════════════════════════════════

const CONFIG = loadPipelineConfig({ store: { dbPath: ":memory:" } });

const FIXED_NOW = new Date("2025-03-04T05:06:07Z");
const clock = () => FIXED_NOW;

function invoke(adapter: StageAdapter, payload: unknown, signal = new AbortController().signal) {
  return adapter.invoke(createEnvelope("request", payload), { signal, attempt: 1, runId: "run-test" });
}

function statusOf(response: MessageEnvelope): unknown {
  return response.payload["status"];
}

function tempDir(t: TestContext, prefix: string): string {
  const dir = mkdtempSync(join(tmpdir(), prefix));
  t.after(() => rmSync(dir, { recursive: true, force: true }));
  return dir;
}

function failingProvider(error: Error): SearchProvider {
  return {
    name: "mock",
    search: async () => {
      throw error;
    },
  };
}

// ═══════════════════════════════════════════════════════════════════════════
// TEXT
// ═══════════════════════════════════════════════════════════════════════════

test("splitSentences keeps decimals inside a sentence", () => {
  assert.deepEqual(splitSentences("Output grew 3.5% in May. Prices held!  Why?"), [
    "Output grew 3.5% in May",
    "Prices held",
    "Why",
  ]);
});

// ═══════════════════════════════════════════════════════════════════════════
// RESEARCH
// ═══════════════════════════════════════════════════════════════════════════

test("research returns ranked mock results", async () => {
  const adapter = new ResearchAdapter({ config: CONFIG.research, provider: new MockSearchProvider() });
  const response = await invoke(adapter, { query: "Solar Power", max_results: 3 });

  const payload = ResearchResponseSchema.parse(response.payload);
  assert.equal(payload.query, "Solar Power");
  assert.deepEqual(
    payload.results.map((r) => r.url),
    [
      "https://example1.com/solar-power-1",
      "https://example2.com/solar-power-2",
      "https://example3.com/solar-power-3",
    ]
  );
  assert.deepEqual(
    payload.results.map((r) => r.confidence),
    [0.9, 0.8, 0.7]
  );
  assert.equal(payload.results[0].domain, "example1.com");
  assert.equal(payload.results[0].title, "Solar Power - Result 1");
  assert.equal(response.metadata.agent, "WebResearcher");
  assert.equal(response.metadata.step, "research");
  assert.equal(response.metadata.runId, "run-test");
  assert.equal(response.metadata.attempt, 1);
});

test("research keeps only preferred domains", async () => {
  const adapter = new ResearchAdapter({ config: CONFIG.research, provider: new MockSearchProvider() });
  const response = await invoke(adapter, { query: "wind", domains: ["www.example2.com"] });

  const payload = ResearchResponseSchema.parse(response.payload);
  assert.deepEqual(
    payload.results.map((r) => r.url),
    ["https://example2.com/wind-2"]
  );
});

test("research drops results below the minimum content length", async () => {
  const config = loadPipelineConfig({ research: { minContentLength: 1000 } }).research;
  const adapter = new ResearchAdapter({ config, provider: new MockSearchProvider() });
  const payload = ResearchResponseSchema.parse((await invoke(adapter, { query: "wind" })).payload);
  assert.deepEqual(payload.results, []);
});

test("research answers an empty query with an error response", async () => {
  const adapter = new ResearchAdapter({ config: CONFIG.research, provider: new MockSearchProvider() });
  const response = await invoke(adapter, { query: "   " });

  assert.equal(statusOf(response), "error");
  assert.equal(response.metadata.agent, "WebResearcher");
  assert.match(String(response.payload["error"]), /^Invalid research request: query: /);
});

test("research turns provider failures into error responses", async () => {
  const adapter = new ResearchAdapter({
    config: CONFIG.research,
    provider: failingProvider(new Error("index offline")),
  });
  const response = await invoke(adapter, { query: "wind" });
  assert.deepEqual(response.payload, { status: "error", error: "index offline" });
  assert.equal(response.metadata.agent, "WebResearcher");
});

test("research rethrows transient failures", async () => {
  const adapter = new ResearchAdapter({
    config: CONFIG.research,
    provider: failingProvider(new TransientError("search backend unavailable")),
  });
  await assert.rejects(invoke(adapter, { query: "wind" }), TransientError);
});

test("research rejects once the signal is aborted", async () => {
  const adapter = new ResearchAdapter({ config: CONFIG.research, provider: new MockSearchProvider() });
  const controller = new AbortController();
  controller.abort();
  await assert.rejects(invoke(adapter, { query: "wind" }, controller.signal));
});

test("store provider ranks stored sources by matching terms", async (t) => {
  const store = await SourceStore.open(CONFIG.store);
  t.after(() => store.close());

  await store.add([
    {
      url: "https://www.iea.org/reports/heat-pumps",
      title: "Heat pump sales",
      content: "Heat pump installations grew across Europe last year.",
      credibilityScore: 0.9,
    },
    {
      url: "https://example.com/solar",
      title: "Solar panels",
      content: "Rooftop solar adoption and heat pump pairing.",
      credibilityScore: 0.5,
      metadata: { snippet: "solar snippet" },
    },
    {
      url: "https://example.org/wind",
      title: "Wind farms",
      content: "Offshore wind output.",
      credibilityScore: 0.7,
    },
  ]);

  const hits = await new StoreSearchProvider(store).search({ query: "heat pump", maxResults: 5 });

  assert.deepEqual(
    hits.map((h) => h.url),
    ["https://www.iea.org/reports/heat-pumps", "https://example.com/solar"]
  );
  assert.equal(hits[0].snippet, "Heat pump installations grew across Europe last year.");
  assert.equal(hits[1].snippet, "solar snippet");
  assert.equal(hits[0].confidence, 0.9);
});

test("default adapters need a store for the store provider", () => {
  const config = loadPipelineConfig({ research: { searchProvider: "store" } });
  assert.throws(() => createDefaultAdapters(config), ConfigError);
});

test("default adapters carry the stage agent names", () => {
  const adapters = createDefaultAdapters(CONFIG, { clock });
  assert.equal(adapters.research.agentName, "WebResearcher");
  assert.equal(adapters.verification.agentName, "VerificationAgent");
  assert.equal(adapters.synthesis.agentName, "SynthesizerAgent");
  assert.equal(adapters.rendering.agentName, "OutputGenerator");
});

// ═══════════════════════════════════════════════════════════════════════════
// VERIFICATION
// ═══════════════════════════════════════════════════════════════════════════

const NATURE = SourceLikeSchema.parse({
  url: "https://www.nature.com/articles/solar",
  content: "Agency data: solar output rose sharply.",
});

const BLOG = SourceLikeSchema.parse({
  url: "https://myblog.com/wind",
  content: "Wind turbines spin.",
});

const CLAIM = "Solar output rose 20 percent according to the agency";

test("assessDomain scores listed and unlisted domains", () => {
  const adapter = new VerificationAdapter({ config: CONFIG.verification });

  assert.deepEqual(adapter.assessDomain("nature.com"), {
    credibility_score: 0.9,
    authority_level: "high",
    bias_rating: "neutral",
    fact_check_rating: "verified",
  });
  assert.equal(adapter.assessDomain("news.bbc.com").bias_rating, "center");
  assert.equal(adapter.assessDomain("en.wikipedia.org").credibility_score, 0.6);
  assert.equal(adapter.assessDomain("en.wikipedia.org").authority_level, "medium");

  assert.deepEqual(adapter.assessDomain("cs.stanford.edu"), {
    credibility_score: 0.85,
    authority_level: "high",
    bias_rating: "neutral",
    fact_check_rating: "unverified",
  });
  assert.equal(adapter.assessDomain("cityforum.com").credibility_score, 0.4);
  assert.equal(adapter.assessDomain("cityforum.com").authority_level, "low");
  assert.equal(adapter.assessDomain("example.net").authority_level, "medium");
});

test("verifyClaim grades support across sources", () => {
  assert.deepEqual(verifyClaim(CLAIM, [NATURE, BLOG]), {
    claim: CLAIM,
    sources: [NATURE.url],
    verification_status: "disputed",
    confidence: 0.5,
    explanation: "Partially supported by 1 out of 2 sources",
  });
  assert.equal(verifyClaim(CLAIM, [NATURE]).verification_status, "verified");
  assert.equal(verifyClaim(CLAIM, [BLOG]).verification_status, "unverified");
});

test("verification with no sources is empty with score 0", async () => {
  const adapter = new VerificationAdapter({ config: CONFIG.verification });
  const response = await invoke(adapter, { content: "Anything at all.", sources: [] });
  const { verification } = VerificationResponseSchema.parse(response.payload);

  assert.equal(verification.credibility_score, 0);
  assert.deepEqual(verification.fact_checks, []);
  assert.deepEqual(verification.recommendations, []);
  assert.deepEqual(verification.warnings, []);
  assert.equal(verification.source_analysis.total_sources, 0);
  assert.equal(verification.source_analysis.overall_score, 0);
});

test("verification blends domain credibility with fact checks", async () => {
  const adapter = new VerificationAdapter({ config: CONFIG.verification });
  const response = await invoke(adapter, {
    content: `Research on solar. ${CLAIM}. Panels are blue.`,
    sources: [NATURE, BLOG],
  });
  const { verification } = VerificationResponseSchema.parse(response.payload);

  assert.equal(verification.source_analysis.overall_score, 0.65);
  assert.equal(verification.source_analysis.high_credibility, 1);
  assert.equal(verification.source_analysis.low_credibility, 1);
  assert.deepEqual(
    verification.fact_checks.map((fc) => fc.claim),
    [CLAIM]
  );
  assert.equal(verification.credibility_score, 0.39);
  assert.deepEqual(verification.recommendations, [
    "Information has low credibility - seek more reliable sources",
    "Review disputed claims carefully",
  ]);
  assert.deepEqual(verification.warnings, ["1 claims have conflicting evidence"]);
});

// ═══════════════════════════════════════════════════════════════════════════
// SYNTHESIS
// ═══════════════════════════════════════════════════════════════════════════

test("trendDescription takes three words either side of the trigger", () => {
  assert.equal(
    trendDescription("Analysts expect solar capacity to rise sharply over the next decade", "increasing"),
    "solar capacity to rise sharply over the"
  );
  assert.equal(trendDescription("Nothing moves here", "decreasing"), undefined);
});

test("timeframeOf reads years and relative mentions", () => {
  const now = new Date("2025-06-01T00:00:00Z");
  assert.equal(timeframeOf("Sales doubled in 2024", now), "recent");
  assert.equal(timeframeOf("Output peaked in 2015 and 2018", now), "2015-2018");
  assert.equal(timeframeOf("Prices fell last year", now), "last_year");
  assert.equal(timeframeOf("No dates here", now), "unknown");
});

test("categorizeFinding checks categories in order", () => {
  assert.equal(categorizeFinding("Costs increase yearly"), "growth_trend");
  assert.equal(categorizeFinding("Budget pressure persists"), "economic");
  assert.equal(categorizeFinding("Nothing notable"), "general");
});

test("extractKeyPhrases keeps long capitalized bigrams", () => {
  assert.deepEqual(
    [...extractKeyPhrases("The Paris Agreement set goals.")],
    ["Paris Agreement", "Agreement set"]
  );
});

test("synthesize combines sources into every part", () => {
  const adapter = new SynthesisAdapter({ config: CONFIG.synthesis, clock });
  const first = SourceLikeSchema.parse({
    url: "https://www.nature.com/articles/ground",
    content:
      "A study found that Ground Source adoption is significant. " +
      "Ground Source retrofits were successful in mild climates. " +
      "Further research is needed on grid impact.",
  });
  const second = SourceLikeSchema.parse({
    url: "https://greenblog.com/ground",
    content: "Ground Source installations were unsuccessful in cold regions.",
  });

  const synthesis = adapter.synthesize("ground source heating", [first, second]);

  assert.equal(synthesis.source_count, 2);
  assert.equal(synthesis.synthesis_date, FIXED_NOW.toISOString());
  assert.deepEqual(synthesis.key_findings, [
    {
      finding: "A study found that Ground Source adoption is significant",
      confidence: 0.9,
      sources: [first.url],
      category: "research",
      importance: "high",
    },
  ]);
  assert.deepEqual(synthesis.trends, []);
  assert.deepEqual(synthesis.agreements, [
    {
      topic: "ground source",
      consensus_level: 1,
      supporting_sources: [first.url, second.url],
      key_points: [
        "A study found that Ground Source adoption is significant",
        "Ground Source retrofits were successful in mild climates",
        "Ground Source installations were unsuccessful in cold regions",
      ],
    },
  ]);
  assert.equal(synthesis.disagreements.length, 1);
  assert.equal(synthesis.disagreements[0].topic, "Conflicting views on effectiveness");
  assert.deepEqual(synthesis.disagreements[0].conflicting_views, [
    {
      view: "positive",
      statements: [{ sentence: "Ground Source retrofits were successful in mild climates", url: first.url }],
    },
    {
      view: "negative",
      statements: [{ sentence: "Ground Source installations were unsuccessful in cold regions", url: second.url }],
    },
  ]);
  assert.deepEqual(synthesis.knowledge_gaps, [
    {
      gap: "Further research is needed on grid impact",
      importance: "low",
      suggested_research: ["Perform longitudinal impact studies"],
      related_topics: ["Further", "research", "needed"],
    },
  ]);
  assert.equal(
    synthesis.executive_summary,
    "This synthesis analyzes ground source heating based on multiple sources. " +
      "Key findings include 1 high-importance discoveries. " +
      "There is strong consensus on 1 key topics. " +
      "1 areas of disagreement were identified, requiring further investigation. " +
      "Overall, the analysis provides a comprehensive overview of the current state of knowledge on this topic."
  );
});

test("synthesis of no sources is empty", async () => {
  const adapter = new SynthesisAdapter({ config: CONFIG.synthesis, clock });
  const response = await invoke(adapter, { topic: "tidal power", sources: [] });
  const { synthesis } = SynthesisResponseSchema.parse(response.payload);

  assert.equal(synthesis.executive_summary, "");
  assert.equal(synthesis.source_count, 0);
  assert.deepEqual(synthesis.key_findings, []);
  assert.deepEqual(synthesis.agreements, []);
  assert.deepEqual(synthesis.knowledge_gaps, []);
});

test("synthesis rejects an empty topic", async () => {
  const adapter = new SynthesisAdapter({ config: CONFIG.synthesis, clock });
  const response = await invoke(adapter, { topic: "", sources: [] });
  assert.equal(statusOf(response), "error");
  assert.equal(response.metadata.agent, "SynthesizerAgent");
});

// ═══════════════════════════════════════════════════════════════════════════
// RENDERING
// ═══════════════════════════════════════════════════════════════════════════

const SYNTHESIS: Synthesis = {
  topic: "urban heat",
  executive_summary: "Summary text.",
  key_findings: [
    {
      finding: "Shade trees cut peak temperatures",
      confidence: 0.9,
      sources: ["https://city.gov/trees"],
      category: "impact",
      importance: "high",
    },
  ],
  trends: [
    {
      trend: "cooling demand rise",
      direction: "increasing",
      evidence: ["e1", "e2", "e3"],
      confidence: 0.7,
      timeframe: "recent",
    },
  ],
  agreements: [
    {
      topic: "green roofs",
      consensus_level: 0.5,
      supporting_sources: ["https://a.org/1", "https://b.org/2"],
      key_points: ["kp"],
    },
  ],
  disagreements: [],
  knowledge_gaps: [],
  source_count: 2,
  synthesis_date: FIXED_NOW.toISOString(),
};

const EMPTY_SYNTHESIS: Synthesis = {
  topic: "urban heat",
  executive_summary: "",
  key_findings: [],
  trends: [],
  agreements: [],
  disagreements: [],
  knowledge_gaps: [],
  source_count: 0,
  synthesis_date: FIXED_NOW.toISOString(),
};

function renderingAdapter(t: TestContext, overrides: Record<string, unknown> = {}) {
  const outputDir = tempDir(t, "reports-");
  const config = loadPipelineConfig({ rendering: { outputDir, ...overrides } }).rendering;
  return new RenderingAdapter({ config, clock });
}

async function render(adapter: RenderingAdapter, payload: Record<string, unknown>) {
  const response = await invoke(adapter, payload);
  const parsed = RenderingResponseSchema.parse(response.payload);
  return { ...parsed, text: readFileSync(parsed.report.filepath, "utf-8") };
}

test("reportFilename cleans the topic", () => {
  assert.equal(
    reportFilename("AI: Trends/2024 Report", FIXED_NOW, "md"),
    "research_report_ai__trends_2024_report_20250304_050607.md"
  );
  assert.equal(reportFilename("???", FIXED_NOW, "html"), "research_report_untitled_20250304_050607.html");
});

test("buildSections skips empty parts", () => {
  assert.deepEqual(
    buildSections(SYNTHESIS).map((s) => s.title),
    ["Executive Summary", "Key Findings", "Identified Trends", "Areas of Agreement"]
  );
  assert.deepEqual(buildSections(EMPTY_SYNTHESIS), []);
});

test("overallConfidence averages the populated parts", () => {
  assert.ok(Math.abs(overallConfidence(SYNTHESIS) - 0.7) < 1e-9);
  assert.equal(overallConfidence(EMPTY_SYNTHESIS), 0.5);
});

test("rendering writes a markdown report", async (t) => {
  const adapter = renderingAdapter(t);
  const { report, warnings, text } = await render(adapter, { synthesis: SYNTHESIS, format: "markdown" });

  assert.equal(report.filename, "research_report_urban_heat_20250304_050607.md");
  assert.equal(report.format, "markdown");
  assert.equal(report.sections, 4);
  assert.equal(report.size, Buffer.byteLength(text, "utf-8"));
  assert.deepEqual(warnings, []);

  const lines = text.split("\n");
  assert.equal(lines[0], "<!-- report format: markdown -->");
  assert.equal(lines[1], "# Research Report: urban heat");
  assert.ok(lines.includes("- Generated: 2025-03-04 05:06:07"));
  assert.ok(lines.includes("- Sources analyzed: 2"));
  assert.ok(lines.includes("- Overall confidence: 0.70"));
  assert.ok(lines.includes("## Table of Contents"));
  assert.ok(lines.includes("- [Areas of Agreement](#areas-of-agreement)"));
  assert.ok(lines.includes("1. Shade trees cut peak temperatures (confidence 0.90, 1 source)"));
  assert.ok(lines.includes("**Direction:** Increasing"));
  assert.ok(lines.includes("- e2"));
  assert.ok(!lines.includes("- e3"));
  assert.ok(lines.includes("**Supporting Sources:** 2"));
});

test("rendering honors include_toc", async (t) => {
  const adapter = renderingAdapter(t);
  const { text } = await render(adapter, { synthesis: SYNTHESIS, format: "markdown", include_toc: false });
  assert.ok(!text.split("\n").includes("## Table of Contents"));
});

test("rendering escapes the html header", async (t) => {
  const adapter = renderingAdapter(t);
  const { report, text } = await render(adapter, {
    synthesis: { ...SYNTHESIS, topic: "R&D <spending>" },
    format: "html",
  });

  assert.equal(report.filename, "research_report_rd_spending_20250304_050607.html");
  assert.ok(text.includes("<title>Research Report: R&amp;D &lt;spending&gt;</title>"));
  assert.ok(text.includes('<section id="key-findings">'));
  assert.ok(!text.includes('<style media="print">'));
});

test("pdf renders print-ready html with a warning", async (t) => {
  const adapter = renderingAdapter(t);
  const { report, warnings, text } = await render(adapter, { synthesis: SYNTHESIS, format: "pdf" });

  assert.equal(report.format, "pdf");
  assert.equal(report.filename, "research_report_urban_heat_20250304_050607.html");
  assert.deepEqual(warnings, ["PDF conversion is not available; wrote print-ready HTML instead"]);
  assert.ok(text.includes('<style media="print">'));
});

test("rendering an empty synthesis writes a placeholder body", async (t) => {
  const adapter = renderingAdapter(t, { defaultFormat: "markdown" });
  const { report, text } = await render(adapter, { synthesis: EMPTY_SYNTHESIS });

  assert.equal(report.sections, 0);
  const lines = text.split("\n");
  assert.ok(lines.includes("- Sources analyzed: 0"));
  assert.ok(lines.includes("_No sources were available for this report._"));
  assert.ok(!lines.includes("## Table of Contents"));
});

test("rendering uses a named template from the template directory", async (t) => {
  const templateDir = tempDir(t, "templates-");
  writeFileSync(join(templateDir, "brief.md"), "# {{report.title}}\n\n{{report.body}}\n");
  const adapter = renderingAdapter(t, { templateDir });

  const { text } = await render(adapter, { synthesis: SYNTHESIS, format: "markdown", template: "brief" });
  assert.ok(text.startsWith("# Research Report: urban heat\n\n## Executive Summary\n\nSummary text."));
});

test("rendering reports an unknown template as an error", async (t) => {
  const adapter = renderingAdapter(t);
  const response = await invoke(adapter, { synthesis: SYNTHESIS, template: "../secrets" });
  assert.equal(statusOf(response), "error");
  assert.equal(response.metadata.agent, "OutputGenerator");
});
