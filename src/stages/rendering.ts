/**
 * Rendering stage: turn a synthesis into a report file.
 *
 * One report section per populated synthesis part, in this order:
 *
 *   Executive Summary · Key Findings · Identified Trends ·
 *   Areas of Agreement · Areas of Disagreement · Knowledge Gaps
 *
 * Markdown output uses templates/report.md, html and pdf use
 * templates/report.html. There is no PDF engine in the stack: `pdf`
 * writes the print-styled HTML and says so in `warnings`.
 *
 * A request may name its own template from the template directory.
 * Custom templates render non-strict, so they may show a subset of the
 * report variables.
 */

import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";

import type { RenderingStageConfig, ReportFormat } from "../config/pipeline/index.js";
import type { Logger } from "../logging/index.js";
import {
  buildReportContext,
  createSection,
  formatBody,
  formatToc,
  renderReport,
  ReportTemplateLoader,
  type MarkupKind,
  type ReportBlock,
  type ReportSection,
} from "../reports/index.js";
import { BaseStageAdapter } from "./adapter.js";
import {
  RenderingRequestSchema,
  type RenderingRequest,
  type RenderingResponse,
  type Synthesis,
} from "./contracts.js";
import { average } from "./text.js";

// ═══════════════════════════════════════════════════════════════════════════
// SECTIONS
// ═══════════════════════════════════════════════════════════════════════════

const IMPORTANCE_ORDER = ["high", "medium", "low"] as const;
const MAX_EVIDENCE = 2;
const MAX_VIEW_SENTENCES = 2;

function titleCase(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? "" : "s"}`;
}

function findingBlocks(synthesis: Synthesis): ReportBlock[] {
  const blocks: ReportBlock[] = [];
  for (const importance of IMPORTANCE_ORDER) {
    const findings = synthesis.key_findings.filter((f) => f.importance === importance);
    if (findings.length === 0) continue;
    blocks.push({ kind: "heading", text: `${titleCase(importance)} Importance Findings` });
    blocks.push({
      kind: "list",
      ordered: true,
      items: findings.map(
        (f) =>
          `${f.finding} (confidence ${f.confidence.toFixed(2)}, ${plural(f.sources.length, "source")})`
      ),
    });
  }
  return blocks;
}

function trendBlocks(synthesis: Synthesis): ReportBlock[] {
  return synthesis.trends.flatMap((trend, i): ReportBlock[] => [
    { kind: "heading", text: `Trend ${i + 1}: ${trend.trend}` },
    { kind: "field", label: "Direction", value: titleCase(trend.direction) },
    { kind: "field", label: "Confidence", value: trend.confidence.toFixed(2) },
    { kind: "field", label: "Timeframe", value: trend.timeframe },
    ...(trend.evidence.length > 0
      ? [{ kind: "list", items: trend.evidence.slice(0, MAX_EVIDENCE) } satisfies ReportBlock]
      : []),
  ]);
}

function agreementBlocks(synthesis: Synthesis): ReportBlock[] {
  return synthesis.agreements.flatMap((agreement, i): ReportBlock[] => [
    { kind: "heading", text: `Agreement ${i + 1}: ${agreement.topic}` },
    { kind: "field", label: "Consensus Level", value: agreement.consensus_level.toFixed(2) },
    { kind: "field", label: "Supporting Sources", value: String(agreement.supporting_sources.length) },
    ...(agreement.key_points.length > 0
      ? [{ kind: "list", items: agreement.key_points } satisfies ReportBlock]
      : []),
  ]);
}

function disagreementBlocks(synthesis: Synthesis): ReportBlock[] {
  return synthesis.disagreements.flatMap((disagreement, i): ReportBlock[] => [
    { kind: "heading", text: `Disagreement ${i + 1}: ${disagreement.topic}` },
    { kind: "field", label: "Confidence", value: disagreement.confidence.toFixed(2) },
    { kind: "field", label: "Explanation", value: disagreement.explanation },
    ...disagreement.conflicting_views.flatMap((view): ReportBlock[] => [
      { kind: "paragraph", text: `${titleCase(view.view)} view:` },
      { kind: "list", items: view.statements.slice(0, MAX_VIEW_SENTENCES).map((s) => s.sentence) },
    ]),
  ]);
}

function gapBlocks(synthesis: Synthesis): ReportBlock[] {
  return synthesis.knowledge_gaps.flatMap((gap, i): ReportBlock[] => [
    { kind: "heading", text: `Knowledge Gap ${i + 1}: ${gap.gap}` },
    { kind: "field", label: "Importance", value: titleCase(gap.importance) },
    ...(gap.suggested_research.length > 0
      ? [{ kind: "list", items: gap.suggested_research } satisfies ReportBlock]
      : []),
    ...(gap.related_topics.length > 0
      ? [{ kind: "field", label: "Related Topics", value: gap.related_topics.join(", ") } satisfies ReportBlock]
      : []),
  ]);
}

/**
 * Report sections for the populated parts of a synthesis.
 */
export function buildSections(synthesis: Synthesis): ReportSection[] {
  const sections: ReportSection[] = [];

  if (synthesis.executive_summary) {
    sections.push(
      createSection("Executive Summary", [{ kind: "paragraph", text: synthesis.executive_summary }])
    );
  }
  if (synthesis.key_findings.length > 0) {
    sections.push(createSection("Key Findings", findingBlocks(synthesis)));
  }
  if (synthesis.trends.length > 0) {
    sections.push(createSection("Identified Trends", trendBlocks(synthesis)));
  }
  if (synthesis.agreements.length > 0) {
    sections.push(createSection("Areas of Agreement", agreementBlocks(synthesis)));
  }
  if (synthesis.disagreements.length > 0) {
    sections.push(createSection("Areas of Disagreement", disagreementBlocks(synthesis)));
  }
  if (synthesis.knowledge_gaps.length > 0) {
    sections.push(createSection("Knowledge Gaps", gapBlocks(synthesis)));
  }

  return sections;
}

/**
 * Mean of the finding confidence, trend confidence and agreement
 * consensus averages that exist; 0.5 when none do.
 */
export function overallConfidence(synthesis: Synthesis): number {
  const parts = [
    average(synthesis.key_findings.map((f) => f.confidence)),
    average(synthesis.trends.map((t) => t.confidence)),
    average(synthesis.agreements.map((a) => a.consensus_level)),
  ].filter((v): v is number => v !== undefined);
  return average(parts) ?? 0.5;
}

// ═══════════════════════════════════════════════════════════════════════════
// FILES
// ═══════════════════════════════════════════════════════════════════════════

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/** "YYYYMMDD_HHMMSS" in UTC */
function fileTimestamp(date: Date): string {
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}_` +
    `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  );
}

/**
 * `research_report_<topic>_<YYYYMMDD_HHMMSS>.<ext>`; the topic keeps
 * letters, digits and underscores only.
 */
export function reportFilename(topic: string, date: Date, extension: string): string {
  const clean =
    topic
      .toLowerCase()
      .replace(/[\s/:]/g, "_")
      .replace(/[^a-z0-9_]/g, "") || "untitled";
  return `research_report_${clean}_${fileTimestamp(date)}.${extension}`;
}

const EMPTY_BODY: Record<MarkupKind, string> = {
  markdown: "_No sources were available for this report._",
  html: "<p>No sources were available for this report.</p>",
};

// ═══════════════════════════════════════════════════════════════════════════
// ADAPTER
// ═══════════════════════════════════════════════════════════════════════════

export interface RenderingAdapterOptions {
  config: RenderingStageConfig;
  logger?: Logger;
  /** Time source for the report date and file name */
  clock?: () => Date;
}

type RenderingResult = Omit<RenderingResponse, "status">;

export class RenderingAdapter extends BaseStageAdapter<typeof RenderingRequestSchema, RenderingResult> {
  private readonly config: RenderingStageConfig;
  private readonly clock: () => Date;
  private readonly templates: ReportTemplateLoader;

  constructor({ config, logger, clock }: RenderingAdapterOptions) {
    super("rendering", "OutputGenerator", RenderingRequestSchema, logger);
    this.config = config;
    this.clock = clock ?? (() => new Date());
    this.templates = new ReportTemplateLoader(config.templateDir);
  }

  protected async handle(request: RenderingRequest): Promise<RenderingResult> {
    const { synthesis } = request;
    const format: ReportFormat = request.format ?? this.config.defaultFormat;
    const includeToc = request.include_toc ?? this.config.includeToc;
    const markup: MarkupKind = format === "markdown" ? "markdown" : "html";
    const extension = markup === "markdown" ? "md" : "html";
    const warnings: string[] = [];

    if (format === "pdf") {
      warnings.push("PDF conversion is not available; wrote print-ready HTML instead");
    }

    const template = request.template
      ? this.templates.resolve(request.template, `.${extension}`)
      : this.templates.load(`report.${extension}`);

    const sections = buildSections(synthesis);
    const generatedAt = this.clock();
    const topic = synthesis.topic || "Unknown Topic";

    const context = buildReportContext({
      title: `Research Report: ${topic}`,
      topic,
      generatedAt,
      author: this.config.author,
      version: this.config.version,
      sourceCount: synthesis.source_count,
      confidence: overallConfidence(synthesis),
      format,
      toc: includeToc ? formatToc(sections, markup) : "",
      body: sections.length > 0 ? formatBody(sections, markup) : EMPTY_BODY[markup],
    });

    const text = renderReport(template, context, { strict: request.template === undefined });

    const filename = reportFilename(topic, generatedAt, extension);
    const filepath = join(this.config.outputDir, filename);
    await mkdir(this.config.outputDir, { recursive: true });
    await writeFile(filepath, text, "utf-8");

    this.logger.info("Report written", { filepath, format, sections: sections.length });
    for (const warning of warnings) this.logger.warn(warning);

    return {
      report: {
        filepath,
        filename,
        format,
        size: Buffer.byteLength(text, "utf-8"),
        sections: sections.length,
      },
      warnings,
    };
  }
}
