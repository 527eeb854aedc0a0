/**
 * Report template system tests.
 *
 * Run: node --import tsx --test src/reports/reports.test.ts
 *
 * Tests cover:
 *   1. Context building and section formatting
 *   2. Template parsing and conditional blocks
 *   3. Rendering: substitution, missing vars, unused vars
 *   4. Loader: bundled templates, disk loading and caching
 */

import { test } from "node:test";
import { strict as assert } from "node:assert";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";

import { DEFAULT_PIPELINE_CONFIG } from "../config/pipeline/index.js";
import { ValidationError } from "../errors/index.js";
import { buildReportContext, type ReportContextInput } from "./context.js";
import { createSection, formatBody, formatToc } from "./document.js";
import { evaluateCondition, parseTemplate, TemplateParseError } from "./template.js";
import { renderReport, ReportRenderError, UnusedVariableError } from "./renderer.js";
import { ReportTemplateLoader, TemplateLoadError } from "./loader.js";

// ═══════════════════════════════════════════════════════════════════════════
// FIXTURES
// ═══════════════════════════════════════════════════════════════════════════

const BASE_INPUT: ReportContextInput = {
  title: "Research Report: Solar & Wind",
  topic: "Solar & Wind",
  generatedAt: new Date("2024-03-01T12:00:00Z"),
  author: "Research Workflow",
  version: "1.0",
  sourceCount: 0,
  confidence: 0.5,
  format: "markdown",
  toc: "",
  body: "",
};

const FINDINGS = createSection("Key Findings", [
  { kind: "paragraph", text: "Two findings." },
  { kind: "list", items: ["first", "second"], ordered: true },
]);

const SUMMARY = createSection("Executive Summary", [{ kind: "paragraph", text: "Short <summary>." }]);

// ═══════════════════════════════════════════════════════════════════════════
// CONTEXT + DOCUMENT
// ═══════════════════════════════════════════════════════════════════════════

test("buildReportContext formats numbers and dates", () => {
  const ctx = buildReportContext({ ...BASE_INPUT, sourceCount: 3 });
  assert.equal(ctx["report.generatedDate"], "2024-03-01 12:00:00");
  assert.equal(ctx["report.sourceCount"], "3");
  assert.equal(ctx["report.confidence"], "0.50");
  assert.equal(ctx["report.format"], "markdown");
});

test("buildReportContext escapes text fields for html only", () => {
  assert.equal(buildReportContext(BASE_INPUT)["report.topic"], "Solar & Wind");
  const html = buildReportContext({ ...BASE_INPUT, format: "html" });
  assert.equal(html["report.topic"], "Solar &amp; Wind");
  assert.equal(html["report.title"], "Research Report: Solar &amp; Wind");
});

test("createSection derives the anchor id from the title", () => {
  assert.equal(FINDINGS.id, "key-findings");
  assert.equal(SUMMARY.id, "executive-summary");
});

test("formatBody renders markdown sections", () => {
  assert.equal(
    formatBody([FINDINGS], "markdown"),
    "## Key Findings\n\nTwo findings.\n\n1. first\n2. second"
  );
});

test("formatBody escapes html blocks", () => {
  assert.equal(
    formatBody([SUMMARY], "html"),
    '<section id="executive-summary">\n<h2>Executive Summary</h2>\n<p>Short &lt;summary&gt;.</p>\n</section>'
  );
});

test("formatToc links every section and is empty without sections", () => {
  assert.equal(
    formatToc([SUMMARY, FINDINGS], "markdown"),
    "- [Executive Summary](#executive-summary)\n- [Key Findings](#key-findings)"
  );
  assert.equal(formatToc([], "markdown"), "");
  assert.equal(formatToc([], "html"), "");
});

// ═══════════════════════════════════════════════════════════════════════════
// PARSING
// ═══════════════════════════════════════════════════════════════════════════

test("parseTemplate lists placeholders once, sorted, and the variables blocks test", () => {
  const tmpl = parseTemplate(
    '{{ report.title }} {{report.topic}} {{report.title}}{{#if report.format == "pdf"}}p{{/if}}',
    "names"
  );
  assert.equal(tmpl.name, "names");
  assert.deepEqual(tmpl.variables, ["report.title", "report.topic"]);
  assert.deepEqual(tmpl.tested, ["report.format"]);
});

test("parseTemplate splits text, placeholders and blocks", () => {
  const tmpl = parseTemplate("A {{report.title}}{{#if report.toc}}\n{{report.toc}}{{/if}}");
  assert.equal(tmpl.name, "(anonymous)");
  assert.deepEqual(tmpl.parts, [
    { kind: "text", text: "A " },
    { kind: "variable", name: "report.title" },
    {
      kind: "block",
      condition: { variable: "report.toc", op: "set" },
      body: [
        { kind: "text", text: "\n" },
        { kind: "variable", name: "report.toc" },
      ],
    },
  ]);
});

test("braces that are not tags stay literal", () => {
  const tmpl = parseTemplate("{{ not a tag }} {{report.body}}");
  assert.equal(renderReport(tmpl, { "report.body": "B" }), "{{ not a tag }} B");
});

test("parseTemplate rejects unknown variables", () => {
  assert.throws(
    () => parseTemplate("{{report.title}} {{report.nope}}", "bad"),
    (err: unknown) =>
      err instanceof TemplateParseError &&
      err instanceof ValidationError &&
      err.problems.join() === 'Unknown variable "report.nope"'
  );
});

test("parseTemplate reports every bad conditional at once", () => {
  assert.throws(
    () => parseTemplate("{{#if report.nope}}x{{/if}}{{#if report.toc ~ 1}}y{{/if}}", "conds"),
    (err: unknown) => {
      assert.ok(err instanceof TemplateParseError);
      assert.deepEqual(err.problems, [
        'Unknown variable "report.nope" in conditional',
        "Malformed conditional: {{#if report.toc ~ 1}}",
      ]);
      assert.equal(err.issues.length, 2);
      return true;
    }
  );
});

test("nested and unbalanced conditionals are rejected", () => {
  assert.throws(
    () => parseTemplate("{{#if report.toc}}{{#if report.body}}x{{/if}}{{/if}}"),
    TemplateParseError
  );
  assert.throws(() => parseTemplate("{{#if report.toc}}x"), TemplateParseError);
  assert.throws(() => parseTemplate("x{{/if}}"), TemplateParseError);
});

test("evaluateCondition treats empty and unset values as not set", () => {
  const set = { variable: "report.toc", op: "set" } as const;
  assert.equal(evaluateCondition(set, ""), false);
  assert.equal(evaluateCondition(set, undefined), false);
  assert.equal(evaluateCondition(set, "- toc"), true);

  const notPdf = { variable: "report.format", op: "!=", value: "pdf" } as const;
  assert.equal(evaluateCondition(notPdf, undefined), true);
  assert.equal(evaluateCondition(notPdf, "pdf"), false);

  const isPdf = { variable: "report.format", op: "==", value: "pdf" } as const;
  assert.equal(evaluateCondition(isPdf, undefined), false);
  assert.equal(evaluateCondition(isPdf, "pdf"), true);
});

test("blocks keep or drop their bodies when rendered", () => {
  const tmpl = parseTemplate('A{{#if report.format == "pdf"}}P{{/if}}B');
  assert.equal(renderReport(tmpl, { "report.format": "pdf" }), "APB");
  assert.equal(renderReport(tmpl, { "report.format": "html" }), "AB");
});

// ═══════════════════════════════════════════════════════════════════════════
// RENDERING
// ═══════════════════════════════════════════════════════════════════════════

const SIMPLE = parseTemplate("# {{report.title}}\n{{report.body}}", "simple");

test("renderReport substitutes every placeholder", () => {
  assert.equal(renderReport(SIMPLE, { "report.title": "T", "report.body": "B" }), "# T\nB");
});

test("renderReport fails on missing values", () => {
  assert.throws(
    () => renderReport(SIMPLE, { "report.title": "T" }),
    (err: unknown) =>
      err instanceof ReportRenderError && err.missingVariables.join() === "report.body"
  );
});

test("strict rendering fails on unused context variables", () => {
  const ctx = { "report.title": "T", "report.body": "B", "report.topic": "x" };
  assert.throws(
    () => renderReport(SIMPLE, ctx),
    (err: unknown) =>
      err instanceof UnusedVariableError && err.unusedVariables.join() === "report.topic"
  );
  assert.equal(renderReport(SIMPLE, ctx, { strict: false }), "# T\nB");
});

test("substituted values are not scanned again", () => {
  assert.equal(
    renderReport(SIMPLE, { "report.title": "{{report.body}}", "report.body": "B" }),
    "# {{report.body}}\nB"
  );
});

test("a variable tested only by a conditional counts as used", () => {
  const tmpl = parseTemplate("{{#if report.toc}}TOC {{report.toc}}{{/if}}{{report.body}}", "toc");
  assert.equal(renderReport(tmpl, { "report.toc": "", "report.body": "B" }), "B");
  assert.equal(renderReport(tmpl, { "report.toc": "t", "report.body": "B" }), "TOC tB");
});

// ═══════════════════════════════════════════════════════════════════════════
// LOADER
// ═══════════════════════════════════════════════════════════════════════════

const bundled = new ReportTemplateLoader(DEFAULT_PIPELINE_CONFIG.rendering.templateDir);

test("bundled markdown template uses every variable", () => {
  const tmpl = bundled.load("report.md");
  assert.equal(tmpl.name, "report");
  assert.deepEqual(tmpl.variables, [
    "report.author",
    "report.body",
    "report.confidence",
    "report.format",
    "report.generatedDate",
    "report.sourceCount",
    "report.title",
    "report.toc",
    "report.topic",
    "report.version",
  ]);
});

test("bundled markdown template states the source count", () => {
  const output = renderReport(bundled.load("report.md"), buildReportContext(BASE_INPUT));
  assert.ok(output.includes("- Sources analyzed: 0\n"));
  assert.ok(output.startsWith("<!-- report format: markdown -->\n# Research Report: Solar & Wind\n"));
  assert.ok(!output.includes("Table of Contents"));
});

test("bundled markdown template includes the toc when set", () => {
  const output = renderReport(
    bundled.load("report.md"),
    buildReportContext({
      ...BASE_INPUT,
      toc: formatToc([SUMMARY], "markdown"),
      body: formatBody([SUMMARY], "markdown"),
    })
  );
  assert.ok(output.includes("## Table of Contents\n\n- [Executive Summary](#executive-summary)\n"));
  assert.ok(output.includes("## Executive Summary\n\nShort <summary>."));
});

test("bundled html template adds print styles for pdf only", () => {
  const tmpl = bundled.resolve("report", ".html");
  const pdf = renderReport(tmpl, buildReportContext({ ...BASE_INPUT, format: "pdf" }));
  const html = renderReport(tmpl, buildReportContext({ ...BASE_INPUT, format: "html" }));
  assert.ok(pdf.includes('<style media="print">'));
  assert.ok(!html.includes('<style media="print">'));
  assert.ok(html.includes("<li>Sources analyzed: 0</li>"));
  assert.ok(html.includes("<title>Research Report: Solar &amp; Wind</title>"));
});

test("loader caches parsed templates", () => {
  assert.equal(bundled.load("report.md"), bundled.load("report.md"));
});

test("loader rejects bad names, extensions and missing files", () => {
  assert.throws(() => bundled.load("../report.md"), TemplateLoadError);
  assert.throws(() => bundled.load("notes.txt"), TemplateLoadError);
  assert.throws(() => bundled.load("absent.md"), TemplateLoadError);
});

test("loader requires an existing directory", () => {
  assert.throws(
    () => new ReportTemplateLoader(join(tmpdir(), "no-such-report-templates-dir")),
    TemplateLoadError
  );
});

test("loader reads templates from any directory", (t) => {
  const dir = mkdtempSync(join(tmpdir(), "report-templates-"));
  t.after(() => rmSync(dir, { recursive: true, force: true }));

  writeFileSync(join(dir, "brief.md"), "{{report.body}}");

  const loader = new ReportTemplateLoader(dir);
  assert.equal(renderReport(loader.resolve("brief", ".md"), { "report.body": "x" }), "x");
});
