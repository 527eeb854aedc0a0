/**
 * Report document model and its Markdown / HTML formatting.
 *
 * A report body is an ordered list of sections, each a heading plus a
 * flat list of blocks. The same sections format to either target, and
 * the table of contents links to the section ids.
 */

export type ReportBlock =
  | { kind: "paragraph"; text: string }
  | { kind: "heading"; text: string }
  | { kind: "field"; label: string; value: string }
  | { kind: "list"; items: string[]; ordered?: boolean };

export interface ReportSection {
  /** Anchor id, derived from the title */
  id: string;
  title: string;
  blocks: ReportBlock[];
}

export type MarkupKind = "markdown" | "html";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (c) => HTML_ESCAPES[c] ?? c);
}

/**
 * Lowercase, hyphen-separated anchor id ("Key Findings" -> "key-findings").
 */
export function slugify(title: string): string {
  return title
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
}

export function createSection(title: string, blocks: ReportBlock[]): ReportSection {
  return { id: slugify(title), title, blocks };
}

// ---------------------------------------------------------------------------
// Markdown
// ---------------------------------------------------------------------------

function blockToMarkdown(block: ReportBlock): string {
  switch (block.kind) {
    case "paragraph":
      return block.text;
    case "heading":
      return `### ${block.text}`;
    case "field":
      return `**${block.label}:** ${block.value}`;
    case "list":
      return block.items
        .map((item, i) => (block.ordered ? `${i + 1}. ${item}` : `- ${item}`))
        .join("\n");
  }
}

function sectionToMarkdown(section: ReportSection): string {
  return [`## ${section.title}`, ...section.blocks.map(blockToMarkdown)].join("\n\n");
}

// ---------------------------------------------------------------------------
// HTML
// ---------------------------------------------------------------------------

function blockToHtml(block: ReportBlock): string {
  switch (block.kind) {
    case "paragraph":
      return `<p>${escapeHtml(block.text)}</p>`;
    case "heading":
      return `<h3>${escapeHtml(block.text)}</h3>`;
    case "field":
      return `<p><strong>${escapeHtml(block.label)}:</strong> ${escapeHtml(block.value)}</p>`;
    case "list": {
      const tag = block.ordered ? "ol" : "ul";
      const items = block.items.map((item) => `<li>${escapeHtml(item)}</li>`).join("\n");
      return `<${tag}>\n${items}\n</${tag}>`;
    }
  }
}

function sectionToHtml(section: ReportSection): string {
  return [
    `<section id="${escapeHtml(section.id)}">`,
    `<h2>${escapeHtml(section.title)}</h2>`,
    ...section.blocks.map(blockToHtml),
    "</section>",
  ].join("\n");
}

// ---------------------------------------------------------------------------
// Public formatting
// ---------------------------------------------------------------------------

export function formatBody(sections: readonly ReportSection[], kind: MarkupKind): string {
  if (kind === "markdown") {
    return sections.map(sectionToMarkdown).join("\n\n");
  }
  return sections.map(sectionToHtml).join("\n");
}

/**
 * Table of contents linking to each section. Empty for no sections.
 */
export function formatToc(sections: readonly ReportSection[], kind: MarkupKind): string {
  if (sections.length === 0) return "";

  if (kind === "markdown") {
    return sections.map((s) => `- [${s.title}](#${s.id})`).join("\n");
  }
  const items = sections
    .map((s) => `<li><a href="#${escapeHtml(s.id)}">${escapeHtml(s.title)}</a></li>`)
    .join("\n");
  return `<ul>\n${items}\n</ul>`;
}
