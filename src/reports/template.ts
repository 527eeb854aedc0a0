/**
 * Report templates, compiled once into a list of parts.
 *
 *   {{report.title}}                         value of a variable
 *   {{#if report.toc}}…{{/if}}               body when the value is non-empty
 *   {{#if report.format == "pdf"}}…{{/if}}   body when the value matches
 *   {{#if report.format != "pdf"}}…{{/if}}   body when it does not
 *
 * Blocks do not nest and have no else branch. Unknown variable names and
 * unbalanced tags fail at parse time; any other `{{…}}` text is literal.
 */

import { ValidationError } from "../errors/index.js";
import { isReportVariable, type ReportVariable } from "./context.js";

export type Condition =
  | { variable: ReportVariable; op: "set" }
  | { variable: ReportVariable; op: "==" | "!="; value: string };

export type Segment = { kind: "text"; text: string } | { kind: "variable"; name: ReportVariable };

export type TemplatePart = Segment | { kind: "block"; condition: Condition; body: Segment[] };

export interface ParsedTemplate {
  name: string;
  parts: TemplatePart[];
  /** Placeholder names anywhere in the template, sorted */
  variables: ReportVariable[];
  /** Names tested by `{{#if}}` blocks */
  tested: ReportVariable[];
}

export class TemplateParseError extends ValidationError {
  constructor(
    public readonly templateName: string,
    public readonly problems: string[]
  ) {
    super(
      `Template "${templateName}" is invalid:\n  - ${problems.join("\n  - ")}`,
      problems.map((message) => ({ path: [templateName], message, code: "custom" }))
    );
  }
}

const TAG_RE = /\{\{\s*(.*?)\s*\}\}/g;
const NAME_RE = /^[a-zA-Z][a-zA-Z0-9_.]*$/;
const IF_RE = /^#if\s+([a-zA-Z][a-zA-Z0-9_.]*)(?:\s*(==|!=)\s*"([^"]*)")?$/;

/**
 * Unset values are never set, never equal, and always unequal.
 */
export function evaluateCondition(condition: Condition, value: string | undefined): boolean {
  switch (condition.op) {
    case "set":
      return value !== undefined && value !== "";
    case "==":
      return value === condition.value;
    case "!=":
      return value !== condition.value;
  }
}

/** A block being filled; `condition` is null when its opening tag was bad */
interface OpenBlock {
  condition: Condition | null;
  body: Segment[];
}

/**
 * @throws TemplateParseError listing every problem found
 */
export function parseTemplate(source: string, name = "(anonymous)"): ParsedTemplate {
  const parts: TemplatePart[] = [];
  const problems: string[] = [];
  const variables = new Set<ReportVariable>();
  const tested = new Set<ReportVariable>();
  let open: OpenBlock | null = null;
  let cursor = 0;

  const emit = (segment: Segment, block: OpenBlock | null): void => {
    if (segment.kind === "text" && segment.text === "") return;
    (block ? block.body : parts).push(segment);
  };

  for (const match of source.matchAll(TAG_RE)) {
    const [raw, inner] = match;
    const index = match.index ?? 0;
    emit({ kind: "text", text: source.slice(cursor, index) }, open);
    cursor = index + raw.length;

    if (inner === "/if") {
      if (!open) {
        problems.push("{{/if}} without a matching {{#if}}");
      } else {
        if (open.condition) parts.push({ kind: "block", condition: open.condition, body: open.body });
        open = null;
      }
      continue;
    }

    if (inner.startsWith("#")) {
      if (open) {
        problems.push(`Nested conditionals are not supported: {{${inner}}}`);
        continue;
      }
      open = { condition: null, body: [] };
      const test = IF_RE.exec(inner);
      if (!test) {
        problems.push(`Malformed conditional: {{${inner}}}`);
        continue;
      }
      const [, variable, op, value] = test;
      if (!isReportVariable(variable)) {
        problems.push(`Unknown variable "${variable}" in conditional`);
        continue;
      }
      tested.add(variable);
      open.condition = op === "==" || op === "!=" ? { variable, op, value } : { variable, op: "set" };
      continue;
    }

    if (NAME_RE.test(inner)) {
      if (isReportVariable(inner)) {
        variables.add(inner);
        emit({ kind: "variable", name: inner }, open);
      } else {
        problems.push(`Unknown variable "${inner}"`);
      }
      continue;
    }

    emit({ kind: "text", text: raw }, open);
  }

  emit({ kind: "text", text: source.slice(cursor) }, open);
  if (open) problems.push("{{#if}} without a matching {{/if}}");
  if (problems.length > 0) throw new TemplateParseError(name, problems);

  return {
    name,
    parts,
    variables: [...variables].sort(),
    tested: [...tested].sort(),
  };
}
