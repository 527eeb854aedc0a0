/**
 * Report renderer.
 *
 * Blocks are decided first; a placeholder inside a dropped block needs no
 * value. Every emitted placeholder must have one, and in strict mode every
 * set context variable must be emitted or tested by a block.
 *
 * Values are emitted as they are and never scanned for placeholders.
 */

import { ValidationError } from "../errors/index.js";
import { isReportVariable, lookupVariable, type ReportContext, type ReportVariable } from "./context.js";
import { evaluateCondition, type ParsedTemplate, type Segment } from "./template.js";

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export class ReportRenderError extends ValidationError {
  constructor(
    public readonly templateName: string,
    public readonly missingVariables: string[],
    message?: string
  ) {
    super(
      message ??
        `Cannot render template "${templateName}": context is missing ` +
          `value(s) for: ${missingVariables.join(", ")}`
    );
  }
}

export class UnusedVariableError extends ValidationError {
  constructor(
    public readonly templateName: string,
    public readonly unusedVariables: string[],
    message?: string
  ) {
    super(
      message ??
        `Template "${templateName}" does not use context variable(s): ${unusedVariables.join(", ")}. ` +
          `Pass { strict: false } to allow unused variables.`
    );
  }
}

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface RenderOptions {
  /**
   * When true (default), rendering fails if the context contains variables
   * that the template does not reference. This catches context/template
   * mismatches early.
   *
   * Set to false for user-supplied templates that may show only part of
   * the report.
   */
  strict?: boolean;
}

// ---------------------------------------------------------------------------
// Renderer
// ---------------------------------------------------------------------------

/**
 * @throws ReportRenderError   if an emitted placeholder has no value
 * @throws UnusedVariableError if strict and the context has variables the template ignores
 */
export function renderReport(
  template: ParsedTemplate,
  context: ReportContext,
  options: RenderOptions = {}
): string {
  const { strict = true } = options;

  const emitted: Segment[] = [];
  for (const part of template.parts) {
    if (part.kind !== "block") {
      emitted.push(part);
    } else if (evaluateCondition(part.condition, lookupVariable(context, part.condition.variable))) {
      emitted.push(...part.body);
    }
  }

  const used = new Set<ReportVariable>(template.tested);
  const missing = new Set<ReportVariable>();
  for (const segment of emitted) {
    if (segment.kind !== "variable") continue;
    used.add(segment.name);
    if (context[segment.name] === undefined) missing.add(segment.name);
  }
  if (missing.size > 0) {
    throw new ReportRenderError(template.name, [...missing].sort());
  }

  if (strict) {
    const unused = Object.keys(context).filter(
      (key) => isReportVariable(key) && !used.has(key) && context[key] !== undefined
    );
    if (unused.length > 0) {
      throw new UnusedVariableError(template.name, unused);
    }
  }

  return emitted
    .map((segment) => (segment.kind === "text" ? segment.text : context[segment.name] ?? ""))
    .join("");
}
