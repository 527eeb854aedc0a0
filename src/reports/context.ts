/**
 * Typed report context.
 *
 * Every valid `{{report.*}}` placeholder in a report template maps to one
 * key of ReportContextMap. Values are always strings: numbers are
 * formatted, and for HTML output the scalar fields are escaped here so
 * templates never have to.
 *
 * `report.toc` and `report.body` hold pre-formatted markup for the target
 * format (see document.ts) and are inserted verbatim.
 *
 * Adding a new variable requires exactly two changes:
 *   1. Add the key to ReportContextMap
 *   2. Populate it in buildReportContext()
 */

import type { ReportFormat } from "../config/pipeline/enums.js";
import { escapeHtml } from "./document.js";

/**
 * Exhaustive map of every variable available inside report templates.
 */
export interface ReportContextMap {
  "report.title": string;
  "report.topic": string;
  "report.generatedDate": string;
  "report.author": string;
  "report.version": string;
  "report.sourceCount": string;
  "report.confidence": string;
  "report.format": string;
  /** Table of contents markup; empty when disabled */
  "report.toc": string;
  /** Section markup */
  "report.body": string;
}

/** Any valid template variable name */
export type ReportVariable = keyof ReportContextMap;

/** A full or partial set of variable values */
export type ReportContext = Readonly<Partial<ReportContextMap>>;

/**
 * Everything a report header needs, before formatting.
 */
export interface ReportContextInput {
  title: string;
  topic: string;
  generatedAt: Date;
  author: string;
  version: string;
  sourceCount: number;
  /** Overall confidence in [0, 1] */
  confidence: number;
  format: ReportFormat;
  toc: string;
  body: string;
}

/**
 * "YYYY-MM-DD HH:MM:SS" in UTC.
 */
export function formatGeneratedDate(date: Date): string {
  return date.toISOString().slice(0, 19).replace("T", " ");
}

/**
 * Build the template context for one report.
 */
export function buildReportContext(input: ReportContextInput): ReportContextMap {
  const text = input.format === "markdown" ? (value: string) => value : escapeHtml;

  return {
    "report.title": text(input.title),
    "report.topic": text(input.topic),
    "report.generatedDate": formatGeneratedDate(input.generatedAt),
    "report.author": text(input.author),
    "report.version": text(input.version),
    "report.sourceCount": String(input.sourceCount),
    "report.confidence": input.confidence.toFixed(2),
    "report.format": input.format,
    "report.toc": input.toc,
    "report.body": input.body,
  };
}

const VARIABLE_KEYS: Record<ReportVariable, true> = {
  "report.title": true,
  "report.topic": true,
  "report.generatedDate": true,
  "report.author": true,
  "report.version": true,
  "report.sourceCount": true,
  "report.confidence": true,
  "report.format": true,
  "report.toc": true,
  "report.body": true,
};

const VALID_VARIABLES: ReadonlySet<string> = new Set(Object.keys(VARIABLE_KEYS));

/**
 * Check whether a string is a valid report variable name.
 */
export function isReportVariable(name: string): name is ReportVariable {
  return VALID_VARIABLES.has(name);
}

/**
 * Value of a variable, or undefined when the name is unknown or unset.
 */
export function lookupVariable(context: ReportContext, name: string): string | undefined {
  return isReportVariable(name) ? context[name] : undefined;
}
