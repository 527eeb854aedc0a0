/**
 * Report template module: typed context, `{{var}}` / `{{#if}}` templates,
 * section formatting and the on-disk template loader.
 */

export {
  buildReportContext,
  formatGeneratedDate,
  isReportVariable,
  lookupVariable,
  type ReportContext,
  type ReportContextInput,
  type ReportContextMap,
  type ReportVariable,
} from "./context.js";
export {
  createSection,
  escapeHtml,
  formatBody,
  formatToc,
  slugify,
  type MarkupKind,
  type ReportBlock,
  type ReportSection,
} from "./document.js";
export {
  evaluateCondition,
  parseTemplate,
  TemplateParseError,
  type Condition,
  type ParsedTemplate,
  type Segment,
  type TemplatePart,
} from "./template.js";
export {
  renderReport,
  ReportRenderError,
  UnusedVariableError,
  type RenderOptions,
} from "./renderer.js";
export { ReportTemplateLoader, TemplateLoadError, TEMPLATE_EXTENSIONS } from "./loader.js";
