/**
 * Report template loader.
 *
 * Loads report templates from disk (.md or .html files), parses and
 * validates them, and caches the parsed result.
 *
 * USAGE:
 *
 *   const loader = new ReportTemplateLoader("templates/");
 *
 *   // Load a single template
 *   const tmpl = loader.load("report.md");
 *
 *   // Names without an extension take the one given
 *   const brief = loader.resolve("brief", ".html");
 *
 * Templates are loaded and parsed once, then cached in memory. Create ONE
 * loader per template directory and reuse it across reports.
 */

import { existsSync, readFileSync } from "node:fs";
import { join, extname, basename, resolve } from "node:path";

import { ValidationError } from "../errors/index.js";
import { parseTemplate, type ParsedTemplate } from "./template.js";

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export class TemplateLoadError extends ValidationError {
  constructor(
    public readonly filePath: string,
    message?: string
  ) {
    super(message ?? `Failed to load template: ${filePath}`);
  }
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** File extensions recognized as report templates. */
export const TEMPLATE_EXTENSIONS: ReadonlySet<string> = new Set([".md", ".html"]);

/** Template names are bare file names: no directories, no traversal. */
const TEMPLATE_NAME_RE = /^[A-Za-z0-9][A-Za-z0-9_.-]*$/;

// ---------------------------------------------------------------------------
// Loader
// ---------------------------------------------------------------------------

export class ReportTemplateLoader {
  private readonly baseDir: string;
  private readonly cache = new Map<string, ParsedTemplate>();

  /**
   * @param baseDir - Directory containing report template files
   */
  constructor(baseDir: string) {
    this.baseDir = resolve(baseDir);

    if (!existsSync(this.baseDir)) {
      throw new TemplateLoadError(this.baseDir, `Template directory does not exist: ${this.baseDir}`);
    }
  }

  get directory(): string {
    return this.baseDir;
  }

  /**
   * Load and parse a single template file.
   *
   * @param filename - Filename relative to baseDir (e.g. "report.md")
   * @throws TemplateLoadError   if the name is invalid or the file is missing
   * @throws TemplateParseError  if the template contains invalid variables
   */
  load(filename: string): ParsedTemplate {
    const cached = this.cache.get(filename);
    if (cached) return cached;

    if (!TEMPLATE_NAME_RE.test(filename)) {
      throw new TemplateLoadError(filename, `Invalid template name: ${filename}`);
    }

    const filePath = join(this.baseDir, filename);

    const ext = extname(filename).toLowerCase();
    if (!TEMPLATE_EXTENSIONS.has(ext)) {
      throw new TemplateLoadError(
        filePath,
        `Unsupported template extension "${ext}". Use: ${[...TEMPLATE_EXTENSIONS].join(", ")}`
      );
    }

    if (!existsSync(filePath)) {
      throw new TemplateLoadError(filePath, `Template file not found: ${filename}`);
    }

    const source = readFileSync(filePath, "utf-8");
    const parsed = parseTemplate(source, basename(filename, ext));

    this.cache.set(filename, parsed);
    return parsed;
  }

  /**
   * Load a template by name, appending `defaultExtension` when the name
   * has none.
   */
  resolve(name: string, defaultExtension: string): ParsedTemplate {
    return this.load(extname(name) === "" ? `${name}${defaultExtension}` : name);
  }

}
