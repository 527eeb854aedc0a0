/**
 * Pipeline configuration loader and validator.
 *
 * Responsible for:
 * - Layering partial overrides (JSON file, environment) onto the defaults
 * - Validating the result against the schema with fail-fast behavior
 * - Producing structured issues for display
 * - Freezing configuration to enforce immutability
 */

import { formatZodIssues, ValidationError, type ValidationIssue } from "../../errors/index.js";
import { DEFAULT_PIPELINE_CONFIG } from "./defaults.js";
import { PipelineConfigSchema, type PipelineConfig } from "./schema.js";

/**
 * Structured validation error for pipeline configuration.
 */
export class PipelineConfigError extends ValidationError {
  override format(): string {
    const lines = ["Pipeline configuration validation failed:"];
    for (const issue of this.issues) {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      lines.push(`  - ${path}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Deep freeze an object to enforce runtime immutability.
 */
function deepFreeze<T extends object>(obj: T): Readonly<T> {
  for (const name of Reflect.ownKeys(obj)) {
    const value: unknown = Reflect.get(obj, name);
    if (value && typeof value === "object" && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }
  return Object.freeze(obj);
}

/**
 * Layer override objects section by section onto a base config.
 *
 * Sections are merged one level deep; anything that is not an object
 * replaces the section outright and is left for validation to reject.
 */
export function mergePipelineConfig(
  base: PipelineConfig,
  ...layers: unknown[]
): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...base };

  for (const layer of layers) {
    if (layer === undefined) continue;
    if (!isPlainObject(layer)) {
      throw new PipelineConfigError("Pipeline configuration overrides must be an object", [
        { path: [], message: "Expected an object", code: "invalid_type" },
      ]);
    }
    for (const [section, value] of Object.entries(layer)) {
      const current = merged[section];
      merged[section] =
        isPlainObject(current) && isPlainObject(value) ? { ...current, ...value } : value;
    }
  }

  return merged;
}

/**
 * Validate and load pipeline configuration.
 *
 * @param overrides - Partial configuration objects, applied in order
 * @returns Validated and frozen PipelineConfig
 * @throws PipelineConfigError if validation fails
 */
export function loadPipelineConfig(...overrides: unknown[]): Readonly<PipelineConfig> {
  const merged = mergePipelineConfig(DEFAULT_PIPELINE_CONFIG, ...overrides);
  const result = PipelineConfigSchema.safeParse(merged);

  if (!result.success) {
    const issues = formatZodIssues(result.error.issues);
    throw new PipelineConfigError(
      `Invalid pipeline configuration: ${issues.length} validation error(s)`,
      issues
    );
  }

  return deepFreeze(result.data);
}

/**
 * Validate pipeline configuration without loading.
 */
export function validatePipelineConfig(input: unknown): {
  success: boolean;
  config?: PipelineConfig;
  errors?: ValidationIssue[];
} {
  const result = PipelineConfigSchema.safeParse(input);

  if (result.success) {
    return { success: true, config: result.data };
  }

  return {
    success: false,
    errors: formatZodIssues(result.error.issues),
  };
}
