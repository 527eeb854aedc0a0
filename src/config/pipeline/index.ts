/**
 * Pipeline configuration module.
 *
 * Usage:
 *   import { loadPipelineConfig } from "./config/pipeline/index.js";
 *
 *   // Defaults
 *   const config = loadPipelineConfig();
 *
 *   // Defaults + overrides, applied in order
 *   const tuned = loadPipelineConfig(
 *     { store: { dbPath: ":memory:" } },
 *     { coordinator: { retryAttempts: 0 } },
 *   );
 */

export {
  StageName,
  PIPELINE_STAGES,
  ReportFormat,
  SearchProviderName,
} from "./enums.js";

export type {
  PipelineConfig,
  PipelineConfigOverrides,
  CoordinatorConfig,
  StoreConfig,
  ResearchStageConfig,
  VerificationStageConfig,
  SynthesisStageConfig,
  RenderingStageConfig,
} from "./schema.js";

export {
  PipelineConfigSchema,
  CoordinatorConfigSchema,
  StoreConfigSchema,
  ResearchStageConfigSchema,
  VerificationStageConfigSchema,
  SynthesisStageConfigSchema,
  RenderingStageConfigSchema,
} from "./schema.js";

export {
  loadPipelineConfig,
  mergePipelineConfig,
  validatePipelineConfig,
  PipelineConfigError,
} from "./loader.js";

export { DEFAULT_PIPELINE_CONFIG } from "./defaults.js";
