/**
 * Application configuration.
 * Validates and exposes typed configuration values.
 */

import {
  ConfigError,
  optionalEnv,
  optionalEnvBool,
  optionalEnvChoice,
  optionalEnvFloat,
  optionalEnvInt,
} from "./env.js";
import { SearchProviderName } from "./pipeline/enums.js";
import type { PipelineConfigOverrides } from "./pipeline/schema.js";

export { ConfigError } from "./env.js";

// Re-export pipeline configuration module
export * from "./pipeline/index.js";

const ENVIRONMENTS = ["development", "production", "test"] as const;
const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export interface AppConfig {
  /** Current environment (development, production, test) */
  readonly env: (typeof ENVIRONMENTS)[number];
  /** Enable debug mode */
  readonly debug: boolean;
  /** Log level */
  readonly logLevel: (typeof LOG_LEVELS)[number];
  /** Application name */
  readonly appName: string;
  /** Directory for log files */
  readonly logDir: string;
}

/**
 * Load and validate application configuration.
 * Fails fast on malformed values.
 */
export function loadAppConfig(): AppConfig {
  const debug = optionalEnvBool("DEBUG", false);
  return {
    env: optionalEnvChoice("NODE_ENV", ENVIRONMENTS, "development"),
    debug,
    logLevel: optionalEnvChoice("LOG_LEVEL", LOG_LEVELS, debug ? "debug" : "info"),
    appName: optionalEnv("APP_NAME", "research-workflow"),
    logDir: optionalEnv("LOG_DIR", "output/logs"),
  };
}

/**
 * Read pipeline overrides from the environment.
 *
 * Only variables that are set produce an override, so the result layers
 * cleanly between the defaults and a JSON config file.
 */
export function pipelineOverridesFromEnv(): PipelineConfigOverrides {
  const overrides: PipelineConfigOverrides = {};
  const has = (key: string): boolean => (process.env[key] ?? "") !== "";

  const coordinator: NonNullable<PipelineConfigOverrides["coordinator"]> = {};
  if (has("MAX_CONCURRENT_TASKS")) {
    coordinator.maxConcurrentTasks = optionalEnvInt("MAX_CONCURRENT_TASKS", 0);
  }
  if (has("STAGE_TIMEOUT_SECONDS")) {
    coordinator.defaultTimeoutSeconds = optionalEnvFloat("STAGE_TIMEOUT_SECONDS", 0);
  }
  if (has("RETRY_ATTEMPTS")) {
    coordinator.retryAttempts = optionalEnvInt("RETRY_ATTEMPTS", 0);
  }
  if (Object.keys(coordinator).length > 0) overrides.coordinator = coordinator;

  const store: NonNullable<PipelineConfigOverrides["store"]> = {};
  if (has("RESEARCH_DB_PATH")) {
    store.dbPath = optionalEnv("RESEARCH_DB_PATH", "");
  }
  if (has("DUPLICATE_THRESHOLD")) {
    store.duplicateThreshold = optionalEnvFloat("DUPLICATE_THRESHOLD", 0);
  }
  if (has("CACHE_SIZE_LIMIT")) {
    store.cacheSizeLimit = optionalEnvInt("CACHE_SIZE_LIMIT", 0);
  }
  if (Object.keys(store).length > 0) overrides.store = store;

  if (has("SEARCH_PROVIDER")) {
    overrides.research = {
      searchProvider: optionalEnvChoice("SEARCH_PROVIDER", SearchProviderName.options, "mock"),
    };
  }

  if (has("RESEARCH_OUTPUT_DIR")) {
    overrides.rendering = { outputDir: optionalEnv("RESEARCH_OUTPUT_DIR", "") };
  }

  return overrides;
}

/** Application configuration singleton */
export const config: AppConfig = loadAppConfig();

/**
 * Re-check the application configuration.
 * Call this at application startup to fail fast.
 */
export function validateConfig(): void {
  if (config.env === "production" && config.debug) {
    throw new ConfigError("DEBUG must not be enabled when NODE_ENV is production.", "DEBUG");
  }
}
