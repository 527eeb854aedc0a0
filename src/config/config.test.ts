/**
 * Configuration tests.
 *
 * Run: node --import tsx --test src/config/config.test.ts
 *
 * Tests cover:
 *   1. Pipeline config defaults, overrides and validation
 *   2. Immutability of loaded configuration
 *   3. Environment readers and environment overrides
 */

import { test } from "node:test";
import { strict as assert } from "node:assert";

import {
  DEFAULT_PIPELINE_CONFIG,
  PIPELINE_STAGES,
  PipelineConfigError,
  loadPipelineConfig,
  mergePipelineConfig,
  pipelineOverridesFromEnv,
  validatePipelineConfig,
} from "./index.js";
import { ConfigError, optionalEnvBool, optionalEnvChoice, optionalEnvInt } from "./env.js";

/**
 * Run `fn` with environment variables temporarily set.
 */
function withEnv(vars: Record<string, string>, fn: () => void): void {
  const previous = new Map<string, string | undefined>();
  for (const [key, value] of Object.entries(vars)) {
    previous.set(key, process.env[key]);
    process.env[key] = value;
  }
  try {
    fn();
  } finally {
    for (const [key, value] of previous) {
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// PIPELINE CONFIG
// ═══════════════════════════════════════════════════════════════════════════

test("pipeline stages run in dependency order", () => {
  assert.deepEqual([...PIPELINE_STAGES], ["research", "verification", "synthesis", "rendering"]);
});

test("defaults load and validate", () => {
  const config = loadPipelineConfig();
  assert.equal(config.coordinator.maxConcurrentTasks, 3);
  assert.equal(config.coordinator.defaultTimeoutSeconds, 300);
  assert.equal(config.coordinator.retryAttempts, 2);
  assert.equal(config.store.duplicateThreshold, 0.8);
  assert.equal(config.store.cacheSizeLimit, 1000);
  assert.equal(config.rendering.defaultFormat, "html");
  assert.equal(validatePipelineConfig(DEFAULT_PIPELINE_CONFIG).success, true);
});

test("overrides merge per section and apply in order", () => {
  const config = loadPipelineConfig(
    { store: { dbPath: ":memory:" }, coordinator: { retryAttempts: 5 } },
    { coordinator: { retryAttempts: 0 } }
  );
  assert.equal(config.store.dbPath, ":memory:");
  assert.equal(config.store.duplicateThreshold, 0.8);
  assert.equal(config.coordinator.retryAttempts, 0);
  assert.equal(config.coordinator.maxConcurrentTasks, 3);
});

test("loaded config is deeply frozen", () => {
  const config = loadPipelineConfig();
  assert.ok(Object.isFrozen(config));
  assert.ok(Object.isFrozen(config.coordinator));
  assert.ok(Object.isFrozen(config.coordinator.stageTimeoutsSeconds));
});

test("merging does not mutate the defaults", () => {
  mergePipelineConfig(DEFAULT_PIPELINE_CONFIG, { store: { dbPath: "elsewhere.db" } });
  assert.equal(DEFAULT_PIPELINE_CONFIG.store.dbPath, "data/sources.db");
});

test("invalid values fail with structured issues", () => {
  assert.throws(
    () => loadPipelineConfig({ store: { duplicateThreshold: 1.5 }, coordinator: { maxConcurrentTasks: 0 } }),
    (err: unknown) => {
      assert.ok(err instanceof PipelineConfigError);
      const paths = err.issues.map((i) => i.path.join("."));
      assert.ok(paths.includes("store.duplicateThreshold"));
      assert.ok(paths.includes("coordinator.maxConcurrentTasks"));
      assert.ok(err.format().startsWith("Pipeline configuration validation failed:"));
      return true;
    }
  );
});

test("unknown keys are rejected", () => {
  assert.throws(
    () => loadPipelineConfig({ store: { dbPth: "typo.db" } }),
    PipelineConfigError
  );
  assert.throws(() => loadPipelineConfig({ extras: {} }), PipelineConfigError);
});

test("medium credibility threshold may not exceed high", () => {
  assert.throws(
    () =>
      loadPipelineConfig({
        verification: { highCredibilityThreshold: 0.4, mediumCredibilityThreshold: 0.6 },
      }),
    (err: unknown) =>
      err instanceof PipelineConfigError &&
      err.issues.some((i) => i.path.join(".") === "verification.mediumCredibilityThreshold")
  );
});

test("non-object overrides are rejected", () => {
  assert.throws(() => loadPipelineConfig("store=:memory:"), PipelineConfigError);
  assert.throws(() => loadPipelineConfig([]), PipelineConfigError);
});

test("per-stage timeout overrides only accept known stages", () => {
  const config = loadPipelineConfig({ coordinator: { stageTimeoutsSeconds: { rendering: 10 } } });
  assert.equal(config.coordinator.stageTimeoutsSeconds.rendering, 10);
  assert.throws(
    () => loadPipelineConfig({ coordinator: { stageTimeoutsSeconds: { publish: 10 } } }),
    PipelineConfigError
  );
});

// ═══════════════════════════════════════════════════════════════════════════
// ENVIRONMENT
// ═══════════════════════════════════════════════════════════════════════════

test("env readers fall back on unset or empty values", () => {
  withEnv({ RW_TEST_EMPTY: "" }, () => {
    assert.equal(optionalEnvInt("RW_TEST_EMPTY", 7), 7);
    assert.equal(optionalEnvBool("RW_TEST_UNSET_FLAG", true), true);
  });
});

test("env readers reject malformed values", () => {
  withEnv({ RW_TEST_INT: "three", RW_TEST_BOOL: "maybe", RW_TEST_CHOICE: "xml" }, () => {
    assert.throws(() => optionalEnvInt("RW_TEST_INT", 1), ConfigError);
    assert.throws(() => optionalEnvBool("RW_TEST_BOOL", false), ConfigError);
    assert.throws(
      () => optionalEnvChoice("RW_TEST_CHOICE", ["html", "markdown"], "html"),
      (err: unknown) => err instanceof ConfigError && err.variable === "RW_TEST_CHOICE"
    );
  });
});

test("environment overrides only cover variables that are set", () => {
  withEnv(
    {
      RESEARCH_DB_PATH: ":memory:",
      RETRY_ATTEMPTS: "0",
      SEARCH_PROVIDER: "store",
      MAX_CONCURRENT_TASKS: "",
      STAGE_TIMEOUT_SECONDS: "",
      DUPLICATE_THRESHOLD: "",
      CACHE_SIZE_LIMIT: "",
      RESEARCH_OUTPUT_DIR: "",
    },
    () => {
      const overrides = pipelineOverridesFromEnv();
      assert.deepEqual(overrides, {
        coordinator: { retryAttempts: 0 },
        store: { dbPath: ":memory:" },
        research: { searchProvider: "store" },
      });
      const config = loadPipelineConfig(overrides);
      assert.equal(config.research.searchProvider, "store");
      assert.equal(config.coordinator.defaultTimeoutSeconds, 300);
    }
  );
});
