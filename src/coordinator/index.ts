/**
 * Workflow coordinator module.
 *
 * Usage:
 *   const coordinator = new WorkflowCoordinator({
 *     config,
 *     adapters: createDefaultAdapters(config, { store, logger }),
 *     store,
 *     logger,
 *   });
 *   const report = await coordinator.run({ topic: "offshore wind", format: "markdown" });
 *   await coordinator.cleanup();
 */

export { WorkflowCoordinator, overallStatusOf, type CoordinatorOptions } from "./coordinator.js";
export {
  createRetryPolicy,
  executeWithRetry,
  retryPolicyFromConfig,
  type RetryHooks,
  type RetryOutcome,
  type RetryPolicy,
  type RetryPolicyOptions,
} from "./retry.js";
export { Semaphore } from "./semaphore.js";
export { sleep, withTimeout } from "./timeout.js";
export {
  RunRequestSchema,
  type ActiveRun,
  type CoordinatorStatus,
  type OverallStatus,
  type ParsedRunRequest,
  type PersistenceSummary,
  type RunReport,
  type RunRequest,
  type StepResult,
  type StepStatus,
} from "./types.js";
export {
  filterCredibleSources,
  renderingRequest,
  researchRequest,
  synthesisRequest,
  toSourceInput,
  UNKNOWN_DOMAIN_CREDIBILITY,
  verificationRequest,
} from "./workflow.js";
