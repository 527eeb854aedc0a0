/**
 * Workflow coordinator.
 *
 * Runs research → verification → synthesis → rendering for one topic and
 * returns a run report with exactly one step result per stage.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * EXECUTION
 * ═══════════════════════════════════════════════════════════════════════════
 *
 *   For each stage, in order:
 *     1. No usable input from the previous stage → error step, no call
 *     2. Acquire a slot (at most maxConcurrentTasks across all runs)
 *     3. Invoke the adapter under the stage timeout
 *     4. Retry TransientError (timeouts included) per the retry policy,
 *        with the same request envelope
 *     5. Record the step; the next stage starts only after this
 *
 *   Research results are written to the source store, when one is
 *   attached, before verification starts. Store failures are reported in
 *   `persistence` and never fail the run.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * OUTCOME
 * ═══════════════════════════════════════════════════════════════════════════
 *
 *   success          every step completed
 *   failure          research did not complete
 *   partial_failure  anything else
 *
 * `run()` throws only ValidationError, for a malformed request, before
 * any stage runs. After `cleanup()` the coordinator is closed: runs still
 * return a report, with every stage failed as cancelled.
 */

import { performance } from "node:perf_hooks";
import type { z } from "zod";

import {
  PIPELINE_STAGES,
  type CoordinatorConfig,
  type PipelineConfig,
  type StageName,
} from "../config/pipeline/index.js";
import {
  createEnvelope,
  parsePayload,
  type JsonObject,
  type MessageEnvelope,
} from "../envelope/index.js";
import {
  CancelledError,
  describeError,
  NotFoundError,
  validationErrorFromZod,
} from "../errors/index.js";
import { generateRunId, silentLogger, type Logger } from "../logging/index.js";
import {
  RenderingResponseSchema,
  ResearchResponseSchema,
  StageStatusSchema,
  SynthesisResponseSchema,
  VerificationResponseSchema,
  type ResearchResult,
  type StageAdapter,
  type StageAdapters,
  type Verification,
} from "../stages/index.js";
import type { SourceStore } from "../store/index.js";
import { executeWithRetry, retryPolicyFromConfig, type RetryPolicy } from "./retry.js";
import { Semaphore } from "./semaphore.js";
import { withTimeout } from "./timeout.js";
import {
  RunRequestSchema,
  type ActiveRun,
  type CoordinatorStatus,
  type OverallStatus,
  type PersistenceSummary,
  type RunReport,
  type StepResult,
} from "./types.js";
import {
  filterCredibleSources,
  renderingRequest,
  researchRequest,
  synthesisRequest,
  toSourceInput,
  verificationRequest,
} from "./workflow.js";

export interface CoordinatorOptions {
  config: PipelineConfig;
  adapters: StageAdapters;
  /** Receives research results; omitted means nothing is persisted */
  store?: SourceStore;
  logger?: Logger;
  clock?: () => Date;
  /** Defaults to the policy described by the coordinator config */
  retryPolicy?: RetryPolicy;
}

type StepOutcome = { status: "completed"; result: JsonObject } | { status: "error"; error: string };

interface StepRun<T> {
  step: StepResult;
  /** Parsed response; null unless the step completed */
  output: T | null;
}

interface RunScope {
  runId: string;
  logger: Logger;
  active: ActiveRun;
  steps: StepResult[];
}

/**
 * Overall status of a run from its steps.
 */
export function overallStatusOf(steps: readonly StepResult[]): OverallStatus {
  if (steps.every((step) => step.status === "completed")) return "success";
  const research = steps.find((step) => step.stepName === "research");
  if (!research || research.status !== "completed") return "failure";
  return "partial_failure";
}

function previousStage(stage: StageName): StageName | undefined {
  return PIPELINE_STAGES[PIPELINE_STAGES.indexOf(stage) - 1];
}

export class WorkflowCoordinator {
  private readonly config: CoordinatorConfig;
  private readonly adapters: StageAdapters;
  private readonly store: SourceStore | undefined;
  private readonly logger: Logger;
  private readonly clock: () => Date;
  private readonly retryPolicy: RetryPolicy;
  private readonly slots: Semaphore;
  private readonly shutdown = new AbortController();
  private readonly active = new Map<string, ActiveRun>();
  private readonly history: RunReport[] = [];
  private closing: Promise<void> | null = null;

  constructor(options: CoordinatorOptions) {
    this.config = options.config.coordinator;
    this.adapters = options.adapters;
    this.store = options.store;
    this.logger = (options.logger ?? silentLogger).child({ component: "coordinator" });
    this.clock = options.clock ?? (() => new Date());
    this.retryPolicy = options.retryPolicy ?? retryPolicyFromConfig(this.config);
    this.slots = new Semaphore(this.config.maxConcurrentTasks);
  }

  get closed(): boolean {
    return this.closing !== null;
  }

  // ═════════════════════════════════════════════════════════════════════════
  // RUN
  // ═════════════════════════════════════════════════════════════════════════

  /**
   * Execute the pipeline for one request.
   *
   * @throws ValidationError when the request is malformed
   */
  async run(input: unknown): Promise<RunReport> {
    const parsed = RunRequestSchema.safeParse(input);
    if (!parsed.success) {
      throw validationErrorFromZod("run request", parsed.error.issues);
    }
    const request = parsed.data;
    const { topic } = request;
    const query = request.query ?? topic;

    const startedAt = this.clock();
    const started = performance.now();
    const runId = this.newRunId(startedAt);
    const active: ActiveRun = { runId, topic, startedAt: startedAt.toISOString(), currentStage: null };
    const scope: RunScope = { runId, logger: this.logger.child({ runId }), active, steps: [] };

    this.active.set(runId, active);
    scope.logger.info("Run started", { topic, query, format: request.format, maxSources: request.maxSources });

    try {
      const research = await this.executeStep(scope, "research", researchRequest(request), ResearchResponseSchema);
      const results = research.output?.results ?? null;

      const persistence: PersistenceSummary = results
        ? await this.persist(results, scope, query)
        : { status: "skipped", reason: "research did not complete" };

      const verification = await this.executeStep(
        scope,
        "verification",
        results ? verificationRequest(topic, results) : null,
        VerificationResponseSchema
      );

      const sources = this.synthesisSources(results, verification.output?.verification ?? null, scope);
      const synthesis = await this.executeStep(
        scope,
        "synthesis",
        sources ? synthesisRequest(topic, sources) : null,
        SynthesisResponseSchema
      );

      await this.executeStep(
        scope,
        "rendering",
        synthesis.output ? renderingRequest(synthesis.output.synthesis, request) : null,
        RenderingResponseSchema
      );

      const report: RunReport = {
        runId,
        topic,
        query,
        format: request.format,
        overallStatus: overallStatusOf(scope.steps),
        steps: scope.steps,
        persistence,
        startedAt: startedAt.toISOString(),
        finishedAt: this.clock().toISOString(),
        durationMs: Math.round(performance.now() - started),
      };

      this.remember(report);
      scope.logger.info("Run finished", {
        overallStatus: report.overallStatus,
        durationMs: report.durationMs,
      });
      return report;
    } finally {
      this.active.delete(runId);
    }
  }

  /**
   * Sources handed to synthesis: the credible research results, or all
   * of them when verification failed and unverified sources are allowed.
   */
  private synthesisSources(
    results: ResearchResult[] | null,
    verification: Verification | null,
    scope: RunScope
  ): ResearchResult[] | null {
    if (!results) return null;

    if (verification) {
      const credible = filterCredibleSources(results, verification, this.config.minSourceCredibility);
      scope.logger.info("Filtered sources by credibility", {
        kept: credible.length,
        dropped: results.length - credible.length,
        threshold: this.config.minSourceCredibility,
      });
      return credible;
    }

    if (this.config.proceedWithUnverifiedSources) {
      scope.logger.warn("Verification failed; synthesizing unverified sources", { sources: results.length });
      return results;
    }
    return null;
  }

  // ═════════════════════════════════════════════════════════════════════════
  // STEPS
  // ═════════════════════════════════════════════════════════════════════════

  private async executeStep<S extends z.ZodTypeAny>(
    scope: RunScope,
    stage: StageName,
    payload: object | null,
    responseSchema: S
  ): Promise<StepRun<z.output<S>>> {
    const adapter = this.adapters[stage];
    const startedAt = this.clock().toISOString();
    const started = performance.now();
    scope.active.currentStage = stage;

    const record = (
      outcome: StepOutcome,
      attempts: number,
      output: z.output<S> | null
    ): StepRun<z.output<S>> => {
      const step: StepResult = {
        stepName: stage,
        agentName: adapter.agentName,
        ...outcome,
        durationMs: Math.round(performance.now() - started),
        attempts,
        startedAt,
        finishedAt: this.clock().toISOString(),
      };
      scope.steps.push(step);
      scope.active.currentStage = null;

      if (step.status === "completed") {
        scope.logger.info("Step completed", { stage, attempts, durationMs: step.durationMs });
      } else {
        scope.logger.error("Step failed", { stage, attempts, error: step.error });
      }
      return { step, output };
    };

    if (payload === null) {
      return record(
        { status: "error", error: `No input: ${previousStage(stage) ?? "previous"} step produced no usable result` },
        0,
        null
      );
    }

    let envelope: MessageEnvelope;
    try {
      envelope = createEnvelope("request", payload, {
        runId: scope.runId,
        step: stage,
      });
    } catch (err) {
      return record({ status: "error", error: describeError(err) }, 0, null);
    }

    const outcome = await executeWithRetry(
      this.retryPolicy,
      (attempt) => this.invokeOnce(adapter, envelope, attempt, scope.runId),
      {
        signal: this.shutdown.signal,
        onRetry: ({ attempt, delayMs, error }) =>
          scope.logger.warn("Retrying stage", { stage, attempt, delayMs, error: describeError(error) }),
      }
    );

    if (!outcome.ok) {
      return record({ status: "error", error: describeError(outcome.error) }, outcome.attempts, null);
    }

    const response = outcome.value;
    const status = StageStatusSchema.safeParse(response.payload);
    if (!status.success) {
      return record(
        { status: "error", error: validationErrorFromZod(`${stage} response`, status.error.issues).message },
        outcome.attempts,
        null
      );
    }
    if (status.data.status === "error") {
      return record(
        { status: "error", error: status.data.error ?? `${adapter.agentName} reported an error` },
        outcome.attempts,
        null
      );
    }

    let output: z.output<S>;
    try {
      output = parsePayload(response, responseSchema, `${stage} response`);
    } catch (err) {
      return record({ status: "error", error: describeError(err) }, outcome.attempts, null);
    }
    return record({ status: "completed", result: response.payload }, outcome.attempts, output);
  }

  /**
   * One attempt: take a slot, then invoke under the stage timeout.
   */
  private async invokeOnce(
    adapter: StageAdapter,
    envelope: MessageEnvelope,
    attempt: number,
    runId: string
  ): Promise<MessageEnvelope> {
    if (this.closed) {
      throw new CancelledError("Coordinator is closed");
    }

    const release = await this.slots.acquire();
    try {
      return await withTimeout(
        adapter.stage,
        this.timeoutMs(adapter.stage),
        (signal) => adapter.invoke(envelope, { signal, attempt, runId }),
        this.shutdown.signal
      );
    } finally {
      release();
    }
  }

  private timeoutMs(stage: StageName): number {
    const seconds = this.config.stageTimeoutsSeconds[stage] ?? this.config.defaultTimeoutSeconds;
    return Math.round(seconds * 1000);
  }

  private async persist(
    results: readonly ResearchResult[],
    scope: RunScope,
    query: string
  ): Promise<PersistenceSummary> {
    if (!this.store) {
      return { status: "skipped", reason: "no source store attached" };
    }

    try {
      const outcome = await this.store.add(results.map((r) => toSourceInput(r, scope.runId, query)));
      scope.logger.info("Persisted research sources", {
        added: outcome.added,
        duplicates: outcome.duplicates,
        errors: outcome.errors,
      });
      return {
        status: "stored",
        added: outcome.added,
        duplicates: outcome.duplicates,
        errors: outcome.errors,
        errorMessages: outcome.errorMessages,
      };
    } catch (err) {
      const error = describeError(err);
      scope.logger.error("Persisting research sources failed", { error });
      return { status: "failed", error };
    }
  }

  // ═════════════════════════════════════════════════════════════════════════
  // HISTORY + STATUS
  // ═════════════════════════════════════════════════════════════════════════

  private newRunId(now: Date): string {
    let runId = generateRunId(now);
    while (this.active.has(runId) || this.history.some((r) => r.runId === runId)) {
      runId = generateRunId(now);
    }
    return runId;
  }

  private remember(report: RunReport): void {
    this.history.push(report);
    while (this.history.length > this.config.historyLimit) {
      this.history.shift();
    }
  }

  /**
   * A finished run from history.
   *
   * @throws NotFoundError when the run is unknown or has aged out
   */
  getRun(runId: string): RunReport {
    const report = this.history.find((r) => r.runId === runId);
    if (!report) {
      throw new NotFoundError("run", runId);
    }
    return report;
  }

  /** Finished runs, oldest first */
  listRuns(): RunReport[] {
    return [...this.history];
  }

  getStatus(): CoordinatorStatus {
    const adapters: Record<StageName, string> = {
      research: this.adapters.research.agentName,
      verification: this.adapters.verification.agentName,
      synthesis: this.adapters.synthesis.agentName,
      rendering: this.adapters.rendering.agentName,
    };
    return {
      closed: this.closed,
      stages: PIPELINE_STAGES,
      adapters,
      activeRuns: [...this.active.values()].map((run) => ({ ...run })),
      inFlight: this.slots.inFlight,
      queued: this.slots.queued,
      historySize: this.history.length,
    };
  }

  // ═════════════════════════════════════════════════════════════════════════
  // SHUTDOWN
  // ═════════════════════════════════════════════════════════════════════════

  /**
   * Abort in-flight stages, fail queued ones, clear timers and close the
   * adapters. Idempotent; later calls return the same promise. The source
   * store belongs to the caller and stays open.
   */
  cleanup(): Promise<void> {
    if (!this.closing) {
      this.closing = this.close();
    }
    return this.closing;
  }

  private async close(): Promise<void> {
    this.logger.info("Coordinator shutting down", {
      activeRuns: this.active.size,
      inFlight: this.slots.inFlight,
      queued: this.slots.queued,
    });

    this.shutdown.abort();
    this.slots.rejectWaiting(new CancelledError("Coordinator closed while waiting for a slot"));

    const closed = await Promise.allSettled(PIPELINE_STAGES.map((stage) => this.adapters[stage].close()));
    closed.forEach((outcome, i) => {
      if (outcome.status === "rejected") {
        this.logger.error("Adapter close failed", {
          stage: PIPELINE_STAGES[i],
          error: describeError(outcome.reason),
        });
      }
    });
  }
}
