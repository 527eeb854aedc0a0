/**
 * Run requests, step results and run reports.
 */

import { z } from "zod";

import { ReportFormat, type StageName } from "../config/pipeline/enums.js";
import type { JsonObject } from "../envelope/index.js";

// ═══════════════════════════════════════════════════════════════════════════
// REQUEST
// ═══════════════════════════════════════════════════════════════════════════

export const RunRequestSchema = z
  .object({
    topic: z.string().trim().min(1, "topic must not be empty"),
    /** Search query; defaults to the topic */
    query: z.string().trim().min(1, "query must not be empty").optional(),
    maxSources: z.number().int().positive().default(5),
    format: ReportFormat.default("html"),
  })
  .strict();

export type RunRequest = z.input<typeof RunRequestSchema>;
export type ParsedRunRequest = z.output<typeof RunRequestSchema>;

// ═══════════════════════════════════════════════════════════════════════════
// STEPS
// ═══════════════════════════════════════════════════════════════════════════

export type StepStatus = "completed" | "error";

interface StepCommon {
  stepName: StageName;
  agentName: string;
  durationMs: number;
  /** Invocations made; 0 when the step had no input */
  attempts: number;
  startedAt: string;
  finishedAt: string;
}

export type StepResult =
  | (StepCommon & { status: "completed"; result: JsonObject })
  | (StepCommon & { status: "error"; error: string });

// ═══════════════════════════════════════════════════════════════════════════
// REPORT
// ═══════════════════════════════════════════════════════════════════════════

export type OverallStatus = "success" | "partial_failure" | "failure";

/** What happened when research results were written to the store */
export type PersistenceSummary =
  | { status: "skipped"; reason: string }
  | {
      status: "stored";
      added: number;
      duplicates: number;
      errors: number;
      errorMessages: string[];
    }
  | { status: "failed"; error: string };

export interface RunReport {
  runId: string;
  topic: string;
  query: string;
  format: ReportFormat;
  overallStatus: OverallStatus;
  /** One per pipeline stage, in pipeline order */
  steps: StepResult[];
  persistence: PersistenceSummary;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
}

// ═══════════════════════════════════════════════════════════════════════════
// STATUS
// ═══════════════════════════════════════════════════════════════════════════

export interface ActiveRun {
  runId: string;
  topic: string;
  startedAt: string;
  /** Stage currently executing, null between stages */
  currentStage: StageName | null;
}

export interface CoordinatorStatus {
  closed: boolean;
  stages: readonly StageName[];
  /** Agent name per stage */
  adapters: Record<StageName, string>;
  activeRuns: ActiveRun[];
  /** Stage executions holding a slot */
  inFlight: number;
  /** Stage executions waiting for a slot */
  queued: number;
  /** Finished runs kept in history */
  historySize: number;
}
