/**
 * Stage adapter capability.
 *
 * Every pipeline stage sits behind the same narrow interface: the
 * coordinator hands it a request envelope and gets a response envelope
 * back, without knowing which collaborator does the work.
 *
 * Failure contract:
 *
 *   - Bad input and collaborator failures come back as an error response
 *     `{status: "error", error}` with `metadata.agent` set.
 *   - TransientError is thrown, so the coordinator's retry policy sees it.
 *   - Once the invocation's signal is aborted, whatever the adapter hits
 *     is thrown as-is; the coordinator has already moved on.
 */

import type { z } from "zod";
import type { StageName } from "../config/pipeline/enums.js";
import { describeError, TransientError } from "../errors/index.js";
import {
  createEnvelope,
  parsePayload,
  type EnvelopeMetadata,
  type MessageEnvelope,
} from "../envelope/index.js";
import { silentLogger, type Logger } from "../logging/index.js";
import type { ErrorResponse } from "./contracts.js";

/**
 * Per-invocation context supplied by the coordinator.
 */
export interface StageInvocation {
  /** Aborted when the stage times out or the coordinator shuts down */
  signal: AbortSignal;
  /** 1 for the first attempt, incremented on each retry */
  attempt: number;
  runId?: string;
}

export interface StageAdapter {
  readonly stage: StageName;
  /** Reported as `metadata.agent` and in step results */
  readonly agentName: string;
  invoke(request: MessageEnvelope, invocation: StageInvocation): Promise<MessageEnvelope>;
  /** Release sessions or handles held by the adapter. Idempotent. */
  close(): Promise<void>;
}

/**
 * Build the shared error response.
 */
export function errorResponse(
  agentName: string,
  error: string,
  metadata: EnvelopeMetadata = {}
): MessageEnvelope {
  const payload: ErrorResponse = { status: "error", error };
  return createEnvelope("response", payload, { ...metadata, agent: agentName });
}

/**
 * Adapter base: validates the request payload against a schema, runs
 * `handle`, and wraps the result in a success envelope.
 */
export abstract class BaseStageAdapter<S extends z.ZodTypeAny, R extends object>
  implements StageAdapter
{
  protected readonly logger: Logger;

  protected constructor(
    readonly stage: StageName,
    readonly agentName: string,
    private readonly requestSchema: S,
    logger: Logger = silentLogger
  ) {
    this.logger = logger.child({ agent: agentName });
  }

  async invoke(request: MessageEnvelope, invocation: StageInvocation): Promise<MessageEnvelope> {
    const metadata: EnvelopeMetadata = {
      agent: this.agentName,
      runId: invocation.runId,
      step: this.stage,
      attempt: invocation.attempt,
    };

    try {
      invocation.signal.throwIfAborted();
      const input: z.output<S> = parsePayload(request, this.requestSchema, `${this.stage} request`);
      const result = await this.handle(input, invocation);
      invocation.signal.throwIfAborted();

      return createEnvelope(
        "response",
        { status: "success", ...result },
        { ...metadata, timestamp: new Date().toISOString() }
      );
    } catch (err) {
      if (err instanceof TransientError || invocation.signal.aborted) {
        throw err;
      }
      const message = describeError(err);
      this.logger.error(`${this.stage} stage failed`, { error: message, attempt: invocation.attempt });
      return errorResponse(this.agentName, message, metadata);
    }
  }

  async close(): Promise<void> {
    // Built-in adapters hold no sessions.
  }

  protected abstract handle(input: z.output<S>, invocation: StageInvocation): Promise<R>;
}
