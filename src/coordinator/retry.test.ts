/**
 * Retry policy, semaphore and timeout tests.
 *
 * Run: node --import tsx --test src/coordinator/retry.test.ts
 */

import { test } from "node:test";
import { strict as assert } from "node:assert";

import { loadPipelineConfig } from "../config/pipeline/index.js";
import { CancelledError, StageTimeoutError, TransientError, ValidationError } from "../errors/index.js";
import { createRetryPolicy, executeWithRetry, retryPolicyFromConfig } from "./retry.js";
import { Semaphore } from "./semaphore.js";
import { sleep, withTimeout } from "./timeout.js";

const POLICY = createRetryPolicy({ retries: 2, initialDelayMs: 100, multiplier: 2, maxDelayMs: 300 });

/** Records waits instead of sleeping */
function recordingWait() {
  const waits: number[] = [];
  return {
    waits,
    wait: async (ms: number) => {
      waits.push(ms);
    },
  };
}

// ═══════════════════════════════════════════════════════════════════════════
// RETRY POLICY
// ═══════════════════════════════════════════════════════════════════════════

test("retry policy backs off geometrically up to the cap", () => {
  assert.equal(POLICY.maxAttempts, 3);
  assert.deepEqual([1, 2, 3].map((n) => POLICY.delayMs(n)), [100, 200, 300]);
});

test("retry policy from config uses the coordinator settings", () => {
  const policy = retryPolicyFromConfig(loadPipelineConfig().coordinator);
  assert.equal(policy.maxAttempts, 3);
  assert.equal(policy.delayMs(1), 500);
  assert.equal(policy.delayMs(2), 1000);
  assert.equal(policy.shouldRetry(new TransientError("socket reset")), true);
  assert.equal(policy.shouldRetry(new ValidationError("bad input")), false);
  assert.equal(policy.shouldRetry(new Error("plain")), false);
});

test("executeWithRetry retries transient failures", async () => {
  const { waits, wait } = recordingWait();
  const seen: number[] = [];

  const outcome = await executeWithRetry(
    POLICY,
    async (attempt) => {
      seen.push(attempt);
      if (attempt < 3) throw new TransientError(`flaky ${attempt}`);
      return "done";
    },
    { wait }
  );

  assert.deepEqual(outcome, { ok: true, value: "done", attempts: 3 });
  assert.deepEqual(seen, [1, 2, 3]);
  assert.deepEqual(waits, [100, 200]);
});

test("executeWithRetry stops at the first non-retryable error", async () => {
  const { waits, wait } = recordingWait();
  const error = new ValidationError("bad input");

  const outcome = await executeWithRetry(
    POLICY,
    async () => {
      throw error;
    },
    { wait }
  );

  assert.deepEqual(outcome, { ok: false, error, attempts: 1 });
  assert.deepEqual(waits, []);
});

test("executeWithRetry returns the last error when attempts run out", async () => {
  const { wait } = recordingWait();
  const retries: number[] = [];

  const outcome = await executeWithRetry(
    POLICY,
    async (attempt) => {
      throw new TransientError(`attempt ${attempt}`);
    },
    { wait, onRetry: ({ attempt }) => retries.push(attempt) }
  );

  assert.equal(outcome.ok, false);
  assert.equal(outcome.attempts, 3);
  assert.deepEqual(retries, [1, 2]);
  if (!outcome.ok) {
    assert.ok(outcome.error instanceof TransientError);
    assert.equal(outcome.error.message, "attempt 3");
  }
});

test("executeWithRetry ends when the backoff wait is cancelled", async () => {
  const controller = new AbortController();
  controller.abort();

  const outcome = await executeWithRetry(
    POLICY,
    async () => {
      throw new TransientError("flaky");
    },
    { signal: controller.signal }
  );

  assert.equal(outcome.ok, false);
  assert.equal(outcome.attempts, 1);
  if (!outcome.ok) assert.ok(outcome.error instanceof CancelledError);
});

// ═══════════════════════════════════════════════════════════════════════════
// SEMAPHORE
// ═══════════════════════════════════════════════════════════════════════════

test("semaphore admits waiters in order as slots free up", async () => {
  const semaphore = new Semaphore(1);
  const order: string[] = [];

  const releaseA = await semaphore.acquire();
  const b = semaphore.acquire().then((release) => {
    order.push("b");
    return release;
  });
  const c = semaphore.acquire().then((release) => {
    order.push("c");
    return release;
  });

  assert.equal(semaphore.inFlight, 1);
  assert.equal(semaphore.queued, 2);

  releaseA();
  releaseA();
  const releaseB = await b;
  assert.deepEqual(order, ["b"]);
  assert.equal(semaphore.queued, 1);

  releaseB();
  const releaseC = await c;
  assert.deepEqual(order, ["b", "c"]);

  releaseC();
  assert.equal(semaphore.inFlight, 0);
  assert.equal(semaphore.queued, 0);
});

test("semaphore rejects queued acquisitions on demand", async () => {
  const semaphore = new Semaphore(1);
  const release = await semaphore.acquire();
  const waiting = semaphore.acquire();

  semaphore.rejectWaiting(new CancelledError("closing"));
  await assert.rejects(waiting, CancelledError);
  assert.equal(semaphore.inFlight, 1);

  release();
  assert.equal(semaphore.inFlight, 0);
});

test("semaphore capacity must be positive", () => {
  assert.throws(() => new Semaphore(0), RangeError);
});

// ═══════════════════════════════════════════════════════════════════════════
// TIMEOUT
// ═══════════════════════════════════════════════════════════════════════════

test("withTimeout resolves with the task's value", async () => {
  const value = await withTimeout("research", 1000, async () => 42);
  assert.equal(value, 42);
});

test("withTimeout aborts a task that outlives the deadline", async () => {
  let taskSignal: AbortSignal | undefined;
  const started = Date.now();

  await assert.rejects(
    withTimeout("synthesis", 30, (signal) => {
      taskSignal = signal;
      return new Promise<string>((resolve) => {
        signal.addEventListener("abort", () => resolve("too late"));
      });
    }),
    StageTimeoutError
  );

  assert.ok(Date.now() - started < 1000);
  assert.equal(taskSignal?.aborted, true);
});

test("withTimeout cancels when the parent signal aborts", async () => {
  const parent = new AbortController();
  let taskSignal: AbortSignal | undefined;

  const pending = withTimeout(
    "rendering",
    10_000,
    (signal) => {
      taskSignal = signal;
      return new Promise<never>(() => undefined);
    },
    parent.signal
  );
  parent.abort();

  await assert.rejects(pending, CancelledError);
  assert.equal(taskSignal?.aborted, true);
});

test("withTimeout does not start a task under an aborted parent", async () => {
  const parent = new AbortController();
  parent.abort();
  let called = false;

  await assert.rejects(
    withTimeout(
      "research",
      1000,
      async () => {
        called = true;
      },
      parent.signal
    ),
    CancelledError
  );
  assert.equal(called, false);
});

test("sleep rejects when its signal aborts", async () => {
  const controller = new AbortController();
  const pending = sleep(10_000, controller.signal);
  controller.abort();
  await assert.rejects(pending, CancelledError);
});
