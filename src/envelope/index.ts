/**
 * Message envelopes exchanged between the coordinator and stage adapters.
 *
 * An envelope is `{role, payload, metadata}`. The payload is always a
 * JSON object; anything else is rejected when the envelope is built, so
 * adapters never have to guess what they were handed.
 */

import { z } from "zod";
import { ValidationError, validationErrorFromZod } from "../errors/index.js";

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export type EnvelopeRole = "request" | "response";

export interface EnvelopeMetadata {
  agent?: string;
  runId?: string;
  step?: string;
  attempt?: number;
  timestamp?: string;
  [key: string]: JsonValue | undefined;
}

export interface MessageEnvelope {
  readonly role: EnvelopeRole;
  readonly payload: JsonObject;
  readonly metadata: EnvelopeMetadata;
}

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number().finite(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ])
);

export const JsonObjectSchema: z.ZodType<JsonObject> = z.record(JsonValueSchema);

const EnvelopeSchema = z
  .object({
    role: z.enum(["request", "response"]),
    payload: JsonObjectSchema,
    metadata: z
      .object({
        agent: z.string().optional(),
        runId: z.string().optional(),
        step: z.string().optional(),
        attempt: z.number().int().optional(),
        timestamp: z.string().optional(),
      })
      .catchall(JsonValueSchema)
      .default({}),
  })
  .strict();

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Normalize a payload to a JSON object.
 *
 * Strings are parsed as JSON; the parsed value must itself be an object.
 * Values that do not survive a JSON round-trip (undefined, functions,
 * non-finite numbers, class instances) are rejected.
 */
export function normalizePayload(payload: unknown): JsonObject {
  let candidate = payload;

  if (typeof payload === "string") {
    try {
      candidate = JSON.parse(payload);
    } catch (err) {
      throw new ValidationError(
        `Envelope payload is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
        [{ path: ["payload"], message: "Invalid JSON", code: "invalid_string" }]
      );
    }
  }

  if (!isPlainObject(candidate)) {
    const kind = Array.isArray(candidate) ? "array" : candidate === null ? "null" : typeof candidate;
    throw new ValidationError(`Envelope payload must be an object, got ${kind}`, [
      { path: ["payload"], message: `Expected object, received ${kind}`, code: "invalid_type" },
    ]);
  }

  const result = JsonObjectSchema.safeParse(candidate);
  if (!result.success) {
    throw validationErrorFromZod("envelope payload", result.error.issues);
  }
  return result.data;
}

/**
 * Build an envelope. Throws ValidationError for a non-object payload.
 */
export function createEnvelope(
  role: EnvelopeRole,
  payload: unknown,
  metadata: EnvelopeMetadata = {}
): MessageEnvelope {
  return {
    role,
    payload: normalizePayload(payload),
    metadata: { ...metadata },
  };
}

/**
 * Recursively sort object keys. Array order is preserved.
 */
export function canonicalize(value: JsonValue): JsonValue {
  if (Array.isArray(value)) {
    return value.map(canonicalize);
  }
  if (value !== null && typeof value === "object") {
    const sorted: JsonObject = {};
    for (const key of Object.keys(value).sort()) {
      sorted[key] = canonicalize(value[key]);
    }
    return sorted;
  }
  return value;
}

/**
 * Serialize to the canonical form: JSON with recursively sorted keys.
 * Equal envelopes always serialize to identical strings.
 */
export function serializeEnvelope(envelope: MessageEnvelope): string {
  const metadata: JsonObject = {};
  for (const [key, value] of Object.entries(envelope.metadata)) {
    if (value !== undefined) metadata[key] = value;
  }
  return JSON.stringify(
    canonicalize({ role: envelope.role, payload: envelope.payload, metadata })
  );
}

/**
 * Parse a serialized envelope, validating its shape.
 */
export function deserializeEnvelope(text: string): MessageEnvelope {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ValidationError(
      `Envelope is not valid JSON: ${err instanceof Error ? err.message : String(err)}`
    );
  }
  const result = EnvelopeSchema.safeParse(raw);
  if (!result.success) {
    throw validationErrorFromZod("envelope", result.error.issues);
  }
  return result.data;
}

/**
 * Validate an envelope payload against a schema.
 */
export function parsePayload<S extends z.ZodTypeAny>(
  envelope: MessageEnvelope,
  schema: S,
  subject = "payload"
): z.output<S> {
  const result = schema.safeParse(envelope.payload);
  if (!result.success) {
    throw validationErrorFromZod(subject, result.error.issues);
  }
  return result.data;
}
