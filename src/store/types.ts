/**
 * Source store records, inputs and results.
 */

import { z } from "zod";
import { JsonObjectSchema, type JsonObject } from "../envelope/index.js";

// ═══════════════════════════════════════════════════════════════════════════
// RECORDS
// ═══════════════════════════════════════════════════════════════════════════

export interface SourceRecord {
  /** Assigned on first insert from the normalized URL */
  id: string;
  url: string;
  title: string;
  content: string;
  /** Derived from the URL */
  domain: string;
  author: string | null;
  publishDate: string | null;
  credibilityScore: number;
  tags: string[];
  metadata: JsonObject;
  accessCount: number;
  lastAccessed: string;
  createdAt: string;
}

export interface Collection {
  id: string;
  name: string;
  description: string;
  /** Ordered; may reference deleted sources */
  sourceIds: string[];
  metadata: JsonObject;
  createdAt: string;
  updatedAt: string;
}

// ═══════════════════════════════════════════════════════════════════════════
// INPUTS
// ═══════════════════════════════════════════════════════════════════════════

const Score = z.number().min(0).max(1);

const DateString = z
  .string()
  .refine((value) => !Number.isNaN(Date.parse(value)), { message: "Invalid date" });

/**
 * A candidate source. A caller-supplied `id` is accepted and ignored.
 */
export const SourceInputSchema = z.object({
  id: z.string().optional(),
  url: z.string().min(1),
  title: z.string().default(""),
  content: z.string().default(""),
  author: z.string().nullish(),
  publishDate: DateString.nullish(),
  credibilityScore: Score.default(0.5),
  tags: z.array(z.string()).default([]),
  metadata: JsonObjectSchema.default({}),
});

export type SourceInput = z.input<typeof SourceInputSchema>;
export type ParsedSourceInput = z.output<typeof SourceInputSchema>;

/**
 * Fields `update()` may change. Anything else is rejected.
 */
export const SourceUpdateSchema = z
  .object({
    title: z.string(),
    content: z.string(),
    author: z.string().nullable(),
    publishDate: DateString.nullable(),
    credibilityScore: Score,
    tags: z.array(z.string()),
    metadata: JsonObjectSchema,
  })
  .partial()
  .strict()
  .refine((fields) => Object.keys(fields).length > 0, { message: "No fields to update" });

export type SourceUpdate = z.input<typeof SourceUpdateSchema>;

export const SearchCriteriaSchema = z
  .object({
    url: z.string().min(1),
    domain: z.string().min(1),
    title: z.string().min(1),
    content: z.string().min(1),
    /** Every listed tag must be present */
    tags: z.array(z.string()).min(1),
    minCredibility: Score,
    dateFrom: DateString,
    /** A bare YYYY-MM-DD covers that whole day */
    dateTo: DateString,
    limit: z.number().int().min(1),
    offset: z.number().int().min(0),
  })
  .partial()
  .strict();

export type SearchCriteria = z.input<typeof SearchCriteriaSchema>;

export const CollectionInputSchema = z
  .object({
    id: z.string().min(1).optional(),
    name: z.string().min(1),
    description: z.string().default(""),
    sourceIds: z.array(z.string()).default([]),
    metadata: JsonObjectSchema.default({}),
  })
  .strict();

export type CollectionInput = z.input<typeof CollectionInputSchema>;

// ═══════════════════════════════════════════════════════════════════════════
// RESULTS
// ═══════════════════════════════════════════════════════════════════════════

export type DuplicateKind = "url" | "content";

export interface AddResult {
  added: number;
  duplicates: number;
  errors: number;
  /** Ids of inserted records, in input order */
  ids: string[];
  /** Ids of the existing records each duplicate matched */
  duplicateIds: string[];
  errorMessages: string[];
}

export interface DuplicateMatch {
  url: string;
  title: string;
  duplicateOf: string;
  reason: DuplicateKind;
  similarity: number;
}

export interface FindDuplicatesResult {
  duplicates: DuplicateMatch[];
  uniqueCount: number;
  duplicateCount: number;
}

export interface SearchResult {
  sources: SourceRecord[];
  count: number;
}

export interface UpdateResult {
  updatedFields: string[];
}

export interface DeleteResult {
  deletedId: string;
}

export interface StoreStatistics {
  totalSources: number;
  uniqueDomains: number;
  averageCredibility: number;
  totalCollections: number;
  recentlyAccessed: number;
  cacheSize: number;
}

export interface ResolvedCollection {
  collection: Collection;
  /** Sources still present, in collection order */
  sources: SourceRecord[];
  /** Member ids with no stored source */
  missingIds: string[];
}
