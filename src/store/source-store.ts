/**
 * Source store: durable, deduplicating storage for research sources.
 *
 * SQLite is the source of truth. An LRU cache of records sits in front of
 * point lookups and is kept in step with every mutation, so results are
 * identical whether the cache is cold or warm.
 *
 * Deduplication on ingest, per candidate and in input order:
 *   1. same normalized URL as a stored record   -> duplicate ("url")
 *   2. same content hash as a stored record     -> duplicate ("content", 1.0)
 *   3. best shingle similarity >= threshold     -> duplicate ("content")
 *   4. otherwise inserted
 *
 * Each candidate is persisted before the next is judged, so within one
 * batch the first occurrence wins.
 */

import { createHash, randomBytes } from "node:crypto";
import { z } from "zod";

import {
  DuplicateError,
  NotFoundError,
  StorageError,
  isPipelineError,
  describeError,
  validationErrorFromZod,
} from "../errors/index.js";
import { JsonObjectSchema } from "../envelope/index.js";
import type { StoreConfig } from "../config/pipeline/schema.js";
import { silentLogger, type Logger } from "../logging/index.js";
import { LruCache } from "./cache.js";
import { openStoreDatabase, type CollectionRow, type SourceRow, type StoreDatabase } from "./database.js";
import { KeyedMutex } from "./mutex.js";
import { extractDomain, normalizeUrl } from "./normalize.js";
import { contentHash, jaccard, shingles } from "./similarity.js";
import {
  CollectionInputSchema,
  SearchCriteriaSchema,
  SourceInputSchema,
  SourceUpdateSchema,
  type AddResult,
  type Collection,
  type CollectionInput,
  type DeleteResult,
  type DuplicateKind,
  type FindDuplicatesResult,
  type ParsedSourceInput,
  type ResolvedCollection,
  type SearchCriteria,
  type SearchResult,
  type SourceRecord,
  type StoreStatistics,
  type UpdateResult,
} from "./types.js";

export interface SourceStoreOptions {
  logger?: Logger;
  /** Time source for bookkeeping timestamps */
  clock?: () => Date;
}

/** A validated candidate ready to be judged or inserted */
interface PreparedSource {
  id: string;
  normalizedUrl: string;
  input: ParsedSourceInput;
  domain: string;
  hash: string;
  shingles: Set<string>;
}

interface Match {
  duplicateOf: string;
  reason: DuplicateKind;
  similarity: number;
}

const StringArraySchema = z.array(z.string());

const DAY_MS = 24 * 60 * 60 * 1000;

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;

/** Store-wide key held around every classify-then-write */
const INGEST_LOCK = "ingest";

function recordLock(id: string): string {
  return `id:${id}`;
}

/**
 * Sortable form of a publish date. Inputs are validated as parseable.
 */
function publishTimestamp(publishDate: string | null): string | null {
  return publishDate === null ? null : new Date(publishDate).toISOString();
}

/** Upper bound for `dateTo`: exclusive end of a bare day, inclusive otherwise */
function dateToBound(dateTo: string): { op: "<" | "<="; value: string } {
  const time = Date.parse(dateTo);
  if (DATE_ONLY.test(dateTo)) {
    return { op: "<", value: new Date(time + DAY_MS).toISOString() };
  }
  return { op: "<=", value: new Date(time).toISOString() };
}

/** Records leave the store as copies; callers never share the cached object */
function copyRecord(record: SourceRecord): SourceRecord {
  return structuredClone(record);
}

/**
 * Stable record id: first 16 hex characters of sha256(normalized URL).
 */
export function sourceIdFor(normalizedUrl: string): string {
  return createHash("sha256").update(normalizedUrl).digest("hex").slice(0, 16);
}

function generateCollectionId(now: Date): string {
  const stamp = now.toISOString().slice(0, 19).replace(/[-:]/g, "").replace("T", "_");
  return `collection_${stamp}_${randomBytes(4).toString("hex")}`;
}

/** Escape LIKE wildcards; queries use ESCAPE '\' */
function likePattern(fragment: string): string {
  return `%${fragment.replace(/[\\%_]/g, (c) => `\\${c}`)}%`;
}

function parseJsonColumn<T>(raw: string, schema: z.ZodType<T>, column: string): T {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch (err) {
    throw new StorageError(`decode ${column}`, err);
  }
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new StorageError(`decode ${column}`, result.error);
  }
  return result.data;
}

function rowToRecord(row: SourceRow): SourceRecord {
  return {
    id: row.id,
    url: row.url,
    title: row.title,
    content: row.content,
    domain: row.domain,
    author: row.author,
    publishDate: row.publish_date,
    credibilityScore: row.credibility_score,
    tags: parseJsonColumn(row.tags, StringArraySchema, "tags"),
    metadata: parseJsonColumn(row.metadata, JsonObjectSchema, "metadata"),
    accessCount: row.access_count,
    lastAccessed: row.last_accessed,
    createdAt: row.created_at,
  };
}

function rowToCollection(row: CollectionRow): Collection {
  return {
    id: row.id,
    name: row.name,
    description: row.description,
    sourceIds: parseJsonColumn(row.source_ids, StringArraySchema, "source_ids"),
    metadata: parseJsonColumn(row.metadata, JsonObjectSchema, "metadata"),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export class SourceStore {
  private database: StoreDatabase | null = null;
  private readonly cache: LruCache<string, SourceRecord>;
  private readonly locks = new KeyedMutex();
  private readonly logger: Logger;
  private readonly clock: () => Date;

  constructor(
    private readonly config: StoreConfig,
    options: SourceStoreOptions = {}
  ) {
    this.cache = new LruCache(config.cacheSizeLimit);
    this.logger = (options.logger ?? silentLogger).child({ component: "source-store" });
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Open a store and apply the schema.
   */
  static async open(config: StoreConfig, options: SourceStoreOptions = {}): Promise<SourceStore> {
    const store = new SourceStore(config, options);
    await store.open();
    return store;
  }

  // ═════════════════════════════════════════════════════════════════════════
  // LIFECYCLE
  // ═════════════════════════════════════════════════════════════════════════

  async open(): Promise<void> {
    if (this.database) return;
    try {
      this.database = await openStoreDatabase(this.config.dbPath);
    } catch (err) {
      throw new StorageError("open", err);
    }
    this.logger.debug("Source store opened", { dbPath: this.config.dbPath });
  }

  async close(): Promise<void> {
    const db = this.database;
    if (!db) return;
    this.database = null;
    this.cache.clear();
    try {
      await db.close();
    } catch (err) {
      throw new StorageError("close", err);
    }
  }

  get isOpen(): boolean {
    return this.database !== null;
  }

  private get db(): StoreDatabase {
    if (!this.database) {
      throw new StorageError("access", new Error("Source store is not open"));
    }
    return this.database;
  }

  /**
   * Run a database operation, wrapping driver failures in StorageError.
   */
  private async guard<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (isPipelineError(err)) throw err;
      throw new StorageError(operation, err);
    }
  }

  private now(): string {
    return this.clock().toISOString();
  }

  // ═════════════════════════════════════════════════════════════════════════
  // INGEST
  // ═════════════════════════════════════════════════════════════════════════

  private prepare(candidate: unknown): PreparedSource {
    const parsed = SourceInputSchema.safeParse(candidate);
    if (!parsed.success) {
      throw validationErrorFromZod("source", parsed.error.issues);
    }
    const input = parsed.data;
    const normalizedUrl = normalizeUrl(input.url);
    return {
      id: sourceIdFor(normalizedUrl),
      normalizedUrl,
      input,
      domain: extractDomain(input.url),
      hash: contentHash(input.content),
      shingles: shingles(input.content, this.config.shingleSize),
    };
  }

  /**
   * Judge a candidate against stored records, then against `seen`
   * (earlier unique candidates not yet persisted).
   */
  private async classify(
    candidate: PreparedSource,
    seen: readonly PreparedSource[] = []
  ): Promise<Match | null> {
    const db = this.db;

    const byUrl = await db.get<{ id: string }>(
      "SELECT id FROM sources WHERE normalized_url = ?",
      candidate.normalizedUrl
    );
    if (byUrl) return { duplicateOf: byUrl.id, reason: "url", similarity: 1 };
    const seenUrl = seen.find((s) => s.normalizedUrl === candidate.normalizedUrl);
    if (seenUrl) return { duplicateOf: seenUrl.id, reason: "url", similarity: 1 };

    if (candidate.hash === "") return null;

    const byHash = await db.get<{ id: string }>(
      "SELECT id FROM sources WHERE content_hash = ? ORDER BY created_at ASC, id ASC LIMIT 1",
      candidate.hash
    );
    if (byHash) return { duplicateOf: byHash.id, reason: "content", similarity: 1 };
    const seenHash = seen.find((s) => s.hash === candidate.hash);
    if (seenHash) return { duplicateOf: seenHash.id, reason: "content", similarity: 1 };

    let best: Match | null = null;
    const consider = (id: string, other: ReadonlySet<string>): void => {
      const similarity = jaccard(candidate.shingles, other);
      if (similarity >= this.config.duplicateThreshold && (!best || similarity > best.similarity)) {
        best = { duplicateOf: id, reason: "content", similarity };
      }
    };

    const rows = await db.all<{ id: string; content: string }[]>(
      "SELECT id, content FROM sources WHERE content_hash != '' ORDER BY created_at ASC, id ASC"
    );
    for (const row of rows) {
      consider(row.id, shingles(row.content, this.config.shingleSize));
    }
    for (const prior of seen) {
      consider(prior.id, prior.shingles);
    }
    return best;
  }

  private async insert(prepared: PreparedSource): Promise<SourceRecord> {
    const now = this.now();
    const { input } = prepared;
    const record: SourceRecord = {
      id: prepared.id,
      url: input.url,
      title: input.title,
      content: input.content,
      domain: prepared.domain,
      author: input.author ?? null,
      publishDate: input.publishDate ?? null,
      credibilityScore: input.credibilityScore,
      tags: [...new Set(input.tags)],
      metadata: input.metadata,
      accessCount: 0,
      lastAccessed: now,
      createdAt: now,
    };

    await this.db.run(
      `INSERT INTO sources
        (id, url, normalized_url, title, content, content_hash, domain, author, publish_date,
         publish_ts, credibility_score, tags, metadata, access_count, last_accessed, created_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      record.id,
      record.url,
      prepared.normalizedUrl,
      record.title,
      record.content,
      prepared.hash,
      record.domain,
      record.author,
      record.publishDate,
      publishTimestamp(record.publishDate),
      record.credibilityScore,
      JSON.stringify(record.tags),
      JSON.stringify(record.metadata),
      record.accessCount,
      record.lastAccessed,
      record.createdAt
    );
    this.cache.set(record.id, copyRecord(record));
    return record;
  }

  /**
   * Classify and write under the ingest lock, then the record's own lock.
   * Lock order is always ingest before record.
   */
  private exclusiveIngest<T>(id: string, task: () => Promise<T>): Promise<T> {
    return this.locks.runExclusive(INGEST_LOCK, () => this.locks.runExclusive(recordLock(id), task));
  }

  /**
   * Ingest a batch. Duplicates are reported, never merged; per-item
   * failures are collected and the rest of the batch proceeds.
   */
  async add(sources: readonly unknown[]): Promise<AddResult> {
    const result: AddResult = {
      added: 0,
      duplicates: 0,
      errors: 0,
      ids: [],
      duplicateIds: [],
      errorMessages: [],
    };

    for (const candidate of sources) {
      try {
        const prepared = this.prepare(candidate);
        const outcome = await this.exclusiveIngest(prepared.id, () =>
          this.guard("add", async () => {
            const match = await this.classify(prepared);
            if (match) return { kind: "duplicate" as const, match };
            const record = await this.insert(prepared);
            return { kind: "added" as const, record };
          })
        );

        if (outcome.kind === "duplicate") {
          result.duplicates++;
          result.duplicateIds.push(outcome.match.duplicateOf);
        } else {
          result.added++;
          result.ids.push(outcome.record.id);
        }
      } catch (err) {
        result.errors++;
        result.errorMessages.push(`Error adding source ${describeCandidate(candidate)}: ${describeError(err)}`);
      }
    }

    this.logger.info("Sources ingested", {
      processed: sources.length,
      added: result.added,
      duplicates: result.duplicates,
      errors: result.errors,
    });
    return result;
  }

  /**
   * Insert one source, throwing DuplicateError instead of classifying.
   */
  async insertStrict(source: unknown): Promise<SourceRecord> {
    const prepared = this.prepare(source);
    return this.exclusiveIngest(prepared.id, () =>
      this.guard("insert", async () => {
        const match = await this.classify(prepared);
        if (match) {
          throw new DuplicateError(prepared.input.url, match.duplicateOf, match.reason);
        }
        return this.insert(prepared);
      })
    );
  }

  /**
   * Preview what `add` would do, without writing. Earlier unique
   * candidates in the batch count as already stored.
   */
  async findDuplicates(candidates: readonly unknown[]): Promise<FindDuplicatesResult> {
    const seen: PreparedSource[] = [];
    const duplicates: FindDuplicatesResult["duplicates"] = [];

    for (const candidate of candidates) {
      const prepared = this.prepare(candidate);
      const match = await this.guard("find duplicates", () => this.classify(prepared, seen));
      if (match) {
        duplicates.push({
          url: prepared.input.url,
          title: prepared.input.title,
          duplicateOf: match.duplicateOf,
          reason: match.reason,
          similarity: match.similarity,
        });
      } else {
        seen.push(prepared);
      }
    }

    return {
      duplicates,
      uniqueCount: seen.length,
      duplicateCount: duplicates.length,
    };
  }

  // ═════════════════════════════════════════════════════════════════════════
  // READS
  // ═════════════════════════════════════════════════════════════════════════

  /**
   * Fetch a record and record the access.
   */
  async get(id: string): Promise<SourceRecord> {
    return this.locks.runExclusive(recordLock(id), () =>
      this.guard("get", async () => {
        const lastAccessed = this.now();
        const { changes } = await this.db.run(
          "UPDATE sources SET access_count = access_count + 1, last_accessed = ? WHERE id = ?",
          lastAccessed,
          id
        );
        if (!changes) {
          this.cache.delete(id);
          throw new NotFoundError("source", id);
        }

        const cached = this.cache.get(id);
        let record: SourceRecord;
        if (cached) {
          record = { ...copyRecord(cached), accessCount: cached.accessCount + 1, lastAccessed };
        } else {
          const row = await this.db.get<SourceRow>("SELECT * FROM sources WHERE id = ?", id);
          if (!row) throw new NotFoundError("source", id);
          record = rowToRecord(row);
        }
        this.cache.set(id, copyRecord(record));
        return record;
      })
    );
  }

  /**
   * Conjunctive search, most recently accessed first. Does not touch
   * access bookkeeping.
   */
  async search(criteria: SearchCriteria = {}): Promise<SearchResult> {
    const parsed = SearchCriteriaSchema.safeParse(criteria);
    if (!parsed.success) {
      throw validationErrorFromZod("search criteria", parsed.error.issues);
    }
    const query = parsed.data;

    const clauses: string[] = [];
    const params: (string | number)[] = [];

    if (query.url !== undefined) {
      clauses.push("url LIKE ? ESCAPE '\\'");
      params.push(likePattern(query.url));
    }
    if (query.domain !== undefined) {
      clauses.push("domain = ?");
      params.push(query.domain.toLowerCase());
    }
    if (query.title !== undefined) {
      clauses.push("title LIKE ? ESCAPE '\\'");
      params.push(likePattern(query.title));
    }
    if (query.content !== undefined) {
      clauses.push("content LIKE ? ESCAPE '\\'");
      params.push(likePattern(query.content));
    }
    for (const tag of query.tags ?? []) {
      clauses.push("EXISTS (SELECT 1 FROM json_each(sources.tags) WHERE json_each.value = ?)");
      params.push(tag);
    }
    if (query.minCredibility !== undefined) {
      clauses.push("credibility_score >= ?");
      params.push(query.minCredibility);
    }
    if (query.dateFrom !== undefined) {
      clauses.push("publish_ts >= ?");
      params.push(new Date(query.dateFrom).toISOString());
    }
    if (query.dateTo !== undefined) {
      const bound = dateToBound(query.dateTo);
      clauses.push(`publish_ts ${bound.op} ?`);
      params.push(bound.value);
    }

    const where = clauses.length > 0 ? `WHERE ${clauses.join(" AND ")}` : "";
    const limit = query.limit ?? this.config.defaultSearchLimit;
    const offset = query.offset ?? 0;

    const rows = await this.guard("search", () =>
      this.db.all<SourceRow[]>(
        `SELECT * FROM sources ${where} ORDER BY last_accessed DESC, id ASC LIMIT ? OFFSET ?`,
        ...params,
        limit,
        offset
      )
    );
    const sources = rows.map(rowToRecord);
    return { sources, count: sources.length };
  }

  async statistics(): Promise<StoreStatistics> {
    return this.guard("statistics", async () => {
      const cutoff = new Date(this.clock().getTime() - this.config.recentWindowDays * DAY_MS);
      const row = await this.db.get<{
        total: number;
        domains: number;
        average: number | null;
        recent: number | null;
      }>(
        `SELECT COUNT(*) AS total,
                COUNT(DISTINCT domain) AS domains,
                AVG(credibility_score) AS average,
                SUM(CASE WHEN last_accessed >= ? THEN 1 ELSE 0 END) AS recent
         FROM sources`,
        cutoff.toISOString()
      );
      const collections = await this.db.get<{ total: number }>(
        "SELECT COUNT(*) AS total FROM collections"
      );

      return {
        totalSources: row?.total ?? 0,
        uniqueDomains: row?.domains ?? 0,
        averageCredibility: Math.round((row?.average ?? 0) * 100) / 100,
        totalCollections: collections?.total ?? 0,
        recentlyAccessed: row?.recent ?? 0,
        cacheSize: this.cache.size,
      };
    });
  }

  // ═════════════════════════════════════════════════════════════════════════
  // MUTATIONS
  // ═════════════════════════════════════════════════════════════════════════

  async update(id: string, fields: unknown): Promise<UpdateResult> {
    const parsed = SourceUpdateSchema.safeParse(fields);
    if (!parsed.success) {
      throw validationErrorFromZod("source update", parsed.error.issues);
    }
    const changes = parsed.data;

    // Content changes what later ingests compare against
    return this.exclusiveIngest(id, () =>
      this.guard("update", async () => {
        const row = await this.db.get<SourceRow>("SELECT * FROM sources WHERE id = ?", id);
        if (!row) throw new NotFoundError("source", id);

        const current = rowToRecord(row);
        const next: SourceRecord = { ...current, lastAccessed: this.now() };
        if (changes.title !== undefined) next.title = changes.title;
        if (changes.content !== undefined) next.content = changes.content;
        if (changes.author !== undefined) next.author = changes.author;
        if (changes.publishDate !== undefined) next.publishDate = changes.publishDate;
        if (changes.credibilityScore !== undefined) next.credibilityScore = changes.credibilityScore;
        if (changes.tags !== undefined) next.tags = [...new Set(changes.tags)];
        if (changes.metadata !== undefined) next.metadata = changes.metadata;

        await this.db.run(
          `UPDATE sources
           SET title = ?, content = ?, content_hash = ?, author = ?, publish_date = ?,
               publish_ts = ?, credibility_score = ?, tags = ?, metadata = ?, last_accessed = ?
           WHERE id = ?`,
          next.title,
          next.content,
          contentHash(next.content),
          next.author,
          next.publishDate,
          publishTimestamp(next.publishDate),
          next.credibilityScore,
          JSON.stringify(next.tags),
          JSON.stringify(next.metadata),
          next.lastAccessed,
          id
        );
        this.cache.set(id, copyRecord(next));

        const updatedFields = Object.keys(changes).sort();
        this.logger.debug("Source updated", { id, updatedFields });
        return { updatedFields };
      })
    );
  }

  /**
   * Delete a record. Collections referencing it are left as they are.
   */
  async delete(id: string): Promise<DeleteResult> {
    return this.locks.runExclusive(recordLock(id), () =>
      this.guard("delete", async () => {
        const { changes } = await this.db.run("DELETE FROM sources WHERE id = ?", id);
        this.cache.delete(id);
        if (!changes) throw new NotFoundError("source", id);
        return { deletedId: id };
      })
    );
  }

  // ═════════════════════════════════════════════════════════════════════════
  // COLLECTIONS
  // ═════════════════════════════════════════════════════════════════════════

  async createCollection(input: CollectionInput): Promise<Collection> {
    const parsed = CollectionInputSchema.safeParse(input);
    if (!parsed.success) {
      throw validationErrorFromZod("collection", parsed.error.issues);
    }
    const spec = parsed.data;
    const now = this.clock();
    const id = spec.id ?? generateCollectionId(now);

    return this.locks.runExclusive(`collection:${id}`, () =>
      this.guard("create collection", async () => {
        const existing = await this.db.get<{ id: string }>(
          "SELECT id FROM collections WHERE id = ?",
          id
        );
        if (existing) throw new DuplicateError(spec.name, id, "id");

        const collection: Collection = {
          id,
          name: spec.name,
          description: spec.description,
          sourceIds: spec.sourceIds,
          metadata: spec.metadata,
          createdAt: now.toISOString(),
          updatedAt: now.toISOString(),
        };
        await this.db.run(
          `INSERT INTO collections (id, name, description, source_ids, metadata, created_at, updated_at)
           VALUES (?, ?, ?, ?, ?, ?, ?)`,
          collection.id,
          collection.name,
          collection.description,
          JSON.stringify(collection.sourceIds),
          JSON.stringify(collection.metadata),
          collection.createdAt,
          collection.updatedAt
        );
        return collection;
      })
    );
  }

  async getCollection(id: string): Promise<Collection> {
    return this.guard("get collection", async () => {
      const row = await this.db.get<CollectionRow>("SELECT * FROM collections WHERE id = ?", id);
      if (!row) throw new NotFoundError("collection", id);
      return rowToCollection(row);
    });
  }

  /**
   * A collection with its member records. Ids whose source no longer
   * exists are reported in `missingIds`, not removed.
   */
  async resolveCollection(id: string): Promise<ResolvedCollection> {
    const collection = await this.getCollection(id);
    const ids = [...new Set(collection.sourceIds)];
    if (ids.length === 0) {
      return { collection, sources: [], missingIds: [] };
    }

    const rows = await this.guard("resolve collection", () =>
      this.db.all<SourceRow[]>(
        `SELECT * FROM sources WHERE id IN (${ids.map(() => "?").join(", ")})`,
        ...ids
      )
    );
    const byId = new Map(rows.map((row) => [row.id, rowToRecord(row)]));

    const sources: SourceRecord[] = [];
    const missingIds: string[] = [];
    for (const sourceId of collection.sourceIds) {
      const record = byId.get(sourceId);
      if (record) sources.push(record);
      else missingIds.push(sourceId);
    }
    return { collection, sources, missingIds };
  }
}

function describeCandidate(candidate: unknown): string {
  if (typeof candidate === "object" && candidate !== null && "url" in candidate) {
    const { url } = candidate;
    if (typeof url === "string" && url !== "") return url;
  }
  return "unknown";
}
