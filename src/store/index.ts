/**
 * Source store module.
 *
 * Usage:
 *   const store = await SourceStore.open(config.store, { logger });
 *   const { added, duplicates } = await store.add(results);
 *   const page = await store.search({ domain: "nature.com", limit: 10 });
 *   await store.close();
 */

export { SourceStore, sourceIdFor, type SourceStoreOptions } from "./source-store.js";
export { normalizeUrl, extractDomain } from "./normalize.js";
export { contentSimilarity, contentHash, shingles, jaccard, tokenize } from "./similarity.js";
export { LruCache } from "./cache.js";
export { KeyedMutex } from "./mutex.js";
export {
  SourceInputSchema,
  SourceUpdateSchema,
  SearchCriteriaSchema,
  CollectionInputSchema,
} from "./types.js";
export type {
  SourceRecord,
  SourceInput,
  SourceUpdate,
  SearchCriteria,
  Collection,
  CollectionInput,
  AddResult,
  DuplicateKind,
  DuplicateMatch,
  FindDuplicatesResult,
  SearchResult,
  UpdateResult,
  DeleteResult,
  StoreStatistics,
  ResolvedCollection,
} from "./types.js";
