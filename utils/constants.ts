/**
 * Shared constants to avoid magic numbers across the store.
 */

/**
 * Cosine distance below which a candidate counts as a duplicate of its nearest stored task.
 * Asserted for the text-embedding-3-small model family, not derived; callers may want to tune it.
 */
export const DEDUPE_DISTANCE_THRESHOLD = 0.1;
/** Default result count for findSimilar(). */
export const DEFAULT_SIMILAR_LIMIT = 5;
/** Default result count for getRecent(). */
export const DEFAULT_RECENT_LIMIT = 10;
/** Upper bound on rows returned by a single listing or search. */
export const MAX_QUERY_LIMIT = 1000;
/** Max cached embeddings (LRU eviction). */
export const EMBEDDING_CACHE_MAX = 500;
/** SQLite busy timeout (ms). */
export const SQLITE_BUSY_TIMEOUT_MS = 5000;
/** Prefix for every log line written by the store. */
export const LOG_PREFIX = "task-store:";
