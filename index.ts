/**
 * Semantic Task Store
 *
 * Short task records in SQLite, with near-duplicate detection:
 *   1. LanceDB + embeddings: cosine-distance search when an embedding provider is configured
 *   2. SQLite substring search, used when embeddings are unavailable or a vector search fails
 *
 * Ingestion callers check findSimilar() before add(); see ingestTasks().
 */

import { TaskDB } from "./backends/task-db.js";
import { VectorIndex } from "./backends/vector-index.js";
import { Embeddings, buildEmbeddingText, tryEmbed } from "./services/embeddings.js";
import { TextSimilarity, VectorSimilarity } from "./services/similarity.js";
import { escapeLike } from "./utils/sql.js";

export { configFromEnv, taskStoreConfigSchema, vectorDimsForModel, defaultVectorPath, DEFAULT_DB_PATH } from "./config.js";
export type { TaskStoreConfig, EmbeddingConfig, EmbeddingProviderName } from "./config.js";
export { createTaskStore, buildEmbeddingProvider, initStoreErrorReporting } from "./setup/init-store.js";
export type { CreateTaskStoreOptions } from "./setup/init-store.js";
export { TaskStore, TaskValidationError, validateTaskInput } from "./services/task-store.js";
export { checkDuplicate, ingestTasks, isDuplicate } from "./services/dedupe.js";
export type { DuplicateCheck, IngestCandidate, IngestResult } from "./services/dedupe.js";
export type { EmbeddingProvider, EmbeddingsClient, EmbedOutcome } from "./services/embeddings.js";
export type { SimilarityStrategy } from "./services/similarity.js";
export { DimensionMismatchError } from "./backends/vector-index.js";
export { flushErrorReporter } from "./services/error-reporter.js";
export { TaskInputSchema } from "./types/task.js";
export type { TaskInput, TaskRecord, PriorityCounts, SimilarityMode } from "./types/task.js";
export type { TaskStoreLogger } from "./types/logger.js";
export { priorityLabel } from "./utils/priority.js";
export { DEDUPE_DISTANCE_THRESHOLD, DEFAULT_RECENT_LIMIT, DEFAULT_SIMILAR_LIMIT } from "./utils/constants.js";
export { versionInfo } from "./versionInfo.js";

/** Internals exposed for tests. */
export const _testing = {
  TaskDB,
  VectorIndex,
  Embeddings,
  TextSimilarity,
  VectorSimilarity,
  buildEmbeddingText,
  tryEmbed,
  escapeLike,
};
