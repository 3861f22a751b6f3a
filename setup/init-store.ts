import OpenAI from "openai";
import { TaskDB } from "../backends/task-db.js";
import { VectorIndex } from "../backends/vector-index.js";
import { supportsDimensionOverride, vectorDimsForModel, type TaskStoreConfig } from "../config.js";
import { Embeddings, type EmbeddingProvider, type EmbeddingsClient } from "../services/embeddings.js";
import { initErrorReporter } from "../services/error-reporter.js";
import { TextSimilarity, VectorSimilarity, type SimilarityStrategy } from "../services/similarity.js";
import { TaskStore } from "../services/task-store.js";
import { consoleLogger, type TaskStoreLogger } from "../types/logger.js";
import { LOG_PREFIX } from "../utils/constants.js";
import { packageVersion } from "../versionInfo.js";

export type CreateTaskStoreOptions = {
  logger?: TaskStoreLogger;
  /**
   * Embedding provider to use instead of the one derived from config.
   * null forces text-only mode even when an API key is configured.
   */
  embeddings?: EmbeddingProvider | null;
  /** Clock for created_at; defaults to the system clock. */
  now?: () => Date;
};

/**
 * Build the OpenAI embedding provider from config, or null when no key is configured.
 * `client` replaces the OpenAI client built from the key and base URL.
 */
export function buildEmbeddingProvider(cfg: TaskStoreConfig, client?: EmbeddingsClient): EmbeddingProvider | null {
  const { apiKey, model, dimensions, baseURL } = cfg.embedding;
  if (!apiKey) return null;
  return new Embeddings(client ?? new OpenAI({ apiKey, ...(baseURL ? { baseURL } : {}) }), {
    models: model,
    dimensions,
    requestDimensions: supportsDimensionOverride(model) && dimensions !== vectorDimsForModel(model),
  });
}

/**
 * Open the SQLite store (creating the schema if absent) and pick the similarity strategy:
 * vector search when an embedding provider is available, text search otherwise.
 */
export function createTaskStore(cfg: TaskStoreConfig, options: CreateTaskStoreOptions = {}): TaskStore {
  const logger = options.logger ?? consoleLogger;
  for (const notice of cfg.notices) logger.info(`${LOG_PREFIX} ${notice}`);

  const db = new TaskDB(cfg.dbPath, { now: options.now });
  const provider = options.embeddings !== undefined ? options.embeddings : buildEmbeddingProvider(cfg);

  let similarity: SimilarityStrategy;
  if (provider) {
    const index = new VectorIndex(cfg.vectorPath, provider.dimensions);
    index.setLogger(logger);
    similarity = new VectorSimilarity(db, provider, index, logger);
    logger.info(`${LOG_PREFIX} semantic search enabled (${provider.model}, dim=${provider.dimensions})`);
  } else {
    similarity = new TextSimilarity(db);
    logger.info(`${LOG_PREFIX} semantic search unavailable; using text search (${cfg.dbPath})`);
  }
  return new TaskStore(db, similarity, logger, cfg.dedupeThreshold);
}

/** Turn on error reporting when the config opts in. Call once per process; true when active. */
export async function initStoreErrorReporting(cfg: TaskStoreConfig, logger?: TaskStoreLogger): Promise<boolean> {
  return initErrorReporter(cfg.errorReporting, packageVersion, logger);
}
