/**
 * Similarity strategies. A store is built with exactly one:
 *   - VectorSimilarity: embeddings + LanceDB, falling back to text search per call.
 *   - TextSimilarity: substring search only (no embedding provider configured).
 * Text results never carry a similarityDistance; vector results always do.
 */

import type { TaskDB } from "../backends/task-db.js";
import { DimensionMismatchError, type VectorHit, type VectorIndex } from "../backends/vector-index.js";
import type { SimilarityMode, TaskRecord } from "../types/task.js";
import type { TaskStoreLogger } from "../types/logger.js";
import { LOG_PREFIX } from "../utils/constants.js";
import { captureStoreError, toError } from "./error-reporter.js";
import { tryEmbed, type EmbeddingProvider } from "./embeddings.js";

export interface SimilarityStrategy {
  readonly mode: SimilarityMode;
  /**
   * Produce the vector to store for a new task, or null when none is available.
   * Throws only for fatal configuration errors (dimension mismatch).
   */
  prepare(text: string): Promise<number[] | null>;
  /** Register a stored task's vector. Returns false if the index did not accept it. */
  register(id: number, vector: number[]): Promise<boolean>;
  search(query: string, limit: number): Promise<TaskRecord[]>;
  forget(id: number): Promise<void>;
  close(): void;
}

export class TextSimilarity implements SimilarityStrategy {
  readonly mode = "text" as const;

  constructor(private readonly db: TaskDB) {}

  async prepare(): Promise<null> {
    return null;
  }

  async register(): Promise<boolean> {
    return false;
  }

  async search(query: string, limit: number): Promise<TaskRecord[]> {
    return this.db.searchByName(query, limit);
  }

  async forget(): Promise<void> {}

  close(): void {}
}

export class VectorSimilarity implements SimilarityStrategy {
  readonly mode = "vector" as const;
  private readonly fallback: TextSimilarity;

  constructor(
    private readonly db: TaskDB,
    private readonly provider: EmbeddingProvider,
    private readonly index: VectorIndex,
    private readonly logger: TaskStoreLogger,
  ) {
    this.fallback = new TextSimilarity(db);
  }

  /** A vector for the new row, or null when the row has to be stored without one. */
  async prepare(text: string): Promise<number[] | null> {
    const outcome = await tryEmbed(this.provider, text, this.logger);
    if (outcome.status !== "ok") return null;
    if (outcome.vector.length !== this.index.vectorDim) {
      throw new DimensionMismatchError(this.index.vectorDim, outcome.vector.length, "insert");
    }
    try {
      await this.index.assertCompatible();
    } catch (err) {
      if (err instanceof DimensionMismatchError) throw err;
      captureStoreError(err, { operation: "vector-open", subsystem: "vector", severity: "warning" });
      this.logger.warn(`${LOG_PREFIX} vector index unavailable, storing task without a vector: ${toError(err).message}`);
      return null;
    }
    return outcome.vector;
  }

  async register(id: number, vector: number[]): Promise<boolean> {
    try {
      await this.index.add(id, vector);
      return true;
    } catch (err) {
      if (err instanceof DimensionMismatchError) throw err;
      this.logger.warn(`${LOG_PREFIX} task ${id} stored without a vector: ${toError(err).message}`);
      return false;
    }
  }

  async search(query: string, limit: number): Promise<TaskRecord[]> {
    const outcome = await tryEmbed(this.provider, query, this.logger);
    if (outcome.status !== "ok") {
      this.logger.debug?.(`${LOG_PREFIX} no query embedding (${outcome.status}); using text search`);
      return this.fallback.search(query, limit);
    }

    let hits: VectorHit[];
    try {
      hits = await this.index.topK(outcome.vector, limit);
    } catch (err) {
      if (err instanceof DimensionMismatchError) throw err;
      captureStoreError(err, { operation: "vector-search", subsystem: "vector", severity: "info" });
      this.logger.warn(`${LOG_PREFIX} vector search failed, using text search: ${toError(err).message}`);
      return this.fallback.search(query, limit);
    }

    const distances = new Map(hits.map((h) => [h.id, h.distance]));
    return this.db.getByIds(hits.map((h) => h.id)).flatMap((record) => {
      const distance = distances.get(record.id);
      return distance === undefined ? [] : [{ ...record, similarityDistance: distance }];
    });
  }

  /** Drop a task's vector. A vector left behind is never returned, since search joins hits to rows. */
  async forget(id: number): Promise<void> {
    try {
      await this.index.delete(id);
    } catch (err) {
      if (err instanceof DimensionMismatchError) throw err;
      this.logger.warn(`${LOG_PREFIX} vector for task ${id} not removed: ${toError(err).message}`);
    }
  }

  close(): void {
    this.index.close();
  }
}
