/**
 * Task store: SQLite rows plus a pluggable similarity strategy.
 *
 * add() always persists the row when the input is valid; a missing or failed embedding only
 * means the row has no vector. findSimilar() never throws for an unavailable embedding: it
 * degrades to text search. Persistence errors and dimension mismatches propagate.
 */

import { Value } from "@sinclair/typebox/value";
import type { TaskDB } from "../backends/task-db.js";
import { TaskInputSchema, type PriorityCounts, type SimilarityMode, type TaskInput, type TaskRecord } from "../types/task.js";
import type { TaskStoreLogger } from "../types/logger.js";
import { DEDUPE_DISTANCE_THRESHOLD, DEFAULT_RECENT_LIMIT, DEFAULT_SIMILAR_LIMIT, LOG_PREFIX } from "../utils/constants.js";
import { clampLimit } from "../utils/sql.js";
import { addOperationBreadcrumb } from "./error-reporter.js";
import { buildEmbeddingText } from "./embeddings.js";
import type { SimilarityStrategy } from "./similarity.js";

export class TaskValidationError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid task: ${issues.join("; ")}`);
    this.name = "TaskValidationError";
  }
}

/** Check a candidate against TaskInputSchema; throws TaskValidationError listing every problem. */
export function validateTaskInput(task: unknown): TaskInput {
  if (Value.Check(TaskInputSchema, task)) return task;
  const issues = [...Value.Errors(TaskInputSchema, task)].map((e) => `${e.path || "/"}: ${e.message}`);
  throw new TaskValidationError(issues);
}

export class TaskStore {
  constructor(
    private readonly db: TaskDB,
    private readonly similarity: SimilarityStrategy,
    private readonly logger: TaskStoreLogger,
    /** Distance under which ingestTasks() treats a candidate as a duplicate. */
    readonly dedupeThreshold = DEDUPE_DISTANCE_THRESHOLD,
  ) {}

  /** "vector" when built with an embedding provider, otherwise "text". */
  get mode(): SimilarityMode {
    return this.similarity.mode;
  }

  /** Create tables and indexes if absent; safe to repeat. */
  ensureSchema(): void {
    this.db.ensureSchema();
  }

  async add(task: TaskInput, context?: string | null): Promise<TaskRecord> {
    const input = validateTaskInput(task);
    const emailContext = context ? context : null;
    addOperationBreadcrumb("tasks", "add");

    // Embed before touching the database: no write is held open across the network call.
    const vector = await this.similarity.prepare(buildEmbeddingText(input.name, emailContext));

    const record = this.db.insert({
      name: input.name,
      priority: input.priority,
      dueDate: input.dueDate,
      emailContext,
    });

    if (vector && (await this.similarity.register(record.id, vector))) {
      return { ...record, embedding: vector };
    }
    return record;
  }

  async findSimilar(query: string, limit = DEFAULT_SIMILAR_LIMIT): Promise<TaskRecord[]> {
    const n = clampLimit(limit);
    if (n === 0) return [];
    return this.similarity.search(query, n);
  }

  getRecent(limit = DEFAULT_RECENT_LIMIT): TaskRecord[] {
    return this.db.getRecent(limit);
  }

  getById(id: number): TaskRecord | null {
    return this.db.getById(id);
  }

  /** Remove a task and its vector. Returns false (and changes nothing) for an unknown id. */
  async delete(id: number): Promise<boolean> {
    if (!Number.isSafeInteger(id) || id < 0 || !this.db.getById(id)) return false;
    addOperationBreadcrumb("tasks", "delete");
    const deleted = this.db.delete(id);
    if (!deleted) return false;
    await this.similarity.forget(id);
    this.logger.debug?.(`${LOG_PREFIX} deleted task ${id}`);
    return true;
  }

  /**
   * Tasks have no status column, so completing a task removes it.
   * TODO: keep completed tasks in a history table instead of deleting them.
   */
  async complete(id: number): Promise<boolean> {
    return this.delete(id);
  }

  count(): number {
    return this.db.count();
  }

  countByPriority(): PriorityCounts {
    return this.db.countByPriority();
  }

  close(): void {
    this.similarity.close();
    this.db.close();
  }
}
