/**
 * Duplicate check applied before inserting a candidate task.
 *
 * Only an explicit distance below the threshold suppresses a candidate. Text-search results
 * carry no distance, so while embeddings are unavailable nothing is ever suppressed.
 */

import type { TaskInput, TaskRecord } from "../types/task.js";
import type { TaskStoreLogger } from "../types/logger.js";
import { DEDUPE_DISTANCE_THRESHOLD, LOG_PREFIX } from "../utils/constants.js";
import type { TaskStore } from "./task-store.js";

export type DuplicateCheck = { duplicate: true; match: TaskRecord } | { duplicate: false };

export type IngestCandidate = TaskInput & { context?: string | null };

export type IngestResult = {
  saved: TaskRecord[];
  skipped: Array<{ task: IngestCandidate; match: TaskRecord }>;
};

/** True when the nearest result has a numeric distance under the threshold. */
export function isDuplicate(results: TaskRecord[], threshold = DEDUPE_DISTANCE_THRESHOLD): boolean {
  const distance = results[0]?.similarityDistance;
  return distance !== undefined && distance < threshold;
}

export async function checkDuplicate(
  store: Pick<TaskStore, "findSimilar">,
  name: string,
  threshold = DEDUPE_DISTANCE_THRESHOLD,
): Promise<DuplicateCheck> {
  const results = await store.findSimilar(name, 1);
  const match = results[0];
  if (match && isDuplicate(results, threshold)) return { duplicate: true, match };
  return { duplicate: false };
}

/**
 * Store each candidate unless it duplicates an existing task. The threshold defaults to the
 * store's configured one. Candidates are processed in order, so a later candidate can be
 * skipped as a duplicate of an earlier one from the same batch.
 */
export async function ingestTasks(
  store: Pick<TaskStore, "findSimilar" | "add"> & { dedupeThreshold?: number },
  candidates: IngestCandidate[],
  options: { threshold?: number; logger?: TaskStoreLogger } = {},
): Promise<IngestResult> {
  const threshold = options.threshold ?? store.dedupeThreshold ?? DEDUPE_DISTANCE_THRESHOLD;
  const result: IngestResult = { saved: [], skipped: [] };

  for (const candidate of candidates) {
    const check = await checkDuplicate(store, candidate.name, threshold);
    if (check.duplicate) {
      result.skipped.push({ task: candidate, match: check.match });
      continue;
    }
    const { context, ...task } = candidate;
    result.saved.push(await store.add(task, context));
  }

  if (options.logger) {
    options.logger.info(`${LOG_PREFIX} ingested ${candidates.length} task(s): ${result.saved.length} saved, ${result.skipped.length} skipped as duplicates`);
    for (const { task, match } of result.skipped) {
      options.logger.info(`${LOG_PREFIX}   duplicate: "${task.name}" ~ #${match.id} "${match.name}"`);
    }
  }
  return result;
}
