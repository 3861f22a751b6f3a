/**
 * Shared task types used by backends, services and callers.
 */

import { Type, type Static } from "@sinclair/typebox";

/** Input accepted by TaskStore.add(). createdAt is accepted for convenience but the store's clock wins. */
export const TaskInputSchema = Type.Object({
  name: Type.String({ minLength: 1, pattern: "\\S", description: "Human description of the task" }),
  priority: Type.Integer({ description: "1 = high, 2 = medium, 3 = low (other values are stored as-is)" }),
  dueDate: Type.String({ description: "Due date, conventionally YYYY-MM-DD; stored as an opaque string" }),
  createdAt: Type.Optional(Type.String()),
});

export type TaskInput = Static<typeof TaskInputSchema>;

export type TaskRecord = {
  id: number;
  name: string;
  priority: number;
  dueDate: string;
  /** ISO-8601 timestamp assigned by the store at insert time. */
  createdAt: string;
  emailContext: string | null;
  /** Only set on the record returned by add() when an embedding was produced. */
  embedding?: number[];
  /** Cosine distance to the query. Only set on results of a vector search. */
  similarityDistance?: number;
};

export type PriorityCounts = {
  total: number;
  high: number;
  medium: number;
  low: number;
  unknown: number;
};

/** Which similarity strategy a store instance was built with. */
export type SimilarityMode = "vector" | "text";
