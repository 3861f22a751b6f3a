import { MAX_QUERY_LIMIT } from "./constants.js";

/** Escape LIKE wildcards so the query matches as a literal substring (use with ESCAPE '\'). */
export function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}

/** Whole-number LIMIT in [0, MAX_QUERY_LIMIT]. NaN and values below 1 give 0; Infinity gives the cap. */
export function clampLimit(limit: number): number {
  if (Number.isNaN(limit) || limit < 1) return 0;
  return Math.min(Math.floor(limit), MAX_QUERY_LIMIT);
}
