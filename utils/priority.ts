/**
 * Priority labels for display. The store accepts any integer; only 1-3 have a name.
 */

export const PRIORITY_LABELS: Readonly<Record<number, string>> = {
  1: "high",
  2: "medium",
  3: "low",
};

export function priorityLabel(priority: number): string {
  return PRIORITY_LABELS[priority] ?? "unknown";
}
