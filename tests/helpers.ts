/**
 * Shared test helpers: a deterministic in-process embedding provider and a stepping clock.
 */

import type { EmbeddingProvider } from "../services/embeddings.js";
import type { TaskStoreLogger } from "../types/logger.js";

/** Returns the mapped vector for known texts, a derived non-zero vector otherwise. */
export class FakeEmbeddings implements EmbeddingProvider {
  readonly model = "fake-embedding";
  readonly calls: string[] = [];
  /** While true, embed() rejects like an unreachable API. */
  failing = false;

  constructor(
    readonly dimensions: number,
    private readonly vectors: Record<string, number[]> = {},
  ) {}

  async embed(text: string): Promise<number[]> {
    this.calls.push(text);
    if (this.failing) throw new Error("embedding service unreachable");
    const mapped = this.vectors[text];
    if (mapped) return mapped;
    const vector = new Array<number>(this.dimensions).fill(1);
    for (let i = 0; i < text.length; i++) {
      vector[i % this.dimensions] += text.charCodeAt(i) % 7;
    }
    return vector;
  }
}

/** Clock that advances one second per call, starting at 2026-01-01T00:00:00Z. */
export function steppingClock(start = Date.UTC(2026, 0, 1)): () => Date {
  let t = start;
  return () => {
    const d = new Date(t);
    t += 1000;
    return d;
  };
}

export type CapturedLogger = TaskStoreLogger & { lines: { level: string; msg: string }[] };

export function captureLogger(): CapturedLogger {
  const lines: { level: string; msg: string }[] = [];
  return {
    lines,
    info: (msg) => lines.push({ level: "info", msg }),
    warn: (msg) => lines.push({ level: "warn", msg }),
    error: (msg) => lines.push({ level: "error", msg }),
    debug: (msg) => lines.push({ level: "debug", msg }),
  };
}
