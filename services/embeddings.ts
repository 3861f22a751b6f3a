/**
 * Embedding service: OpenAI implementation and the outcome wrapper the store uses.
 * Providers throw on failure; tryEmbed() turns that into an outcome so callers can degrade.
 * No retries here: retry policy belongs to whoever owns the call site.
 */

import OpenAI from "openai";
import { createHash } from "node:crypto";
import { captureStoreError, toError } from "./error-reporter.js";
import { EMBEDDING_CACHE_MAX, LOG_PREFIX } from "../utils/constants.js";
import type { TaskStoreLogger } from "../types/logger.js";

/** Interface for embedding providers (enables swapping OpenAI for other backends). */
export interface EmbeddingProvider {
  readonly model: string;
  /** Length of every vector this provider returns. Fixed for the provider's lifetime. */
  readonly dimensions: number;
  embed(text: string): Promise<number[]>;
}

export type EmbedOutcome =
  | { status: "ok"; vector: number[] }
  | { status: "unavailable" }
  | { status: "failed"; error: Error };

/** The slice of the OpenAI client this module calls. */
export type EmbeddingsClient = {
  embeddings: {
    create(body: { model: string; input: string; dimensions?: number }): Promise<{ data: Array<{ embedding: number[] }> }>;
  };
};

export type EmbeddingsOptions = {
  /** Ordered preference list; on failure the next model is tried. All must share one dimension. */
  models: string | string[];
  dimensions: number;
  /** Send `dimensions` with each request (text-embedding-3-* models only). */
  requestDimensions?: boolean;
  cacheSize?: number;
};

function hashText(text: string): string {
  return createHash("sha256").update(text, "utf-8").digest("hex");
}

/** OpenAI-based embedding provider with an in-memory LRU cache keyed by text hash. */
export class Embeddings implements EmbeddingProvider {
  private readonly client: EmbeddingsClient;
  private readonly cache = new Map<string, number[]>();
  private readonly models: string[];
  private readonly cacheSize: number;
  private readonly requestDimensions: boolean;
  readonly dimensions: number;

  constructor(clientOrApiKey: EmbeddingsClient | string, options: EmbeddingsOptions) {
    this.client = typeof clientOrApiKey === "string"
      ? new OpenAI({ apiKey: clientOrApiKey })
      : clientOrApiKey;
    this.models = Array.isArray(options.models) ? options.models : [options.models];
    if (this.models.length === 0) throw new Error("Embeddings requires at least one model");
    this.dimensions = options.dimensions;
    this.requestDimensions = options.requestDimensions ?? false;
    this.cacheSize = options.cacheSize ?? EMBEDDING_CACHE_MAX;
  }

  get model(): string {
    return this.models[0];
  }

  async embed(text: string): Promise<number[]> {
    const cacheKey = hashText(text);
    const cached = this.cache.get(cacheKey);
    if (cached !== undefined) {
      this.cache.delete(cacheKey);
      this.cache.set(cacheKey, cached);
      return cached;
    }

    let lastErr: Error | undefined;
    for (const model of this.models) {
      try {
        const resp = await this.client.embeddings.create({
          model,
          input: text,
          ...(this.requestDimensions ? { dimensions: this.dimensions } : {}),
        });
        const vector = resp.data[0]?.embedding;
        if (!vector) throw new Error(`Embeddings: empty response from ${model}`);
        this.remember(cacheKey, vector);
        return vector;
      } catch (err) {
        lastErr = toError(err);
      }
    }
    throw lastErr ?? new Error("Embeddings: no model available");
  }

  private remember(key: string, vector: number[]): void {
    if (this.cacheSize <= 0) return;
    if (this.cache.size >= this.cacheSize) {
      const firstKey = this.cache.keys().next().value;
      if (firstKey !== undefined) this.cache.delete(firstKey);
    }
    this.cache.set(key, vector);
  }
}

/** Text sent to the provider: the task name, enriched with its source context when present. */
export function buildEmbeddingText(name: string, context?: string | null): string {
  return context ? `${name} Context: ${context}` : name;
}

/**
 * Embed with error handling. A null provider means embeddings are not configured
 * (an expected state); a thrown error is a transient failure for this call only.
 */
export async function tryEmbed(
  provider: EmbeddingProvider | null,
  text: string,
  logger?: TaskStoreLogger,
): Promise<EmbedOutcome> {
  if (!provider) return { status: "unavailable" };
  try {
    return { status: "ok", vector: await provider.embed(text) };
  } catch (err) {
    const error = toError(err);
    captureStoreError(error, { operation: "embed", subsystem: "embeddings", severity: "warning" });
    logger?.warn(`${LOG_PREFIX} embedding failed: ${error.message}`);
    return { status: "failed", error };
  }
}
