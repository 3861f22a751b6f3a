import { dirname, join, basename, extname } from "node:path";
import type { ErrorReporterConfig } from "./services/error-reporter.js";
import { DEDUPE_DISTANCE_THRESHOLD } from "./utils/constants.js";

export const EMBEDDING_PROVIDERS = ["openai", "deepseek"] as const;
export type EmbeddingProviderName = (typeof EMBEDDING_PROVIDERS)[number];

export type EmbeddingConfig = {
  /** Requested provider. DeepSeek has no embedding models, so it resolves to OpenAI when a key exists. */
  provider: EmbeddingProviderName;
  model: string;
  dimensions: number;
  /** null = embeddings unavailable; the store runs on text search only. */
  apiKey: string | null;
  baseURL?: string;
};

export type TaskStoreConfig = {
  dbPath: string;
  vectorPath: string;
  embedding: EmbeddingConfig;
  dedupeThreshold: number;
  errorReporting: ErrorReporterConfig;
  /** Informational messages produced while resolving the config (e.g. why embeddings are off). */
  notices: string[];
};

export const DEFAULT_DB_PATH = "tasks.db";
const DEFAULT_MODEL = "text-embedding-3-small";

const EMBEDDING_DIMENSIONS: Record<string, number> = {
  "text-embedding-3-small": 1536,
  "text-embedding-3-large": 3072,
  "text-embedding-ada-002": 1536,
};

/** Models that accept a reduced `dimensions` request parameter. */
const SHORTENABLE_MODELS = new Set(["text-embedding-3-small", "text-embedding-3-large"]);

const PLACEHOLDER_KEYS = new Set(["YOUR_OPENAI_API_KEY", "<OPENAI_API_KEY>", "sk-..."]);

export function vectorDimsForModel(model: string): number {
  const dims = EMBEDDING_DIMENSIONS[model];
  if (!dims) throw new Error(`Unsupported embedding model: ${model}`);
  return dims;
}

export function supportsDimensionOverride(model: string): boolean {
  return SHORTENABLE_MODELS.has(model);
}

/** LanceDB directory beside the SQLite file: tasks.db -> tasks.lance */
export function defaultVectorPath(dbPath: string): string {
  const ext = extname(dbPath);
  const stem = ext ? basename(dbPath, ext) : basename(dbPath);
  return join(dirname(dbPath), `${stem}.lance`);
}

const ENV_REF = /\$\{([^}]+)\}/g;

/** Substitute ${VAR} references, or report the first one that is unset. */
function resolveEnvVars(value: string, env: NodeJS.ProcessEnv): { value: string } | { unset: string } {
  for (const [, name] of value.matchAll(ENV_REF)) {
    if (!env[name]) return { unset: name };
  }
  return { value: value.replace(ENV_REF, (_, name: string) => env[name] ?? "") };
}

function asRecord(value: unknown): Record<string, unknown> | undefined {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return undefined;
  return Object.fromEntries(Object.entries(value));
}

function usableKey(raw: unknown, env: NodeJS.ProcessEnv, notices: string[]): string | null {
  if (typeof raw !== "string") return null;
  const resolved = resolveEnvVars(raw.trim(), env);
  if ("unset" in resolved) {
    notices.push(`embedding.apiKey refers to \${${resolved.unset}}, which is not set`);
    return null;
  }
  const key = resolved.value;
  if (key.length < 10 || PLACEHOLDER_KEYS.has(key)) return null;
  return key;
}

function parseEmbedding(raw: Record<string, unknown> | undefined, env: NodeJS.ProcessEnv, notices: string[]): EmbeddingConfig {
  const providerRaw = typeof raw?.provider === "string" ? raw.provider.toLowerCase() : "openai";
  const provider = EMBEDDING_PROVIDERS.find((p) => p === providerRaw);
  if (!provider) {
    throw new Error(`embedding.provider must be one of ${EMBEDDING_PROVIDERS.join(", ")} (got '${providerRaw}')`);
  }

  const model = typeof raw?.model === "string" && raw.model.trim() ? raw.model.trim() : DEFAULT_MODEL;
  const nativeDims = vectorDimsForModel(model);
  let dimensions = nativeDims;
  const d = raw?.dimensions;
  if (d !== undefined) {
    if (typeof d !== "number" || !Number.isInteger(d) || d <= 0 || d > nativeDims) {
      throw new Error(`embedding.dimensions must be an integer between 1 and ${nativeDims} for ${model}`);
    }
    if (d !== nativeDims && !supportsDimensionOverride(model)) {
      throw new Error(`embedding.dimensions cannot be changed for ${model}`);
    }
    dimensions = d;
  }

  const apiKey = usableKey(raw?.apiKey, env, notices);
  if (provider === "deepseek") {
    notices.push(
      apiKey
        ? "DeepSeek has no embedding models; using OpenAI for embeddings"
        : "DeepSeek has no embedding models and no OpenAI key is set; duplicate detection will use text matching",
    );
  } else if (!apiKey) {
    notices.push("no embedding API key configured; duplicate detection will use text matching instead of semantic similarity");
  }

  const baseURL = typeof raw?.baseURL === "string" && raw.baseURL.trim() ? raw.baseURL.trim() : undefined;
  return { provider, model, dimensions, apiKey, ...(baseURL ? { baseURL } : {}) };
}

function parseErrorReporting(raw: Record<string, unknown> | undefined): ErrorReporterConfig {
  const sampleRate =
    typeof raw?.sampleRate === "number" && raw.sampleRate >= 0 && raw.sampleRate <= 1 ? raw.sampleRate : 1.0;
  return {
    enabled: raw?.enabled === true,
    consent: raw?.consent === true,
    dsn: typeof raw?.dsn === "string" && raw.dsn ? raw.dsn : undefined,
    environment: typeof raw?.environment === "string" ? raw.environment : undefined,
    sampleRate,
  };
}

export const taskStoreConfigSchema = {
  parse(value: unknown, env: NodeJS.ProcessEnv = process.env): TaskStoreConfig {
    const cfg: Record<string, unknown> | undefined = value === undefined ? {} : asRecord(value);
    if (!cfg) throw new Error("task store config must be an object");
    const notices: string[] = [];

    const dbPath = typeof cfg.dbPath === "string" && cfg.dbPath.trim() ? cfg.dbPath.trim() : DEFAULT_DB_PATH;
    const vectorPath =
      typeof cfg.vectorPath === "string" && cfg.vectorPath.trim() ? cfg.vectorPath.trim() : defaultVectorPath(dbPath);

    let dedupeThreshold = DEDUPE_DISTANCE_THRESHOLD;
    if (cfg.dedupeThreshold !== undefined) {
      const t = cfg.dedupeThreshold;
      if (typeof t !== "number" || !(t >= 0 && t <= 2)) {
        throw new Error("dedupeThreshold must be a cosine distance between 0 and 2");
      }
      dedupeThreshold = t;
    }

    return {
      dbPath,
      vectorPath,
      embedding: parseEmbedding(asRecord(cfg.embedding), env, notices),
      dedupeThreshold,
      errorReporting: parseErrorReporting(asRecord(cfg.errorReporting)),
      notices,
    };
  },
};

function envNumber(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name]?.trim();
  if (!raw) return undefined;
  const n = Number(raw);
  if (Number.isNaN(n)) throw new Error(`${name} must be a number (got '${raw}')`);
  return n;
}

/**
 * Build raw config from environment variables.
 * EMBEDDING_PROVIDER wins; otherwise LLM_PROVIDER=deepseek selects deepseek, else openai.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): TaskStoreConfig {
  const explicit = env.EMBEDDING_PROVIDER?.trim().toLowerCase();
  const llm = env.LLM_PROVIDER?.trim().toLowerCase();
  const provider = explicit || (llm === "deepseek" ? "deepseek" : "openai");
  const flag = env.TASK_STORE_ERROR_REPORTING?.trim().toLowerCase();
  const reporting = flag === "1" || flag === "true";

  return taskStoreConfigSchema.parse(
    {
      dbPath: env.DATABASE_PATH,
      vectorPath: env.VECTOR_PATH,
      embedding: {
        provider,
        model: env.EMBEDDING_MODEL,
        dimensions: envNumber(env, "EMBEDDING_DIMENSIONS"),
        apiKey: env.OPENAI_API_KEY,
        baseURL: env.OPENAI_BASE_URL,
      },
      dedupeThreshold: envNumber(env, "DEDUPE_THRESHOLD"),
      errorReporting: {
        enabled: reporting,
        consent: reporting,
        dsn: env.TASK_STORE_SENTRY_DSN,
        environment: env.NODE_ENV,
      },
    },
    env,
  );
}
