import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import {
  _testing,
  createTaskStore,
  DimensionMismatchError,
  TaskValidationError,
  taskStoreConfigSchema,
  type TaskStore,
  type TaskStoreConfig,
} from "../index.js";
import { captureLogger, FakeEmbeddings, steppingClock, type CapturedLogger } from "./helpers.js";

const VECTORS: Record<string, number[]> = {
  "Pay rent": [1, 0, 0],
  "Book flights": [0, 1, 0],
  "Renew passport": [0, 0, 1],
};

let tmpDir: string;
let cfg: TaskStoreConfig;
let logger: CapturedLogger;
const opened: TaskStore[] = [];

function open(embeddings: FakeEmbeddings | null): TaskStore {
  const store = createTaskStore(cfg, { embeddings, logger, now: steppingClock() });
  opened.push(store);
  return store;
}

beforeEach(() => {
  tmpDir = mkdtempSync(join(tmpdir(), "task-store-test-"));
  cfg = taskStoreConfigSchema.parse({ dbPath: join(tmpDir, "tasks.db") }, {});
  logger = captureLogger();
});

afterEach(() => {
  vi.restoreAllMocks();
  for (const store of opened.splice(0)) store.close();
  rmSync(tmpDir, { recursive: true, force: true });
});

describe("createTaskStore", () => {
  it("runs in vector mode with an embedding provider", () => {
    const store = open(new FakeEmbeddings(3, VECTORS));
    expect(store.mode).toBe("vector");
    expect(logger.lines.map((l) => l.msg)).toEqual([
      "task-store: no embedding API key configured; duplicate detection will use text matching instead of semantic similarity",
      "task-store: semantic search enabled (fake-embedding, dim=3)",
    ]);
  });

  it("runs in text mode without one", () => {
    const store = open(null);
    expect(store.mode).toBe("text");
    expect(logger.lines.at(-1)?.msg).toBe(`task-store: semantic search unavailable; using text search (${cfg.dbPath})`);
  });
});

describe("TaskStore.add", () => {
  it("persists the row and returns it with its embedding", async () => {
    const store = open(new FakeEmbeddings(3, VECTORS));
    const saved = await store.add({ name: "Pay rent", priority: 1, dueDate: "2026-02-01" });
    expect(saved).toEqual({
      id: 1,
      name: "Pay rent",
      priority: 1,
      dueDate: "2026-02-01",
      createdAt: "2026-01-01T00:00:00.000Z",
      emailContext: null,
      embedding: [1, 0, 0],
    });
    expect(store.getById(1)).toEqual({
      id: 1,
      name: "Pay rent",
      priority: 1,
      dueDate: "2026-02-01",
      createdAt: "2026-01-01T00:00:00.000Z",
      emailContext: null,
    });
  });

  it("ignores a caller-supplied createdAt", async () => {
    const store = open(null);
    const saved = await store.add({ name: "Pay rent", priority: 1, dueDate: "2026-02-01", createdAt: "1999-01-01T00:00:00Z" });
    expect(saved.createdAt).toBe("2026-01-01T00:00:00.000Z");
  });

  it("embeds the name together with the source context", async () => {
    const fake = new FakeEmbeddings(3, VECTORS);
    const store = open(fake);
    const saved = await store.add({ name: "Call Ann", priority: 2, dueDate: "2026-02-03" }, "from standup");
    expect(fake.calls).toEqual(["Call Ann Context: from standup"]);
    expect(saved.emailContext).toBe("from standup");
  });

  it("returns no embedding in text mode", async () => {
    const store = open(null);
    const saved = await store.add({ name: "Pay rent", priority: 1, dueDate: "2026-02-01" });
    expect(saved).not.toHaveProperty("embedding");
  });

  it("rejects invalid input without writing anything", async () => {
    const fake = new FakeEmbeddings(3, VECTORS);
    const store = open(fake);
    await expect(store.add({ name: "   ", priority: 1, dueDate: "2026-02-01" })).rejects.toBeInstanceOf(TaskValidationError);
    await expect(store.add({ name: "Pay rent", priority: 1.5, dueDate: "2026-02-01" })).rejects.toThrow(/^Invalid task: \/priority/);
    expect(store.count()).toBe(0);
    expect(fake.calls).toEqual([]);
  });

  it("stores the row without a vector when the index cannot be opened", async () => {
    const store = open(new FakeEmbeddings(3, VECTORS));
    vi.spyOn(_testing.VectorIndex.prototype, "assertCompatible").mockRejectedValueOnce(new Error("lance io error"));

    const saved = await store.add({ name: "Pay rent", priority: 1, dueDate: "2026-02-01" });
    expect(saved).not.toHaveProperty("embedding");
    expect(store.count()).toBe(1);
    expect(logger.lines).toContainEqual({
      level: "warn",
      msg: "task-store: vector index unavailable, storing task without a vector: lance io error",
    });
  });

  it("keeps writing and reading when the vector path is not a directory", async () => {
    const blocker = join(tmpDir, "not-a-dir.lance");
    writeFileSync(blocker, "occupied");
    cfg = { ...cfg, vectorPath: blocker };
    const store = open(new FakeEmbeddings(3, VECTORS));

    const saved = await store.add({ name: "Pay rent", priority: 1, dueDate: "2026-02-01" });
    expect(saved).not.toHaveProperty("embedding");
    expect(store.count()).toBe(1);
    const found = await store.findSimilar("rent");
    expect(found.map((t) => t.name)).toEqual(["Pay rent"]);
    expect(found[0]).not.toHaveProperty("similarityDistance");
    expect(await store.delete(saved.id)).toBe(true);
    expect(store.count()).toBe(0);
  });

  it("stores the row without a vector when embedding fails", async () => {
    const fake = new FakeEmbeddings(3, VECTORS);
    const store = open(fake);
    fake.failing = true;
    const saved = await store.add({ name: "Water plants", priority: 3, dueDate: "2026-02-05" });
    expect(saved).not.toHaveProperty("embedding");
    expect(store.getById(saved.id)?.name).toBe("Water plants");
    expect(logger.lines).toContainEqual({ level: "warn", msg: "task-store: embedding failed: embedding service unreachable" });
  });
});

describe("TaskStore.findSimilar", () => {
  it("returns the exact match first with a near-zero distance", async () => {
    const store = open(new FakeEmbeddings(3, VECTORS));
    for (const name of ["Pay rent", "Book flights", "Renew passport"]) {
      await store.add({ name, priority: 2, dueDate: "2026-02-01" });
    }
    const results = await store.findSimilar("Pay rent");
    expect(results).toHaveLength(3);
    expect(results[0]?.name).toBe("Pay rent");
    expect(results[0]?.similarityDistance).toBeLessThan(1e-6);
    expect(results[1]?.similarityDistance).toBeGreaterThan(0.5);
    expect((await store.findSimilar("Pay rent", 1)).map((r) => r.name)).toEqual(["Pay rent"]);
    expect(await store.findSimilar("Pay rent", 0)).toEqual([]);
  });

  it("uses substring matching in text mode", async () => {
    const store = open(null);
    await store.add({ name: "Pay rent", priority: 1, dueDate: "2026-02-01" });
    await store.add({ name: "Book flights", priority: 2, dueDate: "2026-02-01" });
    await store.add({ name: "Ask landlord about rent increase", priority: 2, dueDate: "2026-02-01" });
    const results = await store.findSimilar("RENT");
    expect(results.map((r) => r.name)).toEqual(["Ask landlord about rent increase", "Pay rent"]);
    for (const r of results) expect(r).not.toHaveProperty("similarityDistance");
  });

  it("falls back to text search for a call whose embedding fails", async () => {
    const fake = new FakeEmbeddings(3, VECTORS);
    const store = open(fake);
    await store.add({ name: "Pay rent", priority: 1, dueDate: "2026-02-01" });
    fake.failing = true;
    await store.add({ name: "Water plants", priority: 3, dueDate: "2026-02-05" });

    const fallback = await store.findSimilar("plants");
    expect(fallback.map((r) => r.name)).toEqual(["Water plants"]);
    expect(fallback[0]).not.toHaveProperty("similarityDistance");

    fake.failing = false;
    const semantic = await store.findSimilar("Pay rent");
    expect(semantic.map((r) => r.name)).toEqual(["Pay rent"]);
    expect(semantic[0]?.similarityDistance).toBeLessThan(1e-6);
    expect(store.mode).toBe("vector");
  });

  it("falls back to text search when the vector index fails", async () => {
    const store = open(new FakeEmbeddings(3, VECTORS));
    await store.add({ name: "Pay rent", priority: 1, dueDate: "2026-02-01" });
    vi.spyOn(_testing.VectorIndex.prototype, "topK").mockRejectedValueOnce(new Error("lance io error"));

    const results = await store.findSimilar("Pay");
    expect(results.map((r) => r.name)).toEqual(["Pay rent"]);
    expect(results[0]).not.toHaveProperty("similarityDistance");
    expect(logger.lines).toContainEqual({ level: "warn", msg: "task-store: vector search failed, using text search: lance io error" });

    const next = await store.findSimilar("Pay rent");
    expect(next[0]?.similarityDistance).toBeLessThan(1e-6);
  });
});

describe("TaskStore.delete", () => {
  it("removes the row and its vector", async () => {
    const store = open(new FakeEmbeddings(3, VECTORS));
    const rent = await store.add({ name: "Pay rent", priority: 1, dueDate: "2026-02-01" });
    await store.add({ name: "Book flights", priority: 2, dueDate: "2026-02-01" });

    expect(await store.delete(rent.id)).toBe(true);
    expect(store.getById(rent.id)).toBeNull();
    expect((await store.findSimilar("Pay rent")).map((r) => r.name)).toEqual(["Book flights"]);
    expect(await store.delete(rent.id)).toBe(false);
  });

  it("removes the row even when the vector cannot be removed", async () => {
    const store = open(new FakeEmbeddings(3, VECTORS));
    const rent = await store.add({ name: "Pay rent", priority: 1, dueDate: "2026-02-01" });
    await store.add({ name: "Book flights", priority: 2, dueDate: "2026-02-01" });
    vi.spyOn(_testing.VectorIndex.prototype, "delete").mockRejectedValueOnce(new Error("lance io error"));

    expect(await store.delete(rent.id)).toBe(true);
    expect(store.getById(rent.id)).toBeNull();
    expect(logger.lines).toContainEqual({ level: "warn", msg: `task-store: vector for task ${rent.id} not removed: lance io error` });
    // the orphaned vector has no row to join to
    expect((await store.findSimilar("Pay rent")).map((r) => r.name)).toEqual(["Book flights"]);
  });

  it("returns false for unknown or invalid ids", async () => {
    const store = open(null);
    await store.add({ name: "Pay rent", priority: 1, dueDate: "2026-02-01" });
    expect(await store.delete(99)).toBe(false);
    expect(await store.delete(-1)).toBe(false);
    expect(await store.delete(1.5)).toBe(false);
    expect(store.count()).toBe(1);
  });

  it("completes a task by removing it", async () => {
    const store = open(null);
    const saved = await store.add({ name: "Pay rent", priority: 1, dueDate: "2026-02-01" });
    expect(await store.complete(saved.id)).toBe(true);
    expect(store.count()).toBe(0);
  });
});

describe("result limits", () => {
  it("treats NaN as no results and caps Infinity", async () => {
    const store = open(null);
    await store.add({ name: "Pay rent", priority: 1, dueDate: "2026-02-01" });
    await store.add({ name: "Rent a van", priority: 2, dueDate: "2026-02-01" });
    expect(await store.findSimilar("rent", Number.NaN)).toEqual([]);
    expect((await store.findSimilar("rent", Infinity)).map((t) => t.name)).toEqual(["Rent a van", "Pay rent"]);
    expect(store.getRecent(Number.NaN)).toEqual([]);
    expect(store.getRecent(Infinity)).toHaveLength(2);
  });

  it("caps Infinity on the vector path too", async () => {
    const store = open(new FakeEmbeddings(3, VECTORS));
    await store.add({ name: "Pay rent", priority: 1, dueDate: "2026-02-01" });
    expect((await store.findSimilar("Pay rent", Infinity)).map((t) => t.name)).toEqual(["Pay rent"]);
  });
});

describe("TaskStore listing", () => {
  it("lists recent tasks newest first and counts by priority", async () => {
    const store = open(null);
    await store.add({ name: "a", priority: 1, dueDate: "2026-02-01" });
    await store.add({ name: "b", priority: 3, dueDate: "2026-02-01" });
    await store.add({ name: "c", priority: 9, dueDate: "2026-02-01" });
    expect(store.getRecent().map((t) => t.name)).toEqual(["c", "b", "a"]);
    expect(store.getRecent(1).map((t) => t.name)).toEqual(["c"]);
    expect(store.countByPriority()).toEqual({ total: 3, high: 1, medium: 0, low: 1, unknown: 1 });
  });

  it("keeps tasks across reopen", async () => {
    const first = open(null);
    await first.add({ name: "Pay rent", priority: 1, dueDate: "2026-02-01" });
    first.close();
    const second = open(null);
    second.ensureSchema();
    expect(second.getRecent().map((t) => t.name)).toEqual(["Pay rent"]);
  });
});

describe("dimension mismatch", () => {
  it("fails loudly when reopened with a provider of another dimension", async () => {
    const wide = open(new FakeEmbeddings(5));
    await wide.add({ name: "Pay rent", priority: 1, dueDate: "2026-02-01" });
    wide.close();

    const narrow = open(new FakeEmbeddings(3));
    await expect(narrow.findSimilar("Pay rent")).rejects.toBeInstanceOf(DimensionMismatchError);
    await expect(narrow.add({ name: "Book flights", priority: 2, dueDate: "2026-02-01" })).rejects.toMatchObject({
      name: "DimensionMismatchError",
      expected: 3,
      actual: 5,
    });
    expect(narrow.count()).toBe(1);
  });
});
