/**
 * LanceDB vector index: one row per embedded task, keyed by the SQLite task id.
 * Cosine distance, nearest first. The table's vector width is the store's embedding dimension.
 */

import * as lancedb from "@lancedb/lancedb";
import { captureStoreError } from "../services/error-reporter.js";
import { LOG_PREFIX } from "../utils/constants.js";
import { clampLimit } from "../utils/sql.js";

const LANCE_TABLE = "task_vectors";
/** Placeholder row used to fix the table schema on creation; deleted right after. */
const SCHEMA_SEED_ID = -1;

export type VectorIndexLogger = { warn: (msg: string) => void };

export type VectorHit = { id: number; distance: number };

/**
 * The index was opened, or queried, with vectors of a different length than it was built for.
 * Raised instead of returning empty results: the store was reopened with an incompatible model.
 */
export class DimensionMismatchError extends Error {
  constructor(
    readonly expected: number,
    readonly actual: number,
    readonly where: "query" | "insert" | "table",
  ) {
    super(
      where === "table"
        ? `vector dimension mismatch: existing index has dim=${actual} but the embedding provider is configured for dim=${expected}`
        : `vector dimension mismatch: ${where} vector has dim=${actual}, index expects dim=${expected}`,
    );
    this.name = "DimensionMismatchError";
  }
}

/** Width of the `vector` column, or null if the schema has none. */
function vectorWidth(schema: { fields: ReadonlyArray<{ name: string; type: unknown }> }): number | null {
  const field = schema.fields.find((f) => f.name === "vector");
  const type = field?.type;
  if (typeof type === "object" && type !== null && "listSize" in type && typeof type.listSize === "number") {
    return type.listSize;
  }
  return null;
}

function assertTaskId(id: number): void {
  if (!Number.isSafeInteger(id) || id < 0) throw new Error(`Invalid task id: ${id}`);
}

export class VectorIndex {
  private db: lancedb.Connection | null = null;
  private table: lancedb.Table | null = null;
  private initPromise: Promise<void> | null = null;
  private closed = false;
  /** Width of the existing table when it differs from vectorDim; every operation then fails. */
  private mismatchedWidth: number | null = null;
  private logger: VectorIndexLogger | null = null;

  constructor(
    private readonly dbPath: string,
    readonly vectorDim: number,
  ) {}

  setLogger(logger: VectorIndexLogger): void {
    this.logger = logger;
  }

  private logWarn(msg: string): void {
    if (this.logger) this.logger.warn(msg);
    else console.warn(msg);
  }

  private async ensureInitialized(): Promise<void> {
    if (this.initPromise) {
      try {
        await this.initPromise;
      } catch {
        // the failed init already cleared initPromise; retry below
      }
    }
    if (this.closed) {
      this.closed = false;
      this.table = null;
      this.initPromise = null;
    }
    if (this.table) return;
    if (this.initPromise) return this.initPromise;
    this.initPromise = this.doInitialize().catch((err: unknown) => {
      captureStoreError(err, { operation: "vector-index-init", subsystem: "vector" });
      this.initPromise = null;
      throw err;
    });
    return this.initPromise;
  }

  private async doInitialize(): Promise<void> {
    const db = await lancedb.connect(this.dbPath);
    this.db = db;
    const tables = await db.tableNames();

    let table: lancedb.Table;
    if (tables.includes(LANCE_TABLE)) {
      table = await db.openTable(LANCE_TABLE);
    } else {
      try {
        table = await db.createTable(LANCE_TABLE, [
          { id: SCHEMA_SEED_ID, vector: new Array<number>(this.vectorDim).fill(0) },
        ]);
        await table.delete(`id = ${SCHEMA_SEED_ID}`);
      } catch (err) {
        // Another process may have created the table between tableNames() and createTable().
        if (!(await db.tableNames()).includes(LANCE_TABLE)) throw err;
        table = await db.openTable(LANCE_TABLE);
      }
    }

    const width = vectorWidth(await table.schema());
    if (width !== null && width !== this.vectorDim) {
      this.mismatchedWidth = width;
      this.logWarn(
        `${LOG_PREFIX} vector dimension mismatch: index at ${this.dbPath} has dim=${width}, provider expects dim=${this.vectorDim}`,
      );
    } else {
      this.mismatchedWidth = null;
    }
    this.table = table;
  }

  private getTable(): lancedb.Table {
    if (!this.table) {
      throw new Error("VectorIndex not initialized. Call ensureInitialized() first or check if close() was called.");
    }
    return this.table;
  }

  /**
   * Open the index and verify the stored width matches the configured dimension.
   * Throws DimensionMismatchError when it does not.
   */
  async assertCompatible(): Promise<void> {
    await this.ensureInitialized();
    if (this.mismatchedWidth !== null) {
      throw new DimensionMismatchError(this.vectorDim, this.mismatchedWidth, "table");
    }
  }

  private checkLength(vector: number[], where: "query" | "insert"): void {
    if (vector.length !== this.vectorDim) {
      throw new DimensionMismatchError(this.vectorDim, vector.length, where);
    }
  }

  /** Append one vector for a task. */
  async add(id: number, vector: number[]): Promise<void> {
    assertTaskId(id);
    this.checkLength(vector, "insert");
    await this.assertCompatible();
    try {
      await this.getTable().add([{ id, vector }]);
    } catch (err) {
      captureStoreError(err, { operation: "vector-add", subsystem: "vector" });
      this.logWarn(`${LOG_PREFIX} LanceDB add failed: ${String(err)}`);
      throw err;
    }
  }

  /** k nearest stored vectors by cosine distance, closest first. Empty when nothing is stored. */
  async topK(vector: number[], k: number): Promise<VectorHit[]> {
    this.checkLength(vector, "query");
    await this.assertCompatible();
    const limit = clampLimit(k);
    if (limit === 0) return [];
    const rows: unknown[] = await this.getTable()
      .vectorSearch(vector)
      .distanceType("cosine")
      .limit(limit)
      .toArray();

    const hits: VectorHit[] = [];
    for (const row of rows) {
      if (typeof row !== "object" || row === null) continue;
      const id = "id" in row ? Number(row.id) : NaN;
      const distance = "_distance" in row ? Number(row._distance) : NaN;
      if (!Number.isSafeInteger(id) || id === SCHEMA_SEED_ID || Number.isNaN(distance)) continue;
      hits.push({ id, distance });
    }
    return hits.sort((a, b) => a.distance - b.distance);
  }

  async delete(id: number): Promise<void> {
    assertTaskId(id);
    await this.ensureInitialized();
    try {
      await this.getTable().delete(`id = ${id}`);
    } catch (err) {
      captureStoreError(err, { operation: "vector-delete", subsystem: "vector" });
      this.logWarn(`${LOG_PREFIX} LanceDB delete failed: ${String(err)}`);
      throw err;
    }
  }

  async count(): Promise<number> {
    await this.ensureInitialized();
    return this.getTable().countRows();
  }

  /** Close the connection; the next operation reconnects. */
  close(): void {
    this.closed = true;
    this.table = null;
    if (this.db) {
      try {
        this.db.close();
      } catch (err) {
        this.logWarn(`${LOG_PREFIX} LanceDB close failed: ${String(err)}`);
      }
    }
    this.db = null;
  }
}
