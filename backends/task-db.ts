/**
 * SQLite backend for task rows.
 */

import Database from "better-sqlite3";
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import type { PriorityCounts, TaskRecord } from "../types/task.js";
import { SQLITE_BUSY_TIMEOUT_MS } from "../utils/constants.js";
import { clampLimit, escapeLike } from "../utils/sql.js";
import { schemaVersion } from "../versionInfo.js";

type TaskRow = {
  id: number;
  name: string;
  priority: number;
  due_date: string;
  created_at: string;
  email_context: string | null;
};

export type NewTaskRow = {
  name: string;
  priority: number;
  dueDate: string;
  emailContext: string | null;
};

const TASK_COLUMNS = "id, name, priority, due_date, created_at, email_context";

export class TaskDB {
  private db: Database.Database;
  private readonly dbPath: string;
  private readonly now: () => Date;

  constructor(dbPath: string, options?: { now?: () => Date }) {
    this.dbPath = dbPath;
    this.now = options?.now ?? (() => new Date());
    if (dbPath !== ":memory:") mkdirSync(dirname(dbPath), { recursive: true });
    this.db = new Database(dbPath);
    this.applyPragmas();
    this.ensureSchema();
  }

  private applyPragmas(): void {
    this.db.pragma("journal_mode = WAL");
    this.db.pragma(`busy_timeout = ${SQLITE_BUSY_TIMEOUT_MS}`);
    this.db.pragma("synchronous = NORMAL");
  }

  /** Reopen the connection if something closed it underneath us. */
  private get liveDb(): Database.Database {
    if (!this.db.open) {
      this.db = new Database(this.dbPath);
      this.applyPragmas();
    }
    return this.db;
  }

  /**
   * Create tables and indexes if absent. Idempotent and non-destructive, so several
   * processes pointed at the same file may call it concurrently.
   */
  ensureSchema(): void {
    this.liveDb.exec(`
      CREATE TABLE IF NOT EXISTS tasks (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        name TEXT NOT NULL,
        priority INTEGER NOT NULL,
        due_date TEXT NOT NULL,
        created_at TEXT NOT NULL,
        email_context TEXT
      )
    `);
    this.liveDb.exec(`
      CREATE INDEX IF NOT EXISTS idx_tasks_created ON tasks(created_at);
      CREATE TABLE IF NOT EXISTS store_meta (
        key TEXT PRIMARY KEY,
        value TEXT NOT NULL
      )
    `);
    this.liveDb
      .prepare(`INSERT OR IGNORE INTO store_meta (key, value) VALUES ('schema_version', ?)`)
      .run(String(schemaVersion));
  }

  getMeta(key: string): string | null {
    const row = this.liveDb.prepare(`SELECT value FROM store_meta WHERE key = ?`).get(key);
    if (typeof row !== "object" || row === null || !("value" in row)) return null;
    return typeof row.value === "string" ? row.value : null;
  }

  private rows(sql: string, ...params: unknown[]): TaskRecord[] {
    const rows: TaskRow[] = this.liveDb.prepare<unknown[], TaskRow>(sql).all(...params);
    return rows.map(rowToRecord);
  }

  /** Insert a task. id and created_at are assigned here. */
  insert(task: NewTaskRow): TaskRecord {
    const createdAt = this.now().toISOString();
    const result = this.liveDb
      .prepare(
        `INSERT INTO tasks (name, priority, due_date, created_at, email_context) VALUES (?, ?, ?, ?, ?)`,
      )
      .run(task.name, task.priority, task.dueDate, createdAt, task.emailContext);
    return {
      id: Number(result.lastInsertRowid),
      name: task.name,
      priority: task.priority,
      dueDate: task.dueDate,
      createdAt,
      emailContext: task.emailContext,
    };
  }

  getById(id: number): TaskRecord | null {
    return this.rows(`SELECT ${TASK_COLUMNS} FROM tasks WHERE id = ?`, id)[0] ?? null;
  }

  /** Fetch several rows, preserving the order of `ids`. Unknown ids are dropped. */
  getByIds(ids: number[]): TaskRecord[] {
    if (ids.length === 0) return [];
    const placeholders = ids.map(() => "?").join(", ");
    const byId = new Map(
      this.rows(`SELECT ${TASK_COLUMNS} FROM tasks WHERE id IN (${placeholders})`, ...ids).map((r) => [r.id, r]),
    );
    return ids.flatMap((id) => {
      const record = byId.get(id);
      return record ? [record] : [];
    });
  }

  /** Newest first; ties on created_at go to the higher id. */
  getRecent(limit: number): TaskRecord[] {
    const n = clampLimit(limit);
    if (n === 0) return [];
    return this.rows(`SELECT ${TASK_COLUMNS} FROM tasks ORDER BY created_at DESC, id DESC LIMIT ?`, n);
  }

  /**
   * Case-insensitive substring match on name (SQLite LIKE: ASCII letters only fold case),
   * newest first. Wildcards in the query are matched literally.
   */
  searchByName(query: string, limit: number): TaskRecord[] {
    const n = clampLimit(limit);
    if (n === 0) return [];
    return this.rows(
      `SELECT ${TASK_COLUMNS} FROM tasks
       WHERE name LIKE ? ESCAPE '\\'
       ORDER BY created_at DESC, id DESC
       LIMIT ?`,
      `%${escapeLike(query)}%`,
      n,
    );
  }

  delete(id: number): boolean {
    const result = this.liveDb.prepare(`DELETE FROM tasks WHERE id = ?`).run(id);
    return result.changes > 0;
  }

  count(): number {
    const row = this.liveDb.prepare<[], { n: number }>(`SELECT COUNT(*) AS n FROM tasks`).get();
    return row?.n ?? 0;
  }

  countByPriority(): PriorityCounts {
    const rows = this.liveDb
      .prepare<[], { priority: number; n: number }>(`SELECT priority, COUNT(*) AS n FROM tasks GROUP BY priority`)
      .all();
    const counts: PriorityCounts = { total: 0, high: 0, medium: 0, low: 0, unknown: 0 };
    for (const { priority, n } of rows) {
      counts.total += n;
      if (priority === 1) counts.high += n;
      else if (priority === 2) counts.medium += n;
      else if (priority === 3) counts.low += n;
      else counts.unknown += n;
    }
    return counts;
  }

  close(): void {
    if (this.db.open) this.db.close();
  }
}

function rowToRecord(row: TaskRow): TaskRecord {
  return {
    id: row.id,
    name: row.name,
    priority: row.priority,
    dueDate: row.due_date,
    createdAt: row.created_at,
    emailContext: row.email_context,
  };
}
