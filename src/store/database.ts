/**
 * SQLite via sql.js
 *
 * sql.js is SQLite compiled to WebAssembly, so the whole database lives in
 * memory. A database opened with a filename is loaded from that file and
 * written back by `persist()`.
 *
 * The statement API mirrors the prepare/bind/first/all/run style of the
 * worker database bindings so query code reads the same on either host.
 */

import initSqlJs from 'sql.js';
import type { Database as SqlJsDatabase, SqlJsStatic, SqlValue } from 'sql.js';
import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { dirname } from 'path';

export type Row = Record<string, SqlValue>;

export interface RunResult {
  changes: number;
  lastRowId: number;
}

let sqlJs: Promise<SqlJsStatic> | null = null;

function loadSqlJs(): Promise<SqlJsStatic> {
  if (!sqlJs) {
    sqlJs = initSqlJs();
  }
  return sqlJs;
}

export class PreparedStatement {
  constructor(
    private readonly db: Database,
    private readonly sql: string,
    private readonly params: SqlValue[] = []
  ) {}

  bind(...values: SqlValue[]): PreparedStatement {
    return new PreparedStatement(this.db, this.sql, values);
  }

  async first(): Promise<Row | null> {
    const rows = await this.all();
    return rows[0] ?? null;
  }

  async all(): Promise<Row[]> {
    const stmt = this.db.raw.prepare(this.sql);
    try {
      stmt.bind(this.params);
      const rows: Row[] = [];
      while (stmt.step()) {
        rows.push(stmt.getAsObject());
      }
      return rows;
    } finally {
      stmt.free();
    }
  }

  async run(): Promise<RunResult> {
    this.db.raw.run(this.sql, this.params);
    const changes = this.db.raw.getRowsModified();
    const idRow = this.db.raw.exec('SELECT last_insert_rowid() AS id');
    const lastRowId = idRow[0]?.values[0]?.[0];
    return { changes, lastRowId: typeof lastRowId === 'number' ? lastRowId : 0 };
  }
}

export class Database {
  private constructor(
    readonly raw: SqlJsDatabase,
    readonly filename: string | null
  ) {}

  /**
   * Open a database. Without a filename (or with ':memory:') it is purely
   * in-memory; otherwise an existing file is loaded.
   */
  static async open(filename?: string | null): Promise<Database> {
    const SQL = await loadSqlJs();
    const path = filename && filename !== ':memory:' ? filename : null;

    const raw = path && existsSync(path)
      ? new SQL.Database(readFileSync(path))
      : new SQL.Database();

    const db = new Database(raw, path);
    db.enableForeignKeys();
    return db;
  }

  prepare(sql: string): PreparedStatement {
    return new PreparedStatement(this, sql);
  }

  exec(sql: string): void {
    this.raw.exec(sql);
  }

  /**
   * Write the database to its file. No-op for in-memory databases.
   */
  persist(): void {
    if (!this.filename) return;

    mkdirSync(dirname(this.filename), { recursive: true });
    writeFileSync(this.filename, Buffer.from(this.raw.export()));
    // export() reopens the connection, which drops connection pragmas
    this.enableForeignKeys();
  }

  close(): void {
    this.raw.close();
  }

  private enableForeignKeys(): void {
    this.raw.run('PRAGMA foreign_keys = ON');
  }
}

export function readNumber(row: Row, column: string): number {
  const value = row[column];
  if (typeof value !== 'number') {
    throw new Error(`Column ${column} is not a number`);
  }
  return value;
}

export function readNullableNumber(row: Row, column: string): number | null {
  return row[column] === null ? null : readNumber(row, column);
}

export function readString(row: Row, column: string): string {
  const value = row[column];
  if (typeof value !== 'string') {
    throw new Error(`Column ${column} is not text`);
  }
  return value;
}

export function readNullableString(row: Row, column: string): string | null {
  return row[column] === null ? null : readString(row, column);
}
