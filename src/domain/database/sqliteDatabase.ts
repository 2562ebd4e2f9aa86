/**
 * SqliteDatabase - DatabaseCapability backed by better-sqlite3
 *
 * Driver exceptions are caught at this boundary and returned as failed
 * {@link DbResult}s carrying the driver's message.
 */

import { mkdirSync } from 'node:fs';
import path from 'node:path';

import Database from 'better-sqlite3';

import { BOOKKEEPING_TABLE } from './bookkeeping.js';
import {
  fail,
  ok,
  type DbResult,
  type InspectableDatabase,
  type ScalarValue,
  type SchemaSnapshot,
} from './capability.js';

export const IN_MEMORY = ':memory:';

export class SqliteDatabase implements InspectableDatabase {
  private readonly db: Database.Database;
  private readonly filename: string;

  private constructor(db: Database.Database, filename: string) {
    this.db = db;
    this.filename = filename;
  }

  static open(filename: string = IN_MEMORY): SqliteDatabase {
    if (filename !== IN_MEMORY) {
      mkdirSync(path.dirname(path.resolve(filename)), { recursive: true });
    }
    return new SqliteDatabase(new Database(filename), filename);
  }

  getFilename(): string {
    return this.filename;
  }

  getConnection(): Database.Database {
    return this.db;
  }

  async listTables(nameFilter: string): Promise<DbResult<ReadonlySet<string>>> {
    return this.attempt(() => {
      const names = this.db
        .prepare("SELECT name FROM sqlite_master WHERE type='table' AND name LIKE ?")
        .pluck()
        .all(nameFilter);
      return new Set(names.map(String));
    });
  }

  async queryScalar(sql: string): Promise<DbResult<ScalarValue>> {
    return this.attempt(() => toScalar(this.db.prepare(sql).pluck().get()));
  }

  async execute(sql: string): Promise<DbResult> {
    return this.attempt(() => {
      this.db.exec(sql);
    });
  }

  async beginTransaction(): Promise<DbResult> {
    return this.execute('BEGIN');
  }

  async commit(): Promise<DbResult> {
    return this.execute('COMMIT');
  }

  async rollback(): Promise<DbResult> {
    return this.execute('ROLLBACK');
  }

  /**
   * Application tables and their columns, in a stable order. The bookkeeping
   * table and SQLite's internal tables are left out.
   */
  async describeSchema(): Promise<DbResult<SchemaSnapshot>> {
    return this.attempt(() => {
      const tables = this.db
        .prepare(
          "SELECT name FROM sqlite_master WHERE type='table' AND name NOT LIKE 'sqlite\\_%' ESCAPE '\\' AND name != ? ORDER BY name",
        )
        .pluck()
        .all(BOOKKEEPING_TABLE)
        .map(String);

      const columns = this.db.prepare('SELECT name FROM pragma_table_info(?) ORDER BY cid').pluck();
      const snapshot: SchemaSnapshot = {};
      for (const table of tables) {
        snapshot[table] = columns.all(table).map(String);
      }
      return snapshot;
    });
  }

  close(): void {
    this.db.close();
  }

  private attempt<T>(fn: () => T): DbResult<T> {
    try {
      return ok(fn());
    } catch (error) {
      return fail<T>(error);
    }
  }
}

function toScalar(value: unknown): ScalarValue {
  if (value === undefined || value === null) return null;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'bigint') {
    return value;
  }
  return String(value);
}
