/**
 * The narrow view of a database connection that the migration engine needs.
 *
 * Every operation resolves to a {@link DbResult}; drivers report failures as
 * values rather than by throwing, so the engine can check each call.
 */

export type DbResult<T = void> = { ok: true; value: T } | { ok: false; error: string };

export type ScalarValue = string | number | bigint | null;

export interface DatabaseCapability {
  /** Table names matching a SQL `LIKE` pattern. */
  listTables(nameFilter: string): Promise<DbResult<ReadonlySet<string>>>;
  /** First column of the first row, or `null` when there is no row. */
  queryScalar(sql: string): Promise<DbResult<ScalarValue>>;
  execute(sql: string): Promise<DbResult>;
  beginTransaction(): Promise<DbResult>;
  commit(): Promise<DbResult>;
  rollback(): Promise<DbResult>;
}

/** Table name → ordered column names. */
export type SchemaSnapshot = Record<string, string[]>;

/**
 * A capability that can also describe its own tables and be closed, used when
 * comparing the outcome of two install paths.
 */
export interface InspectableDatabase extends DatabaseCapability {
  describeSchema(): Promise<DbResult<SchemaSnapshot>>;
  close(): void;
}

export function ok<T = void>(value: T): DbResult<T> {
  return { ok: true, value };
}

export function fail<T = void>(error: unknown): DbResult<T> {
  return { ok: false, error: error instanceof Error ? error.message : String(error) };
}
