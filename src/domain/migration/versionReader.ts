import { BOOKKEEPING_TABLE, SCHEMA_VERSION_KEY } from '../database/bookkeeping.js';
import type { DatabaseCapability } from '../database/capability.js';
import { ExecutionError } from '../shared/errors.js';

export interface CurrentVersion {
  version: number;
  bookkeepingTablePresent: boolean;
}

export type VersionReadResult =
  | { ok: true; value: CurrentVersion }
  | { ok: false; error: ExecutionError };

/**
 * Read the recorded schema version. A database without the bookkeeping table is
 * at version 0; a bookkeeping table without a usable `schema_version` row is an error.
 */
export async function readCurrentVersion(db: DatabaseCapability): Promise<VersionReadResult> {
  const tables = await db.listTables(BOOKKEEPING_TABLE);
  if (!tables.ok) {
    return {
      ok: false,
      error: new ExecutionError(`Can't check for the ${BOOKKEEPING_TABLE} table: ${tables.error}`),
    };
  }

  if (!tables.value.has(BOOKKEEPING_TABLE)) {
    return { ok: true, value: { version: 0, bookkeepingTablePresent: false } };
  }

  const stored = await db.queryScalar(
    `SELECT value FROM ${BOOKKEEPING_TABLE} WHERE name='${SCHEMA_VERSION_KEY}'`,
  );
  if (!stored.ok) {
    return {
      ok: false,
      error: new ExecutionError(`Can't read ${SCHEMA_VERSION_KEY}: ${stored.error}`),
    };
  }

  if (stored.value === null) {
    return {
      ok: false,
      error: new ExecutionError(
        `The ${BOOKKEEPING_TABLE} table exists but has no ${SCHEMA_VERSION_KEY} row`,
      ),
    };
  }

  const text = String(stored.value).trim();
  const version = /^\d+$/.test(text) ? Number(text) : NaN;
  if (!Number.isSafeInteger(version)) {
    return {
      ok: false,
      error: new ExecutionError(`Stored ${SCHEMA_VERSION_KEY} is not an integer: '${text}'`),
    };
  }

  return { ok: true, value: { version, bookkeepingTablePresent: true } };
}
