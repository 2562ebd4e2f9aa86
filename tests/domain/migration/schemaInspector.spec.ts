import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { SqliteDatabase } from '../../../src/domain/database/sqliteDatabase.js';
import { createOrUpdateDbSchema } from '../../../src/domain/migration/migrationEngine.js';
import { inspectSchema } from '../../../src/domain/migration/schemaInspector.js';
import { RecordingDatabase, threeVersionSpec } from '../../helpers/database.js';

const quiet = { debug: () => {}, info: () => {}, warn: () => {}, error: () => {} };

describe('inspectSchema', () => {
  let db: SqliteDatabase;

  beforeEach(() => {
    db = SqliteDatabase.open();
  });

  afterEach(() => {
    db.close();
  });

  it('plans a single install step for a virgin database', async () => {
    const recording = new RecordingDatabase(db);

    const result = await inspectSchema(recording, threeVersionSpec());

    expect(result).toEqual({
      ok: true,
      value: {
        currentVersion: 0,
        latestVersion: 3,
        isCompatible: false,
        needsMigration: true,
        pendingVersions: [3],
        message: 'Schema upgrade available: v0 → v3 (1 step(s))',
      },
    });
    expect(recording.mutatingCalls()).toEqual([]);
  });

  it('plans every step when bootstrapping from an earlier version', async () => {
    const result = await inspectSchema(db, threeVersionSpec(), 1);

    expect(result.ok && result.value.pendingVersions).toEqual([1, 2, 3]);
  });

  it('lists the remaining upgrades of a partially migrated database', async () => {
    await createOrUpdateDbSchema({
      db,
      spec: { ...threeVersionSpec(), latestVersion: 1 },
      createFromVersion: 1,
      logger: quiet,
    });

    const result = await inspectSchema(db, threeVersionSpec());

    expect(result.ok && result.value.pendingVersions).toEqual([2, 3]);
    expect(result.ok && result.value.message).toBe('Schema upgrade available: v1 → v3 (2 step(s))');
  });

  it('reports an up-to-date database', async () => {
    await createOrUpdateDbSchema({ db, spec: threeVersionSpec(), logger: quiet });

    const result = await inspectSchema(db, threeVersionSpec());

    expect(result).toEqual({
      ok: true,
      value: {
        currentVersion: 3,
        latestVersion: 3,
        isCompatible: true,
        needsMigration: false,
        pendingVersions: [],
        message: 'Schema version 3 is up to date',
      },
    });
  });

  it('names the gap when the spec cannot reach the latest version', async () => {
    await createOrUpdateDbSchema({
      db,
      spec: { ...threeVersionSpec(), latestVersion: 1 },
      createFromVersion: 1,
      logger: quiet,
    });

    const result = await inspectSchema(db, {
      latestVersion: 3,
      upgradeToVersion: { 3: ['DROP TABLE t2'] },
    });

    expect(result.ok && result.value.message).toBe(
      'Schema at version 1 cannot reach version 3: Error in spec: missing upgrade step to version 2',
    );
    expect(result.ok && result.value.pendingVersions).toEqual([]);
  });

  it('flags a database newer than the spec as incompatible', async () => {
    db.getConnection().exec(
      "CREATE TABLE meta (name VARCHAR(64) NOT NULL PRIMARY KEY, value VARCHAR(255)); INSERT INTO meta VALUES ('schema_version', '5')",
    );

    const result = await inspectSchema(db, threeVersionSpec());

    expect(result.ok && result.value.isCompatible).toBe(false);
    expect(result.ok && result.value.needsMigration).toBe(false);
  });

  it('passes read failures through', async () => {
    const result = await inspectSchema(
      new RecordingDatabase(db, { listTables: 'disk I/O error' }),
      threeVersionSpec(),
    );

    expect(!result.ok && result.error.message).toBe("Can't check for the meta table: disk I/O error");
  });
});
