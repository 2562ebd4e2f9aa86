import { describe, expect, it, vi } from 'vitest';

import { SqliteDatabase } from '../../src/domain/database/sqliteDatabase.js';
import type { SchemaSpec } from '../../src/domain/spec/schemaSpec.js';
import { SpecVerifier, compareSnapshots } from '../../src/services/specVerifier.js';
import { threeVersionSpec } from '../helpers/database.js';

const quiet = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };

describe('SpecVerifier', () => {
  it('passes a spec whose install and upgrade paths agree', async () => {
    const verifier = new SpecVerifier({}, quiet);

    const report = await verifier.verify(threeVersionSpec());

    expect(report.ok).toBe(true);
    expect(report.latestVersion).toBe(3);
    expect(report.checks.map((check) => [check.name, check.ok])).toEqual([
      ['has install', true],
      ['has install at version 1', true],
      ['has every upgrade step', true],
      ['install', true],
      ['upgrade from v1', true],
      ['install and upgrade agree', true],
    ]);
    expect(report.checks[5].message).toBe('2 table(s) identical');
  });

  it('flags an install script that drifted from the upgrades', async () => {
    const spec: SchemaSpec = {
      ...threeVersionSpec(),
      install: ['CREATE TABLE t1 (i INT, extra TEXT)', 'CREATE TABLE t4 (i INT)'],
    };

    const report = await new SpecVerifier({}, quiet).verify(spec);

    expect(report.ok).toBe(false);
    expect(report.checks.at(-1)).toEqual({
      name: 'install and upgrade agree',
      ok: false,
      message: 'table t1 columns differ: install (i, extra) vs upgrade (i)',
    });
  });

  it('reports a failing upgrade with the engine message', async () => {
    const spec: SchemaSpec = {
      ...threeVersionSpec(),
      upgradeToVersion: { ...threeVersionSpec().upgradeToVersion, 3: ['DROP TABLE nope'] },
    };

    const report = await new SpecVerifier({}, quiet).verify(spec);

    const upgrade = report.checks.find((check) => check.name === 'upgrade from v1');
    expect(upgrade?.ok).toBe(false);
    expect(upgrade?.message).toBe(
      "Can't upgrade schema (from version 0): Failed to reach version 3: no such table: nope",
    );
    expect(report.checks.map((check) => check.name)).not.toContain('install and upgrade agree');
  });

  it('stops before touching a database when the spec is incomplete', async () => {
    const openDatabase = vi.fn(() => SqliteDatabase.open());
    const verifier = new SpecVerifier({ openDatabase }, quiet);

    const report = await verifier.verify({
      latestVersion: 3,
      install: ['CREATE TABLE t1 (i INT)'],
      upgradeToVersion: { 3: [] },
    });

    expect(report.ok).toBe(false);
    expect(report.checks).toEqual([
      { name: 'has install', ok: true, message: 'install statements present' },
      {
        name: 'has install at version 1',
        ok: false,
        message: 'spec has no installAtVersion[1], upgrades cannot be exercised',
      },
      {
        name: 'has every upgrade step',
        ok: false,
        message: 'missing upgradeToVersion for version(s) 2',
      },
    ]);
    expect(openDatabase).not.toHaveBeenCalled();
  });

  it('only installs a single-version spec', async () => {
    const close = vi.fn();
    const verifier = new SpecVerifier(
      {
        openDatabase: () => {
          const db = SqliteDatabase.open();
          const closeDb = db.close.bind(db);
          db.close = () => {
            close();
            closeDb();
          };
          return db;
        },
      },
      quiet,
    );

    const report = await verifier.verify({ install: ['CREATE TABLE t1 (i INT)'] });

    expect(report.ok).toBe(true);
    expect(report.checks.map((check) => check.name)).toEqual(['has install', 'install']);
    expect(close).toHaveBeenCalledTimes(1);
  });
});

describe('compareSnapshots', () => {
  it('lists tables present on one side only', () => {
    expect(compareSnapshots({ a: ['i'], b: ['i'] }, { a: ['i'], c: ['i'] })).toEqual({
      name: 'install and upgrade agree',
      ok: false,
      message: 'table b only exists after install; table c only exists after upgrading',
    });
  });

  it('treats column order as significant', () => {
    expect(compareSnapshots({ a: ['x', 'y'] }, { a: ['y', 'x'] }).ok).toBe(false);
  });
});
