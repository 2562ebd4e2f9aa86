import type { InspectableDatabase, SchemaSnapshot } from '../domain/database/capability.js';
import { SqliteDatabase } from '../domain/database/sqliteDatabase.js';
import { createOrUpdateDbSchema } from '../domain/migration/migrationEngine.js';
import type { MigrateOptions, MigrationResult } from '../domain/migration/types.js';
import { statementsAt, type SchemaSpec } from '../domain/spec/schemaSpec.js';
import { resolveLatestVersion } from '../domain/spec/specResolver.js';
import { createChildLogger, type DiagnosticSink } from '../utils/logger.js';

export interface VerificationCheck {
  name: string;
  ok: boolean;
  message: string;
}

export interface VerificationReport {
  ok: boolean;
  latestVersion: number;
  checks: VerificationCheck[];
}

interface SpecVerifierDependencies {
  openDatabase: () => InspectableDatabase | Promise<InspectableDatabase>;
  migrate: (options: MigrateOptions) => Promise<MigrationResult>;
}

/**
 * Exercises a spec against throwaway databases: a direct install, an install at
 * version 1 followed by every upgrade step, and a comparison of the two
 * resulting schemas.
 */
export class SpecVerifier {
  private readonly deps: SpecVerifierDependencies;
  private readonly logger: DiagnosticSink;

  constructor(deps?: Partial<SpecVerifierDependencies>, logger?: DiagnosticSink) {
    this.logger = logger ?? createChildLogger({ service: 'SpecVerifier' });
    this.deps = {
      openDatabase: () => SqliteDatabase.open(),
      migrate: createOrUpdateDbSchema,
      ...deps,
    };
  }

  async verify(spec: SchemaSpec): Promise<VerificationReport> {
    const latestVersion = resolveLatestVersion(spec);
    const checks = checkShape(spec, latestVersion);

    if (checks.some((check) => !check.ok)) {
      return this.report(latestVersion, checks);
    }

    const direct = await this.build(spec, undefined);
    checks.push(direct.check);

    if (latestVersion > 1) {
      const stepped = await this.build(spec, 1);
      checks.push(stepped.check);

      if (direct.snapshot && stepped.snapshot) {
        checks.push(compareSnapshots(direct.snapshot, stepped.snapshot));
      }
    }

    return this.report(latestVersion, checks);
  }

  private report(latestVersion: number, checks: VerificationCheck[]): VerificationReport {
    const ok = checks.every((check) => check.ok);
    if (ok) {
      this.logger.info({ latestVersion, checks: checks.length }, 'Schema spec verified');
    } else {
      this.logger.warn(
        { latestVersion, failed: checks.filter((check) => !check.ok).map((check) => check.name) },
        'Schema spec verification failed',
      );
    }
    return { ok, latestVersion, checks };
  }

  private async build(
    spec: SchemaSpec,
    createFromVersion: number | undefined,
  ): Promise<{ check: VerificationCheck; snapshot?: SchemaSnapshot }> {
    const name =
      createFromVersion === undefined ? 'install' : `upgrade from v${createFromVersion}`;
    const db = await this.deps.openDatabase();

    try {
      const result = await this.deps.migrate({ db, spec, createFromVersion, logger: this.logger });
      if (result.statusCode !== 200) {
        return { check: { name, ok: false, message: result.message } };
      }

      const described = await db.describeSchema();
      if (!described.ok) {
        return {
          check: { name, ok: false, message: `Can't describe schema: ${described.error}` },
        };
      }

      return {
        check: { name, ok: true, message: result.message },
        snapshot: described.value,
      };
    } finally {
      db.close();
    }
  }
}

function checkShape(spec: SchemaSpec, latestVersion: number): VerificationCheck[] {
  const checks: VerificationCheck[] = [
    {
      name: 'has install',
      ok: spec.install !== undefined,
      message: spec.install ? 'install statements present' : "spec has no 'install' statements",
    },
  ];

  if (latestVersion > 1) {
    const hasInstallV1 = statementsAt(spec.installAtVersion, 1) !== undefined;
    checks.push({
      name: 'has install at version 1',
      ok: hasInstallV1,
      message: hasInstallV1
        ? 'installAtVersion[1] present'
        : 'spec has no installAtVersion[1], upgrades cannot be exercised',
    });

    const missing: number[] = [];
    for (let version = 2; version <= latestVersion; version++) {
      if (!statementsAt(spec.upgradeToVersion, version)) missing.push(version);
    }
    checks.push({
      name: 'has every upgrade step',
      ok: missing.length === 0,
      message:
        missing.length === 0
          ? `upgradeToVersion[2..${latestVersion}] present`
          : `missing upgradeToVersion for version(s) ${missing.join(', ')}`,
    });
  }

  return checks;
}

export function compareSnapshots(
  installed: SchemaSnapshot,
  upgraded: SchemaSnapshot,
): VerificationCheck {
  const differences: string[] = [];
  const tables = new Set([...Object.keys(installed), ...Object.keys(upgraded)]);

  for (const table of [...tables].sort()) {
    const left = installed[table];
    const right = upgraded[table];
    if (!left) {
      differences.push(`table ${table} only exists after upgrading`);
    } else if (!right) {
      differences.push(`table ${table} only exists after install`);
    } else if (left.join(',') !== right.join(',')) {
      differences.push(
        `table ${table} columns differ: install (${left.join(', ')}) vs upgrade (${right.join(', ')})`,
      );
    }
  }

  return {
    name: 'install and upgrade agree',
    ok: differences.length === 0,
    message:
      differences.length === 0
        ? `${tables.size} table(s) identical`
        : differences.join('; '),
  };
}
