#!/usr/bin/env node
import { Command } from 'commander';
import { z } from 'zod';

import { SqliteDatabase } from '../domain/database/sqliteDatabase.js';
import { createOrUpdateDbSchema } from '../domain/migration/migrationEngine.js';
import { inspectSchema } from '../domain/migration/schemaInspector.js';
import { ValidationError } from '../domain/shared/errors.js';
import { loadSchemaSpec } from '../domain/spec/specLoader.js';
import { SpecVerifier } from '../services/specVerifier.js';
import { safeExecute, withErrorHandling } from '../utils/errorHandler.js';

const versionOption = z.coerce.number().int().positive();

const migrateOptionsSchema = z.object({
  db: z.string().min(1),
  spec: z.string().min(1),
  fromVersion: versionOption.optional(),
  json: z.boolean().optional(),
});

const statusOptionsSchema = z.object({
  db: z.string().min(1),
  spec: z.string().min(1),
  json: z.boolean().optional(),
});

const verifyOptionsSchema = z.object({
  spec: z.string().min(1),
  json: z.boolean().optional(),
});

function parseOptions<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: unknown): T {
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new ValidationError(
      result.error.issues.map((issue) => `--${issue.path.join('.')}: ${issue.message}`).join('; '),
      result.error.issues,
    );
  }
  return result.data;
}

const program = new Command();

program
  .name('versioned-schema')
  .description('Create or upgrade a SQLite database schema from a versioned JSON spec')
  .option('--verbose', 'show debug logs')
  .hook('preAction', (command) => {
    if (command.opts().verbose) {
      process.env.LOG_LEVEL = 'debug';
    }
  });

program
  .command('migrate')
  .description('bring the database to the latest schema version')
  .option('-d, --db <path>', 'SQLite database file (env SCHEMA_DB_PATH)', process.env.SCHEMA_DB_PATH)
  .option('-s, --spec <path>', 'schema spec JSON file (env SCHEMA_SPEC_PATH)', process.env.SCHEMA_SPEC_PATH)
  .option('--from-version <n>', 'install a new database at this version, then upgrade')
  .option('--json', 'print the result as JSON')
  .action(
    withErrorHandling('migrate', async (rawOptions: unknown) => {
      const options = parseOptions(migrateOptionsSchema, rawOptions);
      const spec = await loadSchemaSpec(options.spec);
      const db = SqliteDatabase.open(options.db);

      try {
        const result = await createOrUpdateDbSchema({
          db,
          spec,
          createFromVersion: options.fromVersion,
        });
        console.log(options.json ? JSON.stringify(result, null, 2) : result.message);
        process.exitCode = result.statusCode === 200 ? 0 : 1;
      } finally {
        db.close();
      }
    }),
  );

program
  .command('status')
  .description('show the recorded version and pending steps (exit code 1 while out of date)')
  .option('-d, --db <path>', 'SQLite database file (env SCHEMA_DB_PATH)', process.env.SCHEMA_DB_PATH)
  .option('-s, --spec <path>', 'schema spec JSON file (env SCHEMA_SPEC_PATH)', process.env.SCHEMA_SPEC_PATH)
  .option('--json', 'print the inspection as JSON')
  .action(
    withErrorHandling('status', async (rawOptions: unknown) => {
      const options = parseOptions(statusOptionsSchema, rawOptions);
      const spec = await loadSchemaSpec(options.spec);
      const db = SqliteDatabase.open(options.db);

      try {
        const inspection = await inspectSchema(db, spec);
        if (!inspection.ok) {
          throw inspection.error;
        }
        const { value } = inspection;
        console.log(
          options.json
            ? JSON.stringify(value, null, 2)
            : [
                value.message,
                `  Current: v${value.currentVersion}`,
                `  Latest:  v${value.latestVersion}`,
                `  Pending: ${value.pendingVersions.length > 0 ? value.pendingVersions.map((v) => `v${v}`).join(' → ') : 'none'}`,
              ].join('\n'),
        );
        process.exitCode = value.isCompatible ? 0 : 1;
      } finally {
        db.close();
      }
    }),
  );

program
  .command('verify')
  .description('install the spec on scratch databases and check both install paths agree')
  .option('-s, --spec <path>', 'schema spec JSON file (env SCHEMA_SPEC_PATH)', process.env.SCHEMA_SPEC_PATH)
  .option('--json', 'print the report as JSON')
  .action(
    withErrorHandling('verify', async (rawOptions: unknown) => {
      const options = parseOptions(verifyOptionsSchema, rawOptions);
      const spec = await loadSchemaSpec(options.spec);
      const report = await safeExecute(() => new SpecVerifier().verify(spec), 'verify');

      console.log(
        options.json
          ? JSON.stringify(report, null, 2)
          : report.checks
              .map((check) => `${check.ok ? '✓' : '✗'} ${check.name}: ${check.message}`)
              .join('\n'),
      );
      process.exitCode = report.ok ? 0 : 1;
    }),
  );

void program.parseAsync();
