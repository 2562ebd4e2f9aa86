/**
 * Migration engine
 *
 * Brings a database to the latest version described by a {@link SchemaSpec}:
 *
 *   START ──► STEPPING ──► DONE
 *     │          │
 *     └──────────┴──────► FAILED
 *
 * Each pass through STEPPING reads the recorded version, resolves one step and
 * applies it in its own transaction. A failure stops the run at the last
 * committed version; running again resumes from there.
 */

import type { DatabaseCapability } from '../database/capability.js';
import {
  DomainError,
  ExecutionError,
  InternalError,
  SpecError,
  VersionSkewError,
} from '../shared/errors.js';
import type { SchemaSpec } from '../spec/schemaSpec.js';
import { resolveLatestVersion, resolveStep } from '../spec/specResolver.js';
import { createChildLogger, type DiagnosticSink } from '../../utils/logger.js';
import { mapErrorToStatus } from '../../utils/errorMapping.js';
import { applyStep } from './stepExecutor.js';
import type { MigrateOptions, MigrationResult } from './types.js';
import { readCurrentVersion, type CurrentVersion } from './versionReader.js';

type EngineState =
  | { name: 'START' }
  | { name: 'STEPPING'; current: CurrentVersion }
  | { name: 'DONE' }
  | { name: 'FAILED'; error: DomainError };

export class MigrationEngine {
  private readonly db: DatabaseCapability;
  private readonly spec: SchemaSpec;
  private readonly createFromVersion?: number;
  private readonly log: DiagnosticSink;
  private readonly latestVersion: number;

  // Unknown until the first version read succeeds
  private fromVersion: number | null = null;
  private lastGoodVersion: number | null = null;
  private readonly appliedVersions: number[] = [];

  constructor(options: MigrateOptions) {
    this.db = options.db;
    this.spec = options.spec;
    this.createFromVersion = options.createFromVersion;
    this.log = options.logger ?? createChildLogger({ service: 'MigrationEngine' });
    this.latestVersion = resolveLatestVersion(options.spec);
  }

  async run(): Promise<MigrationResult> {
    let state: EngineState = { name: 'START' };

    while (state.name === 'START' || state.name === 'STEPPING') {
      try {
        state = state.name === 'START' ? await this.start() : await this.step(state.current);
      } catch (error) {
        // Capabilities report failures as values; a throw is a driver bug
        state = {
          name: 'FAILED',
          error: new InternalError(
            `Database capability threw unexpectedly: ${error instanceof Error ? error.message : String(error)}`,
            error instanceof Error ? error : undefined,
          ),
        };
      }
    }

    return state.name === 'DONE' ? this.succeeded() : this.failed(state.error);
  }

  private async start(): Promise<EngineState> {
    const read = await readCurrentVersion(this.db);
    if (!read.ok) {
      return { name: 'FAILED', error: read.error };
    }

    this.fromVersion = read.value.version;
    this.lastGoodVersion = read.value.version;

    const invalid = this.validateSpec(read.value.version);
    if (invalid) {
      return { name: 'FAILED', error: invalid };
    }

    if (read.value.version > this.latestVersion) {
      return { name: 'FAILED', error: new VersionSkewError(read.value.version, this.latestVersion) };
    }

    return { name: 'STEPPING', current: read.value };
  }

  private async step(current: CurrentVersion): Promise<EngineState> {
    const resolution = resolveStep(
      this.spec,
      current.version,
      this.createFromVersion,
      current.bookkeepingTablePresent,
    );

    if (resolution.kind === 'done') {
      return { name: 'DONE' };
    }
    if (resolution.kind === 'error') {
      return { name: 'FAILED', error: resolution.error };
    }

    const { step } = resolution;
    if (step.kind === 'upgrade') {
      this.log.debug(
        { fromVersion: current.version, toVersion: step.targetVersion },
        'Updating database schema',
      );
    } else {
      this.log.debug(
        { kind: step.kind, toVersion: step.targetVersion },
        'Creating database schema',
      );
    }

    const failure = await applyStep(this.db, step);
    if (failure) {
      return { name: 'FAILED', error: failure };
    }

    this.lastGoodVersion = step.targetVersion;
    this.appliedVersions.push(step.targetVersion);

    const after = await readCurrentVersion(this.db);
    if (!after.ok) {
      return { name: 'FAILED', error: after.error };
    }
    if (after.value.version !== step.targetVersion) {
      this.lastGoodVersion = after.value.version;
      return {
        name: 'FAILED',
        error: new ExecutionError(
          `Recorded version is ${after.value.version} after committing version ${step.targetVersion}`,
          step.targetVersion,
        ),
      };
    }

    return { name: 'STEPPING', current: after.value };
  }

  private validateSpec(currentVersion: number): SpecError | undefined {
    if (!Number.isInteger(this.latestVersion) || this.latestVersion < 1) {
      return new SpecError(`latest version must be a positive integer, got ${this.latestVersion}`);
    }

    const from = this.createFromVersion;
    // Only a virgin database is bootstrapped
    if (from === undefined || currentVersion !== 0) {
      return undefined;
    }
    if (!Number.isInteger(from) || from < 1 || from > this.latestVersion) {
      return new SpecError(
        `install-at-version ${from} is outside 1..${this.latestVersion}`,
      );
    }

    return undefined;
  }

  private succeeded(): MigrationResult {
    const message =
      this.appliedVersions.length === 0
        ? `OK (schema already at version ${this.latestVersion})`
        : `OK (upgraded from version ${this.fromVersion} to ${this.latestVersion})`;

    this.log.info(
      { fromVersion: this.fromVersion, version: this.latestVersion, applied: this.appliedVersions },
      'Database schema is up to date',
    );

    return {
      status: 'success',
      statusCode: 200,
      message,
      version: this.latestVersion,
      fromVersion: this.fromVersion,
      appliedVersions: [...this.appliedVersions],
    };
  }

  private failed(error: DomainError): MigrationResult {
    const { status, statusCode } = mapErrorToStatus(error);
    const origin = this.fromVersion === null ? '' : ` (from version ${this.fromVersion})`;
    const message = `Can't upgrade schema${origin}: ${error.message}`;

    this.log.error(
      { err: error, fromVersion: this.fromVersion, version: this.lastGoodVersion },
      message,
    );

    return {
      status,
      statusCode,
      message,
      version: this.lastGoodVersion,
      fromVersion: this.fromVersion,
      appliedVersions: [...this.appliedVersions],
    };
  }
}

export function createOrUpdateDbSchema(options: MigrateOptions): Promise<MigrationResult> {
  return new MigrationEngine(options).run();
}
