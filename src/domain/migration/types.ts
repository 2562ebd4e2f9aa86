import type { DatabaseCapability } from '../database/capability.js';
import type { SchemaSpec } from '../spec/schemaSpec.js';
import type { DiagnosticSink } from '../../utils/logger.js';

export type MigrationStatus = 'success' | 'specError' | 'executionError';

export type MigrationStatusCode = 200 | 400 | 500;

export interface MigrationResult {
  status: MigrationStatus;
  statusCode: MigrationStatusCode;
  message: string;
  /**
   * Last committed version; below the latest version when a step failed.
   * `null` when the recorded version could not be read at the start.
   */
  version: number | null;
  /** Version found when the run started, `null` when it could not be read. */
  fromVersion: number | null;
  /** Versions committed by this run, in order. */
  appliedVersions: number[];
}

export interface MigrateOptions {
  db: DatabaseCapability;
  spec: SchemaSpec;
  /** Install a virgin database from `installAtVersion[createFromVersion]` instead of `install`. */
  createFromVersion?: number;
  logger?: DiagnosticSink;
}

export interface SchemaInspection {
  currentVersion: number;
  latestVersion: number;
  isCompatible: boolean;
  needsMigration: boolean;
  /** Versions the next migrate run would record, in order. */
  pendingVersions: number[];
  message: string;
}
