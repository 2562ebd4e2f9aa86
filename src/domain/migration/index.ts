/**
 * Schema Migration Module
 */

export { MigrationEngine, createOrUpdateDbSchema } from './migrationEngine.js';
export { inspectSchema, type InspectionResult } from './schemaInspector.js';
export {
  applyStep,
  CREATE_BOOKKEEPING_TABLE_SQL,
  INSERT_VERSION_ROW_SQL,
  updateVersionSql,
} from './stepExecutor.js';
export { BOOKKEEPING_TABLE, SCHEMA_VERSION_KEY } from '../database/bookkeeping.js';
export {
  readCurrentVersion,
  type CurrentVersion,
  type VersionReadResult,
} from './versionReader.js';
export type {
  MigrateOptions,
  MigrationResult,
  MigrationStatus,
  MigrationStatusCode,
  SchemaInspection,
} from './types.js';
