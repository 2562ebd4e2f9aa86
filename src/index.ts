export {
  fail,
  ok,
  type DatabaseCapability,
  type DbResult,
  type InspectableDatabase,
  type ScalarValue,
  type SchemaSnapshot,
} from './domain/database/capability.js';
export { IN_MEMORY, SqliteDatabase } from './domain/database/sqliteDatabase.js';
export * from './domain/migration/index.js';
export type {
  MigrationStep,
  SchemaSpec,
  Statements,
  StepKind,
  VersionedStatements,
} from './domain/spec/schemaSpec.js';
export { loadSchemaSpec, normalizeLegacySpec, parseSchemaSpec } from './domain/spec/specLoader.js';
export { resolveLatestVersion, resolveStep, type StepResolution } from './domain/spec/specResolver.js';
export {
  DomainError,
  ExecutionError,
  InternalError,
  SpecError,
  ValidationError,
  VersionSkewError,
} from './domain/shared/errors.js';
export {
  SpecVerifier,
  compareSnapshots,
  type VerificationCheck,
  type VerificationReport,
} from './services/specVerifier.js';
export type { DiagnosticSink } from './utils/logger.js';
