import type { DatabaseCapability, DbResult } from '../database/capability.js';
import { ExecutionError } from '../shared/errors.js';
import type { MigrationStep } from '../spec/schemaSpec.js';
import { BOOKKEEPING_TABLE, SCHEMA_VERSION_KEY } from '../database/bookkeeping.js';

export const CREATE_BOOKKEEPING_TABLE_SQL =
  `CREATE TABLE ${BOOKKEEPING_TABLE} (name VARCHAR(64) NOT NULL PRIMARY KEY, value VARCHAR(255))`;

export const INSERT_VERSION_ROW_SQL =
  `INSERT INTO ${BOOKKEEPING_TABLE} (name,value) VALUES ('${SCHEMA_VERSION_KEY}','0')`;

export function updateVersionSql(version: number): string {
  return `UPDATE ${BOOKKEEPING_TABLE} SET value='${version}' WHERE name='${SCHEMA_VERSION_KEY}'`;
}

/**
 * Apply one step in a single transaction: optional bookkeeping table, the step's
 * statements in order, the version write, then commit. The first failure rolls
 * the whole transaction back.
 */
export async function applyStep(
  db: DatabaseCapability,
  step: MigrationStep,
): Promise<ExecutionError | undefined> {
  const begun = await db.beginTransaction();
  if (!begun.ok) {
    return new ExecutionError(
      `Can't begin transaction for version ${step.targetVersion}: ${begun.error}`,
      step.targetVersion,
    );
  }

  let failure: string | undefined;
  try {
    failure = await runInTransaction(db, step);
  } catch (error) {
    // The transaction is open, so a throwing driver is rolled back like a rejection
    failure = error instanceof Error ? error.message : String(error);
  }
  if (failure === undefined) {
    return undefined;
  }

  const rollbackFailure = await rollBack(db);
  const suffix = rollbackFailure === undefined ? '' : ` (rollback also failed: ${rollbackFailure})`;
  return new ExecutionError(
    `Failed to reach version ${step.targetVersion}: ${failure}${suffix}`,
    step.targetVersion,
  );
}

async function rollBack(db: DatabaseCapability): Promise<string | undefined> {
  try {
    const rolledBack = await db.rollback();
    return rolledBack.ok ? undefined : rolledBack.error;
  } catch (error) {
    return error instanceof Error ? error.message : String(error);
  }
}

/** Returns the driver's error text of the first rejected call, if any. */
async function runInTransaction(
  db: DatabaseCapability,
  step: MigrationStep,
): Promise<string | undefined> {
  const statements: string[] = [];
  if (step.createsBookkeepingTable) {
    statements.push(CREATE_BOOKKEEPING_TABLE_SQL, INSERT_VERSION_ROW_SQL);
  }
  statements.push(...step.statements, updateVersionSql(step.targetVersion));

  for (const sql of statements) {
    const result = await db.execute(sql);
    if (!result.ok) {
      return result.error;
    }
  }

  const committed: DbResult = await db.commit();
  return committed.ok ? undefined : committed.error;
}
