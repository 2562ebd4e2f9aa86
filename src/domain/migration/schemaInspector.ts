import type { DatabaseCapability } from '../database/capability.js';
import type { ExecutionError } from '../shared/errors.js';
import type { SchemaSpec } from '../spec/schemaSpec.js';
import { resolveLatestVersion, resolveStep } from '../spec/specResolver.js';
import type { SchemaInspection } from './types.js';
import { readCurrentVersion } from './versionReader.js';

export type InspectionResult =
  | { ok: true; value: SchemaInspection }
  | { ok: false; error: ExecutionError };

/**
 * Compare the recorded version with the spec without touching the schema.
 * Pending versions are computed by resolving steps in sequence, so a gap in the
 * spec shows up as a truncated plan plus a message naming the problem.
 */
export async function inspectSchema(
  db: DatabaseCapability,
  spec: SchemaSpec,
  createFromVersion?: number,
): Promise<InspectionResult> {
  const read = await readCurrentVersion(db);
  if (!read.ok) {
    return read;
  }

  const currentVersion = read.value.version;
  const latestVersion = resolveLatestVersion(spec);

  if (currentVersion > latestVersion) {
    return {
      ok: true,
      value: {
        currentVersion,
        latestVersion,
        isCompatible: false,
        needsMigration: false,
        pendingVersions: [],
        message:
          `Schema version ${currentVersion} is newer than the spec's latest version ${latestVersion}. ` +
          'Upgrade the application first.',
      },
    };
  }

  const pendingVersions: number[] = [];
  let problem: string | undefined;
  let version = currentVersion;
  let tablePresent = read.value.bookkeepingTablePresent;

  for (;;) {
    const resolution = resolveStep(spec, version, createFromVersion, tablePresent);
    if (resolution.kind === 'done') break;
    if (resolution.kind === 'error') {
      problem = resolution.error.message;
      break;
    }
    pendingVersions.push(resolution.step.targetVersion);
    version = resolution.step.targetVersion;
    tablePresent = true;
  }

  const needsMigration = currentVersion < latestVersion;
  let message: string;
  if (!needsMigration) {
    message = `Schema version ${currentVersion} is up to date`;
  } else if (problem) {
    message = `Schema at version ${currentVersion} cannot reach version ${latestVersion}: ${problem}`;
  } else {
    message = `Schema upgrade available: v${currentVersion} → v${latestVersion} (${pendingVersions.length} step(s))`;
  }

  return {
    ok: true,
    value: {
      currentVersion,
      latestVersion,
      isCompatible: !needsMigration,
      needsMigration,
      pendingVersions,
      message,
    },
  };
}
