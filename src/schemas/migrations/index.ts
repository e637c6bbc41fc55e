/**
 * Schema Migration Framework
 *
 * Lazy migration on read - when loading data with an older schema version,
 * run the migration chain to bring it to the current version.
 */

import { SCHEMA_VERSIONS, type SchemaType } from '../versions.js';
import { isJsonObject } from '../common.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Migration function type
 * Takes data at version N and returns data at version N+1
 */
export type Migration = (data: Record<string, unknown>) => Record<string, unknown>;

/**
 * Migration registry key format: "schemaType:fromVersion:toVersion"
 */
type MigrationKey = `${SchemaType}:${number}:${number}`;

// ============================================================================
// Migration Registry
// ============================================================================

/**
 * Register migrations when making breaking schema changes.
 *
 * @example
 * // If task schema v2 adds a required "priority" field:
 * registerMigration('task', 1, 2, (data) => ({
 *   ...data,
 *   priority: 'normal',
 * }));
 */
const migrations: Map<MigrationKey, Migration> = new Map();

// ============================================================================
// Core Functions
// ============================================================================

/**
 * Check if migration is needed
 */
export function needsMigration(data: unknown, schemaType: SchemaType): boolean {
  return extractSchemaVersion(data) < SCHEMA_VERSIONS[schemaType];
}

/**
 * Migrate data from its version to current.
 *
 * Non-object input is returned untouched so that the caller's zod schema
 * reports it.
 *
 * @example
 * const raw = JSON.parse(fileContent);
 * const task = TaskSchema.parse(migrateSchema(raw, 'task'));
 */
export function migrateSchema(data: unknown, schemaType: SchemaType): unknown {
  if (!isJsonObject(data)) {
    return data;
  }

  const current = SCHEMA_VERSIONS[schemaType];
  let version = extractSchemaVersion(data);
  let migrated: Record<string, unknown> = data;

  while (version < current) {
    const key: MigrationKey = `${schemaType}:${version}:${version + 1}`;
    const migration = migrations.get(key);

    if (migration) {
      migrated = migration(migrated);
    }
    // If no migration registered, assume forward-compatible (new optional fields)

    version++;
  }

  return { ...migrated, schemaVersion: Math.max(current, extractSchemaVersion(data)) };
}

/**
 * Register a new migration
 *
 * @throws Error if the versions are not consecutive or the key is taken
 */
export function registerMigration(
  schemaType: SchemaType,
  fromVersion: number,
  toVersion: number,
  migration: Migration
): void {
  if (toVersion !== fromVersion + 1) {
    throw new Error(
      `Migration must increment version by 1. Got ${fromVersion} -> ${toVersion}`
    );
  }

  const key: MigrationKey = `${schemaType}:${fromVersion}:${toVersion}`;

  if (migrations.has(key)) {
    throw new Error(`Migration already registered for ${key}`);
  }

  migrations.set(key, migration);
}

/**
 * Check if a migration exists for a specific version transition
 */
export function hasMigration(
  schemaType: SchemaType,
  fromVersion: number,
  toVersion: number
): boolean {
  return migrations.has(`${schemaType}:${fromVersion}:${toVersion}`);
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Extract schema version from data, defaulting to 1 if not present
 */
export function extractSchemaVersion(data: unknown): number {
  if (!isJsonObject(data)) {
    return 1;
  }

  const version = data.schemaVersion;

  if (typeof version === 'number' && Number.isInteger(version) && version > 0) {
    return version;
  }

  return 1; // Legacy data without a version
}

/**
 * Parse JSON text and run the migration chain on it.
 */
export function loadAndMigrate(json: string, schemaType: SchemaType): unknown {
  const data: unknown = JSON.parse(json);
  return migrateSchema(data, schemaType);
}
