/**
 * Every statement the Postgres backend issues, keyed by the name reported in
 * PolicyStoreQueryError. Parameterized; explicit column lists only.
 */

export const TX_BEGIN = 'BEGIN';
export const TX_COMMIT = 'COMMIT';
export const TX_ROLLBACK = 'ROLLBACK';

export const POLICY_QUERIES = {
    // Blocks other writers (and other exclusive transactions) until commit; plain reads proceed.
    lockLedger: 'LOCK TABLE policies, active_version IN EXCLUSIVE MODE',

    latestVersion: 'SELECT COALESCE(MAX(version), 0) AS latest FROM policies',

    insertVersion: `INSERT INTO policies (
            version,
            name,
            description,
            language,
            creator_id,
            creator_name,
            created_at,
            content
        ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8)`,

    latestActivation: `SELECT
            id,
            version,
            activated_by_id,
            activated_by_name,
            deactivated_at
        FROM active_version
        ORDER BY activated_at DESC, id DESC
        LIMIT 1`,

    insertActivation: `INSERT INTO active_version (
            version,
            activated_at,
            activated_by_id,
            activated_by_name
        ) VALUES ($1, $2, $3, $4)`,

    stampDeactivation: `UPDATE active_version
        SET deactivated_at = $2,
            deactivated_by_id = $3,
            deactivated_by_name = $4
        WHERE id = $1 AND deactivated_at IS NULL`,

    listVersions: `SELECT
            version,
            name,
            description,
            language,
            creator_id,
            creator_name,
            created_at
        FROM policies
        ORDER BY version`,

    versionMetadata: `SELECT
            version,
            name,
            description,
            language,
            creator_id,
            creator_name,
            created_at
        FROM policies
        WHERE version = $1
        LIMIT 1`,

    versionContent: `SELECT
            name,
            content
        FROM policies
        WHERE version = $1
        LIMIT 1`,
} as const;

export type PolicyQueryName = keyof typeof POLICY_QUERIES;

export const MIGRATION_QUERIES = {
    // Serializes concurrent service instances starting against the same database.
    advisoryLock: 'SELECT pg_advisory_xact_lock($1)',

    ensureLedger: `CREATE TABLE IF NOT EXISTS policy_store_migrations (
            id TEXT PRIMARY KEY,
            applied_at TIMESTAMPTZ NOT NULL
        )`,

    appliedMigrations: 'SELECT id FROM policy_store_migrations',

    recordMigration: 'INSERT INTO policy_store_migrations (id, applied_at) VALUES ($1, $2)',
} as const;

export type MigrationQueryName = keyof typeof MIGRATION_QUERIES;

/** Key for pg_advisory_xact_lock; arbitrary but fixed. */
export const MIGRATION_LOCK_KEY = 7_340_219;
