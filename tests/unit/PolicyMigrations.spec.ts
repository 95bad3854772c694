import { describe, it } from 'node:test';
import assert from 'node:assert';
import { migratePolicyStore, POLICY_MIGRATIONS } from '../../libs/policy/migrations.js';
import { PolicyStoreConnectError, PolicyStoreQueryError } from '../../libs/policy/errors.js';
import { MIGRATION_LOCK_KEY, MIGRATION_QUERIES, TX_BEGIN, TX_COMMIT, TX_ROLLBACK } from '../../libs/policy/queries.js';
import { FakePolicyDatabase } from '../helpers/fakePolicyDatabase.js';

const DATABASE = 'policy@localhost:5432/policies';
const APPLIED_AT = new Date('2024-03-01T12:00:00.000Z');

describe('Policy store migrations', () => {
    it('applies every migration on an empty database', async () => {
        const db = new FakePolicyDatabase();

        const applied = await migratePolicyStore(db, DATABASE, POLICY_MIGRATIONS, () => APPLIED_AT);

        assert.deepStrictEqual(applied, ['0001_create_policies', '0002_create_active_version']);
        assert.deepStrictEqual([...db.migrations.keys()], applied);
        assert.strictEqual(db.migrations.get('0001_create_policies')?.toISOString(), '2024-03-01T12:00:00.000Z');
        assert.strictEqual(db.ddl.filter(statement => statement.includes('CREATE TABLE IF NOT EXISTS policies ')).length, 1);
        assert.strictEqual(db.openClients, 0);
    });

    it('takes the advisory lock before reading applied migrations', async () => {
        const db = new FakePolicyDatabase();

        await migratePolicyStore(db, DATABASE);

        const statements = db.statementsOf(1);
        assert.deepStrictEqual(statements.slice(0, 4), [
            TX_BEGIN,
            MIGRATION_QUERIES.advisoryLock,
            MIGRATION_QUERIES.ensureLedger,
            MIGRATION_QUERIES.appliedMigrations,
        ]);
        assert.strictEqual(statements.at(-1), TX_COMMIT);
        assert.strictEqual(MIGRATION_LOCK_KEY, 7340219);
    });

    it('applies nothing when the schema is current', async () => {
        const db = new FakePolicyDatabase();
        await migratePolicyStore(db, DATABASE);
        const ddlBefore = db.ddl.length;

        const applied = await migratePolicyStore(db, DATABASE);

        assert.deepStrictEqual(applied, []);
        assert.strictEqual(db.ddl.length, ddlBefore);
        assert.strictEqual(db.statementsOf(2).at(-1), TX_COMMIT);
    });

    it('applies only migrations added since the last run', async () => {
        const db = new FakePolicyDatabase();
        await migratePolicyStore(db, DATABASE, POLICY_MIGRATIONS.slice(0, 1));

        const applied = await migratePolicyStore(db, DATABASE);

        assert.deepStrictEqual(applied, ['0002_create_active_version']);
    });

    it('rolls back and rethrows when a statement fails', async () => {
        const db = new FakePolicyDatabase();
        db.failNext(MIGRATION_QUERIES.recordMigration, new Error('permission denied'));

        await assert.rejects(
            migratePolicyStore(db, DATABASE),
            (error: unknown) => error instanceof PolicyStoreQueryError && error.query === 'migrate:recordMigration'
        );

        assert.strictEqual(db.statementsOf(1).at(-1), TX_ROLLBACK);
        assert.strictEqual(db.releasedClients, 1);
        assert.strictEqual(db.destroyedClients, 0);
    });

    it('destroys the client when the rollback fails too', async () => {
        const db = new FakePolicyDatabase();
        db.failNext(MIGRATION_QUERIES.appliedMigrations);
        db.failNext(TX_ROLLBACK);

        await assert.rejects(migratePolicyStore(db, DATABASE), PolicyStoreQueryError);

        assert.strictEqual(db.destroyedClients, 1);
    });

    it('reports an unreachable database as a connect error', async () => {
        const db = new FakePolicyDatabase();
        await db.end();

        await assert.rejects(
            migratePolicyStore(db, DATABASE),
            (error: unknown) => error instanceof PolicyStoreConnectError && error.database === DATABASE
        );
    });
});
