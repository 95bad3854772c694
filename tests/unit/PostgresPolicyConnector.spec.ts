import { describe, it } from 'node:test';
import assert from 'node:assert';
import { PostgresPolicyConnector } from '../../libs/policy/postgresConnector.js';
import {
    PolicyStoreAbortedError,
    PolicyStoreConnectError,
    PolicyStoreQueryError,
} from '../../libs/policy/errors.js';
import { POLICY_QUERIES, TX_BEGIN, TX_COMMIT, TX_ROLLBACK } from '../../libs/policy/queries.js';
import type { PolicyContent } from '../../libs/validation/schema.js';
import { FakePolicyDatabase } from '../helpers/fakePolicyDatabase.js';
import {
    ALICE,
    ALLOW_POLICY,
    attached,
    describeConnectionConformance,
    jsonCodec,
    tickingClock,
} from '../helpers/connectionConformance.js';

const DATABASE = 'policy@localhost:5432/policies';

function createConnector(db = new FakePolicyDatabase()) {
    return new PostgresPolicyConnector<PolicyContent>({
        pool: db,
        codec: jsonCodec,
        database: DATABASE,
        clock: tickingClock(),
    });
}

describeConnectionConformance('PostgresPolicyConnector', ({ codec, clock }) =>
    new PostgresPolicyConnector<PolicyContent>({
        pool: new FakePolicyDatabase(),
        codec,
        database: DATABASE,
        clock,
    })
);

describe('PostgresPolicyConnector transactions', () => {
    it('wraps addVersion in BEGIN, LOCK and COMMIT', async () => {
        const db = new FakePolicyDatabase();
        const connection = await createConnector(db).connect(ALICE);

        await connection.addVersion(attached('tx'), ALLOW_POLICY);
        connection.release();

        assert.deepStrictEqual(db.statementsOf(1), [
            TX_BEGIN,
            POLICY_QUERIES.lockLedger,
            POLICY_QUERIES.latestVersion,
            POLICY_QUERIES.insertVersion,
            TX_COMMIT,
        ]);
    });

    it('stores creator and content columns as given', async () => {
        const db = new FakePolicyDatabase();
        const connection = await createConnector(db).connect(ALICE);

        await connection.addVersion(attached('columns'), { rules: ['a', 'b'] });
        connection.release();

        assert.strictEqual(db.policies.length, 1);
        assert.strictEqual(db.policies[0].creator_id, 'alice');
        assert.strictEqual(db.policies[0].creator_name, 'Alice Example');
        assert.strictEqual(db.policies[0].content, '{"rules":["a","b"]}');
    });

    it('runs reads outside of any transaction', async () => {
        const db = new FakePolicyDatabase();
        const connection = await createConnector(db).connect(ALICE);

        await connection.getActiveVersion();
        await connection.getVersions();
        connection.release();

        assert.deepStrictEqual(db.statementsOf(1), [
            POLICY_QUERIES.latestActivation,
            POLICY_QUERIES.listVersions,
        ]);
    });

    it('skips the insert when activating the active version', async () => {
        const db = new FakePolicyDatabase();
        const connector = createConnector(db);
        const connection = await connector.connect(ALICE);

        await connection.activate(3);
        await connection.activate(3);
        connection.release();

        assert.strictEqual(db.activations.length, 1);
        assert.deepStrictEqual(db.statementsOf(1).slice(5), [
            TX_BEGIN,
            POLICY_QUERIES.lockLedger,
            POLICY_QUERIES.latestActivation,
            TX_COMMIT,
        ]);
    });

    it('stamps only the latest active row on deactivate', async () => {
        const db = new FakePolicyDatabase();
        const connection = await createConnector(db).connect(ALICE);

        await connection.activate(1);
        await connection.activate(2);
        await connection.deactivate();
        connection.release();

        assert.strictEqual(db.activations[0].deactivated_at, null);
        assert.strictEqual(db.activations[1].deactivated_by_id, 'alice');
        assert.strictEqual(db.activations[1].deactivated_by_name, 'Alice Example');
    });

    it('rolls back and reports the failing query', async () => {
        const db = new FakePolicyDatabase();
        db.failNext(POLICY_QUERIES.insertVersion, new Error('disk full'));
        const connection = await createConnector(db).connect(ALICE);

        await assert.rejects(
            connection.addVersion(attached('fails'), ALLOW_POLICY),
            (error: unknown) =>
                error instanceof PolicyStoreQueryError &&
                error.query === 'insertVersion' &&
                error.database === DATABASE &&
                error.statusCode === 500
        );
        connection.release();

        assert.strictEqual(db.statementsOf(1).at(-1), TX_ROLLBACK);
        assert.strictEqual(db.policies.length, 0);
        assert.strictEqual(db.destroyedClients, 0);
    });

    it('keeps using the connection after a rolled back transaction', async () => {
        const db = new FakePolicyDatabase();
        db.failNext(POLICY_QUERIES.insertActivation);
        const connection = await createConnector(db).connect(ALICE);

        await assert.rejects(connection.activate(1), PolicyStoreQueryError);
        await connection.activate(1);
        connection.release();

        assert.strictEqual(db.activations.length, 1);
        assert.strictEqual(db.activations[0].version, 1);
    });

    it('destroys the client when COMMIT fails', async () => {
        const db = new FakePolicyDatabase();
        db.failNext(TX_COMMIT, new Error('connection terminated'));
        const connection = await createConnector(db).connect(ALICE);

        await assert.rejects(
            connection.addVersion(attached('lost'), ALLOW_POLICY),
            (error: unknown) => error instanceof PolicyStoreQueryError && error.query === 'addVersion:commit'
        );
        connection.release();

        assert.strictEqual(db.destroyedClients, 1);
    });

    it('destroys the client when ROLLBACK fails', async () => {
        const db = new FakePolicyDatabase();
        db.failNext(POLICY_QUERIES.latestActivation);
        db.failNext(TX_ROLLBACK);
        const connection = await createConnector(db).connect(ALICE);

        await assert.rejects(connection.deactivate(), PolicyStoreQueryError);
        connection.release();

        assert.strictEqual(db.destroyedClients, 1);
    });

    it('sends nothing when the signal aborted before the mutation started', async () => {
        const db = new FakePolicyDatabase();
        const controller = new AbortController();
        const connection = await createConnector(db).connect(ALICE, { signal: controller.signal });
        controller.abort();

        await assert.rejects(connection.addVersion(attached('gone'), ALLOW_POLICY), PolicyStoreAbortedError);
        connection.release();

        assert.deepStrictEqual(db.statementsOf(1), []);
    });

    it('rolls back when the signal aborts while waiting for the lock', async () => {
        const db = new FakePolicyDatabase();
        const blocker = await db.connect();
        await blocker.query(TX_BEGIN);
        await blocker.query(POLICY_QUERIES.lockLedger);

        const controller = new AbortController();
        const connection = await createConnector(db).connect(ALICE, { signal: controller.signal });
        const pending = connection.addVersion(attached('late'), ALLOW_POLICY);
        await new Promise(resolve => setImmediate(resolve));

        controller.abort();
        await blocker.query(TX_COMMIT);

        await assert.rejects(pending, PolicyStoreAbortedError);
        connection.release();
        blocker.release();

        assert.deepStrictEqual(db.statementsOf(2), [TX_BEGIN, POLICY_QUERIES.lockLedger, TX_ROLLBACK]);
        assert.strictEqual(db.policies.length, 0);
        assert.strictEqual(db.destroyedClients, 0);
    });

    it('serializes concurrent writers through the table lock', async () => {
        const db = new FakePolicyDatabase();
        const connector = createConnector(db);
        const first = await connector.connect(ALICE);
        const second = await connector.connect(ALICE);

        const versions = await Promise.all([
            first.addVersion(attached('one'), ALLOW_POLICY),
            second.addVersion(attached('two'), ALLOW_POLICY),
        ]);
        first.release();
        second.release();

        assert.deepStrictEqual(versions, [1, 2]);
        assert.deepStrictEqual(db.policies.map(row => row.name), ['one', 'two']);
    });

    it('fails to connect when the pool is exhausted', async () => {
        const db = new FakePolicyDatabase(1);
        const connector = createConnector(db);
        const held = await connector.connect(ALICE);

        await assert.rejects(
            connector.connect(ALICE),
            (error: unknown) => error instanceof PolicyStoreConnectError && error.database === DATABASE
        );

        held.release();
        const next = await connector.connect(ALICE);
        next.release();
        assert.strictEqual(db.openClients, 0);
    });

    it('releases the client only once', async () => {
        const db = new FakePolicyDatabase();
        const connection = await createConnector(db).connect(ALICE);

        connection.release();
        connection.release();

        assert.strictEqual(db.releasedClients, 1);
    });

    it('rejects rows that do not match the expected shape', async () => {
        const db = new FakePolicyDatabase();
        db.policies.push({
            version: 1,
            name: 'legacy',
            description: '',
            language: 'eflint',
            creator_id: 'alice',
            creator_name: 'Alice Example',
            created_at: new Date('not a date'),
            content: '{}',
        });
        const connection = await createConnector(db).connect(ALICE);

        await assert.rejects(
            connection.getVersionMetadata(1),
            (error: unknown) => error instanceof PolicyStoreQueryError && error.query === 'versionMetadata'
        );
        connection.release();
    });

    it('ends the pool on close', async () => {
        const db = new FakePolicyDatabase();
        await createConnector(db).close();

        assert.strictEqual(db.ended, true);
    });
});
