import { describe, it } from 'node:test';
import assert from 'node:assert';
import { RequestContext } from '../../libs/context/requestContext.js';
import type { Identity } from '../../libs/context/identity.js';

const identityA: Identity = { id: 'user-A', name: 'User A' };
const identityB: Identity = { id: 'user-B', name: 'User B' };

describe('RequestContext', () => {
    it('should throw when accessing context outside run()', () => {
        assert.throws(() => RequestContext.get(), /MISSING_REQUEST_CONTEXT/);
        assert.strictEqual(RequestContext.tryGet(), undefined);
    });

    it('should return context inside run()', () => {
        const result = RequestContext.run(identityA, () => {
            assert.deepStrictEqual(RequestContext.get(), identityA);
            return 'success';
        });
        assert.strictEqual(result, 'success');
    });

    it('should hand out a frozen copy of the identity', () => {
        RequestContext.run(identityA, () => {
            const ctx = RequestContext.get();
            assert.notStrictEqual(ctx, identityA);
            assert.ok(Object.isFrozen(ctx));
        });
    });

    it('should maintain isolation between concurrent async requests', async () => {
        // Run two parallel async flows with delays to interleave execution
        const flowA = RequestContext.run(identityA, async () => {
            assert.deepStrictEqual(RequestContext.get(), identityA);
            await new Promise(resolve => setTimeout(resolve, 50));
            // Check again after await
            assert.deepStrictEqual(RequestContext.get(), identityA);
            return 'A';
        });

        const flowB = RequestContext.run(identityB, async () => {
            assert.deepStrictEqual(RequestContext.get(), identityB);
            await new Promise(resolve => setTimeout(resolve, 20));
            assert.deepStrictEqual(RequestContext.get(), identityB);
            return 'B';
        });

        const [resA, resB] = await Promise.all([flowA, flowB]);
        assert.strictEqual(resA, 'A');
        assert.strictEqual(resB, 'B');
    });
});
