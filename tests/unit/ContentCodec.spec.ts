import { describe, it } from 'node:test';
import assert from 'node:assert';
import { z } from 'zod';
import { ContentCodecError, createJsonCodec } from '../../libs/policy/codec.js';
import { PolicyContentSchema } from '../../libs/validation/schema.js';

describe('JSON content codec', () => {
    const codec = createJsonCodec(PolicyContentSchema);

    it('serializes content as compact JSON', () => {
        assert.strictEqual(codec.serialize({ rule: 'allow', weight: 2 }), '{"rule":"allow","weight":2}');
        assert.strictEqual(codec.serialize('plain'), '"plain"');
    });

    it('decodes what it stored', () => {
        assert.deepStrictEqual(codec.deserialize('{"rules":[true,1,"x",null]}'), { rules: [true, 1, 'x', null] });
    });

    it('returns decoded content untouched, __proto__ keys included', () => {
        const raw = '{"__proto__":{"rule":"deny"},"rule":"allow"}';

        const decoded = codec.deserialize(raw);

        assert.deepStrictEqual(Object.keys(decoded), ['__proto__', 'rule']);
        assert.strictEqual(codec.serialize(decoded), raw);
    });

    it('rejects text that is not JSON', () => {
        assert.throws(
            () => codec.deserialize('{"rule":'),
            (error: unknown) => error instanceof ContentCodecError && error.message === 'Stored content is not valid JSON'
        );
    });

    it('rejects JSON that does not match the schema', () => {
        const strict = createJsonCodec(z.object({ rule: z.enum(['allow', 'deny']) }));

        assert.throws(
            () => strict.deserialize('{"rule":"maybe"}'),
            (error: unknown) =>
                error instanceof ContentCodecError &&
                error.message.startsWith('Stored content does not match its schema: rule: ')
        );
    });

    it('rejects a top-level null as policy content', () => {
        assert.throws(() => codec.deserialize('null'), /<root>: /);
    });

    it('refuses values without a JSON representation', () => {
        const loose = createJsonCodec(z.unknown());

        assert.throws(() => loose.serialize(undefined), /Content has no JSON representation/);
    });
});
