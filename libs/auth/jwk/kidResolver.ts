import fs from 'node:fs';
import { base64url, type ProtectedHeaderParameters } from 'jose';
import { z } from 'zod';
import { accepted, rejected, type TwoLevelOutcome } from '../../contracts/outcome.js';
import type { KeyResolver } from '../../contracts/keyResolver.js';
import { logger } from '../../logging/logger.js';
import { KeyResolveError, KeyStoreError } from './errors.js';

const JwkSchema = z.object({
    kty: z.string(),
    kid: z.string().optional(),
    alg: z.string().optional(),
    use: z.string().optional(),
    k: z.string().optional(),
}).passthrough();

const JwkSetSchema = z.object({
    keys: z.array(JwkSchema),
});

export type JwkEntry = z.infer<typeof JwkSchema>;
export type JwkSet = z.infer<typeof JwkSetSchema>;

const BASE64URL = /^[A-Za-z0-9_-]+$/;

const log = logger.child({ component: 'KidResolver' });

/**
 * Resolves a token's `kid` against an octet key set loaded once at startup.
 * The map is immutable after construction, so one instance can serve every
 * request concurrently.
 */
export class KidResolver implements KeyResolver<KeyResolveError, KeyStoreError> {
    private readonly keys: ReadonlyMap<string, Uint8Array>;

    /**
     * @param source where the set came from; only used in errors
     * @throws KeyStoreError on a non-octet key or undecodable key material
     */
    constructor(keySet: JwkSet, source = '<inline>') {
        const keys = new Map<string, Uint8Array>();

        keySet.keys.forEach((jwk, index) => {
            if (jwk.kid === undefined) {
                log.warn({ path: source, index }, 'Skipping key without key ID');
                return;
            }
            if (keys.has(jwk.kid)) {
                log.warn({ path: source, kid: jwk.kid }, 'Skipping duplicate key ID; first occurrence wins');
                return;
            }
            if (jwk.kty !== 'oct') {
                throw new KeyStoreError(
                    'KEY_TYPE_UNSUPPORTED',
                    source,
                    `Key '${jwk.kid}' in ${source} has unsupported type '${jwk.kty}' (only octet keys are supported)`,
                    { kid: jwk.kid }
                );
            }
            if (jwk.k === undefined || !BASE64URL.test(jwk.k)) {
                throw new KeyStoreError(
                    'KEY_DECODE_FAILED',
                    source,
                    `Key '${jwk.kid}' in ${source} has no valid base64url key material`,
                    { kid: jwk.kid }
                );
            }
            keys.set(jwk.kid, base64url.decode(jwk.k));
        });

        this.keys = keys;
        log.info({ path: source, keyCount: keys.size }, 'Key store loaded');
    }

    /**
     * Loads the key set at `path`.
     * @throws KeyStoreError if the file is missing, malformed or holds unusable keys
     */
    static fromFile(path: string): KidResolver {
        let raw: string;
        try {
            raw = fs.readFileSync(path, 'utf-8');
        } catch (error) {
            throw new KeyStoreError('KEYSTORE_READ_FAILED', path, `Failed to read keystore file ${path}`, { cause: error });
        }

        let parsed: unknown;
        try {
            parsed = JSON.parse(raw);
        } catch (error) {
            throw new KeyStoreError('KEYSTORE_PARSE_FAILED', path, `Keystore file ${path} is not valid JSON`, { cause: error });
        }

        const result = JwkSetSchema.safeParse(parsed);
        if (!result.success) {
            throw new KeyStoreError(
                'KEYSTORE_PARSE_FAILED',
                path,
                `Keystore file ${path} is not a JSON Web Key Set`,
                { cause: result.error }
            );
        }
        return new KidResolver(result.data, path);
    }

    get size(): number {
        return this.keys.size;
    }

    async resolveKey(header: ProtectedHeaderParameters): Promise<TwoLevelOutcome<Uint8Array, KeyResolveError, KeyStoreError>> {
        const kid = header.kid;
        if (kid === undefined) {
            return rejected(new KeyResolveError('KEY_ID_MISSING'));
        }

        log.debug({ kid }, 'Finding key');
        const key = this.keys.get(kid);
        if (key === undefined) {
            return rejected(new KeyResolveError('KEY_ID_UNKNOWN', kid));
        }
        return accepted(key);
    }
}
