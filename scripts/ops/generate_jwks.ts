import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { exportJWK, generateSecret, type JWK } from 'jose';

/**
 * Writes a JSON Web Key Set holding one fresh HS256 octet key, in the format
 * the policy store loads from JWKS_PATH.
 */
export async function generateJwks(params: { kid: string; outPath: string }): Promise<JWK> {
    const secret = await generateSecret('HS256', { extractable: true });
    const jwk: JWK = { ...(await exportJWK(secret)), kid: params.kid, alg: 'HS256', use: 'sig' };

    fs.mkdirSync(path.dirname(params.outPath), { recursive: true });
    fs.writeFileSync(params.outPath, JSON.stringify({ keys: [jwk] }, null, 2), { mode: 0o600 });

    console.log(`Key set with key '${params.kid}' written to ${params.outPath}`);
    return jwk;
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
    const [kid = 'policy-store-key-1', outPath = path.join(process.cwd(), 'config', 'jwks.json')] = process.argv.slice(2);

    generateJwks({ kid, outPath }).catch((error: unknown) => {
        console.error('Failed to generate key set', error);
        process.exit(1);
    });
}
