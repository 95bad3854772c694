import type { ProtectedHeaderParameters } from 'jose';
import type { ClientFault } from './clientFault.js';
import type { TwoLevelOutcome } from './outcome.js';

/**
 * Maps the (unverified) header of a token to the key that must verify it.
 */
export interface KeyResolver<TClient extends ClientFault, TServer extends Error> {
    resolveKey(header: ProtectedHeaderParameters): Promise<TwoLevelOutcome<Uint8Array, TClient, TServer>>;
}
