import type { AuthResolver } from '../contracts/authResolver.js';
import { accepted, type TwoLevelOutcome } from '../contracts/outcome.js';
import { PLACEHOLDER_DISPLAY_NAME, type Identity } from '../context/identity.js';

export const NOOP_IDENTITY: Identity = Object.freeze({ id: 'johnsmith', name: PLACEHOLDER_DISPLAY_NAME });

/**
 * Lets everything through as the same fixed identity. Local development only;
 * refused by the config guard in production.
 */
export class NoOpAuthResolver implements AuthResolver<Identity, never, never> {
    async authorize(): Promise<TwoLevelOutcome<Identity, never, never>> {
        return accepted(NOOP_IDENTITY);
    }
}
