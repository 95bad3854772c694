import type { IncomingHttpHeaders } from 'node:http';
import type { ClientFault } from './clientFault.js';
import type { TwoLevelOutcome } from './outcome.js';

/**
 * Turns the headers of an inbound request into an authenticated context.
 */
export interface AuthResolver<TContext, TClient extends ClientFault, TServer extends Error> {
    authorize(headers: IncomingHttpHeaders): Promise<TwoLevelOutcome<TContext, TClient, TServer>>;
}
