/**
 * A failure the caller can fix by sending a different request.
 * Carries the HTTP status it should be answered with.
 */
export interface ClientFault extends Error {
    readonly code: string;
    readonly statusCode: number;
}
