/**
 * Tagged result used at every fallible capability seam.
 *
 * Auth capabilities nest two of these: the outer level carries server faults
 * (nothing the caller can fix), the inner level carries client faults.
 */
export type Outcome<T, E> =
    | { readonly ok: true; readonly value: T }
    | { readonly ok: false; readonly error: E };

/**
 * Outcome of a capability that can fail on either side of the wire.
 */
export type TwoLevelOutcome<T, C, S> = Outcome<Outcome<T, C>, S>;

export function ok<T>(value: T): { readonly ok: true; readonly value: T } {
    return { ok: true, value };
}

export function err<E>(error: E): { readonly ok: false; readonly error: E } {
    return { ok: false, error };
}

/** Wraps a successful value in both levels. */
export function accepted<T>(value: T): Outcome<Outcome<T, never>, never> {
    return ok(ok(value));
}

/** A client-side rejection: the server itself did fine. */
export function rejected<C>(error: C): Outcome<Outcome<never, C>, never> {
    return ok(err(error));
}

/** A server-side fault. */
export function failed<S>(error: S): Outcome<never, S> {
    return err(error);
}
