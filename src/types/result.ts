// Success value or typed failure, for operations that must not throw
export type Result<T, E extends Error> =
    | { ok: true; value: T }
    | { ok: false; error: E };

export function success<T>(value: T): { ok: true; value: T } {
    return { ok: true, value };
}

export function failure<E extends Error>(error: E): { ok: false; error: E } {
    return { ok: false, error };
}
