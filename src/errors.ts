/**
 * Error kinds and the result type every pipeline stage returns.
 * Stages never throw for expected failures; the CLI runner is the single
 * place where a failed result is reported.
 */

export type ErrorKind =
    | 'InvalidArguments'
    | 'AddressError'
    | 'GeocodeError'
    | 'FetchError'
    | 'WeatherError';

export class WeatherAppError extends Error {
    readonly kind: ErrorKind;
    readonly details?: Record<string, string>;

    constructor(kind: ErrorKind, message: string, details?: Record<string, string>) {
        super(message);
        this.name = kind;
        this.kind = kind;
        this.details = details;
    }
}

export type Result<T, E = WeatherAppError> =
    | { ok: true; data: T }
    | { ok: false; error: E };

export function ok<T>(data: T): Result<T, never> {
    return { ok: true, data };
}

export function fail<E>(error: E): Result<never, E> {
    return { ok: false, error };
}

export function appError(
    kind: ErrorKind,
    message: string,
    details?: Record<string, string>
): Result<never, WeatherAppError> {
    return fail(new WeatherAppError(kind, message, details));
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
