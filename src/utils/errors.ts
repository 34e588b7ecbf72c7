import type { BackendName } from '../sources/types.js';

export type BuilderErrorCode = 'MALFORMED_ATTRIBUTES' | 'NO_QUERIES';

/** Input could not be turned into a search. Raised before any network call. */
export class BuilderError extends Error {
    constructor(
        message: string,
        public readonly code: BuilderErrorCode,
    ) {
        super(message);
        this.name = 'BuilderError';
    }
}

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

export type BackendErrorKind = 'timeout' | 'rate_limited' | 'parse_failure' | 'transport_failure';

/**
 * A single backend call failed. Always recoverable: the executor moves on to
 * the next backend, then to the next query.
 */
export class BackendError extends Error {
    constructor(
        message: string,
        public readonly kind: BackendErrorKind,
        public readonly backend: BackendName,
        public readonly statusCode?: number,
    ) {
        super(message);
        this.name = 'BackendError';
    }
}

function errorCode(err: unknown): string | undefined {
    if (typeof err !== 'object' || err === null || !('code' in err)) return undefined;
    return typeof err.code === 'string' ? err.code : undefined;
}

export function isTimeoutError(err: unknown): boolean {
    if (!(err instanceof Error)) return false;
    return err.name === 'TimeoutError'
        || err.name === 'AbortError'
        || errorCode(err) === 'ETIMEDOUT';
}

export function toBackendError(err: unknown, backend: BackendName): BackendError {
    if (err instanceof BackendError) return err;
    const message = err instanceof Error ? err.message : String(err);
    if (isTimeoutError(err)) {
        return new BackendError(`Request timed out: ${message}`, 'timeout', backend);
    }
    return new BackendError(message, 'transport_failure', backend);
}
