/**
 * Engine error taxonomy
 *
 * Every failure the acquisition path can raise carries one code from a closed
 * union, so the engine boundary can classify outcomes with an exhaustive
 * switch instead of comparing against shared error instances.
 */

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export type EngineErrorCode =
    // Provider readiness
    | 'NOT_ONLINE'
    | 'TIMED_OUT'
    | 'FETCH_FAILED'

    // Config cache
    | 'CACHE_MISS'
    | 'CACHE_CORRUPT'
    | 'CACHE_SERIALIZE_FAILED'
    | 'CACHE_WRITE_FAILED'

    // Config content: deliberately no work for this stage
    | 'CONFIG_EMPTY'
    | 'CONFIG_CLOUD_CONFIG'
    | 'CONFIG_SCRIPT'

    // Config content: malformed
    | 'CONFIG_INVALID'

    // Dispatch
    | 'UNKNOWN_STAGE';

export type FailureClass = 'ignorable' | 'fatal';

export class EngineError extends Error {
    constructor(
        public readonly code: EngineErrorCode,
        message: string,
        public readonly context: Record<string, unknown> = {},
        cause?: unknown
    ) {
        super(message, cause === undefined ? undefined : { cause });
        this.name = 'EngineError';
    }
}

export function isEngineError(value: unknown): value is EngineError {
    return value instanceof EngineError;
}

/* -------------------------------------------------------------------------- */
/* Classification                                                             */
/* -------------------------------------------------------------------------- */

export function classifyCode(code: EngineErrorCode): FailureClass {
    switch (code) {
        case 'CONFIG_EMPTY':
        case 'CONFIG_CLOUD_CONFIG':
        case 'CONFIG_SCRIPT':
            return 'ignorable';
        case 'NOT_ONLINE':
        case 'TIMED_OUT':
        case 'FETCH_FAILED':
        case 'CACHE_MISS':
        case 'CACHE_CORRUPT':
        case 'CACHE_SERIALIZE_FAILED':
        case 'CACHE_WRITE_FAILED':
        case 'CONFIG_INVALID':
        case 'UNKNOWN_STAGE':
            return 'fatal';
        default: {
            const unreachable: never = code;
            return unreachable;
        }
    }
}

/** Anything that is not an EngineError is a fatal failure. */
export function classifyFailure(err: unknown): FailureClass {
    return isEngineError(err) ? classifyCode(err.code) : 'fatal';
}

export function describeError(err: unknown): string {
    if (err instanceof Error) {
        return err.message;
    }
    return String(err);
}

/* -------------------------------------------------------------------------- */
/* Error Factory Methods                                                      */
/* -------------------------------------------------------------------------- */

export class ErrorFactory {
    static notOnline(provider: string): EngineError {
        return new EngineError('NOT_ONLINE', 'config provider was not online', { provider });
    }

    static timedOut(provider: string, timeoutMs: number): EngineError {
        return new EngineError(
            'TIMED_OUT',
            'timed out while waiting for config provider to come online',
            { provider, timeout_ms: timeoutMs }
        );
    }

    static fetchFailed(provider: string, cause: unknown): EngineError {
        return new EngineError(
            'FETCH_FAILED',
            `provider ${provider} failed to fetch config: ${describeError(cause)}`,
            { provider },
            cause
        );
    }

    static cacheMiss(path: string, cause: unknown): EngineError {
        return new EngineError('CACHE_MISS', `config cache unreadable at ${path}: ${describeError(cause)}`, { path }, cause);
    }

    static cacheCorrupt(detail: string, cause?: unknown): EngineError {
        return new EngineError('CACHE_CORRUPT', `cached config is not a valid document: ${detail}`, {}, cause);
    }

    static cacheSerializeFailed(cause: unknown): EngineError {
        return new EngineError('CACHE_SERIALIZE_FAILED', `could not serialize config: ${describeError(cause)}`, {}, cause);
    }

    static cacheWriteFailed(path: string, cause: unknown): EngineError {
        return new EngineError('CACHE_WRITE_FAILED', `could not write config cache ${path}: ${describeError(cause)}`, { path }, cause);
    }

    static configEmpty(): EngineError {
        return new EngineError('CONFIG_EMPTY', 'not a config (empty)');
    }

    static configCloudConfig(): EngineError {
        return new EngineError('CONFIG_CLOUD_CONFIG', 'not a config (found cloud-config document)');
    }

    static configScript(): EngineError {
        return new EngineError('CONFIG_SCRIPT', 'not a config (found script)');
    }

    static configInvalid(detail: string, cause?: unknown): EngineError {
        return new EngineError('CONFIG_INVALID', `config is not valid: ${detail}`, {}, cause);
    }

    static unknownStage(name: string, known: readonly string[]): EngineError {
        return new EngineError('UNKNOWN_STAGE', `no stage registered under "${name}"`, { stage: name, known: [...known] });
    }
}
