/**
 * Config provider contract.
 *
 * Providers are built outside the engine and injected. The readiness
 * predicates are polled in a loop, so they must be fast and must not block;
 * fetchConfig may take as long as it needs and is called at most once per
 * acquisition.
 */

import { Config } from './config_document';

export interface Provider {
    /** Used in log lines and error context. */
    readonly name: string;

    isOnline(): boolean;

    /** Whether polling isOnline again is worthwhile. */
    shouldRetry(): boolean;

    /** Milliseconds to wait before the next isOnline poll. */
    backoffDuration(): number;

    /**
     * Rejects with an EngineError for the ignorable CONFIG_* conditions;
     * any other rejection is reported as FETCH_FAILED.
     */
    fetchConfig(): Promise<Config>;
}
