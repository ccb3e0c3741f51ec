/**
 * Readiness Waiter — bounded wait for a config provider to come online.
 *
 * Two activities race to one arbitration point:
 *   - a polling loop (isOnline → shouldRetry → backoff sleep → repeat)
 *   - a deadline timer (absent when timeoutMs <= 0: wait forever)
 *
 * On every exit path the timer is cleared, the loop is stopped through an
 * AbortSignal checked at its only suspension point (the backoff sleep), and
 * the loop is awaited, so no provider call happens after the wait settles.
 */

import { Config } from './config_document';
import { ErrorFactory, isEngineError } from './engine_error';
import { Logger } from './logger';
import { Provider } from './provider';

type PollOutcome = 'online' | 'not-online' | 'stopped';

// Node fires any longer setTimeout delay after 1ms
export const MAX_TIMER_DELAY_MS = 2 ** 31 - 1;

/**
 * Call `fn` once `ms` have elapsed, re-arming in MAX_TIMER_DELAY_MS chunks
 * for longer delays. Returns a cancel function.
 */
export function armTimer(ms: number, fn: () => void): () => void {
    const deadline = Date.now() + Math.max(0, ms);
    let timer: NodeJS.Timeout;

    const arm = (delay: number) => {
        timer = setTimeout(() => {
            const remaining = deadline - Date.now();
            if (remaining > 0) {
                arm(Math.min(remaining, MAX_TIMER_DELAY_MS));
                return;
            }
            fn();
        }, delay);
    };
    arm(Math.min(Math.max(0, ms), MAX_TIMER_DELAY_MS));

    return () => clearTimeout(timer);
}

/** Resolves true after `ms`, or false as soon as `signal` aborts. */
function sleep(ms: number, signal: AbortSignal): Promise<boolean> {
    return new Promise((resolve) => {
        if (signal.aborted) {
            resolve(false);
            return;
        }
        const onAbort = () => {
            cancel();
            resolve(false);
        };
        const cancel = armTimer(ms, () => {
            signal.removeEventListener('abort', onAbort);
            resolve(true);
        });
        signal.addEventListener('abort', onAbort, { once: true });
    });
}

async function pollProvider(provider: Provider, signal: AbortSignal, logger?: Logger): Promise<PollOutcome> {
    let attempt = 0;
    while (true) {
        if (provider.isOnline()) {
            return 'online';
        }
        if (!provider.shouldRetry()) {
            return 'not-online';
        }

        const wait = provider.backoffDuration();
        logger?.debug(`provider ${provider.name} not online, retrying in ${wait}ms`, { attempt });
        attempt++;

        if (!(await sleep(wait, signal))) {
            return 'stopped';
        }
    }
}

/**
 * Wait for `provider` to come online. Rejects with NOT_ONLINE when the
 * provider gives up, TIMED_OUT when `timeoutMs` (> 0) elapses first.
 */
export async function waitForProvider(provider: Provider, timeoutMs: number, logger?: Logger): Promise<void> {
    const stop = new AbortController();
    const polling = pollProvider(provider, stop.signal, logger);

    let cancelDeadline = () => { };
    const expired = new Promise<'expired'>((resolve) => {
        if (timeoutMs > 0) {
            cancelDeadline = armTimer(timeoutMs, () => resolve('expired'));
        }
    });

    try {
        // polling listed first: when both have settled, online wins
        const outcome = await Promise.race([polling, expired]);
        switch (outcome) {
            case 'online':
                return;
            case 'not-online':
                throw ErrorFactory.notOnline(provider.name);
            case 'expired':
                throw ErrorFactory.timedOut(provider.name, timeoutMs);
            case 'stopped':
                // only reachable after abort, which happens below
                throw ErrorFactory.notOnline(provider.name);
        }
    } finally {
        cancelDeadline();
        stop.abort();
        await polling;
    }
}

/**
 * Wait for the provider, then fetch its config once. EngineErrors from the
 * provider pass through; anything else becomes FETCH_FAILED.
 */
export async function fetchConfig(provider: Provider, timeoutMs: number, logger?: Logger): Promise<Config> {
    await waitForProvider(provider, timeoutMs, logger);

    try {
        return await provider.fetchConfig();
    } catch (e) {
        if (isEngineError(e)) throw e;
        throw ErrorFactory.fetchFailed(provider.name, e);
    }
}
