import test from 'node:test';
import assert from 'node:assert/strict';

import { EngineError, ErrorFactory } from '../src/engine_error';
import { fetchConfig, waitForProvider } from '../src/readiness_waiter';
import { Config } from '../src/config_document';
import { Provider } from '../src/provider';
import { FakeProvider, RecordingLogger } from './fakes';

function delay(ms: number): Promise<void> {
    return new Promise((r) => setTimeout(r, ms));
}

function hasCode(code: string) {
    return (err: unknown) => err instanceof EngineError && err.code === code;
}

test('resolves immediately when the provider is online on the first poll', async () => {
    const provider = new FakeProvider({ online: [true] });
    const started = Date.now();

    await waitForProvider(provider, 1000);

    assert.ok(Date.now() - started < 50);
    assert.deepEqual(provider.calls, ['isOnline']);
});

test('rejects with NOT_ONLINE without sleeping when the provider declines to retry', async () => {
    const provider = new FakeProvider({ online: [false], shouldRetry: false, backoffMs: 5000 });
    const started = Date.now();

    await assert.rejects(waitForProvider(provider, 1000), hasCode('NOT_ONLINE'));

    assert.ok(Date.now() - started < 50);
    assert.deepEqual(provider.calls, ['isOnline', 'shouldRetry']);
});

test('rejects with TIMED_OUT once the deadline passes', async () => {
    const provider = new FakeProvider({ online: [false], shouldRetry: true, backoffMs: 10 });
    const started = Date.now();

    await assert.rejects(waitForProvider(provider, 100), hasCode('TIMED_OUT'));

    const elapsed = Date.now() - started;
    // timers may fire a millisecond early and run late under load
    assert.ok(elapsed >= 95, `elapsed ${elapsed}ms`);
    assert.ok(elapsed < 100 + 10 + 150, `elapsed ${elapsed}ms`);
    assert.ok(provider.count('isOnline') >= 2);
});

test('comes online after a few backoff rounds', async () => {
    const provider = new FakeProvider({ online: [false, false, true], backoffMs: 5 });

    await waitForProvider(provider, 1000);

    assert.deepEqual(provider.calls, [
        'isOnline', 'shouldRetry', 'backoffDuration',
        'isOnline', 'shouldRetry', 'backoffDuration',
        'isOnline',
    ]);
});

test('stops polling after the wait settles', async () => {
    const provider = new FakeProvider({ online: [false], backoffMs: 10 });

    await assert.rejects(waitForProvider(provider, 50), hasCode('TIMED_OUT'));
    const callsAtReturn = provider.calls.length;

    await delay(60);

    assert.equal(provider.calls.length, callsAtReturn);
});

test('does not wait out a long backoff once the deadline fires', async () => {
    const provider = new FakeProvider({ online: [false], backoffMs: 10_000 });
    const started = Date.now();

    await assert.rejects(waitForProvider(provider, 30), hasCode('TIMED_OUT'));

    assert.ok(Date.now() - started < 1000);
    assert.deepEqual(provider.calls, ['isOnline', 'shouldRetry', 'backoffDuration']);
});

test('a timeout of zero or less waits for the provider indefinitely', async () => {
    const provider = new FakeProvider({ online: [false, false, false, true], backoffMs: 20 });

    await waitForProvider(provider, 0);

    assert.equal(provider.count('isOnline'), 4);
});

test('a deadline longer than the 32-bit timer limit does not fire early', async () => {
    const provider = new FakeProvider({ online: [false, false, false, false, false, true], backoffMs: 5 });
    const thirtyDays = 30 * 24 * 3600 * 1000;

    await waitForProvider(provider, thirtyDays);

    assert.equal(provider.count('isOnline'), 6);
});

test('a backoff longer than the 32-bit timer limit is not turned into a tight poll', async () => {
    const provider = new FakeProvider({ online: [false], backoffMs: 30 * 24 * 3600 * 1000 });

    await assert.rejects(waitForProvider(provider, 40), hasCode('TIMED_OUT'));

    assert.deepEqual(provider.calls, ['isOnline', 'shouldRetry', 'backoffDuration']);
});

test('online wins when the provider answers after the deadline has passed', async () => {
    let polls = 0;
    const provider: Provider = {
        name: 'slow',
        isOnline(): boolean {
            polls++;
            if (polls === 1) return false;
            // second poll blocks past the 20ms deadline, then reports online
            const until = Date.now() + 60;
            while (Date.now() < until) { /* spin */ }
            return true;
        },
        shouldRetry: () => true,
        backoffDuration: () => 5,
        fetchConfig: async (): Promise<Config> => ({}),
    };

    await waitForProvider(provider, 20);

    assert.equal(polls, 2);
});

test('backoff rounds are logged through the given logger', async () => {
    const provider = new FakeProvider({ online: [false, true], backoffMs: 5 });
    const logger = new RecordingLogger();

    await waitForProvider(provider, 1000, logger);

    assert.deepEqual(logger.lines, [
        { level: 'debug', prefixes: [], msg: 'provider fake not online, retrying in 5ms' },
    ]);
});

test('fetchConfig calls the provider fetch exactly once after readiness', async () => {
    const provider = new FakeProvider({ online: [false, true], backoffMs: 5, config: { version: 1 } });

    const cfg = await fetchConfig(provider, 1000);

    assert.deepEqual(cfg, { version: 1 });
    assert.equal(provider.count('fetchConfig'), 1);
    assert.equal(provider.calls[provider.calls.length - 1], 'fetchConfig');
});

test('fetchConfig never fetches when the provider does not come online', async () => {
    const provider = new FakeProvider({ online: [false], shouldRetry: false });

    await assert.rejects(fetchConfig(provider, 1000), hasCode('NOT_ONLINE'));

    assert.equal(provider.count('fetchConfig'), 0);
});

test('fetchConfig wraps provider failures as FETCH_FAILED', async () => {
    const provider = new FakeProvider({ fetchError: new Error('metadata service returned 500') });

    await assert.rejects(fetchConfig(provider, 1000), (err: unknown) => {
        assert.ok(err instanceof EngineError);
        assert.equal(err.code, 'FETCH_FAILED');
        assert.equal(err.message, 'provider fake failed to fetch config: metadata service returned 500');
        return true;
    });
});

test('fetchConfig passes ignorable config errors through unchanged', async () => {
    const sentinel = ErrorFactory.configEmpty();
    const provider = new FakeProvider({ fetchError: sentinel });

    await assert.rejects(fetchConfig(provider, 1000), (err: unknown) => err === sentinel);
});
