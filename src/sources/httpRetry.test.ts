import { afterEach, describe, expect, it, vi } from 'vitest';
import {
    backoffDelayMs,
    getJsonWithRetry,
    HttpStatusError,
    HttpTimeoutError,
    parseRetryAfter,
    type RetryPolicy,
} from './httpRetry.js';

const URL_UNDER_TEST = 'https://api.example.test/search?q=1';

const policy: RetryPolicy = {
    maxAttempts: 3,
    backoffBaseMs: 1000,
    connectTimeoutMs: 1000,
    readTimeoutMs: 1000,
};

function json(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
    return new Response(JSON.stringify(body), { status, headers });
}

describe('getJsonWithRetry', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('retries a 503 with exponential backoff and returns the parsed body', async () => {
        const fetchSpy = vi.spyOn(globalThis, 'fetch')
            .mockResolvedValueOnce(new Response('busy', { status: 503 }))
            .mockResolvedValueOnce(json({ data: [1] }));
        const sleep = vi.fn(async (_ms: number) => {});

        await expect(getJsonWithRetry(URL_UNDER_TEST, {}, policy, { sleep })).resolves.toEqual({ data: [1] });
        expect(fetchSpy).toHaveBeenCalledTimes(2);
        expect(sleep).toHaveBeenCalledWith(1000);
    });

    it('honours Retry-After on 429', async () => {
        vi.spyOn(globalThis, 'fetch')
            .mockResolvedValueOnce(new Response('slow down', { status: 429, headers: { 'retry-after': '7' } }))
            .mockResolvedValueOnce(json({ ok: true }));
        const sleep = vi.fn(async (_ms: number) => {});

        await getJsonWithRetry(URL_UNDER_TEST, {}, policy, { sleep });
        expect(sleep).toHaveBeenCalledWith(7000);
    });

    it('retries network failures', async () => {
        vi.spyOn(globalThis, 'fetch')
            .mockRejectedValueOnce(new TypeError('fetch failed'))
            .mockResolvedValueOnce(json({ ok: true }));

        await expect(getJsonWithRetry(URL_UNDER_TEST, {}, policy, { sleep: async () => {} }))
            .resolves.toEqual({ ok: true });
    });

    it('does not retry a 404', async () => {
        const fetchSpy = vi.spyOn(globalThis, 'fetch').mockResolvedValueOnce(new Response('nope', { status: 404 }));
        const sleep = vi.fn(async (_ms: number) => {});

        await expect(getJsonWithRetry(URL_UNDER_TEST, {}, policy, { sleep })).rejects.toBeInstanceOf(HttpStatusError);
        expect(fetchSpy).toHaveBeenCalledTimes(1);
        expect(sleep).not.toHaveBeenCalled();
    });

    it('throws the last error once attempts run out', async () => {
        const fetchSpy = vi.spyOn(globalThis, 'fetch')
            .mockImplementation(async () => new Response('down', { status: 500 }));
        const sleep = vi.fn(async (_ms: number) => {});

        const error = await getJsonWithRetry(URL_UNDER_TEST, {}, policy, { sleep }).catch((e: unknown) => e);
        expect(error).toBeInstanceOf(HttpStatusError);
        expect(error).toMatchObject({ status: 500 });
        expect(fetchSpy).toHaveBeenCalledTimes(3);
        expect(sleep.mock.calls).toEqual([[1000], [2000]]);
    });

    it('reports a connect timeout when headers never arrive', async () => {
        vi.spyOn(globalThis, 'fetch').mockImplementation((_input, init) => new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
        }));

        const error = await getJsonWithRetry(
            URL_UNDER_TEST,
            {},
            { ...policy, maxAttempts: 1, connectTimeoutMs: 10 },
        ).catch((e: unknown) => e);

        expect(error).toBeInstanceOf(HttpTimeoutError);
        expect(error).toMatchObject({ phase: 'connect', timeoutMs: 10 });
    });
});

describe('backoffDelayMs', () => {
    it('doubles from the base', () => {
        expect(backoffDelayMs(1, 1500)).toBe(1500);
        expect(backoffDelayMs(2, 1500)).toBe(3000);
        expect(backoffDelayMs(3, 1500)).toBe(6000);
    });
});

describe('parseRetryAfter', () => {
    it('reads delta-seconds', () => {
        expect(parseRetryAfter('2', 0)).toBe(2000);
    });

    it('reads an HTTP date relative to now', () => {
        const now = Date.parse('Wed, 21 Oct 2026 07:28:00 GMT');
        expect(parseRetryAfter('Wed, 21 Oct 2026 07:28:05 GMT', now)).toBe(5000);
    });

    it('ignores missing or unparseable values', () => {
        expect(parseRetryAfter(null)).toBeNull();
        expect(parseRetryAfter('soon')).toBeNull();
    });
});
