/**
 * src/sources/httpRetry.ts
 *
 * GET-with-retry for the upstream JSON APIs.
 *
 * Retried: network failures and timeouts, HTTP 429 and 500/502/503/504.
 * Backoff formula (attempt n = the n-th retry):
 *   delay = Retry-After (when the server sent one) else backoffBaseMs × 2^(n-1)
 *
 * Two timeouts are tracked separately: the connect timeout runs until the
 * response headers arrive, the read timeout runs while the body streams.
 * JSearch can take a long time to stream a multi-page result.
 */

import { log } from '@crawlee/core';
import { sleep as defaultSleep, type Sleep } from '../utils/sleep.js';

// ─── Types ────────────────────────────────────────────────────────────────────

export interface RetryPolicy {
    maxAttempts: number;
    backoffBaseMs: number;
    connectTimeoutMs: number;
    readTimeoutMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
    maxAttempts: 6,
    backoffBaseMs: 1_500,
    connectTimeoutMs: 10_000,
    readTimeoutMs: 90_000,
};

export const RETRYABLE_STATUSES: ReadonlySet<number> = new Set([429, 500, 502, 503, 504]);

export interface HttpDeps {
    fetchImpl?: typeof fetch;
    sleep?: Sleep;
    now?: () => number;
}

export class HttpStatusError extends Error {
    constructor(
        readonly status: number,
        readonly url: string,
        readonly bodySnippet: string,
    ) {
        super(`HTTP ${status} from ${new URL(url).host}: ${bodySnippet}`);
        this.name = 'HttpStatusError';
    }
}

export class HttpTimeoutError extends Error {
    constructor(readonly phase: 'connect' | 'read', readonly timeoutMs: number) {
        super(`${phase} timeout after ${timeoutMs}ms`);
        this.name = 'HttpTimeoutError';
    }
}

// ─── Backoff Calculation ──────────────────────────────────────────────────────

export function backoffDelayMs(retryNumber: number, baseMs: number): number {
    return Math.round(baseMs * Math.pow(2, Math.max(0, retryNumber - 1)));
}

/**
 * Retry-After is either delta-seconds or an HTTP date.
 * Returns milliseconds to wait, or null when absent/unparseable.
 */
export function parseRetryAfter(header: string | null, now: number = Date.now()): number | null {
    if (!header) return null;
    const trimmed = header.trim();
    if (/^\d+(\.\d+)?$/.test(trimmed)) {
        return Math.round(Number(trimmed) * 1000);
    }
    const at = Date.parse(trimmed);
    if (Number.isNaN(at)) return null;
    return Math.max(0, at - now);
}

// ─── Single Attempt ───────────────────────────────────────────────────────────

interface RawResponse {
    status: number;
    retryAfter: string | null;
    body: string;
}

async function attemptOnce(
    url: string,
    headers: Record<string, string>,
    policy: RetryPolicy,
    fetchImpl: typeof fetch,
): Promise<RawResponse> {
    const controller = new AbortController();
    let phase: 'connect' | 'read' = 'connect';
    let timer = setTimeout(() => controller.abort(), policy.connectTimeoutMs);

    try {
        const response = await fetchImpl(url, { headers, signal: controller.signal });
        clearTimeout(timer);

        phase = 'read';
        timer = setTimeout(() => controller.abort(), policy.readTimeoutMs);
        const body = await response.text();

        return {
            status: response.status,
            retryAfter: response.headers.get('retry-after'),
            body,
        };
    } catch (err) {
        if (controller.signal.aborted) {
            throw new HttpTimeoutError(
                phase,
                phase === 'connect' ? policy.connectTimeoutMs : policy.readTimeoutMs,
            );
        }
        throw err;
    } finally {
        clearTimeout(timer);
    }
}

// ─── Public API ───────────────────────────────────────────────────────────────

/**
 * GET `url` and parse its JSON body, retrying transient failures.
 *
 * Throws the last error once attempts are exhausted, or immediately on a
 * non-retryable status. Callers decide how to degrade.
 */
export async function getJsonWithRetry(
    url: string,
    headers: Record<string, string>,
    policy: RetryPolicy = DEFAULT_RETRY_POLICY,
    deps: HttpDeps = {},
): Promise<unknown> {
    const fetchImpl = deps.fetchImpl ?? globalThis.fetch;
    const sleep = deps.sleep ?? defaultSleep;
    const now = deps.now ?? Date.now;
    const host = new URL(url).host;

    let lastError: unknown = new Error('no attempt made');

    for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
        let retryAfterMs: number | null = null;

        try {
            const res = await attemptOnce(url, headers, policy, fetchImpl);

            if (res.status >= 200 && res.status < 300) {
                return JSON.parse(res.body);
            }

            const error = new HttpStatusError(res.status, url, res.body.slice(0, 200));
            if (!RETRYABLE_STATUSES.has(res.status)) throw error;

            lastError = error;
            retryAfterMs = parseRetryAfter(res.retryAfter, now());
        } catch (err) {
            if (err instanceof HttpStatusError || err instanceof SyntaxError) throw err;
            lastError = err;
        }

        if (attempt < policy.maxAttempts) {
            const waitMs = retryAfterMs ?? backoffDelayMs(attempt, policy.backoffBaseMs);
            log.warning(
                `[HTTP] ${host} attempt ${attempt}/${policy.maxAttempts} failed ` +
                `(${errorMessage(lastError)}). Retrying in ${(waitMs / 1000).toFixed(1)}s`,
            );
            await sleep(waitMs);
        }
    }

    throw lastError;
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
