import { logThought } from './logger.js';

/** Configuration for the retry helper. */
export interface RetryOptions {
    /** Maximum number of attempts (including the first). @default 3 */
    maxAttempts?: number;
    /** Base delay in ms before the first retry. @default 1000 */
    baseDelayMs?: number;
    /** Multiplier applied to the delay after each failed attempt. @default 2 */
    backoffFactor?: number;
    /** Maximum delay cap in ms. @default 15000 */
    maxDelayMs?: number;
    /** Returns false for errors that another attempt cannot fix. Defaults to retrying everything. */
    shouldRetry?: (error: unknown) => boolean;
    /** Label used in log messages for traceability. */
    label?: string;
}

/** Result of a retried operation. */
export type RetryResult<T> =
    | { ok: true; value: T; attempts: number; totalDurationMs: number }
    | { ok: false; error: string; cause: unknown; attempts: number; totalDurationMs: number };

const DEFAULTS = {
    maxAttempts: 3,
    baseDelayMs: 1000,
    backoffFactor: 2,
    maxDelayMs: 15_000,
} as const;

/**
 * Execute an async function with bounded exponential backoff retry.
 *
 * Delay doubles after each attempt (capped at `maxDelayMs`). An error rejected
 * by `shouldRetry` ends the loop at once.
 *
 * @example
 * ```ts
 * const result = await withRetry(
 *   () => adapter.complete(messages, system, 1000),
 *   { maxAttempts: 2, label: 'summary:complete' },
 * );
 * ```
 */
export async function withRetry<T>(
    fn: () => Promise<T>,
    options: RetryOptions = {},
): Promise<RetryResult<T>> {
    const maxAttempts = Math.max(1, Math.floor(options.maxAttempts ?? DEFAULTS.maxAttempts));
    const baseDelayMs = Math.max(0, options.baseDelayMs ?? DEFAULTS.baseDelayMs);
    const backoffFactor = options.backoffFactor ?? DEFAULTS.backoffFactor;
    const maxDelayMs = options.maxDelayMs ?? DEFAULTS.maxDelayMs;
    const shouldRetry = options.shouldRetry ?? (() => true);
    const label = options.label ?? 'unnamed';

    const start = Date.now();
    let lastError = '';
    let lastCause: unknown = undefined;
    let attempt = 0;

    while (attempt < maxAttempts) {
        attempt++;
        try {
            const value = await fn();
            const totalDurationMs = Date.now() - start;

            if (attempt > 1) {
                void logThought(
                    `[Retry] ${label} succeeded on attempt ${attempt}/${maxAttempts} (${totalDurationMs}ms).`,
                );
            }

            return { ok: true, value, attempts: attempt, totalDurationMs };
        } catch (err) {
            lastCause = err;
            lastError = err instanceof Error ? err.message : String(err);

            if (!shouldRetry(err)) {
                void logThought(`[Retry] ${label} failed with a non-retryable error: ${lastError}.`);
                break;
            }

            if (attempt < maxAttempts) {
                const delay = Math.min(baseDelayMs * backoffFactor ** (attempt - 1), maxDelayMs);
                void logThought(
                    `[Retry] ${label} attempt ${attempt}/${maxAttempts} failed: ${lastError}. Retrying in ${delay}ms.`,
                );
                await sleep(delay);
            } else {
                void logThought(
                    `[Retry] ${label} exhausted all ${maxAttempts} attempts. Last error: ${lastError}.`,
                );
            }
        }
    }

    return {
        ok: false,
        error: lastError,
        cause: lastCause,
        attempts: attempt,
        totalDurationMs: Date.now() - start,
    };
}

function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}
