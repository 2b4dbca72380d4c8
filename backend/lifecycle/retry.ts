export class AbortError extends Error {
    constructor(message = "Aborted") {
        super(message);
        this.name = "AbortError";
    }
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
        if (signal?.aborted) {
            reject(new AbortError());
            return;
        }
        const onAbort = () => {
            clearTimeout(timer);
            reject(new AbortError());
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener("abort", onAbort);
            resolve();
        }, ms);
        signal?.addEventListener("abort", onAbort, { once: true });
    });
}

export type PollResult<T> =
    | { done: true; value: T; attempts: number }
    | { done: false; attempts: number };

export interface PollOptions {
    intervalMs: number;
    maxAttempts: number;
    signal?: AbortSignal;
}

/**
 * Calls `probe` up to `maxAttempts` times, sleeping `intervalMs` between calls, until it
 * returns something other than undefined. Errors thrown by `probe` propagate.
 */
export async function pollUntil<T>(options: PollOptions, probe: (attempt: number) => Promise<T | undefined>): Promise<PollResult<T>> {
    for (let attempt = 1; attempt <= options.maxAttempts; attempt++) {
        if (options.signal?.aborted) {
            throw new AbortError();
        }
        const value = await probe(attempt);
        if (value !== undefined) {
            return { done: true,
                value,
                attempts: attempt };
        }
        if (attempt < options.maxAttempts) {
            await sleep(options.intervalMs, options.signal);
        }
    }
    return { done: false,
        attempts: options.maxAttempts };
}
