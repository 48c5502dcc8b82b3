export class TimeoutError extends Error {
    readonly timeoutMs: number;

    constructor(label: string, timeoutMs: number) {
        super(`${label} timed out after ${timeoutMs}ms.`);
        this.name = 'TimeoutError';
        this.timeoutMs = timeoutMs;
    }
}

/**
 * Runs `task` with a fresh AbortSignal and rejects with {@link TimeoutError}
 * once `timeoutMs` elapses, aborting the signal so the in-flight request stops.
 * A non-positive timeout disables the bound.
 */
export async function withTimeout<T>(
    task: (signal: AbortSignal) => Promise<T>,
    timeoutMs: number,
    label: string,
): Promise<T> {
    const controller = new AbortController();
    if (!(timeoutMs > 0)) {
        return task(controller.signal);
    }

    let timeoutHandle: NodeJS.Timeout | null = null;
    const timeoutPromise = new Promise<never>((_, reject) => {
        timeoutHandle = setTimeout(() => {
            controller.abort();
            reject(new TimeoutError(label, timeoutMs));
        }, timeoutMs);
    });

    try {
        return await Promise.race([task(controller.signal), timeoutPromise]);
    } finally {
        if (timeoutHandle) {
            clearTimeout(timeoutHandle);
        }
    }
}
