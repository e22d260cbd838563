/**
 * Timeout Wrapper Utility
 *
 * Bounds how long the caller waits on an async operation. The operation itself
 * is never cancelled; it keeps running in the background.
 */

export class TimeoutError extends Error {
    constructor(
        label: string,
        public readonly timeoutMs: number
    ) {
        super(`${label} timed out after ${timeoutMs}ms`);
        this.name = 'TimeoutError';
    }
}

export type RaceResult<T> =
    | { timedOut: false; value: T }
    | { timedOut: true };

/**
 * Wait for `promise` at most `timeoutMs`.
 * Rejections of `promise` inside the window are passed through.
 */
export async function raceTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<RaceResult<T>> {
    let timeoutHandle: NodeJS.Timeout | undefined;

    const timeoutPromise = new Promise<RaceResult<T>>(resolve => {
        timeoutHandle = setTimeout(() => resolve({timedOut: true}), timeoutMs);
    });

    try {
        return await Promise.race([
            promise.then((value): RaceResult<T> => ({timedOut: false, value})),
            timeoutPromise
        ]);
    } finally {
        clearTimeout(timeoutHandle);
    }
}

/**
 * Execute an async function with timeout
 * @param fn - Function to execute
 * @param timeoutMs - Timeout in milliseconds
 * @param label - Label for error messages
 * @returns Promise that rejects with TimeoutError if timeout is exceeded
 */
export async function withTimeout<T>(
    fn: () => Promise<T>,
    timeoutMs: number,
    label: string = 'Operation'
): Promise<T> {
    const outcome = await raceTimeout(fn(), timeoutMs);
    if (outcome.timedOut) {
        throw new TimeoutError(label, timeoutMs);
    }
    return outcome.value;
}
