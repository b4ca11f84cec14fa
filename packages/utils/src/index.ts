/**
 * @ffmeter/utils
 *
 * Shared utility functions for ffmeter packages
 */

/**
 * The current version of ffmeter
 *
 * Used for displaying version information in the usage text.
 */
export const VERSION = '0.1.0';

/**
 * Resolves after the given number of milliseconds.
 *
 * @param ms - Delay in milliseconds
 */
export function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Waits for a promise to settle, giving up after a timeout.
 *
 * Unlike `Promise.race` against a rejecting timer, expiry is not an error:
 * the returned promise resolves to `false` and the original promise is left
 * to settle on its own. A rejection of the awaited promise is also reported
 * as `false`.
 *
 * @param promise - The promise to wait for
 * @param timeoutMs - Maximum time to wait in milliseconds
 * @returns True if the promise fulfilled within the timeout
 *
 * @example
 * ```ts
 * const stopped = await waitWithTimeout(pumpTask, 1000);
 * if (!stopped) {
 *     // best effort, carry on
 * }
 * ```
 */
export async function waitWithTimeout(
    promise: Promise<unknown>,
    timeoutMs: number,
): Promise<boolean> {
    let timer: NodeJS.Timeout | undefined;
    const expired = new Promise<boolean>((resolve) => {
        timer = setTimeout(() => resolve(false), timeoutMs);
    });

    try {
        return await Promise.race([
            promise.then(
                () => true,
                () => false,
            ),
            expired,
        ]);
    } finally {
        clearTimeout(timer);
    }
}
