/**
 * `@ffmeter/supervisor` - Error definitions
 */

/**
 * Error thrown when the child process cannot be started.
 */
export class ProcessStartError extends Error {
    readonly name = 'ProcessStartError';

    /**
     * @param binary - The executable that failed to start
     * @param cause - The underlying spawn error
     */
    constructor(
        public readonly binary: string,
        public readonly cause: Error,
    ) {
        super(`Failed to start ${binary} process: ${cause.message}`);
    }
}
