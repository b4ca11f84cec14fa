/**
 * `@ffmeter/cli` - Error definitions
 */

/**
 * Error thrown when an `FFMETER_*` variable holds an invalid value.
 */
export class ConfigError extends Error {
    readonly name = 'ConfigError';

    /**
     * @param variable - The offending environment variable
     * @param details - What is wrong with its value
     */
    constructor(
        public readonly variable: string,
        public readonly details: string,
    ) {
        super(`Invalid ${variable}: ${details}`);
    }
}
