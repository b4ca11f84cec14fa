/**
 * Console logging for the CLI.
 *
 * Debug lines are timestamped and only written when verbose; fatal errors
 * are a single red line. Both go to stderr so they never mix with the
 * child's stdout.
 */

import chalk, { Chalk, type ChalkInstance } from 'chalk';
import type { TextOutput } from '@ffmeter/progress';

/**
 * Options for {@link createLogger}.
 */
export interface LoggerOptions {
    /** Write debug lines. */
    verbose?: boolean;
    /** Destination (default: stderr). */
    stream?: TextOutput;
    /** Colorize output (default: chalk's detected support). */
    color?: boolean;
    /** Clock used for timestamps. */
    now?: () => Date;
}

export interface Logger {
    debug(message: string): void;
    error(message: string): void;
}

/**
 * Formats a time as `HH:MM:SS.mmm`.
 */
export function formatTimestamp(date: Date): string {
    return (
        date.toLocaleTimeString('en-US', {
            hour12: false,
            hour: '2-digit',
            minute: '2-digit',
            second: '2-digit',
        }) +
        '.' +
        date.getMilliseconds().toString().padStart(3, '0')
    );
}

/**
 * Creates a chalk instance honouring an explicit color choice.
 */
export function createPainter(color?: boolean): ChalkInstance {
    if (color === undefined) {
        return chalk;
    }
    return new Chalk({ level: color ? chalk.level || 1 : 0 });
}

/**
 * Creates a logger writing to stderr.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ verbose: true });
 * logger.debug('spawning ffmpeg');
 * ```
 */
export function createLogger(options: LoggerOptions = {}): Logger {
    const stream = options.stream ?? process.stderr;
    const paint = createPainter(options.color);
    const now = options.now ?? (() => new Date());

    return {
        debug(message) {
            if (!options.verbose) {
                return;
            }
            stream.write(
                paint.gray(`[${formatTimestamp(now())}] ${message}`) + '\n',
            );
        },
        error(message) {
            stream.write(paint.red(message) + '\n');
        },
    };
}
