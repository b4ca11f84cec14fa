/**
 * Environment configuration for the ffmeter CLI.
 *
 * Every setting is optional; an empty variable counts as unset.
 */

import { z } from 'zod';
import {
    DEFAULT_BINARY,
    DEFAULT_DRAIN_GRACE_MS,
    DEFAULT_POLL_INTERVAL_MS,
} from '@ffmeter/supervisor';
import { ConfigError } from './errors.js';

const TRUE_VALUES = ['1', 'true', 'yes', 'on'] as const;
const FALSE_VALUES = ['0', 'false', 'no', 'off'] as const;

const flag = z
    .string()
    .transform((value) => value.trim().toLowerCase())
    .pipe(z.enum([...TRUE_VALUES, ...FALSE_VALUES]))
    .transform((value) => TRUE_VALUES.some((accepted) => accepted === value));

const envSchema = z.object({
    FFMETER_FFMPEG: z.string().default(DEFAULT_BINARY),
    FFMETER_BAR_WIDTH: z.coerce.number().int().min(1).max(500).optional(),
    FFMETER_ASCII: flag.optional(),
    FFMETER_POLL_MS: z.coerce
        .number()
        .int()
        .min(1)
        .default(DEFAULT_POLL_INTERVAL_MS),
    FFMETER_DRAIN_MS: z.coerce
        .number()
        .int()
        .min(0)
        .default(DEFAULT_DRAIN_GRACE_MS),
    FFMETER_DEBUG: flag.default('0'),
});

/**
 * Resolved CLI settings.
 */
export interface Config {
    /** Executable started as the child. */
    binary: string;
    /** Fixed bar width; the bar follows the terminal width when unset. */
    barWidth?: number;
    /** Force (true) or forbid (false) ASCII glyphs; platform default when unset. */
    ascii?: boolean;
    /** Keystroke poll interval in milliseconds. */
    pollIntervalMs: number;
    /** Drain grace period in milliseconds. */
    drainGraceMs: number;
    /** Print debug log lines. */
    debug: boolean;
}

/**
 * Reads and validates the `FFMETER_*` variables.
 *
 * @param env - Environment to read (default: `process.env`)
 * @returns The resolved configuration
 * @throws {ConfigError} If a variable holds an invalid value
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
    const present: Record<string, string> = {};
    for (const [key, value] of Object.entries(env)) {
        if (key.startsWith('FFMETER_') && value !== undefined && value !== '') {
            present[key] = value;
        }
    }

    const result = envSchema.safeParse(present);
    if (!result.success) {
        const issue = result.error.issues[0];
        const variable = String(issue?.path[0] ?? 'environment');
        throw new ConfigError(variable, issue?.message ?? 'invalid value');
    }

    const parsed = result.data;
    return {
        binary: parsed.FFMETER_FFMPEG,
        barWidth: parsed.FFMETER_BAR_WIDTH,
        ascii: parsed.FFMETER_ASCII,
        pollIntervalMs: parsed.FFMETER_POLL_MS,
        drainGraceMs: parsed.FFMETER_DRAIN_MS,
        debug: parsed.FFMETER_DEBUG,
    };
}
