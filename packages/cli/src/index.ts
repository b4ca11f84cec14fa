/**
 * Entry point for the ffmeter CLI.
 *
 * Reads the configuration, starts ffmpeg under a {@link ProcessSupervisor}
 * and turns the outcome into the process exit code.
 */

import { terminal, type TextOutput } from '@ffmeter/progress';
import {
    NullKeySource,
    ProcessStartError,
    ProcessSupervisor,
    TtyKeySource,
    type ProcessSupervisorOptions,
} from '@ffmeter/supervisor';
import { formatUsage, parseArgs } from './cli.js';
import { loadConfig, type Config } from './config.js';
import { ConfigError } from './errors.js';
import { createLogger } from './logger.js';

/**
 * Anything that runs a supervised child and reports its exit code.
 */
export interface Runner {
    run(): Promise<number>;
}

/**
 * Overrides for the process-wide resources {@link main} uses.
 */
export interface MainOptions {
    /** Environment to configure from (default: `process.env`). */
    env?: NodeJS.ProcessEnv;
    /** Destination of the usage text (default: stdout). */
    stdout?: TextOutput;
    /** Destination of log and error lines (default: stderr). */
    stderr?: TextOutput;
    /** Colorize log and error lines (default: detected). */
    color?: boolean;
    /** Builds the runner (default: a {@link ProcessSupervisor}). */
    createSupervisor?: (options: ProcessSupervisorOptions) => Runner;
}

/**
 * Maps the configuration onto supervisor options.
 *
 * @param config - Resolved configuration
 * @param args - Arguments forwarded to ffmpeg
 */
export function supervisorOptions(
    config: Config,
    args: readonly string[],
): ProcessSupervisorOptions {
    return {
        args,
        binary: config.binary,
        pollIntervalMs: config.pollIntervalMs,
        drainGraceMs: config.drainGraceMs,
        keys: terminal.isInteractive() ? new TtyKeySource() : new NullKeySource(),
        renderer: {
            ...(config.barWidth !== undefined && {
                dynamicColumns: false,
                barWidth: config.barWidth,
            }),
            ...(config.ascii !== undefined && { ascii: config.ascii }),
        },
    };
}

/**
 * Runs the CLI.
 *
 * @param argv - Arguments without the node executable and script path
 * @returns The process exit code
 */
export async function main(
    argv: readonly string[],
    options: MainOptions = {},
): Promise<number> {
    const stdout = options.stdout ?? process.stdout;
    const stderr = options.stderr ?? process.stderr;
    const createSupervisor =
        options.createSupervisor ??
        ((supervisorOpts) => new ProcessSupervisor(supervisorOpts));

    if (argv.length === 0) {
        stdout.write(`${formatUsage()}\n`);
        return 0;
    }

    let logger = createLogger({ stream: stderr, color: options.color });

    try {
        const config = loadConfig(options.env ?? process.env);
        logger = createLogger({
            stream: stderr,
            color: options.color,
            verbose: config.debug,
        });

        const { ffmpegArgs } = parseArgs(argv);
        const supervisor = createSupervisor({
            ...supervisorOptions(config, ffmpegArgs),
            logger,
            onPhase: (phase) => logger.debug(`phase: ${phase}`),
        });
        return await supervisor.run();
    } catch (error) {
        if (error instanceof ProcessStartError || error instanceof ConfigError) {
            logger.error(error.message);
            return 1;
        }
        const message = error instanceof Error ? error.message : String(error);
        logger.error(`Unexpected exception: ${message}`);
        return 1;
    }
}

export { parseArgs, formatUsage, createProgram, type CliOptions } from './cli.js';
export { loadConfig, type Config } from './config.js';
export { createLogger, type Logger, type LoggerOptions } from './logger.js';
export { ConfigError } from './errors.js';
