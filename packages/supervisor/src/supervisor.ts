/**
 * Supervises one ffmpeg run.
 *
 * Three activities share the child:
 * - the stderr pump feeds every character to the progress notifier
 * - the stdin pump forwards host keystrokes to the child
 * - the signal watch aborts the whole program on interrupt
 *
 * The run moves through `starting → running → draining → exited` and
 * resolves to the child's exit code.
 */

import { spawn as nodeSpawn, type SpawnOptions } from 'child_process';
import type { Readable, Writable } from 'stream';
import {
    ProgressNotifier,
    type RendererSettings,
    type TextOutput,
} from '@ffmeter/progress';
import { sleep, waitWithTimeout } from '@ffmeter/utils';
import { ProcessStartError } from './errors.js';
import { NullKeySource, type KeySource } from './key-source.js';
import {
    signalExitCode,
    watchSignals,
    type SignalSource,
} from './signals.js';

/** Default child executable. */
export const DEFAULT_BINARY = 'ffmpeg';
/** Delay between keystroke polls. */
export const DEFAULT_POLL_INTERVAL_MS = 50;
/** Time the pumps are given to finish once the child has exited. */
export const DEFAULT_DRAIN_GRACE_MS = 1000;

/**
 * Lifecycle phase of a supervised run.
 */
export type SupervisorPhase = 'starting' | 'running' | 'draining' | 'exited';

/**
 * The parts of a `ChildProcess` the supervisor uses.
 */
export interface ChildHandle {
    readonly stdin: Writable | null;
    readonly stderr: Readable | null;
    on(event: 'spawn', listener: () => void): this;
    on(event: 'error', listener: (error: Error) => void): this;
    on(
        event: 'exit',
        listener: (code: number | null, signal: NodeJS.Signals | null) => void,
    ): this;
}

/**
 * Starts the child; `child_process.spawn` in production.
 */
export type SpawnFunction = (
    command: string,
    args: readonly string[],
    options: SpawnOptions,
) => ChildHandle;

/**
 * Receives debug messages from the supervisor.
 */
export interface SupervisorLogger {
    debug(message: string): void;
}

/**
 * Options for a supervised run.
 */
export interface ProcessSupervisorOptions {
    /** Arguments forwarded verbatim to the child. */
    args: readonly string[];
    /** Executable to run (default: `ffmpeg`). */
    binary?: string;
    /** Stream for progress, prompts, echo and the failure summary (default: stderr). */
    output?: TextOutput;
    /** Notifier to feed; one writing to `output` is created when omitted. */
    notifier?: ProgressNotifier;
    /** Renderer settings for the notifier created when `notifier` is omitted. */
    renderer?: RendererSettings;
    /** Keystroke source (default: none). */
    keys?: KeySource;
    /** Where interrupt signals are received (default: `process`). */
    signals?: SignalSource;
    /** Terminates the program on interrupt (default: `process.exit`). */
    exit?: (code: number) => void;
    /** Child process factory (default: `child_process.spawn`). */
    spawn?: SpawnFunction;
    /** Keystroke poll interval in milliseconds. */
    pollIntervalMs?: number;
    /** Drain grace period in milliseconds. */
    drainGraceMs?: number;
    /** Debug logger. */
    logger?: SupervisorLogger;
    /** Called on every phase change. */
    onPhase?: (phase: SupervisorPhase) => void;
}

interface ExitStatus {
    code: number | null;
    signal: NodeJS.Signals | null;
}

const defaultSpawn: SpawnFunction = (command, args, options) =>
    nodeSpawn(command, args, options);

const silentLogger: SupervisorLogger = { debug: () => {} };

/**
 * Maps a child's exit status to the wrapper's exit code.
 *
 * @param status - Exit code and signal reported by the child
 * @returns The code itself, 128 + signal number when killed, otherwise 1
 */
export function toExitCode(status: ExitStatus): number {
    if (status.code !== null) {
        return status.code;
    }
    if (status.signal !== null) {
        return signalExitCode(status.signal);
    }
    return 1;
}

/**
 * Runs ffmpeg with a live progress bar.
 *
 * @example
 * ```typescript
 * const supervisor = new ProcessSupervisor({
 *     args: ['-i', 'in.mp4', 'out.webm'],
 *     keys: new TtyKeySource(),
 * });
 * process.exitCode = await supervisor.run();
 * ```
 */
export class ProcessSupervisor {
    private readonly args: readonly string[];
    private readonly binary: string;
    private readonly output: TextOutput;
    private readonly notifier: ProgressNotifier;
    private readonly keys: KeySource;
    private readonly signals: SignalSource;
    private readonly exit: (code: number) => void;
    private readonly spawn: SpawnFunction;
    private readonly pollIntervalMs: number;
    private readonly drainGraceMs: number;
    private readonly logger: SupervisorLogger;
    private readonly onPhase?: (phase: SupervisorPhase) => void;

    private currentPhase: SupervisorPhase | undefined;
    private childExited = false;

    constructor(options: ProcessSupervisorOptions) {
        this.args = options.args;
        this.binary = options.binary ?? DEFAULT_BINARY;
        this.output = options.output ?? process.stderr;
        this.notifier =
            options.notifier ??
            new ProgressNotifier({
                output: this.output,
                renderer: options.renderer,
            });
        this.keys = options.keys ?? new NullKeySource();
        this.signals = options.signals ?? process;
        this.exit = options.exit ?? ((code) => process.exit(code));
        this.spawn = options.spawn ?? defaultSpawn;
        this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
        this.drainGraceMs = options.drainGraceMs ?? DEFAULT_DRAIN_GRACE_MS;
        this.logger = options.logger ?? silentLogger;
        this.onPhase = options.onPhase;
    }

    /** The current phase, undefined before {@link run} is called. */
    get phase(): SupervisorPhase | undefined {
        return this.currentPhase;
    }

    /**
     * Starts the child and supervises it until it exits.
     *
     * @returns The child's exit code
     * @throws {ProcessStartError} If the child cannot be started
     */
    async run(): Promise<number> {
        this.setPhase('starting');
        this.logger.debug(`spawning ${this.binary} ${this.args.join(' ')}`);

        const child = this.startChild();
        const exited = new Promise<ExitStatus>((resolve) => {
            child.on('exit', (code, signal) => {
                this.childExited = true;
                resolve({ code, signal });
            });
        });
        await this.waitForSpawn(child);

        this.setPhase('running');
        const unwatch = watchSignals(this.signals, (signal) =>
            this.interrupt(signal),
        );

        try {
            this.keys.start(() => this.interrupt('SIGINT'));
            const stdinPump = this.pumpStdin(child.stdin);

            const stderrDone = this.pumpStderr(child.stderr);
            const status = await exited;

            this.setPhase('draining');
            const [stderrClosed, stopped] = await Promise.all([
                waitWithTimeout(stderrDone, this.drainGraceMs),
                waitWithTimeout(stdinPump, this.drainGraceMs),
            ]);
            if (!stderrClosed) {
                // another process still holds the pipe
                this.logger.debug('stderr still open after grace period');
                child.stderr?.destroy();
            }
            if (!stopped) {
                this.logger.debug('stdin pump still busy after grace period');
            }
            child.stdin?.destroy();

            this.setPhase('exited');
            this.notifier.dispose();

            const exitCode = toExitCode(status);
            this.logger.debug(`${this.binary} exited with code ${exitCode}`);
            if (exitCode !== 0) {
                this.output.write(`${this.notifier.getLastLine()}\n`);
            }
            return exitCode;
        } finally {
            this.keys.stop();
            unwatch();
            this.notifier.dispose();
        }
    }

    private setPhase(phase: SupervisorPhase): void {
        this.currentPhase = phase;
        this.onPhase?.(phase);
    }

    private startChild(): ChildHandle {
        try {
            return this.spawn(this.binary, this.args, {
                stdio: ['pipe', 'inherit', 'pipe'],
                shell: false,
                windowsHide: true,
            });
        } catch (error) {
            throw new ProcessStartError(this.binary, toError(error));
        }
    }

    /**
     * Resolves once the child is running; rejects if it never starts.
     * The error listener stays attached so later child errors are logged
     * rather than raised as unhandled events.
     */
    private waitForSpawn(child: ChildHandle): Promise<void> {
        return new Promise<void>((resolve, reject) => {
            let spawned = false;
            child.on('spawn', () => {
                spawned = true;
                resolve();
            });
            child.on('error', (error) => {
                if (!spawned) {
                    reject(new ProcessStartError(this.binary, error));
                    return;
                }
                this.logger.debug(`child error: ${error.message}`);
            });
        });
    }

    /**
     * Feeds stderr to the notifier in arrival order until the stream ends.
     * Keeps running after the child exits so buffered output is not lost.
     */
    private pumpStderr(stderr: Readable | null): Promise<void> {
        if (!stderr) {
            return Promise.resolve();
        }

        return new Promise<void>((resolve) => {
            stderr.setEncoding('utf8');
            stderr.on('data', (chunk: string | Buffer) => {
                try {
                    this.notifier.processChunk(chunk.toString());
                } catch (error) {
                    this.logger.debug(
                        `stderr pump: ${toError(error).message}`,
                    );
                }
            });
            stderr.on('error', (error) => {
                this.logger.debug(`stderr stream: ${error.message}`);
                resolve();
            });
            stderr.on('end', () => resolve());
            stderr.on('close', () => resolve());
        });
    }

    /**
     * Forwards keystrokes to the child until it exits.
     */
    private async pumpStdin(stdin: Writable | null): Promise<void> {
        stdin?.on('error', (error) => {
            this.logger.debug(`stdin stream: ${error.message}`);
        });

        while (!this.childExited) {
            try {
                let key = this.keys.read();
                while (key !== undefined && !this.childExited) {
                    const forwarded = key === '\r' || key === '\n' ? '\n' : key;
                    this.output.write(forwarded);
                    stdin?.write(forwarded);
                    key = this.keys.read();
                }
            } catch (error) {
                this.logger.debug(`stdin pump: ${toError(error).message}`);
            }
            await sleep(this.pollIntervalMs);
        }
    }

    /**
     * Aborts the program immediately, skipping all cleanup.
     */
    private interrupt(signal: NodeJS.Signals): void {
        this.output.write('Exiting.\n');
        this.exit(signalExitCode(signal));
    }
}

function toError(value: unknown): Error {
    return value instanceof Error ? value : new Error(String(value));
}
