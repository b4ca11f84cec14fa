/**
 * Sources of host keystrokes for forwarding to the child.
 *
 * The supervisor polls a source rather than waiting on it, so a source only
 * has to buffer what arrives and hand it out one key at a time.
 */

/** Ctrl-C as delivered by a terminal in raw mode. */
const CTRL_C = '\u0003';

/**
 * Polled keystroke source.
 */
export interface KeySource {
    /**
     * Begins collecting keys.
     *
     * @param onInterrupt - Called when the user asks to abort (Ctrl-C)
     */
    start(onInterrupt: () => void): void;
    /** The next buffered key, or undefined when none is waiting. */
    read(): string | undefined;
    /** Stops collecting and restores the input. */
    stop(): void;
}

/**
 * The parts of `process.stdin` a {@link TtyKeySource} uses.
 */
export interface KeyInput {
    readonly isTTY?: boolean;
    setRawMode?(mode: boolean): unknown;
    setEncoding(encoding: BufferEncoding): unknown;
    on(event: 'data', listener: (chunk: string | Buffer) => void): unknown;
    off(event: 'data', listener: (chunk: string | Buffer) => void): unknown;
    resume(): unknown;
    pause(): unknown;
}

/**
 * Reads keystrokes from a terminal.
 *
 * In raw mode every key arrives as soon as it is pressed, including Ctrl-C,
 * which no longer raises SIGINT and is reported through the interrupt
 * callback instead.
 */
export class TtyKeySource implements KeySource {
    private queue: string[] = [];
    private active = false;
    private interrupt: () => void = () => {};

    constructor(private readonly input: KeyInput = process.stdin) {}

    start(onInterrupt: () => void): void {
        if (this.active) {
            return;
        }
        this.active = true;
        this.interrupt = onInterrupt;

        if (this.input.isTTY && this.input.setRawMode) {
            this.input.setRawMode(true);
        }
        this.input.setEncoding('utf8');
        this.input.on('data', this.onData);
        this.input.resume();
    }

    read(): string | undefined {
        return this.queue.shift();
    }

    stop(): void {
        if (!this.active) {
            return;
        }
        this.active = false;

        this.input.off('data', this.onData);
        if (this.input.isTTY && this.input.setRawMode) {
            this.input.setRawMode(false);
        }
        this.input.pause();
        this.queue = [];
    }

    private readonly onData = (chunk: string | Buffer): void => {
        for (const key of chunk.toString()) {
            if (key === CTRL_C) {
                this.interrupt();
                continue;
            }
            this.queue.push(key);
        }
    };
}

/**
 * Key source for non-interactive runs: never yields a key.
 */
export class NullKeySource implements KeySource {
    start(): void {}

    read(): string | undefined {
        return undefined;
    }

    stop(): void {}
}
