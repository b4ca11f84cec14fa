/**
 * In-process stand-ins for a child process and a keyboard.
 */

import { EventEmitter } from 'events';
import { PassThrough } from 'stream';
import type { KeySource } from '../../src/key-source.js';

/**
 * Child double with real streams. Whatever the supervisor writes to stdin
 * is collected in `received`.
 */
export class FakeChild extends EventEmitter {
    readonly stdin = new PassThrough();
    readonly stderr = new PassThrough();
    received = '';

    constructor() {
        super();
        this.stdin.setEncoding('utf8');
        this.stdin.on('data', (chunk: string) => {
            this.received += chunk;
        });
    }

    /** Reports a successful start on the next turn of the event loop. */
    startSoon(): this {
        setImmediate(() => this.emit('spawn'));
        return this;
    }

    /** Reports a start failure on the next turn of the event loop. */
    failSoon(error: Error): this {
        setImmediate(() => this.emit('error', error));
        return this;
    }

    /** Writes diagnostic output, closes stderr and exits. */
    finish(
        stderrText: string,
        code: number | null,
        signal: NodeJS.Signals | null = null,
    ): void {
        this.stderr.end(stderrText);
        this.exit(code, signal);
    }

    /** Exits without closing stderr, as when a grandchild keeps the pipe. */
    exit(code: number | null, signal: NodeJS.Signals | null = null): void {
        this.emit('exit', code, signal);
    }
}

/**
 * Key source fed from a list; `interrupt()` simulates Ctrl-C.
 */
export class ScriptedKeys implements KeySource {
    started = false;
    stopped = false;
    private onInterrupt: () => void = () => {};

    constructor(private readonly keys: string[] = []) {}

    start(onInterrupt: () => void): void {
        this.started = true;
        this.onInterrupt = onInterrupt;
    }

    read(): string | undefined {
        return this.keys.shift();
    }

    stop(): void {
        this.stopped = true;
    }

    push(...keys: string[]): void {
        this.keys.push(...keys);
    }

    interrupt(): void {
        this.onInterrupt();
    }
}
