/**
 * Turns ffmpeg's diagnostic stream into progress bar updates.
 *
 * Header lines latch the duration, input name and frame rate; each
 * `time=` marker then moves the bar forward. When a frame rate is known,
 * both sides of the ratio are counted in frames instead of seconds.
 */

import { Latch } from './latch.js';
import { LineAccumulator } from './line-accumulator.js';
import {
    extractDuration,
    extractFrameRate,
    extractProgressSeconds,
    extractSource,
} from './metadata.js';
import {
    ProgressRenderer,
    UNBOUNDED_TICKS,
    type ProgressRendererOptions,
} from './renderer.js';
import type { ProgressBar, StreamMetadata, TextOutput } from './types.js';

/** Title used when the input name was never printed. */
export const DEFAULT_TITLE = 'Processing';

/**
 * Creates the bar once the first progress marker arrives.
 */
export type RendererFactory = (options: ProgressRendererOptions) => ProgressBar;

/**
 * Renderer settings that come from the host rather than from the stream.
 */
export type RendererSettings = Omit<
    ProgressRendererOptions,
    'total' | 'title' | 'unit' | 'output'
>;

/**
 * Options for the progress notifier.
 */
export interface ProgressNotifierOptions {
    /** Stream for the progress line and passed-through prompts (defaults to stderr). */
    output?: TextOutput;
    /** Settings forwarded to every renderer this notifier creates. */
    renderer?: RendererSettings;
    /** Renderer constructor, replaceable in tests. */
    createRenderer?: RendererFactory;
}

const defaultFactory: RendererFactory = (options) =>
    new ProgressRenderer(options);

/**
 * Consumes the child's stderr and drives a progress bar.
 *
 * @example
 * ```typescript
 * const notifier = new ProgressNotifier();
 * child.stderr.setEncoding('utf8');
 * child.stderr.on('data', (chunk: string) => notifier.processChunk(chunk));
 * child.on('close', () => notifier.dispose());
 * ```
 */
export class ProgressNotifier {
    private readonly output: TextOutput;
    private readonly accumulator: LineAccumulator;
    private readonly rendererSettings: RendererSettings;
    private readonly createRenderer: RendererFactory;

    private readonly duration = new Latch<number>();
    private readonly source = new Latch<string>();
    private readonly fps = new Latch<number>();

    private bar: ProgressBar | undefined;
    private disposed = false;

    constructor(options: ProgressNotifierOptions = {}) {
        this.output = options.output ?? process.stderr;
        this.rendererSettings = options.renderer ?? {};
        this.createRenderer = options.createRenderer ?? defaultFactory;
        this.accumulator = new LineAccumulator({
            output: this.output,
            isProgressVisible: () => this.bar !== undefined,
        });
    }

    /** The bar, once the first progress marker has created it. */
    get renderer(): ProgressBar | undefined {
        return this.bar;
    }

    /** Snapshot of the latched stream metadata. */
    get metadata(): StreamMetadata {
        return {
            totalSeconds: this.duration.value,
            framesPerSecond: this.fps.value,
            sourceName: this.source.value,
        };
    }

    /**
     * Consumes one character of the diagnostic stream.
     *
     * @param char - The next character
     */
    processChar(char: string): void {
        const line = this.accumulator.processChar(char);
        if (line !== undefined) {
            this.processLine(line);
        }
    }

    /**
     * Consumes a decoded chunk, character by character, in order.
     *
     * @param text - A chunk of the diagnostic stream
     */
    processChunk(text: string): void {
        for (const char of text) {
            this.processChar(char);
        }
    }

    /**
     * The child's most recent completed diagnostic line.
     */
    getLastLine(): string {
        return this.accumulator.lastLine;
    }

    /**
     * Finishes the bar. Safe to call more than once, and a no-op when no
     * progress marker was ever seen.
     */
    dispose(): void {
        if (this.disposed) {
            return;
        }
        this.disposed = true;
        this.bar?.close();
    }

    private processLine(line: string): void {
        if (!this.duration.isSet) {
            this.duration.offer(extractDuration(line));
        }
        if (!this.source.isSet) {
            this.source.offer(extractSource(line));
        }
        if (!this.fps.isSet) {
            this.fps.offer(extractFrameRate(line));
        }

        const currentSeconds = extractProgressSeconds(line);
        if (currentSeconds === undefined || this.disposed) {
            return;
        }

        const fps = this.fps.value;
        const duration = this.duration.value;
        const current = fps !== undefined ? currentSeconds * fps : currentSeconds;
        const total =
            duration !== undefined && fps !== undefined
                ? duration * fps
                : duration;

        if (!this.bar) {
            this.bar = this.createRenderer({
                ...this.rendererSettings,
                total: total ?? UNBOUNDED_TICKS,
                title: this.source.value ?? DEFAULT_TITLE,
                unit: fps !== undefined ? 'frames' : 'seconds',
                output: this.output,
            });
        }

        const delta = current - this.bar.currentTick;
        if (delta > 0) {
            this.bar.advance(delta);
        }
    }
}
