/**
 * Single-line terminal progress bar.
 *
 * Repaints one line in place: the previous line is blanked with spaces, the
 * cursor returned with `\r`, and the new content written. Rendering failures
 * are dropped so that drawing can never take down the host process.
 */

import { terminal } from './terminal.js';
import type {
    ProgressBar,
    RenderSnapshot,
    TextOutput,
} from './types.js';

/**
 * Sentinel total for a bar whose length is unknown. Counts are shown without
 * a total and no ETA is computed.
 */
export const UNBOUNDED_TICKS = Number.MAX_SAFE_INTEGER;

/** Columns kept free for the title, percentage, counts and times. */
const RESERVED_COLUMNS = 50;
const MIN_BAR_WIDTH = 20;
const MAX_BAR_WIDTH = 60;
const FALLBACK_BAR_WIDTH = 20;

const UNICODE_GLYPHS = { filled: '█', empty: '░' } as const;
const ASCII_GLYPHS = { filled: '#', empty: '-' } as const;

/**
 * Options for the progress renderer.
 */
export interface ProgressRendererOptions {
    /** Total ticks; {@link UNBOUNDED_TICKS} when unknown. */
    total: number;
    /** Label printed before the percentage. */
    title?: string;
    /** Unit printed after the counts, e.g. `frames`. */
    unit?: string;
    /** Destination of the progress line (defaults to stderr). */
    output?: TextOutput;
    /** Size the bar from the terminal width (default: true). */
    dynamicColumns?: boolean;
    /** Bar width when dynamic columns are off (default: 20). */
    barWidth?: number;
    /** Use `#` and `-` instead of block glyphs (default: on Windows). */
    ascii?: boolean;
    /** Terminal width probe; may throw or return undefined. */
    columns?: () => number | undefined;
    /** Clock in milliseconds. */
    now?: () => number;
}

/**
 * Formats whole seconds as `mm:ss`, minutes wrapping at the hour.
 *
 * @param seconds - Duration in seconds
 * @returns The formatted clock
 */
export function formatClock(seconds: number): string {
    const whole = Math.max(0, Math.floor(seconds));
    const minutes = Math.floor(whole / 60) % 60;
    const secs = whole % 60;
    return `${String(minutes).padStart(2, '0')}:${String(secs).padStart(2, '0')}`;
}

/**
 * Live progress bar drawn on a single terminal line.
 *
 * All state changes happen inside synchronous methods, so a repaint from
 * {@link advance} and the final repaint from {@link close} can never
 * interleave their writes.
 *
 * @example
 * ```typescript
 * const bar = new ProgressRenderer({ total: 3723, title: 'clip.mp4', unit: 'seconds' });
 * bar.advance(10);
 * bar.close();
 * ```
 */
export class ProgressRenderer implements ProgressBar {
    private tick = 0;
    private lastRendered = '';
    private isClosed = false;

    private readonly total: number;
    private readonly title: string;
    private readonly unit: string;
    private readonly output: TextOutput;
    private readonly dynamicColumns: boolean;
    private readonly fixedWidth: number;
    private readonly glyphs: { readonly filled: string; readonly empty: string };
    private readonly columns: () => number | undefined;
    private readonly now: () => number;
    private readonly startTime: number;

    constructor(options: ProgressRendererOptions) {
        this.total = options.total;
        this.title = options.title ?? '';
        this.unit = options.unit ?? '';
        this.output = options.output ?? process.stderr;
        this.dynamicColumns = options.dynamicColumns ?? true;
        this.fixedWidth = options.barWidth ?? FALLBACK_BAR_WIDTH;
        this.glyphs =
            (options.ascii ?? terminal.isWindows())
                ? ASCII_GLYPHS
                : UNICODE_GLYPHS;
        this.columns = options.columns ?? terminal.getWidth;
        this.now = options.now ?? Date.now;
        this.startTime = this.now();

        this.render();
    }

    get currentTick(): number {
        return this.tick;
    }

    get totalTicks(): number {
        return this.total;
    }

    get closed(): boolean {
        return this.isClosed;
    }

    /** Whether the total is a real length rather than the unbounded sentinel. */
    get isBounded(): boolean {
        return this.total > 0 && this.total !== UNBOUNDED_TICKS;
    }

    /** The text of the most recent repaint. */
    get line(): string {
        return this.lastRendered;
    }

    /**
     * Moves the bar forward and repaints. Non-positive deltas are ignored and
     * the count never passes the total.
     *
     * @param delta - Ticks to add
     */
    advance(delta: number): void {
        if (this.isClosed || delta <= 0) {
            return;
        }
        this.tick = Math.min(this.tick + delta, this.total);
        this.render();
    }

    /**
     * Completes the bar: fills it when the total is known, repaints once and
     * ends the line. Later calls do nothing.
     */
    close(): void {
        if (this.isClosed) {
            return;
        }
        this.isClosed = true;

        if (this.isBounded && this.tick < this.total) {
            this.tick = this.total;
        }
        this.render();

        try {
            this.output.write('\n');
        } catch {
            // nothing more to draw
        }
    }

    /**
     * Computes the derived values for the current state.
     */
    snapshot(): RenderSnapshot {
        const elapsedSeconds = Math.max(
            0,
            (this.now() - this.startTime) / 1000,
        );
        const progress = this.total > 0 ? this.tick / this.total : 0;
        const barWidth = this.getBarWidth();
        const filled = Math.min(barWidth, Math.floor(progress * barWidth));

        const snapshot: RenderSnapshot = {
            progress,
            percentage: Math.round(progress * 100),
            barWidth,
            filled,
            empty: barWidth - filled,
            elapsedSeconds,
        };

        if (progress > 0 && this.isBounded) {
            const remaining = elapsedSeconds / progress - elapsedSeconds;
            if (remaining > 0) {
                snapshot.remainingSeconds = remaining;
            }
        }

        return snapshot;
    }

    /**
     * Builds the progress line for a snapshot.
     */
    private formatLine(snapshot: RenderSnapshot): string {
        let line = '';

        if (this.title) {
            line += `${this.title}: `;
        }

        line += `${snapshot.percentage}% `;
        line +=
            '|' +
            this.glyphs.filled.repeat(snapshot.filled) +
            this.glyphs.empty.repeat(snapshot.empty) +
            '|';

        line += this.isBounded
            ? ` ${this.tick}/${this.total}`
            : ` ${this.tick}`;

        if (this.unit) {
            line += ` ${this.unit}`;
        }

        if (snapshot.elapsedSeconds > 0) {
            line += ` [${formatClock(snapshot.elapsedSeconds)}`;
            if (snapshot.remainingSeconds !== undefined) {
                line += `<${formatClock(snapshot.remainingSeconds)}`;
            }
            line += ']';
        }

        return line;
    }

    private getBarWidth(): number {
        if (!this.dynamicColumns) {
            return this.fixedWidth;
        }

        try {
            const width = this.columns();
            if (width === undefined || !Number.isFinite(width) || width <= 0) {
                return FALLBACK_BAR_WIDTH;
            }
            const reserved = this.title.length + RESERVED_COLUMNS;
            const available = Math.max(MIN_BAR_WIDTH, width - reserved);
            return Math.min(MAX_BAR_WIDTH, available);
        } catch {
            return FALLBACK_BAR_WIDTH;
        }
    }

    private render(): void {
        try {
            const line = this.formatLine(this.snapshot());
            const blank = ' '.repeat(
                Math.max(this.lastRendered.length, line.length),
            );
            this.output.write(`\r${blank}\r${line}`);
            this.lastRendered = line;
        } catch {
            // skip this repaint
        }
    }
}
