/**
 * `@ffmeter/progress` - Shared type definitions
 */

/**
 * Minimal text sink. `process.stderr` satisfies it, as does any test
 * double that records what was written.
 */
export interface TextOutput {
    write(text: string): unknown;
}

/**
 * Metadata latched from the diagnostic stream. Each field is set at most
 * once, on the first line that carries it.
 */
export interface StreamMetadata {
    /** Input duration in whole seconds. */
    totalSeconds?: number;
    /** Frame rate rounded to an integer. */
    framesPerSecond?: number;
    /** File name of the input. */
    sourceName?: string;
}

/**
 * Derived view of a progress bar, recomputed on every repaint.
 */
export interface RenderSnapshot {
    /** Fraction complete in [0, 1]. */
    progress: number;
    /** Whole-number percentage shown on the line. */
    percentage: number;
    /** Total segments in the bar. */
    barWidth: number;
    /** Filled segments. */
    filled: number;
    /** Empty segments. */
    empty: number;
    /** Wall time since the bar was created, in seconds. */
    elapsedSeconds: number;
    /** Estimated seconds remaining, when it can be computed and is positive. */
    remainingSeconds?: number;
}

/**
 * The operations a progress host needs from a bar.
 */
export interface ProgressBar {
    readonly currentTick: number;
    readonly totalTicks: number;
    readonly closed: boolean;
    advance(delta: number): void;
    close(): void;
}
