/**
 * `@ffmeter/progress`
 *
 * Parses ffmpeg's diagnostic stream and renders a single-line progress bar.
 *
 * @packageDocumentation
 */

export {
    ProgressNotifier,
    DEFAULT_TITLE,
    type ProgressNotifierOptions,
    type RendererFactory,
    type RendererSettings,
} from './progress-notifier.js';

export {
    ProgressRenderer,
    UNBOUNDED_TICKS,
    formatClock,
    type ProgressRendererOptions,
} from './renderer.js';

export {
    LineAccumulator,
    PROMPT_SUFFIX,
    type LineAccumulatorOptions,
} from './line-accumulator.js';

export {
    extractDuration,
    extractProgressSeconds,
    extractSource,
    extractFrameRate,
    roundHalfEven,
} from './metadata.js';

export { Latch, type LatchState } from './latch.js';

export { terminal } from './terminal.js';

export type {
    TextOutput,
    StreamMetadata,
    RenderSnapshot,
    ProgressBar,
} from './types.js';
