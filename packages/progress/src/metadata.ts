/**
 * Metadata extraction from ffmpeg diagnostic lines.
 *
 * Each extractor is a pure function of one completed line and returns
 * `undefined` when the line carries no matching signal, which is the common
 * case.
 */

const DURATION_PATTERN = /Duration: (\d{2}):(\d{2}):(\d{2})\.\d{2}/;
const PROGRESS_PATTERN = /time=(\d{2}):(\d{2}):(\d{2})\.\d{2}/;
const SOURCE_PATTERN = /from '(.*)':/;

/**
 * Any number of digits on either side of the point, so rates such as
 * `5 fps` and `119.88 fps` are read whole rather than only two-digit ones.
 */
const FPS_PATTERN = /(\d+\.\d+|\d+) fps/;

/**
 * Converts the three captured clock groups of a match into whole seconds.
 */
function clockToSeconds(match: RegExpMatchArray): number {
    const hours = parseInt(match[1] ?? '0', 10);
    const minutes = parseInt(match[2] ?? '0', 10);
    const seconds = parseInt(match[3] ?? '0', 10);
    return (hours * 60 + minutes) * 60 + seconds;
}

/**
 * Rounds to the nearest integer, resolving ties to the even neighbour.
 *
 * @param value - The value to round
 * @returns The rounded integer
 */
export function roundHalfEven(value: number): number {
    const floor = Math.floor(value);
    const diff = value - floor;
    if (diff > 0.5) return floor + 1;
    if (diff < 0.5) return floor;
    return floor % 2 === 0 ? floor : floor + 1;
}

/**
 * Extracts the input duration from a `Duration: HH:MM:SS.ff` header line.
 * Fractional seconds are discarded.
 *
 * @param line - A completed diagnostic line
 * @returns Total seconds, or undefined if the line has no duration
 *
 * @example
 * ```typescript
 * extractDuration('  Duration: 01:02:03.00, start: 0.000000'); // 3723
 * ```
 */
export function extractDuration(line: string): number | undefined {
    const match = line.match(DURATION_PATTERN);
    return match ? clockToSeconds(match) : undefined;
}

/**
 * Extracts the elapsed media time from a `time=HH:MM:SS.ff` status line.
 *
 * @param line - A completed diagnostic line
 * @returns Current position in whole seconds, or undefined
 */
export function extractProgressSeconds(line: string): number | undefined {
    const match = line.match(PROGRESS_PATTERN);
    return match ? clockToSeconds(match) : undefined;
}

/**
 * Extracts the input file name from an `Input #0, ..., from '<path>':` line.
 * Only the final path segment is returned.
 *
 * @param line - A completed diagnostic line
 * @returns The source file name, or undefined
 */
export function extractSource(line: string): string | undefined {
    const match = line.match(SOURCE_PATTERN);
    if (!match) {
        return undefined;
    }
    const path = match[1] ?? '';
    const segments = path.split(/[\\/]/);
    return segments[segments.length - 1] ?? '';
}

/**
 * Extracts a frame rate from `<digits>.<digits> fps` or `<digits> fps`.
 *
 * The first occurrence on the line wins; no attempt is made to tell the
 * video stream's rate apart from other `fps` mentions.
 *
 * @param line - A completed diagnostic line
 * @returns Frames per second rounded to an integer, or undefined
 */
export function extractFrameRate(line: string): number | undefined {
    const match = line.match(FPS_PATTERN);
    if (!match) {
        return undefined;
    }
    const fps = parseFloat(match[1] ?? '');
    return Number.isFinite(fps) ? roundHalfEven(fps) : undefined;
}
