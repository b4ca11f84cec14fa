/**
 * Command line handling for ffmeter.
 *
 * ffmeter has no options of its own: everything after the program name is
 * handed to ffmpeg untouched. commander describes the program for the usage
 * text but never parses the arguments, since it would consume `--`.
 */

import { Command } from 'commander';
import { VERSION } from '@ffmeter/utils';

/**
 * Parsed command line.
 */
export interface CliOptions {
    /** Arguments for ffmpeg, in their original order. */
    ffmpegArgs: string[];
}

const USAGE_EXAMPLES = [
    'ffmeter -i input.mp4 -c:v libx264 -crf 23 output.mp4',
    'ffmeter -i input.avi -c:v copy -c:a aac output.mp4',
    'ffmeter -i input.mov -vf scale=1280:720 -c:v libx264 output.mp4',
];

/**
 * Builds the commander program that names and describes the tool.
 */
export function createProgram(): Command {
    return new Command()
        .name('ffmeter')
        .description('A progress bar wrapper for ffmpeg');
}

/**
 * Collects the user's arguments. They are forwarded exactly as given,
 * `--` included.
 *
 * @param argv - Arguments without the node executable and script path
 * @returns The arguments to forward
 *
 * @example
 * ```typescript
 * parseArgs(['-i', 'in.mp4', '-y', 'out.webm']);
 * // { ffmpegArgs: ['-i', 'in.mp4', '-y', 'out.webm'] }
 * ```
 */
export function parseArgs(argv: readonly string[]): CliOptions {
    return { ffmpegArgs: [...argv] };
}

/**
 * The text printed when ffmeter is run without arguments.
 */
export function formatUsage(): string {
    const program = createProgram();
    return [
        `${program.name()} v${VERSION}`,
        program.description(),
        '',
        'Usage:',
        `  ${program.name()} [ffmpeg options]`,
        '',
        'Examples:',
        ...USAGE_EXAMPLES.map((example) => `  ${example}`),
        '',
        'This tool wraps ffmpeg and displays a progress bar during conversion.',
        'All ffmpeg options are supported - just pass them as arguments.',
    ].join('\n');
}
