/**
 * Splits a character stream into completed lines.
 *
 * ffmpeg rewrites its status line with `\r` and asks interactive questions
 * without a trailing newline, so both terminators complete a line and a
 * pending `[y/N] ` prompt is written through immediately.
 */

import type { TextOutput } from './types.js';

/** Suffix that marks an interactive confirmation prompt. */
export const PROMPT_SUFFIX = '[y/N] ';

/**
 * Options for the line accumulator.
 */
export interface LineAccumulatorOptions {
    /** Stream that receives passed-through prompts. */
    output: TextOutput;
    /** Reports whether a progress line currently occupies the terminal line. */
    isProgressVisible?: () => boolean;
}

/**
 * Classifies characters into completed lines and an in-progress partial line.
 */
export class LineAccumulator {
    private buffer = '';
    private last = '';
    private readonly output: TextOutput;
    private readonly isProgressVisible: () => boolean;

    constructor(options: LineAccumulatorOptions) {
        this.output = options.output;
        this.isProgressVisible = options.isProgressVisible ?? (() => false);
    }

    /**
     * The last completed line, or an empty string if none has completed.
     * The pending partial line is never included.
     */
    get lastLine(): string {
        return this.last;
    }

    /** The characters received since the last completed line. */
    get pending(): string {
        return this.buffer;
    }

    /**
     * Consumes one character.
     *
     * @param char - The next character of the stream
     * @returns The completed line when `char` terminated one, otherwise
     *          undefined (including when a prompt was flushed)
     */
    processChar(char: string): string | undefined {
        if (char === '\r' || char === '\n') {
            return this.completeLine();
        }

        this.buffer += char;

        if (
            this.buffer.length >= PROMPT_SUFFIX.length &&
            this.buffer.endsWith(PROMPT_SUFFIX)
        ) {
            if (this.isProgressVisible()) {
                this.output.write('\n');
            }
            this.output.write(this.buffer);
            this.completeLine();
        }

        return undefined;
    }

    private completeLine(): string {
        const line = this.buffer;
        this.last = line;
        this.buffer = '';
        return line;
    }
}
