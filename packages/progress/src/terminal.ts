/**
 * Terminal queries used by the progress renderer and the CLI.
 */

/**
 * Terminal utility functions.
 *
 * The progress line is drawn on stderr, so width is measured there; key
 * forwarding reads stdin, so interactivity is judged there.
 *
 * @example
 * ```typescript
 * const width = terminal.getWidth() ?? 80;
 * const glyphs = terminal.isWindows() ? '#-' : '█░';
 * ```
 */
export const terminal = {
    /**
     * Gets the width of the stderr terminal in columns.
     * @returns Terminal width, or undefined when stderr is not a TTY
     */
    getWidth: (): number | undefined =>
        process.stderr.isTTY ? process.stderr.columns : undefined,

    /**
     * Checks if stdin is an interactive TTY that can deliver keystrokes.
     * @returns True if keystrokes can be read from stdin
     */
    isInteractive: (): boolean => process.stdin.isTTY === true,

    /**
     * Checks if running on Windows, where the console may lack block glyphs.
     * @returns True on win32
     */
    isWindows: (): boolean => process.platform === 'win32',
};
