/**
 * Interrupt handling for the supervised run.
 */

import { constants } from 'os';

/** Signals that abort the wrapper. */
export const WATCHED_SIGNALS: readonly NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

/**
 * Anything signal listeners can be attached to; `process` in production.
 */
export interface SignalSource {
    on(signal: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
    off(signal: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
}

/**
 * Conventional exit code for a process ended by a signal: 128 + its number.
 *
 * @param signal - The signal name
 * @returns The exit code, e.g. 130 for SIGINT
 */
export function signalExitCode(signal: NodeJS.Signals): number {
    return 128 + constants.signals[signal];
}

/**
 * Installs listeners for {@link WATCHED_SIGNALS}. Installing a listener also
 * suppresses Node's default terminate-on-signal behaviour.
 *
 * @param source - Where to listen
 * @param handler - Called with the received signal
 * @returns A function that removes the listeners
 */
export function watchSignals(
    source: SignalSource,
    handler: (signal: NodeJS.Signals) => void,
): () => void {
    for (const signal of WATCHED_SIGNALS) {
        source.on(signal, handler);
    }
    return () => {
        for (const signal of WATCHED_SIGNALS) {
            source.off(signal, handler);
        }
    };
}
