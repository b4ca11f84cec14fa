/**
 * `@ffmeter/supervisor`
 *
 * Runs ffmpeg as a child process, feeds its stderr to a progress notifier,
 * forwards keystrokes and propagates its exit status.
 *
 * @packageDocumentation
 */

export {
    ProcessSupervisor,
    toExitCode,
    DEFAULT_BINARY,
    DEFAULT_POLL_INTERVAL_MS,
    DEFAULT_DRAIN_GRACE_MS,
    type ProcessSupervisorOptions,
    type SupervisorPhase,
    type ChildHandle,
    type SpawnFunction,
    type SupervisorLogger,
} from './supervisor.js';

export {
    TtyKeySource,
    NullKeySource,
    type KeySource,
    type KeyInput,
} from './key-source.js';

export {
    watchSignals,
    signalExitCode,
    WATCHED_SIGNALS,
    type SignalSource,
} from './signals.js';

export { ProcessStartError } from './errors.js';
