/**
 * Set-once value holder.
 */

/**
 * Latch state: either nothing has been recorded yet, or a value has.
 */
export type LatchState<T> =
    | { readonly status: 'unset' }
    | { readonly status: 'set'; readonly value: T };

/**
 * A value that is set at most once. The first defined offer wins; every
 * later offer is ignored.
 *
 * @example
 * ```typescript
 * const duration = new Latch<number>();
 * duration.offer(undefined); // false, still unset
 * duration.offer(3723);      // true
 * duration.offer(10);        // false, keeps 3723
 * ```
 */
export class Latch<T> {
    private current: LatchState<T> = { status: 'unset' };

    get state(): LatchState<T> {
        return this.current;
    }

    get isSet(): boolean {
        return this.current.status === 'set';
    }

    /** The latched value, or undefined while unset. */
    get value(): T | undefined {
        return this.current.status === 'set' ? this.current.value : undefined;
    }

    /**
     * Records the value if the latch is still unset.
     *
     * @param value - Candidate value; undefined never latches
     * @returns True if this call set the latch
     */
    offer(value: T | undefined): boolean {
        if (this.current.status === 'set' || value === undefined) {
            return false;
        }
        this.current = { status: 'set', value };
        return true;
    }
}
