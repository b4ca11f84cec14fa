/**
 * Tests for ProgressRenderer
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
    ProgressRenderer,
    UNBOUNDED_TICKS,
    formatClock,
    type ProgressRendererOptions,
} from '../src/renderer.js';
import { createOutput, repaint, type RecordingOutput } from './helpers/output.js';

describe('ProgressRenderer', () => {
    let output: RecordingOutput;
    let now: number;

    beforeEach(() => {
        output = createOutput();
        now = 1_000_000;
    });

    function create(
        overrides: Partial<ProgressRendererOptions> = {},
    ): ProgressRenderer {
        return new ProgressRenderer({
            total: 100,
            title: 'clip.mp4',
            unit: 'seconds',
            output,
            dynamicColumns: false,
            ascii: true,
            now: () => now,
            ...overrides,
        });
    }

    describe('rendering', () => {
        it('should paint the empty bar on construction', () => {
            const bar = create();
            const expected = 'clip.mp4: 0% |--------------------| 0/100 seconds';

            expect(bar.line).toBe(expected);
            expect(output.writes).toEqual([repaint(expected)]);
        });

        it('should show elapsed time and an estimate once time has passed', () => {
            const bar = create();
            const first = bar.line;

            now += 10_000;
            bar.advance(50);

            const expected =
                'clip.mp4: 50% |##########----------| 50/100 seconds [00:10<00:10]';
            expect(bar.line).toBe(expected);
            expect(output.writes[1]).toBe(repaint(expected, first));
        });

        it('should omit the estimate when nothing remains', () => {
            const bar = create();

            now += 10_000;
            bar.advance(100);

            expect(bar.line).toBe(
                'clip.mp4: 100% |####################| 100/100 seconds [00:10]',
            );
        });

        it('should blank the whole previous line', () => {
            const bar = create({ title: 'a-rather-long-input-name.mov' });
            const long = bar.line;

            bar.advance(1);

            expect(output.writes[1]).toBe(repaint(bar.line, long));
            expect(output.writes[1]?.length).toBe(2 + 2 * long.length);
        });

        it('should leave out the title and unit when empty', () => {
            const bar = create({ title: '', unit: '' });
            expect(bar.line).toBe('0% |--------------------| 0/100');
        });

        it('should use block glyphs unless ascii is requested', () => {
            const bar = create({ ascii: false, total: 4 });
            bar.advance(1);
            expect(bar.line).toBe(
                'clip.mp4: 25% |█████░░░░░░░░░░░░░░░| 1/4 seconds',
            );
        });

        it('should show counts without a total when unbounded', () => {
            const bar = create({ total: UNBOUNDED_TICKS, title: 'Processing' });

            now += 5_000;
            bar.advance(10);

            expect(bar.line).toBe(
                'Processing: 0% |--------------------| 10 seconds [00:05]',
            );
            expect(bar.snapshot().remainingSeconds).toBe(undefined);
        });

        it('should never throw when the output fails', () => {
            const failing = {
                write(): boolean {
                    throw new Error('EPIPE');
                },
            };

            const bar = create({ output: failing });

            expect(() => bar.advance(10)).not.toThrow();
            expect(() => bar.close()).not.toThrow();
            expect(bar.currentTick).toBe(100);
        });
    });

    describe('advance', () => {
        it('should ignore zero and negative deltas', () => {
            const bar = create();
            bar.advance(30);
            const writes = output.writes.length;

            bar.advance(0);
            bar.advance(-5);

            expect(bar.currentTick).toBe(30);
            expect(output.writes.length).toBe(writes);
        });

        it('should clamp at the total', () => {
            const bar = create();

            bar.advance(80);
            bar.advance(80);

            expect(bar.currentTick).toBe(100);
        });

        it('should do nothing after close', () => {
            const bar = create({ total: UNBOUNDED_TICKS });
            bar.close();
            const writes = output.writes.length;

            bar.advance(5);

            expect(bar.currentTick).toBe(0);
            expect(output.writes.length).toBe(writes);
        });
    });

    describe('close', () => {
        it('should fill a bounded bar and end the line', () => {
            const bar = create();
            const first = bar.line;

            bar.close();

            const expected =
                'clip.mp4: 100% |####################| 100/100 seconds';
            expect(output.writes).toEqual([
                repaint(first),
                repaint(expected, first),
                '\n',
            ]);
            expect(bar.closed).toBe(true);
        });

        it('should produce the same output when called twice', () => {
            const bar = create();
            bar.close();
            const once = output.text();

            bar.close();

            expect(output.text()).toBe(once);
        });

        it('should leave an unbounded bar at its count', () => {
            const bar = create({ total: UNBOUNDED_TICKS, title: 'Processing' });

            bar.close();

            expect(bar.currentTick).toBe(0);
            expect(bar.line).toBe('Processing: 0% |--------------------| 0 seconds');
        });
    });

    describe('bar width', () => {
        it('should fit the bar to the terminal width', () => {
            expect(create({ dynamicColumns: true, columns: () => 80 }).snapshot().barWidth).toBe(22);
        });

        it('should cap the bar at 60 segments', () => {
            expect(create({ dynamicColumns: true, columns: () => 200 }).snapshot().barWidth).toBe(60);
        });

        it('should keep at least 20 segments', () => {
            expect(create({ dynamicColumns: true, columns: () => 40 }).snapshot().barWidth).toBe(20);
        });

        it('should fall back to 20 when the width is unknown', () => {
            expect(create({ dynamicColumns: true, columns: () => undefined }).snapshot().barWidth).toBe(20);
            expect(
                create({
                    dynamicColumns: true,
                    columns: () => {
                        throw new Error('not a tty');
                    },
                }).snapshot().barWidth,
            ).toBe(20);
        });

        it('should use the fixed width when dynamic columns are off', () => {
            expect(create({ barWidth: 30 }).snapshot().barWidth).toBe(30);
        });
    });
});

describe('formatClock', () => {
    it('should format minutes and seconds', () => {
        expect(formatClock(0)).toBe('00:00');
        expect(formatClock(65.9)).toBe('01:05');
    });

    it('should wrap minutes at the hour', () => {
        expect(formatClock(3725)).toBe('02:05');
    });
});
