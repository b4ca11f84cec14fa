/**
 * Tests for command line parsing
 */

import { describe, it, expect } from 'vitest';
import { formatUsage, parseArgs } from '../src/cli.js';

describe('parseArgs', () => {
    it('should forward ffmpeg options untouched', () => {
        expect(
            parseArgs(['-i', 'in.mp4', '-c:v', 'libx264', '-crf', '23', 'out.mp4']),
        ).toEqual({
            ffmpegArgs: ['-i', 'in.mp4', '-c:v', 'libx264', '-crf', '23', 'out.mp4'],
        });
    });

    it('should keep the order when an operand comes first', () => {
        expect(parseArgs(['out.mp4', '-y'])).toEqual({
            ffmpegArgs: ['out.mp4', '-y'],
        });
    });

    it('should not treat help or version flags as its own', () => {
        expect(parseArgs(['-h'])).toEqual({ ffmpegArgs: ['-h'] });
        expect(parseArgs(['--help'])).toEqual({ ffmpegArgs: ['--help'] });
        expect(parseArgs(['-version'])).toEqual({ ffmpegArgs: ['-version'] });
    });

    it('should keep a leading end-of-options marker', () => {
        expect(parseArgs(['--', '-i', 'in.mp4', 'out.mp4'])).toEqual({
            ffmpegArgs: ['--', '-i', 'in.mp4', 'out.mp4'],
        });
    });

    it('should keep an end-of-options marker between operands', () => {
        expect(parseArgs(['in.mp4', '--', 'out.mp4'])).toEqual({
            ffmpegArgs: ['in.mp4', '--', 'out.mp4'],
        });
    });

    it('should keep arguments containing spaces and equals signs', () => {
        expect(
            parseArgs(['-i', 'my clip.mov', '-vf', 'scale=1280:720', 'out.mp4']),
        ).toEqual({
            ffmpegArgs: ['-i', 'my clip.mov', '-vf', 'scale=1280:720', 'out.mp4'],
        });
    });
});

describe('formatUsage', () => {
    it('should describe the tool with examples', () => {
        const lines = formatUsage().split('\n');

        expect(lines[0]).toBe('ffmeter v0.1.0');
        expect(lines[1]).toBe('A progress bar wrapper for ffmpeg');
        expect(lines).toContain('  ffmeter [ffmpeg options]');
        expect(lines).toContain(
            '  ffmeter -i input.mp4 -c:v libx264 -crf 23 output.mp4',
        );
        expect(lines.at(-1)).toBe(
            'All ffmpeg options are supported - just pass them as arguments.',
        );
    });
});
