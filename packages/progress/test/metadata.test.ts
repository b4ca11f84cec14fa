/**
 * Tests for metadata extraction
 */

import { describe, it, expect } from 'vitest';
import {
    extractDuration,
    extractFrameRate,
    extractProgressSeconds,
    extractSource,
    roundHalfEven,
} from '../src/metadata.js';

describe('extractDuration', () => {
    it('should convert the header duration to seconds', () => {
        expect(extractDuration('Duration: 01:02:03.00')).toBe(3723);
    });

    it('should find the duration inside a full header line', () => {
        expect(
            extractDuration(
                '  Duration: 00:10:00.48, start: 0.000000, bitrate: 1205 kb/s',
            ),
        ).toBe(600);
    });

    it('should discard fractional seconds', () => {
        expect(extractDuration('Duration: 00:00:05.99')).toBe(5);
    });

    it('should return undefined when there is no duration', () => {
        expect(extractDuration('Press [q] to stop, [?] for help')).toBe(
            undefined,
        );
        expect(extractDuration('Duration: N/A, bitrate: N/A')).toBe(undefined);
    });
});

describe('extractProgressSeconds', () => {
    it('should read the time marker of a status line', () => {
        expect(
            extractProgressSeconds(
                'size=     512kB time=00:00:10.00 bitrate= 419.4kbits/s speed=2.0x',
            ),
        ).toBe(10);
    });

    it('should use hours and minutes', () => {
        expect(extractProgressSeconds('time=02:00:01.50')).toBe(7201);
    });

    it('should return undefined without a marker', () => {
        expect(extractProgressSeconds('')).toBe(undefined);
        expect(extractProgressSeconds('time=N/A')).toBe(undefined);
    });
});

describe('extractSource', () => {
    it('should return the file name of the input', () => {
        expect(
            extractSource(
                "Input #0, mov,mp4,m4a,3gp,3g2,mj2, from '/videos/holiday/clip.mp4':",
            ),
        ).toBe('clip.mp4');
    });

    it('should strip Windows-style directories', () => {
        expect(extractSource("Input #0, matroska,webm, from 'C:\\media\\in.mkv':")).toBe(
            'in.mkv',
        );
    });

    it('should keep a bare file name', () => {
        expect(extractSource("Input #0, wav, from 'voice.wav':")).toBe(
            'voice.wav',
        );
    });

    it('should return undefined for other lines', () => {
        expect(extractSource("Output #0, mp4, to 'out.mp4':")).toBe(undefined);
    });
});

describe('extractFrameRate', () => {
    it('should read a decimal frame rate', () => {
        expect(
            extractFrameRate(
                'Stream #0:0(und): Video: h264 (High), yuv420p, 1920x1080, 4000 kb/s, 25.00 fps, 25 tbr, 12800 tbn',
            ),
        ).toBe(25);
    });

    it('should round to the nearest integer', () => {
        expect(extractFrameRate('29.97 fps')).toBe(30);
        expect(extractFrameRate('23.40 fps')).toBe(23);
    });

    it('should round ties to even', () => {
        expect(extractFrameRate('12.50 fps')).toBe(12);
        expect(extractFrameRate('13.50 fps')).toBe(14);
    });

    it('should read an integer frame rate', () => {
        expect(extractFrameRate('Video: vp9, yuv420p, 30 fps, 30 tbr')).toBe(30);
    });

    it('should read rates with one or three integer digits whole', () => {
        expect(extractFrameRate('Video: gif, bgra, 5 fps, 5 tbr')).toBe(5);
        expect(extractFrameRate('Video: h264, 119.88 fps, 120 tbr')).toBe(120);
    });

    it('should take the first occurrence on the line', () => {
        expect(extractFrameRate('50 fps then 24 fps')).toBe(50);
    });

    it('should return undefined when no rate is present', () => {
        expect(extractFrameRate('fps=25')).toBe(undefined);
        expect(extractFrameRate('Stream #0:1: Audio: aac, 48000 Hz')).toBe(
            undefined,
        );
    });
});

describe('roundHalfEven', () => {
    it('should round ties to the even neighbour', () => {
        expect(roundHalfEven(2.5)).toBe(2);
        expect(roundHalfEven(3.5)).toBe(4);
    });

    it('should round other values to the nearest integer', () => {
        expect(roundHalfEven(2.4)).toBe(2);
        expect(roundHalfEven(2.6)).toBe(3);
        expect(roundHalfEven(7)).toBe(7);
    });
});
