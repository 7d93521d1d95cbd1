/**
 * Tests for the Tajima DST codec
 */

import { describe, it, expect } from 'vitest';
import { decodeDst, encodeDst } from '../dst.js';
import type { EmbroideryPattern } from '../../engine/pattern.js';
import { s, cc } from '../../__tests__/helpers.js';

function samplePattern(): EmbroideryPattern {
    return {
        label: 'sample',
        stitches: [
            s(0, 0),
            s(10, -5),
            s(131, -126),
            cc(131, -126),
            s(100, -100, 'jump'),
            s(100, -90),
            s(100, -90, 'end'),
        ],
        threads: [
            { index: 0, rgb: 0xff0000, description: 'Red', catalogNumber: '1902' },
            { index: 1, rgb: 0x00ff00 },
        ],
    };
}

function headerText(bytes: Uint8Array): string {
    const text = Buffer.from(bytes.subarray(0, 512)).toString('latin1');
    return text.slice(0, text.indexOf('\x1a'));
}

describe('encodeDst', () => {
    it('should write a 512-byte header followed by 3-byte records', () => {
        const bytes = encodeDst(samplePattern());

        // 6 moves + color change + end
        expect(bytes.length).toBe(512 + 7 * 3);
        expect(Array.from(bytes.subarray(bytes.length - 3))).toEqual([0, 0, 0xf3]);
        expect(bytes[511]).toBe(0x20);
    });

    it('should record counts, extents and thread colors in the header', () => {
        const fields = headerText(encodeDst(samplePattern())).split('\r');

        expect(fields).toEqual([
            'LA:sample          ',
            'ST:      7',
            'CO:  1',
            '+X:  131',
            '-X:    0',
            '+Y:  126',
            '-Y:    0',
            'AX:+  100',
            'AY:+   90',
            'MX:+    0',
            'MY:+    0',
            'PD:******',
            'TC:#ff0000,Red,1902',
            'TC:#00ff00,,',
            '',
        ]);
    });

    it('should split long moves into steps of at most 121 units', () => {
        const bytes = encodeDst({ stitches: [s(0, 0), s(300, 0)], threads: [] });
        const decoded = decodeDst(bytes);

        expect(decoded.stitches).toEqual([s(0, 0), s(100, 0), s(200, 0), s(300, 0), s(300, 0, 'end')]);
    });

    it('should write trims as zero-length jumps', () => {
        const decoded = decodeDst(encodeDst({ stitches: [s(0, 0), s(5, 5, 'trim')], threads: [] }));
        expect(decoded.stitches).toEqual([s(0, 0), s(5, 5, 'jump'), s(5, 5, 'jump'), s(5, 5, 'end')]);
    });

    it('should reject thread lists that do not fit the header', () => {
        const threads = Array.from({ length: 40 }, (_, index) => ({ index, rgb: index }));
        expect(() => encodeDst({ stitches: [], threads })).toThrow('DST header cannot hold 40 thread colors.');
    });
});

describe('decodeDst', () => {
    it('should restore the stitch stream written by encodeDst', () => {
        const decoded = decodeDst(encodeDst(samplePattern()));
        expect(decoded.stitches).toEqual(samplePattern().stitches);
    });

    it('should restore label and thread colors', () => {
        const decoded = decodeDst(encodeDst(samplePattern()));

        expect(decoded.label).toBe('sample');
        expect(decoded.threads).toEqual([
            { index: 0, rgb: 0xff0000, description: 'Red', catalogNumber: '1902' },
            { index: 1, rgb: 0x00ff00 },
        ]);
    });

    it('should return no threads when the header has no color lines', () => {
        const decoded = decodeDst(encodeDst({ stitches: [s(0, 0)], threads: [] }));
        expect(decoded.threads).toEqual([]);
        expect(decoded.label).toBeUndefined();
    });

    it('should reject files shorter than the header', () => {
        expect(() => decodeDst(new Uint8Array(100))).toThrow('DST file is shorter than its 512-byte header.');
    });

    it('should end at the last position when the END record is missing', () => {
        const bytes = encodeDst({ stitches: [s(0, 0), s(3, 4)], threads: [] });
        const decoded = decodeDst(bytes.subarray(0, bytes.length - 3));
        expect(decoded.stitches).toEqual([s(0, 0), s(3, 4), s(3, 4, 'end')]);
    });
});
