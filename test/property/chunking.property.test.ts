/**
 * @fileoverview Property tests for the sliding-window chunker.
 * Windows start at multiples of the stride, never exceed the chunk size,
 * reproduce the source text at their offsets and reach its end. Lengths and
 * offsets are in code points, so astral characters count once.
 *
 * @module test/property/chunking.property.test
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { chunkSpans } from '../../src/core/vector/chunker.js';

// ============================================================
// Arbitrary Generators
// ============================================================

/**
 * Generates a valid (size, overlap) pair with overlap < size.
 */
const arbWindow = fc.integer({ min: 1, max: 60 }).chain(size =>
    fc.record({ size: fc.constant(size), overlap: fc.integer({ min: 0, max: size - 1 }) })
);

/**
 * Generates ASCII or full-Unicode text; lengths are in code points.
 */
const arbText = (minLength: number, maxLength: number) =>
    fc.oneof(fc.string({ minLength, maxLength }), fc.fullUnicodeString({ minLength, maxLength }));

/**
 * Generates a window together with a text that fits inside it.
 */
const arbShort = arbWindow.chain(w =>
    fc.record({ size: fc.constant(w.size), overlap: fc.constant(w.overlap), text: arbText(0, w.size) })
);

/**
 * Generates a window together with a text longer than it.
 */
const arbLong = arbWindow.chain(w =>
    fc.record({
        size: fc.constant(w.size),
        overlap: fc.constant(w.overlap),
        text: arbText(w.size + 1, w.size * 8 + 1),
    })
);

const codePoints = (text: string): string[] => Array.from(text);

const arbAny = fc.oneof(arbShort, arbLong);

// ============================================================
// Properties
// ============================================================

describe('chunkSpans properties', () => {
    it('keeps text no longer than the window whole', () => {
        fc.assert(
            fc.property(arbShort, ({ text, size, overlap }) => {
                expect(chunkSpans(text, size, overlap)).toEqual([{ text, start: 0, end: codePoints(text).length }]);
            })
        );
    });

    it('starts windows at multiples of size minus overlap', () => {
        fc.assert(
            fc.property(arbLong, ({ text, size, overlap }) => {
                const stride = size - overlap;
                const spans = chunkSpans(text, size, overlap);

                expect(spans.map(s => s.start)).toEqual(spans.map((_, i) => i * stride));
                expect(spans.length).toBe(Math.ceil(codePoints(text).length / stride));
            })
        );
    });

    it('never exceeds the window and matches the source at each offset', () => {
        fc.assert(
            fc.property(arbAny, ({ text, size, overlap }) => {
                const chars = codePoints(text);
                for (const span of chunkSpans(text, size, overlap)) {
                    expect(codePoints(span.text).length).toBeLessThanOrEqual(size);
                    expect(span.text).toBe(chars.slice(span.start, span.end).join(''));
                }
            })
        );
    });

    it('never leaves a lone surrogate in a window', () => {
        fc.assert(
            fc.property(arbAny, ({ text, size, overlap }) => {
                for (const span of chunkSpans(text, size, overlap)) {
                    expect(span.text).not.toMatch(/[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/);
                }
            })
        );
    });

    it('covers the text without gaps', () => {
        fc.assert(
            fc.property(arbAny, ({ text, size, overlap }) => {
                const spans = chunkSpans(text, size, overlap);
                expect(spans[0]?.start).toBe(0);
                expect(spans[spans.length - 1]?.end).toBe(codePoints(text).length);
                for (let i = 1; i < spans.length; i++) {
                    expect(spans[i]?.start).toBeLessThanOrEqual(spans[i - 1]?.end ?? -1);
                }
            })
        );
    });
});
