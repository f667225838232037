/**
 * @fileoverview Unit tests for the embedder, driven by an in-process
 * embedding backend so no endpoint is contacted.
 * @module test/unit/embedder
 */

import { describe, it, expect } from 'vitest';
import { Embedder, type EmbedFn } from '../../src/core/vector/embedder.js';
import { EncodingError } from '../../src/core/errors.js';

// ============================================================
// Test Fixtures
// ============================================================

/**
 * Backend whose row r for text t is [t.length, r, 0, ...].
 */
function fakeBackend(dim = 3) {
    const calls: string[][] = [];
    const run: EmbedFn = async texts => {
        calls.push([...texts]);
        return texts.map((t, r) => {
            const row = new Array<number>(dim).fill(0);
            row[0] = t.length;
            row[1] = r;
            return row;
        });
    };
    return { run, calls };
}

// ============================================================
// Tests
// ============================================================

describe('Embedder.fromEmbedFn', () => {
    it('probes the backend once for the output dimension', async () => {
        const { run, calls } = fakeBackend(4);
        const embedder = await Embedder.fromEmbedFn(run);

        expect(embedder.dimension()).toBe(4);
        expect(calls).toEqual([['dimension probe']]);
    });

    it('rejects a non-positive batch size', async () => {
        const { run } = fakeBackend();
        await expect(Embedder.fromEmbedFn(run, { batch: 0 })).rejects.toThrow('Batch size must be a positive integer, got 0');
    });

    it('rejects a backend that returns no usable row', async () => {
        const run: EmbedFn = async () => [[]];
        await expect(Embedder.fromEmbedFn(run, { model: 'test-model' })).rejects.toThrow('Model test-model produced 1 rows of width 0 for one text');
    });

    it('reports an unreachable backend as an encoding error', async () => {
        const run: EmbedFn = async () => { throw new Error('connection refused'); };
        const created = Embedder.fromEmbedFn(run, { model: 'test-model' });

        await expect(created).rejects.toBeInstanceOf(EncodingError);
        await expect(created).rejects.toThrow('Model test-model is unavailable: connection refused');
    });
});

describe('Embedder.encode', () => {
    it('splits input into model batches and keeps order', async () => {
        const { run, calls } = fakeBackend();
        const embedder = await Embedder.fromEmbedFn(run, { batch: 2 });

        const vecs = await embedder.encode(['a', 'bb', 'ccc', 'dddd', 'eeeee']);

        expect(calls.slice(1)).toEqual([['a', 'bb'], ['ccc', 'dddd'], ['eeeee']]);
        expect(vecs.map(v => v[0])).toEqual([1, 2, 3, 4, 5]);
        expect(vecs.map(v => v[1])).toEqual([0, 1, 0, 1, 0]);
        expect(vecs.every(v => v instanceof Float32Array && v.length === 3)).toBe(true);
    });

    it('scales rows to unit length when normalization is on', async () => {
        const run: EmbedFn = async texts => texts.map(() => [3, 4, 0]);
        const embedder = await Embedder.fromEmbedFn(run, { norm: true });

        const [v] = await embedder.encode(['x']);
        expect(v?.[0]).toBeCloseTo(0.6, 6);
        expect(v?.[1]).toBeCloseTo(0.8, 6);
        expect(v?.[2]).toBe(0);
    });

    it('rejects an empty batch', async () => {
        const { run } = fakeBackend();
        const embedder = await Embedder.fromEmbedFn(run);

        await expect(embedder.encode([])).rejects.toThrow('Cannot encode an empty batch');
    });

    it('wraps inference failures', async () => {
        let calls = 0;
        const run: EmbedFn = async texts => {
            if (calls++ > 0) throw new Error('rate limited');
            return texts.map(() => [0, 0]);
        };
        const embedder = await Embedder.fromEmbedFn(run);

        const failure = embedder.encode(['x']);
        await expect(failure).rejects.toBeInstanceOf(EncodingError);
        await expect(failure).rejects.toThrow('Model inference failed: rate limited');
    });

    it('rejects output whose shape does not match the batch', async () => {
        let calls = 0;
        const run: EmbedFn = async texts => {
            const rows = calls++ > 0 ? texts.length + 1 : texts.length;
            return Array.from({ length: rows }, () => [0, 0]);
        };
        const embedder = await Embedder.fromEmbedFn(run);

        await expect(embedder.encode(['x'])).rejects.toThrow('Expected 1 rows of width 2, got [2, 2]');
    });
});

describe('Embedder.encodeSingle', () => {
    it('returns one vector', async () => {
        const { run } = fakeBackend();
        const embedder = await Embedder.fromEmbedFn(run);

        const v = await embedder.encodeSingle('four');
        expect(Array.from(v)).toEqual([4, 0, 0]);
    });
});
