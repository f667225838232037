/**
 * Deterministic in-process encoder for tests. No model is loaded.
 * Texts listed in the table get their fixed vector; any other text gets a
 * vector derived from its character codes.
 */

import type { EmbeddingEncoder } from '../../src/core/vector/types.js';
import { EncodingError } from '../../src/core/errors.js';

export class FakeEncoder implements EmbeddingEncoder {
    /** Number of encode invocations (encodeSingle counts as one) */
    calls = 0;
    /** Every batch passed to encode, in order */
    readonly batches: string[][] = [];
    /** When set, encode rejects with an EncodingError */
    failing = false;

    private readonly table: ReadonlyMap<string, readonly number[]>;
    private readonly dim: number;

    constructor(table: Record<string, readonly number[]> = {}, dim = 3) {
        this.table = new Map(Object.entries(table));
        this.dim = dim;
    }

    dimension(): number {
        return this.dim;
    }

    async encode(batch: readonly string[]): Promise<Float32Array[]> {
        if (!batch.length) throw new EncodingError('Cannot encode an empty batch');
        this.calls++;
        this.batches.push([...batch]);
        if (this.failing) throw new EncodingError('fake encoder failure');
        return batch.map(t => this.vectorFor(t));
    }

    async encodeSingle(text: string): Promise<Float32Array> {
        const [v] = await this.encode([text]);
        if (!v) throw new EncodingError('no vector');
        return v;
    }

    vectorFor(text: string): Float32Array {
        const fixed = this.table.get(text);
        if (fixed) return Float32Array.from(fixed);
        const v = new Float32Array(this.dim);
        for (let i = 0; i < this.dim; i++) {
            let acc = 0;
            for (let c = 0; c < text.length; c++) acc += text.charCodeAt(c) * (i + c + 1);
            v[i] = (acc % 101) / 101;
        }
        return v;
    }
}
