/**
 * @fileoverview Unit tests for the query façade.
 * @module test/unit/query
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { VectorIndex } from '../../src/core/vector/db.js';
import { QueryService } from '../../src/core/vector/query.js';
import { FakeEncoder } from '../__mocks__/encoder.js';

let dir: string;
let encoder: FakeEncoder;
let index: VectorIndex;

beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'ragcore-query-'));
    encoder = new FakeEncoder({ cat: [0, 0, 0], dog: [1, 0, 0], car: [1, 3, 0] });
    index = new VectorIndex(encoder, { path: dir });
});

afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
});

describe('QueryService before startup', () => {
    const service = new QueryService();

    it('reports health with nothing loaded', () => {
        expect(service.health()).toEqual({ status: 'healthy', indexLoaded: false, encoderReady: false });
    });

    it('answers not ready for every operation', async () => {
        const notReady = { ok: false, error: { type: 'not_ready', message: 'Vector store not loaded' } };

        expect(await service.query('cat')).toEqual(notReady);
        expect(await service.ingest('cat')).toEqual(notReady);
        expect(await service.save()).toEqual(notReady);
        expect(service.stats()).toEqual(notReady);
    });

    it('answers not ready while the index is constructed but not loaded', async () => {
        const pending = new QueryService({ index, encoder });

        expect(pending.health()).toEqual({ status: 'healthy', indexLoaded: false, encoderReady: true });
        expect((await pending.query('cat')).ok).toBe(false);
    });

    it('refuses to save an index that was never loaded and writes nothing', async () => {
        const pending = new QueryService({ index, encoder });

        expect(await pending.save()).toEqual({ ok: false, error: { type: 'not_ready', message: 'Vector store not loaded' } });
        expect(fs.existsSync(index.indexPath)).toBe(false);
    });
});

describe('QueryService once loaded', () => {
    let service: QueryService;

    beforeEach(async () => {
        await index.load();
        service = new QueryService({ index, encoder });
    });

    it('ingests a document and returns its id', async () => {
        expect(await service.ingest('cat', { kind: 'pet' })).toEqual({ ok: true, value: { documentId: '0' } });
        expect(await service.ingest('dog')).toEqual({ ok: true, value: { documentId: '1' } });
        expect(index.get(1)?.metadata).toEqual({});
    });

    it('returns scored results for a query', async () => {
        await service.ingest('cat', { kind: 'pet' });
        await service.ingest('car');

        const res = await service.query('dog', 5, 0.1);
        expect(res).toEqual({
            ok: true,
            value: {
                query: 'dog',
                results: [
                    { id: 0, text: 'cat', metadata: { kind: 'pet' }, score: 0.5, distance: 1 },
                    { id: 1, text: 'car', metadata: {}, score: 0.1, distance: 9 },
                ],
            },
        });
    });

    it('applies its configured defaults', async () => {
        const narrow = new QueryService({ index, encoder }, { topK: 1, threshold: 0 });
        await service.ingest('cat');
        await service.ingest('car');

        const res = await narrow.query('dog');
        expect(res.ok && res.value.results.map(r => r.text)).toEqual(['cat']);
    });

    it('accepts an empty query', async () => {
        await service.ingest('cat');

        expect(await service.query('', 5, 0.5)).toEqual({
            ok: true,
            value: { query: '', results: [{ id: 0, text: 'cat', metadata: {}, score: 1, distance: 0 }] },
        });
    });

    it('rejects a non-integer or non-positive topK', async () => {
        expect(await service.query('cat', 0)).toEqual({ ok: false, error: { type: 'invalid', message: 'topK must be positive' } });
        expect(await service.query('cat', 1.5)).toEqual({ ok: false, error: { type: 'invalid', message: 'topK must be an integer' } });
    });

    it('rejects an infinite threshold', async () => {
        const res = await service.query('cat', 5, Infinity);
        expect(res).toEqual({ ok: false, error: { type: 'invalid', message: 'threshold must be a finite number' } });
    });

    it('accepts empty ingest text', async () => {
        expect(await service.ingest('')).toEqual({ ok: true, value: { documentId: '0' } });
        expect(index.get(0)?.text).toBe('');
    });

    it('reports encoder failures as internal errors with their code', async () => {
        await service.ingest('cat');
        encoder.failing = true;

        expect(await service.query('dog')).toEqual({
            ok: false,
            error: { type: 'internal', message: 'fake encoder failure', code: 'encoding' },
        });
    });

    it('saves and reports stats', async () => {
        await service.ingest('cat');

        expect(await service.save()).toEqual({ ok: true, value: undefined });
        expect(fs.existsSync(index.indexPath)).toBe(true);
        expect(service.stats()).toEqual({
            ok: true,
            value: { totalDocuments: 1, dimension: 3, loaded: true, storePath: dir, indexName: 'vector_index' },
        });
    });

    it('becomes ready once handles are attached', async () => {
        const late = new QueryService();
        late.attach({ index, encoder });

        expect(late.health()).toEqual({ status: 'healthy', indexLoaded: true, encoderReady: true });
        expect((await late.query('cat', 5, 0)).ok).toBe(true);
    });
});
