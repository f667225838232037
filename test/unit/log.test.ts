/**
 * @fileoverview Unit tests for the scoped logger and Result helpers.
 * @module test/unit/log
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { createLogger, parseLevel, setLogLevel } from '../../src/utils/log.js';
import { attempt, errorMessage, mapResult, ok, err } from '../../src/utils/result.js';

describe('createLogger', () => {
    afterEach(() => {
        vi.restoreAllMocks();
        setLogLevel('silent');
    });

    it('prefixes lines with the scope and tags non-info levels', () => {
        const spy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
        setLogLevel('debug');
        const log = createLogger('db');

        log.info('Loaded 2 documents');
        log.warn('Vector store is empty');
        log.debug('probe');

        expect(spy.mock.calls).toEqual([
            ['[ragcore:db] Loaded 2 documents'],
            ['[ragcore:db] WARN Vector store is empty'],
            ['[ragcore:db] DEBUG probe'],
        ]);
    });

    it('drops lines below the threshold', () => {
        const spy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
        setLogLevel('warn');
        const log = createLogger('ingest');

        log.info('hidden');
        log.error('shown');

        expect(spy.mock.calls).toEqual([['[ragcore:ingest] ERROR shown']]);
    });
});

describe('parseLevel', () => {
    it('accepts known names in any case', () => {
        expect(parseLevel('WARN')).toBe('warn');
        expect(parseLevel('silent')).toBe('silent');
    });

    it('returns undefined for unknown or missing names', () => {
        expect(parseLevel('loud')).toBeUndefined();
        expect(parseLevel(undefined)).toBeUndefined();
    });
});

describe('Result helpers', () => {
    it('maps success values and passes errors through', () => {
        expect(mapResult(ok(['0', '1']), ids => ids.length)).toEqual({ ok: true, value: 2 });
        expect(mapResult(err('nope'), (n: number) => n + 1)).toEqual({ ok: false, error: 'nope' });
    });

    it('captures a rejection as an error value', async () => {
        const result = await attempt(async () => { throw new Error('disk full'); }, e => errorMessage(e));
        expect(result).toEqual({ ok: false, error: 'disk full' });
    });

    it('captures a resolution as a success value', async () => {
        expect(await attempt(async () => 7, () => 'unused')).toEqual({ ok: true, value: 7 });
    });

    it('renders non-Error throws as strings', () => {
        expect(errorMessage('plain')).toBe('plain');
        expect(errorMessage(404)).toBe('404');
    });
});
