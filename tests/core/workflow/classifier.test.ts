/**
 * Tests for specialist classification.
 */

import { describe, it, expect } from 'vitest';
import { classify } from '../../../src/core/workflow/classifier.js';
import { DEFAULT_CONFIG } from '../../../src/core/config/defaults.js';

const specialists = DEFAULT_CONFIG.specialists;

describe('classify', () => {
    it('picks backend for rate limiting', () => {
        expect(classify('add rate limiting', specialists)).toEqual({ kind: 'match', label: 'backend', keyword: 'rate limiting' });
    });

    it('lets the more specific phrase win', () => {
        const table = [
            { label: 'auth', keywords: ['token'] },
            { label: 'crypto', keywords: ['token signing'] },
        ];
        expect(classify('rotate the token signing key', table)).toEqual({ kind: 'match', label: 'crypto', keyword: 'token signing' });
    });

    it('reports ties as ambiguous, sorted', () => {
        expect(classify('add a migration for the metrics table', specialists)).toEqual({
            kind: 'ambiguous',
            candidates: ['database', 'observability'],
        });
    });

    it('matches whole words only', () => {
        expect(classify('update the author field', specialists)).toEqual({ kind: 'none' });
    });

    it('matches multi-word keywords across separators', () => {
        const table = [{ label: 'protocol', keywords: ['wire format'] }];
        expect(classify('bump the wire_format version', table)).toMatchObject({ kind: 'match', label: 'protocol' });
    });

    it('returns none without a keyword hit', () => {
        expect(classify('tidy the readme', specialists)).toEqual({ kind: 'none' });
    });
});
