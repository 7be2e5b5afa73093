/**
 * Tests for lightweight-mode eligibility.
 */

import { describe, it, expect } from 'vitest';
import { decideMode, findSensitivePaths } from '../../../src/core/workflow/eligibility.js';
import { DEFAULT_CONFIG } from '../../../src/core/config/defaults.js';

const categories = DEFAULT_CONFIG.modes.sensitivePaths;

describe('decideMode', () => {
    it('keeps full mode without looking at paths', () => {
        expect(decideMode('full', ['package.json'], categories)).toEqual({
            requested: 'full',
            mode: 'full',
            downgraded: false,
            matches: [],
        });
    });

    it('allows lightweight for ordinary files', () => {
        const decision = decideMode('lightweight', ['README.md', 'src/utils/format.ts'], categories);
        expect(decision.mode).toBe('lightweight');
        expect(decision.downgraded).toBe(false);
        expect(decision.note).toBeUndefined();
    });

    it('refuses lightweight for a dependency manifest with an explicit note', () => {
        const decision = decideMode('lightweight', ['package.json'], categories);

        expect(decision.mode).toBe('full');
        expect(decision.downgraded).toBe(true);
        expect(decision.note).toBe(
            'Lightweight mode refused: change touches dependency-manifest (package.json); running full mode',
        );
    });

    it('names every touched category once', () => {
        const decision = decideMode('lightweight', ['src/auth/session.ts', 'db/migrations/002.sql', 'go.sum'], categories);
        expect(decision.note).toBe(
            'Lightweight mode refused: change touches authentication/crypto, schema/interface-contract, dependency-manifest (src/auth/session.ts, db/migrations/002.sql, go.sum); running full mode',
        );
    });
});

describe('findSensitivePaths', () => {
    it('matches shared code and instrumentation', () => {
        const matches = findSensitivePaths(['lib/shared/ids.ts', 'src/telemetry/exporter.ts'], categories);
        expect(matches.map((m) => m.category)).toEqual(['shared/common', 'instrumentation']);
    });

    it('normalizes Windows separators and a leading ./', () => {
        const matches = findSensitivePaths(['.\\api\\schema.graphql'], categories);
        expect(matches).toEqual([
            { category: 'schema/interface-contract', file: 'api/schema.graphql', pattern: '(^|/)(schema|openapi)[^/]*\\.(json|ya?ml|graphql)$' },
        ]);
    });

    it('does not flag look-alike names', () => {
        expect(findSensitivePaths(['src/author.ts', 'docs/packages.md'], categories)).toEqual([]);
    });
});
