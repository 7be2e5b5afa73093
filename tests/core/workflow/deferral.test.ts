/**
 * Tests for deferral justification rules.
 */

import { describe, it, expect } from 'vitest';
import { assessJustification } from '../../../src/core/workflow/deferral.js';

describe('assessJustification', () => {
    it('accepts changes to files outside this change', () => {
        expect(assessJustification('Fixing it needs files outside this change')).toMatchObject({
            valid: true,
            reason: 'out_of_scope_files',
        });
    });

    it('accepts work that needs its own design cycle', () => {
        expect(assessJustification('The retry policy requires its own design review').reason).toBe('own_design_cycle');
    });

    it('accepts cross-component coordination', () => {
        expect(assessJustification('requires cross-component coordination')).toEqual({
            valid: true,
            reason: 'cross_component_coordination',
            explanation: 'requires coordination across components',
        });
    });

    it('rejects severity minimizing even alongside a valid reason', () => {
        expect(assessJustification('Only a minor issue and out of scope anyway')).toMatchObject({
            valid: false,
            reason: 'severity_minimizing',
        });
    });

    it('rejects "works as-is"', () => {
        expect(assessJustification('The code works fine today').reason).toBe('works_as_is');
    });

    it('rejects a bare promise to fix it later', () => {
        expect(assessJustification('Will handle in a follow-up')).toMatchObject({
            valid: false,
            reason: 'later_without_reason',
        });
    });

    it('accepts "later" when a valid reason is given', () => {
        expect(assessJustification('Later, since it requires cross-service coordination').valid).toBe(true);
    });

    it('rejects an empty or unrelated justification', () => {
        expect(assessJustification('   ')).toEqual({ valid: false, reason: 'missing', explanation: 'no justification given' });
        expect(assessJustification('I disagree').reason).toBe('missing');
    });
});
