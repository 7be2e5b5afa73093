/**
 * Tests for the session state machine.
 */

import { describe, it, expect } from 'vitest';
import { Phase, isTerminal, note, transition, type Session } from '../../../src/core/workflow/engine.js';
import type { ValidationRun } from '../../../src/core/workflow/checks.js';
import { WorkflowError } from '../../../src/core/errors.js';
import { makeSession } from '../../support/fakes.js';

function run(iteration: number, outcome: 'pass' | 'fail'): ValidationRun {
    const base: ValidationRun = {
        iteration,
        outcome,
        layers: [{
            name: 'compile',
            purpose: 'catches type errors',
            outcome,
            output: outcome === 'fail' ? 'error TS2322' : '',
            hint: 'Fix compilation errors',
            durationMs: 5,
        }],
        startedAt: 0,
        finishedAt: 5,
    };
    return outcome === 'fail' ? { ...base, failedLayer: 'compile' } : base;
}

function toValidation(session: Session): Session {
    return transition(session, { type: 'READY_FOR_VALIDATION', from: 'implementer' }, 2_000);
}

function toImplementation(mode: 'full' | 'lightweight' = 'full'): Session {
    let session = transition(makeSession({ mode }), { type: 'SETUP_COMPLETE' }, 1_500);
    if (session.phase === Phase.Planning) {
        session = transition(session, { type: 'PLAN_APPROVED' }, 1_600);
    }
    return session;
}

describe('createSession', () => {
    it('starts in setup with one creation entry', () => {
        const session = makeSession();
        expect(session.phase).toBe('setup');
        expect(session.revision).toBe(0);
        expect(session.audit).toEqual([{ at: 1_000, phase: 'setup', event: 'SESSION_CREATED', detail: 'mode=full' }]);
    });
});

describe('transition', () => {
    it('follows the full-mode path through every phase', () => {
        let session = makeSession();

        session = transition(session, { type: 'SETUP_COMPLETE' });
        expect(session.phase).toBe('planning');

        session = transition(session, { type: 'PLAN_APPROVED' });
        expect(session.phase).toBe('implementation');

        session = toValidation(session);
        expect(session.phase).toBe('validation');

        session = transition(session, { type: 'VALIDATION_COMPLETE', run: run(1, 'pass') });
        expect(session.phase).toBe('review');

        session = transition(session, { type: 'REVIEW_CLEARED' });
        expect(session.phase).toBe('reflection');

        session = transition(session, { type: 'REFLECTION_DONE', timedOut: false });
        expect(session.phase).toBe('complete');
        expect(isTerminal(session)).toBe(true);
    });

    it('sends an upgraded lightweight session back to planning as full mode', () => {
        const session = transition(toImplementation('lightweight'), { type: 'MODE_UPGRADED', reason: 'touches auth' }, 1_700);

        expect(session.phase).toBe('planning');
        expect(session.mode).toBe('full');
        expect(session.audit.at(-1)).toEqual({ at: 1_700, from: 'implementation', phase: 'planning', event: 'MODE_UPGRADED', detail: 'touches auth' });
        expect(transition(session, { type: 'PLAN_APPROVED' }).phase).toBe('implementation');
    });

    it('completes a reflection that ran out of time and says who was missing', () => {
        let session = toValidation(toImplementation('full'));
        session = transition(session, { type: 'VALIDATION_COMPLETE', run: run(1, 'pass') });
        session = transition(session, { type: 'REVIEW_CLEARED' });
        session = transition(session, { type: 'REFLECTION_DONE', timedOut: true, outstanding: ['reviewer-a'] }, 9_000);

        expect(session.phase).toBe('complete');
        expect(session.audit.at(-1)?.detail).toBe('soft deadline passed without reviewer-a; completing anyway');
    });

    it('refuses to upgrade a session that is already full', () => {
        expect(() => transition(toImplementation('full'), { type: 'MODE_UPGRADED', reason: 'x' })).toThrow(WorkflowError);
    });

    it('skips planning and reflection in lightweight mode', () => {
        let session = toImplementation('lightweight');
        expect(session.audit.map((e) => e.event)).toEqual(['SESSION_CREATED', 'SETUP_COMPLETE']);

        session = toValidation(session);
        session = transition(session, { type: 'VALIDATION_COMPLETE', run: run(1, 'pass') });
        session = transition(session, { type: 'REVIEW_CLEARED' });
        expect(session.phase).toBe('complete');
    });

    it('records the triggering event on every transition', () => {
        const session = toValidation(toImplementation());
        const last = session.audit[session.audit.length - 1];
        expect(last).toEqual({
            at: 2_000,
            from: 'implementation',
            phase: 'validation',
            event: 'READY_FOR_VALIDATION',
            detail: 'from implementer',
        });
    });

    it('does not mutate the input session', () => {
        const session = makeSession();
        transition(session, { type: 'SETUP_COMPLETE' });
        expect(session.phase).toBe('setup');
        expect(session.audit).toHaveLength(1);
    });

    it('throws on a transition the phase does not allow', () => {
        const session = makeSession();
        expect(() => transition(session, { type: 'PLAN_APPROVED' })).toThrow(WorkflowError);
        expect(() => transition(session, { type: 'PLAN_APPROVED' })).toThrow('Invalid transition: PLAN_APPROVED in phase "setup"');
    });

    it('rejects every event once the session is terminal', () => {
        let session = toImplementation('lightweight');
        session = toValidation(session);
        session = transition(session, { type: 'VALIDATION_COMPLETE', run: run(1, 'pass') });
        session = transition(session, { type: 'REVIEW_CLEARED' });

        expect(() => transition(session, { type: 'SETUP_COMPLETE' })).toThrow(WorkflowError);
    });
});

describe('bounded validation retry', () => {
    it('routes a failed run back to implementation with a count', () => {
        let session = toValidation(toImplementation());
        session = transition(session, { type: 'VALIDATION_COMPLETE', run: run(1, 'fail') }, 3_000);

        expect(session.phase).toBe('implementation');
        expect(session.iterations.consecutiveValidationFailures).toBe(1);
        expect(session.audit[session.audit.length - 1]?.detail).toBe('iteration 1 failed at compile (1/3)');
    });

    it('abandons with an escalation after the third consecutive failure', () => {
        let session = toImplementation();
        for (let i = 1; i <= 3; i++) {
            session = toValidation(session);
            session = transition(session, { type: 'VALIDATION_COMPLETE', run: run(i, 'fail') }, 3_000 + i);
        }

        expect(session.phase).toBe('abandoned');
        expect(session.iterations.validationRuns).toBe(3);
        expect(session.escalation?.kind).toBe('validation_exhausted');
        expect(session.escalation?.reason).toBe('Validation failed 3 consecutive time(s)');
        expect(session.escalation?.suggestedActions[0]).toBe('Fix compilation errors');
    });

    it('resets the failure count after a passing run', () => {
        let session = toImplementation();
        session = toValidation(session);
        session = transition(session, { type: 'VALIDATION_COMPLETE', run: run(1, 'fail') });
        session = toValidation(session);
        session = transition(session, { type: 'VALIDATION_COMPLETE', run: run(2, 'pass') });

        expect(session.phase).toBe('review');
        expect(session.iterations.consecutiveValidationFailures).toBe(0);
        expect(session.iterations.validationRuns).toBe(2);
    });
});

describe('review route-back', () => {
    function toReview(session: Session): Session {
        const validating = toValidation(session);
        return transition(validating, { type: 'VALIDATION_COMPLETE', run: run(validating.iterations.validationRuns + 1, 'pass') });
    }

    it('counts cycles and abandons past the limit', () => {
        let session = toImplementation();
        for (let cycle = 1; cycle <= 3; cycle++) {
            session = transition(toReview(session), { type: 'REVIEW_ROUTED_BACK', reason: 'escalated' });
            expect(session.phase).toBe('implementation');
            expect(session.iterations.reviewCycles).toBe(cycle);
        }

        session = transition(toReview(session), { type: 'REVIEW_ROUTED_BACK', reason: 'still escalated' });
        expect(session.phase).toBe('abandoned');
        expect(session.escalation?.kind).toBe('review_cycles_exhausted');
    });
});

describe('abandon', () => {
    it('is reachable from every non-terminal phase', () => {
        const escalation = {
            kind: 'interrupted' as const,
            phase: Phase.Planning,
            reason: 'stop',
            createdAt: 0,
            currentFailures: [],
            attempted: [],
            lastKnownGood: 'start',
            suggestedActions: [],
        };
        const planning = transition(makeSession(), { type: 'SETUP_COMPLETE' });
        const abandoned = transition(planning, { type: 'ABANDON', reason: 'stop', escalation });

        expect(abandoned.phase).toBe('abandoned');
        expect(abandoned.escalation).toEqual(escalation);
        expect(abandoned.audit[abandoned.audit.length - 1]?.from).toBe('planning');
    });
});

describe('note', () => {
    it('appends an entry without changing the phase', () => {
        const session = note(makeSession(), 'MODE_DOWNGRADED', 'touched package.json', 1_200);
        expect(session.phase).toBe('setup');
        expect(session.audit[1]).toEqual({ at: 1_200, phase: 'setup', event: 'MODE_DOWNGRADED', detail: 'touched package.json' });
    });
});
