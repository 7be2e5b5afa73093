/**
 * Escalation reports: the structured account attached to every
 * abandonment and every judgment conflict surfaced to a human.
 *
 * A report always says what is failing now, what was attempted, what
 * state last worked, and what to try next.
 *
 * Dependency direction: escalation.ts → engine (types), checks, findings, gates
 * Used by: engine, workflow runner, cli
 */

import { failureContext, type ValidationRun } from './checks.js';
import type { Phase, Session } from './engine.js';
import type { Finding } from './findings.js';
import type { GateEscalation } from './gates.js';

export type EscalationKind =
    | 'gate_timeout'
    | 'validation_exhausted'
    | 'review_escalation'
    | 'review_cycles_exhausted'
    | 'reverdict_exhausted'
    | 'actor_failure'
    | 'interrupted';

export interface EscalatedFinding {
    id: string;
    raisedBy: string;
    severity: string;
    description: string;
    justification?: string;
}

export interface EscalationReport {
    kind: EscalationKind;
    phase: Phase;
    reason: string;
    createdAt: number;
    currentFailures: string[];
    attempted: string[];
    lastKnownGood: string;
    suggestedActions: string[];
    gate?: GateEscalation;
    findings?: EscalatedFinding[];
}

/**
 * Chronological list of what the session tried: transitions and check runs.
 */
export function attemptedHistory(session: Session): string[] {
    const transitions = session.audit
        .filter((entry) => entry.from !== undefined)
        .map((entry) => {
            const detail = entry.detail ? `: ${entry.detail}` : '';
            return `${entry.from} → ${entry.phase} (${entry.event}${detail})`;
        });

    const runs = session.validationRuns.map((run) => {
        const where = run.failedLayer ? ` at ${run.failedLayer}` : '';
        return `validation #${run.iteration}: ${run.outcome}${where}`;
    });

    return [...transitions, ...runs];
}

/**
 * The most recent state known to be good.
 */
export function lastKnownGood(session: Session): string {
    const passed = [...session.validationRuns].reverse().find((run) => run.outcome === 'pass');
    if (passed) {
        return `validation iteration ${passed.iteration} passed all layers`;
    }
    const { commit, branch } = session.startMarker;
    return `start marker ${commit.slice(0, 12)} on ${branch}`;
}

export function gateTimeoutEscalation(session: Session, gate: GateEscalation, now: number = Date.now()): EscalationReport {
    return {
        kind: 'gate_timeout',
        phase: session.phase,
        reason: `Gate "${gate.gate}" timed out after ${gate.rounds}/${gate.maxRounds} round(s)`,
        createdAt: now,
        currentFailures: gate.outstanding.map((actor) => `${actor} has not confirmed`),
        attempted: attemptedHistory(session),
        lastKnownGood: lastKnownGood(session),
        suggestedActions: [
            `Check why ${gate.outstanding.join(', ')} did not respond`,
            'Restart the session with `reviewloop start --continue <session>`',
        ],
        gate,
    };
}

export function validationEscalation(session: Session, run: ValidationRun, now: number = Date.now()): EscalationReport {
    const failure = failureContext(run);
    const failures = failure
        ? [`${failure.layer} failed: ${failure.output.split('\n').slice(0, 5).join('\n')}`]
        : [];

    return {
        kind: 'validation_exhausted',
        phase: session.phase,
        reason: `Validation failed ${session.iterations.consecutiveValidationFailures} consecutive time(s)`,
        createdAt: now,
        currentFailures: failures,
        attempted: attemptedHistory(session),
        lastKnownGood: lastKnownGood(session),
        suggestedActions: [
            failure?.hint ? failure.hint : 'Fix the failing layer manually',
            'Inspect the change with `reviewloop rollback <session> --inspect`',
            'Narrow the task and start a new session',
        ],
    };
}

export function reviewEscalation(
    session: Session,
    findings: readonly Finding[],
    reason: string,
    now: number = Date.now(),
): EscalationReport {
    return {
        kind: 'review_escalation',
        phase: session.phase,
        reason,
        createdAt: now,
        currentFailures: findings.map((f) => `${f.id} (${f.severity}, ${f.raisedBy}): ${f.description}`),
        attempted: attemptedHistory(session),
        lastKnownGood: lastKnownGood(session),
        suggestedActions: [
            'Accept the deferral and override the reviewer',
            'Route the change back to implementation',
        ],
        findings: findings.map(toEscalatedFinding),
    };
}

export function reviewCyclesEscalation(session: Session, reason: string, now: number = Date.now()): EscalationReport {
    const unresolved = session.findings.filter((f) => f.status === 'escalated' || f.status === 'open');
    return {
        kind: 'review_cycles_exhausted',
        phase: session.phase,
        reason: `Review routed back ${session.iterations.reviewCycles} time(s); limit is ${session.limits.maxReviewCycles}. Last reason: ${reason}`,
        createdAt: now,
        currentFailures: unresolved.map((f) => `${f.id} (${f.raisedBy}): ${f.description}`),
        attempted: attemptedHistory(session),
        lastKnownGood: lastKnownGood(session),
        suggestedActions: [
            'Split the disputed findings into their own task',
            'Adjudicate the disagreement with the reviewers directly',
        ],
        findings: unresolved.map(toEscalatedFinding),
    };
}

export function reverdictEscalation(session: Session, stale: readonly string[], now: number = Date.now()): EscalationReport {
    return {
        kind: 'reverdict_exhausted',
        phase: session.phase,
        reason: `Reviewers kept seeing a moving change after ${session.iterations.reverdictRounds} re-verdict round(s)`,
        createdAt: now,
        currentFailures: stale.map((reviewer) => `${reviewer} has no verdict for revision ${session.revision}`),
        attempted: attemptedHistory(session),
        lastKnownGood: lastKnownGood(session),
        suggestedActions: ['Freeze the change and request verdicts again in a new session'],
    };
}

export function actorFailureEscalation(session: Session, actor: string, error: string, now: number = Date.now()): EscalationReport {
    return {
        kind: 'actor_failure',
        phase: session.phase,
        reason: `Actor ${actor} failed: ${error}`,
        createdAt: now,
        currentFailures: [error],
        attempted: attemptedHistory(session),
        lastKnownGood: lastKnownGood(session),
        suggestedActions: [
            `Check the worker command configured for ${actor}`,
            'Restart the session with `reviewloop start --continue <session>`',
        ],
    };
}

export function interruptedEscalation(session: Session, reason: string, now: number = Date.now()): EscalationReport {
    return {
        kind: 'interrupted',
        phase: session.phase,
        reason,
        createdAt: now,
        currentFailures: [],
        attempted: attemptedHistory(session),
        lastKnownGood: lastKnownGood(session),
        suggestedActions: [
            'Inspect partial work with `reviewloop rollback <session> --inspect`',
            'Restart from setup with `reviewloop start --continue <session>`',
        ],
    };
}

function toEscalatedFinding(finding: Finding): EscalatedFinding {
    const entry: EscalatedFinding = {
        id: finding.id,
        raisedBy: finding.raisedBy,
        severity: finding.severity,
        description: finding.description,
    };
    if (finding.justification) entry.justification = finding.justification;
    return entry;
}
