/**
 * Session state machine.
 *
 *   setup → planning → implementation → validation → review → reflection → complete
 *
 * `lightweight` sessions skip planning and reflection; `abandoned` is
 * reachable from every non-terminal phase. Transitions are pure: each
 * returns a new session with an audit entry naming the triggering event.
 *
 * Dependency direction: engine.ts → escalation, findings, checks, core/errors
 * Used by: workflow runner, session store
 */

import type { ReviewerDomain, Severity } from '../config/types.js';
import { WorkflowError } from '../errors.js';
import type { ValidationRun } from './checks.js';
import type { SessionMode } from './eligibility.js';
import type { EscalationReport } from './escalation.js';
import { reviewCyclesEscalation, validationEscalation } from './escalation.js';
import type { Finding, Verdict } from './findings.js';
import type { GateStatus } from './gates.js';

export const Phase = {
    Setup: 'setup',
    Planning: 'planning',
    Implementation: 'implementation',
    Validation: 'validation',
    Review: 'review',
    Reflection: 'reflection',
    Complete: 'complete',
    Abandoned: 'abandoned',
} as const;

export type Phase = (typeof Phase)[keyof typeof Phase];

export type ActorRole = 'implementer' | 'reviewer';

export type ActorStatus = 'active' | 'idle';

/** One immutable line of the audit trail. */
export interface AuditEntry {
    at: number;
    /** Phase after the entry was recorded. */
    phase: Phase;
    event: string;
    /** Set on transitions. */
    from?: Phase;
    detail?: string;
}

export interface RosterEntry {
    name: string;
    role: ActorRole;
    domain?: ReviewerDomain;
    blockingThreshold?: Severity;
    status: ActorStatus;
}

/** Repository state at session creation, used for rollback. */
export interface StartMarker {
    /** HEAD when the session started. */
    commit: string;
    /**
     * Commit holding the whole working tree at that moment, untracked files
     * included. Equals `commit` when the tree was clean. Change listing, diff
     * and hard revert are measured against it.
     */
    snapshot: string;
    branch: string;
    /** Uncommitted changes existed when the marker was taken. */
    dirty: boolean;
    capturedAt: number;
}

export interface VerdictRecord {
    reviewer: string;
    verdict: Verdict;
    /** What the reviewer said, when it differs from what its findings imply. */
    claimed?: Verdict;
    /** Change revision the verdict was given against. */
    revision: number;
    messageId: string;
    at: number;
    /** The reviewer raised findings after this verdict. */
    stale?: boolean;
    /** Set when adjudication overrode an escalated verdict. */
    overriddenBy?: string;
}

/** Persisted row of the gate confirmation table. */
export interface GateRecord {
    name: string;
    required: string[];
    confirmed: string[];
    round: number;
    maxRounds: number;
    status: GateStatus;
    openedAt: number;
}

export interface Iterations {
    validationRuns: number;
    consecutiveValidationFailures: number;
    reviewCycles: number;
    planningRounds: number;
    reverdictRounds: number;
}

export interface SessionLimits {
    maxValidationAttempts: number;
    maxReviewCycles: number;
    maxReverdictRounds: number;
}

export interface Session {
    id: string;
    task: string;
    requestedMode: SessionMode;
    mode: SessionMode;
    phase: Phase;
    specialist?: string;
    iterations: Iterations;
    limits: SessionLimits;
    roster: RosterEntry[];
    startMarker: StartMarker;
    gates: GateRecord[];
    verdicts: Record<string, VerdictRecord>;
    findings: Finding[];
    validationRuns: ValidationRun[];
    /** Bumped whenever the implementer changes the code under review. */
    revision: number;
    audit: AuditEntry[];
    escalation?: EscalationReport;
    previousSessionId?: string;
    /** Id of the session that continued this one. */
    supersededBy?: string;
    createdAt: number;
    updatedAt: number;
}

export type SessionEvent =
    | { type: 'SETUP_COMPLETE' }
    | { type: 'PLAN_APPROVED' }
    | { type: 'READY_FOR_VALIDATION'; from: string }
    /** A lightweight change touched a sensitive path: plan it as full mode. */
    | { type: 'MODE_UPGRADED'; reason: string }
    | { type: 'VALIDATION_COMPLETE'; run: ValidationRun }
    | { type: 'REVIEW_CLEARED'; detail?: string }
    | { type: 'REVIEW_ROUTED_BACK'; reason: string }
    /** `outstanding` lists the actors that had not reflected when the deadline passed. */
    | { type: 'REFLECTION_DONE'; timedOut: boolean; outstanding?: readonly string[] }
    | { type: 'ABANDON'; reason: string; escalation: EscalationReport };

export interface CreateSessionInput {
    id: string;
    task: string;
    requestedMode: SessionMode;
    mode: SessionMode;
    limits: SessionLimits;
    roster: RosterEntry[];
    startMarker: StartMarker;
    specialist?: string;
    previousSessionId?: string;
}

const TERMINAL: ReadonlySet<Phase> = new Set<Phase>([Phase.Complete, Phase.Abandoned]);

/**
 * Create a session in the `setup` phase.
 */
export function createSession(input: CreateSessionInput, now: number = Date.now()): Session {
    const session: Session = {
        id: input.id,
        task: input.task,
        requestedMode: input.requestedMode,
        mode: input.mode,
        phase: Phase.Setup,
        iterations: {
            validationRuns: 0,
            consecutiveValidationFailures: 0,
            reviewCycles: 0,
            planningRounds: 0,
            reverdictRounds: 0,
        },
        limits: { ...input.limits },
        roster: input.roster.map((entry) => ({ ...entry })),
        startMarker: { ...input.startMarker },
        gates: [],
        verdicts: {},
        findings: [],
        validationRuns: [],
        revision: 0,
        audit: [{ at: now, phase: Phase.Setup, event: 'SESSION_CREATED', detail: `mode=${input.mode}` }],
        createdAt: now,
        updatedAt: now,
    };
    if (input.specialist) session.specialist = input.specialist;
    if (input.previousSessionId) session.previousSessionId = input.previousSessionId;
    return session;
}

export function isTerminal(session: Session): boolean {
    return TERMINAL.has(session.phase);
}

/**
 * Append a non-transition entry to the audit trail.
 */
export function note(session: Session, event: string, detail?: string, now: number = Date.now()): Session {
    const entry: AuditEntry = detail === undefined
        ? { at: now, phase: session.phase, event }
        : { at: now, phase: session.phase, event, detail };
    return { ...session, audit: [...session.audit, entry], updatedAt: now };
}

/**
 * Apply an event. Throws on a transition the current phase does not allow.
 */
export function transition(session: Session, event: SessionEvent, now: number = Date.now()): Session {
    if (isTerminal(session)) {
        throw invalid(session, event);
    }

    if (event.type === 'ABANDON') {
        return move({ ...session, escalation: event.escalation }, Phase.Abandoned, event.type, event.reason, now);
    }

    switch (session.phase) {
        case Phase.Setup:
            if (event.type !== 'SETUP_COMPLETE') break;
            return move(
                session,
                session.mode === 'full' ? Phase.Planning : Phase.Implementation,
                event.type,
                `mode=${session.mode}`,
                now,
            );

        case Phase.Planning:
            if (event.type !== 'PLAN_APPROVED') break;
            return move(session, Phase.Implementation, event.type, undefined, now);

        case Phase.Implementation:
            if (event.type === 'MODE_UPGRADED' && session.mode === 'lightweight') {
                return move({ ...session, mode: 'full' }, Phase.Planning, event.type, event.reason, now);
            }
            if (event.type !== 'READY_FOR_VALIDATION') break;
            return move(session, Phase.Validation, event.type, `from ${event.from}`, now);

        case Phase.Validation:
            if (event.type !== 'VALIDATION_COMPLETE') break;
            return applyValidation(session, event.run, now);

        case Phase.Review:
            if (event.type === 'REVIEW_CLEARED') {
                return move(
                    session,
                    session.mode === 'full' ? Phase.Reflection : Phase.Complete,
                    event.type,
                    event.detail,
                    now,
                );
            }
            if (event.type === 'REVIEW_ROUTED_BACK') {
                return applyRouteBack(session, event.reason, now);
            }
            break;

        case Phase.Reflection:
            if (event.type !== 'REFLECTION_DONE') break;
            return move(
                session,
                Phase.Complete,
                event.type,
                event.timedOut ? reflectionTimeoutDetail(event.outstanding ?? []) : 'all actors reflected',
                now,
            );
    }

    throw invalid(session, event);
}

// ── Private helpers ──

function applyValidation(session: Session, run: ValidationRun, now: number): Session {
    const recorded: Session = {
        ...session,
        validationRuns: [...session.validationRuns, run],
        iterations: { ...session.iterations, validationRuns: session.iterations.validationRuns + 1 },
    };

    if (run.outcome === 'pass') {
        return move(
            { ...recorded, iterations: { ...recorded.iterations, consecutiveValidationFailures: 0 } },
            Phase.Review,
            'VALIDATION_PASSED',
            `iteration ${run.iteration}`,
            now,
        );
    }

    const failures = recorded.iterations.consecutiveValidationFailures + 1;
    const counted: Session = {
        ...recorded,
        iterations: { ...recorded.iterations, consecutiveValidationFailures: failures },
    };
    const detail = `iteration ${run.iteration} failed at ${run.failedLayer ?? 'unknown layer'} (${failures}/${session.limits.maxValidationAttempts})`;

    if (failures < session.limits.maxValidationAttempts) {
        return move(counted, Phase.Implementation, 'VALIDATION_FAILED', detail, now);
    }

    return move(
        { ...counted, escalation: validationEscalation(counted, run, now) },
        Phase.Abandoned,
        'VALIDATION_EXHAUSTED',
        detail,
        now,
    );
}

function applyRouteBack(session: Session, reason: string, now: number): Session {
    const cycles = session.iterations.reviewCycles + 1;
    const counted: Session = {
        ...session,
        iterations: { ...session.iterations, reviewCycles: cycles },
    };
    const detail = `${reason} (cycle ${cycles}/${session.limits.maxReviewCycles})`;

    if (cycles <= session.limits.maxReviewCycles) {
        return move(counted, Phase.Implementation, 'REVIEW_ROUTED_BACK', detail, now);
    }

    return move(
        { ...counted, escalation: reviewCyclesEscalation(counted, reason, now) },
        Phase.Abandoned,
        'REVIEW_CYCLES_EXHAUSTED',
        detail,
        now,
    );
}

function reflectionTimeoutDetail(outstanding: readonly string[]): string {
    if (outstanding.length === 0) return 'soft deadline passed; completing anyway';
    return `soft deadline passed without ${outstanding.join(', ')}; completing anyway`;
}

function move(session: Session, to: Phase, event: string, detail: string | undefined, now: number): Session {
    const entry: AuditEntry = detail === undefined
        ? { at: now, from: session.phase, phase: to, event }
        : { at: now, from: session.phase, phase: to, event, detail };

    return {
        ...session,
        phase: to,
        audit: [...session.audit, entry],
        updatedAt: now,
    };
}

function invalid(session: Session, event: SessionEvent): WorkflowError {
    return new WorkflowError(
        `Invalid transition: ${event.type} in phase "${session.phase}"`,
        { phase: session.phase, event: event.type, sessionId: session.id },
    );
}
