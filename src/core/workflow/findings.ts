/**
 * Finding ledger: review findings, their severity and resolution state.
 *
 * Findings are never deleted. A finding below its reviewer's blocking
 * threshold is recorded straight away as accepted technical debt.
 *
 *   open ──────────────┬──▶ fixed
 *                      └──▶ deferred_proposed ──┬──▶ deferred_accepted
 *                                               └──▶ escalated ──┬──▶ deferred_accepted (adjudicated)
 *                                                                └──▶ fixed (after route-back)
 *
 * Dependency direction: findings.ts → config/schema, core/errors
 * Used by: workflow runner, session store, escalation reports
 */

import { severitySchema } from '../config/schema.js';
import type { Severity } from '../config/types.js';
import { ValidationError, WorkflowError } from '../errors.js';

export type FindingStatus = 'open' | 'fixed' | 'deferred_proposed' | 'deferred_accepted' | 'escalated';

export type Verdict = 'clear' | 'resolved' | 'escalated';

export interface FindingEvent {
    at: number;
    status: FindingStatus;
    note?: string;
}

export interface Finding {
    id: string;
    raisedBy: string;
    description: string;
    severity: Severity;
    /** Whether the severity reached the reviewer's blocking threshold. */
    blocking: boolean;
    status: FindingStatus;
    /** Present iff the finding is deferred_proposed, deferred_accepted or escalated. */
    justification?: string;
    /** Set when adjudication sends the escalated finding back to be fixed. */
    routedBack?: boolean;
    raisedAt: number;
    history: FindingEvent[];
}

export interface RaiseFindingInput {
    raisedBy: string;
    description: string;
    severity: Severity;
}

const SEVERITY_ORDER: readonly Severity[] = severitySchema.options;

/** Whether `severity` is at or above `threshold`. */
export function isAtLeast(severity: Severity, threshold: Severity): boolean {
    return SEVERITY_ORDER.indexOf(severity) >= SEVERITY_ORDER.indexOf(threshold);
}

/** Settled findings need nothing more from either party. */
export function isSettled(finding: Finding): boolean {
    return finding.status === 'fixed'
        || finding.status === 'deferred_accepted'
        || finding.status === 'escalated';
}

/**
 * A reviewer's verdict as implied by its findings.
 */
export function deriveVerdict(findings: readonly Finding[]): Verdict {
    if (findings.length === 0) return 'clear';

    const unresolved = findings.some(
        (f) => f.status === 'escalated' || f.status === 'open' || f.status === 'deferred_proposed',
    );
    return unresolved ? 'escalated' : 'resolved';
}

export class FindingLedger {
    private readonly findings: Finding[];
    private readonly clock: () => number;
    private seq: number;

    constructor(existing: readonly Finding[] = [], clock: () => number = Date.now) {
        this.findings = existing.map((f) => ({ ...f, history: [...f.history] }));
        this.clock = clock;
        this.seq = this.findings.length;
    }

    /**
     * Record a new finding. Below-threshold findings become technical debt at once.
     */
    raise(input: RaiseFindingInput, threshold: Severity): Finding {
        const description = input.description.trim();
        if (!description) {
            throw new ValidationError('A finding needs a description', { raisedBy: input.raisedBy });
        }

        this.seq += 1;
        const now = this.clock();
        const blocking = isAtLeast(input.severity, threshold);

        const finding: Finding = blocking
            ? {
                id: `F-${this.seq}`,
                raisedBy: input.raisedBy,
                description,
                severity: input.severity,
                blocking,
                status: 'open',
                raisedAt: now,
                history: [{ at: now, status: 'open' }],
            }
            : {
                id: `F-${this.seq}`,
                raisedBy: input.raisedBy,
                description,
                severity: input.severity,
                blocking,
                status: 'deferred_accepted',
                justification: `Below the ${threshold} blocking threshold; recorded as technical debt`,
                raisedAt: now,
                history: [{ at: now, status: 'deferred_accepted', note: 'non-blocking severity' }],
            };

        this.findings.push(finding);
        return finding;
    }

    /** Open findings can be fixed; escalated ones only after a route-back. */
    markFixed(id: string, note?: string): Finding {
        const current = this.get(id);
        const allowed: FindingStatus[] = current?.routedBack ? ['open', 'escalated'] : ['open'];
        const finding = this.expect(id, allowed, 'fix');
        delete finding.justification;
        return this.move(finding, 'fixed', note);
    }

    /** Adjudication: send an escalated finding back to the implementer to fix. */
    routeBack(id: string, note: string): Finding {
        const finding = this.expect(id, ['escalated'], 'route back');
        finding.routedBack = true;
        return this.move(finding, 'escalated', note);
    }

    proposeDeferral(id: string, justification: string): Finding {
        const text = justification.trim();
        if (!text) {
            throw new ValidationError(`Deferring ${id} needs a justification`, { id });
        }
        const finding = this.expect(id, ['open'], 'defer');
        finding.justification = text;
        return this.move(finding, 'deferred_proposed');
    }

    acceptDeferral(id: string, note?: string): Finding {
        const finding = this.expect(id, ['deferred_proposed'], 'accept the deferral of');
        return this.move(finding, 'deferred_accepted', note);
    }

    rejectDeferral(id: string, reason: string): Finding {
        const finding = this.expect(id, ['deferred_proposed'], 'reject the deferral of');
        return this.move(finding, 'escalated', reason);
    }

    /** Adjudication: accept the deferral over the reviewer's objection. */
    overrideEscalation(id: string, note: string): Finding {
        const finding = this.expect(id, ['escalated'], 'override');
        return this.move(finding, 'deferred_accepted', note);
    }

    get(id: string): Finding | undefined {
        return this.findings.find((f) => f.id === id);
    }

    all(): readonly Finding[] {
        return this.findings;
    }

    raisedBy(reviewer: string): Finding[] {
        return this.findings.filter((f) => f.raisedBy === reviewer);
    }

    withStatus(status: FindingStatus): Finding[] {
        return this.findings.filter((f) => f.status === status);
    }

    /** Deep copy for persistence. */
    snapshot(): Finding[] {
        return this.findings.map((f) => ({ ...f, history: [...f.history] }));
    }

    // ── Private helpers ──

    private expect(id: string, from: readonly FindingStatus[], action: string): Finding {
        const finding = this.get(id);
        if (!finding) {
            throw new WorkflowError(`Unknown finding ${id}`, { id });
        }
        if (!from.includes(finding.status)) {
            throw new WorkflowError(
                `Cannot ${action} ${id} while it is ${finding.status}`,
                { id, status: finding.status, allowed: from },
            );
        }
        return finding;
    }

    private move(finding: Finding, status: FindingStatus, note?: string): Finding {
        finding.status = status;
        finding.history.push(note ? { at: this.clock(), status, note } : { at: this.clock(), status });
        return finding;
    }
}
