/**
 * Workflow runner: the orchestrator that owns a session from setup to the end.
 *
 * This is the main "brain" that:
 * 1. Captures the start marker, picks the mode and specialist, spawns the roster
 * 2. Reads the orchestrator mailbox and applies qualifying messages
 * 3. Opens and polls the gates of planning, review and reflection
 * 4. Runs the check layers and routes failures back to the implementer
 * 5. Surfaces escalations for adjudication and persists every change
 *
 * Actors never touch the session: they send messages, and only this class
 * records findings, verdicts and transitions.
 *
 * Dependency direction: runner.ts → engine, gates, findings, checks, eligibility,
 *                       classifier, escalation, agents/factory, git/client, messaging
 * Used by: cli/commands/start.ts
 */

import type { AppConfig } from '../config/types.js';
import { ValidationError, WorkflowError, errorMessage } from '../errors.js';
import { ORCHESTRATOR, MessageBus, type Message } from '../messaging/bus.js';
import { MessageKind, isQualifying } from '../messaging/kinds.js';
import {
    deferralDecisionPayload,
    deferralProposedPayload,
    findingRaisedPayload,
    findingRefPayload,
    readyForValidationPayload,
    verdictPayload,
} from '../messaging/protocol.js';
import { createRoster, rosterEntries, type Roster } from '../../agents/factory.js';
import type { Actor } from '../../agents/base.js';
import type { ReviewerActor } from '../../agents/roles/reviewer.js';
import type { WorkerFactory } from '../../agents/types.js';
import { GitClient, type RepositoryPort } from '../../git/client.js';
import { createLogger } from '../../utils/logger.js';
import type { CheckRunner } from './checks.js';
import { failureContext } from './checks.js';
import { classify } from './classifier.js';
import { decideMode, type SessionMode } from './eligibility.js';
import {
    Phase,
    createSession,
    isTerminal,
    note,
    transition,
    type AuditEntry,
    type GateRecord,
    type Session,
    type SessionEvent,
    type VerdictRecord,
} from './engine.js';
import {
    actorFailureEscalation,
    gateTimeoutEscalation,
    interruptedEscalation,
    reverdictEscalation,
    reviewEscalation,
    type EscalationReport,
} from './escalation.js';
import { FindingLedger, deriveVerdict, isSettled, type Finding } from './findings.js';
import { GateController, type Gate } from './gates.js';
import { generateSessionId } from './session.js';

const log = createLogger('orchestrator');

export type AdjudicationDecision = 'accept_deferrals' | 'route_back' | 'abandon';

/** Decides escalated reviews. Never called for anything else. */
export interface Adjudicator {
    readonly name: string;
    decide(report: EscalationReport, session: Session): Promise<AdjudicationDecision>;
}

/** Where the orchestrator persists its record. */
export interface SessionSink {
    save(session: Session): void;
    /** Returns the path of the written document. */
    writeHandoff(session: Session): string;
}

export interface OrchestratorOptions {
    config: AppConfig;
    projectRoot: string;
    repository: RepositoryPort;
    workers: WorkerFactory;
    checks: CheckRunner;
    adjudicator: Adjudicator;
    sink: SessionSink;
    /** Defaults to a fresh bus; injectable so callers can observe traffic. */
    bus?: MessageBus;
    clock?: () => number;
    /** Aborting abandons the session as interrupted. */
    signal?: AbortSignal;
    /** Called for every audit entry as it is recorded. */
    onAudit?: (entry: AuditEntry, session: Session) => void;
}

export interface StartRequest {
    task: string;
    mode: SessionMode;
    specialist?: string;
    /** Restart from setup with this session's task and start marker. */
    continueFrom?: Session;
    /** Paths for the eligibility check; defaults to the repository's changed files. */
    paths?: string[];
}

export interface SessionOutcome {
    session: Session;
    handoffPath?: string;
}

export class Orchestrator {
    private readonly config: AppConfig;
    private readonly projectRoot: string;
    private readonly repository: RepositoryPort;
    private readonly workers: WorkerFactory;
    private readonly checks: CheckRunner;
    private readonly adjudicator: Adjudicator;
    private readonly sink: SessionSink;
    private readonly bus: MessageBus;
    private readonly clock: () => number;
    private readonly signal: AbortSignal | undefined;
    private readonly onAudit: ((entry: AuditEntry, session: Session) => void) | undefined;

    private readonly gates: GateController;
    private readonly ledger: FindingLedger;
    private readonly verdicts = new Map<string, VerdictRecord>();
    /** Verdicts waiting for their reviewer's findings to settle. */
    private readonly parked = new Map<string, { claimed: VerdictRecord['verdict']; message: Message }>();

    private roster: Roster | undefined;
    private current: Session | undefined;
    private gate: Gate | undefined;
    private changeFiles: string[] = [];
    private interruption: string | undefined;
    private started = false;

    constructor(options: OrchestratorOptions) {
        this.config = options.config;
        this.projectRoot = options.projectRoot;
        this.repository = options.repository;
        this.workers = options.workers;
        this.checks = options.checks;
        this.adjudicator = options.adjudicator;
        this.sink = options.sink;
        this.clock = options.clock ?? Date.now;
        this.bus = options.bus ?? new MessageBus(this.clock);
        this.signal = options.signal;
        this.onAudit = options.onAudit;
        this.gates = new GateController(this.clock);
        this.ledger = new FindingLedger([], this.clock);
    }

    /** The session record; undefined before setup. */
    get session(): Session | undefined {
        return this.current;
    }

    /**
     * Drive one session to `complete` or `abandoned`.
     * @throws {ValidationError} when the specialist cannot be determined
     */
    async run(request: StartRequest): Promise<SessionOutcome> {
        if (this.started) {
            throw new WorkflowError('An orchestrator runs a single session');
        }
        this.started = true;

        const onAbort = (): void => this.interrupt();

        try {
            await this.setup(request);
            this.signal?.addEventListener('abort', onAbort, { once: true });
            if (this.signal?.aborted) this.interrupt();
            await this.loop();
        } catch (err) {
            await this.fail(err);
            throw err;
        } finally {
            this.signal?.removeEventListener('abort', onAbort);
        }

        await this.shutdown();
        const session = this.state;

        if (session.phase === Phase.Complete) {
            return { session, handoffPath: this.sink.writeHandoff(session) };
        }
        return { session };
    }

    // ── Setup ──

    private async setup(request: StartRequest): Promise<void> {
        const previous = request.continueFrom;
        const task = previous ? previous.task : request.task.trim();
        if (!task) {
            throw new ValidationError('A session needs a task description');
        }

        const specialist = this.resolveSpecialist(task, request.specialist ?? previous?.specialist);
        const now = this.clock();
        const marker = previous ? { ...previous.startMarker } : await this.repository.captureStartMarker(now);

        if (this.config.workflow.autoCreateBranch && !previous) {
            await this.repository.createBranch(GitClient.toBranchName(this.config.workflow.branchPrefix, task));
        }

        const files = request.paths ?? await this.repository.changedFiles(marker);
        const decision = decideMode(request.mode, files, this.config.modes.sensitivePaths);
        this.changeFiles = [...files];

        this.bus.register(ORCHESTRATOR);
        this.roster = createRoster(this.config, this.bus, this.workers);

        const id = generateSessionId(task, now);
        let session = createSession({
            id,
            task,
            requestedMode: request.mode,
            mode: decision.mode,
            limits: {
                maxValidationAttempts: this.config.workflow.maxValidationAttempts,
                maxReviewCycles: this.config.workflow.maxReviewCycles,
                maxReverdictRounds: this.config.workflow.maxReverdictRounds,
            },
            roster: rosterEntries(this.roster),
            startMarker: marker,
            ...(specialist ? { specialist } : {}),
            ...(previous ? { previousSessionId: previous.id } : {}),
        }, now);

        if (previous) {
            session = note(session, 'CONTINUED_FROM', `${previous.id} (${previous.phase})`, now);
            this.sink.save(supersede(previous, id, now));
        }
        if (decision.downgraded && decision.note) {
            session = note(session, 'MODE_DOWNGRADED', decision.note, now);
            log.warn(decision.note);
        }
        this.commit(session);

        log.info(`Session ${id}: ${decision.mode} mode${specialist ? `, specialist ${specialist}` : ''}`);

        for (const actor of this.actors()) {
            actor.start();
        }

        this.send(this.roster.implementer.name, MessageKind.Task, task, {
            sessionId: id,
            mode: decision.mode,
            planRequired: decision.mode === 'full',
            files: this.changeFiles,
            ...(specialist ? { specialist } : {}),
        });

        await this.apply({ type: 'SETUP_COMPLETE' });
    }

    private resolveSpecialist(task: string, override: string | undefined): string | undefined {
        const labels = this.config.specialists.map((s) => s.label);
        if (override) {
            if (!labels.includes(override)) {
                throw new ValidationError(
                    `Unknown specialist "${override}". Known: ${labels.join(', ')}`,
                    { specialist: override },
                );
            }
            return override;
        }

        const result = classify(task, this.config.specialists);
        switch (result.kind) {
            case 'match':
                log.debug(`Specialist ${result.label} (matched "${result.keyword}")`);
                return result.label;
            case 'ambiguous':
                throw new ValidationError(
                    `Task matches several specialists equally (${result.candidates.join(', ')}); choose one with --specialist`,
                    { candidates: result.candidates },
                );
            case 'none':
                return undefined;
        }
    }

    // ── Main loop ──

    private async loop(): Promise<void> {
        while (!isTerminal(this.state)) {
            if (this.interruption !== undefined) {
                await this.abandon(interruptedEscalation(this.synced(), this.interruption, this.clock()));
                break;
            }

            await this.checkGate();
            if (isTerminal(this.state)) break;

            const gate = this.gate;
            const timeout = gate ? this.gates.remaining(gate) : undefined;
            const message = await this.bus.receive(ORCHESTRATOR, timeout);

            if (message) {
                await this.route(message);
            } else if (this.bus.isClosed) {
                if (this.interruption === undefined) {
                    throw new WorkflowError('Message bus closed while the session was running');
                }
            } else if (gate) {
                await this.onGateTimeout(gate);
            }
        }
    }

    private async route(message: Message): Promise<void> {
        if (!isQualifying(message.kind)) {
            log.debug(`Conversation from ${message.from}: ${message.kind}`);
            return;
        }
        const phase = this.state.phase;

        switch (message.kind) {
            case MessageKind.PlanDraft:
                if (phase !== Phase.Planning || !this.isImplementer(message.from)) {
                    return this.violation(message, `plan drafts come from the implementer during planning`);
                }
                for (const reviewer of this.reviewerNames()) {
                    this.send(reviewer, MessageKind.PlanReview, message.body, { ...message.payload, round: this.gate?.round ?? 1 });
                }
                return;

            case MessageKind.PlanConfirmed:
                if (phase !== Phase.Planning || !this.gate) {
                    return this.violation(message, 'no plan is awaiting confirmation');
                }
                this.confirm(this.gate, message);
                return;

            case MessageKind.ReadyForValidation:
                if (phase !== Phase.Implementation || !this.isImplementer(message.from)) {
                    return this.violation(message, 'only the implementer reports readiness, during implementation');
                }
                return this.onReadyForValidation(message);

            case MessageKind.FindingRaised:
                return this.onFindingRaised(message);

            case MessageKind.FindingFixed:
                return this.onFindingFixed(message);

            case MessageKind.DeferralProposed:
                return this.onDeferralProposed(message);

            case MessageKind.DeferralAccepted:
            case MessageKind.DeferralRejected:
                return this.onDeferralDecision(message);

            case MessageKind.Verdict:
                return this.onVerdict(message);

            case MessageKind.ReflectionDone:
                if (phase !== Phase.Reflection || !this.gate) {
                    return this.violation(message, 'reflection has not been requested');
                }
                this.confirm(this.gate, message);
                return;

            case MessageKind.ActorError:
                return this.onActorError(message);
        }
    }

    // ── Gates ──

    private async checkGate(): Promise<void> {
        const gate = this.gate;
        if (!gate || this.gates.poll(gate) !== 'satisfied') return;

        switch (this.state.phase) {
            case Phase.Planning:
                this.closeGate();
                this.commit({
                    ...this.synced(),
                    iterations: { ...this.state.iterations, planningRounds: gate.round },
                });
                this.send(this.implementerName(), MessageKind.PlanApproved, 'Plan confirmed by every reviewer; implement it.');
                await this.apply({ type: 'PLAN_APPROVED' });
                return;

            case Phase.Review:
                this.closeGate();
                await this.onReviewGateSatisfied();
                return;

            case Phase.Reflection:
                this.closeGate();
                await this.apply({ type: 'REFLECTION_DONE', timedOut: false });
                return;
        }
    }

    private async onGateTimeout(gate: Gate): Promise<void> {
        if (this.gates.poll(gate) !== 'timed_out') return;

        if (this.state.phase === Phase.Reflection) {
            const missing = this.gates.outstanding(gate);
            this.closeGate();
            await this.apply({ type: 'REFLECTION_DONE', timedOut: true, outstanding: missing });
            return;
        }

        const outstanding = this.gates.outstanding(gate);
        if (this.gates.extend(gate)) {
            this.note('GATE_EXTENDED', `${gate.name} round ${gate.round}/${gate.maxRounds}; waiting on ${outstanding.join(', ')}`);
            for (const actor of outstanding) {
                this.send(actor, MessageKind.GateReminder, `Gate "${gate.name}" is waiting for you`, {
                    gate: gate.name,
                    round: gate.round,
                    maxRounds: gate.maxRounds,
                });
            }
            return;
        }

        const escalation = gateTimeoutEscalation(this.synced(), this.gates.escalation(gate), this.clock());
        this.closeGate();
        await this.abandon(escalation);
    }

    private openGate(name: string, required: readonly string[], timeoutMs: number, maxRounds: number): void {
        if (this.gate) this.closeGate();
        this.gate = this.gates.open(name, required, { timeoutMs, maxRounds });
        this.note('GATE_OPENED', `${name} over [${required.join(', ')}]`);
    }

    private closeGate(): void {
        if (!this.gate) return;
        this.gates.close(this.gate);
        this.gate = undefined;
    }

    private confirm(gate: Gate, message: Message): void {
        if (this.gates.record(gate, message.from, message)) {
            log.debug(`${gate.name}: ${message.from} confirmed (${message.kind})`);
        }
    }

    // ── Phase entry ──

    private async enter(phase: Phase): Promise<void> {
        const { workflow } = this.config;

        switch (phase) {
            case Phase.Planning:
                this.openGate('plan-confirmed', this.reviewerNames(), workflow.planningGate.timeoutMs, workflow.planningGate.maxRounds);
                return;

            case Phase.Review:
                this.verdicts.clear();
                this.parked.clear();
                this.requestReview(this.reviewerNames(), 'review');
                return;

            case Phase.Reflection:
                this.openGate('reflection', this.actorNames(), workflow.reflectionDeadlineMs, 1);
                for (const actor of this.actorNames()) {
                    this.send(actor, MessageKind.Reflect, 'Record what you learned during this session.', {
                        sessionId: this.state.id,
                    });
                }
                return;
        }
    }

    private requestReview(reviewers: readonly string[], gateName: string): void {
        const { reviewGate } = this.config.workflow;
        this.openGate(gateName, reviewers, reviewGate.timeoutMs, reviewGate.maxRounds);

        for (const reviewer of reviewers) {
            this.send(reviewer, MessageKind.ReviewRequest, this.state.task, {
                files: this.changeFiles,
                revision: this.state.revision,
                iteration: this.state.iterations.validationRuns,
            });
        }
    }

    // ── Validation ──

    private async onReadyForValidation(message: Message): Promise<void> {
        const parsed = readyForValidationPayload.safeParse(message.payload);
        if (!parsed.success) {
            return this.violation(message, 'payload.files must be a list of paths');
        }

        const session = this.state;
        const reported = await this.repository.changedFiles(session.startMarker);
        this.changeFiles = [...new Set([...parsed.data.files, ...reported])].sort();

        if (session.mode === 'lightweight') {
            const decision = decideMode('lightweight', this.changeFiles, this.config.modes.sensitivePaths);
            if (decision.downgraded && decision.note) {
                log.warn(decision.note);
                await this.apply({ type: 'MODE_UPGRADED', reason: decision.note });
                this.send(this.implementerName(), MessageKind.ModeUpgraded, `${decision.note}. Stop changing the repository and draft a plan for review.`, {
                    mode: 'full',
                    files: this.changeFiles,
                });
                return;
            }
        }

        await this.apply({ type: 'READY_FOR_VALIDATION', from: message.from });

        const iteration = this.state.iterations.validationRuns + 1;
        const run = await this.checks.run({ root: this.projectRoot, files: this.changeFiles }, iteration);
        await this.apply({ type: 'VALIDATION_COMPLETE', run });

        if (this.state.phase === Phase.Implementation) {
            const failure = failureContext(run);
            this.send(
                this.implementerName(),
                MessageKind.ValidationFailed,
                failure ? `${failure.layer} failed` : 'Validation failed',
                failure ? { ...failure } : { iteration },
            );
        }
    }

    // ── Findings ──

    private onFindingRaised(message: Message): void {
        const reviewer = this.reviewer(message.from);
        if (!reviewer || !this.inChangePhase()) {
            return this.violation(message, 'findings come from reviewers once implementation has begun');
        }
        const parsed = findingRaisedPayload.safeParse(message.payload);
        if (!parsed.success) {
            return this.violation(message, 'payload.severity must be low, medium, high or critical');
        }

        const finding = this.ledgerOp(message, () => this.ledger.raise({
            raisedBy: reviewer.name,
            description: parsed.data.description ?? message.body,
            severity: parsed.data.severity,
        }, reviewer.blockingThreshold));
        if (!finding) return;

        const existing = this.verdicts.get(reviewer.name);
        if (existing) {
            this.verdicts.set(reviewer.name, { ...existing, stale: true });
        }

        this.note('FINDING_RAISED', `${finding.id} by ${finding.raisedBy} (${finding.severity}, ${finding.blocking ? 'blocking' : 'non-blocking'})`);
        this.send(this.implementerName(), MessageKind.FindingRaised, finding.description, {
            findingId: finding.id,
            severity: finding.severity,
            raisedBy: finding.raisedBy,
            blocking: finding.blocking,
            status: finding.status,
        });
    }

    private onFindingFixed(message: Message): void {
        if (!this.isImplementer(message.from)) {
            return this.violation(message, 'only the implementer fixes findings');
        }
        const parsed = findingRefPayload.safeParse(message.payload);
        if (!parsed.success) {
            return this.violation(message, 'payload.findingId is required');
        }

        const finding = this.ledgerOp(message, () => this.ledger.markFixed(parsed.data.findingId, message.body || undefined));
        if (!finding) return;
        this.commit({ ...this.synced(), revision: this.state.revision + 1 });
        this.note('FINDING_FIXED', `${finding.id} (revision ${this.state.revision})`);

        this.send(finding.raisedBy, MessageKind.FindingFixed, message.body, { findingId: finding.id });
        this.releaseParked(finding.raisedBy);
    }

    private onDeferralProposed(message: Message): void {
        if (!this.isImplementer(message.from)) {
            return this.violation(message, 'only the implementer proposes deferrals');
        }
        const parsed = deferralProposedPayload.safeParse(message.payload);
        if (!parsed.success) {
            return this.violation(message, 'payload needs findingId and justification');
        }

        const finding = this.ledgerOp(message, () => this.ledger.proposeDeferral(parsed.data.findingId, parsed.data.justification));
        if (!finding) return;
        this.note('DEFERRAL_PROPOSED', `${finding.id} → ${finding.raisedBy}`);
        this.send(finding.raisedBy, MessageKind.DeferralProposed, message.body, {
            findingId: finding.id,
            justification: parsed.data.justification,
        });
    }

    private onDeferralDecision(message: Message): void {
        const parsed = deferralDecisionPayload.safeParse(message.payload);
        if (!parsed.success) {
            return this.violation(message, 'payload.findingId is required');
        }

        const finding = this.ledger.get(parsed.data.findingId);
        if (!finding || finding.raisedBy !== message.from) {
            return this.violation(message, `only the reviewer who raised ${parsed.data.findingId} decides its deferral`);
        }

        const accepted = message.kind === MessageKind.DeferralAccepted;
        const reason = parsed.data.reason || message.body;
        const decided = this.ledgerOp(message, () => accepted
            ? this.ledger.acceptDeferral(finding.id, reason)
            : this.ledger.rejectDeferral(finding.id, reason));
        if (!decided) return;

        this.note(accepted ? 'DEFERRAL_ACCEPTED' : 'DEFERRAL_REJECTED', `${finding.id} by ${message.from}: ${reason}`);
        this.send(this.implementerName(), message.kind, message.body, { findingId: finding.id, reason });
        this.releaseParked(finding.raisedBy);
    }

    // ── Verdicts ──

    private onVerdict(message: Message): void {
        const reviewer = this.reviewer(message.from);
        if (!reviewer || this.state.phase !== Phase.Review) {
            return this.violation(message, 'verdicts come from reviewers during review');
        }
        const parsed = verdictPayload.safeParse(message.payload);
        if (!parsed.success) {
            return this.violation(message, 'payload.verdict must be clear, resolved or escalated');
        }

        if (this.unsettled(reviewer.name).length > 0) {
            this.parked.set(reviewer.name, { claimed: parsed.data.verdict, message });
            this.note('VERDICT_PARKED', `${reviewer.name}: waiting for its findings to settle`);
            return;
        }
        this.recordVerdict(reviewer.name, parsed.data.verdict, message);
    }

    private recordVerdict(reviewer: string, claimed: VerdictRecord['verdict'], message: Message): void {
        const derived = deriveVerdict(this.ledger.raisedBy(reviewer));
        const verdict = claimed === 'escalated' ? 'escalated' : derived;

        const record: VerdictRecord = {
            reviewer,
            verdict,
            revision: this.state.revision,
            messageId: message.id,
            at: this.clock(),
        };
        if (claimed !== verdict) record.claimed = claimed;
        this.verdicts.set(reviewer, record);

        if (this.gate) this.confirm(this.gate, message);
        this.note('VERDICT_RECORDED', `${reviewer}: ${verdict}${record.claimed ? ` (said ${claimed})` : ''}`);
    }

    private releaseParked(reviewer: string): void {
        const parked = this.parked.get(reviewer);
        if (!parked || this.unsettled(reviewer).length > 0) return;
        if (this.state.phase !== Phase.Review) return;

        this.parked.delete(reviewer);
        this.recordVerdict(reviewer, parked.claimed, parked.message);
    }

    private async onReviewGateSatisfied(): Promise<void> {
        const session = this.state;
        const stale = [...this.verdicts.values()]
            .filter((record) => record.stale === true || record.revision < session.revision)
            .map((record) => record.reviewer);

        if (stale.length > 0) {
            if (session.iterations.reverdictRounds >= session.limits.maxReverdictRounds) {
                await this.abandon(reverdictEscalation(this.synced(), stale, this.clock()));
                return;
            }
            const round = session.iterations.reverdictRounds + 1;
            this.commit({ ...this.synced(), iterations: { ...session.iterations, reverdictRounds: round } });
            this.note('REVERDICT_REQUESTED', `${stale.join(', ')} must review revision ${session.revision} (round ${round}/${session.limits.maxReverdictRounds})`);
            for (const reviewer of stale) this.verdicts.delete(reviewer);
            this.requestReview(stale, `review-reverdict-${round}`);
            return;
        }

        const escalated = [...this.verdicts.values()].filter((record) => record.verdict === 'escalated');
        if (escalated.length === 0) {
            const summary = [...this.verdicts.values()].map((r) => `${r.reviewer}=${r.verdict}`).join(', ');
            await this.apply({ type: 'REVIEW_CLEARED', detail: summary });
            return;
        }

        await this.adjudicate(escalated);
    }

    private async adjudicate(escalated: readonly VerdictRecord[]): Promise<void> {
        const reviewers = escalated.map((record) => record.reviewer);
        const disputed = this.ledger.withStatus('escalated').filter((f) => reviewers.includes(f.raisedBy));
        const reason = `Escalated verdict from ${reviewers.join(', ')}`;
        const report = reviewEscalation(this.synced(), disputed, reason, this.clock());

        this.commit({ ...this.synced(), escalation: report });
        this.note('REVIEW_ESCALATED', `${reason}; ${disputed.length} disputed finding(s)`);

        const decision = await this.adjudicator.decide(report, this.state);
        this.note('ADJUDICATED', `${this.adjudicator.name}: ${decision}`);

        switch (decision) {
            case 'accept_deferrals': {
                for (const finding of disputed) {
                    this.ledger.overrideEscalation(finding.id, `accepted by ${this.adjudicator.name} over ${finding.raisedBy}'s objection`);
                }
                for (const record of escalated) {
                    this.verdicts.set(record.reviewer, {
                        ...record,
                        verdict: 'resolved',
                        claimed: record.claimed ?? 'escalated',
                        overriddenBy: this.adjudicator.name,
                    });
                }
                const cleared = this.synced();
                delete cleared.escalation;
                this.commit(cleared);
                await this.apply({ type: 'REVIEW_CLEARED', detail: `escalation adjudicated by ${this.adjudicator.name}: deferrals accepted` });
                return;
            }

            case 'route_back': {
                for (const finding of disputed) {
                    this.ledger.routeBack(finding.id, `routed back by ${this.adjudicator.name}`);
                }
                const routed = this.synced();
                delete routed.escalation;
                this.commit(routed);
                await this.apply({ type: 'REVIEW_ROUTED_BACK', reason });
                if (this.state.phase === Phase.Implementation) {
                    this.send(this.implementerName(), MessageKind.ReviewEscalated, reason, {
                        findings: report.findings ?? [],
                    });
                }
                return;
            }

            case 'abandon':
                await this.abandon(report);
                return;
        }
    }

    // ── Failures ──

    private async onActorError(message: Message): Promise<void> {
        if (this.state.phase === Phase.Reflection && this.gate) {
            // Reflection is best effort: a failed actor counts as done.
            this.note('ACTOR_ERROR', `${message.from}: ${message.body}`);
            this.confirm(this.gate, message);
            return;
        }
        await this.abandon(actorFailureEscalation(this.synced(), message.from, message.body, this.clock()));
    }

    /** Record an orchestrator failure on the session and stop the actors. */
    private async fail(err: unknown): Promise<void> {
        const reason = `Orchestrator error: ${errorMessage(err)}`;
        log.error(reason);
        if (this.current && !isTerminal(this.current)) {
            const session = this.synced();
            this.commit(transition(session, {
                type: 'ABANDON',
                reason,
                escalation: interruptedEscalation(session, reason, this.clock()),
            }, this.clock()));
        }
        await this.shutdown();
    }

    private async abandon(escalation: EscalationReport): Promise<void> {
        this.closeGate();
        log.error(`Abandoning session: ${escalation.reason}`);
        await this.apply({ type: 'ABANDON', reason: escalation.reason, escalation });
    }

    private interrupt(): void {
        const reason = this.signal?.reason;
        this.interruption = reason instanceof Error
            ? `Interrupted: ${reason.message}`
            : `Interrupted${typeof reason === 'string' ? `: ${reason}` : ''}`;
        this.bus.close();
    }

    /** Run a ledger operation; a rejected operation is a protocol violation, not a crash. */
    private ledgerOp<T>(message: Message, operation: () => T): T | undefined {
        try {
            return operation();
        } catch (err) {
            if (err instanceof WorkflowError || err instanceof ValidationError) {
                this.violation(message, errorMessage(err));
                return undefined;
            }
            throw err;
        }
    }

    private violation(message: Message, reason: string): void {
        log.warn(`Ignoring ${message.kind} from ${message.from}: ${reason}`);
        this.note('PROTOCOL_VIOLATION', `${message.kind} from ${message.from} (${message.id}): ${reason}`);
    }

    // ── Session record ──

    private async apply(event: SessionEvent): Promise<void> {
        const from = this.state.phase;
        this.commit(transition(this.synced(), event, this.clock()));
        if (this.state.phase !== from) {
            await this.enter(this.state.phase);
        }
    }

    private note(event: string, detail?: string): void {
        this.commit(note(this.synced(), event, detail, this.clock()));
    }

    /** The current record with the ledger, verdicts, gates and roster folded in. */
    private synced(base: Session = this.state): Session {
        return {
            ...base,
            findings: this.ledger.snapshot(),
            verdicts: Object.fromEntries([...this.verdicts].map(([name, record]) => [name, { ...record }])),
            gates: this.gates.list().map(toGateRecord),
            roster: this.roster ? rosterEntries(this.roster) : base.roster,
        };
    }

    private commit(next: Session): void {
        const seen = this.current?.audit.length ?? 0;
        this.current = this.synced(next);
        this.sink.save(this.current);

        for (const entry of this.current.audit.slice(seen)) {
            this.onAudit?.(entry, this.current);
        }
    }

    private get state(): Session {
        if (!this.current) {
            throw new WorkflowError('Session has not been set up');
        }
        return this.current;
    }

    // ── Private helpers ──

    private send(to: string, kind: string, body: string, payload: Record<string, unknown> = {}): void {
        if (this.bus.isClosed) {
            log.debug(`Dropping ${kind} to ${to}: bus closed`);
            return;
        }
        this.bus.send({ from: ORCHESTRATOR, to, kind, body, payload });
    }

    private async shutdown(): Promise<void> {
        const phase = this.current?.phase;
        for (const actor of this.actors()) {
            this.send(actor.name, MessageKind.SessionClosed, `Session ended: ${phase ?? 'unknown'}`, { phase });
        }
        this.closeGate();
        this.bus.close();
        await Promise.all(this.actors().map((actor) => actor.stopped()));
        if (this.current) this.commit(this.synced());
    }

    private actors(): Actor[] {
        return this.roster ? [this.roster.implementer, ...this.roster.reviewers] : [];
    }

    private actorNames(): string[] {
        return this.actors().map((actor) => actor.name);
    }

    private reviewerNames(): string[] {
        return this.roster ? this.roster.reviewers.map((r) => r.name) : [];
    }

    private reviewer(name: string): ReviewerActor | undefined {
        return this.roster?.reviewers.find((r) => r.name === name);
    }

    private implementerName(): string {
        if (!this.roster) throw new WorkflowError('Roster has not been spawned');
        return this.roster.implementer.name;
    }

    private isImplementer(name: string): boolean {
        return this.roster?.implementer.name === name;
    }

    private inChangePhase(): boolean {
        const phase = this.state.phase;
        return phase === Phase.Implementation || phase === Phase.Validation || phase === Phase.Review;
    }

    private unsettled(reviewer: string): Finding[] {
        return this.ledger.raisedBy(reviewer).filter((f) => !isSettled(f));
    }
}

/** The continued record, closed so it no longer counts as active. */
function supersede(previous: Session, successor: string, now: number): Session {
    if (isTerminal(previous)) {
        return { ...previous, supersededBy: successor, updatedAt: now };
    }
    const reason = `Superseded by ${successor}`;
    const closed = transition(previous, {
        type: 'ABANDON',
        reason,
        escalation: interruptedEscalation(previous, reason, now),
    }, now);
    return { ...closed, supersededBy: successor };
}

function toGateRecord(gate: Gate): GateRecord {
    return {
        name: gate.name,
        required: [...gate.required],
        confirmed: [...gate.confirmed],
        round: gate.round,
        maxRounds: gate.maxRounds,
        status: gate.status,
        openedAt: gate.openedAt,
    };
}
