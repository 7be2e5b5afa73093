/**
 * Message kinds understood by the orchestrator and the built-in actors.
 *
 * Only the kinds listed in `QUALIFYING_KINDS` can move a gate or a phase;
 * anything else an actor sends is conversation.
 *
 * Dependency direction: kinds.ts → nothing (leaf module)
 * Used by: workflow runner, agents
 */

export const MessageKind = {
    /** orchestrator → implementer: the task and mode. */
    Task: 'task',
    /** implementer → orchestrator: a plan draft to circulate. */
    PlanDraft: 'plan-draft',
    /** orchestrator → reviewers: plan to confirm. */
    PlanReview: 'plan-review',
    /** reviewer → orchestrator: confirms the plan. */
    PlanConfirmed: 'plan-confirmed',
    /** orchestrator → implementer: implementation is authorized. */
    PlanApproved: 'plan-approved',
    /** orchestrator → implementer: the change is sensitive; stop and draft a plan. */
    ModeUpgraded: 'mode-upgraded',
    /** implementer → orchestrator: the change is ready for checks. */
    ReadyForValidation: 'ready-for-validation',
    /** orchestrator → implementer: a check layer failed. */
    ValidationFailed: 'validation-failed',
    /** orchestrator → reviewers: inspect the change. */
    ReviewRequest: 'review-request',
    /** reviewer → orchestrator (forwarded to implementer): a new finding. */
    FindingRaised: 'finding-raised',
    /** implementer → orchestrator: a finding was fixed. */
    FindingFixed: 'finding-fixed',
    /** implementer → orchestrator (forwarded to reviewer): defer with a justification. */
    DeferralProposed: 'deferral-proposed',
    /** reviewer → orchestrator (forwarded to implementer). */
    DeferralAccepted: 'deferral-accepted',
    /** reviewer → orchestrator (forwarded to implementer). */
    DeferralRejected: 'deferral-rejected',
    /** reviewer → orchestrator: final assessment. */
    Verdict: 'verdict',
    /** orchestrator → implementer: escalated findings routed back. */
    ReviewEscalated: 'review-escalated',
    /** orchestrator → actors: capture lessons learned. */
    Reflect: 'reflect',
    /** actor → orchestrator. */
    ReflectionDone: 'reflection-done',
    /** orchestrator → outstanding actors when a gate round is extended. */
    GateReminder: 'gate-reminder',
    /** actor → orchestrator: the worker threw. */
    ActorError: 'actor-error',
    /** orchestrator → actors: the session ended. */
    SessionClosed: 'session-closed',
} as const;

export type MessageKind = (typeof MessageKind)[keyof typeof MessageKind];

/** Kinds that can move a gate or a phase. */
export const QUALIFYING_KINDS: ReadonlySet<string> = new Set<string>([
    MessageKind.PlanDraft,
    MessageKind.PlanConfirmed,
    MessageKind.ReadyForValidation,
    MessageKind.FindingRaised,
    MessageKind.FindingFixed,
    MessageKind.DeferralProposed,
    MessageKind.DeferralAccepted,
    MessageKind.DeferralRejected,
    MessageKind.Verdict,
    MessageKind.ReflectionDone,
    MessageKind.ActorError,
]);

export function isQualifying(kind: string): boolean {
    return QUALIFYING_KINDS.has(kind);
}
