/**
 * Library entry point: the orchestrator and the pieces it is built from.
 *
 * Dependency direction: index.ts → core, agents, git
 * Used by: package.json main/types
 */

export {
    AppError,
    CheckError,
    ConfigError,
    GitError,
    ValidationError,
    WorkerError,
    WorkflowError,
} from './core/errors.js';

export type {
    AppConfig,
    CheckLayerConfig,
    ImplementerConfig,
    ReviewerConfig,
    ReviewerDomain,
    SensitiveCategory,
    Severity,
    Specialist,
    WorkerConfig,
    WorkflowConfig,
} from './core/config/types.js';
export { getDefaultConfig, loadConfig, saveConfig, validateConfig } from './core/config/manager.js';

export { MessageBus, ORCHESTRATOR, type Envelope, type Message } from './core/messaging/bus.js';
export { MessageKind, isQualifying } from './core/messaging/kinds.js';

export { Actor } from './agents/base.js';
export { ImplementerActor } from './agents/roles/implementer.js';
export { ReviewerActor } from './agents/roles/reviewer.js';
export { commandWorkers, createRoster, type Roster } from './agents/factory.js';
export { CommandWorker, parseWorkerOutput } from './agents/workers/command.js';
export type { ActorSpec, OutboundMessage, Worker, WorkerFactory, WorkerRequest } from './agents/types.js';

export { CheckRunner, commandLayer, failureContext, type CheckLayer, type ValidationRun } from './core/workflow/checks.js';
export { classify, type Classification } from './core/workflow/classifier.js';
export { assessJustification, type DeferralAssessment } from './core/workflow/deferral.js';
export { decideMode, findSensitivePaths, type ModeDecision, type SessionMode } from './core/workflow/eligibility.js';
export { Phase, createSession, transition, type Session, type SessionEvent } from './core/workflow/engine.js';
export type { EscalationReport } from './core/workflow/escalation.js';
export { FindingLedger, deriveVerdict, type Finding, type Verdict } from './core/workflow/findings.js';
export { GateController, type Gate, type GateStatus } from './core/workflow/gates.js';
export { Orchestrator, type Adjudicator, type SessionOutcome, type SessionSink, type StartRequest } from './core/workflow/runner.js';
export { rollback, type RollbackAction } from './core/workflow/rollback.js';
export { SessionStore } from './core/workflow/session.js';
export { promptAdjudicator, surfacingAdjudicator } from './core/workflow/approval.js';

export { GitClient, type RepositoryPort } from './git/client.js';
