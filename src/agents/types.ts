/**
 * Actor and worker contracts.
 *
 * An actor wraps an opaque worker: the worker receives one message at a
 * time and answers with the messages the actor should send. Nothing about
 * how the worker reaches its answer is visible here.
 *
 * Dependency direction: agents/types.ts → messaging/bus, config/types, workflow/engine (types)
 * Used by: agents/base, agents/factory, workers, workflow runner
 */

import type { ReviewerDomain, Severity } from '../core/config/types.js';
import type { Message } from '../core/messaging/bus.js';
import type { ActorRole } from '../core/workflow/engine.js';

export type { ActorRole, ActorStatus } from '../core/workflow/engine.js';

/** Display-friendly labels for each actor role. */
export const ACTOR_ROLE_LABELS: Record<ActorRole, string> = {
    implementer: '🛠  Implementer',
    reviewer: '🔍 Reviewer',
};

/** What an actor hands its worker for one inbound message. */
export interface WorkerRequest {
    actor: string;
    role: ActorRole;
    domain?: ReviewerDomain;
    /** The worker must not modify the repository. */
    readOnly: boolean;
    message: Message;
}

/** A message the worker wants its actor to send. */
export interface OutboundMessage {
    to: string;
    kind: string;
    body?: string;
    payload?: Record<string, unknown>;
}

export interface Worker {
    perform(request: WorkerRequest): Promise<OutboundMessage[]>;
}

/** Static description of an actor, used to build workers and the roster. */
export interface ActorSpec {
    name: string;
    role: ActorRole;
    domain?: ReviewerDomain;
    blockingThreshold?: Severity;
}

/** Builds the worker backing an actor. */
export type WorkerFactory = (spec: ActorSpec) => Worker;
