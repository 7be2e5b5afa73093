/**
 * Actor base class: mailbox loop, status, and worker delegation.
 *
 * An actor takes messages from its mailbox one at a time, in order,
 * asks its worker what to send, and sends it. While handling a message
 * it is `active`; otherwise `idle`. Idle says nothing about whether the
 * actor's work is finished; only a qualifying message does.
 *
 * To create a new actor type:
 * 1. Extend this class
 * 2. Override `isReadOnly(message)` if the actor may modify the repository
 * 3. Optionally override `handle(message)` to answer some kinds itself
 *
 * Dependency direction: agents/base.ts → messaging, agents/types, core/errors, utils
 * Used by: agents/roles/*
 */

import { ORCHESTRATOR, type Message, type MessageBus } from '../core/messaging/bus.js';
import { MessageKind } from '../core/messaging/kinds.js';
import { errorMessage } from '../core/errors.js';
import { createLogger, type Logger } from '../utils/logger.js';
import type { ActorRole, ActorSpec, ActorStatus, OutboundMessage, Worker, WorkerRequest } from './types.js';
import { ACTOR_ROLE_LABELS } from './types.js';

export type StatusListener = (actor: string, status: ActorStatus) => void;

export abstract class Actor {
    public readonly name: string;
    public readonly role: ActorRole;
    protected readonly bus: MessageBus;
    protected readonly worker: Worker;
    protected readonly log: Logger;

    private currentStatus: ActorStatus = 'idle';
    private loop: Promise<void> | undefined;
    private readonly listeners = new Set<StatusListener>();

    constructor(spec: ActorSpec, bus: MessageBus, worker: Worker) {
        this.name = spec.name;
        this.role = spec.role;
        this.bus = bus;
        this.worker = worker;
        this.log = createLogger(spec.name);

        if (!bus.has(spec.name)) bus.register(spec.name);
    }

    get status(): ActorStatus {
        return this.currentStatus;
    }

    get label(): string {
        return `${ACTOR_ROLE_LABELS[this.role]} ${this.name}`;
    }

    /** Subscribe to status changes. Returns an unsubscribe function. */
    onStatusChange(listener: StatusListener): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    /**
     * Start consuming the mailbox. Calling it twice has no effect.
     */
    start(): void {
        if (!this.loop) {
            this.loop = this.run();
        }
    }

    /** Resolves once the mailbox loop has ended (the bus closed). */
    async stopped(): Promise<void> {
        await this.loop;
    }

    /**
     * Produce the messages to send in answer to `message`.
     * The default delegates everything to the worker.
     */
    protected handle(message: Message): Promise<OutboundMessage[]> {
        return this.worker.perform(this.request(message));
    }

    /** Whether the worker must leave the repository untouched for this message. */
    protected abstract isReadOnly(message: Message): boolean;

    protected request(message: Message): WorkerRequest {
        return {
            actor: this.name,
            role: this.role,
            readOnly: this.isReadOnly(message),
            message,
        };
    }

    protected send(outbound: OutboundMessage): void {
        if (this.bus.isClosed) {
            this.log.debug(`Dropping ${outbound.kind} to ${outbound.to}: bus closed`);
            return;
        }
        this.bus.send({ from: this.name, ...outbound });
    }

    // ── Private helpers ──

    private async run(): Promise<void> {
        for (;;) {
            const message = await this.bus.receive(this.name);
            if (!message) break;

            this.setStatus('active');
            try {
                const outbound = await this.handle(message);
                for (const item of outbound) {
                    this.send(item);
                }
            } catch (err) {
                this.log.error(`Failed handling ${message.kind}: ${errorMessage(err)}`);
                this.send({
                    to: ORCHESTRATOR,
                    kind: MessageKind.ActorError,
                    body: errorMessage(err),
                    payload: { inReplyTo: message.id, kind: message.kind },
                });
            } finally {
                this.setStatus('idle');
            }
        }
    }

    private setStatus(status: ActorStatus): void {
        if (status === this.currentStatus) return;
        this.currentStatus = status;
        for (const listener of this.listeners) {
            listener(this.name, status);
        }
    }
}
