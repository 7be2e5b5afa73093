/**
 * Message bus: addressed, asynchronous delivery between named actors.
 *
 * Every participant (each actor and the orchestrator) owns a mailbox.
 * Messages to one recipient are delivered in send order; nothing is
 * promised across recipients. Messages are frozen once sent.
 *
 * Dependency direction: bus.ts → core/errors, utils/logger
 * Used by: agents/base, workflow runner
 */

import { WorkflowError } from '../errors.js';
import { createLogger } from '../../utils/logger.js';

const log = createLogger('bus');

/** Mailbox name of the orchestrator. */
export const ORCHESTRATOR = 'orchestrator';

/** A sent message. */
export interface Message {
    readonly id: string;
    readonly from: string;
    readonly to: string;
    /** Free-form kind; some kinds qualify for gates and transitions. */
    readonly kind: string;
    readonly body: string;
    readonly payload: Readonly<Record<string, unknown>>;
    readonly timestamp: number;
}

/** What a sender supplies; the bus stamps id and timestamp. */
export interface Envelope {
    from: string;
    to: string;
    kind: string;
    body?: string;
    payload?: Record<string, unknown>;
}

type Waiter = (message: Message | null) => void;

interface Mailbox {
    queue: Message[];
    waiters: Waiter[];
}

export class MessageBus {
    private readonly mailboxes = new Map<string, Mailbox>();
    private readonly sent: Message[] = [];
    private readonly clock: () => number;
    private closed = false;
    private seq = 0;

    constructor(clock: () => number = Date.now) {
        this.clock = clock;
    }

    /**
     * Create a mailbox. Names are unique on a bus.
     */
    register(name: string): void {
        if (this.mailboxes.has(name)) {
            throw new WorkflowError(`Mailbox "${name}" is already registered`, { name });
        }
        this.mailboxes.set(name, { queue: [], waiters: [] });
    }

    has(name: string): boolean {
        return this.mailboxes.has(name);
    }

    get isClosed(): boolean {
        return this.closed;
    }

    /**
     * Deliver a message to its recipient's mailbox.
     * @throws {WorkflowError} if the bus is closed or the recipient is unknown
     */
    send(envelope: Envelope): Message {
        if (this.closed) {
            throw new WorkflowError('Cannot send on a closed bus', { kind: envelope.kind, to: envelope.to });
        }

        const mailbox = this.mailboxes.get(envelope.to);
        if (!mailbox) {
            throw new WorkflowError(`Unknown recipient "${envelope.to}"`, { from: envelope.from, kind: envelope.kind });
        }

        this.seq += 1;
        const message: Message = Object.freeze({
            id: `msg-${this.seq}`,
            from: envelope.from,
            to: envelope.to,
            kind: envelope.kind,
            body: envelope.body ?? '',
            payload: Object.freeze({ ...envelope.payload }),
            timestamp: this.clock(),
        });

        this.sent.push(message);
        log.debug(`${message.from} → ${message.to}: ${message.kind} (${message.id})`);

        const waiter = mailbox.waiters.shift();
        if (waiter) {
            waiter(message);
        } else {
            mailbox.queue.push(message);
        }

        return message;
    }

    /**
     * Take the next message from a mailbox, waiting if it is empty.
     *
     * Resolves `null` when `timeoutMs` elapses first or the bus closes.
     */
    receive(name: string, timeoutMs?: number): Promise<Message | null> {
        const mailbox = this.mailboxes.get(name);
        if (!mailbox) {
            return Promise.reject(new WorkflowError(`Unknown mailbox "${name}"`, { name }));
        }

        const queued = mailbox.queue.shift();
        if (queued) return Promise.resolve(queued);
        if (this.closed) return Promise.resolve(null);

        return new Promise<Message | null>((resolve) => {
            let timer: NodeJS.Timeout | undefined;

            const waiter: Waiter = (message) => {
                if (timer) clearTimeout(timer);
                resolve(message);
            };

            if (timeoutMs !== undefined) {
                timer = setTimeout(() => {
                    const index = mailbox.waiters.indexOf(waiter);
                    if (index >= 0) mailbox.waiters.splice(index, 1);
                    resolve(null);
                }, Math.max(0, timeoutMs));
            }

            mailbox.waiters.push(waiter);
        });
    }

    /** Number of undelivered messages in a mailbox. */
    pending(name: string): number {
        return this.mailboxes.get(name)?.queue.length ?? 0;
    }

    /** Every message sent on this bus, in send order. */
    history(): readonly Message[] {
        return this.sent;
    }

    /**
     * Close the bus. Waiting receivers resolve `null`; further sends throw.
     */
    close(): void {
        if (this.closed) return;
        this.closed = true;

        for (const mailbox of this.mailboxes.values()) {
            for (const waiter of mailbox.waiters.splice(0)) {
                waiter(null);
            }
        }
    }
}
