/**
 * Implementer actor: the only actor allowed to change the repository.
 *
 * Its worker is told to stay read-only until the orchestrator authorizes
 * implementation: by `plan-approved` in full mode, or by the task itself
 * in lightweight mode. A `mode-upgraded` notice or the end of the session
 * makes it read-only again.
 *
 * Dependency direction: implementer.ts → agents/base, messaging/kinds
 * Used by: agents/factory
 */

import { Actor } from '../base.js';
import type { Message, MessageBus } from '../../core/messaging/bus.js';
import { MessageKind } from '../../core/messaging/kinds.js';
import type { OutboundMessage, Worker } from '../types.js';

export class ImplementerActor extends Actor {
    private authorized = false;

    constructor(name: string, bus: MessageBus, worker: Worker) {
        super({ name, role: 'implementer' }, bus, worker);
    }

    /** Whether the orchestrator has authorized changes to the repository. */
    get canModify(): boolean {
        return this.authorized;
    }

    protected override handle(message: Message): Promise<OutboundMessage[]> {
        this.authorize(message);
        return super.handle(message);
    }

    protected isReadOnly(): boolean {
        return !this.authorized;
    }

    private authorize(message: Message): void {
        switch (message.kind) {
            case MessageKind.Task:
                this.authorized = message.payload['planRequired'] === false;
                break;
            case MessageKind.PlanApproved:
                this.authorized = true;
                break;
            case MessageKind.ModeUpgraded:
            case MessageKind.SessionClosed:
                this.authorized = false;
                break;
        }
    }
}
