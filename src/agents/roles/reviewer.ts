/**
 * Reviewer actor: inspects the change read-only and judges deferrals.
 *
 * Everything except deferral proposals goes to the worker. Deferrals of
 * this reviewer's own findings are judged here against the fixed list of
 * accepted justifications, so the rule is the same whatever worker runs.
 *
 * Dependency direction: reviewer.ts → agents/base, workflow/deferral, messaging
 * Used by: agents/factory
 */

import { Actor } from '../base.js';
import { ORCHESTRATOR, type Message, type MessageBus } from '../../core/messaging/bus.js';
import { MessageKind } from '../../core/messaging/kinds.js';
import { deferralProposedPayload } from '../../core/messaging/protocol.js';
import { assessJustification } from '../../core/workflow/deferral.js';
import type { ReviewerDomain, Severity } from '../../core/config/types.js';
import type { OutboundMessage, Worker, WorkerRequest } from '../types.js';

export class ReviewerActor extends Actor {
    public readonly domain: ReviewerDomain;
    public readonly blockingThreshold: Severity;

    constructor(
        name: string,
        domain: ReviewerDomain,
        blockingThreshold: Severity,
        bus: MessageBus,
        worker: Worker,
    ) {
        super({ name, role: 'reviewer', domain, blockingThreshold }, bus, worker);
        this.domain = domain;
        this.blockingThreshold = blockingThreshold;
    }

    protected override handle(message: Message): Promise<OutboundMessage[]> {
        if (message.kind === MessageKind.DeferralProposed) {
            return Promise.resolve(this.judgeDeferral(message));
        }
        return super.handle(message);
    }

    protected isReadOnly(): boolean {
        return true;
    }

    protected override request(message: Message): WorkerRequest {
        return { ...super.request(message), domain: this.domain };
    }

    private judgeDeferral(message: Message): OutboundMessage[] {
        const parsed = deferralProposedPayload.safeParse(message.payload);
        if (!parsed.success) {
            this.log.warn(`Ignoring malformed deferral proposal ${message.id}`);
            return [];
        }

        const { findingId, justification } = parsed.data;
        const assessment = assessJustification(justification);
        this.log.info(`${findingId}: deferral ${assessment.valid ? 'accepted' : 'rejected'} (${assessment.explanation})`);

        return [{
            to: ORCHESTRATOR,
            kind: assessment.valid ? MessageKind.DeferralAccepted : MessageKind.DeferralRejected,
            body: assessment.explanation,
            payload: { findingId, reason: assessment.reason },
        }];
    }
}
