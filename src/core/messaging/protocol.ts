/**
 * Payload schemas for the messages the orchestrator acts on.
 *
 * Workers are outside this system, so every payload they produce is
 * validated before it can touch the session.
 *
 * Dependency direction: protocol.ts → zod, config/schema
 * Used by: workflow runner, reviewer actor, command worker
 */

import { z } from 'zod';
import { severitySchema } from '../config/schema.js';

export const verdictSchema = z.enum(['clear', 'resolved', 'escalated']);

export const readyForValidationPayload = z.object({
    /** Paths the implementer changed, in addition to what Git reports. */
    files: z.array(z.string().min(1)).default([]),
});

export const findingRaisedPayload = z.object({
    severity: severitySchema,
    /** Defaults to the message body. */
    description: z.string().optional(),
});

export const findingRefPayload = z.object({
    findingId: z.string().min(1),
});

export const deferralProposedPayload = findingRefPayload.extend({
    justification: z.string(),
});

export const deferralDecisionPayload = findingRefPayload.extend({
    reason: z.string().default(''),
});

export const verdictPayload = z.object({
    verdict: verdictSchema,
});

/** A line a command worker writes to stdout. */
export const outboundMessageSchema = z.object({
    to: z.string().min(1),
    kind: z.string().min(1),
    body: z.string().optional(),
    payload: z.record(z.unknown()).optional(),
});

export type ReadyForValidationPayload = z.infer<typeof readyForValidationPayload>;
export type FindingRaisedPayload = z.infer<typeof findingRaisedPayload>;
export type DeferralProposedPayload = z.infer<typeof deferralProposedPayload>;
export type DeferralDecisionPayload = z.infer<typeof deferralDecisionPayload>;
export type VerdictPayload = z.infer<typeof verdictPayload>;
