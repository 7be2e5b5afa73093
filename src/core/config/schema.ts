/**
 * Zod schemas defining the complete configuration shape.
 *
 * This is the authoritative definition of what a valid config looks like.
 * All TypeScript types are inferred from these schemas via z.infer<>.
 *
 * Dependency direction: schema.ts → zod
 * Used by: manager.ts, defaults.ts, types.ts
 */

import { z } from 'zod';

/** Finding severities, lowest first. Order matters for blocking thresholds. */
export const severitySchema = z.enum(['low', 'medium', 'high', 'critical']);

/** Reviewer domains. Each has its own blocking threshold. */
export const reviewerDomainSchema = z.enum([
    'security',
    'test',
    'code-quality',
    'dry',
    'operations',
    'observability',
]);

/**
 * Verification depth, shallowest first. Each level runs its own layers plus
 * those of every level before it.
 */
export const verificationLevelSchema = z.enum(['quick', 'standard', 'full']);

/** A regular expression source string; rejected at load time if it does not compile. */
const patternString = z.string().min(1).refine((source) => {
    try {
        new RegExp(source);
        return true;
    } catch {
        return false;
    }
}, 'Must be a valid regular expression');

/** Actor names share the bus namespace with the orchestrator. */
const actorName = z
    .string()
    .trim()
    .min(1)
    .regex(/^[a-z0-9][a-z0-9._-]*$/, 'Actor names are lowercase letters, digits, ".", "_" or "-"')
    .refine((name) => name !== 'orchestrator', '"orchestrator" is reserved');

/**
 * Schema for an external worker command that performs an actor's work.
 */
export const workerConfigSchema = z.object({
    /** Executable to run for each message the actor handles. */
    command: z.string().min(1),
    /** Arguments passed to the executable. */
    args: z.array(z.string()).default([]),
    /** Kill the worker if it does not answer within this many milliseconds. */
    timeoutMs: z.number().int().min(1000).default(30 * 60_000),
});

/**
 * Schema for the single implementer actor.
 */
export const implementerConfigSchema = z.object({
    name: actorName.default('implementer'),
    worker: workerConfigSchema,
});

/**
 * Schema for one reviewer actor.
 */
export const reviewerConfigSchema = z.object({
    name: actorName,
    domain: reviewerDomainSchema,
    /** Overrides the domain's blocking threshold for this reviewer only. */
    blockingThreshold: severitySchema.optional(),
    worker: workerConfigSchema,
});

/**
 * Schema for a gate's wait bounds.
 */
export const gateBoundsSchema = z.object({
    timeoutMs: z.number().int().min(1),
    maxRounds: z.number().int().min(1).max(10),
});

/**
 * Schema for workflow bounds and behavior.
 */
export const workflowConfigSchema = z.object({
    /** Consecutive failed validation runs before the session is abandoned. */
    maxValidationAttempts: z.number().int().min(1).max(10).default(3),
    /** Review → implementation route-backs before the session is abandoned. */
    maxReviewCycles: z.number().int().min(1).max(10).default(3),
    /** Re-verdict rounds requested after the change moved under a verdict. */
    maxReverdictRounds: z.number().int().min(1).max(10).default(3),
    planningGate: gateBoundsSchema.default({ timeoutMs: 30 * 60_000, maxRounds: 3 }),
    reviewGate: gateBoundsSchema.default({ timeoutMs: 60 * 60_000, maxRounds: 3 }),
    /** Soft deadline for reflection; the session completes regardless. */
    reflectionDeadlineMs: z.number().int().min(1).default(15 * 60_000),
    /** Ask a human to adjudicate escalated verdicts (otherwise they abandon the session). */
    humanApproval: z.boolean().default(true),
    /** Whether to create a Git branch for each session. */
    autoCreateBranch: z.boolean().default(false),
    /** Branch name prefix for created branches. */
    branchPrefix: z.string().default('reviewloop/'),
    /** Depth of validation when `start` is not given `--verify`. */
    verificationLevel: verificationLevelSchema.default('full'),
});

/**
 * Schema for one validation layer backed by a command.
 */
export const checkLayerConfigSchema = z.object({
    name: z.string().min(1),
    /** What the layer catches, shown in reports. */
    purpose: z.string().default(''),
    command: z.string().min(1),
    args: z.array(z.string()).default([]),
    /** Shown to the implementer when this layer fails. */
    hint: z.string().default(''),
    /** When non-empty, the layer only runs if a changed file matches one of these patterns. */
    triggers: z.array(patternString).default([]),
    /** Shallowest verification level that runs this layer. */
    level: verificationLevelSchema.default('quick'),
    timeoutMs: z.number().int().min(1000).default(10 * 60_000),
});

export const validationConfigSchema = z.object({
    layers: z.array(checkLayerConfigSchema).default([]),
});

/**
 * Schema for a sensitive path category that disqualifies lightweight mode.
 */
export const sensitiveCategorySchema = z.object({
    category: z.string().min(1),
    patterns: z.array(patternString).min(1),
});

export const modesConfigSchema = z.object({
    sensitivePaths: z.array(sensitiveCategorySchema).default([]),
});

/**
 * Schema for a specialist label and the keywords that select it.
 */
export const specialistSchema = z.object({
    label: z.string().min(1),
    keywords: z.array(z.string().trim().min(1)).min(1),
});

/** Blocking threshold per reviewer domain. */
export const domainThresholdsSchema = z.record(reviewerDomainSchema, severitySchema);

/**
 * The complete application configuration schema.
 * This is the single source of truth for config structure.
 */
export const appConfigSchema = z
    .object({
        /** Schema version for future migrations. */
        version: z.literal(1).default(1),
        implementer: implementerConfigSchema,
        reviewers: z.array(reviewerConfigSchema).min(1, 'At least one reviewer is required'),
        domainThresholds: domainThresholdsSchema.default({}),
        workflow: workflowConfigSchema,
        validation: validationConfigSchema,
        modes: modesConfigSchema,
        specialists: z.array(specialistSchema).default([]),
    })
    .superRefine((config, ctx) => {
        const seen = new Set<string>([config.implementer.name]);
        config.reviewers.forEach((reviewer, index) => {
            if (seen.has(reviewer.name)) {
                ctx.addIssue({
                    code: z.ZodIssueCode.custom,
                    path: ['reviewers', index, 'name'],
                    message: `Duplicate actor name "${reviewer.name}"`,
                });
            }
            seen.add(reviewer.name);
        });
    });
