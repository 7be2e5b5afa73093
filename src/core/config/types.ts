/**
 * TypeScript types inferred from Zod schemas.
 *
 * NEVER define config types manually; they are always derived
 * from the Zod schemas to guarantee runtime and compile-time agreement.
 *
 * Dependency direction: types.ts → schema.ts
 * Used by: every module that touches config
 */

import { z } from 'zod';
import {
    appConfigSchema,
    checkLayerConfigSchema,
    gateBoundsSchema,
    implementerConfigSchema,
    reviewerConfigSchema,
    reviewerDomainSchema,
    sensitiveCategorySchema,
    severitySchema,
    specialistSchema,
    verificationLevelSchema,
    workerConfigSchema,
    workflowConfigSchema,
} from './schema.js';

/** Complete application configuration. */
export type AppConfig = z.infer<typeof appConfigSchema>;

/** Finding severity (`low` < `medium` < `high` < `critical`). */
export type Severity = z.infer<typeof severitySchema>;

/** Domain a reviewer covers. */
export type ReviewerDomain = z.infer<typeof reviewerDomainSchema>;

/** External command backing an actor. */
export type WorkerConfig = z.infer<typeof workerConfigSchema>;

export type ImplementerConfig = z.infer<typeof implementerConfigSchema>;

export type ReviewerConfig = z.infer<typeof reviewerConfigSchema>;

/** Workflow bounds and behavior. */
export type WorkflowConfig = z.infer<typeof workflowConfigSchema>;

export type GateBounds = z.infer<typeof gateBoundsSchema>;

/** `quick` < `standard` < `full`; deeper levels include the shallower layers. */
export type VerificationLevel = z.infer<typeof verificationLevelSchema>;

/** One command-backed validation layer. */
export type CheckLayerConfig = z.infer<typeof checkLayerConfigSchema>;

/** A sensitive path category for mode eligibility. */
export type SensitiveCategory = z.infer<typeof sensitiveCategorySchema>;

/** A specialist label with its selection keywords. */
export type Specialist = z.infer<typeof specialistSchema>;
