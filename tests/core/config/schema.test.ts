/**
 * Tests for the config Zod schemas.
 *
 * Verifies that valid configs pass and invalid configs are rejected
 * with correct error messages.
 */

import { describe, it, expect } from 'vitest';
import {
    appConfigSchema,
    checkLayerConfigSchema,
    reviewerConfigSchema,
    sensitiveCategorySchema,
    workerConfigSchema,
    workflowConfigSchema,
} from '../../../src/core/config/schema.js';
import { DEFAULT_CONFIG } from '../../../src/core/config/defaults.js';

describe('workerConfigSchema', () => {
    it('applies defaults for args and timeout', () => {
        const result = workerConfigSchema.parse({ command: 'agent' });
        expect(result).toEqual({ command: 'agent', args: [], timeoutMs: 30 * 60_000 });
    });

    it('rejects an empty command', () => {
        expect(workerConfigSchema.safeParse({ command: '' }).success).toBe(false);
    });

    it('rejects a timeout under one second', () => {
        expect(workerConfigSchema.safeParse({ command: 'agent', timeoutMs: 10 }).success).toBe(false);
    });
});

describe('reviewerConfigSchema', () => {
    it('accepts a reviewer with a threshold override', () => {
        const result = reviewerConfigSchema.safeParse({
            name: 'sec',
            domain: 'security',
            blockingThreshold: 'high',
            worker: { command: 'agent' },
        });
        expect(result.success).toBe(true);
    });

    it('rejects an unknown domain', () => {
        const result = reviewerConfigSchema.safeParse({ name: 'perf', domain: 'performance', worker: { command: 'agent' } });
        expect(result.success).toBe(false);
    });

    it('rejects names with uppercase letters or spaces', () => {
        const result = reviewerConfigSchema.safeParse({ name: 'Security Reviewer', domain: 'security', worker: { command: 'agent' } });
        expect(result.success).toBe(false);
    });

    it('reserves the orchestrator name', () => {
        const result = reviewerConfigSchema.safeParse({ name: 'orchestrator', domain: 'security', worker: { command: 'agent' } });
        expect(result.success).toBe(false);
        if (!result.success) {
            expect(result.error.issues[0]?.message).toBe('"orchestrator" is reserved');
        }
    });
});

describe('workflowConfigSchema', () => {
    it('fills every bound from defaults', () => {
        const result = workflowConfigSchema.parse({});
        expect(result.maxValidationAttempts).toBe(3);
        expect(result.maxReviewCycles).toBe(3);
        expect(result.maxReverdictRounds).toBe(3);
        expect(result.reviewGate).toEqual({ timeoutMs: 60 * 60_000, maxRounds: 3 });
        expect(result.humanApproval).toBe(true);
        expect(result.branchPrefix).toBe('reviewloop/');
        expect(result.verificationLevel).toBe('full');
    });

    it('rejects an unknown verification level', () => {
        expect(workflowConfigSchema.safeParse({ verificationLevel: 'exhaustive' }).success).toBe(false);
    });

    it('rejects more than ten validation attempts', () => {
        expect(workflowConfigSchema.safeParse({ maxValidationAttempts: 11 }).success).toBe(false);
    });

    it('rejects a gate with zero rounds', () => {
        expect(workflowConfigSchema.safeParse({ planningGate: { timeoutMs: 1000, maxRounds: 0 } }).success).toBe(false);
    });
});

describe('checkLayerConfigSchema', () => {
    it('accepts trigger patterns that compile', () => {
        const result = checkLayerConfigSchema.parse({ name: 'migrations', command: 'npm', triggers: ['\\.sql$'] });
        expect(result.triggers).toEqual(['\\.sql$']);
        expect(result.hint).toBe('');
        expect(result.level).toBe('quick');
    });

    it('rejects a trigger that is not a regular expression', () => {
        const result = checkLayerConfigSchema.safeParse({ name: 'broken', command: 'npm', triggers: ['(unclosed'] });
        expect(result.success).toBe(false);
        if (!result.success) {
            expect(result.error.issues[0]?.message).toBe('Must be a valid regular expression');
        }
    });
});

describe('sensitiveCategorySchema', () => {
    it('requires at least one pattern', () => {
        expect(sensitiveCategorySchema.safeParse({ category: 'auth', patterns: [] }).success).toBe(false);
    });
});

describe('appConfigSchema', () => {
    it('accepts the default config', () => {
        expect(appConfigSchema.safeParse(DEFAULT_CONFIG).success).toBe(true);
    });

    it('requires at least one reviewer', () => {
        const result = appConfigSchema.safeParse({ ...DEFAULT_CONFIG, reviewers: [] });
        expect(result.success).toBe(false);
        if (!result.success) {
            expect(result.error.issues[0]?.message).toBe('At least one reviewer is required');
        }
    });

    it('rejects two reviewers with the same name', () => {
        const worker = { command: 'agent' };
        const result = appConfigSchema.safeParse({
            ...DEFAULT_CONFIG,
            reviewers: [
                { name: 'sec', domain: 'security', worker },
                { name: 'sec', domain: 'test', worker },
            ],
        });
        expect(result.success).toBe(false);
        if (!result.success) {
            expect(result.error.issues[0]?.path).toEqual(['reviewers', 1, 'name']);
        }
    });

    it('rejects an unknown schema version', () => {
        expect(appConfigSchema.safeParse({ ...DEFAULT_CONFIG, version: 2 }).success).toBe(false);
    });
});
