/**
 * Tests for the config manager (load, save, validate, merge).
 *
 * Uses a temp directory to simulate project configs on disk.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, rmSync, existsSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
    loadConfig,
    saveConfig,
    configExists,
    getConfigPath,
    mergeConfig,
    getDefaultConfig,
    resolveBlockingThreshold,
    validateConfig,
} from '../../../src/core/config/manager.js';
import { DEFAULT_CONFIG, CONFIG_DIR_NAME, CONFIG_FILE_NAME } from '../../../src/core/config/defaults.js';
import { ConfigError } from '../../../src/core/errors.js';

let testDir: string;

beforeEach(() => {
    testDir = join(tmpdir(), `reviewloop-config-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    mkdirSync(testDir, { recursive: true });
});

afterEach(() => {
    if (existsSync(testDir)) {
        rmSync(testDir, { recursive: true, force: true });
    }
});

describe('configExists', () => {
    it('returns false when no config exists', () => {
        expect(configExists(testDir)).toBe(false);
    });

    it('returns true after saving config', () => {
        saveConfig(testDir, DEFAULT_CONFIG);
        expect(configExists(testDir)).toBe(true);
    });
});

describe('getConfigPath', () => {
    it('returns the correct path', () => {
        expect(getConfigPath(testDir)).toBe(join(testDir, CONFIG_DIR_NAME, CONFIG_FILE_NAME));
    });
});

describe('saveConfig / loadConfig', () => {
    it('round-trips the default config', () => {
        saveConfig(testDir, DEFAULT_CONFIG);
        expect(loadConfig(testDir)).toEqual(DEFAULT_CONFIG);
    });

    it('refuses to save an invalid config', () => {
        const broken = { ...getDefaultConfig(), reviewers: [] };
        expect(() => saveConfig(testDir, broken)).toThrow(ConfigError);
        expect(configExists(testDir)).toBe(false);
    });

    it('throws ConfigError when no config exists', () => {
        expect(() => loadConfig(testDir)).toThrow(/reviewloop init/);
    });

    it('throws ConfigError on invalid JSON', () => {
        mkdirSync(join(testDir, CONFIG_DIR_NAME), { recursive: true });
        writeFileSync(getConfigPath(testDir), '{ not json', 'utf-8');
        expect(() => loadConfig(testDir)).toThrow(ConfigError);
    });

    it('fills defaults for omitted sections', () => {
        mkdirSync(join(testDir, CONFIG_DIR_NAME), { recursive: true });
        writeFileSync(getConfigPath(testDir), JSON.stringify({
            implementer: { worker: { command: 'impl' } },
            reviewers: [{ name: 'sec', domain: 'security', worker: { command: 'rev' } }],
            workflow: {},
            validation: {},
            modes: {},
        }), 'utf-8');

        const config = loadConfig(testDir);
        expect(config.implementer.name).toBe('implementer');
        expect(config.workflow.maxValidationAttempts).toBe(3);
        expect(config.workflow.planningGate).toEqual({ timeoutMs: 30 * 60_000, maxRounds: 3 });
        expect(config.workflow.reflectionDeadlineMs).toBe(15 * 60_000);
        expect(config.reviewers[0]?.worker.args).toEqual([]);
        expect(config.specialists).toEqual([]);
    });
});

describe('validateConfig', () => {
    it('lists every issue in the error message', () => {
        const raw = {
            ...getDefaultConfig(),
            reviewers: [{ name: 'orchestrator', domain: 'security', worker: { command: 'rev' } }],
        };

        try {
            validateConfig(raw);
            expect.unreachable('validateConfig should have thrown');
        } catch (err) {
            expect(err).toBeInstanceOf(ConfigError);
            expect(err instanceof Error ? err.message : '').toContain('reviewers.0.name: "orchestrator" is reserved');
        }
    });

    it('rejects duplicate actor names', () => {
        const config = getDefaultConfig();
        const raw = {
            ...config,
            reviewers: [...config.reviewers, { name: 'implementer', domain: 'test', worker: { command: 'rev' } }],
        };
        expect(() => validateConfig(raw)).toThrow(/Duplicate actor name "implementer"/);
    });
});

describe('mergeConfig', () => {
    it('deep merges nested objects', () => {
        const merged = mergeConfig(
            { a: 1, nested: { x: 1, y: 2 } },
            { nested: { y: 3 } },
        );
        expect(merged).toEqual({ a: 1, nested: { x: 1, y: 3 } });
    });

    it('replaces arrays instead of concatenating', () => {
        expect(mergeConfig({ list: [1, 2] }, { list: [3] })).toEqual({ list: [3] });
    });

    it('ignores undefined source values', () => {
        expect(mergeConfig({ a: 1 }, { a: undefined })).toEqual({ a: 1 });
    });
});

describe('getDefaultConfig', () => {
    it('returns a copy that does not alias the defaults', () => {
        const config = getDefaultConfig();
        config.workflow.maxReviewCycles = 9;
        expect(DEFAULT_CONFIG.workflow.maxReviewCycles).toBe(3);
    });

    it('merges and validates overrides', () => {
        const config = getDefaultConfig({ workflow: { maxValidationAttempts: 5 } });
        expect(config.workflow.maxValidationAttempts).toBe(5);
        expect(config.workflow.maxReviewCycles).toBe(3);
    });
});

describe('resolveBlockingThreshold', () => {
    it('uses the domain table', () => {
        const config = getDefaultConfig();
        const reviewer = { name: 'sec', domain: 'security' as const, worker: { command: 'x', args: [], timeoutMs: 1000 } };
        expect(resolveBlockingThreshold(config, reviewer)).toBe('low');
    });

    it('prefers the reviewer override', () => {
        const config = getDefaultConfig();
        const reviewer = {
            name: 'sec',
            domain: 'security' as const,
            blockingThreshold: 'critical' as const,
            worker: { command: 'x', args: [], timeoutMs: 1000 },
        };
        expect(resolveBlockingThreshold(config, reviewer)).toBe('critical');
    });

    it('falls back to the built-in table when the config omits a domain', () => {
        const config = { ...getDefaultConfig(), domainThresholds: {} };
        const reviewer = { name: 'ops', domain: 'operations' as const, worker: { command: 'x', args: [], timeoutMs: 1000 } };
        expect(resolveBlockingThreshold(config, reviewer)).toBe('high');
    });
});
