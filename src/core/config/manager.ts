/**
 * Configuration manager: load, save, validate, and merge configs.
 *
 * Dependency direction: manager.ts → schema.ts, defaults.ts, utils/fs.ts, errors.ts
 * Used by: CLI commands, orchestrator
 */

import { join, resolve } from 'node:path';
import { appConfigSchema } from './schema.js';
import {
    CONFIG_DIR_NAME,
    CONFIG_FILE_NAME,
    DEFAULT_CONFIG,
    DEFAULT_DOMAIN_THRESHOLDS,
} from './defaults.js';
import type { AppConfig, ReviewerConfig, Severity } from './types.js';
import { fileExists, readJsonFile, writeJsonFile, ensureDir } from '../../utils/fs.js';
import { ConfigError } from '../errors.js';
import { createLogger } from '../../utils/logger.js';

const log = createLogger('config');

/** Recursively optional view of a config, used for overrides. */
export type DeepPartial<T> = {
    [K in keyof T]?: T[K] extends readonly unknown[]
        ? T[K]
        : T[K] extends object
            ? DeepPartial<T[K]>
            : T[K];
};

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Resolve the config directory path for a given project root.
 */
export function getConfigDir(projectRoot: string): string {
    return join(resolve(projectRoot), CONFIG_DIR_NAME);
}

/**
 * Resolve the full config file path for a given project root.
 */
export function getConfigPath(projectRoot: string): string {
    return join(getConfigDir(projectRoot), CONFIG_FILE_NAME);
}

/**
 * Check whether a config file exists in the given project root.
 */
export function configExists(projectRoot: string): boolean {
    return fileExists(getConfigPath(projectRoot));
}

/**
 * Validate raw data against the config schema.
 * @throws {ConfigError} listing every schema issue
 */
export function validateConfig(raw: unknown, context: Record<string, unknown> = {}): AppConfig {
    const result = appConfigSchema.safeParse(raw);

    if (!result.success) {
        const issues = result.error.issues.map(
            (i) => `  - ${i.path.join('.')}: ${i.message}`,
        ).join('\n');

        throw new ConfigError(
            `Invalid configuration:\n${issues}`,
            { ...context, issues: result.error.issues },
        );
    }

    return result.data;
}

/**
 * Load and validate the configuration from disk.
 *
 * @param projectRoot - The root directory of the project (where .reviewloop/ lives)
 * @throws {ConfigError} if the file doesn't exist, is invalid JSON, or fails validation
 */
export function loadConfig(projectRoot: string): AppConfig {
    const configPath = getConfigPath(projectRoot);

    if (!fileExists(configPath)) {
        throw new ConfigError(
            `No configuration found. Run "reviewloop init" first.`,
            { configPath, projectRoot },
        );
    }

    log.debug(`Loading config from ${configPath}`);
    const config = validateConfig(readJsonFile(configPath), { configPath });
    log.debug('Config loaded and validated successfully');
    return config;
}

/**
 * Save configuration to disk, validating before write.
 *
 * @throws {ConfigError} if validation fails or write fails
 */
export function saveConfig(projectRoot: string, config: AppConfig): void {
    const valid = validateConfig(config);

    ensureDir(getConfigDir(projectRoot));
    writeJsonFile(getConfigPath(projectRoot), valid);
    log.debug(`Config saved to ${getConfigPath(projectRoot)}`);
}

/**
 * Deep merge two plain objects. Source values override target values.
 * Arrays are replaced, not concatenated.
 */
export function mergeConfig(target: PlainObject, source: PlainObject): PlainObject {
    const result: PlainObject = { ...target };

    for (const [key, sourceVal] of Object.entries(source)) {
        const targetVal = result[key];

        if (isPlainObject(sourceVal) && isPlainObject(targetVal)) {
            result[key] = mergeConfig(targetVal, sourceVal);
        } else if (sourceVal !== undefined) {
            result[key] = sourceVal;
        }
    }

    return result;
}

/**
 * Get the default configuration with optional partial overrides merged in.
 */
export function getDefaultConfig(overrides?: DeepPartial<AppConfig>): AppConfig {
    if (!overrides) return structuredClone(DEFAULT_CONFIG);
    return validateConfig(mergeConfig(DEFAULT_CONFIG, overrides));
}

/**
 * The severity at which a reviewer's findings start blocking approval.
 * A reviewer-level override wins over the domain table.
 */
export function resolveBlockingThreshold(config: AppConfig, reviewer: ReviewerConfig): Severity {
    return reviewer.blockingThreshold
        ?? config.domainThresholds[reviewer.domain]
        ?? DEFAULT_DOMAIN_THRESHOLDS[reviewer.domain];
}
