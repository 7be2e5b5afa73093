/**
 * File system helpers with consistent error handling.
 *
 * Dependency direction: fs.ts → node:fs, node:path, errors.ts
 * Used by: config manager, session store
 */

import { existsSync, mkdirSync, readFileSync, readdirSync, renameSync, writeFileSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { ConfigError } from '../core/errors.js';

/**
 * Read a JSON file and parse it.
 * The caller is expected to validate the shape.
 * @throws {ConfigError} if the file doesn't exist or contains invalid JSON.
 */
export function readJsonFile(filePath: string): unknown {
    const absolutePath = resolve(filePath);

    if (!existsSync(absolutePath)) {
        throw new ConfigError(`File not found: ${absolutePath}`, { filePath: absolutePath });
    }

    try {
        const content = readFileSync(absolutePath, 'utf-8');
        return JSON.parse(content) as unknown;
    } catch (err) {
        throw new ConfigError(`Failed to parse JSON file: ${absolutePath}`, {
            filePath: absolutePath,
            originalError: err instanceof Error ? err.message : String(err),
        });
    }
}

/**
 * Write data to a JSON file, creating parent directories if needed.
 *
 * The file is written beside its destination and renamed into place so a
 * reader never sees a half-written record.
 * @throws {ConfigError} if the write fails.
 */
export function writeJsonFile(filePath: string, data: unknown): void {
    const absolutePath = resolve(filePath);
    const tempPath = `${absolutePath}.tmp`;

    try {
        ensureDir(dirname(absolutePath));
        writeFileSync(tempPath, JSON.stringify(data, null, 2) + '\n', 'utf-8');
        renameSync(tempPath, absolutePath);
    } catch (err) {
        throw new ConfigError(`Failed to write file: ${absolutePath}`, {
            filePath: absolutePath,
            originalError: err instanceof Error ? err.message : String(err),
        });
    }
}

/**
 * Ensure a directory exists, creating it recursively if needed.
 */
export function ensureDir(dirPath: string): void {
    const absolutePath = resolve(dirPath);
    if (!existsSync(absolutePath)) {
        mkdirSync(absolutePath, { recursive: true });
    }
}

/**
 * Check if a file exists at the given path.
 */
export function fileExists(filePath: string): boolean {
    return existsSync(resolve(filePath));
}

/**
 * List the `.json` files directly inside a directory (absolute paths).
 * Returns an empty list when the directory does not exist.
 */
export function listJsonFiles(dirPath: string): string[] {
    const absolutePath = resolve(dirPath);
    if (!existsSync(absolutePath)) return [];

    return readdirSync(absolutePath)
        .filter((name) => name.endsWith('.json'))
        .sort()
        .map((name) => join(absolutePath, name));
}
