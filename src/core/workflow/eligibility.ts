/**
 * Mode eligibility: lightweight mode is refused for sensitive changes.
 *
 * A change touching authentication or crypto code, schemas or interface
 * contracts, dependency manifests, shared code or instrumentation always
 * runs the full pipeline. The check is a static match of changed paths
 * against the configured patterns.
 *
 * Dependency direction: eligibility.ts → config/types
 * Used by: workflow runner, cli start command
 */

import type { SensitiveCategory } from '../config/types.js';

export type SessionMode = 'full' | 'lightweight';

export interface SensitiveMatch {
    category: string;
    file: string;
    pattern: string;
}

export interface ModeDecision {
    requested: SessionMode;
    mode: SessionMode;
    /** True when lightweight was requested and refused. */
    downgraded: boolean;
    matches: SensitiveMatch[];
    /** Human-readable explanation for the audit trail. */
    note?: string;
}

/**
 * Every sensitive category a set of paths touches (one match per file and category).
 */
export function findSensitivePaths(
    files: readonly string[],
    categories: readonly SensitiveCategory[],
): SensitiveMatch[] {
    const matches: SensitiveMatch[] = [];

    for (const raw of files) {
        const file = raw.replace(/\\/g, '/').replace(/^\.\//, '');
        for (const { category, patterns } of categories) {
            const pattern = patterns.find((source) => new RegExp(source, 'i').test(file));
            if (pattern !== undefined) {
                matches.push({ category, file, pattern });
            }
        }
    }

    return matches;
}

/**
 * Decide the effective mode for a requested mode and a set of changed paths.
 */
export function decideMode(
    requested: SessionMode,
    files: readonly string[],
    categories: readonly SensitiveCategory[],
): ModeDecision {
    if (requested === 'full') {
        return { requested, mode: 'full', downgraded: false, matches: [] };
    }

    const matches = findSensitivePaths(files, categories);
    if (matches.length === 0) {
        return { requested, mode: 'lightweight', downgraded: false, matches };
    }

    const touched = [...new Set(matches.map((m) => m.category))];
    const examples = matches.slice(0, 3).map((m) => m.file).join(', ');
    return {
        requested,
        mode: 'full',
        downgraded: true,
        matches,
        note: `Lightweight mode refused: change touches ${touched.join(', ')} (${examples}); running full mode`,
    };
}
