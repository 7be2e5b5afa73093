/**
 * Specialist classification from a free-text task description.
 *
 * Each specialist label has keywords. Longer keyword phrases are more
 * specific; the label holding the most specific match wins. When several
 * labels tie at the top, the result is ambiguous and the caller must
 * supply an override.
 *
 * Dependency direction: classifier.ts → config/types
 * Used by: workflow runner, cli start command
 */

import type { Specialist } from '../config/types.js';

export type Classification =
    | { kind: 'match'; label: string; keyword: string }
    | { kind: 'ambiguous'; candidates: string[] }
    | { kind: 'none' };

interface Hit {
    label: string;
    keyword: string;
    specificity: number;
}

function escapeRegExp(text: string): string {
    return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function keywordPattern(keyword: string): RegExp {
    const words = keyword.trim().split(/\s+/).map(escapeRegExp);
    return new RegExp(`(^|[^a-z0-9])${words.join('[\\s_-]+')}($|[^a-z0-9])`, 'i');
}

/**
 * Classify a task description against the specialist table.
 */
export function classify(text: string, specialists: readonly Specialist[]): Classification {
    const best = new Map<string, Hit>();

    for (const { label, keywords } of specialists) {
        for (const keyword of keywords) {
            if (!keywordPattern(keyword).test(text)) continue;

            const specificity = keyword.trim().split(/\s+/).length;
            const current = best.get(label);
            if (!current || specificity > current.specificity) {
                best.set(label, { label, keyword, specificity });
            }
        }
    }

    const hits = [...best.values()];
    if (hits.length === 0) return { kind: 'none' };

    const top = Math.max(...hits.map((h) => h.specificity));
    const leaders = hits.filter((h) => h.specificity === top);
    const [winner] = leaders;

    if (leaders.length === 1 && winner) {
        return { kind: 'match', label: winner.label, keyword: winner.keyword };
    }
    return { kind: 'ambiguous', candidates: leaders.map((h) => h.label).sort() };
}
