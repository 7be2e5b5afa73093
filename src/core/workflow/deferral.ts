/**
 * Deferral justification rules.
 *
 * A reviewer accepts a deferred finding only when the implementer's
 * justification names a blocking reason from a fixed list. Minimizing the
 * severity or claiming the code works as-is disqualifies a justification
 * even when a valid reason is also given.
 *
 * Dependency direction: deferral.ts → nothing (leaf module)
 * Used by: reviewer actor, workflow runner
 */

export type ValidDeferralReason =
    | 'out_of_scope_files'
    | 'own_design_cycle'
    | 'cross_component_coordination';

export type InvalidDeferralReason =
    | 'missing'
    | 'severity_minimizing'
    | 'works_as_is'
    | 'later_without_reason';

export type DeferralAssessment =
    | { valid: true; reason: ValidDeferralReason; explanation: string }
    | { valid: false; reason: InvalidDeferralReason; explanation: string };

interface Rule<R extends string> {
    reason: R;
    pattern: RegExp;
    explanation: string;
}

const VALID_RULES: readonly Rule<ValidDeferralReason>[] = [
    {
        reason: 'out_of_scope_files',
        pattern: /\bout[- ]of[- ]scope\b|\boutside (?:the |this )?(?:scope|diff|change)\b|\bfiles? (?:not|outside) (?:in|of|part of)? ?(?:this|the) (?:change|diff)\b/i,
        explanation: 'requires changes to files outside this change',
    },
    {
        reason: 'own_design_cycle',
        pattern: /\bown (?:design|testing|test|review) cycle\b|\brequires (?:its own|a separate) (?:design|testing|test plan|review)\b|\bseparate design\b/i,
        explanation: 'requires its own design or testing cycle',
    },
    {
        reason: 'cross_component_coordination',
        pattern: /\bcross[- ](?:component|service|team)\b|\bcoordinat(?:ion|e) (?:with|across|between)\b|\bmultiple (?:components|services)\b/i,
        explanation: 'requires coordination across components',
    },
];

/** Checked first: any match rejects the justification outright. */
const DISQUALIFYING_RULES: readonly Rule<InvalidDeferralReason>[] = [
    {
        reason: 'severity_minimizing',
        pattern: /\b(?:minor|trivial|cosmetic|nitpick|harmless|low[- ]impact|just a|only a|not (?:a )?big deal|edge case nobody)\b/i,
        explanation: 'minimizes the severity instead of giving a blocking reason',
    },
    {
        reason: 'works_as_is',
        pattern: /\bworks (?:as[- ]is|fine|already|today)\b|\bgood enough\b|\bnot broken\b|\bno (?:real )?problem\b/i,
        explanation: 'claims the code works as-is',
    },
];

/** Rejects a justification only when no valid reason accompanies it. */
const LATER_RULE: Rule<InvalidDeferralReason> = {
    reason: 'later_without_reason',
    pattern: /\b(?:later|follow[- ]?up|next time|eventually|someday|another pr|future pr|tech debt ticket)\b/i,
    explanation: 'postpones the fix without a blocking reason',
};

/**
 * Judge a deferral justification against the fixed list.
 */
export function assessJustification(justification: string): DeferralAssessment {
    const text = justification.trim();

    if (text.length === 0) {
        return { valid: false, reason: 'missing', explanation: 'no justification given' };
    }

    for (const rule of DISQUALIFYING_RULES) {
        if (rule.pattern.test(text)) {
            return { valid: false, reason: rule.reason, explanation: rule.explanation };
        }
    }

    for (const rule of VALID_RULES) {
        if (rule.pattern.test(text)) {
            return { valid: true, reason: rule.reason, explanation: rule.explanation };
        }
    }

    if (LATER_RULE.pattern.test(text)) {
        return { valid: false, reason: LATER_RULE.reason, explanation: LATER_RULE.explanation };
    }

    return { valid: false, reason: 'missing', explanation: 'names none of the accepted blocking reasons' };
}
