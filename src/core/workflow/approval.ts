/**
 * Adjudication: how escalated reviews reach a human.
 *
 * Interactive sessions ask with prompts. Unattended sessions (`--auto`, or
 * `humanApproval: false`) never resolve an escalation themselves: they
 * abandon and leave the report for a human to read.
 *
 * Dependency direction: approval.ts → prompts, chalk, escalation, runner (types)
 * Used by: cli/commands/start.ts
 */

import prompts from 'prompts';
import chalk from 'chalk';
import type { Session } from './engine.js';
import type { EscalationReport } from './escalation.js';
import type { AdjudicationDecision, Adjudicator } from './runner.js';

const DECISIONS: readonly AdjudicationDecision[] = ['accept_deferrals', 'route_back', 'abandon'];

function isDecision(value: unknown): value is AdjudicationDecision {
    return DECISIONS.some((decision) => decision === value);
}

/**
 * Render an escalation report for the terminal.
 */
export function formatEscalation(report: EscalationReport): string {
    const lines: string[] = [
        chalk.bold.red(`── Escalation: ${report.kind} (${report.phase}) ──`),
        report.reason,
    ];

    if (report.currentFailures.length > 0) {
        lines.push('', chalk.bold('Current failures:'), ...report.currentFailures.map((f) => `  • ${f}`));
    }
    if (report.findings && report.findings.length > 0) {
        lines.push('', chalk.bold('Disputed findings:'));
        for (const finding of report.findings) {
            lines.push(`  ${finding.id} [${finding.severity}] ${finding.raisedBy}: ${finding.description}`);
            if (finding.justification) lines.push(chalk.gray(`      deferral: ${finding.justification}`));
        }
    }
    if (report.attempted.length > 0) {
        lines.push('', chalk.bold('Attempted:'), ...report.attempted.map((a) => chalk.gray(`  ${a}`)));
    }
    lines.push('', `${chalk.bold('Last known good:')} ${report.lastKnownGood}`);
    lines.push('', chalk.bold('Suggested next actions:'), ...report.suggestedActions.map((a) => `  → ${a}`));

    return lines.join('\n');
}

/**
 * Ask the user how to settle an escalated review.
 * A cancelled prompt counts as abandon.
 */
export function promptAdjudicator(): Adjudicator {
    return {
        name: 'human',
        async decide(report: EscalationReport, session: Session): Promise<AdjudicationDecision> {
            console.log();
            console.log(formatEscalation(report));
            console.log();
            console.log(chalk.gray(`Session ${session.id} | Review cycle ${session.iterations.reviewCycles}/${session.limits.maxReviewCycles}`));
            console.log();

            const { decision } = await prompts({
                type: 'select',
                name: 'decision',
                message: 'How should this escalation be settled?',
                choices: [
                    { title: chalk.green('✔ Accept deferrals') + ' — override the reviewer', value: 'accept_deferrals' },
                    { title: chalk.yellow('↻ Route back') + ' — return to implementation', value: 'route_back' },
                    { title: chalk.red('✘ Abandon') + ' — stop the session', value: 'abandon' },
                ],
                initial: 1,
            });

            return isDecision(decision) ? decision : 'abandon';
        },
    };
}

/**
 * Adjudicator for unattended sessions: every escalation abandons the
 * session so the report is surfaced instead of resolved.
 */
export function surfacingAdjudicator(): Adjudicator {
    return {
        name: 'unattended',
        decide: () => Promise.resolve<AdjudicationDecision>('abandon'),
    };
}
