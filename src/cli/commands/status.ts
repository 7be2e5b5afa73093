/**
 * `reviewloop status`: List persisted sessions.
 *
 * Dependency direction: status.ts → commander, chalk, workflow/session
 * Used by: cli/index.ts
 */

import { Command, Option } from 'commander';
import chalk from 'chalk';
import { SessionStore, summarize, type SessionSummary, type StatusFilter } from '../../core/workflow/session.js';
import { logger } from '../../utils/logger.js';

type StatusFormat = 'text' | 'json' | 'tsv';

const PHASE_COLORS: Record<SessionSummary['phase'], (text: string) => string> = {
    setup: chalk.gray,
    planning: chalk.cyan,
    implementation: chalk.blue,
    validation: chalk.magenta,
    review: chalk.yellow,
    reflection: chalk.cyan,
    complete: chalk.green,
    abandoned: chalk.red,
};

/**
 * Render session summaries in one of the status formats.
 */
export function formatStatus(summaries: readonly SessionSummary[], format: StatusFormat): string {
    switch (format) {
        case 'json':
            return JSON.stringify(summaries, null, 2);
        case 'tsv':
            return summaries
                .map((s) => [s.id, s.phase, s.mode, s.specialist, String(s.iteration), s.task].join('\t'))
                .join('\n');
        case 'text': {
            if (summaries.length === 0) return 'No sessions found.';
            return summaries
                .map((s) => {
                    const phase = PHASE_COLORS[s.phase](s.phase.padEnd(14));
                    return `${phase} ${s.id}\n${chalk.gray(`               ${s.mode}, ${s.specialist}, iteration ${s.iteration} — ${s.task}`)}`;
                })
                .join('\n');
        }
    }
}

export const statusCommand = new Command('status')
    .description('Show persisted sessions')
    .option('--active-only', 'Only sessions that have not finished')
    .option('--complete-only', 'Only completed sessions')
    .addOption(new Option('--format <format>', 'Output format').choices(['text', 'json', 'tsv']).default('text'))
    .action((options: { activeOnly?: boolean; completeOnly?: boolean; format: StatusFormat }) => {
        if (options.activeOnly && options.completeOnly) {
            logger.error('--active-only and --complete-only cannot be combined.');
            process.exitCode = 1;
            return;
        }

        const filter: StatusFilter = options.activeOnly ? 'active' : options.completeOnly ? 'complete' : 'all';
        const sessions = new SessionStore(process.cwd()).list(filter);

        if (options.format === 'text') {
            logger.header(`Sessions (${filter})`);
        }
        console.log(formatStatus(sessions.map(summarize), options.format));
    });
