/**
 * `reviewloop rollback`: Inspect or undo a session's changes.
 *
 * Dependency direction: rollback.ts → commander, prompts, chalk, workflow/rollback, git/client
 * Used by: cli/index.ts
 */

import { Command } from 'commander';
import prompts from 'prompts';
import chalk from 'chalk';
import { errorMessage } from '../../core/errors.js';
import { rollback, type RollbackAction } from '../../core/workflow/rollback.js';
import { SessionStore } from '../../core/workflow/session.js';
import { GitClient } from '../../git/client.js';
import { logger } from '../../utils/logger.js';

export const rollbackCommand = new Command('rollback')
    .description('Inspect or revert the changes made since a session started')
    .argument('<session>', 'Session id')
    .option('--inspect', 'Show the diff against the start marker (default)')
    .option('--soft', 'Move back to the start marker, keeping changes unstaged')
    .option('--hard', 'Discard every change since the start marker')
    .option('-y, --yes', 'Do not ask before a hard revert')
    .action(async (sessionId: string, options: { inspect?: boolean; soft?: boolean; hard?: boolean; yes?: boolean }) => {
        const projectRoot = process.cwd();
        const chosen = [options.inspect, options.soft, options.hard].filter(Boolean).length;
        if (chosen > 1) {
            logger.error('Choose one of --inspect, --soft or --hard.');
            process.exitCode = 1;
            return;
        }
        const action: RollbackAction = options.hard ? 'hard' : options.soft ? 'soft' : 'inspect';

        const session = new SessionStore(projectRoot).load(sessionId);
        if (!session) {
            logger.error(`No session named "${sessionId}".`);
            process.exitCode = 1;
            return;
        }

        if (action === 'hard' && !options.yes) {
            const { confirmed } = await prompts({
                type: 'confirm',
                name: 'confirmed',
                message: `Discard every change since ${session.startMarker.commit.slice(0, 12)}? This cannot be undone.`,
                initial: false,
            });
            if (confirmed !== true) {
                logger.info('Rollback cancelled.');
                return;
            }
        }

        try {
            const result = await rollback(session, new GitClient(projectRoot), action);

            if (action === 'inspect') {
                logger.header(`Changes since ${result.commit.slice(0, 12)} (${session.startMarker.branch})`);
                for (const file of result.files) console.log(chalk.gray(`  ${file}`));
                console.log();
                console.log(result.diff ?? '');
                return;
            }

            logger.success(`${action === 'hard' ? 'Hard' : 'Soft'} revert to ${result.commit.slice(0, 12)} done (${result.files.length} file(s) affected)`);
        } catch (err) {
            logger.error(errorMessage(err));
            process.exitCode = 1;
        }
    });
