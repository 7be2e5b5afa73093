/**
 * `reviewloop start`: Run a review-gated session for a task.
 *
 * Dependency direction: start.ts → commander, ora, chalk, workflow/runner, git/client, config
 * Used by: cli/index.ts
 */

import { Command, Option } from 'commander';
import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import { commandWorkers } from '../../agents/factory.js';
import { configExists, loadConfig } from '../../core/config/manager.js';
import { errorMessage } from '../../core/errors.js';
import { formatEscalation, promptAdjudicator, surfacingAdjudicator } from '../../core/workflow/approval.js';
import { CheckRunner, commandLayers } from '../../core/workflow/checks.js';
import type { VerificationLevel } from '../../core/config/types.js';
import type { SessionMode } from '../../core/workflow/eligibility.js';
import { Phase } from '../../core/workflow/engine.js';
import { Orchestrator, type Adjudicator } from '../../core/workflow/runner.js';
import { SessionStore } from '../../core/workflow/session.js';
import { GitClient } from '../../git/client.js';
import { logger } from '../../utils/logger.js';

interface StartOptions {
    mode: SessionMode;
    specialist?: string;
    continue?: string;
    auto?: boolean;
    paths?: string[];
    verify?: VerificationLevel;
}

export const startCommand = new Command('start')
    .description('Start a review-gated session')
    .argument('[task]', 'Task description (omit with --continue)')
    .addOption(new Option('-m, --mode <mode>', 'Session mode').choices(['full', 'lightweight']).default('full'))
    .option('-s, --specialist <label>', 'Specialist label, required when the task is ambiguous')
    .option('-c, --continue <session>', 'Restart an interrupted session from setup')
    .option('--auto', 'Unattended mode — escalations abandon the session instead of prompting')
    .option('--paths <paths...>', 'Paths the change will touch, for the lightweight eligibility check')
    .addOption(
        new Option('--verify <level>', 'Validation depth; each level adds layers to the one before')
            .choices(['quick', 'standard', 'full']),
    )
    .action(async (task: string | undefined, options: StartOptions) => {
        const projectRoot = process.cwd();

        if (!configExists(projectRoot)) {
            logger.error('No configuration found. Run "reviewloop init" first.');
            process.exitCode = 1;
            return;
        }

        const store = new SessionStore(projectRoot);
        const previous = options.continue ? store.load(options.continue) : undefined;
        if (options.continue && !previous) {
            logger.error(`No session named "${options.continue}" in ${store.sessionsDir}`);
            process.exitCode = 1;
            return;
        }
        if (!previous && !task) {
            logger.error('A task description is required (or --continue <session>).');
            process.exitCode = 1;
            return;
        }

        const git = new GitClient(projectRoot);
        if (!(await git.isRepo())) {
            logger.error('reviewloop needs a Git repository to capture the start marker.');
            process.exitCode = 1;
            return;
        }

        const config = loadConfig(projectRoot);
        const unattended = options.auto === true || !config.workflow.humanApproval;
        const level = options.verify ?? config.workflow.verificationLevel;
        const layers = commandLayers(config.validation.layers, level);
        const spinner = ora('Setting up session...');

        logger.header('reviewloop — Session');
        console.log(chalk.gray(`Task: ${previous?.task ?? task ?? ''}`));
        if (unattended) {
            console.log(chalk.yellow('⚡ Unattended — escalations abandon the session with a report'));
        }
        console.log(chalk.gray(`Validation (${level}): ${layers.map((l) => l.name).join(', ') || 'no layers'}`));
        console.log();

        const controller = new AbortController();
        const onSigint = (): void => controller.abort('SIGINT');
        process.once('SIGINT', onSigint);

        const orchestrator = new Orchestrator({
            config,
            projectRoot,
            repository: git,
            workers: commandWorkers(config, projectRoot),
            checks: new CheckRunner(layers),
            adjudicator: pausing(unattended ? surfacingAdjudicator() : promptAdjudicator(), spinner),
            sink: store,
            signal: controller.signal,
            onAudit: (entry) => {
                if (entry.from === undefined) {
                    spinner.text = `${entry.phase}: ${entry.event.toLowerCase().replace(/_/g, ' ')}`;
                    return;
                }
                spinner.stopAndPersist({
                    symbol: chalk.cyan('→'),
                    text: `${entry.from} → ${entry.phase}${entry.detail ? chalk.gray(` (${entry.detail})`) : ''}`,
                });
                spinner.start(`${entry.phase}...`);
            },
        });

        spinner.start();
        try {
            const request = previous
                ? { task: previous.task, mode: previous.requestedMode, continueFrom: previous }
                : { task: task ?? '', mode: options.mode };
            const outcome = await orchestrator.run({
                ...request,
                ...(options.specialist ? { specialist: options.specialist } : {}),
                ...(options.paths ? { paths: options.paths } : {}),
            });
            const { session } = outcome;

            if (session.phase === Phase.Complete) {
                spinner.succeed(`Session ${session.id} complete`);
                if (outcome.handoffPath) console.log(chalk.gray(`Hand-off: ${outcome.handoffPath}`));
                const debt = session.findings.filter((f) => f.status === 'deferred_accepted');
                if (debt.length > 0) {
                    logger.warn(`${debt.length} finding(s) recorded as technical debt`);
                }
                return;
            }

            spinner.fail(`Session ${session.id} abandoned`);
            if (session.escalation) {
                console.log();
                console.log(formatEscalation(session.escalation));
            }
            process.exitCode = 1;
        } catch (err) {
            spinner.fail('Session failed');
            logger.error(errorMessage(err));
            process.exitCode = 1;
        } finally {
            process.removeListener('SIGINT', onSigint);
        }
    });

/** Stop the spinner while an adjudicator may be talking to the user. */
function pausing(adjudicator: Adjudicator, spinner: Ora): Adjudicator {
    return {
        name: adjudicator.name,
        async decide(report, session) {
            spinner.stop();
            try {
                return await adjudicator.decide(report, session);
            } finally {
                spinner.start('Continuing...');
            }
        },
    };
}
