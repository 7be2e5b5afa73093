/**
 * `reviewloop init`: Interactive setup wizard.
 *
 * Walks the user through the implementer and reviewer workers and the
 * workflow settings. Generates `.reviewloop/config.json` in the current
 * project directory.
 *
 * Dependency direction: init.ts → commander, prompts, ora, chalk, config module
 * Used by: cli/index.ts
 */

import { Command } from 'commander';
import prompts from 'prompts';
import chalk from 'chalk';
import ora from 'ora';
import { configExists, saveConfig, getDefaultConfig, getConfigPath } from '../../core/config/manager.js';
import { reviewerDomainSchema } from '../../core/config/schema.js';
import type { AppConfig, ReviewerConfig } from '../../core/config/types.js';
import { logger } from '../../utils/logger.js';

export const initCommand = new Command('init')
    .description('Initialize reviewloop in the current project')
    .option('-f, --force', 'Overwrite existing configuration')
    .option('-y, --yes', 'Accept defaults without prompting')
    .action(async (options: { force?: boolean; yes?: boolean }) => {
        const projectRoot = process.cwd();

        logger.header('reviewloop — Project Setup');

        // Check for existing config
        if (configExists(projectRoot) && !options.force) {
            const { overwrite } = await prompts({
                type: 'confirm',
                name: 'overwrite',
                message: 'Configuration already exists. Overwrite?',
                initial: false,
            });

            if (overwrite !== true) {
                logger.info('Setup cancelled.');
                return;
            }
        }

        const config = options.yes ? getDefaultConfig() : await runWizard();

        if (!config) {
            logger.info('Setup cancelled.');
            return;
        }

        const spinner = ora('Saving configuration...').start();
        saveConfig(projectRoot, config);
        spinner.succeed(`Configuration saved to ${getConfigPath(projectRoot)}`);

        console.log();
        logger.success('Setup complete!');
        console.log(chalk.gray('  Next steps:'));
        console.log(chalk.gray('  1. Point the worker commands at your agents in .reviewloop/config.json'));
        console.log(chalk.gray('  2. Adjust validation.layers to your toolchain'));
        console.log(chalk.gray('  3. Run "reviewloop start <task>" to start a session'));
        console.log();
    });

/**
 * Run the interactive setup wizard.
 */
async function runWizard(): Promise<AppConfig | null> {
    const config = getDefaultConfig();

    // ── Step 1: Implementer ──
    logger.step(1, 3, 'Implementer');
    const { implementerCommand } = await prompts({
        type: 'text',
        name: 'implementerCommand',
        message: 'Command that runs the implementer agent:',
        initial: config.implementer.worker.command,
    });

    if (typeof implementerCommand !== 'string' || !implementerCommand.trim()) return null;
    config.implementer.worker = { ...config.implementer.worker, command: implementerCommand.trim() };

    // ── Step 2: Reviewers ──
    logger.step(2, 3, 'Reviewers');
    const current = new Set(config.reviewers.map((r) => r.domain));
    const { domains } = await prompts({
        type: 'multiselect',
        name: 'domains',
        message: 'Reviewer domains (space to toggle, enter to confirm):',
        choices: reviewerDomainSchema.options.map((domain) => ({
            title: `${domain} (blocks at ${config.domainThresholds[domain] ?? 'low'})`,
            value: domain,
            selected: current.has(domain),
        })),
        min: 1,
    });

    if (!Array.isArray(domains)) return null;

    const { reviewerCommand } = await prompts({
        type: 'text',
        name: 'reviewerCommand',
        message: 'Command that runs the reviewer agents:',
        initial: config.reviewers[0]?.worker.command ?? 'agent',
    });

    if (typeof reviewerCommand !== 'string' || !reviewerCommand.trim()) return null;

    const selected = reviewerDomainSchema.options.filter((domain) => domains.includes(domain));
    config.reviewers = selected.map((domain): ReviewerConfig => ({
        name: domain,
        domain,
        worker: {
            command: reviewerCommand.trim(),
            args: ['--role', `${domain}-reviewer`],
            timeoutMs: config.implementer.worker.timeoutMs,
        },
    }));

    // ── Step 3: Workflow ──
    logger.step(3, 3, 'Workflow');
    const workflowAnswers = await prompts([
        {
            type: 'confirm',
            name: 'humanApproval',
            message: 'Ask you to adjudicate escalated reviews? (otherwise they abandon the session)',
            initial: config.workflow.humanApproval,
        },
        {
            type: 'confirm',
            name: 'autoCreateBranch',
            message: 'Create a Git branch for each session?',
            initial: config.workflow.autoCreateBranch,
        },
    ]);

    if (typeof workflowAnswers.humanApproval !== 'boolean') return null;
    config.workflow.humanApproval = workflowAnswers.humanApproval;
    config.workflow.autoCreateBranch = workflowAnswers.autoCreateBranch === true;

    return config;
}
