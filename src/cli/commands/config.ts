/**
 * `reviewloop config`: View configuration.
 *
 * Dependency direction: config.ts → commander, config module
 * Used by: cli/index.ts
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { configExists, loadConfig, getConfigPath, resolveBlockingThreshold } from '../../core/config/manager.js';
import { logger } from '../../utils/logger.js';

export const configCommand = new Command('config')
    .description('View configuration')
    .option('-p, --path', 'Show config file path only')
    .option('--json', 'Print the validated configuration as JSON')
    .action((options: { path?: boolean; json?: boolean }) => {
        const projectRoot = process.cwd();

        if (!configExists(projectRoot)) {
            logger.error('No configuration found. Run "reviewloop init" first.');
            process.exitCode = 1;
            return;
        }

        if (options.path) {
            console.log(getConfigPath(projectRoot));
            return;
        }

        const config = loadConfig(projectRoot);

        if (options.json) {
            console.log(JSON.stringify(config, null, 2));
            return;
        }

        logger.header('Current Configuration');
        console.log(chalk.gray(`File: ${getConfigPath(projectRoot)}`));
        console.log();
        console.log(`${chalk.bold('Implementer:')} ${config.implementer.name} (${config.implementer.worker.command})`);
        console.log(chalk.bold('Reviewers:'));
        for (const reviewer of config.reviewers) {
            console.log(`  ${reviewer.name} — ${reviewer.domain}, blocks at ${resolveBlockingThreshold(config, reviewer)}`);
        }
        console.log(chalk.bold('Validation layers:'));
        for (const layer of config.validation.layers) {
            const conditional = layer.triggers.length > 0 ? chalk.gray(' (conditional)') : '';
            console.log(`  ${layer.name}: ${[layer.command, ...layer.args].join(' ')}${conditional}`);
        }
        const { workflow } = config;
        console.log(chalk.bold('Bounds:'));
        console.log(`  validation attempts ${workflow.maxValidationAttempts}, review cycles ${workflow.maxReviewCycles}, re-verdict rounds ${workflow.maxReverdictRounds}`);
        console.log(`  planning gate ${workflow.planningGate.maxRounds} × ${workflow.planningGate.timeoutMs / 60_000} min, review gate ${workflow.reviewGate.maxRounds} × ${workflow.reviewGate.timeoutMs / 60_000} min`);
    });
