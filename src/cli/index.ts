#!/usr/bin/env node

/**
 * CLI entry point: registers all commands with Commander.js.
 *
 * Dependency direction: cli/index.ts → commander, all command files
 * Used by: package.json bin entry ("reviewloop" binary)
 */

import { Command } from 'commander';
import { initCommand } from './commands/init.js';
import { configCommand } from './commands/config.js';
import { startCommand } from './commands/start.js';
import { statusCommand } from './commands/status.js';
import { rollbackCommand } from './commands/rollback.js';
import { errorMessage } from '../core/errors.js';
import { logger, parseLogLevel } from '../utils/logger.js';

const program = new Command();

program
    .name('reviewloop')
    .description('Review-gated workflow coordinator — one implementer, several reviewers, explicit gates')
    .version('0.1.0')
    .option('--log-level <level>', 'debug | info | warn | error | silent', 'info')
    .hook('preAction', (command) => {
        const name = String(command.opts()['logLevel'] ?? 'info');
        const level = parseLogLevel(name);
        if (level === undefined) {
            logger.warn(`Unknown log level "${name}"; using info`);
            return;
        }
        logger.setLogLevel(level);
    });

// Register commands
program.addCommand(initCommand);
program.addCommand(configCommand);
program.addCommand(startCommand);
program.addCommand(statusCommand);
program.addCommand(rollbackCommand);

program.parseAsync().catch((err: unknown) => {
    logger.error(errorMessage(err));
    process.exitCode = 1;
});
