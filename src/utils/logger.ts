/**
 * Structured console logger with chalk colors, log levels and scopes.
 *
 * `logger` is the root logger used by the CLI; core modules take a
 * scoped child from `createLogger('gates')` so output shows where it came from.
 *
 * Dependency direction: logger.ts → chalk (external only)
 * Used by: every layer for consistent logging output
 */

import chalk from 'chalk';

export enum LogLevel {
    Debug = 0,
    Info = 1,
    Warn = 2,
    Error = 3,
    Silent = 4,
}

let currentLevel: LogLevel = LogLevel.Info;

/** Set the global log level. */
export function setLogLevel(level: LogLevel): void {
    currentLevel = level;
}

/** Get the current global log level. */
export function getLogLevel(): LogLevel {
    return currentLevel;
}

/** Parse a level name as used by `--log-level` and `REVIEWLOOP_LOG_LEVEL`. */
export function parseLogLevel(name: string): LogLevel | undefined {
    switch (name.trim().toLowerCase()) {
        case 'debug': return LogLevel.Debug;
        case 'info': return LogLevel.Info;
        case 'warn': return LogLevel.Warn;
        case 'error': return LogLevel.Error;
        case 'silent': return LogLevel.Silent;
        default: return undefined;
    }
}

export interface Logger {
    debug(message: string, ...args: unknown[]): void;
    info(message: string, ...args: unknown[]): void;
    success(message: string, ...args: unknown[]): void;
    warn(message: string, ...args: unknown[]): void;
    error(message: string, ...args: unknown[]): void;
}

/**
 * Create a logger whose lines carry a `[scope]` tag.
 */
export function createLogger(scope?: string): Logger {
    const tag = scope ? `[${scope}] ` : '';

    return {
        debug(message, ...args) {
            if (currentLevel <= LogLevel.Debug) {
                console.debug(chalk.gray(`[DEBUG] ${tag}${message}`), ...args);
            }
        },
        info(message, ...args) {
            if (currentLevel <= LogLevel.Info) {
                console.info(chalk.blue(`[INFO]  ${tag}${message}`), ...args);
            }
        },
        success(message, ...args) {
            if (currentLevel <= LogLevel.Info) {
                console.info(chalk.green(`✔ ${tag}${message}`), ...args);
            }
        },
        warn(message, ...args) {
            if (currentLevel <= LogLevel.Warn) {
                console.warn(chalk.yellow(`[WARN]  ${tag}${message}`), ...args);
            }
        },
        error(message, ...args) {
            if (currentLevel <= LogLevel.Error) {
                console.error(chalk.red(`[ERROR] ${tag}${message}`), ...args);
            }
        },
    };
}

const root = createLogger();

/** Log a step in a process (cyan, with step number). */
export function step(stepNumber: number, total: number, message: string): void {
    if (currentLevel <= LogLevel.Info) {
        console.info(chalk.cyan(`[${stepNumber}/${total}] ${message}`));
    }
}

/** Log a blank line for readability. */
export function blank(): void {
    if (currentLevel <= LogLevel.Info) {
        console.log();
    }
}

/** Log a header/banner (bold white). */
export function header(message: string): void {
    if (currentLevel <= LogLevel.Info) {
        console.log();
        console.log(chalk.bold.white(message));
        console.log(chalk.gray('─'.repeat(Math.min(message.length + 4, 60))));
    }
}

export const logger = {
    ...root,
    step,
    blank,
    header,
    setLogLevel,
    getLogLevel,
};
