// src/utils/logging/logUtils.ts

import type { ILogFacility, ILogger, LogLevel } from '../../@types/index.js';

import chalk from 'chalk';

interface ILevelStyle {
    label: string;
    colour: (text: string) => string;
    channel: keyof ILogFacility;
}

const LEVEL_STYLES: Record<LogLevel, ILevelStyle> = {
    info: { label: 'INFO', colour: chalk.blue, channel: 'log' },
    success: { label: 'SUCCESS', colour: chalk.green, channel: 'log' },
    warn: { label: 'WARNING', colour: chalk.yellow, channel: 'warn' },
    error: { label: 'ERROR', colour: chalk.red, channel: 'error' },
    debug: { label: 'DEBUG', colour: chalk.magenta, channel: 'log' },
};

const loggerMap = new Map<string, Logger>();

export const NoopLogFacility: ILogFacility = {
    log: (..._input: unknown[]): void => {},
    warn: (..._input: unknown[]): void => {},
    error: (..._input: unknown[]): void => {},
};

/**
 * Named logger writing coloured `[LEVEL] name :: message` lines to a log facility.
 * Debug lines are only written when verbose. Messages are not kept.
 */
export class Logger implements ILogger {
    constructor(
        readonly name: string,
        readonly facility: ILogFacility,
        readonly verbose = false,
    ) {}

    info(message: string): void {
        this.emit('info', message);
    }

    success(message: string): void {
        this.emit('success', message);
    }

    warn(message: string): void {
        this.emit('warn', message);
    }

    error(message: string): void {
        this.emit('error', message);
    }

    debug(message: string): void {
        if (this.verbose) {
            this.emit('debug', message);
        }
    }

    private emit(level: LogLevel, message: string): void {
        const { label, colour, channel } = LEVEL_STYLES[level];
        this.facility[channel](colour(`[${label}] ${this.name} :: ${message}`));
    }
}

/**
 * Logger for a single library call: silent unless the caller supplied its own, and never shared.
 */
export function createCallLogger(name: string, verbose: boolean): ILogger {
    return new Logger(name, NoopLogFacility, verbose);
}

/**
 * Retrieves a logger by name for the command line. A cached logger is reused only when it
 * writes to the same facility with the same verbosity.
 *
 * @param {string} name - The name identifier for the logger.
 * @param {ILogFacility} [logFacility=console] - The log facility where logs will be sent.
 * @param {boolean} [verbose=false] - Whether debug lines are written.
 * @return {ILogger} The logger instance associated with the provided name.
 */
export function getLogger(
    name: string,
    logFacility: ILogFacility = console,
    verbose: boolean = false,
): ILogger {
    const cached = loggerMap.get(name);
    if (cached && cached.facility === logFacility && cached.verbose === verbose) {
        return cached;
    }
    const logger = new Logger(name, logFacility, verbose);
    loggerMap.set(name, logger);
    return logger;
}
