/**
 * ================================================================================
 * LOGGER UTILITY - Console Feedback and File Logging
 * ================================================================================
 *
 * Console output for operators combined with a JSON file log for later analysis.
 * Every command run gets an execution ID so log lines from one invocation can be
 * correlated.
 *
 * LOG LEVELS:
 * • ERROR - Fatal failures
 * • WARN  - Partial failures and skipped actions
 * • INFO  - Operational progress
 * • DEBUG - Provider payloads and timings (console only in verbose mode)
 *
 * OUTPUT DESTINATIONS:
 * • Console - Coloured status lines and spinners
 * • File - JSON lines in ec2-cluster.log (CLUSTER_LOG_FILE overrides)
 *
 * @license BSD-3-Clause
 */

import winston from 'winston';
import chalk from 'chalk';
import ora, { Ora } from 'ora';
import { randomUUID } from 'crypto';
import path from 'path';

export interface LoggerOptions {
    logFilePath?: string;
    fileLogging?: boolean;
}

/**
 * ================================================================================
 * LOGGER CLASS
 * ================================================================================
 *
 * //! IMPORTANT: use the exported 'logger' singleton so execution IDs stay consistent
 */
export class Logger {
    private winston: winston.Logger;          // Winston instance for file logging
    private verbose: boolean = false;
    private executionId: string = '';
    private logFilePath: string;

    constructor(options: LoggerOptions = {}) {
        this.logFilePath = path.resolve(
            process.cwd(),
            options.logFilePath ?? process.env.CLUSTER_LOG_FILE ?? 'ec2-cluster.log'
        );

        //? Test runs keep the file transport out so no log file is created
        const fileLogging = options.fileLogging ?? process.env.NODE_ENV !== 'test';

        this.winston = winston.createLogger({
            level: 'debug',
            format: winston.format.combine(
                winston.format.timestamp(),
                winston.format.errors({ stack: true }),
                winston.format.json()
            ),
            transports: fileLogging
                ? [new winston.transports.File({ filename: this.logFilePath })]
                : [new winston.transports.Console({ silent: true })]
        });
    }

    /**
     * Enable or disable verbose console output
     */
    setVerbose(verbose: boolean): void {
        this.verbose = verbose;
        if (verbose) {
            this.debug('Verbose logging enabled');
        }
    }

    /**
     * Start a new execution session with a unique tracking ID
     *
     * @param command - Full command line being executed
     * @returns The generated execution ID
     */
    startExecution(command: string): string {
        this.executionId = randomUUID();

        console.log(chalk.cyan('🚀'), chalk.bold(`Execution ID: ${this.executionId}`));
        console.log(chalk.gray('📄'), `Log file: ${this.logFilePath}`);
        console.log('');

        this.winston.info(`Starting execution: ${command}`, {
            executionId: this.executionId,
            command,
            timestamp: new Date().toISOString()
        });
        return this.executionId;
    }

    //? First 8 characters of the execution ID keep console lines short
    private formatMessage(message: string): string {
        return this.executionId ? `[${this.executionId.slice(0, 8)}] ${message}` : message;
    }

    /**
     * ================================================================================
     * LOGGING METHODS
     * ================================================================================
     */

    info(message: string, data?: unknown): void {
        console.log(chalk.blue('ℹ'), this.formatMessage(message));
        this.winston.info(message, { executionId: this.executionId, data });
    }

    success(message: string, data?: unknown): void {
        console.log(chalk.green('✓'), this.formatMessage(message));
        this.winston.info(message, { executionId: this.executionId, data, level: 'success' });
    }

    warn(message: string, data?: unknown): void {
        console.log(chalk.yellow('⚠'), this.formatMessage(message));
        this.winston.warn(message, { executionId: this.executionId, data });
    }

    /**
     * Log an error, with its stack when one is given
     */
    error(message: string, error?: Error, data?: unknown): void {
        console.log(chalk.red('✗'), this.formatMessage(message));

        if (error) {
            if (this.verbose) {
                console.log(chalk.red(error.stack));
            }
            this.winston.error(message, {
                executionId: this.executionId,
                error: error.stack,
                data
            });
        } else {
            this.winston.error(message, { executionId: this.executionId, data });
        }
    }

    /**
     * Debug output; always written to the file, shown on the console in verbose mode
     */
    debug(message: string, data?: unknown): void {
        if (this.verbose) {
            console.log(chalk.gray('🔍'), chalk.gray(this.formatMessage(message)));
            if (data !== undefined) {
                console.log(chalk.gray('   Data:'), chalk.gray(JSON.stringify(data, null, 2)));
            }
        }

        this.winston.debug(message, { executionId: this.executionId, data });
    }

    /**
     * Log a workflow step (e.g. 'LAUNCH_WORKERS', 'BOOTSTRAP')
     */
    step(step: string, message: string, data?: unknown): void {
        const formattedMessage = this.formatMessage(`${step}: ${message}`);

        if (this.verbose) {
            console.log(chalk.magenta('📋'), chalk.magenta(formattedMessage));
            if (data !== undefined) {
                console.log(chalk.gray('   Data:'), chalk.gray(JSON.stringify(data, null, 2)));
            }
        }

        this.winston.info(`${step}: ${message}`, {
            executionId: this.executionId,
            step,
            data,
            type: 'step'
        });
    }

    /**
     * ================================================================================
     * UTILITY METHODS - Timing and Progress
     * ================================================================================
     */

    timer(label: string): { end: () => number } {
        const startTime = Date.now();
        this.debug(`Timer started: ${label}`);

        return {
            end: () => {
                const duration = Date.now() - startTime;
                this.debug(`Timer ended: ${label} (${duration}ms)`, { duration, label });
                return duration;
            }
        };
    }

    /**
     * Spinner for long waits; call succeed(), fail() or stop() when done
     */
    spinner(message: string): Ora {
        return ora({ text: this.formatMessage(message), isEnabled: process.stdout.isTTY === true }).start();
    }

    getExecutionId(): string {
        return this.executionId;
    }
}

export const logger = new Logger();
