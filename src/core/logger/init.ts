/**
 * Logger Initialization
 *
 * Builds the Logger a CLI run uses, opening the configured log file first.
 * A relative log file path resolves against the project root and its
 * directory is created when missing.
 *
 * @example
 * ```typescript
 * const { logger, close } = await initLogger({
 *     root: '/project',
 *     file: '.semversioner/semkeep.log',
 *     config: { level: 'info', color: false },
 * })
 *
 * logger.start()
 * // ... run the command
 * await close()
 * ```
 */
import { mkdir, open } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import type { Writable } from 'node:stream';
import { finished } from 'node:stream/promises';

import { Logger } from './logger.js';
import type { LoggerConfig } from './types.js';

export interface LoggerInitOptions {

    /** Project root, always part of the entry context */
    root: string;

    config?: Partial<LoggerConfig>;

    /** Log file receiving JSON entries */
    file?: string;

    context?: Record<string, unknown>;

    /** Console stream; stderr when omitted */
    console?: Writable;
}

export interface InitializedLogger {
    logger: Logger;

    /** Absolute log file path, or null without one */
    filePath: string | null;

    /** Stop the logger and flush the log file. Call once. */
    close(): Promise<void>;
}

/**
 * Open the log file, if any, and build the logger.
 *
 * @throws the filesystem error when the log file cannot be opened
 */
export async function initLogger(options: LoggerInitOptions): Promise<InitializedLogger> {

    const filePath = options.file ? resolve(options.root, options.file) : null;
    let fileStream: Writable | undefined;

    if (filePath) {

        await mkdir(dirname(filePath), { recursive: true });

        const handle = await open(filePath, 'a');

        fileStream = handle.createWriteStream();

    }

    const logger = new Logger({
        config: options.config,
        context: { root: options.root, ...options.context },
        console: options.console,
        file: fileStream,
    });

    const close = async (): Promise<void> => {

        logger.stop();

        if (fileStream) {

            fileStream.end();
            await finished(fileStream);

        }

    };

    return { logger, filePath, close };

}
