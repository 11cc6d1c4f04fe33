/**
 * Logger
 *
 * Renders observer events and direct messages. Console output is one line
 * per entry: colored, plain `[LEVEL] message`, or JSON. A file stream, when
 * given, always receives JSON entries.
 *
 * Core modules never call the logger; they emit events and the logger,
 * once started, picks them up.
 *
 * @example
 * ```typescript
 * const logger = new Logger({
 *     config: { level: 'info', color: true },
 *     console: process.stderr,
 * })
 *
 * logger.start()
 * await semkeep.release()   // release:* events become lines on stderr
 * logger.stop()
 * ```
 */
import type { Writable } from 'node:stream';

import { observer } from '../observer.js';
import { classifyEvent, isLevelEnabled } from './classifier.js';
import { formatColorLine } from './color.js';
import { formatEntry, formatPlainLine, serializeEntry } from './formatter.js';
import type { EntryLevel, LogEntry, LogLevel, LoggerConfig } from './types.js';
import { DEFAULT_LOGGER_CONFIG } from './types.js';

/**
 * Options for Logger construction.
 */
export interface LoggerOptions {
    config?: Partial<LoggerConfig>;

    /** Context to include with every JSON entry */
    context?: Record<string, unknown>;

    /** Console stream; stderr when omitted */
    console?: Writable;

    /** File stream for JSON entries */
    file?: Writable;
}

/**
 * Copy an event payload into a plain record.
 */
function toRecord(data: unknown): Record<string, unknown> {

    if (data === null || typeof data !== 'object' || Array.isArray(data)) {

        return data === undefined ? {} : { value: data };

    }

    return Object.fromEntries(Object.entries(data));

}

export class Logger {

    #config: LoggerConfig;
    #context: Record<string, unknown>;
    #console: Writable;
    #file: Writable | null;
    #cleanup: (() => void) | null = null;

    constructor(options: LoggerOptions = {}) {

        this.#config = { ...DEFAULT_LOGGER_CONFIG, ...options.config };
        this.#context = options.context ?? {};
        this.#console = options.console ?? process.stderr;
        this.#file = options.file ?? null;

    }

    get level(): LogLevel {

        return this.#config.level;

    }

    get isEnabled(): boolean {

        return this.#config.level !== 'silent';

    }

    /**
     * Whether the logger is subscribed to observer events.
     */
    get isRunning(): boolean {

        return this.#cleanup !== null;

    }

    /**
     * Merge into the context attached to JSON entries.
     */
    setContext(context: Record<string, unknown>): void {

        this.#context = { ...this.#context, ...context };

    }

    /**
     * Start capturing observer events.
     */
    start(): void {

        if (this.isRunning || !this.isEnabled) {

            return;

        }

        this.#cleanup = observer.on(/./, ({ event, data }) => {

            this.#handleEvent(String(event), toRecord(data));

        });

    }

    /**
     * Stop capturing observer events.
     */
    stop(): void {

        if (this.#cleanup) {

            this.#cleanup();
            this.#cleanup = null;

        }

    }

    #handleEvent(event: string, data: Record<string, unknown>): void {

        const level = classifyEvent(event);

        if (!isLevelEnabled(level, this.#config.level)) {

            return;

        }

        const verbose = this.#config.level === 'verbose';

        this.#write(formatEntry(event, data, this.#context, verbose, level));

    }

    #write(entry: LogEntry): void {

        if (this.#config.json) {

            this.#console.write(serializeEntry(entry));

        }
        else if (this.#config.color) {

            this.#console.write(formatColorLine(entry));

        }
        else {

            this.#console.write(formatPlainLine(entry));

        }

        if (this.#file) {

            this.#file.write(serializeEntry(entry));

        }

    }

    // ─────────────────────────────────────────────────────────────
    // Direct logging methods
    // ─────────────────────────────────────────────────────────────

    info(message: string, data?: Record<string, unknown>): void {

        this.#log('info', message, data);

    }

    warn(message: string, data?: Record<string, unknown>): void {

        this.#log('warn', message, data);

    }

    error(message: string, data?: Record<string, unknown>): void {

        this.#log('error', message, data);

    }

    debug(message: string, data?: Record<string, unknown>): void {

        this.#log('debug', message, data);

    }

    #log(level: EntryLevel, message: string, data?: Record<string, unknown>): void {

        if (!isLevelEnabled(level, this.#config.level)) {

            return;

        }

        const entry: LogEntry = {
            timestamp: new Date().toISOString(),
            level,
            event: 'log',
            message,
        };

        if (this.#config.level === 'verbose' && data && Object.keys(data).length > 0) {

            entry.data = data;

        }

        if (Object.keys(this.#context).length > 0) {

            entry.context = this.#context;

        }

        this.#write(entry);

    }

}
