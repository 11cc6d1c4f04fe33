/**
 * Logger Types
 *
 * The logger renders observer events and direct messages as lines on a
 * console stream, and as JSON entries on an optional file stream.
 */

/**
 * Log verbosity levels.
 *
 * - silent: No logging
 * - error: Errors only
 * - warn: Errors + warnings
 * - info: Errors + warnings + info (default)
 * - verbose: All events including debug
 */
export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'verbose';

export const LOG_LEVELS = ['silent', 'error', 'warn', 'info', 'verbose'] as const;

/**
 * Numeric priority for log levels.
 * Higher numbers = more verbose.
 */
export const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
    silent: 0,
    error: 1,
    warn: 2,
    info: 3,
    verbose: 4,
};

/**
 * Severity of a single entry.
 */
export type EntryLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Numeric priority for entry levels.
 * Lower = more severe.
 */
export const ENTRY_LEVEL_PRIORITY: Record<EntryLevel, number> = {
    error: 1,
    warn: 2,
    info: 3,
    debug: 4,
};

/**
 * A single log entry.
 *
 * @example
 * ```json
 * {
 *     "timestamp": "2024-01-15T10:30:00.000Z",
 *     "level": "info",
 *     "event": "release:start",
 *     "message": "Releasing version: 1.0.0 -> 1.1.0",
 *     "data": { "from": "1.0.0", "to": "1.1.0", "changes": 2 }
 * }
 * ```
 */
export interface LogEntry {
    /** ISO 8601 timestamp */
    timestamp: string;

    level: EntryLevel;

    /** Observer event name, or 'log' for direct messages */
    event: string;

    /** Human-readable summary */
    message: string;

    /** Event payload (included at verbose level) */
    data?: Record<string, unknown>;

    /** Additional context (project root, command) */
    context?: Record<string, unknown>;
}

/**
 * Logger configuration.
 *
 * Comes from the `log` section of semkeep.yml and the CLI flags.
 */
export interface LoggerConfig {
    /** Minimum level to write */
    level: LogLevel;

    /** Color console lines */
    color: boolean;

    /** Write console lines as JSON entries */
    json: boolean;
}

export const DEFAULT_LOGGER_CONFIG: LoggerConfig = {
    level: 'info',
    color: true,
    json: false,
};
