/**
 * Event Classifier
 *
 * Classifies observer events by log level based on naming patterns.
 *
 * Classification rules:
 * - 'error' or '*:error', '*:failed' -> error
 * - '*:deprecated', '*:collision', '*:warning' -> warn
 * - '*:start', '*:complete', '*:cleared' -> info
 * - Everything else -> debug
 */
import type { EntryLevel, LogLevel } from './types.js';
import { ENTRY_LEVEL_PRIORITY, LOG_LEVEL_PRIORITY } from './types.js';

const ERROR_PATTERNS = [/^error$/, /:error$/, /:failed$/];

const WARN_PATTERNS = [/:deprecated$/, /:collision$/, /:warning$/];

/**
 * Lifecycle events worth a line at default verbosity.
 */
const INFO_PATTERNS = [
    /:start$/,
    /:complete$/,
    /:cleared$/,
];

/**
 * Classify an event name to determine its log level.
 *
 * @example
 * ```typescript
 * classifyEvent('error')              // 'error'
 * classifyEvent('layout:deprecated')  // 'warn'
 * classifyEvent('release:start')      // 'info'
 * classifyEvent('changeset:created')  // 'debug'
 * ```
 */
export function classifyEvent(event: string): EntryLevel {

    if (ERROR_PATTERNS.some((pattern) => pattern.test(event))) {

        return 'error';

    }

    if (WARN_PATTERNS.some((pattern) => pattern.test(event))) {

        return 'warn';

    }

    if (INFO_PATTERNS.some((pattern) => pattern.test(event))) {

        return 'info';

    }

    return 'debug';

}

/**
 * Check if an entry level passes the configured verbosity.
 *
 * @example
 * ```typescript
 * isLevelEnabled('warn', 'info')     // true
 * isLevelEnabled('debug', 'info')    // false
 * isLevelEnabled('error', 'silent')  // false
 * ```
 */
export function isLevelEnabled(level: EntryLevel, configLevel: LogLevel): boolean {

    return ENTRY_LEVEL_PRIORITY[level] <= LOG_LEVEL_PRIORITY[configLevel];

}

/**
 * Check if an event should be logged at the given verbosity level.
 *
 * @example
 * ```typescript
 * shouldLog('error', 'warn')                    // true
 * shouldLog('release:start', 'info')            // true
 * shouldLog('changeset:created', 'info')        // false
 * shouldLog('changeset:created', 'verbose')     // true
 * ```
 */
export function shouldLog(event: string, configLevel: LogLevel): boolean {

    return isLevelEnabled(classifyEvent(event), configLevel);

}
