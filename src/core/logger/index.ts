/**
 * Logger Module
 *
 * Turns observer events into console lines and JSON log entries.
 */

// Types
export type {
    LogLevel,
    EntryLevel,
    LogEntry,
    LoggerConfig,
} from './types.js';

export {
    LOG_LEVELS,
    LOG_LEVEL_PRIORITY,
    ENTRY_LEVEL_PRIORITY,
    DEFAULT_LOGGER_CONFIG,
} from './types.js';

// Classifier
export { classifyEvent, isLevelEnabled, shouldLog } from './classifier.js';

// Formatter
export {
    generateMessage,
    sanitizeData,
    formatEntry,
    serializeEntry,
    formatPlainLine,
} from './formatter.js';

export { formatColorLine } from './color.js';

// Logger
export { Logger, type LoggerOptions } from './logger.js';
export { initLogger, type LoggerInitOptions, type InitializedLogger } from './init.js';
