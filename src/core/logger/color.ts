/**
 * Color Formatter
 *
 * Formats log entries with ANSI colors for console output.
 * Uses the centralized theme for consistent styling with truecolor support.
 * Flattens data one level deep - nested objects are stringified.
 */
import { attemptSync } from '@logosdx/utils';

import type { EntryLevel, LogEntry } from './types.js';
import {
    theme,
    logLevelColors,
    logLevelIcons,
    data as dataFormatters,
} from '../theme.js';

const LEVEL_STYLE: Record<EntryLevel, { icon: string; color: (s: string) => string }> = {
    error: { icon: logLevelIcons.error, color: logLevelColors.error },
    warn: { icon: logLevelIcons.warn, color: logLevelColors.warn },
    info: { icon: logLevelIcons.info, color: logLevelColors.info },
    debug: { icon: logLevelIcons.debug, color: logLevelColors.debug },
};

/**
 * Format a value for single-line display.
 */
function formatValue(value: unknown): string {

    if (value === null || value === undefined) {

        return dataFormatters.nil();

    }

    if (typeof value === 'string') {

        return value.length > 50
            ? theme.text(`"${value.slice(0, 47)}..."`)
            : theme.text(value);

    }

    if (typeof value === 'number') {

        return dataFormatters.number(value);

    }

    if (typeof value === 'boolean') {

        return dataFormatters.boolean(value);

    }

    if (Array.isArray(value)) {

        return theme.muted(`[${value.length} items]`);

    }

    const [str, error] = attemptSync(() => JSON.stringify(value));

    if (error) {

        return theme.muted('[object]');

    }

    return theme.text(str.length > 60 ? str.slice(0, 57) + '...' : str);

}

function flattenData(data: Record<string, unknown>): string {

    return Object.entries(data)
        .map(([key, value]) => `${theme.muted(key)}=${formatValue(value)}`)
        .join(' ');

}

/**
 * Format a log entry as a colored console line.
 *
 * Format: `[icon] message  key=value key=value ...`
 */
export function formatColorLine(entry: LogEntry): string {

    const style = LEVEL_STYLE[entry.level];
    const message = entry.level === 'debug'
        ? theme.muted(entry.message)
        : style.color(entry.message);

    let line = `${style.color(style.icon)} ${message}`;

    if (entry.data && Object.keys(entry.data).length > 0) {

        line += `  ${flattenData(entry.data)}`;

    }

    return line + '\n';

}
