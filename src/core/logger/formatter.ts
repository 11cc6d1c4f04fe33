/**
 * Log Formatter
 *
 * Converts observer events into LogEntry objects and serializes them.
 * Console lines come in two plain flavors (`[LEVEL] message` and JSON);
 * the colored flavor lives in color.ts.
 */
import type { EntryLevel, LogEntry } from './types.js'
import { classifyEvent } from './classifier.js'


type MessageTemplate = (data: Record<string, unknown>) => string


function errorMessage(value: unknown): string {

    return value instanceof Error ? value.message : String(value)
}


/**
 * Human-readable message templates for known events.
 */
const MESSAGE_TEMPLATES: Record<string, MessageTemplate> = {

    // Changesets
    'changeset:created': (d) => `Created changeset ${d['path']}`,
    'changeset:collision': (d) => `File name ${d['filename']} taken, retrying (attempt ${d['attempt']})`,
    'changeset:cleared': (d) => `Removed ${d['removed']} changeset(s) from ${d['directory']}`,

    // Layout
    'layout:deprecated': (d) => `Using deprecated directory ${d['legacyDir']}, rename it to ${d['currentDir']}`,

    // Release
    'release:start': (d) => `Releasing version: ${d['from']} -> ${d['to']} (${d['changes']} changes)`,
    'release:created': (d) => `Generated ${d['path']}`,
    'release:complete': (d) => `Successfully created new release: ${d['to']}`,

    // Changelog
    'changelog:rendered': (d) => `Rendered changelog with ${d['releases']} release(s)${d['custom'] ? ' (custom template)' : ''}`,

    // Config
    'config:loaded': (d) => d['fromFile']
        ? `Config loaded from ${d['path']}`
        : 'Config loaded from environment and defaults',

    // Generic error
    'error': (d) => `Error in ${d['source']}: ${errorMessage(d['error'])}`,
}


/**
 * Generate a human-readable message for an event.
 *
 * Uses templates for known events, falls back to `event: key=value, ...`.
 *
 * @example
 * ```typescript
 * generateMessage('release:start', { from: '1.0.0', to: '1.1.0', changes: 2 })
 * // 'Releasing version: 1.0.0 -> 1.1.0 (2 changes)'
 *
 * generateMessage('custom:thing', { id: 7 })
 * // 'custom thing: id=7'
 * ```
 */
export function generateMessage(event: string, data: Record<string, unknown>): string {

    const template = MESSAGE_TEMPLATES[event]

    if (template) {

        return template(data)
    }

    const parts = Object.entries(data)
        .slice(0, 3)
        .map(([k, v]) => `${k}=${summarizeValue(v)}`)

    if (parts.length === 0) {

        return event.replace(/:/g, ' ')
    }

    return `${event.replace(/:/g, ' ')}: ${parts.join(', ')}`
}


/**
 * Summarize a value for log message display.
 */
function summarizeValue(value: unknown): string {

    if (typeof value === 'string') {

        return value.length > 50 ? `"${value.slice(0, 47)}..."` : `"${value}"`
    }

    if (Array.isArray(value)) {

        return `[${value.length} items]`
    }

    if (value instanceof Error) {

        return value.message
    }

    if (value !== null && typeof value === 'object') {

        return `{${Object.keys(value).length} keys}`
    }

    return String(value)
}


/**
 * Make event data JSON-safe.
 */
export function sanitizeData(data: Record<string, unknown>): Record<string, unknown> {

    const result: Record<string, unknown> = {}

    for (const [key, value] of Object.entries(data)) {

        if (value instanceof Error) {

            result[key] = { name: value.name, message: value.message }
            continue
        }

        if (value instanceof Date) {

            result[key] = value.toISOString()
            continue
        }

        result[key] = value
    }

    return result
}


/**
 * Build a LogEntry.
 *
 * @param includeData - Attach the payload (verbose mode)
 *
 * @example
 * ```typescript
 * const entry = formatEntry('release:start', { from: '1.0.0', to: '1.1.0', changes: 2 })
 * // {
 * //     timestamp: '2024-01-15T10:30:00.000Z',
 * //     level: 'info',
 * //     event: 'release:start',
 * //     message: 'Releasing version: 1.0.0 -> 1.1.0 (2 changes)',
 * // }
 * ```
 */
export function formatEntry(
    event: string,
    data: Record<string, unknown>,
    context?: Record<string, unknown>,
    includeData = false,
    level: EntryLevel = classifyEvent(event),
): LogEntry {

    const entry: LogEntry = {
        timestamp: new Date().toISOString(),
        level,
        event,
        message: generateMessage(event, data),
    }

    if (includeData && Object.keys(data).length > 0) {

        entry.data = sanitizeData(data)
    }

    if (context && Object.keys(context).length > 0) {

        entry.context = context
    }

    return entry
}


/**
 * Serialize a LogEntry to a JSON line.
 */
export function serializeEntry(entry: LogEntry): string {

    return JSON.stringify(entry) + '\n'
}


/**
 * Format a LogEntry as an uncolored console line.
 *
 * @example
 * ```typescript
 * formatPlainLine({ level: 'warn', message: 'Using deprecated directory', ... })
 * // '[WARN] Using deprecated directory\n'
 * ```
 */
export function formatPlainLine(entry: LogEntry): string {

    let line = `[${entry.level.toUpperCase()}] ${entry.message}`

    if (entry.data) {

        line += ` ${JSON.stringify(entry.data)}`
    }

    return line + '\n'
}
