/**
 * Slate Color Theme
 *
 * Centralized color scheme for terminal output and log lines.
 * Uses ansis for truecolor (hex) support.
 *
 * @example
 * ```typescript
 * import { getTheme } from '../core/theme.js'
 *
 * const t = getTheme(color)
 * console.log(t.muted('(nothing pending)'))
 * ```
 */
import ansis from 'ansis';

// ─────────────────────────────────────────────────────────────
// Color Palette
// ─────────────────────────────────────────────────────────────

export const palette = {

    // Status
    success: '#10B981',      // Emerald Green
    warning: '#F59E0B',      // Amber
    error: '#EF4444',        // Red
    info: '#8B5CF6',         // Purple

    // Neutrals
    muted: '#9CA3AF',        // Gray-400
    text: '#F3F4F6',         // Gray-100

} as const;

// ─────────────────────────────────────────────────────────────
// Color Functions (Truecolor)
// ─────────────────────────────────────────────────────────────

export const theme = {

    success: (text: string) => ansis.hex(palette.success)(text),
    warning: (text: string) => ansis.hex(palette.warning)(text),
    error: (text: string) => ansis.hex(palette.error)(text),
    info: (text: string) => ansis.hex(palette.info)(text),

    muted: (text: string) => ansis.hex(palette.muted)(text),
    text: (text: string) => ansis.hex(palette.text)(text),

} as const;

/**
 * Pass-through theme for uncolored output.
 */
export const plainTheme: { [K in keyof typeof theme]: (text: string) => string } = {

    success: (text) => text,
    warning: (text) => text,
    error: (text) => text,
    info: (text) => text,
    muted: (text) => text,
    text: (text) => text,

};

export type Theme = typeof plainTheme;

/**
 * Pick the colored or plain theme.
 */
export function getTheme(color: boolean): Theme {

    return color ? theme : plainTheme;

}

// ─────────────────────────────────────────────────────────────
// Icons
// ─────────────────────────────────────────────────────────────

export const icons = {
    success: '✓',
    error: '✗',
    warning: '⚠',
    info: '•',
    debug: '○',
} as const;

// ─────────────────────────────────────────────────────────────
// Data Display Helpers
// ─────────────────────────────────────────────────────────────

/**
 * Data value formatters for logs.
 */
export const data = {

    number(value: number): string {

        return theme.warning(String(value));

    },

    boolean(value: boolean): string {

        return value ? theme.success('true') : theme.error('false');

    },

    nil(): string {

        return theme.muted('null');

    },

} as const;

// ─────────────────────────────────────────────────────────────
// Logger Integration
// ─────────────────────────────────────────────────────────────

export const logLevelColors = {
    error: theme.error,
    warn: theme.warning,
    info: theme.info,
    debug: theme.muted,
} as const;

export const logLevelIcons = {
    error: icons.error,
    warn: icons.warning,
    info: icons.info,
    debug: icons.debug,
} as const;
