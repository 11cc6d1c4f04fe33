/**
 * Central event system for semkeep.
 *
 * Core modules emit events, the CLI subscribes. Core code never prints;
 * the logger renders whatever it receives here.
 *
 * @example
 * ```typescript
 * // In core module - emit events at key points
 * observer.emit('changeset:created', { path, type: 'minor' })
 *
 * // In CLI - subscribe to events
 * const cleanup = observer.on('release:complete', (data) => report(data))
 *
 * // Pattern matching for multiple events
 * observer.on(/^release:/, ({ event, data }) => logReleaseEvent(event, data))
 * ```
 */
import {
    ObserverEngine,
    type Events
} from '@logosdx/observer'

import { isDebug } from './environment.js'


/**
 * All events emitted by semkeep core modules.
 *
 * Events are namespaced by module:
 * - `changeset:*` - Pending changeset store
 * - `release:*` - Release coordination and history
 * - `layout:*` - Root directory resolution
 * - `changelog:*` - Changelog rendering
 * - `config:*` - Configuration loading
 * - `error` - Catch-all errors
 */
export interface SemkeepEvents {

    // Changeset store
    'changeset:created': { path: string; type: string; pre?: string }
    'changeset:collision': { filename: string; attempt: number }
    'changeset:cleared': { directory: string; removed: number }

    // Layout
    'layout:deprecated': { legacyDir: string; currentDir: string }

    // Release lifecycle
    'release:start': { from: string; to: string; changes: number }
    'release:created': { version: string; path: string }
    'release:complete': { from: string; to: string; durationMs: number }

    // Changelog
    'changelog:rendered': { releases: number; custom: boolean; durationMs: number }

    // Config
    'config:loaded': { path: string; fromFile: boolean }

    // Errors
    'error': { source: string; error: Error; context?: Record<string, unknown> }
}

export type SemkeepEventNames = Events<SemkeepEvents>;

/**
 * Global observer instance for semkeep.
 *
 * Enable debug mode with `SEMKEEP_DEBUG=true` to see all events as they occur.
 */
export const observer = new ObserverEngine<SemkeepEvents>({
    name: 'semkeep',
    spy: isDebug()
        ? (action) => console.error(`[semkeep:${action.fn}] ${String(action.event)}`)
        : undefined
});
