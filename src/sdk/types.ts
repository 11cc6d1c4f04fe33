/**
 * SDK Types.
 */
import type { SemkeepConfig } from '../core/config/index.js';
import type { PrereleaseChannel } from '../core/version/index.js';

// ─────────────────────────────────────────────────────────────
// Factory Options
// ─────────────────────────────────────────────────────────────

/**
 * Options for creating a Semkeep instance.
 *
 * @example
 * ```typescript
 * // Project in the working directory, config from semkeep.yml + env
 * const semkeep = await createSemkeep()
 *
 * // Explicit root and config, nothing read from the environment
 * const semkeep = await createSemkeep({
 *     path: '/repo',
 *     config: { log: { level: 'warn', color: false }, changelog: {} },
 * })
 * ```
 */
export interface CreateSemkeepOptions {
    /** Project root. Defaults to process.cwd() */
    path?: string;

    /** Resolved config; loaded from the project when omitted */
    config?: SemkeepConfig;

    /** Environment for SEMKEEP_* variables when loading config */
    env?: NodeJS.ProcessEnv;
}

// ─────────────────────────────────────────────────────────────
// Operation Options
// ─────────────────────────────────────────────────────────────

export interface AddChangeOptions {
    /** Extra key/value data for changelog templates */
    attributes?: Record<string, string>;

    /** Prerelease channel */
    pre?: PrereleaseChannel;
}

export interface GenerateChangelogOptions {
    /** Only render this version */
    version?: string;

    /**
     * Eta template source. Falls back to the file named by
     * `changelog.template` in config, then to the built-in template.
     */
    template?: string;
}
