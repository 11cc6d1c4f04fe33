/**
 * Changelog module types.
 */
import { UserInputError } from '../errors.js'
import type { ReleaseType, PrereleaseChannel } from '../version/index.js'


/**
 * One change as a template sees it.
 */
export interface ChangelogChange {
    type: ReleaseType;
    description: string;
    attributes: Record<string, string>;
    pre: PrereleaseChannel | null;
}

/**
 * One release as a template sees it.
 */
export interface ChangelogRelease {
    version: string;
    createdAt: Date | null;
    changes: ChangelogChange[];
}

/**
 * The `$` object available inside changelog templates.
 *
 * @example
 * ```
 * {% for (const release of $.releases) { %}
 * ## {%= release.version %} ({%= $.formatDate(release.createdAt, 'YYYY-MM-DD') %})
 * {% } %}
 * ```
 */
export interface ChangelogContext {
    /** Releases, newest first */
    releases: ChangelogRelease[];

    /** Format a release date with a dayjs pattern; '' for undated releases */
    formatDate: (date: Date | null, format?: string) => string;
}

export interface ChangelogOptions {
    /** Only render this version */
    version?: string;

    /** Eta template source; the built-in template when omitted */
    template?: string;
}


// ─────────────────────────────────────────────────────────────
// Error Types
// ─────────────────────────────────────────────────────────────

/**
 * Error when a changelog template fails to compile or render.
 */
export class TemplateError extends UserInputError {

    override readonly name = 'TemplateError' as const

    constructor(
        public readonly reason: string,
        options?: { cause?: unknown },
    ) {

        super(`Changelog template failed: ${reason}`, options)
    }
}


/**
 * Error when a changelog template file does not exist.
 */
export class TemplateNotFoundError extends UserInputError {

    override readonly name = 'TemplateNotFoundError' as const

    constructor(public readonly filepath: string) {

        super(`Template not found: ${filepath}`)
    }
}
