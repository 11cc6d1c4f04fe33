/**
 * Changeset module types.
 *
 * A changeset is one pending change: its severity, a description for the
 * changelog, and optionally a prerelease channel and free-form attributes.
 * Each changeset is stored as its own JSON file until a release collects it.
 */
import type { z } from 'zod'

import { UserInputError } from '../errors.js'
import type { PrereleaseChannel, ReleaseType } from '../version/index.js'


// ─────────────────────────────────────────────────────────────
// Changeset
// ─────────────────────────────────────────────────────────────

/**
 * A pending change.
 *
 * @example
 * ```typescript
 * const changeset: Changeset = {
 *     type: 'minor',
 *     description: 'Add --json flag to status',
 *     attributes: { issue: 'GH-42' },
 * }
 * ```
 */
export interface Changeset {
    /** Severity of the change */
    readonly type: ReleaseType;

    /** Changelog line */
    readonly description: string;

    /** Extra key/value data, exposed to changelog templates */
    readonly attributes?: Readonly<Record<string, string>>;

    /** Prerelease channel; absent for stable changes */
    readonly pre?: PrereleaseChannel;
}


// ─────────────────────────────────────────────────────────────
// Error Types
// ─────────────────────────────────────────────────────────────

/**
 * Error when a changeset to be recorded is not valid.
 */
export class InvalidChangesetError extends UserInputError {

    override readonly name = 'InvalidChangesetError' as const

    constructor(
        public readonly field: string,
        public readonly issues: z.ZodIssue[],
    ) {

        super(`Invalid changeset ${field}: ${issues[0]?.message ?? 'validation failed'}`)
    }
}


/**
 * Error when a release is requested with nothing pending.
 */
export class MissingChangesetError extends UserInputError {

    override readonly name = 'MissingChangesetError' as const

    constructor() {

        super('No changes to release')
    }
}
