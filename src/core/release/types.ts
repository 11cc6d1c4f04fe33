/**
 * Release module types.
 *
 * A release is the permanent record of one version: the changes it
 * collected and when it was cut. Records are written once and never
 * rewritten; together they are the version history.
 */
import { IntegrityError } from '../errors.js'
import type { Changeset } from '../changeset/index.js'


// ─────────────────────────────────────────────────────────────
// Release
// ─────────────────────────────────────────────────────────────

/**
 * One released version.
 *
 * @example
 * ```typescript
 * const release: Release = {
 *     version: '1.2.0',
 *     changes: [{ type: 'minor', description: 'Add changelog --only' }],
 *     createdAt: new Date('2024-01-15T10:30:00Z'),
 * }
 * ```
 */
export interface Release {
    /** Canonical version string */
    readonly version: string;

    /** Changes, sorted by type then description */
    readonly changes: readonly Changeset[];

    /** When the release was cut; null for records that predate timestamps */
    readonly createdAt: Date | null;
}


/**
 * Snapshot of the project: where it is and what is waiting.
 */
export interface ReleaseStatus {
    /** Current version, `0.0.0` before the first release */
    version: string;

    /** Version the pending changes would produce, null when none */
    nextVersion: string | null;

    /** Pending changes, sorted */
    unreleasedChanges: Changeset[];
}


// ─────────────────────────────────────────────────────────────
// Error Types
// ─────────────────────────────────────────────────────────────

/**
 * Error when a release record for the version is already on disk.
 *
 * Two releases raced, or history was edited by hand. Either way the
 * existing record is left alone.
 */
export class ReleaseExistsError extends IntegrityError {

    override readonly name = 'ReleaseExistsError' as const

    constructor(
        public readonly version: string,
        public readonly filepath: string,
    ) {

        super(`Release ${version} already exists: ${filepath}`)
    }
}
