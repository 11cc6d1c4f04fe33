/**
 * Changeset Zod schemas and (de)serialization.
 *
 * Reading is lenient: unknown keys are dropped and a `null` channel or
 * attribute map counts as absent. Recording is strict: the description
 * must not be blank.
 */
import { z } from 'zod'

import { RecordParseError } from '../errors.js'
import { PRERELEASE_CHANNELS, RELEASE_TYPES } from '../version/types.js'
import type { Changeset } from './types.js'
import { InvalidChangesetError } from './types.js'


// ─────────────────────────────────────────────────────────────
// Schemas
// ─────────────────────────────────────────────────────────────

export const ReleaseTypeSchema = z.enum(RELEASE_TYPES)

export const PrereleaseChannelSchema = z.enum(PRERELEASE_CHANNELS)

/**
 * A changeset as stored on disk.
 */
export const ChangesetSchema = z.object({
    type: ReleaseTypeSchema,
    description: z.string(),
    attributes: z.record(z.string()).nullish(),
    pre: PrereleaseChannelSchema.nullish(),
})

/**
 * A changeset about to be recorded.
 */
const ChangesetInputSchema = ChangesetSchema.extend({
    description: z.string().refine((s) => s.trim().length > 0, 'Description is required'),
})

type StoredChangeset = z.infer<typeof ChangesetSchema>


// ─────────────────────────────────────────────────────────────
// Conversion
// ─────────────────────────────────────────────────────────────

/**
 * Drop absent optional fields so equal changesets compare equal.
 */
function normalize(stored: StoredChangeset): Changeset {

    return {
        type: stored.type,
        description: stored.description,
        ...(stored.attributes && Object.keys(stored.attributes).length > 0
            ? { attributes: { ...stored.attributes } }
            : {}),
        ...(stored.pre ? { pre: stored.pre } : {}),
    }
}


/**
 * Validate a changeset before it is recorded.
 *
 * @throws InvalidChangesetError naming the first offending field
 *
 * @example
 * ```typescript
 * validateChangeset({ type: 'minor', description: '  ' })
 * // throws InvalidChangesetError: Invalid changeset description: Description is required
 * ```
 */
export function validateChangeset(input: unknown): Changeset {

    const result = ChangesetInputSchema.safeParse(input)

    if (!result.success) {

        const firstIssue = result.error.issues[0]

        throw new InvalidChangesetError(
            firstIssue?.path.join('.') || 'record',
            result.error.issues,
        )
    }

    return normalize(result.data)
}


/**
 * Parse a stored changeset.
 *
 * @param data - Decoded JSON
 * @param filepath - Source file, for error messages
 * @throws RecordParseError if the shape does not match
 */
export function parseChangesetRecord(data: unknown, filepath: string): Changeset {

    const result = ChangesetSchema.safeParse(data)

    if (!result.success) {

        const firstIssue = result.error.issues[0]
        const field = firstIssue?.path.join('.') || 'record'

        throw new RecordParseError(
            filepath,
            `${field}: ${firstIssue?.message ?? 'not a changeset'}`,
        )
    }

    return normalize(result.data)
}


/**
 * Plain object form with a fixed key order, for writing to disk.
 */
export function toChangesetRecord(changeset: Changeset): Record<string, unknown> {

    return {
        type: changeset.type,
        description: changeset.description,
        ...(changeset.attributes ? { attributes: { ...changeset.attributes } } : {}),
        ...(changeset.pre ? { pre: changeset.pre } : {}),
    }
}


/**
 * Serialize a changeset file.
 */
export function serializeChangeset(changeset: Changeset): string {

    return JSON.stringify(toChangesetRecord(changeset), null, 2) + '\n'
}


/**
 * Order changesets by type, then description, then channel.
 *
 * `major` < `minor` < `patch` as strings, so the most severe changes come
 * first. Code-unit comparison keeps the order locale-independent.
 */
export function compareChangesets(a: Changeset, b: Changeset): number {

    return compareText(a.type, b.type)
        || compareText(a.description, b.description)
        || compareText(a.pre ?? '', b.pre ?? '')
}


/**
 * Sorted copy of a changeset list.
 */
export function sortChangesets(changes: readonly Changeset[]): Changeset[] {

    return [...changes].sort(compareChangesets)
}


function compareText(a: string, b: string): number {

    if (a === b) {

        return 0
    }

    return a < b ? -1 : 1
}
