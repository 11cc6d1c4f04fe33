/**
 * Release record (de)serialization.
 *
 * Two on-disk shapes exist. The current one is an object carrying its own
 * version and timestamp; the legacy one is a bare array of changes whose
 * version is the file name. Both decode into one tagged union and are
 * normalized into a {@link Release} straight away, so nothing past this
 * file knows the legacy shape exists.
 *
 * Output always uses the current shape: keys sorted at every level, two
 * space indentation, trailing newline.
 */
import { z } from 'zod'
import dayjs from 'dayjs'
import utc from 'dayjs/plugin/utc.js'
import { attemptSync } from '@logosdx/utils'

import { RecordParseError } from '../errors.js'
import { SemVersion } from '../version/index.js'
import { parseChangesetRecord, sortChangesets, toChangesetRecord } from '../changeset/index.js'
import type { Release } from './types.js'


dayjs.extend(utc)


// ─────────────────────────────────────────────────────────────
// Schemas
// ─────────────────────────────────────────────────────────────

const CurrentRecordSchema = z
    .object({
        version: z.string(),
        created_at: z.string().nullish(),
        changes: z.array(z.unknown()),
    })
    .transform((record) => ({
        format: 'current' as const,
        version: record.version,
        createdAt: record.created_at ?? null,
        changes: record.changes,
    }))

const LegacyRecordSchema = z
    .array(z.unknown())
    .transform((changes) => ({
        format: 'legacy' as const,
        changes,
    }))

export const ReleaseRecordSchema = z.union([CurrentRecordSchema, LegacyRecordSchema])

export type ReleaseRecord = z.infer<typeof ReleaseRecordSchema>


// ─────────────────────────────────────────────────────────────
// Decoding
// ─────────────────────────────────────────────────────────────

function parseCreatedAt(value: string | null, filepath: string): Date | null {

    if (value === null) {

        return null
    }

    // Naive timestamps are UTC
    const parsed = dayjs.utc(value)

    if (!parsed.isValid()) {

        throw new RecordParseError(filepath, `created_at: invalid date '${value}'`)
    }

    return parsed.toDate()
}


function canonicalVersion(value: string, filepath: string): string {

    const [version, err] = attemptSync(() => SemVersion.parse(value))

    if (err) {

        throw new RecordParseError(filepath, err.message, { cause: err })
    }

    return version.toString()
}


/**
 * Decode a release record.
 *
 * @param data - Decoded JSON
 * @param identifier - File name without `.json`; the version of legacy records
 * @param filepath - Source file, for error messages
 * @throws RecordParseError if the data matches neither shape
 */
export function releaseFromRecord(data: unknown, identifier: string, filepath: string): Release {

    const result = ReleaseRecordSchema.safeParse(data)

    if (!result.success) {

        throw new RecordParseError(filepath, 'not a release record')
    }

    const record = result.data
    const changes = sortChangesets(
        record.changes.map((change) => parseChangesetRecord(change, filepath)),
    )

    if (record.format === 'legacy') {

        return {
            version: canonicalVersion(identifier, filepath),
            changes,
            createdAt: null,
        }
    }

    return {
        version: canonicalVersion(record.version, filepath),
        changes,
        createdAt: parseCreatedAt(record.createdAt, filepath),
    }
}


// ─────────────────────────────────────────────────────────────
// Encoding
// ─────────────────────────────────────────────────────────────

function sortKeysDeep(value: unknown): unknown {

    if (Array.isArray(value)) {

        return value.map(sortKeysDeep)
    }

    if (value !== null && typeof value === 'object') {

        const sorted: Record<string, unknown> = {}

        for (const key of Object.keys(value).sort()) {

            sorted[key] = sortKeysDeep(Reflect.get(value, key))
        }

        return sorted
    }

    return value
}


/**
 * Plain object form of a release, in the current shape.
 */
export function releaseToRecord(release: Release): Record<string, unknown> {

    return {
        version: release.version,
        created_at: release.createdAt ? dayjs.utc(release.createdAt).toISOString() : null,
        changes: sortChangesets(release.changes).map(toChangesetRecord),
    }
}


/**
 * Serialize a release file.
 *
 * @example
 * ```typescript
 * serializeRelease({ version: '1.0.0', changes: [], createdAt: null })
 * // '{\n  "changes": [],\n  "created_at": null,\n  "version": "1.0.0"\n}\n'
 * ```
 */
export function serializeRelease(release: Release): string {

    return JSON.stringify(sortKeysDeep(releaseToRecord(release)), null, 2) + '\n'
}
