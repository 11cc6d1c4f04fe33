/**
 * Changeset validation, decoding and ordering.
 */
import { describe, it, expect } from 'vitest'

import {
    parseChangesetRecord,
    PrereleaseChannelSchema,
    ReleaseTypeSchema,
    serializeChangeset,
    sortChangesets,
    validateChangeset,
} from '../../../src/core/changeset/schema.js'
import { InvalidChangesetError } from '../../../src/core/changeset/types.js'
import { RecordParseError } from '../../../src/core/errors.js'
import { PRERELEASE_CHANNELS, RELEASE_TYPES } from '../../../src/core/version/types.js'


describe('changeset: schema', () => {

    describe('enums', () => {

        it('should accept exactly the release types, most severe first', () => {

            expect(ReleaseTypeSchema.options).toEqual(['major', 'minor', 'patch'])
            expect(ReleaseTypeSchema.options).toEqual([...RELEASE_TYPES])
        })

        it('should accept exactly the prerelease channels, least advanced first', () => {

            expect(PrereleaseChannelSchema.options).toEqual(['alpha', 'beta', 'rc'])
            expect(PrereleaseChannelSchema.options).toEqual([...PRERELEASE_CHANNELS])
            expect(PrereleaseChannelSchema.safeParse('gamma').success).toBe(false)
        })
    })

    describe('validateChangeset', () => {

        it('should accept a minimal changeset', () => {

            expect(validateChangeset({ type: 'minor', description: 'Add thing' }))
                .toEqual({ type: 'minor', description: 'Add thing' })
        })

        it('should keep channel and attributes', () => {

            const changeset = validateChangeset({
                type: 'patch',
                description: 'Fix thing',
                pre: 'beta',
                attributes: { issue: 'GH-1' },
            })

            expect(changeset).toEqual({
                type: 'patch',
                description: 'Fix thing',
                pre: 'beta',
                attributes: { issue: 'GH-1' },
            })
        })

        it('should drop empty attributes', () => {

            expect(validateChangeset({ type: 'patch', description: 'x', attributes: {} }))
                .toEqual({ type: 'patch', description: 'x' })
        })

        it('should reject a blank description', () => {

            expect(() => validateChangeset({ type: 'minor', description: '   ' }))
                .toThrow('Invalid changeset description: Description is required')
        })

        it('should reject an unknown type', () => {

            let caught: unknown

            try {

                validateChangeset({ type: 'huge', description: 'x' })
            }
            catch (error) {

                caught = error
            }

            expect(caught).toBeInstanceOf(InvalidChangesetError)
            expect(caught instanceof InvalidChangesetError && caught.field).toBe('type')
            expect(caught instanceof InvalidChangesetError && caught.kind).toBe('user-input')
        })

        it('should reject an unknown channel', () => {

            expect(() => validateChangeset({ type: 'minor', description: 'x', pre: 'gamma' }))
                .toThrow(/^Invalid changeset pre:/)
        })
    })

    describe('parseChangesetRecord', () => {

        it('should read null channel and attributes as absent', () => {

            const record = { type: 'patch', description: 'x', attributes: null, pre: null }

            expect(parseChangesetRecord(record, '/tmp/a.json')).toEqual({ type: 'patch', description: 'x' })
        })

        it('should drop unknown keys', () => {

            const record = { type: 'patch', description: 'x', author: 'someone' }

            expect(parseChangesetRecord(record, '/tmp/a.json')).toEqual({ type: 'patch', description: 'x' })
        })

        it('should name the file and field on a bad shape', () => {

            const parse = () => parseChangesetRecord({ type: 'minor' }, '/tmp/a.json')

            expect(parse).toThrow(RecordParseError)
            expect(parse).toThrow("Cannot read record '/tmp/a.json': description: Required")
        })
    })

    describe('serializeChangeset', () => {

        it('should write two-space JSON with a trailing newline', () => {

            const text = serializeChangeset({ type: 'minor', description: 'Add thing', pre: 'rc' })

            expect(text).toBe('{\n  "type": "minor",\n  "description": "Add thing",\n  "pre": "rc"\n}\n')
        })
    })

    describe('sortChangesets', () => {

        it('should order by type then description', () => {

            const sorted = sortChangesets([
                { type: 'patch', description: 'b' },
                { type: 'minor', description: 'z' },
                { type: 'patch', description: 'a' },
                { type: 'major', description: 'm' },
            ])

            expect(sorted.map((c) => `${c.type}:${c.description}`))
                .toEqual(['major:m', 'minor:z', 'patch:a', 'patch:b'])
        })
    })
})
