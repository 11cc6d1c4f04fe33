/**
 * Next-version resolution over a batch of changes.
 */
import { describe, it, expect } from 'vitest'

import {
    MixedChangesetsError,
    computeNextVersion,
    resolveChannel,
    resolveReleaseType,
} from '../../../src/core/version/next.js'
import { SemVersion } from '../../../src/core/version/semver.js'


describe('version: next', () => {

    it('should pick the most severe release type', () => {

        expect(resolveReleaseType(['patch', 'minor', 'patch'])).toBe('minor')
        expect(resolveReleaseType(['patch', 'major', 'minor'])).toBe('major')
        expect(resolveReleaseType(['patch'])).toBe('patch')
    })

    it('should pick the most advanced channel', () => {

        expect(resolveChannel(['alpha', 'rc', 'beta'])).toBe('rc')
        expect(resolveChannel([])).toBeNull()
    })

    it('should report no changes for an empty batch', () => {

        expect(computeNextVersion(SemVersion.parse('1.0.0'), [])).toEqual({ status: 'no-changes' })
    })

    it('should resolve a stable batch', () => {

        const result = computeNextVersion(SemVersion.parse('1.0.0'), [
            { type: 'patch' },
            { type: 'minor' },
        ])

        expect(result.status).toBe('pending')

        if (result.status === 'pending') {

            expect(result.version.toString()).toBe('1.1.0')
            expect(result.releaseType).toBe('minor')
            expect(result.channel).toBeNull()
        }
    })

    it('should resolve a prerelease batch on the highest channel', () => {

        const result = computeNextVersion(SemVersion.parse('1.0.0'), [
            { type: 'patch', pre: 'alpha' },
            { type: 'minor', pre: 'beta' },
        ])

        expect(result.status === 'pending' && result.version.toString()).toBe('1.1.0-beta.1')
    })

    it('should promote a prerelease with stable changes', () => {

        const result = computeNextVersion(SemVersion.parse('2.0.0-rc.2'), [{ type: 'patch' }])

        expect(result.status === 'pending' && result.version.toString()).toBe('2.0.0')
    })

    it('should refuse to mix stable and prerelease changes', () => {

        const mixed = () => computeNextVersion(SemVersion.parse('1.0.0'), [
            { type: 'minor' },
            { type: 'patch', pre: 'alpha' },
            { type: 'patch' },
        ])

        expect(mixed).toThrow(MixedChangesetsError)
        expect(mixed).toThrow(
            'Cannot mix stable and prerelease changes in one release (2 stable, 1 prerelease)',
        )
    })
})
