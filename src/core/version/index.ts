/**
 * Version module.
 *
 * Semantic version values, ordering, and the bump state machine that
 * turns a batch of pending changes into the next version.
 *
 * @example
 * ```typescript
 * import { SemVersion, computeNextVersion } from './version'
 *
 * const result = computeNextVersion(SemVersion.parse('1.0.0'), [{ type: 'minor' }])
 * // { status: 'pending', version: 1.1.0, releaseType: 'minor', channel: null }
 * ```
 */

export type {
    ReleaseType,
    PrereleaseChannel,
    PrereleaseTag,
    VersionParts,
} from './types.js'

export {
    RELEASE_TYPES,
    RELEASE_TYPE_SEVERITY,
    PRERELEASE_CHANNELS,
    CHANNEL_RANK,
    CHANNEL_ALIASES,
    INITIAL_VERSION,
    InvalidVersionError,
} from './types.js'

export { SemVersion, compareVersionsDesc } from './semver.js'

export { bumpTriple, bumpStable, bumpPrerelease, bumpVersion } from './bump.js'

export type { VersionIntent, NextVersionResult } from './next.js'

export {
    MixedChangesetsError,
    resolveReleaseType,
    resolveChannel,
    computeNextVersion,
} from './next.js'
