/**
 * Version module types.
 *
 * Release types, prerelease channels and the version value shape used by
 * the bump algorithm and the release history.
 */
import { UserInputError } from '../errors.js'


// ─────────────────────────────────────────────────────────────
// Release Types
// ─────────────────────────────────────────────────────────────

/**
 * Severity of a change, most severe first. Drives which part of the
 * version is bumped.
 */
export const RELEASE_TYPES = ['major', 'minor', 'patch'] as const

export type ReleaseType = (typeof RELEASE_TYPES)[number]

/**
 * Severity rank per release type. Higher wins.
 */
export const RELEASE_TYPE_SEVERITY: Record<ReleaseType, number> = {
    major: 3,
    minor: 2,
    patch: 1,
}


// ─────────────────────────────────────────────────────────────
// Prerelease Channels
// ─────────────────────────────────────────────────────────────

/**
 * Named pre-stable tracks, least advanced first.
 */
export const PRERELEASE_CHANNELS = ['alpha', 'beta', 'rc'] as const

export type PrereleaseChannel = (typeof PRERELEASE_CHANNELS)[number]

/**
 * Channel rank. Used both to pick the winning channel among pending
 * changesets and to order prerelease versions.
 */
export const CHANNEL_RANK: Record<PrereleaseChannel, number> = {
    alpha: 1,
    beta: 2,
    rc: 3,
}

/**
 * Short spellings accepted when parsing (`1.2.3a1`, `1.2.3b2`, `1.2.3c1`).
 */
export const CHANNEL_ALIASES: Record<string, PrereleaseChannel> = {
    a: 'alpha',
    alpha: 'alpha',
    b: 'beta',
    beta: 'beta',
    c: 'rc',
    rc: 'rc',
}


// ─────────────────────────────────────────────────────────────
// Version Shape
// ─────────────────────────────────────────────────────────────

/**
 * Prerelease tag of a version: channel plus monotonic counter.
 */
export interface PrereleaseTag {
    channel: PrereleaseChannel;
    counter: number;
}

/**
 * Plain data form of a version.
 *
 * @example
 * ```typescript
 * const parts: VersionParts = {
 *     major: 2,
 *     minor: 0,
 *     patch: 0,
 *     pre: { channel: 'beta', counter: 3 },
 * }
 * ```
 */
export interface VersionParts {
    major: number;
    minor: number;
    patch: number;
    pre: PrereleaseTag | null;
}

/**
 * Version every history starts from.
 */
export const INITIAL_VERSION = '0.0.0'


// ─────────────────────────────────────────────────────────────
// Error Types
// ─────────────────────────────────────────────────────────────

/**
 * Error when a string is not a version semkeep understands.
 */
export class InvalidVersionError extends UserInputError {

    override readonly name = 'InvalidVersionError' as const

    constructor(public readonly input: string) {

        super(`Invalid version: '${input}'`)
    }
}
