/**
 * Next-version resolution for a batch of pending changes.
 *
 * Picks the most severe release type and the most advanced prerelease
 * channel in the batch, then applies the bump rules. An empty batch is a
 * normal outcome (`no-changes`), not an error: status displays branch on
 * it, while releasing turns it into a `MissingChangesetError`.
 */
import { UserInputError } from '../errors.js'
import { bumpVersion } from './bump.js'
import { SemVersion } from './semver.js'
import type { PrereleaseChannel, ReleaseType } from './types.js'
import { CHANNEL_RANK, RELEASE_TYPE_SEVERITY } from './types.js'


/**
 * The parts of a change the version engine cares about.
 */
export interface VersionIntent {
    type: ReleaseType;
    pre?: PrereleaseChannel;
}

/**
 * Outcome of next-version resolution.
 */
export type NextVersionResult =
    | { status: 'no-changes' }
    | {
        status: 'pending';
        version: SemVersion;
        releaseType: ReleaseType;
        channel: PrereleaseChannel | null;
    }


/**
 * Error when a batch mixes stable and prerelease changes.
 */
export class MixedChangesetsError extends UserInputError {

    override readonly name = 'MixedChangesetsError' as const

    constructor(
        public readonly stableCount: number,
        public readonly prereleaseCount: number,
    ) {

        super(
            `Cannot mix stable and prerelease changes in one release `
            + `(${stableCount} stable, ${prereleaseCount} prerelease)`
        )
    }
}


/**
 * Most severe release type in a non-empty list.
 */
export function resolveReleaseType(types: readonly ReleaseType[]): ReleaseType {

    return types.reduce<ReleaseType>(
        (best, type) => RELEASE_TYPE_SEVERITY[type] > RELEASE_TYPE_SEVERITY[best] ? type : best,
        'patch',
    )
}


/**
 * Most advanced channel in a list, or null for an empty list.
 */
export function resolveChannel(channels: readonly PrereleaseChannel[]): PrereleaseChannel | null {

    let best: PrereleaseChannel | null = null

    for (const channel of channels) {

        if (!best || CHANNEL_RANK[channel] > CHANNEL_RANK[best]) {

            best = channel
        }
    }

    return best
}


/**
 * Resolve the version that releasing `changes` on top of `current` yields.
 *
 * @throws MixedChangesetsError if stable and prerelease changes are mixed
 *
 * @example
 * ```typescript
 * const result = computeNextVersion(SemVersion.parse('1.0.0'), [
 *     { type: 'patch', pre: 'alpha' },
 *     { type: 'minor', pre: 'beta' },
 * ])
 *
 * if (result.status === 'pending') {
 *     result.version.toString()  // '1.1.0-beta.1'
 * }
 * ```
 */
export function computeNextVersion(
    current: SemVersion,
    changes: readonly VersionIntent[],
): NextVersionResult {

    if (changes.length === 0) {

        return { status: 'no-changes' }
    }

    const channels: PrereleaseChannel[] = []

    for (const change of changes) {

        if (change.pre) {

            channels.push(change.pre)
        }
    }

    if (channels.length > 0 && channels.length < changes.length) {

        throw new MixedChangesetsError(changes.length - channels.length, channels.length)
    }

    const releaseType = resolveReleaseType(changes.map((c) => c.type))
    const channel = resolveChannel(channels)

    return {
        status: 'pending',
        version: bumpVersion(current, releaseType, channel),
        releaseType,
        channel,
    }
}
