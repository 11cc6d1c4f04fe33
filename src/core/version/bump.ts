/**
 * Version bump rules.
 *
 * Stable bumps follow the usual major/minor/patch arithmetic, except that
 * a prerelease is first promoted to its own stable release when that
 * already satisfies the requested severity (`2.0.0-rc.1` + minor → `2.0.0`).
 *
 * Prerelease bumps keep counting on the current channel, restart at 1 on
 * a channel switch, and never produce a version at or below the current one.
 *
 * @example
 * ```typescript
 * const v = SemVersion.parse('1.0.0')
 *
 * bumpVersion(v, 'minor').toString()           // '1.1.0'
 * bumpVersion(v, 'minor', 'alpha').toString()  // '1.1.0-alpha.1'
 * ```
 */
import { SemVersion } from './semver.js'
import type { PrereleaseChannel, ReleaseType } from './types.js'


/**
 * Plain major/minor/patch arithmetic on the version's triple.
 *
 * Any prerelease tag is ignored: `1.2.3-rc.1` + patch → `1.2.4`.
 */
export function bumpTriple(version: SemVersion, releaseType: ReleaseType): SemVersion {

    const { major, minor, patch } = version

    switch (releaseType) {

    case 'major':
        return SemVersion.from({ major: major + 1, minor: 0, patch: 0, pre: null })
    case 'minor':
        return SemVersion.from({ major, minor: minor + 1, patch: 0, pre: null })
    case 'patch':
        return SemVersion.from({ major, minor, patch: patch + 1, pre: null })

    }
}


/**
 * Bump to the next stable version.
 *
 * A prerelease is promoted to its stable triple when the triple already
 * covers the requested severity. `major` needs `X.0.0`, `minor` needs
 * `X.Y.0`, `patch` is always covered. Otherwise the triple is bumped as if
 * it were stable, so `2.1.1-alpha.1` + minor → `2.2.0`.
 */
export function bumpStable(version: SemVersion, releaseType: ReleaseType): SemVersion {

    if (version.isStable) {

        return bumpTriple(version, releaseType)
    }

    const covered =
        releaseType === 'patch'
        || (releaseType === 'minor' && version.patch === 0)
        || (releaseType === 'major' && version.minor === 0 && version.patch === 0)

    return covered ? version.stable() : bumpTriple(version, releaseType)
}


/**
 * Bump to the next prerelease on `channel`.
 *
 * - From a stable version: the stable bump target at counter 1.
 * - Same channel: same triple, counter + 1 (a counter of 0 counts as 1).
 * - Other channel: counter 1, on the stable bump target when that target
 *   is past the current triple, otherwise on the current triple.
 *
 * If the candidate does not sort above the current version (moving from
 * `rc` back to `alpha`, say) the triple is bumped with plain arithmetic.
 */
export function bumpPrerelease(
    version: SemVersion,
    releaseType: ReleaseType,
    channel: PrereleaseChannel,
): SemVersion {

    const target = bumpStable(version, releaseType)

    let candidate: SemVersion

    if (!version.pre) {

        candidate = target.withPrerelease(channel, 1)
    }
    else if (version.pre.channel === channel) {

        candidate = version.withPrerelease(channel, Math.max(1, version.pre.counter) + 1)
    }
    else if (target.compareTriple(version) > 0) {

        candidate = target.withPrerelease(channel, 1)
    }
    else {

        candidate = version.withPrerelease(channel, 1)
    }

    if (!candidate.greaterThan(version)) {

        candidate = bumpTriple(version, releaseType).withPrerelease(channel, 1)
    }

    return candidate
}


/**
 * Compute the next version for a release type and optional channel.
 */
export function bumpVersion(
    version: SemVersion,
    releaseType: ReleaseType,
    channel?: PrereleaseChannel | null,
): SemVersion {

    if (channel) {

        return bumpPrerelease(version, releaseType, channel)
    }

    return bumpStable(version, releaseType)
}
