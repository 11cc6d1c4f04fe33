/**
 * Semantic version value type.
 *
 * Parses, orders and renders `X.Y.Z` and `X.Y.Z-channel.N` versions.
 * Instances are immutable; every transformation returns a new value.
 *
 * Rendering is always canonical (`1.1.0-alpha.1`). Parsing also takes the
 * compact spellings older release files may carry (`1.1.0alpha1`,
 * `1.1.0-rc1`, `1.1.0.b2`, `1.1.0a`).
 *
 * @example
 * ```typescript
 * const v = SemVersion.parse('2.0.0-beta.2')
 *
 * v.isPrerelease               // true
 * v.stable().toString()        // '2.0.0'
 * v.compare(SemVersion.parse('2.0.0'))  // -1
 * ```
 */
import type { PrereleaseChannel, PrereleaseTag, VersionParts } from './types.js'
import { CHANNEL_ALIASES, CHANNEL_RANK, InvalidVersionError } from './types.js'


/**
 * `X.Y.Z`, then an optional channel (with optional `-` or `.` before it)
 * and an optional counter (with optional `.` before it).
 */
const VERSION_REGEX = /^(\d+)\.(\d+)\.(\d+)(?:[-.]?(alpha|beta|rc|a|b|c)(?:\.?(\d+))?)?$/i


export class SemVersion implements VersionParts {

    readonly major: number
    readonly minor: number
    readonly patch: number
    readonly pre: PrereleaseTag | null

    private constructor(parts: VersionParts) {

        this.major = parts.major
        this.minor = parts.minor
        this.patch = parts.patch
        this.pre = parts.pre ? { ...parts.pre } : null

        Object.freeze(this.pre)
        Object.freeze(this)
    }

    // ─────────────────────────────────────────────────────────────
    // Construction
    // ─────────────────────────────────────────────────────────────

    /**
     * Parse a version string.
     *
     * @throws InvalidVersionError if the string is not a version
     */
    static parse(input: string): SemVersion {

        const match = VERSION_REGEX.exec(input.trim())

        if (!match) {

            throw new InvalidVersionError(input)
        }

        const [, major, minor, patch, channel, counter] = match

        let pre: PrereleaseTag | null = null

        if (channel) {

            const resolved = CHANNEL_ALIASES[channel.toLowerCase()]

            if (!resolved) {

                throw new InvalidVersionError(input)
            }

            pre = {
                channel: resolved,
                counter: counter ? Number(counter) : 0,
            }
        }

        return new SemVersion({
            major: Number(major),
            minor: Number(minor),
            patch: Number(patch),
            pre,
        })
    }

    /**
     * Parse a version string, returning null instead of throwing.
     */
    static tryParse(input: string): SemVersion | null {

        return VERSION_REGEX.test(input.trim()) ? SemVersion.parse(input) : null
    }

    /**
     * Build a version from its parts.
     *
     * @throws InvalidVersionError if any number is negative or fractional
     */
    static from(parts: VersionParts): SemVersion {

        const numbers = [parts.major, parts.minor, parts.patch]

        if (parts.pre) {

            numbers.push(parts.pre.counter)
        }

        if (numbers.some((n) => !Number.isSafeInteger(n) || n < 0)) {

            throw new InvalidVersionError(renderParts(parts))
        }

        return new SemVersion(parts)
    }

    // ─────────────────────────────────────────────────────────────
    // Inspection
    // ─────────────────────────────────────────────────────────────

    get isPrerelease(): boolean {

        return this.pre !== null
    }

    get isStable(): boolean {

        return this.pre === null
    }

    get channel(): PrereleaseChannel | null {

        return this.pre?.channel ?? null
    }

    /**
     * The stable release this version belongs to (`2.1.0-rc.3` → `2.1.0`).
     */
    stable(): SemVersion {

        return new SemVersion({ ...this.triple(), pre: null })
    }

    /**
     * This version's triple on the given channel and counter.
     */
    withPrerelease(channel: PrereleaseChannel, counter: number): SemVersion {

        return SemVersion.from({ ...this.triple(), pre: { channel, counter } })
    }

    // ─────────────────────────────────────────────────────────────
    // Ordering
    // ─────────────────────────────────────────────────────────────

    /**
     * Compare with another version.
     *
     * Triples compare numerically. A stable version sorts above every
     * prerelease of the same triple. Prereleases compare by channel rank,
     * then counter.
     *
     * @returns negative, zero or positive
     */
    compare(other: SemVersion): number {

        const byTriple = this.compareTriple(other)

        if (byTriple !== 0) {

            return byTriple
        }

        if (!this.pre || !other.pre) {

            // Stable outranks prerelease; two stables are equal here
            return (this.pre ? -1 : 0) + (other.pre ? 1 : 0)
        }

        const byChannel = CHANNEL_RANK[this.pre.channel] - CHANNEL_RANK[other.pre.channel]

        if (byChannel !== 0) {

            return Math.sign(byChannel)
        }

        return Math.sign(this.pre.counter - other.pre.counter)
    }

    /**
     * Compare only `major.minor.patch`, ignoring prerelease tags.
     */
    compareTriple(other: SemVersion): number {

        return Math.sign(this.major - other.major)
            || Math.sign(this.minor - other.minor)
            || Math.sign(this.patch - other.patch)
    }

    equals(other: SemVersion): boolean {

        return this.compare(other) === 0
    }

    greaterThan(other: SemVersion): boolean {

        return this.compare(other) > 0
    }

    lessThan(other: SemVersion): boolean {

        return this.compare(other) < 0
    }

    // ─────────────────────────────────────────────────────────────
    // Rendering
    // ─────────────────────────────────────────────────────────────

    toString(): string {

        return renderParts(this)
    }

    toJSON(): string {

        return this.toString()
    }

    private triple(): Omit<VersionParts, 'pre'> {

        return { major: this.major, minor: this.minor, patch: this.patch }
    }
}


/**
 * Render version parts in canonical form.
 */
function renderParts(parts: VersionParts): string {

    const base = `${parts.major}.${parts.minor}.${parts.patch}`

    if (!parts.pre) {

        return base
    }

    return `${base}-${parts.pre.channel}.${parts.pre.counter}`
}


/**
 * Comparator for sorting version strings in descending order.
 *
 * @throws InvalidVersionError if either string is not a version
 *
 * @example
 * ```typescript
 * ['1.0.0', '2.0.0-rc.1', '1.10.0'].sort(compareVersionsDesc)
 * // ['2.0.0-rc.1', '1.10.0', '1.0.0']
 * ```
 */
export function compareVersionsDesc(a: string, b: string): number {

    return SemVersion.parse(b).compare(SemVersion.parse(a))
}
