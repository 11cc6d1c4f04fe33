/**
 * Release coordinator.
 *
 * Ties the changeset store, the version engine and the release history
 * together: work out where the project is, what is pending, and turn the
 * pending batch into a release.
 *
 * Releasing is not concurrency-safe. Run one release at a time per
 * project; concurrent `create()` calls on the store are fine.
 *
 * @example
 * ```typescript
 * const layout = resolveLayout('/project')
 * const coordinator = new ReleaseCoordinator(
 *     new ChangesetStore(layout),
 *     new ReleaseHistory(layout),
 * )
 *
 * const release = await coordinator.release()
 * // { version: '1.1.0', changes: [...], createdAt: Date }
 * ```
 */
import { observer } from '../observer.js'
import type { Changeset, ChangesetStore } from '../changeset/index.js'
import { MissingChangesetError } from '../changeset/index.js'
import type { NextVersionResult } from '../version/index.js'
import { INITIAL_VERSION, SemVersion, computeNextVersion } from '../version/index.js'
import type { ReleaseHistory } from './history.js'
import type { Release, ReleaseStatus } from './types.js'


export class ReleaseCoordinator {

    #store: ChangesetStore
    #history: ReleaseHistory

    constructor(store: ChangesetStore, history: ReleaseHistory) {

        this.#store = store
        this.#history = history
    }

    /**
     * Current version, `0.0.0` before the first release.
     */
    async currentVersion(): Promise<SemVersion> {

        const last = await this.#history.lastVersion()

        return SemVersion.parse(last ?? INITIAL_VERSION)
    }

    /**
     * Next version for a batch of changes.
     *
     * Reads whatever is not given from disk.
     *
     * @throws MixedChangesetsError if the batch mixes stable and prerelease changes
     */
    async nextVersion(
        changes?: readonly Changeset[],
        current?: SemVersion,
    ): Promise<NextVersionResult> {

        return computeNextVersion(
            current ?? await this.currentVersion(),
            changes ?? await this.#store.list(),
        )
    }

    /**
     * Cut a release from the pending changes.
     *
     * The record is written before the pending area is cleared, so a crash
     * in between leaves changes that were released but not yet removed,
     * never changes that were lost.
     *
     * @throws MissingChangesetError if nothing is pending
     * @throws ReleaseExistsError if the record is already on disk
     */
    async release(): Promise<Release> {

        const start = performance.now()
        const current = await this.currentVersion()
        const changes = await this.#store.list()
        const next = computeNextVersion(current, changes)

        if (next.status === 'no-changes') {

            throw new MissingChangesetError()
        }

        const from = current.toString()
        const to = next.version.toString()

        observer.emit('release:start', { from, to, changes: changes.length })

        const release: Release = {
            version: to,
            changes,
            createdAt: new Date(),
        }

        await this.#history.create(release)
        await this.#store.clear()

        observer.emit('release:complete', {
            from,
            to,
            durationMs: performance.now() - start,
        })

        return release
    }

    /**
     * Read-only snapshot of the current version and pending changes.
     */
    async status(): Promise<ReleaseStatus> {

        const current = await this.currentVersion()
        const changes = await this.#store.list()
        const next = computeNextVersion(current, changes)

        return {
            version: current.toString(),
            nextVersion: next.status === 'pending' ? next.version.toString() : null,
            unreleasedChanges: changes,
        }
    }

    /**
     * Whether anything is waiting to be released.
     */
    async check(): Promise<boolean> {

        const changes = await this.#store.list()

        return changes.length > 0
    }
}
