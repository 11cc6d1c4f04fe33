/**
 * Release coordination across the store and the history.
 */
import { mkdir, readdir, writeFile } from 'node:fs/promises'
import { join } from 'node:path'

import { describe, it, expect, beforeEach } from 'vitest'

import { ChangesetStore } from '../../../src/core/changeset/store.js'
import { MissingChangesetError } from '../../../src/core/changeset/types.js'
import { resolveLayout } from '../../../src/core/layout.js'
import { observer } from '../../../src/core/observer.js'
import { ReleaseCoordinator } from '../../../src/core/release/coordinator.js'
import { ReleaseHistory } from '../../../src/core/release/history.js'
import { MixedChangesetsError } from '../../../src/core/version/next.js'
import { makeTestDir } from '../../utils/fs.js'


function setup(root: string) {

    const layout = resolveLayout(root)
    const store = new ChangesetStore(layout)
    const history = new ReleaseHistory(layout)

    return { store, history, coordinator: new ReleaseCoordinator(store, history) }
}


describe('release: coordinator', () => {

    let root: string

    beforeEach(async () => {

        root = await makeTestDir()
    })

    describe('before the first release', () => {

        it('should start from 0.0.0', async () => {

            const { coordinator } = setup(root)

            expect((await coordinator.currentVersion()).toString()).toBe('0.0.0')
            expect(await coordinator.check()).toBe(false)
            expect(await coordinator.status()).toEqual({
                version: '0.0.0',
                nextVersion: null,
                unreleasedChanges: [],
            })
        })

        it('should refuse to release nothing', async () => {

            const { coordinator } = setup(root)

            await expect(coordinator.release()).rejects.toBeInstanceOf(MissingChangesetError)
            await expect(readdir(root)).resolves.toEqual([])
        })
    })

    describe('release', () => {

        it('should record the release and clear the pending area', async () => {

            const { store, history, coordinator } = setup(root)

            await store.create({ type: 'minor', description: 'Add thing' })
            await store.create({ type: 'patch', description: 'Fix thing' })

            expect(await coordinator.check()).toBe(true)
            expect((await coordinator.status()).nextVersion).toBe('0.1.0')

            const events: { event: string; data: unknown }[] = []
            const cleanup = observer.on(/^release:/, ({ event, data }) => {

                events.push({ event: String(event), data })
            })

            const release = await coordinator.release()

            cleanup()

            expect(release.version).toBe('0.1.0')
            expect(release.changes).toEqual([
                { type: 'minor', description: 'Add thing' },
                { type: 'patch', description: 'Fix thing' },
            ])
            expect(release.createdAt).toBeInstanceOf(Date)

            expect(events.map((e) => e.event)).toEqual(['release:start', 'release:created', 'release:complete'])
            expect(events[0]?.data).toEqual({ from: '0.0.0', to: '0.1.0', changes: 2 })

            expect(await store.list()).toEqual([])
            expect(await history.listVersions()).toEqual(['0.1.0'])
            expect((await coordinator.currentVersion()).toString()).toBe('0.1.0')
        })

        it('should walk a prerelease line through to stable', async () => {

            const { store, coordinator } = setup(root)

            await store.create({ type: 'major', description: 'Rewrite', pre: 'alpha' })
            expect((await coordinator.release()).version).toBe('1.0.0-alpha.1')

            await store.create({ type: 'patch', description: 'Fix', pre: 'alpha' })
            expect((await coordinator.release()).version).toBe('1.0.0-alpha.2')

            await store.create({ type: 'patch', description: 'Freeze', pre: 'rc' })
            expect((await coordinator.release()).version).toBe('1.0.0-rc.1')

            await store.create({ type: 'patch', description: 'Ship' })
            expect((await coordinator.release()).version).toBe('1.0.0')
        })

        it('should refuse a mixed batch and keep it pending', async () => {

            const { store, coordinator } = setup(root)

            await store.create({ type: 'minor', description: 'Stable' })
            await store.create({ type: 'patch', description: 'Pre', pre: 'beta' })

            await expect(coordinator.release()).rejects.toBeInstanceOf(MixedChangesetsError)
            await expect(coordinator.nextVersion()).rejects.toBeInstanceOf(MixedChangesetsError)
            expect(await store.list()).toHaveLength(2)
        })

        it('should continue a legacy history in place', async () => {

            const legacyDir = join(root, '.changes')

            await mkdir(join(legacyDir, 'next-release'), { recursive: true })
            await writeFile(join(legacyDir, '0.1.0.json'), '[{"description": "Initial version", "type": "minor"}]')
            await writeFile(
                join(legacyDir, 'next-release', 'patch-20240115103000123456.json'),
                '{"type": "patch", "description": "Fix"}',
            )

            const { history, coordinator } = setup(root)
            const release = await coordinator.release()

            expect(release.version).toBe('0.1.1')
            expect(await history.listVersions()).toEqual(['0.1.1', '0.1.0'])
            expect((await readdir(legacyDir)).sort()).toEqual(['0.1.0.json', '0.1.1.json'])
        })
    })

    describe('nextVersion', () => {

        it('should use the changes and version it is given', async () => {

            const { coordinator } = setup(root)
            const current = await coordinator.currentVersion()
            const result = await coordinator.nextVersion([{ type: 'major', description: 'x' }], current)

            expect(result.status === 'pending' && result.version.toString()).toBe('1.0.0')
        })
    })
})
