/**
 * Release history.
 *
 * Every `<version>.json` file in the records directory is one release.
 * Versions are read from file names, so finding the current version never
 * opens a file. Records are created exclusively and never modified.
 */
import path from 'node:path'
import { mkdir, readFile } from 'node:fs/promises'

import { attemptSync } from '@logosdx/utils'

import { observer } from '../observer.js'
import { RecordParseError } from '../errors.js'
import type { Layout } from '../layout.js'
import { linkExclusive, listRecordFiles, withStagedFile } from '../shared/index.js'
import { SemVersion } from '../version/index.js'
import { releaseFromRecord, serializeRelease } from './mapper.js'
import type { Release } from './types.js'
import { ReleaseExistsError } from './types.js'


const RECORD_EXTENSION = '.json'


export class ReleaseHistory {

    #layout: Layout

    constructor(layout: Layout) {

        this.#layout = layout
    }

    /**
     * Absolute path of the records directory.
     */
    get directory(): string {

        return this.#layout.recordsDir
    }

    /**
     * Released versions as written in their file names, newest first.
     *
     * @throws RecordParseError if a file name is not a version
     */
    async listVersions(): Promise<string[]> {

        const dir = this.directory
        const names = await listRecordFiles(dir, RECORD_EXTENSION)

        const entries = names.map((name) => {

            const identifier = name.slice(0, -RECORD_EXTENSION.length)
            const [version, err] = attemptSync(() => SemVersion.parse(identifier))

            if (err) {

                throw new RecordParseError(path.join(dir, name), err.message, { cause: err })
            }

            return { identifier, version }
        })

        return entries
            .sort((a, b) => b.version.compare(a.version))
            .map((entry) => entry.identifier)
    }

    /**
     * Most recent released version, or null before the first release.
     */
    async lastVersion(): Promise<string | null> {

        const [latest] = await this.listVersions()

        return latest ?? null
    }

    /**
     * Every release, newest first.
     *
     * @throws RecordParseError if a record cannot be decoded
     */
    async list(): Promise<Release[]> {

        const releases: Release[] = []

        for (const identifier of await this.listVersions()) {

            const filepath = path.join(this.directory, identifier + RECORD_EXTENSION)
            const content = await readFile(filepath, 'utf-8')
            const [data, parseErr] = attemptSync((): unknown => JSON.parse(content))

            if (parseErr) {

                throw new RecordParseError(filepath, parseErr.message, { cause: parseErr })
            }

            releases.push(releaseFromRecord(data, identifier, filepath))
        }

        return releases
    }

    /**
     * Write the record for a new release.
     *
     * @returns Absolute path of the record
     * @throws ReleaseExistsError if the version was already released
     */
    async create(release: Release): Promise<string> {

        const dir = this.directory
        const target = path.join(dir, release.version + RECORD_EXTENSION)

        await mkdir(dir, { recursive: true })

        const created = await withStagedFile(
            dir,
            serializeRelease(release),
            (stagedPath) => linkExclusive(stagedPath, target),
        )

        if (!created) {

            throw new ReleaseExistsError(release.version, target)
        }

        observer.emit('release:created', { version: release.version, path: target })

        return target
    }
}
