/**
 * Changeset store.
 *
 * Manages the pending area: one JSON file per changeset, named
 * `{type}-{yyyyMMddHHmmssffffff}.json` from the UTC clock.
 *
 * Creation is safe under concurrent writers, in this process or others on
 * the same host. Each record is staged in full, then hard-linked to its
 * final name; a taken name means a fresh timestamp and another try. No
 * record is ever overwritten or seen half-written.
 *
 * Listing and clearing assume nobody releases at the same time.
 *
 * @example
 * ```typescript
 * const store = new ChangesetStore(resolveLayout('/project'))
 *
 * await store.create({ type: 'minor', description: 'Add status command' })
 * const pending = await store.list()
 * await store.clear()
 * ```
 */
import path from 'node:path'
import { mkdir, readFile, readdir, rm, rmdir } from 'node:fs/promises'

import dayjs from 'dayjs'
import utc from 'dayjs/plugin/utc.js'
import { attempt, attemptSync } from '@logosdx/utils'

import { observer } from '../observer.js'
import { RecordParseError, hasErrorCode } from '../errors.js'
import type { Layout } from '../layout.js'
import { linkExclusive, listRecordFiles, withStagedFile } from '../shared/index.js'
import type { Changeset } from './types.js'
import {
    parseChangesetRecord,
    serializeChangeset,
    sortChangesets,
    validateChangeset,
} from './schema.js'


dayjs.extend(utc)


/**
 * UTC timestamp with microsecond digits: `20240115103000123456`.
 *
 * Milliseconds come from the wall clock, the last three digits from the
 * monotonic clock, so two calls in the same millisecond rarely collide.
 */
export function changesetTimestamp(): string {

    const micros = (process.hrtime.bigint() / 1000n) % 1000n

    return dayjs.utc().format('YYYYMMDDHHmmssSSS') + micros.toString().padStart(3, '0')
}


export class ChangesetStore {

    #layout: Layout

    constructor(layout: Layout) {

        this.#layout = layout
    }

    /**
     * Absolute path of the pending area.
     */
    get directory(): string {

        return this.#layout.pendingDir
    }

    /**
     * Whether the deprecated `.changes` directory is in use.
     */
    isUsingLegacyLayout(): boolean {

        return this.#layout.legacy
    }

    /**
     * Record a new changeset.
     *
     * @returns Absolute path of the created file
     * @throws InvalidChangesetError if the changeset is not valid
     */
    async create(changeset: Changeset): Promise<string> {

        const record = validateChangeset(changeset)
        const dir = this.directory

        await mkdir(dir, { recursive: true })

        return withStagedFile(dir, serializeChangeset(record), async (stagedPath) => {

            for (let tries = 1; ; tries++) {

                const filename = `${record.type}-${changesetTimestamp()}.json`
                const target = path.join(dir, filename)

                if (await linkExclusive(stagedPath, target)) {

                    observer.emit('changeset:created', {
                        path: target,
                        type: record.type,
                        ...(record.pre ? { pre: record.pre } : {}),
                    })

                    return target
                }

                observer.emit('changeset:collision', { filename, attempt: tries })
            }
        })
    }

    /**
     * Read every pending changeset, sorted by type then description.
     *
     * @returns [] if the pending area does not exist
     * @throws RecordParseError if a file is not a valid changeset
     */
    async list(): Promise<Changeset[]> {

        const dir = this.directory
        const names = await listRecordFiles(dir)
        const changes: Changeset[] = []

        for (const name of names) {

            const filepath = path.join(dir, name)
            const content = await readFile(filepath, 'utf-8')
            const [data, parseErr] = attemptSync((): unknown => JSON.parse(content))

            if (parseErr) {

                throw new RecordParseError(filepath, parseErr.message, { cause: parseErr })
            }

            changes.push(parseChangesetRecord(data, filepath))
        }

        return sortChangesets(changes)
    }

    /**
     * Delete every pending changeset and, once empty, the pending area.
     *
     * Clearing an empty or missing area is a no-op.
     *
     * @returns Number of files removed
     */
    async clear(): Promise<number> {

        const dir = this.directory
        const [entries, readErr] = await attempt(() => readdir(dir, { withFileTypes: true }))

        if (readErr) {

            if (hasErrorCode(readErr, 'ENOENT')) {

                return 0
            }

            throw readErr
        }

        let removed = 0

        for (const entry of entries) {

            if (entry.isDirectory()) {

                continue
            }

            await rm(path.join(dir, entry.name), { force: true })
            removed++
        }

        const [, rmdirErr] = await attempt(() => rmdir(dir))

        // Someone else removed it, or it still holds directories
        if (rmdirErr && !hasErrorCode(rmdirErr, 'ENOENT') && !hasErrorCode(rmdirErr, 'ENOTEMPTY')) {

            throw rmdirErr
        }

        observer.emit('changeset:cleared', { directory: dir, removed })

        return removed
    }
}
