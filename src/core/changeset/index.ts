/**
 * Changeset module.
 *
 * Pending changesets: one JSON file each, created atomically, listed in a
 * stable order, cleared on release.
 *
 * @example
 * ```typescript
 * import { ChangesetStore } from './changeset'
 *
 * const store = new ChangesetStore(resolveLayout(process.cwd()))
 * await store.create({ type: 'patch', description: 'Fix typo in help' })
 * ```
 */

export type { Changeset } from './types.js'

export { InvalidChangesetError, MissingChangesetError } from './types.js'

export {
    ChangesetSchema,
    ReleaseTypeSchema,
    PrereleaseChannelSchema,
    validateChangeset,
    parseChangesetRecord,
    toChangesetRecord,
    serializeChangeset,
    compareChangesets,
    sortChangesets,
} from './schema.js'

export { ChangesetStore, changesetTimestamp } from './store.js'
