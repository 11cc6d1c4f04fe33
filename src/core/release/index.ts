/**
 * Release module.
 *
 * Release history on disk and the coordinator that turns pending
 * changesets into new releases.
 */

export type { Release, ReleaseStatus } from './types.js'

export { ReleaseExistsError } from './types.js'

export type { ReleaseRecord } from './mapper.js'

export {
    ReleaseRecordSchema,
    releaseFromRecord,
    releaseToRecord,
    serializeRelease,
} from './mapper.js'

export { ReleaseHistory } from './history.js'

export { ReleaseCoordinator } from './coordinator.js'
