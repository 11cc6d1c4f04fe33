/**
 * Core module exports.
 *
 * All business logic modules are exported from here.
 * The CLI and SDK import from the module barrels directly.
 */

// Observer
export { observer } from './observer.js'
export type { SemkeepEvents, SemkeepEventNames } from './observer.js'

// Errors
export { UserInputError, IntegrityError, RecordParseError, hasErrorCode } from './errors.js'

// Layout
export {
    RECORDS_DIR,
    LEGACY_RECORDS_DIR,
    PENDING_DIR,
    resolveLayout,
} from './layout.js'
export type { Layout } from './layout.js'

// Version
export {
    SemVersion,
    compareVersionsDesc,
    bumpTriple,
    bumpStable,
    bumpPrerelease,
    bumpVersion,
    computeNextVersion,
    resolveReleaseType,
    resolveChannel,
    InvalidVersionError,
    MixedChangesetsError,
    INITIAL_VERSION,
} from './version/index.js'
export type {
    ReleaseType,
    PrereleaseChannel,
    PrereleaseTag,
    VersionParts,
    VersionIntent,
    NextVersionResult,
} from './version/index.js'

// Changesets
export {
    ChangesetStore,
    InvalidChangesetError,
    MissingChangesetError,
    validateChangeset,
    sortChangesets,
} from './changeset/index.js'
export type { Changeset } from './changeset/index.js'

// Releases
export {
    ReleaseHistory,
    ReleaseCoordinator,
    ReleaseExistsError,
    serializeRelease,
} from './release/index.js'
export type { Release, ReleaseStatus } from './release/index.js'

// Changelog
export {
    DEFAULT_TEMPLATE,
    generateChangelog,
    loadTemplate,
    TemplateError,
    TemplateNotFoundError,
} from './changelog/index.js'
export type { ChangelogContext, ChangelogOptions } from './changelog/index.js'

// Config
export { loadConfig, ConfigValidationError, CONFIG_FILENAME } from './config/index.js'
export type { SemkeepConfig } from './config/index.js'

// Logger
export { Logger } from './logger/index.js'
export type { LogLevel, LoggerOptions } from './logger/index.js'
