/**
 * semkeep SDK
 *
 * Programmatic access to changeset-driven versioning.
 *
 * @example
 * ```typescript
 * import { createSemkeep } from 'semkeep'
 *
 * const semkeep = await createSemkeep({ path: process.cwd() })
 *
 * await semkeep.addChange('patch', 'Fix off-by-one in status output')
 *
 * if (await semkeep.check()) {
 *     const release = await semkeep.release()
 *     console.log(`Released ${release.version}`)
 * }
 * ```
 */
import path from 'node:path';

import { loadConfig } from '../core/config/index.js';

import { Semkeep } from './semkeep.js';
import type { CreateSemkeepOptions } from './types.js';

// ─────────────────────────────────────────────────────────────
// Factory Function
// ─────────────────────────────────────────────────────────────

/**
 * Create a Semkeep instance for a project root.
 *
 * Config is read from semkeep.yml and SEMKEEP_* variables unless given.
 * Nothing is written until a changeset is added or a release is cut.
 *
 * @throws ConfigValidationError if the project config is invalid
 */
export async function createSemkeep(options: CreateSemkeepOptions = {}): Promise<Semkeep> {

    const root = path.resolve(options.path ?? process.cwd());
    const config = options.config
        ?? await loadConfig(root, options.env ? { env: options.env } : {});

    return new Semkeep(root, config);

}

// ─────────────────────────────────────────────────────────────
// Re-exports
// ─────────────────────────────────────────────────────────────

export { Semkeep } from './semkeep.js';

export type {
    CreateSemkeepOptions,
    AddChangeOptions,
    GenerateChangelogOptions,
} from './types.js';

export type {
    Changeset,
    Release,
    ReleaseStatus,
    ReleaseType,
    PrereleaseChannel,
    NextVersionResult,
    SemkeepConfig,
    SemkeepEvents,
} from '../core/index.js';

export {
    observer,
    SemVersion,
    computeNextVersion,
    bumpVersion,
    DEFAULT_TEMPLATE,
} from '../core/index.js';

// Errors
export {
    UserInputError,
    IntegrityError,
    RecordParseError,
    InvalidVersionError,
    MixedChangesetsError,
    InvalidChangesetError,
    MissingChangesetError,
    ReleaseExistsError,
    TemplateError,
    TemplateNotFoundError,
    ConfigValidationError,
} from '../core/index.js';
