/**
 * Directory Layout
 *
 * Resolves where semkeep keeps its records under a project root:
 *
 * ```
 * <root>/.semversioner/              (current) or <root>/.changes/ (legacy)
 *   next-release/                    pending changesets
 *     minor-20240115103000123456.json
 *   1.0.0.json                       one record per release
 * ```
 *
 * The legacy `.changes` directory is only used when it exists and the
 * current one does not. Resolution happens once per instance; a project
 * moved to the new name mid-process keeps its old resolution.
 */
import { statSync } from 'node:fs';
import { join, resolve } from 'node:path';

import { attemptSync } from '@logosdx/utils';

import { observer } from './observer.js';


/** Current records directory name */
export const RECORDS_DIR = '.semversioner';

/** Deprecated records directory name */
export const LEGACY_RECORDS_DIR = '.changes';

/** Pending changesets directory name, inside the records directory */
export const PENDING_DIR = 'next-release';


/**
 * Resolved directories for one project root.
 */
export interface Layout {
    /** Absolute project root */
    root: string;

    /** Records directory (release files live here) */
    recordsDir: string;

    /** Pending changesets directory */
    pendingDir: string;

    /** True when the deprecated `.changes` directory is in use */
    legacy: boolean;
}


function isDirectory(path: string): boolean {

    const [stats] = attemptSync(() => statSync(path));

    return stats?.isDirectory() ?? false;

}


/**
 * Resolve the layout for a project root.
 *
 * Emits `layout:deprecated` when the legacy directory is selected.
 *
 * @example
 * ```typescript
 * const layout = resolveLayout('/project')
 * // { root: '/project', recordsDir: '/project/.semversioner', pendingDir: '/project/.semversioner/next-release', legacy: false }
 * ```
 */
export function resolveLayout(root: string): Layout {

    const absRoot = resolve(root);
    const currentDir = join(absRoot, RECORDS_DIR);
    const legacyDir = join(absRoot, LEGACY_RECORDS_DIR);

    const legacy = isDirectory(legacyDir) && !isDirectory(currentDir);
    const recordsDir = legacy ? legacyDir : currentDir;

    if (legacy) {

        observer.emit('layout:deprecated', { legacyDir, currentDir });

    }

    return {
        root: absRoot,
        recordsDir,
        pendingDir: join(recordsDir, PENDING_DIR),
        legacy,
    };

}
