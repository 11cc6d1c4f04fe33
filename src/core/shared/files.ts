/**
 * File utilities.
 *
 * Cross-cutting helpers used by both the changeset store and the release
 * history: listing record files and publishing new ones atomically.
 *
 * Publishing writes the full content to a hidden staging file first and
 * then hard-links it to its final name. `link` fails with `EEXIST` when the
 * name is taken, so a record is never overwritten and never visible
 * half-written.
 */
import { randomUUID } from 'node:crypto';
import { link, readdir, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import { attempt } from '@logosdx/utils';

import { hasErrorCode } from '../errors.js';


/** Prefix of staging files; hidden entries are never listed as records */
const STAGING_PREFIX = '.staged-';


/**
 * List regular, non-hidden files in a directory.
 *
 * @param dir - Directory to scan
 * @param extension - Only return names ending with this (e.g. '.json')
 * @returns File names sorted alphabetically, or [] if the directory is missing
 *
 * @example
 * ```typescript
 * const names = await listRecordFiles('/project/.semversioner', '.json')
 * // ['0.1.0.json', '1.0.0.json']
 * ```
 */
export async function listRecordFiles(dir: string, extension?: string): Promise<string[]> {

    const [entries, err] = await attempt(() => readdir(dir, { withFileTypes: true }));

    if (err) {

        if (hasErrorCode(err, 'ENOENT')) {

            return [];

        }

        throw err;

    }

    return entries
        .filter((entry) => entry.isFile() && !entry.name.startsWith('.'))
        .map((entry) => entry.name)
        .filter((name) => !extension || name.endsWith(extension))
        .sort();

}


/**
 * Write content to a hidden staging file in `dir`, run `fn` with its
 * path, then remove it.
 *
 * `fn` publishes the staged file with {@link linkExclusive}, possibly
 * several times under different names until one is free.
 */
export async function withStagedFile<T>(
    dir: string,
    content: string,
    fn: (stagedPath: string) => Promise<T>,
): Promise<T> {

    const stagedPath = join(dir, `${STAGING_PREFIX}${process.pid}-${randomUUID()}`);

    await writeFile(stagedPath, content, { encoding: 'utf-8', flag: 'wx' });

    try {

        return await fn(stagedPath);

    }
    finally {

        await rm(stagedPath, { force: true });

    }

}


/**
 * Publish a staged file under `target`, unless `target` already exists.
 *
 * @returns true if published, false if the name was taken
 * @throws any filesystem error other than EEXIST
 */
export async function linkExclusive(stagedPath: string, target: string): Promise<boolean> {

    const [, err] = await attempt(() => link(stagedPath, target));

    if (!err) {

        return true;

    }

    if (hasErrorCode(err, 'EEXIST')) {

        return false;

    }

    throw err;

}
