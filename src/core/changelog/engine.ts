/**
 * Changelog rendering using Eta.
 *
 * Template syntax:
 * - `{% %}` for JavaScript code
 * - `{%= %}` for output
 * - `$` as the context variable
 *
 * Whitespace is kept exactly as written, so a template controls every
 * blank line of the output.
 */
import { readFile } from 'node:fs/promises'

import { Eta } from 'eta'
import dayjs from 'dayjs'
import utc from 'dayjs/plugin/utc.js'
import { attempt } from '@logosdx/utils'

import { observer } from '../observer.js'
import { hasErrorCode } from '../errors.js'
import { SemVersion } from '../version/index.js'
import type { Release } from '../release/index.js'
import type { ChangelogContext, ChangelogOptions, ChangelogRelease } from './types.js'
import { TemplateError, TemplateNotFoundError } from './types.js'


dayjs.extend(utc)


/**
 * Built-in changelog template.
 *
 * ```
 * # Changelog
 * Note: version releases in the 0.x.y range may introduce breaking changes.
 *
 * ## 1.1.0
 *
 * - minor: Add status command
 * ```
 */
export const DEFAULT_TEMPLATE = [
    '# Changelog',
    'Note: version releases in the 0.x.y range may introduce breaking changes.',
    '{% for (const release of $.releases) { %}',
    '## {%= release.version %}',
    '',
    '{% for (const change of release.changes) { %}- {%= change.type %}: {%= change.description %}',
    '{% } %}{% } %}',
].join('\n')


const eta = new Eta({
    tags: ['{%', '%}'],
    varName: '$',

    // Changelogs are markdown, not HTML
    autoEscape: false,

    autoTrim: false,
    useWith: false,
    cache: false,
})


function toTemplateRelease(release: Release): ChangelogRelease {

    return {
        version: release.version,
        createdAt: release.createdAt,
        changes: release.changes.map((change) => ({
            type: change.type,
            description: change.description,
            attributes: { ...change.attributes },
            pre: change.pre ?? null,
        })),
    }
}


function formatDate(date: Date | null, format = 'YYYY-MM-DD'): string {

    return date ? dayjs.utc(date).format(format) : ''
}


/**
 * Render the changelog for a release history.
 *
 * @param releases - Releases, newest first
 * @throws TemplateError if the template does not compile or throws while rendering
 *
 * @example
 * ```typescript
 * const markdown = await generateChangelog(await history.list())
 * const single = await generateChangelog(releases, { version: '1.2.0' })
 * ```
 */
export async function generateChangelog(
    releases: readonly Release[],
    options: ChangelogOptions = {},
): Promise<string> {

    const start = performance.now()
    const { version, template } = options

    // Accept any spelling of the wanted version
    const wanted = version === undefined
        ? null
        : SemVersion.tryParse(version)?.toString() ?? version

    const context: ChangelogContext = {
        releases: releases
            .filter((release) => wanted === null || release.version === wanted)
            .map(toTemplateRelease),
        formatDate,
    }

    const [output, err] = await attempt(
        () => eta.renderStringAsync(template ?? DEFAULT_TEMPLATE, context),
    )

    if (err) {

        throw new TemplateError(err.message, { cause: err })
    }

    observer.emit('changelog:rendered', {
        releases: context.releases.length,
        custom: template !== undefined,
        durationMs: performance.now() - start,
    })

    return output
}


/**
 * Read a changelog template file.
 *
 * @throws TemplateNotFoundError if the file does not exist
 */
export async function loadTemplate(filepath: string): Promise<string> {

    const [content, err] = await attempt(() => readFile(filepath, 'utf-8'))

    if (err) {

        if (hasErrorCode(err, 'ENOENT')) {

            throw new TemplateNotFoundError(filepath)
        }

        throw err
    }

    return content
}
