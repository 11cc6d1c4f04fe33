/**
 * Changelog module.
 *
 * Renders release history into markdown through an Eta template.
 *
 * @example
 * ```typescript
 * import { generateChangelog, loadTemplate } from './changelog'
 *
 * const template = await loadTemplate('./changelog.eta')
 * const markdown = await generateChangelog(releases, { template })
 * ```
 */

export type {
    ChangelogChange,
    ChangelogRelease,
    ChangelogContext,
    ChangelogOptions,
} from './types.js'

export { TemplateError, TemplateNotFoundError } from './types.js'

export { DEFAULT_TEMPLATE, generateChangelog, loadTemplate } from './engine.js'
