/**
 * Shared module exports.
 *
 * Cross-cutting helpers used by multiple core modules.
 */

export { listRecordFiles, withStagedFile, linkExclusive } from './files.js'
