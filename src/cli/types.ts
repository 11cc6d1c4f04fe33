/**
 * CLI type definitions.
 */


/**
 * All command names.
 */
export type CommandName =
    | 'add-change'
    | 'release'
    | 'changelog'
    | 'current-version'
    | 'next-version'
    | 'status'
    | 'check'
    | 'help'


/**
 * Positional arguments after the command name.
 *
 * Only `help` takes one: the command to describe.
 */
export interface RouteParams {

    /** Command name for `help` */
    name?: string
}


/**
 * Parsed CLI flags.
 */
export interface CliFlags {

    /** Project root (default: cwd) */
    path?: string

    /** Machine-readable output */
    json: boolean

    /** Colored output */
    color: boolean

    /** add-change: release type */
    type?: string

    /** add-change: changelog line */
    description?: string

    /** add-change: prerelease channel */
    pre?: string

    /** add-change: key=value pairs */
    attribute: string[]

    /** changelog: single version */
    only?: string

    /** changelog: template file */
    template?: string
}
