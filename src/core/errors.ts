/**
 * Error kinds shared by every core module.
 *
 * Module errors extend one of these so callers can branch on `kind`
 * without knowing every concrete class. Filesystem failures are not
 * wrapped: Node's errno errors reach the caller as they were thrown.
 *
 * @example
 * ```typescript
 * const [release, err] = await attempt(() => semkeep.release())
 *
 * if (err instanceof UserInputError) {
 *     logger.error(err.message)
 *     return 1
 * }
 * ```
 */


/**
 * Something the user asked for cannot be done as asked.
 */
export abstract class UserInputError extends Error {

    readonly kind = 'user-input' as const
}


/**
 * Data on disk does not look like semkeep wrote it.
 */
export abstract class IntegrityError extends Error {

    readonly kind = 'integrity' as const
}


/**
 * Check whether an error is a Node filesystem error with the given code.
 */
export function hasErrorCode(error: unknown, code: string): boolean {

    return error instanceof Error
        && 'code' in error
        && error.code === code
}


/**
 * Error when a record file cannot be read back.
 *
 * Covers malformed JSON, a shape that matches neither known format, and
 * release file names that are not versions.
 *
 * @example
 * ```typescript
 * // "Cannot read record '/project/.semversioner/1.0.0.json': Unexpected token"
 * ```
 */
export class RecordParseError extends IntegrityError {

    override readonly name = 'RecordParseError' as const

    constructor(
        public readonly filepath: string,
        public readonly reason: string,
        options?: { cause?: unknown },
    ) {

        super(`Cannot read record '${filepath}': ${reason}`, options)
    }
}
