import type { Writable } from 'node:stream';

import { z } from 'zod';

import type { RouteParams, CliFlags } from '../types.js';
import type { Logger } from '../../core/logger/index.js';
import type { Semkeep } from '../../sdk/index.js';
import { UserInputError } from '../../core/errors.js';
import {
    InvalidChangesetError,
    PrereleaseChannelSchema,
    ReleaseTypeSchema,
} from '../../core/changeset/index.js';
import {
    CHANNEL_ALIASES,
    type PrereleaseChannel,
    type ReleaseType,
} from '../../core/version/index.js';
import { getTheme, type Theme } from '../../core/theme.js';

/**
 * What a command gets to work with.
 */
export interface CommandIO {
    semkeep: Semkeep;
    logger: Logger;

    /** Result output (versions, changelog, JSON) */
    stdout: Writable;
}

export interface Command {
    (
        params: RouteParams,
        flags: CliFlags,
        io: CommandIO
    ): Promise<number>;
}

export type CommandModule = {
    run: Command;
    help: string;
}

// ─────────────────────────────────────────────────────────────
// Output
// ─────────────────────────────────────────────────────────────

export function writeLine(io: CommandIO, line: string): void {

    io.stdout.write(line + '\n');

}

export function writeJson(io: CommandIO, value: unknown): void {

    io.stdout.write(JSON.stringify(value, null, 2) + '\n');

}

export function themeFor(flags: CliFlags): Theme {

    return getTheme(flags.color);

}

/**
 * Exit code for a failed command.
 *
 * 1 for errors the user can fix by asking differently, 2 for everything
 * else (damaged records, filesystem failures).
 */
export function exitCodeFor(error: Error): number {

    return error instanceof UserInputError ? 1 : 2;

}

// ─────────────────────────────────────────────────────────────
// Flag parsing
// ─────────────────────────────────────────────────────────────

const AttributeSchema = z
    .string()
    .regex(/^[^=\s][^=]*=/, 'Attributes must look like key=value');

/**
 * Parse `--type`.
 *
 * @throws InvalidChangesetError if missing or not major/minor/patch
 */
export function parseReleaseType(input: string | undefined): ReleaseType {

    const result = ReleaseTypeSchema.safeParse(input);

    if (!result.success) {

        throw new InvalidChangesetError('type', result.error.issues);

    }

    return result.data;

}

/**
 * Parse `--pre`, accepting the short names `a`, `b` and `c`.
 *
 * @throws InvalidChangesetError if not a known channel
 */
export function parseChannel(input: string | undefined): PrereleaseChannel | undefined {

    if (input === undefined) {

        return undefined;

    }

    const key = input.toLowerCase();
    const alias = Object.hasOwn(CHANNEL_ALIASES, key) ? CHANNEL_ALIASES[key] : undefined;
    const result = PrereleaseChannelSchema.safeParse(alias ?? key);

    if (!result.success) {

        throw new InvalidChangesetError('pre', result.error.issues);

    }

    return result.data;

}

/**
 * Parse repeated `--attribute key=value` flags. Later keys win.
 *
 * @example
 * ```typescript
 * parseAttributes(['issue=GH-42', 'author=sam'])
 * // { issue: 'GH-42', author: 'sam' }
 * ```
 */
export function parseAttributes(pairs: readonly string[]): Record<string, string> | undefined {

    if (pairs.length === 0) {

        return undefined;

    }

    const attributes: Record<string, string> = {};

    for (const pair of pairs) {

        const result = AttributeSchema.safeParse(pair);

        if (!result.success) {

            throw new InvalidChangesetError('attributes', result.error.issues);

        }

        const index = pair.indexOf('=');

        attributes[pair.slice(0, index).trim()] = pair.slice(index + 1);

    }

    return attributes;

}
