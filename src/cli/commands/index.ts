/**
 * Command registry.
 *
 * Maps command names to their modules and runs them, turning thrown
 * errors into log lines and exit codes.
 */
import { attempt } from '@logosdx/utils';

import type { CommandName, RouteParams, CliFlags } from '../types.js';
import type { CommandIO, CommandModule } from './_helpers.js';
import { exitCodeFor } from './_helpers.js';

import * as CmdAddChange from './add-change.js';
import * as CmdRelease from './release.js';
import * as CmdChangelog from './changelog.js';
import * as CmdCurrentVersion from './current-version.js';
import * as CmdNextVersion from './next-version.js';
import * as CmdStatus from './status.js';
import * as CmdCheck from './check.js';
import { createHelpCommand } from './help.js';

/**
 * Usage summary, shown by `semkeep help` and `semkeep --help`.
 */
export const USAGE = `
  Usage
    $ semkeep <command> [options]

  Commands
    add-change          Record a pending change
    release             Release the pending changes
    changelog           Print the changelog
    current-version     Print the current version
    next-version        Print the next version
    status              Show version and pending changes
    check               Fail unless changes are pending
    help [command]      Show help for a command

  Options
    --path DIR          Project root (default: current directory)
    --json              Machine-readable output
    --no-color          Disable colors
    --help              Show this help
    --version           Show the semkeep version

  Examples
    $ semkeep add-change -t minor -d "Add status command"
    $ semkeep release
    $ semkeep changelog > CHANGELOG.md
`;

export const COMMANDS: Readonly<Record<CommandName, CommandModule>> = {
    'add-change': CmdAddChange,
    'release': CmdRelease,
    'changelog': CmdChangelog,
    'current-version': CmdCurrentVersion,
    'next-version': CmdNextVersion,
    'status': CmdStatus,
    'check': CmdCheck,
    'help': createHelpCommand(() => COMMANDS, USAGE),
};

export function isCommandName(name: string): name is CommandName {

    return Object.hasOwn(COMMANDS, name);

}

/**
 * Run a command and map its outcome to an exit code.
 *
 * @example
 * ```typescript
 * const code = await runCommand('status', {}, flags, io)
 * ```
 */
export async function runCommand(
    name: CommandName,
    params: RouteParams,
    flags: CliFlags,
    io: CommandIO,
): Promise<number> {

    const [code, error] = await attempt(() => COMMANDS[name].run(params, flags, io));

    if (error) {

        io.logger.error(error.message);

        return exitCodeFor(error);

    }

    return code;

}

export type { Command, CommandIO, CommandModule } from './_helpers.js';
