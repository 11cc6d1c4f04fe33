/**
 * CLI run: argument parsing, config, logger and dispatch.
 *
 * Kept apart from the entry point so a run can be driven with an explicit
 * argv.
 */
import path from 'node:path'

import meow from 'meow'
import { attempt } from '@logosdx/utils'

import type { CliFlags, RouteParams } from './types.js'
import { USAGE, isCommandName, runCommand } from './commands/index.js'
import { Logger, initLogger } from '../core/logger/index.js'
import { loadConfig } from '../core/config/index.js'
import { shouldUseColor } from '../core/environment.js'
import { Semkeep } from '../sdk/index.js'


/**
 * Parse CLI arguments with meow.
 */
function parseCli(argv?: string[]) {

    const cli = meow(USAGE, {
        importMeta: import.meta,
        ...(argv ? { argv } : {}),
        flags: {
            path: {
                type: 'string',
            },
            json: {
                type: 'boolean',
                default: false,
            },
            color: {
                type: 'boolean',
                default: true,
            },
            type: {
                type: 'string',
                shortFlag: 't',
            },
            description: {
                type: 'string',
                shortFlag: 'd',
            },
            pre: {
                type: 'string',
            },
            attribute: {
                type: 'string',
                isMultiple: true,
            },
            only: {
                type: 'string',
            },
            template: {
                type: 'string',
            },
        },
    })

    const flags: CliFlags = {
        path: cli.flags.path,
        json: cli.flags.json,
        color: cli.flags.color,
        type: cli.flags.type,
        description: cli.flags.description,
        pre: cli.flags.pre,
        attribute: cli.flags.attribute ?? [],
        only: cli.flags.only,
        template: cli.flags.template,
    }

    const [command = 'help', name] = cli.input
    const params: RouteParams = name ? { name } : {}

    return { command, params, flags }
}


/**
 * Run the CLI and return its exit code.
 */
export async function main(argv?: string[]): Promise<number> {

    const { command, params, flags } = parseCli(argv)
    const root = path.resolve(flags.path ?? process.cwd())

    const [config, configErr] = await attempt(() => loadConfig(root))

    if (configErr) {

        new Logger({ config: { color: false } }).error(configErr.message)

        return 1
    }

    const color = flags.color && config.log.color

    const [logging, logErr] = await attempt(() => initLogger({
        root,
        file: config.log.file,
        config: {
            level: config.log.level,
            color: color && shouldUseColor(process.stderr),
            json: flags.json,
        },
        console: process.stderr,
    }))

    if (logErr) {

        new Logger({ config: { color: false } }).error(`Cannot open log file: ${logErr.message}`)

        return 2
    }

    const { logger } = logging

    if (!isCommandName(command)) {

        logger.error(`Unknown command: ${command}`)
        process.stdout.write(USAGE)
        await logging.close()

        return 1
    }

    logger.setContext({ command })
    logger.start()

    const code = await runCommand(
        command,
        params,
        { ...flags, color: color && shouldUseColor(process.stdout) },
        { semkeep: new Semkeep(root, config), logger, stdout: process.stdout },
    )

    await logging.close()

    return code
}
