import type { CommandModule } from './_helpers.js';
import { writeLine } from './_helpers.js';

export const help = `
# HELP

Show help for commands

## Usage

    semkeep help [command]

## Examples

    semkeep help
    semkeep help add-change
`;

/**
 * Build the help command over a command registry.
 *
 * The registry is read lazily so the help command can live inside it.
 */
export function createHelpCommand(
    getCommands: () => Readonly<Record<string, CommandModule>>,
    usage: string,
): CommandModule {

    return {
        help,
        run: async (params, _flags, io) => {

            const commands = getCommands();

            if (!params.name) {

                writeLine(io, usage.trim());

                return 0;

            }

            const command = Object.hasOwn(commands, params.name) ? commands[params.name] : undefined;

            if (!command) {

                io.logger.error(`Unknown command: ${params.name}`);
                writeLine(io, `Available: ${Object.keys(commands).sort().join(', ')}`);

                return 1;

            }

            writeLine(io, command.help.trim());

            return 0;

        },
    };

}
