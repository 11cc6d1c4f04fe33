import type { Command } from './_helpers.js';
import { themeFor, writeJson, writeLine } from './_helpers.js';

export const help = `
# STATUS

Show the current version and what is pending

## Usage

    semkeep status

## JSON Output

\`\`\`json
{
    "version": "1.0.0",
    "nextVersion": "1.1.0",
    "unreleasedChanges": [{ "type": "minor", "description": "Add status command" }]
}
\`\`\`
`;

export const run: Command = async (_params, flags, io) => {

    const status = await io.semkeep.getStatus();

    if (flags.json) {

        writeJson(io, status);

        return 0;

    }

    const t = themeFor(flags);

    writeLine(io, `Version: ${status.version}`);

    if (status.unreleasedChanges.length === 0) {

        writeLine(io, 'No changes to release (use "semkeep add-change")');

        return 0;

    }

    writeLine(io, `Next version: ${status.nextVersion}`);
    writeLine(io, 'Unreleased changes:');

    for (const change of status.unreleasedChanges) {

        writeLine(io, t.error(`\t${change.type}:\t${change.description}`));

    }

    writeLine(io, '(use "semkeep release" to release the next version)');

    return 0;

};
