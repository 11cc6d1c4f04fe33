import type { Command } from './_helpers.js';
import { writeJson, writeLine } from './_helpers.js';

export const help = `
# NEXT-VERSION

Print the version the pending changes would produce

## Usage

    semkeep next-version

## Exit Codes

    0   Printed
    1   Nothing pending, or stable and prerelease changes mixed
`;

export const run: Command = async (_params, flags, io) => {

    const version = await io.semkeep.getNextVersion();

    if (flags.json) {

        writeJson(io, { version });

        return version ? 0 : 1;

    }

    if (!version) {

        io.logger.error('No changes found. No next version available.');

        return 1;

    }

    writeLine(io, version);

    return 0;

};
