import type { Command } from './_helpers.js';
import { writeJson, writeLine } from './_helpers.js';

export const help = `
# CHECK

Verify that changes are pending

## Usage

    semkeep check

## Description

For CI: fails when a branch adds no changeset.

## Exit Codes

    0   At least one change is pending
    1   Nothing pending
`;

export const run: Command = async (_params, flags, io) => {

    const pending = await io.semkeep.check();

    if (flags.json) {

        writeJson(io, { pending });

        return pending ? 0 : 1;

    }

    if (!pending) {

        io.logger.error('No changes to release.');

        return 1;

    }

    writeLine(io, 'OK');

    return 0;

};
