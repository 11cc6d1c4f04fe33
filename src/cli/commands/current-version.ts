import type { Command } from './_helpers.js';
import { writeJson, writeLine } from './_helpers.js';

export const help = `
# CURRENT-VERSION

Print the current version

## Usage

    semkeep current-version

## Description

The most recent release, or 0.0.0 before the first one.
`;

export const run: Command = async (_params, flags, io) => {

    const version = await io.semkeep.getLastVersion();

    if (flags.json) {

        writeJson(io, { version });

    }
    else {

        writeLine(io, version);

    }

    return 0;

};
