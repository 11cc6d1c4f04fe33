import { attempt } from '@logosdx/utils';

import type { Command } from './_helpers.js';
import { writeJson, writeLine } from './_helpers.js';
import { MissingChangesetError } from '../../core/changeset/index.js';

export const help = `
# RELEASE

Release the pending changes

## Usage

    semkeep release

## Description

Computes the next version from the pending changes, writes
\`.semversioner/<version>.json\` and removes the pending files.
Prints the new version.

Run one release at a time per repository.

## Exit Codes

    0   Released
    1   Nothing to release, or stable and prerelease changes mixed
    2   Release record already exists, or a record could not be read

## JSON Output

\`\`\`json
{
    "version": "1.1.0",
    "createdAt": "2024-01-15T10:30:00.000Z",
    "changes": [{ "type": "minor", "description": "Add status command" }]
}
\`\`\`
`;

export const run: Command = async (_params, flags, io) => {

    const [release, error] = await attempt(() => io.semkeep.release());

    if (error) {

        if (error instanceof MissingChangesetError) {

            io.logger.error(`${error.message} (use "semkeep add-change")`);

            return 1;

        }

        throw error;

    }

    if (flags.json) {

        writeJson(io, release);

    }
    else {

        writeLine(io, release.version);

    }

    return 0;

};
