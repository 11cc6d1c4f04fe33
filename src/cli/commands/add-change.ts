import type { Command } from './_helpers.js';
import {
    parseAttributes,
    parseChannel,
    parseReleaseType,
    writeJson,
    writeLine,
} from './_helpers.js';

export const help = `
# ADD-CHANGE

Record a pending change

## Usage

    semkeep add-change -t TYPE -d TEXT [options]

## Options

    -t, --type TYPE          major, minor or patch
    -d, --description TEXT   Changelog line
    --pre CHANNEL            Prerelease channel: alpha, beta or rc
    --attribute KEY=VALUE    Extra data for changelog templates (repeatable)

## Description

Writes one JSON file to \`.semversioner/next-release/\`. Several people
can add changes at the same time; no file is ever overwritten.

All pending changes must agree: either none has a prerelease channel
or every one has.

## Examples

    semkeep add-change -t minor -d "Add status command"
    semkeep add-change -t patch -d "Fix crash on empty input" --pre rc
    semkeep add-change -t minor -d "New API" --attribute issue=GH-42

## JSON Output

\`\`\`json
{ "path": "/repo/.semversioner/next-release/minor-20240115103000123456.json" }
\`\`\`
`;

export const run: Command = async (_params, flags, io) => {

    const type = parseReleaseType(flags.type);
    const pre = parseChannel(flags.pre);
    const attributes = parseAttributes(flags.attribute);

    const path = await io.semkeep.addChange(type, flags.description ?? '', {
        ...(pre ? { pre } : {}),
        ...(attributes ? { attributes } : {}),
    });

    if (flags.json) {

        writeJson(io, { path });

    }
    else {

        writeLine(io, `Successfully created file ${path}`);

    }

    return 0;

};
