import path from 'node:path';

import type { Command } from './_helpers.js';
import { writeJson } from './_helpers.js';
import { loadTemplate } from '../../core/changelog/index.js';

export const help = `
# CHANGELOG

Print the changelog

## Usage

    semkeep changelog [options]

## Options

    --only VERSION     Only the given version
    --template FILE    Eta template to render with

## Description

Renders every release, newest first. Without --template the file named
by \`changelog.template\` in semkeep.yml is used, then the built-in one.

Templates use \`{% %}\` for code and \`{%= %}\` for output, with the
data under \`$\`:

    {% for (const release of $.releases) { %}
    ## {%= release.version %} ({%= $.formatDate(release.createdAt) %})
    {% for (const change of release.changes) { %}- {%= change.description %}
    {% } %}{% } %}

## Examples

    semkeep changelog > CHANGELOG.md
    semkeep changelog --only 1.2.0
    semkeep changelog --template docs/changelog.eta
`;

export const run: Command = async (_params, flags, io) => {

    const template = flags.template
        ? await loadTemplate(path.resolve(flags.template))
        : undefined;

    const changelog = await io.semkeep.generateChangelog({
        ...(flags.only !== undefined ? { version: flags.only } : {}),
        ...(template !== undefined ? { template } : {}),
    });

    if (flags.json) {

        writeJson(io, { changelog });

    }
    else {

        io.stdout.write(changelog);

    }

    return 0;

};
