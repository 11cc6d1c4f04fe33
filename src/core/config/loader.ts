/**
 * Config loading.
 *
 * Reads the optional semkeep.yml at the project root, layers SEMKEEP_*
 * variables on top and applies defaults. Environment wins over the file.
 */
import path from 'node:path'
import { readFile } from 'node:fs/promises'

import { parse as parseYaml } from 'yaml'
import { attempt, attemptSync } from '@logosdx/utils'

import { observer } from '../observer.js'
import { hasErrorCode } from '../errors.js'
import type { ConfigInput, SemkeepConfig } from './types.js'
import { ConfigValidationError, parseConfigInput, resolveConfig } from './schema.js'
import { getEnvConfig } from './env.js'


export const CONFIG_FILENAME = 'semkeep.yml'


export interface LoadConfigOptions {
    /** Environment to read SEMKEEP_* variables from */
    env?: NodeJS.ProcessEnv;
}


async function readConfigFile(filepath: string): Promise<ConfigInput | null> {

    const [content, readErr] = await attempt(() => readFile(filepath, 'utf-8'))

    if (readErr) {

        if (hasErrorCode(readErr, 'ENOENT')) {

            return null
        }

        throw readErr
    }

    const [parsed, yamlErr] = attemptSync((): unknown => parseYaml(content))

    if (yamlErr) {

        throw new ConfigValidationError(CONFIG_FILENAME, 'root', [], `invalid YAML: ${yamlErr.message}`)
    }

    // Empty file
    if (parsed === null || parsed === undefined) {

        return {}
    }

    return parseConfigInput(parsed, CONFIG_FILENAME)
}


/**
 * Load the configuration for a project root.
 *
 * @throws ConfigValidationError if the file or the environment holds invalid values
 *
 * @example
 * ```typescript
 * const config = await loadConfig('/project')
 * config.log.level             // 'info'
 * config.changelog.template    // undefined
 * ```
 */
export async function loadConfig(root: string, options: LoadConfigOptions = {}): Promise<SemkeepConfig> {

    const filepath = path.join(root, CONFIG_FILENAME)
    const fileConfig = await readConfigFile(filepath)
    const envConfig = getEnvConfig(options.env ?? process.env)

    const config = resolveConfig(fileConfig ?? {}, envConfig)

    observer.emit('config:loaded', { path: filepath, fromFile: fileConfig !== null })

    return config
}
