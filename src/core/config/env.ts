/**
 * Environment variable configuration.
 *
 * Every config key can be set through a SEMKEEP_* variable. makeNestedConfig
 * turns the flat names into the nested config shape.
 *
 * @example
 * ```bash
 * SEMKEEP_LOG_LEVEL=verbose
 * SEMKEEP_LOG_COLOR=false
 * SEMKEEP_LOG_FILE=.semversioner/semkeep.log
 * SEMKEEP_CHANGELOG_TEMPLATE=./docs/changelog.eta
 * ```
 */
import { makeNestedConfig } from '@logosdx/utils'

import type { ConfigInput } from './types.js'
import { parseConfigInput } from './schema.js'


const ENV_PREFIX = 'SEMKEEP_'


/**
 * Variables that control the process, not config values.
 */
const META_ENV_VARS = new Set([
    'SEMKEEP_DEBUG',
])


/**
 * Read config values from environment variables.
 *
 * @throws ConfigValidationError if a variable holds an invalid value
 *
 * @example
 * ```typescript
 * getEnvConfig({ SEMKEEP_LOG_LEVEL: 'warn', SEMKEEP_LOG_COLOR: 'false' })
 * // { log: { level: 'warn', color: false } }
 * ```
 */
export function getEnvConfig(env: NodeJS.ProcessEnv = process.env): ConfigInput {

    const flat: Record<string, string> = {}

    for (const [key, value] of Object.entries(env)) {

        if (value !== undefined && key.startsWith(ENV_PREFIX) && !META_ENV_VARS.has(key)) {

            flat[key] = value
        }
    }

    const { allConfigs } = makeNestedConfig<ConfigInput, Record<string, string>>(flat, {
        stripPrefix: ENV_PREFIX,
        forceAllCapToLower: true,
        // Paths stay strings even when they look like numbers
        skipConversion: (key) => /template|file/.test(key.toLowerCase()),
    })

    return parseConfigInput(allConfigs(), 'environment')
}
