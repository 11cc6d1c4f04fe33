/**
 * Config module.
 *
 * Optional project configuration from semkeep.yml and SEMKEEP_* variables.
 */

export type { SemkeepConfig, ConfigInput } from './types.js'

export {
    LogLevelSchema,
    ConfigInputSchema,
    ConfigSchema,
    ConfigValidationError,
    parseConfigInput,
    resolveConfig,
} from './schema.js'

export { getEnvConfig } from './env.js'

export { CONFIG_FILENAME, loadConfig, type LoadConfigOptions } from './loader.js'
