/**
 * Configuration types.
 *
 * Configuration is optional. Without a semkeep.yml and without SEMKEEP_*
 * variables every value takes its default.
 */
import type { LogLevel } from '../logger/index.js'


/**
 * Resolved configuration.
 */
export interface SemkeepConfig {
    log: {
        /** Console verbosity */
        level: LogLevel;

        /** Color console output when the terminal allows it */
        color: boolean;

        /** Append JSON entries to this file, relative to the project root */
        file?: string;
    };

    changelog: {
        /** Default custom template, relative to the project root */
        template?: string;
    };
}


/**
 * Configuration as written by the user, every key optional.
 */
export interface ConfigInput {
    log?: {
        level?: LogLevel;
        color?: boolean;
        file?: string;
    };

    changelog?: {
        template?: string;
    };
}
