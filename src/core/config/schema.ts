/**
 * Configuration Zod schemas and validation.
 */
import { z } from 'zod';

import { UserInputError } from '../errors.js';
import { LOG_LEVELS } from '../logger/index.js';
import type { ConfigInput, SemkeepConfig } from './types.js';

// ─────────────────────────────────────────────────────────────
// Schemas
// ─────────────────────────────────────────────────────────────

export const LogLevelSchema = z.enum(LOG_LEVELS);

/**
 * One config source (file or environment). Unknown keys are ignored.
 */
export const ConfigInputSchema = z.object({
    log: z.object({
        level: LogLevelSchema.optional(),
        color: z.boolean().optional(),
        file: z.string().min(1, 'Log file path cannot be empty').optional(),
    }).optional(),
    changelog: z.object({
        template: z.string().min(1, 'Template path cannot be empty').optional(),
    }).optional(),
});

/**
 * Fully resolved config with defaults applied.
 */
export const ConfigSchema = z.object({
    log: z.object({
        level: LogLevelSchema.default('info'),
        color: z.boolean().default(true),
        file: z.string().optional(),
    }).default({}),
    changelog: z.object({
        template: z.string().optional(),
    }).default({}),
});

// ─────────────────────────────────────────────────────────────
// Error Types
// ─────────────────────────────────────────────────────────────

/**
 * Error when a config source holds an invalid value.
 */
export class ConfigValidationError extends UserInputError {

    override readonly name = 'ConfigValidationError' as const;

    constructor(
        public readonly source: string,
        public readonly field: string,
        public readonly issues: z.ZodIssue[],
        detail?: string,
    ) {

        super(`Invalid config in ${source}: ${field}: ${detail ?? issues[0]?.message ?? 'validation failed'}`);

    }

}

// ─────────────────────────────────────────────────────────────
// Validation Functions
// ─────────────────────────────────────────────────────────────

/**
 * Validate one config source.
 *
 * @param source - Where the input came from, for error messages
 * @throws ConfigValidationError naming the first offending field
 *
 * @example
 * ```typescript
 * parseConfigInput({ log: { level: 'loud' } }, 'semkeep.yml')
 * // throws: Invalid config in semkeep.yml: log.level: Invalid enum value...
 * ```
 */
export function parseConfigInput(input: unknown, source: string): ConfigInput {

    const result = ConfigInputSchema.safeParse(input);

    if (!result.success) {

        const firstIssue = result.error.issues[0];

        throw new ConfigValidationError(
            source,
            firstIssue?.path.join('.') || 'root',
            result.error.issues,
        );

    }

    return result.data;

}

/**
 * Merge config sources, later ones winning, and apply defaults.
 *
 * @example
 * ```typescript
 * resolveConfig({ log: { level: 'warn' } }, { log: { color: false } })
 * // { log: { level: 'warn', color: false }, changelog: {} }
 * ```
 */
export function resolveConfig(...sources: ConfigInput[]): SemkeepConfig {

    let log: ConfigInput['log'] = {};
    let changelog: ConfigInput['changelog'] = {};

    for (const source of sources) {

        log = { ...log, ...source.log };
        changelog = { ...changelog, ...source.changelog };

    }

    return ConfigSchema.parse({ log, changelog });

}
