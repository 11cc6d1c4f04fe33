/**
 * Environment Detection
 *
 * Utilities for detecting the runtime environment (CI, color support).
 * Used by the logger and the CLI to pick output defaults.
 */

/**
 * CI environment variable names to check.
 */
const CI_ENV_VARS = [
    'CI',
    'CONTINUOUS_INTEGRATION',
    'GITHUB_ACTIONS',
    'GITLAB_CI',
    'CIRCLECI',
    'TRAVIS',
    'JENKINS_URL',
    'BUILDKITE',
    'TEAMCITY_VERSION',
    'TF_BUILD',
    'BITBUCKET_BUILD_NUMBER',
];

/**
 * Detect if running in a CI environment.
 *
 * @example
 * ```typescript
 * if (isCi()) {
 *     // Plain output, no colors
 * }
 * ```
 */
export function isCi(env: NodeJS.ProcessEnv = process.env): boolean {

    return CI_ENV_VARS.some((envVar) => Boolean(env[envVar]));

}

/**
 * Check if observer debug tracing is enabled.
 *
 * @returns true if SEMKEEP_DEBUG is set to 'true'
 */
export function isDebug(env: NodeJS.ProcessEnv = process.env): boolean {

    return env['SEMKEEP_DEBUG'] === 'true';

}

/**
 * Decide whether output to a stream should be colored.
 *
 * `NO_COLOR` always wins, then `FORCE_COLOR`. Otherwise color only goes
 * to an interactive terminal outside CI.
 *
 * @example
 * ```typescript
 * const color = shouldUseColor(process.stderr)
 * ```
 */
export function shouldUseColor(
    stream: { isTTY?: boolean },
    env: NodeJS.ProcessEnv = process.env,
): boolean {

    if (env['NO_COLOR'] !== undefined) {

        return false;

    }

    if (env['FORCE_COLOR'] !== undefined && env['FORCE_COLOR'] !== '0') {

        return true;

    }

    return stream.isTTY === true && !isCi(env);

}
