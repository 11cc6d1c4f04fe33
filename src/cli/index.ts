#!/usr/bin/env node
/**
 * CLI entry point for semkeep.
 *
 * Runs the command line and sets the exit code.
 *
 * @example
 * ```bash
 * semkeep add-change -t minor -d "Add status command"
 * semkeep --json status
 * semkeep --path ../other-repo next-version
 * ```
 */
import { main } from './main.js'


process.exitCode = await main()
