/**
 * CLI commands against a real project directory.
 *
 * Commands run through the registry with captured streams, the same way
 * the entry point calls them.
 */
import { mkdir, writeFile } from 'node:fs/promises'
import { join } from 'node:path'

import { describe, it, expect, beforeEach } from 'vitest'

import { USAGE, isCommandName, runCommand } from '../../src/cli/commands/index.js'
import type { CliFlags, CommandName, RouteParams } from '../../src/cli/types.js'
import { Logger } from '../../src/core/logger/index.js'
import { Semkeep } from '../../src/sdk/index.js'
import { captureStream, makeTestDir } from '../utils/fs.js'


const HEADER = '# Changelog\nNote: version releases in the 0.x.y range may introduce breaking changes.\n'

const CONFIG = { log: { level: 'info' as const, color: false }, changelog: {} }


describe('cli: commands', () => {

    let root: string

    beforeEach(async () => {

        root = await makeTestDir()
    })

    async function run(name: CommandName, flags: Partial<CliFlags> = {}, params: RouteParams = {}) {

        const stdout = captureStream()
        const stderr = captureStream()

        const code = await runCommand(
            name,
            params,
            { json: false, color: false, attribute: [], ...flags },
            {
                semkeep: new Semkeep(root, CONFIG),
                logger: new Logger({ config: { color: false }, console: stderr.stream }),
                stdout: stdout.stream,
            },
        )

        return { code, stdout: stdout.text(), stderr: stderr.text() }
    }

    describe('add-change', () => {

        it('should create a changeset file', async () => {

            const result = await run('add-change', { type: 'minor', description: 'Add thing' })

            expect(result.code).toBe(0)
            expect(result.stdout).toMatch(
                /^Successfully created file .+\/\.semversioner\/next-release\/minor-\d{20}\.json\n$/,
            )
        })

        it('should accept channel aliases and attributes', async () => {

            await run('add-change', {
                type: 'patch',
                description: 'Fix',
                pre: 'c',
                attribute: ['issue=GH-1', 'note=a=b'],
            })

            const status = await new Semkeep(root, CONFIG).getStatus()

            expect(status.unreleasedChanges).toEqual([
                { type: 'patch', description: 'Fix', pre: 'rc', attributes: { issue: 'GH-1', note: 'a=b' } },
            ])
        })

        it('should print JSON', async () => {

            const result = await run('add-change', { type: 'patch', description: 'Fix', json: true })
            const output: unknown = JSON.parse(result.stdout)

            expect(output).toEqual({ path: expect.stringMatching(/patch-\d{20}\.json$/) })
        })

        it('should reject an unknown type', async () => {

            const result = await run('add-change', { type: 'huge', description: 'x' })

            expect(result.code).toBe(1)
            expect(result.stderr).toMatch(/^\[ERROR\] Invalid changeset type: /)
            expect(result.stdout).toBe('')
        })

        it('should reject a missing description', async () => {

            const result = await run('add-change', { type: 'minor' })

            expect(result.code).toBe(1)
            expect(result.stderr).toBe('[ERROR] Invalid changeset description: Description is required\n')
        })

        it('should reject a malformed attribute', async () => {

            const result = await run('add-change', { type: 'minor', description: 'x', attribute: ['issue'] })

            expect(result.code).toBe(1)
            expect(result.stderr).toBe('[ERROR] Invalid changeset attributes: Attributes must look like key=value\n')
        })
    })

    describe('release', () => {

        it('should refuse to release nothing', async () => {

            const result = await run('release')

            expect(result.code).toBe(1)
            expect(result.stderr).toBe('[ERROR] No changes to release (use "semkeep add-change")\n')
        })

        it('should print the new version', async () => {

            await run('add-change', { type: 'minor', description: 'Add thing' })

            const result = await run('release')

            expect(result).toEqual({ code: 0, stdout: '0.1.0\n', stderr: '' })
            expect((await run('current-version')).stdout).toBe('0.1.0\n')
        })

        it('should refuse mixed changes', async () => {

            await run('add-change', { type: 'minor', description: 'Stable' })
            await run('add-change', { type: 'minor', description: 'Pre', pre: 'alpha' })

            const result = await run('release')

            expect(result.code).toBe(1)
            expect(result.stderr).toBe(
                '[ERROR] Cannot mix stable and prerelease changes in one release (1 stable, 1 prerelease)\n',
            )
        })

        it('should exit 2 on a damaged history', async () => {

            await mkdir(join(root, '.semversioner'))
            await writeFile(join(root, '.semversioner', 'latest.json'), '[]')
            await run('add-change', { type: 'minor', description: 'Add thing' })

            const result = await run('release')

            expect(result.code).toBe(2)
            expect(result.stderr).toBe(
                `[ERROR] Cannot read record '${join(root, '.semversioner', 'latest.json')}': Invalid version: 'latest'\n`,
            )
        })
    })

    describe('versions', () => {

        it('should print 0.0.0 before the first release', async () => {

            expect(await run('current-version')).toEqual({ code: 0, stdout: '0.0.0\n', stderr: '' })
        })

        it('should fail next-version with nothing pending', async () => {

            expect(await run('next-version')).toEqual({
                code: 1,
                stdout: '',
                stderr: '[ERROR] No changes found. No next version available.\n',
            })
        })

        it('should print the next version', async () => {

            await run('add-change', { type: 'major', description: 'Break' })

            expect((await run('next-version')).stdout).toBe('1.0.0\n')
            expect(JSON.parse((await run('next-version', { json: true })).stdout)).toEqual({ version: '1.0.0' })
        })
    })

    describe('status', () => {

        it('should say when nothing is pending', async () => {

            expect((await run('status')).stdout).toBe(
                'Version: 0.0.0\nNo changes to release (use "semkeep add-change")\n',
            )
        })

        it('should list pending changes', async () => {

            await run('add-change', { type: 'patch', description: 'Fix thing' })
            await run('add-change', { type: 'minor', description: 'Add thing' })

            expect((await run('status')).stdout).toBe([
                'Version: 0.0.0',
                'Next version: 0.1.0',
                'Unreleased changes:',
                '\tminor:\tAdd thing',
                '\tpatch:\tFix thing',
                '(use "semkeep release" to release the next version)',
                '',
            ].join('\n'))
        })

        it('should print JSON', async () => {

            await run('add-change', { type: 'patch', description: 'Fix thing' })

            expect(JSON.parse((await run('status', { json: true })).stdout)).toEqual({
                version: '0.0.0',
                nextVersion: '0.0.1',
                unreleasedChanges: [{ type: 'patch', description: 'Fix thing' }],
            })
        })
    })

    describe('check', () => {

        it('should fail with nothing pending', async () => {

            expect(await run('check')).toEqual({ code: 1, stdout: '', stderr: '[ERROR] No changes to release.\n' })
        })

        it('should pass with a pending change', async () => {

            await run('add-change', { type: 'patch', description: 'Fix' })

            expect(await run('check')).toEqual({ code: 0, stdout: 'OK\n', stderr: '' })
        })
    })

    describe('changelog', () => {

        beforeEach(async () => {

            await run('add-change', { type: 'major', description: 'First' })
            await run('release')
            await run('add-change', { type: 'minor', description: 'Second' })
            await run('release')
        })

        it('should print every release', async () => {

            expect((await run('changelog')).stdout).toBe(
                HEADER + '\n## 1.1.0\n\n- minor: Second\n' + '\n## 1.0.0\n\n- major: First\n',
            )
        })

        it('should print one release', async () => {

            expect((await run('changelog', { only: '1.0.0' })).stdout).toBe(HEADER + '\n## 1.0.0\n\n- major: First\n')
        })

        it('should render a template file', async () => {

            const template = join(root, 'versions.eta')

            await writeFile(template, '{%= $.releases.map((r) => r.version).join(",") %}')

            expect((await run('changelog', { template })).stdout).toBe('1.1.0,1.0.0')
        })

        it('should report a missing template file', async () => {

            const template = join(root, 'missing.eta')
            const result = await run('changelog', { template })

            expect(result.code).toBe(1)
            expect(result.stderr).toBe(`[ERROR] Template not found: ${template}\n`)
        })
    })

    describe('help', () => {

        it('should print usage', async () => {

            expect((await run('help')).stdout).toBe(USAGE.trim() + '\n')
        })

        it('should print help for one command', async () => {

            const result = await run('help', {}, { name: 'release' })

            expect(result.code).toBe(0)
            expect(result.stdout.startsWith('# RELEASE\n\nRelease the pending changes\n')).toBe(true)
        })

        it('should reject an unknown command', async () => {

            const result = await run('help', {}, { name: 'deploy' })

            expect(result.code).toBe(1)
            expect(result.stderr).toBe('[ERROR] Unknown command: deploy\n')
            expect(result.stdout).toBe(
                'Available: add-change, changelog, check, current-version, help, next-version, release, status\n',
            )
        })
    })

    it('should recognize command names', () => {

        expect(isCommandName('status')).toBe(true)
        expect(isCommandName('deploy')).toBe(false)
        expect(isCommandName('toString')).toBe(false)
    })
})
