/**
 * SDK facade over a real project directory.
 */
import { mkdir, writeFile } from 'node:fs/promises'
import { join } from 'node:path'

import { describe, it, expect, beforeEach } from 'vitest'

import {
    Semkeep,
    TemplateNotFoundError,
    createSemkeep,
    type SemkeepConfig,
} from '../../src/sdk/index.js'
import { makeTestDir } from '../utils/fs.js'


const HEADER = '# Changelog\nNote: version releases in the 0.x.y range may introduce breaking changes.\n'

function configWithTemplate(template: string): SemkeepConfig {

    return { log: { level: 'info', color: false }, changelog: { template } }
}


describe('sdk: Semkeep', () => {

    let root: string

    beforeEach(async () => {

        root = await makeTestDir()
    })

    it('should load config from the project', async () => {

        await writeFile(join(root, 'semkeep.yml'), 'log:\n  level: warn\n')

        const semkeep = await createSemkeep({ path: root, env: {} })

        expect(semkeep).toBeInstanceOf(Semkeep)
        expect(semkeep.root).toBe(root)
        expect(semkeep.config.log.level).toBe('warn')
        expect(semkeep.layout.recordsDir).toBe(join(root, '.semversioner'))
        expect(semkeep.isDeprecated()).toBe(false)
    })

    it('should run the full release cycle', async () => {

        const semkeep = await createSemkeep({ path: root, env: {} })

        expect(await semkeep.getLastVersion()).toBe('0.0.0')
        expect(await semkeep.getNextVersion()).toBeNull()
        expect(await semkeep.check()).toBe(false)

        await semkeep.addChange('minor', 'Add thing', { attributes: { issue: 'GH-1' } })
        await semkeep.addChange('patch', 'Fix thing')

        expect(await semkeep.check()).toBe(true)
        expect(await semkeep.getStatus()).toEqual({
            version: '0.0.0',
            nextVersion: '0.1.0',
            unreleasedChanges: [
                { type: 'minor', description: 'Add thing', attributes: { issue: 'GH-1' } },
                { type: 'patch', description: 'Fix thing' },
            ],
        })

        const release = await semkeep.release()

        expect(release.version).toBe('0.1.0')
        expect(await semkeep.getLastVersion()).toBe('0.1.0')
        expect(await semkeep.check()).toBe(false)
        expect(await semkeep.generateChangelog()).toBe(
            HEADER + '\n## 0.1.0\n\n- minor: Add thing\n- patch: Fix thing\n',
        )
    })

    it('should record prerelease changes', async () => {

        const semkeep = await createSemkeep({ path: root, env: {} })

        await semkeep.addChange('major', 'Rewrite', { pre: 'beta' })

        expect(await semkeep.getNextVersion()).toBe('1.0.0-beta.1')
    })

    it('should render with the configured template', async () => {

        await writeFile(join(root, 'changelog.eta'), '{% for (const r of $.releases) { %}v{%= r.version %};{% } %}')

        const semkeep = await createSemkeep({ path: root, config: configWithTemplate('changelog.eta') })

        await semkeep.addChange('patch', 'Fix')
        await semkeep.release()

        expect(await semkeep.generateChangelog()).toBe('v0.0.1;')
        expect(await semkeep.generateChangelog({ template: 'inline' })).toBe('inline')
    })

    it('should report a missing configured template', async () => {

        const semkeep = await createSemkeep({ path: root, config: configWithTemplate('missing.eta') })

        await expect(semkeep.generateChangelog()).rejects.toBeInstanceOf(TemplateNotFoundError)
    })

    it('should flag the legacy layout', async () => {

        await mkdir(join(root, '.changes'))

        const semkeep = await createSemkeep({ path: root, env: {} })

        expect(semkeep.isDeprecated()).toBe(true)
    })
})
