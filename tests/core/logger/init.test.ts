/**
 * Logger initialization with and without a log file.
 */
import { mkdir, readFile, writeFile } from 'node:fs/promises'
import { join } from 'node:path'

import { describe, it, expect, beforeEach } from 'vitest'

import { initLogger } from '../../../src/core/logger/init.js'
import { captureStream, makeTestDir } from '../../utils/fs.js'


describe('logger: initLogger', () => {

    let root: string

    beforeEach(async () => {

        root = await makeTestDir()
    })

    it('should mirror entries to the log file as JSON with context', async () => {

        const out = captureStream()

        const { logger, filePath, close } = await initLogger({
            root,
            file: 'logs/semkeep.log',
            config: { level: 'info', color: false },
            context: { command: 'status' },
            console: out.stream,
        })

        logger.info('hello')
        await close()

        expect(filePath).toBe(join(root, 'logs', 'semkeep.log'))
        expect(out.text()).toBe('[INFO] hello\n')

        const lines = (await readFile(join(root, 'logs', 'semkeep.log'), 'utf-8')).split('\n')

        expect(lines).toHaveLength(2)
        expect(lines[1]).toBe('')
        expect(JSON.parse(lines[0] ?? '')).toEqual({
            timestamp: expect.any(String),
            level: 'info',
            event: 'log',
            message: 'hello',
            context: { root, command: 'status' },
        })
    })

    it('should append to an existing log file', async () => {

        await mkdir(join(root, 'logs'))
        await writeFile(join(root, 'logs', 'semkeep.log'), 'earlier\n')

        const { logger, close } = await initLogger({
            root,
            file: join(root, 'logs', 'semkeep.log'),
            config: { level: 'info', color: false },
            console: captureStream().stream,
        })

        logger.warn('later')
        await close()

        const lines = (await readFile(join(root, 'logs', 'semkeep.log'), 'utf-8')).split('\n')

        expect(lines[0]).toBe('earlier')
        expect(JSON.parse(lines[1] ?? '')).toMatchObject({ level: 'warn', message: 'later', context: { root } })
    })

    it('should run without a file', async () => {

        const out = captureStream()

        const { logger, filePath, close } = await initLogger({
            root,
            config: { level: 'info', color: false },
            console: out.stream,
        })

        logger.error('boom')
        await close()

        expect(filePath).toBeNull()
        expect(out.text()).toBe('[ERROR] boom\n')
    })

    it('should fail when the log file cannot be opened', async () => {

        await mkdir(join(root, 'logs', 'semkeep.log'), { recursive: true })

        await expect(initLogger({ root, file: 'logs/semkeep.log' }))
            .rejects.toMatchObject({ code: 'EISDIR' })
    })

    it('should stop capturing events on close', async () => {

        const { logger, close } = await initLogger({
            root,
            config: { level: 'info', color: false },
            console: captureStream().stream,
        })

        logger.start()
        await close()

        expect(logger.isRunning).toBe(false)
    })
})
