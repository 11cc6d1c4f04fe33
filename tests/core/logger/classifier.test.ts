/**
 * Event classification and level filtering.
 */
import { describe, it, expect } from 'vitest'

import { classifyEvent, isLevelEnabled, shouldLog } from '../../../src/core/logger/classifier.js'


describe('logger: classifier', () => {

    it('should classify errors', () => {

        expect(classifyEvent('error')).toBe('error')
        expect(classifyEvent('release:failed')).toBe('error')
        expect(classifyEvent('changelog:error')).toBe('error')
    })

    it('should classify warnings', () => {

        expect(classifyEvent('layout:deprecated')).toBe('warn')
        expect(classifyEvent('changeset:collision')).toBe('warn')
    })

    it('should classify lifecycle events as info', () => {

        expect(classifyEvent('release:start')).toBe('info')
        expect(classifyEvent('release:complete')).toBe('info')
        expect(classifyEvent('changeset:cleared')).toBe('info')
    })

    it('should treat everything else as debug', () => {

        expect(classifyEvent('changeset:created')).toBe('debug')
        expect(classifyEvent('release:created')).toBe('debug')
        expect(classifyEvent('config:loaded')).toBe('debug')
        expect(classifyEvent('errors:seen')).toBe('debug')
    })

    it('should filter by configured level', () => {

        expect(isLevelEnabled('warn', 'info')).toBe(true)
        expect(isLevelEnabled('debug', 'info')).toBe(false)
        expect(isLevelEnabled('debug', 'verbose')).toBe(true)
        expect(isLevelEnabled('error', 'silent')).toBe(false)
        expect(shouldLog('release:start', 'warn')).toBe(false)
        expect(shouldLog('error', 'error')).toBe(true)
    })
})
