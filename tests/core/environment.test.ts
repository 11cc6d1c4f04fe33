/**
 * Runtime environment detection.
 */
import { describe, it, expect } from 'vitest'

import { isCi, isDebug, shouldUseColor } from '../../src/core/environment.js'


describe('environment', () => {

    it('should detect CI', () => {

        expect(isCi({ GITHUB_ACTIONS: 'true' })).toBe(true)
        expect(isCi({})).toBe(false)
    })

    it('should detect debug tracing', () => {

        expect(isDebug({ SEMKEEP_DEBUG: 'true' })).toBe(true)
        expect(isDebug({ SEMKEEP_DEBUG: '1' })).toBe(false)
    })

    describe('shouldUseColor', () => {

        const tty = { isTTY: true }

        it('should color an interactive terminal', () => {

            expect(shouldUseColor(tty, {})).toBe(true)
            expect(shouldUseColor({ isTTY: false }, {})).toBe(false)
        })

        it('should honor NO_COLOR over everything', () => {

            expect(shouldUseColor(tty, { NO_COLOR: '' })).toBe(false)
            expect(shouldUseColor(tty, { NO_COLOR: '1', FORCE_COLOR: '1' })).toBe(false)
        })

        it('should honor FORCE_COLOR', () => {

            expect(shouldUseColor({}, { FORCE_COLOR: '1' })).toBe(true)
            expect(shouldUseColor(tty, { FORCE_COLOR: '0' })).toBe(true)
        })

        it('should not color in CI', () => {

            expect(shouldUseColor(tty, { CI: 'true' })).toBe(false)
        })
    })
})
