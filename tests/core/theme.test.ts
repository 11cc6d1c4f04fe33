/**
 * Theme selection.
 */
import { describe, it, expect } from 'vitest'

import { getTheme, plainTheme, theme } from '../../src/core/theme.js'


describe('theme', () => {

    it('should expose the same color roles in both themes', () => {

        expect(Object.keys(theme).sort()).toEqual(['error', 'info', 'muted', 'success', 'text', 'warning'])
        expect(Object.keys(plainTheme).sort()).toEqual(Object.keys(theme).sort())
    })

    it('should pass text through unchanged without color', () => {

        const t = getTheme(false)

        expect(t.error('boom')).toBe('boom')
        expect(t.muted('(nothing pending)')).toBe('(nothing pending)')
    })

    it('should return the colored theme when color is on', () => {

        expect(getTheme(true)).toBe(theme)
    })
})
