import { describe, it, expect } from 'vitest'
import { applyStyle, resolveStyle } from '../styles.js'
import { ConfigurationError } from '../../errors.js'

describe('resolveStyle', () => {
  it('leaves the default style without a fragment', () => {
    expect(resolveStyle('default', null)).toEqual({ style: 'default', modifier: '', error: null })
  })

  it('maps a named style to its fragment', () => {
    const resolved = resolveStyle('socratic', null)
    expect(resolved.style).toBe('socratic')
    expect(resolved.modifier.startsWith('STYLE - Socratic:')).toBe(true)
    expect(resolved.error).toBeNull()
  })

  it('uses a custom modifier verbatim', () => {
    expect(resolveStyle('custom', 'Answer in haiku.')).toEqual({
      style: 'custom',
      modifier: 'Answer in haiku.',
      error: null
    })
  })

  it('falls back to default for custom without a modifier', () => {
    const resolved = resolveStyle('custom', null)
    expect(resolved.style).toBe('default')
    expect(resolved.modifier).toBe('')
    expect(resolved.error).toBeInstanceOf(ConfigurationError)
  })

  it('falls back to default for an unknown style', () => {
    const resolved = resolveStyle('pirate', null)
    expect(resolved.style).toBe('default')
    expect(resolved.error?.message).toBe('Unknown prompt style "pirate"')
  })

  it('treats a missing style as default without an error', () => {
    expect(resolveStyle(undefined, null)).toEqual({ style: 'default', modifier: '', error: null })
  })
})

describe('applyStyle', () => {
  it('gives custom-without-modifier the same prompt as default', () => {
    const base = 'You are a guide.'
    expect(applyStyle(base, resolveStyle('custom', null))).toBe(applyStyle(base, resolveStyle('default', null)))
    expect(applyStyle(base, resolveStyle('custom', '   '))).toBe(base)
  })

  it('appends the fragment after a blank line', () => {
    expect(applyStyle('Base', resolveStyle('custom', 'Be brief.'))).toBe('Base\n\nBe brief.')
  })
})
