import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import path from 'node:path'
import { formatUptime } from '../commands.js'
import { loadTraits } from '../chat.js'

describe('formatUptime', () => {
  it('picks the largest useful units', () => {
    expect(formatUptime(45_000)).toBe('45s')
    expect(formatUptime(61_000)).toBe('1m 1s')
    expect(formatUptime(3_723_000)).toBe('1h 2m 3s')
    expect(formatUptime(90_061_000)).toBe('1d 1h 1m')
  })
})

describe('loadTraits', () => {
  let dir: string

  beforeEach(() => {
    dir = mkdtempSync(path.join(tmpdir(), 'attune-traits-'))
  })

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true })
  })

  it('returns no traits without a file', () => {
    expect(loadTraits()).toEqual({})
  })

  it('reads a trait profile', () => {
    const file = path.join(dir, 'traits.json')
    writeFileSync(file, JSON.stringify({ openness: 7.5, conscientiousness: 3 }))
    expect(loadTraits(file)).toEqual({ openness: 7.5, conscientiousness: 3 })
  })

  it('rejects a file that is not a score map', () => {
    const file = path.join(dir, 'traits.json')
    writeFileSync(file, JSON.stringify({ openness: 'high' }))
    expect(() => loadTraits(file)).toThrow(`${file} must be a JSON object of trait names to numeric scores`)
  })
})
