import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import path from 'node:path'
import {
  DEFAULT_CONFIG,
  deepMerge,
  loadConfig,
  patchFromPath,
  saveConfig,
  validateConfig
} from '../config.js'
import { ConfigurationError } from '../errors.js'

describe('config', () => {
  let dir: string
  let configPath: string

  beforeEach(() => {
    dir = mkdtempSync(path.join(tmpdir(), 'attune-config-'))
    configPath = path.join(dir, 'config.json')
  })

  afterEach(() => {
    vi.restoreAllMocks()
    rmSync(dir, { recursive: true, force: true })
  })

  it('falls back to defaults without a file or environment', () => {
    expect(loadConfig(configPath, {})).toEqual(DEFAULT_CONFIG)
  })

  it('layers environment over defaults and the file over both', () => {
    writeFileSync(configPath, JSON.stringify({
      llm: { apiKey: 'file-key' },
      memory: { sessionMessageLimit: 10 }
    }))

    const config = loadConfig(configPath, {
      OPENAI_API_KEY: 'env-key',
      ATTUNE_RETRIEVAL_URL: 'http://kb.test'
    })

    expect(config.llm.apiKey).toBe('file-key')
    expect(config.llm.summaryModel).toBe('gpt-4o-mini')
    expect(config.memory.sessionMessageLimit).toBe(10)
    expect(config.memory.sessionCharLimit).toBe(24_000)
    expect(config.retrieval).toMatchObject({ enabled: true, baseUrl: 'http://kb.test' })
  })

  it('prefers ATTUNE_API_KEY over OPENAI_API_KEY', () => {
    const config = loadConfig(configPath, { ATTUNE_API_KEY: 'test-secret', OPENAI_API_KEY: 'other' })
    expect(config.llm.apiKey).toBe('test-secret')
  })

  it('rejects a file with invalid values', () => {
    writeFileSync(configPath, JSON.stringify({ memory: { sessionMessageLimit: -1 } }))
    expect(() => loadConfig(configPath, {})).toThrow(ConfigurationError)
  })

  it('ignores a file that is not JSON', () => {
    vi.spyOn(console, 'error').mockImplementation(() => {})
    writeFileSync(configPath, '{ not json')
    expect(loadConfig(configPath, {})).toEqual(DEFAULT_CONFIG)
  })

  it('saves a validated patch on top of the existing file', () => {
    saveConfig(patchFromPath('llm.apiKey', 'test-secret'), configPath)
    saveConfig(patchFromPath('memory.sessionIdleMinutes', 15), configPath)

    expect(JSON.parse(readFileSync(configPath, 'utf-8'))).toEqual({
      llm: { apiKey: 'test-secret' },
      memory: { sessionIdleMinutes: 15 }
    })
    expect(() => saveConfig(patchFromPath('llm.provider', 'nobody'), configPath)).toThrow(ConfigurationError)
  })
})

describe('validateConfig', () => {
  it('reports a missing API key unless the provider needs none', () => {
    expect(validateConfig(DEFAULT_CONFIG).map(e => e.message)).toEqual([
      'No API key for provider "openai". Set OPENAI_API_KEY or ATTUNE_API_KEY, or run: attune config set llm.apiKey <key>'
    ])
    expect(validateConfig({ ...DEFAULT_CONFIG, llm: { ...DEFAULT_CONFIG.llm, provider: 'ollama' } })).toEqual([])
    expect(validateConfig(DEFAULT_CONFIG, { requireApiKey: false })).toEqual([])
  })

  it('reports retrieval enabled without a URL', () => {
    const config = {
      ...DEFAULT_CONFIG,
      llm: { ...DEFAULT_CONFIG.llm, apiKey: 'test-secret' },
      retrieval: { ...DEFAULT_CONFIG.retrieval, enabled: true }
    }
    expect(validateConfig(config).map(e => e.message)).toEqual(['Retrieval is enabled but retrieval.baseUrl is not set'])
  })
})

describe('patchFromPath', () => {
  it('nests a dotted key', () => {
    expect(patchFromPath('a.b.c', 1)).toEqual({ a: { b: { c: 1 } } })
  })

  it('rejects an empty key', () => {
    expect(() => patchFromPath('', 1)).toThrow('Config key must not be empty')
  })
})

describe('deepMerge', () => {
  it('merges nested records and skips undefined values', () => {
    expect(deepMerge({ a: { x: 1, y: 2 }, b: 1 }, { a: { y: 3 }, b: undefined })).toEqual({ a: { x: 1, y: 3 }, b: 1 })
  })
})
