import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtempSync, rmSync, writeFileSync } from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'
import { ConfigurationError } from '../../config/errors'
import { openConfigContext, openConfigContextAuto, openConfigContextSafe } from '../../config/loader'
import { CoreSection, OutputFormat, createRegistry } from '../fixtures/sections'

describe('config loader', () => {
  let dir: string

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'inimap-loader-'))
    writeFileSync(join(dir, 'main.ini'), '[Core]\nLastValue=Capture.OutputFormat:Jpg\n', 'utf-8')
    writeFileSync(join(dir, 'defaults.ini'), '[Core]\nLanguage=de-DE\n', 'utf-8')
  })

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true })
  })

  it('opens a context on the given files', () => {
    const context = openConfigContext(
      { mainFile: join(dir, 'main.ini'), defaultsFile: join(dir, 'defaults.ini'), logLevel: 'silent' },
      { registry: createRegistry() }
    )
    const core = context.getSection(CoreSection)

    expect(core.language).toBe('de-DE')
    expect(core.lastValue).toEqual({ type: 'Capture.OutputFormat', value: OutputFormat.Jpg })
  })

  it('throws a ConfigurationError for invalid options', () => {
    expect(() => openConfigContext({ logLevel: 'silent' })).toThrow(ConfigurationError)
    expect(() => openConfigContext({ logLevel: 'silent' })).toThrow(
      'Invalid config context options: mainFile: Required'
    )
  })

  it('reports errors without throwing', () => {
    const result = openConfigContextSafe({ mainFile: '' })

    expect(result.success).toBe(false)
  })

  it('opens from environment variables', () => {
    const context = openConfigContextAuto({
      INIMAP_CONFIG_FILE: join(dir, 'main.ini'),
      INIMAP_DEFAULTS_FILE: join(dir, 'defaults.ini'),
      INIMAP_LOG_LEVEL: 'silent',
    })

    expect(context?.getProperty('Core', 'Language')).toBe('de-DE')
  })

  it('throws a ConfigurationError for invalid environment values', () => {
    const env = { INIMAP_CONFIG_FILE: join(dir, 'main.ini'), INIMAP_LOG_LEVEL: 'loud' }

    expect(() => openConfigContextAuto(env)).toThrow(ConfigurationError)
    expect(() => openConfigContextAuto(env)).toThrow(/^Invalid config context options: logLevel: /)
  })

  it('returns undefined without a configured main file', () => {
    expect(openConfigContextAuto({})).toBeUndefined()
  })
})
