import { describe, it, expect } from 'vitest'
import { loadEnvironmentOptions } from '../../config/environment'

describe('loadEnvironmentOptions', () => {
  it('returns null without a main file', () => {
    expect(loadEnvironmentOptions({ INIMAP_LOG_LEVEL: 'debug' })).toBeNull()
  })

  it('collects the configured variables', () => {
    const options = loadEnvironmentOptions({
      INIMAP_CONFIG_FILE: '/etc/app/main.ini',
      INIMAP_DEFAULTS_FILE: '/etc/app/defaults.ini',
      INIMAP_LOG_LEVEL: 'warn',
      INIMAP_LOG_PRETTY: '1',
    })

    expect(options).toEqual({
      mainFile: '/etc/app/main.ini',
      defaultsFile: '/etc/app/defaults.ini',
      logLevel: 'warn',
      pretty: true,
    })
  })

  it('leaves unset variables out', () => {
    expect(loadEnvironmentOptions({ INIMAP_CONFIG_FILE: 'main.ini', INIMAP_LOG_PRETTY: 'no' })).toEqual({
      mainFile: 'main.ini',
      pretty: false,
    })
  })
})
