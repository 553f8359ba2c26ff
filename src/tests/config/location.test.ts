import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtempSync, rmSync, writeFileSync } from 'fs'
import { homedir, tmpdir } from 'os'
import { join } from 'path'
import { defaultAppDataDir, resolveConfigLocation } from '../../config/location'

describe('resolveConfigLocation', () => {
  let dir: string

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'inimap-location-'))
  })

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true })
  })

  it('prefers a file in the startup directory', () => {
    writeFileSync(join(dir, 'app.ini'), '', 'utf-8')

    const location = resolveConfigLocation('app.ini', {
      applicationName: 'Capture',
      startupDir: dir,
      appDataDir: join(dir, 'appdata'),
    })

    expect(location).toBe(join(dir, 'app.ini'))
  })

  it('falls back to the application data directory', () => {
    const location = resolveConfigLocation('app.ini', {
      applicationName: 'Capture',
      startupDir: dir,
      appDataDir: join(dir, 'appdata'),
    })

    expect(location).toBe(join(dir, 'appdata', 'Capture', 'app.ini'))
  })

  it('takes the application data directory from the environment', () => {
    const location = resolveConfigLocation('app.ini', {
      applicationName: 'Capture',
      startupDir: dir,
      env: { APPDATA: join(dir, 'roaming') },
    })

    expect(location).toBe(join(dir, 'roaming', 'Capture', 'app.ini'))
  })
})

describe('defaultAppDataDir', () => {
  it('uses ~/.config without APPDATA', () => {
    expect(defaultAppDataDir({})).toBe(join(homedir(), '.config'))
  })
})
