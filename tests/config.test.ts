import { mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'

import { afterEach, describe, expect, it, vi } from 'vitest'

import { buildConfig, loadConfig, parseCsv } from '../src/config/load.js'
import { validateConfig } from '../src/config/schema.js'

describe('config', () => {
  const tempDirs: string[] = []

  afterEach(() => {
    vi.unstubAllEnvs()
    for (const dir of tempDirs.splice(0)) rmSync(dir, { recursive: true, force: true })
  })

  it('applies defaults when nothing is set', () => {
    const config = buildConfig({})

    expect(config.prefixes).toEqual({ developer: '.', admin: '/', public: '#' })
    expect(config.auth).toEqual({
      ownerId: '',
      developerIds: [],
      adminChatIds: [],
      enablePublicCommands: true,
      adminCacheTtlSec: 300,
      adminRefreshAttempts: 1,
      adminRefreshBackoffMs: 250
    })
    expect(config.acknowledgement).toEqual({
      enabled: true,
      frames: ['⏳ Processing...', '⏳ Processing..', '⏳ Processing.'],
      intervalMs: 600
    })
    expect(config.privacy.privateCommands).toEqual(['.stats', '.status'])
    expect(config.extensions).toEqual({ disabled: [] })
    expect(config.logChatId).toBeUndefined()
    expect(config.logLevel).toBe('info')
  })

  it('reads environment variables', () => {
    const config = buildConfig({
      TIERGATE_TELEGRAM_TOKEN: 'test-token',
      TIERGATE_OWNER_ID: '1',
      TIERGATE_DEVELOPER_IDS: ' 2, 3 ,',
      TIERGATE_ENABLE_PUBLIC_COMMANDS: 'false',
      TIERGATE_ADMIN_CACHE_TTL_SEC: '60',
      TIERGATE_PREFIX_PUBLIC: '!',
      TIERGATE_ACK_FRAMES: 'one|two',
      TIERGATE_ACK_ENABLED: 'FALSE',
      TIERGATE_ENABLED_EXTENSIONS: 'ping',
      TIERGATE_LOG_CHAT_ID: '-999',
      TIERGATE_LOG_LEVEL: 'DEBUG'
    })

    expect(config.telegram.token).toBe('test-token')
    expect(config.auth.ownerId).toBe('1')
    expect(config.auth.developerIds).toEqual(['2', '3'])
    expect(config.auth.enablePublicCommands).toBe(false)
    expect(config.auth.adminCacheTtlSec).toBe(60)
    expect(config.prefixes.public).toBe('!')
    expect(config.acknowledgement.frames).toEqual(['one', 'two'])
    expect(config.acknowledgement.enabled).toBe(false)
    expect(config.extensions.enabled).toEqual(['ping'])
    expect(config.logChatId).toBe('-999')
    expect(config.logLevel).toBe('debug')
  })

  it('lets settings override the environment', () => {
    const config = buildConfig(
      { TIERGATE_OWNER_ID: '1', TIERGATE_PREFIX_ADMIN: '/' },
      { ownerId: '9', prefixes: { admin: '!' }, disabledExtensions: ['roles'] }
    )

    expect(config.auth.ownerId).toBe('9')
    expect(config.prefixes.admin).toBe('!')
    expect(config.extensions.disabled).toEqual(['roles'])
  })

  it('rejects prefixes that clash or are longer than one character', () => {
    expect(() => buildConfig({ TIERGATE_PREFIX_PUBLIC: '.' })).toThrow(/must be distinct/)
    expect(() => buildConfig({ TIERGATE_PREFIX_ADMIN: '//' })).toThrow(/single character/)
  })

  it('ignores numbers that do not parse', () => {
    expect(buildConfig({ TIERGATE_ADMIN_CACHE_TTL_SEC: 'soon' }).auth.adminCacheTtlSec).toBe(300)
  })

  it('lists missing essentials', () => {
    expect(validateConfig(buildConfig({}))).toEqual([
      'TIERGATE_TELEGRAM_TOKEN is required',
      'TIERGATE_OWNER_ID is required',
      'At least one TIERGATE_DEVELOPER_IDS entry is required'
    ])
    expect(
      validateConfig(
        buildConfig({
          TIERGATE_TELEGRAM_TOKEN: 'test-token',
          TIERGATE_OWNER_ID: '1',
          TIERGATE_DEVELOPER_IDS: '2'
        })
      )
    ).toEqual([])
  })

  it('splits comma separated lists', () => {
    expect(parseCsv(undefined)).toEqual([])
    expect(parseCsv('a, b,,c ')).toEqual(['a', 'b', 'c'])
  })

  it('loads the settings file from the config directory', () => {
    const home = mkdtempSync(join(tmpdir(), 'tiergate-config-'))
    tempDirs.push(home)
    writeFileSync(join(home, 'settings.json'), JSON.stringify({ ownerId: '42', logChatId: '-5' }))
    vi.stubEnv('TIERGATE_HOME', home)
    vi.stubEnv('TIERGATE_TELEGRAM_TOKEN', 'test-token')

    const config = loadConfig()

    expect(config.telegram.token).toBe('test-token')
    expect(config.auth.ownerId).toBe('42')
    expect(config.logChatId).toBe('-5')
  })
})
