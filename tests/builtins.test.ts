import { describe, expect, it, vi } from 'vitest'

import { RoleResolver } from '../src/auth/role-resolver.js'
import { buildStatsText, formatDuration } from '../src/commands/definitions/stats.js'
import { CommandRegistry } from '../src/commands/registry.js'
import { StaticRouteTable } from '../src/commands/routes.js'
import type { CommandDefinition } from '../src/commands/types.js'
import { makeConfig, makeLogger } from './helpers/fake-transport.js'

function makeDefinition(overrides: Partial<CommandDefinition> = {}): CommandDefinition {
  return {
    name: '#help',
    description: 'Show available commands',
    handle: vi.fn(),
    ...overrides
  }
}

describe('StaticRouteTable', () => {
  it('resolves names and aliases case-insensitively', () => {
    const table = new StaticRouteTable()
    const stats = makeDefinition({ name: '.stats', aliases: ['.Status'] })
    table.register(stats)

    expect(table.get('.STATS')).toBe(stats)
    expect(table.get('.status@some_bot')).toBe(stats)
    expect(table.has('.missing')).toBe(false)
    expect(table.all()).toEqual([stats])
  })

  it('refuses to register a taken name or alias', () => {
    const table = new StaticRouteTable()
    table.register(makeDefinition({ aliases: ['#commands'] }))

    expect(() => table.register(makeDefinition({ name: '#commands' }))).toThrow(
      'Command "#commands" is already registered'
    )
    expect(() => table.register(makeDefinition({ name: '#other', aliases: ['#HELP'] }))).toThrow(
      'Command "#help" is already registered'
    )
  })
})

describe('formatDuration', () => {
  it('drops leading zero units', () => {
    expect(formatDuration(0)).toBe('0s')
    expect(formatDuration(59_999)).toBe('59s')
    expect(formatDuration(3_600_000)).toBe('1h 0m 0s')
    expect(formatDuration(90_061_000)).toBe('1d 1h 1m 1s')
    expect(formatDuration(-5)).toBe('0s')
  })
})

describe('buildStatsText', () => {
  it('summarises uptime and registry state', () => {
    const config = makeConfig()
    const logger = makeLogger()
    const registry = new CommandRegistry({ extensionsDir: '/nonexistent' }, logger)
    registry.registerHandler(['#a', '#b'], vi.fn())
    const roles = new RoleResolver({ auth: config.auth, prefixes: config.prefixes }, logger)

    const text = buildStatsText({
      registry,
      roles,
      liveInvocations: () => 3,
      startedAt: new Date(0),
      now: () => 61_000
    })

    expect(text).toBe(
      [
        '📊 Bot status',
        'Uptime: 1m 1s',
        'Extensions loaded: 0',
        'Extensions failed: 0',
        'Extension commands: 2',
        'Cached admin lists: 0',
        'Running commands: 3'
      ].join('\n')
    )
  })
})
