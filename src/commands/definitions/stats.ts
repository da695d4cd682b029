import type { RoleResolver } from '../../auth/role-resolver.js'
import type { CommandPrefixes } from '../../config/schema.js'
import type { Responder } from '../../dispatch/respond.js'
import type { CommandRegistry } from '../registry.js'
import type { CommandDefinition } from '../types.js'

const UNITS: Array<[string, number]> = [
  ['d', 86_400],
  ['h', 3_600],
  ['m', 60]
]

/** Renders a duration as `1d 2h 3m 4s`, dropping leading zero units. */
export function formatDuration(ms: number): string {
  let seconds = Math.max(0, Math.floor(ms / 1000))
  const parts: string[] = []
  for (const [label, size] of UNITS) {
    const count = Math.floor(seconds / size)
    seconds -= count * size
    if (count > 0 || parts.length > 0) parts.push(`${count}${label}`)
  }
  parts.push(`${seconds}s`)
  return parts.join(' ')
}

export interface StatsDependencies {
  registry: CommandRegistry
  roles: RoleResolver
  /** Number of invocations currently running. */
  liveInvocations: () => number
  startedAt: Date
  prefixes: CommandPrefixes
  respond: Responder
  now?: () => number
}

export function buildStatsText(deps: Omit<StatsDependencies, 'respond' | 'prefixes'>): string {
  const now = deps.now ?? Date.now
  const loaded = deps.registry.loaded()
  const failures = deps.registry.failures()
  const lines = [
    '📊 Bot status',
    `Uptime: ${formatDuration(now() - deps.startedAt.getTime())}`,
    `Extensions loaded: ${loaded.length}${loaded.length > 0 ? ` (${loaded.join(', ')})` : ''}`,
    `Extensions failed: ${failures.size}`,
    ...[...failures].map(([id, error]) => `  ${id}: ${error.message}`),
    `Extension commands: ${deps.registry.routes().length}`,
    `Cached admin lists: ${deps.roles.cachedChats}`,
    `Running commands: ${deps.liveInvocations()}`
  ]
  return lines.join('\n')
}

/**
 * .stats
 * Reports uptime, extension health and cache sizes.
 */
export function statsCommand(deps: StatsDependencies): CommandDefinition {
  const prefix = deps.prefixes.developer
  return {
    name: `${prefix}stats`,
    aliases: [`${prefix}status`],
    description: 'Show runtime status',
    async handle(message) {
      await deps.respond(message, buildStatsText(deps))
    }
  }
}
