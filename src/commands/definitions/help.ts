import type { CommandTier, RoleResolver } from '../../auth/role-resolver.js'
import type { CommandPrefixes } from '../../config/schema.js'
import type { Responder } from '../../dispatch/respond.js'
import type { CommandRegistry } from '../registry.js'
import type { StaticRouteTable } from '../routes.js'
import type { CommandDefinition } from '../types.js'

const SECTIONS: Array<{ tier: Exclude<CommandTier, 'none'>; heading: string }> = [
  { tier: 'public', heading: 'Public commands' },
  { tier: 'admin', heading: 'Admin commands' },
  { tier: 'developer', heading: 'Developer commands' }
]

export interface HelpDependencies {
  routes: StaticRouteTable
  registry: CommandRegistry
  roles: RoleResolver
  prefixes: CommandPrefixes
  respond: Responder
}

const byName = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0)

/** Lists every routable command, grouped by the tier its prefix selects. */
export function buildHelpText({
  routes,
  registry,
  roles
}: Pick<HelpDependencies, 'routes' | 'registry' | 'roles'>): string {
  const entries = new Map<string, string>()
  for (const definition of routes.all()) {
    const aliases = definition.aliases?.length ? ` (${definition.aliases.join(', ')})` : ''
    entries.set(definition.name, `${definition.usage ?? definition.name}${aliases}: ${definition.description}`)
  }
  for (const route of registry.routes()) {
    if (routes.has(route.normalizedName)) continue
    entries.set(route.normalizedName, `${route.normalizedName} [${route.ownerId}]`)
  }

  const sections: string[] = []
  for (const { tier, heading } of SECTIONS) {
    const lines = [...entries]
      .filter(([name]) => roles.classifyCommandPrefix(name) === tier)
      .sort(([a], [b]) => byName(a, b))
      .map(([, line]) => `  ${line}`)
    if (lines.length > 0) sections.push(`${heading}:\n${lines.join('\n')}`)
  }
  return sections.length > 0 ? sections.join('\n\n') : 'No commands are available.'
}

/**
 * #help
 * Lists available commands.
 */
export function helpCommand(deps: HelpDependencies): CommandDefinition {
  const prefix = deps.prefixes.public
  return {
    name: `${prefix}help`,
    aliases: [`${prefix}commands`],
    description: 'Show available commands',
    async handle(message) {
      await deps.respond(message, buildHelpText(deps))
    }
  }
}
