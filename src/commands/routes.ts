import { normalizeCommandName } from './names.js'
import type { CommandDefinition } from './types.js'

/**
 * Built-in commands, consulted by the dispatch pipeline before the
 * extension registry. Aliases resolve to their primary definition.
 */
export class StaticRouteTable {
  private readonly definitions = new Map<string, CommandDefinition>()
  private readonly aliasMap = new Map<string, string>()

  /**
   * Adds a definition. Throws when its name or an alias is already taken,
   * since built-ins are fixed at startup.
   */
  register(definition: CommandDefinition): void {
    const key = normalizeCommandName(definition.name)
    const aliases = (definition.aliases ?? []).map(normalizeCommandName)
    for (const name of [key, ...aliases]) {
      if (this.has(name)) throw new Error(`Command "${name}" is already registered`)
    }

    this.definitions.set(key, definition)
    for (const alias of aliases) this.aliasMap.set(alias, key)
  }

  get(name: string): CommandDefinition | undefined {
    const key = normalizeCommandName(name)
    const primary = this.definitions.get(key)
    if (primary) return primary
    const target = this.aliasMap.get(key)
    return target === undefined ? undefined : this.definitions.get(target)
  }

  has(name: string): boolean {
    return this.get(name) !== undefined
  }

  /** Primary definitions in registration order. */
  all(): CommandDefinition[] {
    return [...this.definitions.values()]
  }
}
