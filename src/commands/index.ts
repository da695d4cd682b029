export { CommandRegistry, ExtensionLoadError } from './registry.js'
export type { CommandRegistryOptions } from './registry.js'
export { StaticRouteTable } from './routes.js'
export { normalizeCommandName, parseCommand } from './names.js'
export type { ParsedCommand } from './names.js'
export { moduleIdFromFile, scanExtensionDir } from './discovery.js'
export type {
  CommandDefinition,
  CommandHandler,
  CommandRoute,
  ExtensionContext,
  ExtensionHandler,
  LoadResult
} from './types.js'
export * from './definitions/index.js'
