import type { RoleResolver } from '../auth/role-resolver.js'
import type { Transport } from '../channels/base.js'
import type { TiergateConfig } from '../config/schema.js'
import type { InboundMessage, Logger, SentMessage } from '../core/types.js'
import type { InvocationContextReader } from '../dispatch/context-store.js'
import type { CommandRegistry } from './registry.js'

/**
 * Runs one command invocation. Replies are the handler's own business;
 * throwing marks the invocation as failed.
 */
export type CommandHandler = (message: InboundMessage, args: string[]) => Promise<void> | void

/**
 * Handler exported by an extension module; the registry binds the shared
 * context when it claims the extension's names.
 */
export type ExtensionHandler = (
  message: InboundMessage,
  args: string[],
  context: ExtensionContext
) => Promise<void> | void

/**
 * Ownership record for one normalized command name.
 */
export interface CommandRoute {
  /** Lower-cased token including its prefix, e.g. `/play`. */
  normalizedName: string
  /** Extension id, or the owner label given to `registerHandler`. */
  ownerId: string
  handler: CommandHandler
}

/**
 * Built-in command served from the static route table.
 */
export interface CommandDefinition {
  /** Full command token including prefix, e.g. `#help`. */
  name: string
  aliases?: string[]
  description: string
  usage?: string
  handle: CommandHandler
}

/**
 * Shared application handle passed to extension `setup()` functions.
 */
export interface ExtensionContext {
  config: TiergateConfig
  logger: Logger
  transport: Transport
  roles: RoleResolver
  registry: CommandRegistry
  contexts: InvocationContextReader
  startedAt: Date
  /**
   * Answers `message`, reusing the acknowledgement placeholder when the
   * invocation has one.
   */
  respond(message: InboundMessage, text: string): Promise<SentMessage>
}

/**
 * Outcome of loading one extension.
 */
export type LoadResult =
  | { status: 'loaded'; id: string; commands: string[]; rejected: string[] }
  | { status: 'failed'; id: string; error: Error }
