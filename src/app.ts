import { fileURLToPath } from 'node:url'

import { RoleResolver } from './auth/role-resolver.js'
import type { Transport } from './channels/base.js'
import { helpCommand, statsCommand } from './commands/definitions/index.js'
import { CommandRegistry } from './commands/registry.js'
import { StaticRouteTable } from './commands/routes.js'
import type { ExtensionContext, LoadResult } from './commands/types.js'
import type { TiergateConfig } from './config/schema.js'
import type { MessageBus } from './core/bus.js'
import { ChatOperationalLog, type OperationalLog } from './core/ops-log.js'
import { SilentModePolicy } from './core/privacy.js'
import { errorFields, type Logger } from './core/types.js'
import { Acknowledger } from './dispatch/acknowledger.js'
import { InvocationContextStore } from './dispatch/context-store.js'
import { DispatchPipeline } from './dispatch/pipeline.js'
import { createResponder } from './dispatch/respond.js'

/** Bundled extensions shipped beside this module. */
export const DEFAULT_EXTENSIONS_DIR = fileURLToPath(new URL('./extensions/', import.meta.url))

export interface BotOptions {
  config: TiergateConfig
  transport: Transport
  logger: Logger
  /** Replaces the logger-backed operational log. */
  opsLog?: OperationalLog
  startedAt?: Date
}

export interface Bot {
  context: ExtensionContext
  pipeline: DispatchPipeline
  registry: CommandRegistry
  routes: StaticRouteTable
  roles: RoleResolver
  contexts: InvocationContextStore
  privacy: SilentModePolicy | null
  /** Loads every extension, then seals the registry. */
  loadExtensions(): Promise<LoadResult[]>
}

/**
 * Wires the resolver, registry, built-in routes and dispatch pipeline
 * around one transport.
 */
export function createBot(options: BotOptions): Bot {
  const { config, transport, logger } = options

  const roles = new RoleResolver({ auth: config.auth, prefixes: config.prefixes }, logger)
  const contexts = new InvocationContextStore()
  const registry = new CommandRegistry(
    {
      extensionsDir: config.extensions.dir ?? DEFAULT_EXTENSIONS_DIR,
      enabled: config.extensions.enabled,
      disabled: config.extensions.disabled
    },
    logger
  )
  const routes = new StaticRouteTable()
  const privacy = config.privacy.enabled ? new SilentModePolicy(config.privacy) : null
  const respond = createResponder(transport, contexts, logger, privacy)
  const startedAt = options.startedAt ?? new Date()

  routes.register(helpCommand({ routes, registry, roles, prefixes: config.prefixes, respond }))
  routes.register(
    statsCommand({
      registry,
      roles,
      liveInvocations: () => contexts.size,
      startedAt,
      prefixes: config.prefixes,
      respond
    })
  )

  const pipeline = new DispatchPipeline({
    transport,
    roles,
    registry,
    routes,
    contexts,
    logger,
    opsLog: options.opsLog ?? new ChatOperationalLog(logger, { transport, logChatId: config.logChatId }),
    acknowledger: config.acknowledgement.enabled
      ? new Acknowledger(transport, config.acknowledgement, logger)
      : null,
    privacy
  })

  const context: ExtensionContext = {
    config,
    logger,
    transport,
    roles,
    registry,
    contexts,
    startedAt,
    respond
  }

  return {
    context,
    pipeline,
    registry,
    routes,
    roles,
    contexts,
    privacy,
    async loadExtensions() {
      const results = await registry.loadAll(context)
      registry.seal()
      for (const route of registry.routes()) {
        if (routes.has(route.normalizedName)) {
          logger.warn('registry.route_shadowed', { name: route.normalizedName, owner: route.ownerId })
        }
      }
      return results
    }
  }
}

/**
 * Starts dispatch of each inbound message in arrival order without waiting
 * for earlier ones to finish. Resolves once the bus is closed and every
 * started dispatch has settled.
 */
export async function runDispatchLoop(
  bus: MessageBus,
  pipeline: DispatchPipeline,
  logger: Logger
): Promise<void> {
  const running = new Set<Promise<void>>()

  for (;;) {
    const message = await bus.consumeInbound()
    if (!message) break

    const task = pipeline
      .handle(message)
      .then((outcome) => {
        logger.debug('dispatch.outcome', {
          chatId: message.chatId,
          messageId: message.messageId,
          state: outcome.state
        })
      })
      .catch((error: unknown) => {
        logger.error('dispatch.unhandled', { chatId: message.chatId, ...errorFields(error) })
      })
      .finally(() => running.delete(task))
    running.add(task)
  }

  await Promise.allSettled(running)
}
