import { ROLE_LABELS } from '../auth/role-resolver.js'
import type { CommandHandler, ExtensionContext } from '../commands/types.js'
import type { InboundMessage } from '../core/types.js'

async function showRole(context: ExtensionContext, message: InboundMessage): Promise<void> {
  const role = await context.roles.resolveRole(context.transport, message.senderId, message.chatId)
  await context.respond(message, `👤 Your role here: ${ROLE_LABELS[role]}\nUser ID: ${message.senderId}`)
}

async function refreshRole(context: ExtensionContext, message: InboundMessage): Promise<void> {
  context.roles.invalidate(message.chatId)
  const role = await context.roles.resolveRole(context.transport, message.senderId, message.chatId)
  await context.respond(message, `🔄 Admin list refreshed. Your role: ${ROLE_LABELS[role]}`)
}

async function listDevelopers(context: ExtensionContext, message: InboundMessage): Promise<void> {
  const { ownerId, developerIds } = context.config.auth
  const lines = [`👑 ${ROLE_LABELS.owner}: ${ownerId || '(not set)'}`, `🛠 ${ROLE_LABELS.developer}s:`]
  lines.push(...(developerIds.length > 0 ? developerIds.map((id) => `  ${id}`) : ['  (none)']))
  await context.respond(message, lines.join('\n'))
}

async function clearCache(context: ExtensionContext, message: InboundMessage, args: string[]): Promise<void> {
  if (args[0]?.toLowerCase() === 'all') {
    context.roles.invalidate()
    await context.respond(message, '🧹 Cleared cached admin lists for all chats.')
    return
  }
  context.roles.invalidate(message.chatId)
  await context.respond(message, '🧹 Cleared cached admin list for this chat.')
}

/**
 * Registers the role commands under the configured prefixes. Names already
 * owned by an earlier extension are left to it.
 */
export function setup(context: ExtensionContext): void {
  const { developer, admin, public: open } = context.config.prefixes
  const handlers: Array<[string, CommandHandler]> = [
    [`${open}role`, (message) => showRole(context, message)],
    [`${open}whoami`, (message) => showRole(context, message)],
    [`${admin}refreshrole`, (message) => refreshRole(context, message)],
    [`${developer}listdevs`, (message) => listDevelopers(context, message)],
    [`${developer}clearcache`, (message, args) => clearCache(context, message, args)]
  ]

  for (const [name, handler] of handlers) {
    if (context.registry.isHandled(name)) {
      context.logger.info('extension.roles.deferred', { name })
      continue
    }
    context.registry.registerHandler(name, handler, 'roles')
  }
}
