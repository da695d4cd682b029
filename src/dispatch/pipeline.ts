import type { CommandTier, RoleResolver } from '../auth/role-resolver.js'
import type { Transport } from '../channels/base.js'
import { parseCommand, type ParsedCommand } from '../commands/names.js'
import type { CommandRegistry } from '../commands/registry.js'
import type { StaticRouteTable } from '../commands/routes.js'
import type { OperationalLog } from '../core/ops-log.js'
import { deliver, type PrivacyPolicy } from '../core/privacy.js'
import { errorFields, toError, type InboundMessage, type Logger } from '../core/types.js'
import type { Acknowledger, StatusHandle } from './acknowledger.js'
import type { InvocationContextStore } from './context-store.js'

/** Terminal state of one dispatched message. */
export type DispatchOutcome =
  | { state: 'ignored' }
  | { state: 'denied'; command: string; tier: CommandTier }
  | { state: 'unknown'; command: string }
  | { state: 'completed'; command: string; elapsedMs: number }
  | { state: 'failed'; command: string; elapsedMs: number; error: Error }

export interface DispatchPipelineDeps {
  transport: Transport
  roles: RoleResolver
  registry: CommandRegistry
  routes: StaticRouteTable
  contexts: InvocationContextStore
  opsLog: OperationalLog
  logger: Logger
  /** Null disables the processing placeholder. */
  acknowledger?: Acknowledger | null
  /** Null answers every denial in the chat. */
  privacy?: PrivacyPolicy | null
}

/** A prefix followed by at least one letter or digit. */
const COMMAND_TOKEN = /^.[\p{L}\p{N}]/u

/**
 * Runs one inbound message through classify, authorize, acknowledge,
 * execute and finalize. `handle` never rejects.
 */
export class DispatchPipeline {
  constructor(private readonly deps: DispatchPipelineDeps) {}

  async handle(message: InboundMessage): Promise<DispatchOutcome> {
    const { roles, transport, contexts, logger } = this.deps
    const tier = roles.classifyCommandPrefix(message.content)
    const command = parseCommand(message.content)
    if (tier === 'none' || !COMMAND_TOKEN.test(command.name)) return { state: 'ignored' }

    const authorized = await roles.authorize(transport, message.senderId, message.chatId, message.content)
    if (!authorized) return this.deny(message, command, tier)

    if (!contexts.open(message)) {
      logger.debug('dispatch.duplicate', { chatId: message.chatId, messageId: message.messageId })
      return { state: 'ignored' }
    }
    try {
      return await this.execute(message, command)
    } finally {
      contexts.close(message)
    }
  }

  private async execute(message: InboundMessage, command: ParsedCommand): Promise<DispatchOutcome> {
    const { routes, registry, contexts, acknowledger, logger } = this.deps
    const definition = routes.get(command.name)
    if (!definition && !registry.isHandled(command.name)) {
      logger.debug('dispatch.unknown_command', { command: command.name, chatId: message.chatId })
      await this.reply(message, `❓ Unknown command: ${command.name}`)
      return { state: 'unknown', command: command.name }
    }

    let status: StatusHandle | null = null
    if (acknowledger) {
      status = await acknowledger.start(message)
      if (status) contexts.attachStatus(message, status)
    }

    const startedAt = Date.now()
    try {
      if (definition) {
        await definition.handle(message, command.args)
      } else {
        await registry.dispatch(command.name, message, command.args)
      }
      const elapsedMs = Date.now() - startedAt
      logger.info('dispatch.completed', { command: command.name, chatId: message.chatId, elapsedMs })
      await this.discardPlaceholder(message)
      await this.record(message, true, elapsedMs)
      return { state: 'completed', command: command.name, elapsedMs }
    } catch (fault) {
      const error = toError(fault)
      const elapsedMs = Date.now() - startedAt
      logger.error('dispatch.handler_failed', {
        command: command.name,
        chatId: message.chatId,
        messageId: message.messageId,
        userId: message.senderId,
        elapsedMs,
        ...errorFields(error)
      })
      await this.reportFault(message, command, error)
      await this.showFailure(message, contexts.takeStatus(message), command, error)
      await this.record(message, false, elapsedMs, error.message)
      return { state: 'failed', command: command.name, elapsedMs, error }
    } finally {
      await status?.stop()
    }
  }

  private async deny(
    message: InboundMessage,
    command: ParsedCommand,
    tier: CommandTier
  ): Promise<DispatchOutcome> {
    const { roles, transport, privacy, logger } = this.deps
    logger.warn('dispatch.denied', {
      command: command.name,
      tier,
      userId: message.senderId,
      chatId: message.chatId
    })
    try {
      await deliver(transport, privacy ?? null, message, roles.denialMessage(tier), logger)
    } catch (error) {
      logger.warn('dispatch.denial_failed', { chatId: message.chatId, ...errorFields(error) })
    }
    await this.record(message, false, 0, 'permission denied')
    return { state: 'denied', command: command.name, tier }
  }

  private async showFailure(
    message: InboundMessage,
    status: StatusHandle | null,
    command: ParsedCommand,
    error: Error
  ): Promise<void> {
    const text = `❌ ${command.name} failed: ${error.message}`
    if (status) {
      await status.stop()
      try {
        await this.deps.transport.edit(status.message, text)
        return
      } catch (editError) {
        this.deps.logger.warn('dispatch.placeholder_edit_failed', {
          chatId: message.chatId,
          ...errorFields(editError)
        })
      }
    }
    await this.reply(message, text)
  }

  /** Removes a placeholder the handler never answered through. */
  private async discardPlaceholder(message: InboundMessage): Promise<void> {
    const status = this.deps.contexts.takeStatus(message)
    if (!status) return
    await status.stop()
    try {
      await this.deps.transport.deleteMessage(status.message)
    } catch (error) {
      this.deps.logger.warn('dispatch.placeholder_delete_failed', {
        chatId: message.chatId,
        ...errorFields(error)
      })
    }
  }

  private async reply(message: InboundMessage, text: string): Promise<void> {
    try {
      await this.deps.transport.reply(message, text)
    } catch (error) {
      this.deps.logger.warn('dispatch.reply_failed', { chatId: message.chatId, ...errorFields(error) })
    }
  }

  private async record(
    message: InboundMessage,
    success: boolean,
    elapsedMs: number,
    error?: string
  ): Promise<void> {
    try {
      await this.deps.opsLog.recordCommand(message.senderId, message.content, success, elapsedMs, error)
    } catch (logError) {
      this.deps.logger.warn('dispatch.record_failed', errorFields(logError))
    }
  }

  private async reportFault(message: InboundMessage, command: ParsedCommand, error: Error): Promise<void> {
    const where = `${command.name} in chat ${message.chatId}`
    try {
      await this.deps.opsLog.recordFault(error, where, message.senderId)
    } catch (logError) {
      this.deps.logger.warn('dispatch.record_failed', errorFields(logError))
    }
  }
}
