import type { Transport } from '../channels/base.js'
import { clampText } from './text.js'
import { errorFields, toError, type Logger } from './types.js'

const REPORT_LIMIT = 4000

/**
 * Operational record of command executions and handler faults.
 */
export interface OperationalLog {
  recordCommand(
    userId: string,
    commandText: string,
    success: boolean,
    elapsedMs: number,
    error?: string
  ): Promise<void>
  /** Records a handler fault; never rejects. */
  recordFault(fault: unknown, context: string, userId: string): Promise<void>
}

/** Plain-text fault report as forwarded to the log chat. */
export function formatFaultReport(fault: unknown, context: string, userId: string): string {
  const error = toError(fault)
  const lines = [
    '🚨 Command fault',
    `Context: ${context}`,
    `User ID: ${userId}`,
    `Error type: ${error.name}`,
    `Error message: ${error.message}`
  ]
  if (error.stack) lines.push('', error.stack)
  return clampText(lines.join('\n'), REPORT_LIMIT)
}

export interface ChatOperationalLogOptions {
  /** Chat receiving fault reports; reports stay in the logger when unset. */
  logChatId?: string | undefined
  transport?: Transport | undefined
}

/**
 * Writes command records to the structured logger and forwards fault
 * reports to the configured log chat.
 */
export class ChatOperationalLog implements OperationalLog {
  constructor(
    private readonly logger: Logger,
    private readonly options: ChatOperationalLogOptions = {}
  ) {}

  async recordCommand(
    userId: string,
    commandText: string,
    success: boolean,
    elapsedMs: number,
    error?: string
  ): Promise<void> {
    const data = { userId, command: commandText, elapsedMs: Math.round(elapsedMs) }
    if (success) {
      this.logger.info('command.executed', data)
    } else {
      this.logger.warn('command.failed', { ...data, error: error ?? 'unknown' })
    }
  }

  async recordFault(fault: unknown, context: string, userId: string): Promise<void> {
    const error = toError(fault)
    this.logger.error('command.fault', { context, userId, ...errorFields(error), stack: error.stack })

    const { logChatId, transport } = this.options
    if (!logChatId || !transport) return
    try {
      await transport.send(logChatId, formatFaultReport(error, context, userId))
    } catch (sendError) {
      this.logger.warn('ops_log.forward_failed', { logChatId, ...errorFields(sendError) })
    }
  }
}
