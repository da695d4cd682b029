import { z } from 'zod/v4'

import type { TiergateConfig } from '../config/schema.js'
import type { MessageBus } from '../core/bus.js'
import { retry } from '../core/retry.js'
import { clampText } from '../core/text.js'
import { errorFields, type InboundMessage, type Logger, type SentMessage } from '../core/types.js'
import type { Channel } from './base.js'

const SEND_RETRY_ATTEMPTS = 2
const SEND_RETRY_BACKOFF_MS = 50
const POLL_ERROR_DELAY_MS = 1000

const envelopeSchema = z.object({
  ok: z.boolean(),
  result: z.unknown().optional(),
  description: z.string().optional()
})

const sentMessageSchema = z.object({
  message_id: z.number(),
  chat: z.object({ id: z.number() })
})

const chatMemberSchema = z.object({
  status: z.string(),
  user: z.object({ id: z.number() })
})

const messageSchema = z.object({
  message_id: z.number(),
  date: z.number(),
  text: z.string().optional(),
  chat: z.object({ id: z.number(), type: z.string() }),
  from: z.object({ id: z.number(), is_bot: z.boolean().optional() }).optional()
})

const updateSchema = z.object({
  update_id: z.number(),
  message: z.unknown().optional()
})

export type TelegramUpdate = z.infer<typeof updateSchema>

/**
 * Raised when the Bot API answers with a non-2xx status or `ok: false`.
 */
export class TelegramApiError extends Error {
  constructor(
    readonly method: string,
    readonly status: number,
    description: string
  ) {
    super(`telegram ${method} failed (${status}): ${description}`)
    this.name = 'TelegramApiError'
  }
}

/**
 * Telegram adapter using Bot API long polling.
 */
export class TelegramChannel implements Channel {
  private running = false
  private pollTask: Promise<void> | null = null
  private nextOffset = 0

  constructor(
    private readonly config: TiergateConfig,
    private readonly bus: MessageBus,
    private readonly logger: Logger
  ) {}

  /** Starts background polling. */
  async start(): Promise<void> {
    if (!this.config.telegram.token) {
      this.logger.warn('channel.telegram.misconfigured', { reason: 'missing token' })
      return
    }

    this.running = true
    this.pollTask = this.pollLoop()
    this.logger.info('channel.telegram.start')
  }

  /** Stops polling and waits for loop completion. */
  async stop(): Promise<void> {
    this.running = false
    await this.pollTask
    this.pollTask = null
    this.logger.info('channel.telegram.stop')
  }

  async getChatAdministrators(chatId: string): Promise<string[]> {
    const result = await this.call('getChatAdministrators', { chat_id: Number(chatId) })
    const members = z.array(chatMemberSchema).parse(result)
    return members.map((member) => String(member.user.id))
  }

  async reply(message: InboundMessage, text: string): Promise<SentMessage> {
    return this.sendMessage({
      chat_id: Number(message.chatId),
      text: clampText(text),
      reply_to_message_id: Number(message.messageId),
      allow_sending_without_reply: true
    })
  }

  async send(chatId: string, text: string): Promise<SentMessage> {
    return this.sendMessage({ chat_id: Number(chatId), text: clampText(text) })
  }

  async edit(target: SentMessage, text: string): Promise<void> {
    await this.call('editMessageText', {
      chat_id: Number(target.chatId),
      message_id: Number(target.messageId),
      text: clampText(text)
    })
  }

  async deleteMessage(target: SentMessage): Promise<void> {
    await this.call('deleteMessage', {
      chat_id: Number(target.chatId),
      message_id: Number(target.messageId)
    })
  }

  /**
   * Converts one polled update into an inbound message and publishes it.
   * Updates without text, without a sender, or sent by bots are dropped.
   */
  async handleUpdate(update: TelegramUpdate): Promise<void> {
    if (update.message === undefined) return
    const parsed = messageSchema.safeParse(update.message)
    if (!parsed.success) {
      this.logger.warn('channel.telegram.malformed_message', { updateId: update.update_id })
      return
    }

    const message = parsed.data
    if (!message.from || message.from.is_bot) return
    const content = message.text?.trim()
    if (!content) return

    const inbound: InboundMessage = {
      chatId: String(message.chat.id),
      messageId: String(message.message_id),
      senderId: String(message.from.id),
      content,
      isPrivate: message.chat.type === 'private',
      timestamp: new Date(message.date * 1000).toISOString()
    }

    await this.bus.publishInbound(inbound)
  }

  private async sendMessage(body: Record<string, unknown>): Promise<SentMessage> {
    const result = await retry(() => this.call('sendMessage', body), {
      attempts: SEND_RETRY_ATTEMPTS,
      backoffMs: SEND_RETRY_BACKOFF_MS,
      onRetry: (error, attempt) =>
        this.logger.warn('channel.telegram.send_retry', { attempt, ...errorFields(error) })
    })
    const sent = sentMessageSchema.parse(result)
    return { chatId: String(sent.chat.id), messageId: String(sent.message_id) }
  }

  private async pollLoop(): Promise<void> {
    while (this.running) {
      try {
        const updates = await this.getUpdates()
        for (const update of updates) {
          this.nextOffset = Math.max(this.nextOffset, update.update_id + 1)
          await this.handleUpdate(update)
        }
      } catch (error) {
        this.logger.error('channel.telegram.poll_error', errorFields(error))
        await new Promise((resolve) => setTimeout(resolve, POLL_ERROR_DELAY_MS))
      }
    }
  }

  private async getUpdates(): Promise<TelegramUpdate[]> {
    const result = await this.call('getUpdates', {
      offset: this.nextOffset,
      timeout: this.config.telegram.pollTimeoutSec,
      allowed_updates: ['message']
    })
    return z.array(updateSchema).parse(result)
  }

  private async call(method: string, body: Record<string, unknown>): Promise<unknown> {
    const url = `https://api.telegram.org/bot${this.config.telegram.token}/${method}`
    const response = await fetch(url, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify(body)
    })

    if (!response.ok) {
      throw new TelegramApiError(method, response.status, await response.text())
    }

    const envelope = envelopeSchema.parse(await response.json())
    if (!envelope.ok) {
      throw new TelegramApiError(method, response.status, envelope.description ?? 'unknown error')
    }
    return envelope.result
  }
}
