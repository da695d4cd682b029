import type { InboundMessage } from '../core/types.js'
import type { StatusHandle } from './acknowledger.js'

/**
 * Per-invocation state, alive from authorization until the handler settles.
 */
export interface InvocationContext {
  readonly key: string
  readonly chatId: string
  readonly messageId: string
  readonly startedAt: Date
  /** Acknowledgement placeholder, when one was sent. */
  status: StatusHandle | null
}

type MessageRef = Pick<InboundMessage, 'chatId' | 'messageId'>

/** Telegram message ids repeat across chats, so keys carry both. */
export function messageKey(message: MessageRef): string {
  return `${message.chatId}:${message.messageId}`
}

/** Read-only view handed to command handlers. */
export interface InvocationContextReader {
  get(message: MessageRef): Readonly<InvocationContext> | undefined
}

/** Hands out a context's acknowledgement placeholder once. */
export interface StatusClaim {
  takeStatus(message: MessageRef): StatusHandle | null
}

/**
 * Live invocation contexts keyed by message. Only the dispatch pipeline
 * opens and closes entries.
 */
export class InvocationContextStore implements InvocationContextReader, StatusClaim {
  private readonly live = new Map<string, InvocationContext>()

  /**
   * Opens the context for a message. Returns null when that message already
   * has a live context, so a redelivered update cannot replace it.
   */
  open(message: MessageRef, startedAt = new Date()): InvocationContext | null {
    const key = messageKey(message)
    if (this.live.has(key)) return null
    const context: InvocationContext = {
      key,
      chatId: message.chatId,
      messageId: message.messageId,
      startedAt,
      status: null
    }
    this.live.set(key, context)
    return context
  }

  get(message: MessageRef): InvocationContext | undefined {
    return this.live.get(messageKey(message))
  }

  has(message: MessageRef): boolean {
    return this.live.has(messageKey(message))
  }

  attachStatus(message: MessageRef, status: StatusHandle): void {
    const context = this.live.get(messageKey(message))
    if (context) context.status = status
  }

  /**
   * Detaches the acknowledgement handle so the placeholder is used for at
   * most one answer.
   */
  takeStatus(message: MessageRef): StatusHandle | null {
    const context = this.live.get(messageKey(message))
    if (!context) return null
    const { status } = context
    context.status = null
    return status
  }

  /** Removes the entry. Returns false when nothing was open. */
  close(message: MessageRef): boolean {
    return this.live.delete(messageKey(message))
  }

  get size(): number {
    return this.live.size
  }
}
