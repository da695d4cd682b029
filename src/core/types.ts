/**
 * Normalized inbound text message emitted by the transport.
 */
export interface InboundMessage {
  chatId: string
  /** Transport message id; only unique within its chat. */
  messageId: string
  senderId: string
  content: string
  /** True for one-to-one chats with the bot. */
  isPrivate: boolean
  timestamp: string
}

/**
 * Handle to a message the bot itself sent, used for later edits and deletes.
 */
export interface SentMessage {
  chatId: string
  messageId: string
}

/**
 * Minimal structured logger interface used across modules.
 */
export interface Logger {
  debug(event: string, data?: Record<string, unknown>): void
  info(event: string, data?: Record<string, unknown>): void
  warn(event: string, data?: Record<string, unknown>): void
  error(event: string, data?: Record<string, unknown>): void
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

/** Normalizes anything thrown into an `Error`. */
export function toError(value: unknown): Error {
  if (value instanceof Error) return value
  if (typeof value === 'string') return new Error(value)
  try {
    return new Error(JSON.stringify(value) ?? String(value))
  } catch {
    // circular structures and bigints
    return new Error(String(value))
  }
}

/** Builds the conventional log fields for an error. */
export function errorFields(value: unknown): Record<string, unknown> {
  const error = toError(value)
  return { error: error.message, errorName: error.name }
}
