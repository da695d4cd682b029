import type { InboundMessage, SentMessage } from '../core/types.js'

/**
 * Chat transport operations the core relies on.
 *
 * Every method may reject; callers decide whether a failure is fatal to
 * their operation.
 */
export interface Transport {
  /** User ids of the chat's current administrators (creator included). */
  getChatAdministrators(chatId: string): Promise<string[]>
  /** Replies to an inbound message in its own chat. */
  reply(message: InboundMessage, text: string): Promise<SentMessage>
  /** Replaces the text of a message the bot sent earlier. */
  edit(target: SentMessage, text: string): Promise<void>
  /** Sends a new message to a chat or, given a user id, privately. */
  send(chatId: string, text: string): Promise<SentMessage>
  deleteMessage(target: SentMessage): Promise<void>
}

/**
 * Transport adapter with a lifecycle of its own.
 */
export interface Channel extends Transport {
  start(): Promise<void>
  stop(): Promise<void>
}
