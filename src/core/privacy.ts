import type { Transport } from '../channels/base.js'
import { parseCommand } from '../commands/names.js'
import { errorFields, type InboundMessage, type Logger, type SentMessage } from './types.js'

/**
 * Decides whether an answer should leave the group and go to the sender.
 */
export interface PrivacyPolicy {
  shouldAnswerPrivately(message: InboundMessage): boolean
}

export interface SilentModeOptions {
  privateCommands: string[]
  silentChatIds: string[]
}

/**
 * Answers privately in silent chats and for commands whose output should
 * not be posted to the group. Silent chats can be toggled at runtime.
 */
export class SilentModePolicy implements PrivacyPolicy {
  private readonly privateCommands: ReadonlySet<string>
  private readonly silentChats: Set<string>

  constructor(options: SilentModeOptions) {
    this.privateCommands = new Set(options.privateCommands.map((name) => parseCommand(name).name))
    this.silentChats = new Set(options.silentChatIds)
  }

  shouldAnswerPrivately(message: InboundMessage): boolean {
    if (message.isPrivate || this.silentChats.has(message.chatId)) return true
    return this.privateCommands.has(parseCommand(message.content).name)
  }

  isSilent(chatId: string): boolean {
    return this.silentChats.has(chatId)
  }

  setSilent(chatId: string, silent: boolean): void {
    if (silent) {
      this.silentChats.add(chatId)
    } else {
      this.silentChats.delete(chatId)
    }
  }
}

/**
 * Delivers `text` as the policy asks. A private answer to a group message
 * also removes the triggering message; when the sender cannot be reached
 * privately the answer falls back to a reply in the chat.
 */
export async function deliver(
  transport: Transport,
  policy: PrivacyPolicy | null,
  message: InboundMessage,
  text: string,
  logger: Logger
): Promise<SentMessage> {
  if (message.isPrivate || !policy?.shouldAnswerPrivately(message)) {
    return transport.reply(message, text)
  }

  let sent: SentMessage
  try {
    sent = await transport.send(message.senderId, text)
  } catch (error) {
    logger.warn('privacy.private_send_failed', {
      userId: message.senderId,
      chatId: message.chatId,
      ...errorFields(error)
    })
    return transport.reply(message, text)
  }

  try {
    await transport.deleteMessage({ chatId: message.chatId, messageId: message.messageId })
  } catch (error) {
    logger.debug('privacy.delete_failed', {
      chatId: message.chatId,
      messageId: message.messageId,
      ...errorFields(error)
    })
  }
  return sent
}
