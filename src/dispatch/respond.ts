import type { Transport } from '../channels/base.js'
import { deliver, type PrivacyPolicy } from '../core/privacy.js'
import { errorFields, type InboundMessage, type Logger, type SentMessage } from '../core/types.js'
import type { StatusClaim } from './context-store.js'

export type Responder = (message: InboundMessage, text: string) => Promise<SentMessage>

/**
 * Builds the reply helper handed to commands. The acknowledgement
 * placeholder becomes the first answer when there is one and later answers
 * are sent as replies; answers the privacy
 * policy keeps out of the group go to the sender and the placeholder is
 * removed.
 */
export function createResponder(
  transport: Transport,
  contexts: StatusClaim,
  logger: Logger,
  privacy: PrivacyPolicy | null = null
): Responder {
  const discard = async (placeholder: SentMessage): Promise<void> => {
    try {
      await transport.deleteMessage(placeholder)
    } catch (error) {
      logger.debug('dispatch.placeholder_delete_failed', {
        chatId: placeholder.chatId,
        ...errorFields(error)
      })
    }
  }

  return async (message, text) => {
    const status = contexts.takeStatus(message)
    if (status) await status.stop()

    if (!message.isPrivate && privacy?.shouldAnswerPrivately(message)) {
      if (status) await discard(status.message)
      return deliver(transport, privacy, message, text, logger)
    }

    if (!status) return transport.reply(message, text)
    try {
      await transport.edit(status.message, text)
      return status.message
    } catch (error) {
      logger.warn('dispatch.placeholder_edit_failed', {
        chatId: message.chatId,
        messageId: message.messageId,
        ...errorFields(error)
      })
      return transport.reply(message, text)
    }
  }
}
