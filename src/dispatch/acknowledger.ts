import type { Transport } from '../channels/base.js'
import { errorFields, type InboundMessage, type Logger, type SentMessage } from '../core/types.js'

/**
 * Live acknowledgement placeholder for one invocation.
 */
export interface StatusHandle {
  readonly message: SentMessage
  /** Cancels the remaining frames and waits for an in-progress edit. */
  stop(): Promise<void>
}

export interface AcknowledgerOptions {
  frames: string[]
  intervalMs: number
}

/** Resolves after `ms`, or as soon as `signal` aborts. */
function wait(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve()
      return
    }
    const done = (): void => {
      clearTimeout(timer)
      signal.removeEventListener('abort', done)
      resolve()
    }
    const timer = setTimeout(done, ms)
    signal.addEventListener('abort', done, { once: true })
  })
}

class FrameLoop implements StatusHandle {
  private readonly controller = new AbortController()
  private readonly finished: Promise<void>

  constructor(
    readonly message: SentMessage,
    private readonly transport: Transport,
    private readonly frames: readonly string[],
    private readonly intervalMs: number,
    private readonly logger: Logger
  ) {
    this.finished = this.run()
  }

  async stop(): Promise<void> {
    this.controller.abort()
    await this.finished
  }

  private async run(): Promise<void> {
    const { signal } = this.controller
    for (const frame of this.frames) {
      await wait(this.intervalMs, signal)
      if (signal.aborted) return
      try {
        await this.transport.edit(this.message, frame)
      } catch (error) {
        this.logger.warn('ack.frame_failed', {
          chatId: this.message.chatId,
          messageId: this.message.messageId,
          ...errorFields(error)
        })
        return
      }
    }
  }
}

/**
 * Sends the "processing" placeholder for an accepted command and steps it
 * through the configured frames until stopped.
 */
export class Acknowledger {
  constructor(
    private readonly transport: Transport,
    private readonly options: AcknowledgerOptions,
    private readonly logger: Logger
  ) {}

  /**
   * Replies with the first frame. Resolves to null when there are no frames
   * or the placeholder could not be sent.
   */
  async start(message: InboundMessage): Promise<StatusHandle | null> {
    const [first, ...rest] = this.options.frames
    if (first === undefined) return null

    let placeholder: SentMessage
    try {
      placeholder = await this.transport.reply(message, first)
    } catch (error) {
      this.logger.warn('ack.placeholder_failed', {
        chatId: message.chatId,
        messageId: message.messageId,
        ...errorFields(error)
      })
      return null
    }

    return new FrameLoop(placeholder, this.transport, rest, this.options.intervalMs, this.logger)
  }
}
