import type { InboundMessage } from './types.js'

/**
 * Minimal async inbound queue.
 *
 * Keeps the transport's polling loop and the dispatch loop decoupled.
 */
export class MessageBus {
  private inboundQueue: InboundMessage[] = []
  private inboundWaiters: Array<(msg: InboundMessage | null) => void> = []
  private closed = false

  /** Publishes an inbound message to the dispatch loop. */
  async publishInbound(msg: InboundMessage): Promise<void> {
    if (this.closed) return
    const waiter = this.inboundWaiters.shift()
    if (waiter) {
      waiter(msg)
      return
    }
    this.inboundQueue.push(msg)
  }

  /**
   * Waits for and returns the next inbound message, or `null` once the bus
   * is closed and drained.
   */
  async consumeInbound(): Promise<InboundMessage | null> {
    const existing = this.inboundQueue.shift()
    if (existing) return existing
    if (this.closed) return null
    return new Promise<InboundMessage | null>((resolve) => this.inboundWaiters.push(resolve))
  }

  /** Number of messages waiting to be consumed. */
  get pending(): number {
    return this.inboundQueue.length
  }

  /** Stops accepting messages and releases every waiting consumer. */
  close(): void {
    this.closed = true
    for (const waiter of this.inboundWaiters.splice(0)) waiter(null)
  }
}
