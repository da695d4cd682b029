import { describe, expect, it } from 'vitest'

import { MessageBus } from '../src/core/bus.js'
import { makeMessage } from './helpers/fake-transport.js'

describe('MessageBus', () => {
  it('delivers inbound message to waiting consumer', async () => {
    const bus = new MessageBus()

    const consumer = bus.consumeInbound()
    await bus.publishInbound(makeMessage({ senderId: 'u1', chatId: 'c1', content: 'hello' }))

    await expect(consumer).resolves.toMatchObject({ senderId: 'u1', chatId: 'c1', content: 'hello' })
  })

  it('preserves FIFO ordering', async () => {
    const bus = new MessageBus()

    await bus.publishInbound(makeMessage({ content: 'first' }))
    await bus.publishInbound(makeMessage({ content: 'second' }))
    expect(bus.pending).toBe(2)

    expect((await bus.consumeInbound())?.content).toBe('first')
    expect((await bus.consumeInbound())?.content).toBe('second')
  })

  it('drains queued messages after close, then yields null', async () => {
    const bus = new MessageBus()
    await bus.publishInbound(makeMessage({ content: 'queued' }))

    bus.close()
    await bus.publishInbound(makeMessage({ content: 'too late' }))

    expect((await bus.consumeInbound())?.content).toBe('queued')
    await expect(bus.consumeInbound()).resolves.toBeNull()
  })

  it('releases waiting consumers on close', async () => {
    const bus = new MessageBus()

    const waiting = bus.consumeInbound()
    bus.close()

    await expect(waiting).resolves.toBeNull()
  })
})
