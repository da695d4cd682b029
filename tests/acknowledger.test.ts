import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'

import { Acknowledger } from '../src/dispatch/acknowledger.js'
import { FakeTransport, GROUP_ID, makeLogger, makeMessage } from './helpers/fake-transport.js'

const FRAMES = ['⏳ Processing...', '⏳ Processing..', '⏳ Processing.']

describe('Acknowledger', () => {
  beforeEach(() => {
    vi.useFakeTimers()
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  it('replies with the first frame and edits in the rest at the interval', async () => {
    const transport = new FakeTransport()
    const acknowledger = new Acknowledger(transport, { frames: FRAMES, intervalMs: 600 }, makeLogger())
    const message = makeMessage()

    const status = await acknowledger.start(message)

    expect(status?.message).toEqual({ chatId: GROUP_ID, messageId: '1001' })
    expect(transport.replies).toEqual([
      { chatId: GROUP_ID, messageId: '1001', text: '⏳ Processing...', replyTo: message.messageId }
    ])

    await vi.advanceTimersByTimeAsync(599)
    expect(transport.edits).toEqual([])

    await vi.advanceTimersByTimeAsync(1)
    await vi.advanceTimersByTimeAsync(600)
    await vi.advanceTimersByTimeAsync(600)
    expect(transport.edits.map((edit) => edit.text)).toEqual(['⏳ Processing..', '⏳ Processing.'])

    await status?.stop()
  })

  it('performs no further edits once stopped', async () => {
    const transport = new FakeTransport()
    const acknowledger = new Acknowledger(transport, { frames: FRAMES, intervalMs: 600 }, makeLogger())

    const status = await acknowledger.start(makeMessage())
    await vi.advanceTimersByTimeAsync(600)
    await status?.stop()
    await vi.advanceTimersByTimeAsync(5000)

    expect(transport.edits.map((edit) => edit.text)).toEqual(['⏳ Processing..'])
  })

  it('can be stopped more than once', async () => {
    const transport = new FakeTransport()
    const acknowledger = new Acknowledger(transport, { frames: FRAMES, intervalMs: 600 }, makeLogger())

    const status = await acknowledger.start(makeMessage())
    await status?.stop()
    await status?.stop()

    expect(transport.edits).toEqual([])
  })

  it('sends nothing when there are no frames', async () => {
    const transport = new FakeTransport()
    const acknowledger = new Acknowledger(transport, { frames: [], intervalMs: 600 }, makeLogger())

    await expect(acknowledger.start(makeMessage())).resolves.toBeNull()
    expect(transport.replies).toEqual([])
  })

  it('gives up without a handle when the placeholder cannot be sent', async () => {
    const transport = new FakeTransport()
    transport.failing.add('reply')
    const logger = makeLogger()
    const acknowledger = new Acknowledger(transport, { frames: FRAMES, intervalMs: 600 }, logger)

    await expect(acknowledger.start(makeMessage())).resolves.toBeNull()
    expect(logger.warn).toHaveBeenCalledWith(
      'ack.placeholder_failed',
      expect.objectContaining({ chatId: GROUP_ID, error: 'reply failed' })
    )
  })

  it('stops stepping frames after a failed edit', async () => {
    const transport = new FakeTransport()
    const logger = makeLogger()
    const acknowledger = new Acknowledger(transport, { frames: FRAMES, intervalMs: 600 }, logger)

    const status = await acknowledger.start(makeMessage())
    transport.failing.add('edit')
    await vi.advanceTimersByTimeAsync(600)
    transport.failing.delete('edit')
    await vi.advanceTimersByTimeAsync(1200)

    expect(transport.edits).toEqual([])
    expect(logger.warn).toHaveBeenCalledTimes(1)
    expect(logger.warn).toHaveBeenCalledWith(
      'ack.frame_failed',
      expect.objectContaining({ messageId: '1001', error: 'edit failed' })
    )
    await status?.stop()
  })
})
