import { describe, expect, it } from 'vitest'

import { ChatOperationalLog, formatFaultReport } from '../src/core/ops-log.js'
import { FakeTransport, makeLogger } from './helpers/fake-transport.js'

describe('formatFaultReport', () => {
  it('lists the context, user and error', () => {
    const error = new TypeError('bad input')
    error.stack = 'TypeError: bad input\n    at handler (ext.ts:1:1)'

    expect(formatFaultReport(error, '#boom in chat -100', '500')).toBe(
      [
        '🚨 Command fault',
        'Context: #boom in chat -100',
        'User ID: 500',
        'Error type: TypeError',
        'Error message: bad input',
        '',
        'TypeError: bad input',
        '    at handler (ext.ts:1:1)'
      ].join('\n')
    )
  })

  it('caps reports at 4000 characters', () => {
    const error = new Error('x'.repeat(5000))

    const report = formatFaultReport(error, 'ctx', '1')

    expect(report).toHaveLength(4000)
    expect(report.endsWith('…')).toBe(true)
  })
})

describe('ChatOperationalLog', () => {
  it('logs successful and failed commands at different levels', async () => {
    const logger = makeLogger()
    const opsLog = new ChatOperationalLog(logger)

    await opsLog.recordCommand('500', '#ping', true, 12.6)
    await opsLog.recordCommand('500', '/lock', false, 0, 'permission denied')

    expect(logger.info).toHaveBeenCalledWith('command.executed', {
      userId: '500',
      command: '#ping',
      elapsedMs: 13
    })
    expect(logger.warn).toHaveBeenCalledWith('command.failed', {
      userId: '500',
      command: '/lock',
      elapsedMs: 0,
      error: 'permission denied'
    })
  })

  it('forwards fault reports to the log chat', async () => {
    const transport = new FakeTransport()
    const logger = makeLogger()
    const opsLog = new ChatOperationalLog(logger, { transport, logChatId: '-999' })

    await opsLog.recordFault(new Error('kaboom'), '#boom in chat -100', '500')

    expect(logger.error).toHaveBeenCalledWith(
      'command.fault',
      expect.objectContaining({ context: '#boom in chat -100', userId: '500', error: 'kaboom' })
    )
    expect(transport.sent).toHaveLength(1)
    expect(transport.sent[0]?.chatId).toBe('-999')
    expect(transport.sent[0]?.text.split('\n').slice(0, 5)).toEqual([
      '🚨 Command fault',
      'Context: #boom in chat -100',
      'User ID: 500',
      'Error type: Error',
      'Error message: kaboom'
    ])
  })

  it('keeps faults in the logger when no log chat is configured', async () => {
    const transport = new FakeTransport()
    const opsLog = new ChatOperationalLog(makeLogger(), { transport })

    await opsLog.recordFault('plain string fault', 'ctx', '1')

    expect(transport.sent).toEqual([])
  })

  it('does not reject when forwarding fails', async () => {
    const transport = new FakeTransport()
    transport.failing.add('send')
    const logger = makeLogger()
    const opsLog = new ChatOperationalLog(logger, { transport, logChatId: '-999' })

    await expect(opsLog.recordFault(new Error('kaboom'), 'ctx', '1')).resolves.toBeUndefined()
    expect(logger.warn).toHaveBeenCalledWith(
      'ops_log.forward_failed',
      expect.objectContaining({ logChatId: '-999', error: 'send failed' })
    )
  })
})
