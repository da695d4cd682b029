import { formatDuration } from '../commands/definitions/stats.js'
import type { ExtensionContext } from '../commands/types.js'
import type { InboundMessage } from '../core/types.js'

export async function ping(context: ExtensionContext, message: InboundMessage): Promise<void> {
  const now = Date.now()
  const lines = ['🏓 Pong!']

  const sentAt = Date.parse(message.timestamp)
  if (!Number.isNaN(sentAt)) lines.push(`Latency: ${Math.max(0, now - sentAt)} ms`)

  const invocation = context.contexts.get(message)
  if (invocation) lines.push(`Processing: ${now - invocation.startedAt.getTime()} ms`)

  lines.push(`Uptime: ${formatDuration(now - context.startedAt.getTime())}`)
  await context.respond(message, lines.join('\n'))
}

/** Registers the public ping command unless another extension owns it. */
export function setup(context: ExtensionContext): void {
  const name = `${context.config.prefixes.public}ping`
  if (context.registry.isHandled(name)) {
    context.logger.info('extension.ping.deferred', { name })
    return
  }
  context.registry.registerHandler(name, (message) => ping(context, message), 'ping')
}
