import type { ExtensionHandler } from '../../../src/commands/types.js'

export const commands = ['#x', '#alpha']

export const handle: ExtensionHandler = async (message, args, context) => {
  await context.transport.reply(message, ['alpha', ...args].join(' '))
}
