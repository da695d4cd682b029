import type { ExtensionHandler } from '../../../src/commands/types.js'

export const commands = ['#hidden']

export const handle: ExtensionHandler = async (message, _args, context) => {
  await context.transport.reply(message, 'hidden')
}
