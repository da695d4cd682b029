import type { ExtensionHandler } from '../../../src/commands/types.js'

export const commands = '#broken'

export const handle: ExtensionHandler = async (message, _args, context) => {
  await context.transport.reply(message, 'unreachable')
}

export async function setup(): Promise<void> {
  throw new Error('database offline')
}
