#!/usr/bin/env node
import { createBot, runDispatchLoop } from './app.js'
import { TelegramChannel } from './channels/telegram.js'
import { loadConfig } from './config/load.js'
import { validateConfig } from './config/schema.js'
import { MessageBus } from './core/bus.js'
import { createLogger, logger as bootLogger } from './core/logger.js'
import { errorFields } from './core/types.js'

/** Boots the bot: loads extensions, starts polling and dispatches until a signal. */
async function main(): Promise<void> {
  const config = loadConfig()
  const problems = validateConfig(config)
  if (problems.length > 0) {
    bootLogger.error('startup.invalid_config', { problems })
    process.exitCode = 1
    return
  }

  const logger = createLogger(config.logLevel)
  const bus = new MessageBus()
  const channel = new TelegramChannel(config, bus, logger)
  const bot = createBot({ config, transport: channel, logger })

  const results = await bot.loadExtensions()
  logger.info('startup.extensions', {
    loaded: bot.registry.loaded(),
    failed: results.filter((result) => result.status === 'failed').map((result) => result.id),
    commands: bot.registry.routes().length
  })

  const shutdown = async (signal: string): Promise<void> => {
    logger.info('shutdown.signal', { signal })
    await channel.stop()
    bus.close()
  }

  process.once('SIGINT', () => {
    shutdown('SIGINT').catch((error: unknown) => logger.error('shutdown.failed', errorFields(error)))
  })
  process.once('SIGTERM', () => {
    shutdown('SIGTERM').catch((error: unknown) => logger.error('shutdown.failed', errorFields(error)))
  })

  await channel.start()
  await runDispatchLoop(bus, bot.pipeline, logger)
  logger.info('shutdown.complete')
}

main().catch((error: unknown) => {
  bootLogger.error('fatal', errorFields(error))
  process.exitCode = 1
})
