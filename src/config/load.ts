import { config as loadEnv } from 'dotenv'
import * as path from 'node:path'

import { getConfigDir, readSettings, settingsExist, type Settings } from './settings.js'
import { configSchema, type TiergateConfig } from './schema.js'

type Env = Record<string, string | undefined>

/** Parses comma-separated id list env values. */
export function parseCsv(input: string | undefined): string[] {
  if (!input) return []
  return input
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean)
}

function parseNumber(input: string | undefined): number | undefined {
  if (input === undefined || input.trim() === '') return undefined
  const value = Number(input)
  return Number.isFinite(value) ? value : undefined
}

function parseBoolean(input: string | undefined): boolean | undefined {
  if (input === undefined) return undefined
  return input.trim().toLowerCase() === 'true'
}

/**
 * Builds a validated configuration from environment variables, with
 * optional settings-file overrides.
 */
export function buildConfig(env: Env, settings: Settings = {}): TiergateConfig {
  const framesRaw = env.TIERGATE_ACK_FRAMES
  return configSchema.parse({
    telegram: {
      token: settings.token ?? env.TIERGATE_TELEGRAM_TOKEN ?? '',
      pollTimeoutSec: parseNumber(env.TIERGATE_POLL_TIMEOUT_SEC)
    },
    auth: {
      ownerId: settings.ownerId ?? env.TIERGATE_OWNER_ID,
      developerIds: settings.developerIds ?? parseCsv(env.TIERGATE_DEVELOPER_IDS),
      adminChatIds: settings.adminChatIds ?? parseCsv(env.TIERGATE_ADMIN_CHAT_IDS),
      enablePublicCommands: parseBoolean(env.TIERGATE_ENABLE_PUBLIC_COMMANDS),
      adminCacheTtlSec: parseNumber(env.TIERGATE_ADMIN_CACHE_TTL_SEC),
      adminRefreshAttempts: parseNumber(env.TIERGATE_ADMIN_REFRESH_ATTEMPTS),
      adminRefreshBackoffMs: parseNumber(env.TIERGATE_ADMIN_REFRESH_BACKOFF_MS)
    },
    prefixes: {
      developer: settings.prefixes?.developer ?? env.TIERGATE_PREFIX_DEVELOPER,
      admin: settings.prefixes?.admin ?? env.TIERGATE_PREFIX_ADMIN,
      public: settings.prefixes?.public ?? env.TIERGATE_PREFIX_PUBLIC
    },
    extensions: {
      dir: settings.extensionsDir ?? env.TIERGATE_EXTENSIONS_DIR,
      enabled: env.TIERGATE_ENABLED_EXTENSIONS ? parseCsv(env.TIERGATE_ENABLED_EXTENSIONS) : undefined,
      disabled: settings.disabledExtensions ?? parseCsv(env.TIERGATE_DISABLED_EXTENSIONS)
    },
    acknowledgement: {
      enabled: parseBoolean(env.TIERGATE_ACK_ENABLED),
      frames: framesRaw ? framesRaw.split('|').filter(Boolean) : undefined,
      intervalMs: parseNumber(env.TIERGATE_ACK_INTERVAL_MS)
    },
    privacy: {
      enabled: parseBoolean(env.TIERGATE_PRIVACY_ENABLED),
      privateCommands: env.TIERGATE_PRIVATE_COMMANDS ? parseCsv(env.TIERGATE_PRIVATE_COMMANDS) : undefined,
      silentChatIds: parseCsv(env.TIERGATE_SILENT_CHAT_IDS)
    },
    logChatId: settings.logChatId ?? env.TIERGATE_LOG_CHAT_ID,
    logLevel: env.TIERGATE_LOG_LEVEL?.toLowerCase()
  })
}

/**
 * Loads runtime configuration.
 *
 * Reads `~/.tiergate/.env` first, then a local `.env`; a
 * `~/.tiergate/settings.json` file, when present, overrides both.
 */
export function loadConfig(): TiergateConfig {
  loadEnv({ path: path.join(getConfigDir(), '.env') })
  loadEnv()

  const settings = settingsExist() ? readSettings() : {}
  return buildConfig(process.env, settings)
}
