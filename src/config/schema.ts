import { z } from 'zod'

const prefixSchema = z.string().length(1, 'command prefixes must be a single character')

const prefixesSchema = z
  .object({
    developer: prefixSchema.default('.'),
    admin: prefixSchema.default('/'),
    public: prefixSchema.default('#')
  })
  .default({})
  .refine((p) => new Set([p.developer, p.admin, p.public]).size === 3, {
    message: 'developer, admin and public prefixes must be distinct'
  })

const telegramSchema = z.object({
  token: z.string(),
  /** Long-poll timeout passed to getUpdates. */
  pollTimeoutSec: z.number().int().nonnegative().default(25)
})

const authSchema = z
  .object({
    ownerId: z.string().default(''),
    developerIds: z.array(z.string()).default([]),
    /** Chats where every member counts as a chat admin. */
    adminChatIds: z.array(z.string()).default([]),
    enablePublicCommands: z.boolean().default(true),
    adminCacheTtlSec: z.number().int().positive().default(300),
    adminRefreshAttempts: z.number().int().positive().default(1),
    adminRefreshBackoffMs: z.number().int().nonnegative().default(250)
  })
  .default({})

const extensionsSchema = z
  .object({
    /** Directory scanned for extension modules; defaults to the bundled one. */
    dir: z.string().optional(),
    /** When set, only these extension ids are loaded. */
    enabled: z.array(z.string()).optional(),
    disabled: z.array(z.string()).default([])
  })
  .default({})

const acknowledgementSchema = z
  .object({
    enabled: z.boolean().default(true),
    frames: z
      .array(z.string().min(1))
      .min(1)
      .default(['⏳ Processing...', '⏳ Processing..', '⏳ Processing.']),
    intervalMs: z.number().int().positive().default(600)
  })
  .default({})

const privacySchema = z
  .object({
    enabled: z.boolean().default(true),
    /** Commands whose replies always go to the sender privately. */
    privateCommands: z.array(z.string()).default(['.stats', '.status']),
    /** Chats where the bot answers every command privately. */
    silentChatIds: z.array(z.string()).default([])
  })
  .default({})

/**
 * Runtime configuration schema for tiergate.
 */
export const configSchema = z.object({
  telegram: telegramSchema,
  auth: authSchema,
  prefixes: prefixesSchema,
  extensions: extensionsSchema,
  acknowledgement: acknowledgementSchema,
  privacy: privacySchema,
  /** Chat that receives forwarded fault reports; unset disables forwarding. */
  logChatId: z.string().optional(),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info')
})

export type TiergateConfig = z.infer<typeof configSchema>
export type CommandPrefixes = TiergateConfig['prefixes']
export type AuthConfig = TiergateConfig['auth']

/**
 * Lists configuration problems that prevent the bot from starting.
 */
export function validateConfig(config: TiergateConfig): string[] {
  const errors: string[] = []
  if (!config.telegram.token) errors.push('TIERGATE_TELEGRAM_TOKEN is required')
  if (!config.auth.ownerId) errors.push('TIERGATE_OWNER_ID is required')
  if (config.auth.developerIds.length === 0) {
    errors.push('At least one TIERGATE_DEVELOPER_IDS entry is required')
  }
  return errors
}
