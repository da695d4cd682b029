import * as fs from 'node:fs'
import * as os from 'node:os'
import * as path from 'node:path'

import { z } from 'zod'

/**
 * Persisted overrides stored in ~/.tiergate/settings.json.
 *
 * Every field is optional; present fields win over environment variables.
 */
export const settingsSchema = z
  .object({
    token: z.string(),
    ownerId: z.string(),
    developerIds: z.array(z.string()),
    adminChatIds: z.array(z.string()),
    logChatId: z.string(),
    extensionsDir: z.string(),
    disabledExtensions: z.array(z.string()),
    prefixes: z
      .object({
        developer: z.string(),
        admin: z.string(),
        public: z.string()
      })
      .partial()
  })
  .partial()

export type Settings = z.infer<typeof settingsSchema>

/** Returns the resolved path to the settings directory. */
export function getConfigDir(): string {
  return process.env.TIERGATE_HOME ?? path.join(os.homedir(), '.tiergate')
}

/** Returns the resolved path to the settings file. */
export function getSettingsPath(): string {
  return path.join(getConfigDir(), 'settings.json')
}

/** Returns true when a settings file already exists. */
export function settingsExist(): boolean {
  return fs.existsSync(getSettingsPath())
}

/** Reads and validates the settings file. Throws if missing or malformed. */
export function readSettings(): Settings {
  const raw = fs.readFileSync(getSettingsPath(), 'utf-8')
  return settingsSchema.parse(JSON.parse(raw))
}
