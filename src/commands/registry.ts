import { pathToFileURL } from 'node:url'

import { z } from 'zod/v4'

import { errorFields, toError, type InboundMessage, type Logger } from '../core/types.js'
import { scanExtensionDir } from './discovery.js'
import { normalizeCommandName } from './names.js'
import type {
  CommandHandler,
  CommandRoute,
  ExtensionContext,
  ExtensionHandler,
  LoadResult
} from './types.js'

/**
 * Raised (and returned inside a failed {@link LoadResult}) when an
 * extension cannot be imported, has the wrong shape, or its setup throws.
 */
export class ExtensionLoadError extends Error {
  constructor(
    readonly extensionId: string,
    message: string,
    options?: { cause: unknown }
  ) {
    super(`extension "${extensionId}": ${message}`, options)
    this.name = 'ExtensionLoadError'
  }
}

const isFunction = (value: unknown): boolean => typeof value === 'function'

/** Exports an extension module may provide. */
const extensionModuleSchema = z.object({
  commands: z.union([z.string(), z.array(z.string())]).optional(),
  handle: z.custom<ExtensionHandler>(isFunction, 'handle must be a function').optional(),
  setup: z
    .custom<(context: ExtensionContext) => unknown>(isFunction, 'setup must be a function')
    .optional()
})

export interface CommandRegistryOptions {
  /** Directory scanned by {@link CommandRegistry.discover}. */
  extensionsDir: string
  /** When set, only these extension ids are loaded. */
  enabled?: string[] | undefined
  disabled?: string[] | undefined
}

/**
 * Authoritative map from normalized command name to the handler that owns it.
 *
 * Names are claimed first-come-first-served by extensions (through their
 * declared `commands`) and by programmatic {@link registerHandler} calls; a
 * later claim on an owned name is rejected and logged. Claims are only
 * accepted until {@link seal} ends the load phase.
 */
export class CommandRegistry {
  private readonly owners = new Map<string, CommandRoute>()
  private readonly results = new Map<string, LoadResult>()
  private readonly locations = new Map<string, string>()
  private readonly enabled: ReadonlySet<string> | null
  private readonly disabled: ReadonlySet<string>
  private sealed = false

  constructor(
    private readonly options: CommandRegistryOptions,
    private readonly logger: Logger
  ) {
    this.enabled = options.enabled ? new Set(options.enabled.map((id) => id.toLowerCase())) : null
    this.disabled = new Set((options.disabled ?? []).map((id) => id.toLowerCase()))
  }

  /**
   * Lists loadable extension ids in the configured directory, honouring the
   * enabled/disabled lists. A missing directory yields no extensions.
   */
  async discover(): Promise<string[]> {
    let found: Map<string, string>
    try {
      found = await scanExtensionDir(this.options.extensionsDir)
    } catch (error) {
      this.logger.warn('registry.discover_failed', {
        dir: this.options.extensionsDir,
        ...errorFields(error)
      })
      return []
    }

    const ids: string[] = []
    for (const [id, path] of found) {
      this.locations.set(id, path)
      if (!this.isAllowed(id)) {
        this.logger.debug('registry.extension_skipped', { id })
        continue
      }
      ids.push(id)
    }
    return ids
  }

  /**
   * Imports one extension, awaits its `setup(context)`, then claims the
   * command names it declares. Never rejects: faults come back as a
   * `failed` result and are kept in {@link failures}.
   */
  async load(extensionId: string, context: ExtensionContext): Promise<LoadResult> {
    const previous = this.results.get(extensionId)
    if (previous?.status === 'loaded') {
      this.logger.debug('registry.extension_already_loaded', { id: extensionId })
      return previous
    }

    let result: LoadResult
    try {
      const loaded = await this.loadModule(extensionId, context)
      this.logger.info('registry.extension_loaded', {
        id: extensionId,
        commands: loaded.commands,
        rejected: loaded.rejected
      })
      result = loaded
    } catch (error) {
      const failure =
        error instanceof ExtensionLoadError
          ? error
          : new ExtensionLoadError(extensionId, toError(error).message, { cause: error })
      result = { status: 'failed', id: extensionId, error: failure }
      this.logger.error('registry.extension_failed', { id: extensionId, ...errorFields(failure) })
    }

    this.results.set(extensionId, result)
    return result
  }

  /** Discovers and loads every extension in order, isolating failures. */
  async loadAll(context: ExtensionContext): Promise<LoadResult[]> {
    const results: LoadResult[] = []
    for (const id of await this.discover()) {
      results.push(await this.load(id, context))
    }
    return results
  }

  /** Returns true when `commandName` is already owned. */
  isHandled(commandName: string): boolean {
    return this.owners.has(normalizeCommandName(commandName))
  }

  /**
   * Claims `names` for `handler` outside the declarative extension path.
   * Returns true only when every name was claimed.
   */
  registerHandler(
    names: string | readonly string[],
    handler: CommandHandler,
    ownerId = 'programmatic'
  ): boolean {
    const { rejected } = this.claim(typeof names === 'string' ? [names] : names, ownerId, handler)
    return rejected.length === 0
  }

  /**
   * Invokes the handler owning `commandName`. Resolves to false when no
   * handler owns it; handler errors propagate to the caller.
   */
  async dispatch(commandName: string, message: InboundMessage, args: string[]): Promise<boolean> {
    const route = this.get(commandName)
    if (!route) return false
    await route.handler(message, args)
    return true
  }

  get(commandName: string): CommandRoute | undefined {
    return this.owners.get(normalizeCommandName(commandName))
  }

  /** Ends the load phase; further claims are rejected. */
  seal(): void {
    this.sealed = true
    this.logger.info('registry.sealed', { commands: this.owners.size, extensions: this.loaded().length })
  }

  get isSealed(): boolean {
    return this.sealed
  }

  /** All routes in registration order. */
  routes(): CommandRoute[] {
    return [...this.owners.values()]
  }

  /** Ids of successfully loaded extensions, in load order. */
  loaded(): string[] {
    return [...this.results.values()].filter((r) => r.status === 'loaded').map((r) => r.id)
  }

  /** Extensions whose last load attempt failed, with the fault. */
  failures(): ReadonlyMap<string, Error> {
    const failed = new Map<string, Error>()
    for (const result of this.results.values()) {
      if (result.status === 'failed') failed.set(result.id, result.error)
    }
    return failed
  }

  private isAllowed(id: string): boolean {
    const key = id.toLowerCase()
    if (this.enabled && !this.enabled.has(key)) return false
    return !this.disabled.has(key)
  }

  private async loadModule(
    id: string,
    context: ExtensionContext
  ): Promise<Extract<LoadResult, { status: 'loaded' }>> {
    if (this.sealed) throw new ExtensionLoadError(id, 'registry is sealed')

    if (!this.locations.has(id)) await this.discover()
    const location = this.locations.get(id)
    if (!location) throw new ExtensionLoadError(id, 'module not found')

    let imported: unknown
    try {
      imported = await import(pathToFileURL(location).href)
    } catch (error) {
      throw new ExtensionLoadError(id, `import failed: ${toError(error).message}`, { cause: error })
    }

    const parsed = extensionModuleSchema.safeParse(imported)
    if (!parsed.success) {
      const detail = parsed.error.issues.map((issue) => issue.message).join('; ')
      throw new ExtensionLoadError(id, `invalid module: ${detail}`)
    }

    const { commands, handle, setup } = parsed.data
    const declared = commands === undefined ? [] : typeof commands === 'string' ? [commands] : commands
    if (declared.length > 0 && !handle) {
      throw new ExtensionLoadError(id, 'declares commands but exports no handle()')
    }

    if (setup) {
      try {
        await setup(context)
      } catch (error) {
        throw new ExtensionLoadError(id, `setup failed: ${toError(error).message}`, { cause: error })
      }
    }

    if (!handle) return { status: 'loaded', id, commands: [], rejected: [] }
    const bound: CommandHandler = (message, args) => handle(message, args, context)
    const { claimed, rejected } = this.claim(declared, id, bound)
    return { status: 'loaded', id, commands: claimed, rejected }
  }

  private claim(
    names: readonly string[],
    ownerId: string,
    handler: CommandHandler
  ): { claimed: string[]; rejected: string[] } {
    const claimed: string[] = []
    const rejected: string[] = []

    for (const raw of names) {
      const name = normalizeCommandName(raw)
      if (this.sealed) {
        this.logger.warn('registry.claim_after_seal', { name, ownerId })
        rejected.push(name)
        continue
      }
      if (!name) {
        this.logger.warn('registry.invalid_name', { name: raw, ownerId })
        rejected.push(raw)
        continue
      }

      const existing = this.owners.get(name)
      if (existing) {
        if (existing.ownerId === ownerId && existing.handler === handler) continue
        this.logger.warn('registry.conflict', { name, owner: existing.ownerId, rejectedOwner: ownerId })
        rejected.push(name)
        continue
      }

      this.owners.set(name, { normalizedName: name, ownerId, handler })
      claimed.push(name)
    }

    return { claimed, rejected }
  }
}
