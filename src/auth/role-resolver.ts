import type { Transport } from '../channels/base.js'
import type { AuthConfig, CommandPrefixes } from '../config/schema.js'
import { retry } from '../core/retry.js'
import { errorFields, type Logger } from '../core/types.js'
import { AdminCache } from './admin-cache.js'

/** Privilege a user holds, highest first. */
export type Role = 'owner' | 'developer' | 'chat_admin' | 'public'

/** Tier a command asks for, selected by its prefix character. */
export type CommandTier = 'developer' | 'admin' | 'public' | 'none'

/** Display names; developers are presented as founders. */
export const ROLE_LABELS: Record<Role, string> = {
  owner: 'Owner',
  developer: 'Founder',
  chat_admin: 'Chat admin',
  public: 'Member'
}

const DENIAL_MESSAGES: Record<CommandTier, string> = {
  developer: '⛔ Access denied. Developer authorization required.',
  admin: '⛔ Access denied. Admin authorization required.',
  public: '⛔ Access denied. Public commands are disabled.',
  none: '⛔ Access denied.'
}

export interface RoleResolverOptions {
  auth: AuthConfig
  prefixes: CommandPrefixes
  /** Injected for tests; a private cache using `auth.adminCacheTtlSec` otherwise. */
  cache?: AdminCache
}

/**
 * Resolves users to privilege tiers and decides whether a command may run.
 *
 * Owner and developers are global. Chat-admin status comes from the
 * transport's administrator list, cached per chat for the configured TTL.
 * Every failure path answers "not authorized".
 */
export class RoleResolver {
  private readonly cache: AdminCache
  private readonly developerIds: ReadonlySet<string>
  private readonly adminChatIds: ReadonlySet<string>
  private readonly inflight = new Map<string, Promise<ReadonlySet<string>>>()

  constructor(
    private readonly options: RoleResolverOptions,
    private readonly logger: Logger
  ) {
    this.cache = options.cache ?? new AdminCache(options.auth.adminCacheTtlSec * 1000)
    this.developerIds = new Set(options.auth.developerIds)
    this.adminChatIds = new Set(options.auth.adminChatIds)
  }

  isOwner(userId: string): boolean {
    return this.options.auth.ownerId !== '' && userId === this.options.auth.ownerId
  }

  isDeveloperOrOwner(userId: string): boolean {
    return this.isOwner(userId) || this.developerIds.has(userId)
  }

  /**
   * Returns whether `userId` administers `chatId`, refreshing the chat's
   * snapshot when it is missing or stale. Never rejects.
   */
  async isChatAdmin(transport: Transport, userId: string, chatId: string): Promise<boolean> {
    if (this.adminChatIds.has(chatId)) return true

    const cached = this.cache.getFresh(chatId)
    if (cached) return cached.memberIds.has(userId)

    const members = await this.refresh(transport, chatId)
    return members.has(userId)
  }

  /** Maps the first character of `text` to the tier it requests. */
  classifyCommandPrefix(text: string): CommandTier {
    const { developer, admin, public: open } = this.options.prefixes
    if (text.startsWith(developer)) return 'developer'
    if (text.startsWith(admin)) return 'admin'
    if (text.startsWith(open)) return 'public'
    return 'none'
  }

  /**
   * Decides whether `userId` may run the command in `text` inside `chatId`.
   * Internal faults are logged and answered with `false`.
   */
  async authorize(transport: Transport, userId: string, chatId: string, text: string): Promise<boolean> {
    try {
      switch (this.classifyCommandPrefix(text)) {
        case 'developer':
          return this.isDeveloperOrOwner(userId)
        case 'admin':
          return this.isDeveloperOrOwner(userId) || (await this.isChatAdmin(transport, userId, chatId))
        case 'public':
          return this.options.auth.enablePublicCommands
        case 'none':
          return false
      }
    } catch (error) {
      this.logger.error('auth.authorize_failed', { userId, chatId, ...errorFields(error) })
      return false
    }
  }

  /** Returns the highest role `userId` holds in `chatId`. */
  async resolveRole(transport: Transport, userId: string, chatId: string): Promise<Role> {
    if (this.isOwner(userId)) return 'owner'
    if (this.developerIds.has(userId)) return 'developer'
    if (await this.isChatAdmin(transport, userId, chatId)) return 'chat_admin'
    return 'public'
  }

  denialMessage(tier: CommandTier): string {
    return DENIAL_MESSAGES[tier]
  }

  /**
   * Forgets cached administrators for one chat, or for every chat.
   * A refresh already in flight for an invalidated chat is not stored.
   */
  invalidate(chatId?: string): void {
    this.cache.invalidate(chatId)
    if (chatId === undefined) {
      this.inflight.clear()
    } else {
      this.inflight.delete(chatId)
    }
    this.logger.debug('auth.cache_invalidated', { chatId: chatId ?? 'all' })
  }

  /** Number of chats with a cached administrator snapshot. */
  get cachedChats(): number {
    return this.cache.size
  }

  private refresh(transport: Transport, chatId: string): Promise<ReadonlySet<string>> {
    const pending = this.inflight.get(chatId)
    if (pending) return pending

    const task: Promise<ReadonlySet<string>> = this.fetchAdmins(transport, chatId).then((ids) => {
      if (this.inflight.get(chatId) !== task) return ids
      this.inflight.delete(chatId)
      return this.cache.store(chatId, ids).memberIds
    })
    this.inflight.set(chatId, task)
    return task
  }

  private async fetchAdmins(transport: Transport, chatId: string): Promise<ReadonlySet<string>> {
    const { adminRefreshAttempts, adminRefreshBackoffMs } = this.options.auth
    try {
      const ids = await retry(() => transport.getChatAdministrators(chatId), {
        attempts: adminRefreshAttempts,
        backoffMs: adminRefreshBackoffMs,
        onRetry: (error, attempt) =>
          this.logger.warn('auth.admin_refresh_retry', { chatId, attempt, ...errorFields(error) })
      })
      this.logger.debug('auth.admin_refreshed', { chatId, count: ids.length })
      return new Set(ids)
    } catch (error) {
      this.logger.warn('auth.admin_refresh_failed', { chatId, ...errorFields(error) })
      return new Set()
    }
  }
}
