/**
 * One chat's administrator snapshot.
 */
export interface AdminCacheEntry {
  chatId: string
  memberIds: ReadonlySet<string>
  fetchedAt: number
}

/**
 * Time-bounded map of chat id -> administrator ids.
 *
 * Entries older than the TTL are reported as missing and evicted on read.
 */
export class AdminCache {
  private readonly entries = new Map<string, AdminCacheEntry>()

  constructor(private readonly ttlMs: number) {}

  /** Returns the entry for `chatId` when it is still within the TTL. */
  getFresh(chatId: string, now = Date.now()): AdminCacheEntry | undefined {
    const entry = this.entries.get(chatId)
    if (!entry) return undefined
    if (now - entry.fetchedAt >= this.ttlMs) {
      this.entries.delete(chatId)
      return undefined
    }
    return entry
  }

  /** Replaces the snapshot for a chat, stamping it with `now`. */
  store(chatId: string, memberIds: Iterable<string>, now = Date.now()): AdminCacheEntry {
    const entry: AdminCacheEntry = { chatId, memberIds: new Set(memberIds), fetchedAt: now }
    this.entries.set(chatId, entry)
    return entry
  }

  /** Drops one chat's snapshot, or every snapshot when no chat is given. */
  invalidate(chatId?: string): void {
    if (chatId === undefined) {
      this.entries.clear()
      return
    }
    this.entries.delete(chatId)
  }

  get size(): number {
    return this.entries.size
  }
}
