/**
 * External-symbol description cache
 *
 * Append-only JSONL log. A create appends a full record, an update appends
 * `{key, iat_addresses}` with the full address set. Loading replays the log:
 * the first markdown for a key wins, the last address set wins.
 */

import { existsSync, mkdirSync } from 'fs'
import { open, readFile, rename, rm, type FileHandle } from 'fs/promises'
import { dirname } from 'path'
import { z } from 'zod'
import type { CacheEntry } from '../types/analysis'
import { formatAddress, tryParseAddress } from '../utils/address'
import { KeyedMutex } from '../utils/concurrency'
import { silentLogger, type Logger } from '../utils/logger'

const storedRecordSchema = z.object({
  key: z.string().min(1),
  markdown: z.string().optional(),
  iat_addresses: z.array(z.union([z.string(), z.number()])).default([]),
})

type StoredRecord = {
  key: string
  markdown?: string
  iat_addresses: string[]
}

interface MutableEntry {
  key: string
  markdown?: string
  iatAddresses: Set<number>
}

export interface CacheStoreOptions {
  path: string
  logger?: Logger
}

function normalizeKey(key: string): string {
  return key.trim().toLowerCase()
}

function toStored(entry: MutableEntry, withMarkdown: boolean): StoredRecord {
  const record: StoredRecord = {
    key: entry.key,
    iat_addresses: [...entry.iatAddresses].map(formatAddress),
  }
  if (withMarkdown && entry.markdown !== undefined) {
    record.markdown = entry.markdown
  }
  return record
}

function snapshot(entry: MutableEntry, markdown: string): CacheEntry {
  return { key: entry.key, markdown, iatAddresses: new Set(entry.iatAddresses) }
}

export class CacheStore {
  private entries: Map<string, MutableEntry> = new Map()
  private handle: FileHandle | null = null
  private readonly keyLocks = new KeyedMutex()
  private readonly appendLock = new KeyedMutex()
  private readonly logger: Logger

  constructor(private readonly options: CacheStoreOptions) {
    this.logger = options.logger ?? silentLogger
  }

  get path(): string {
    return this.options.path
  }

  get isOpen(): boolean {
    return this.handle !== null
  }

  /** Keys with usable markdown */
  get size(): number {
    let count = 0
    for (const entry of this.entries.values()) {
      if (entry.markdown !== undefined) count++
    }
    return count
  }

  /**
   * Replay the log and take the append handle
   */
  async open(): Promise<void> {
    if (this.handle) return

    const dir = dirname(this.options.path)
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true })
    }

    this.entries = existsSync(this.options.path)
      ? this.replay(await readFile(this.options.path, 'utf-8'))
      : new Map()
    this.handle = await open(this.options.path, 'a')
    this.logger.debug({ path: this.options.path, keys: this.entries.size }, 'cache opened')
  }

  /**
   * Release the append handle once queued writes are done
   */
  async close(): Promise<void> {
    await this.appendLock.run('log', async () => {
      const handle = this.handle
      this.handle = null
      await handle?.close()
    })
  }

  lookup(key: string): CacheEntry | undefined {
    this.assertOpen()
    const entry = this.entries.get(normalizeKey(key))
    if (!entry || entry.markdown === undefined) return undefined
    return snapshot(entry, entry.markdown)
  }

  /**
   * Create `{markdown, {address}}` when absent; otherwise keep the stored
   * markdown and add the address if it is new.
   */
  async upsert(key: string, markdown: string, address: number): Promise<CacheEntry> {
    this.assertOpen()
    const normalized = normalizeKey(key)

    return this.keyLocks.run(normalized, async () => {
      const existing = this.entries.get(normalized)

      if (!existing || existing.markdown === undefined) {
        const created: MutableEntry = {
          key: existing?.key ?? key,
          markdown,
          iatAddresses: new Set([...(existing?.iatAddresses ?? []), address]),
        }
        await this.append(toStored(created, true))
        this.entries.set(normalized, created)
        return snapshot(created, markdown)
      }

      if (!existing.iatAddresses.has(address)) {
        const updated: MutableEntry = {
          ...existing,
          iatAddresses: new Set([...existing.iatAddresses, address]),
        }
        await this.append(toStored(updated, false))
        this.entries.set(normalized, updated)
        return snapshot(updated, existing.markdown)
      }

      return snapshot(existing, existing.markdown)
    })
  }

  /**
   * Rewrite the log as one full record per key, then swap it in
   */
  async compact(): Promise<{ before: number; after: number }> {
    this.assertOpen()

    return this.appendLock.run('log', async () => {
      const before = existsSync(this.options.path)
        ? (await readFile(this.options.path, 'utf-8')).split('\n').filter(line => line.trim()).length
        : 0

      const records = [...this.entries.values()]
        .filter(entry => entry.markdown !== undefined)
        .map(entry => JSON.stringify(toStored(entry, true)))
      const tempPath = `${this.options.path}.tmp`

      const temp = await open(tempPath, 'w')
      try {
        await temp.writeFile(records.map(line => line + '\n').join(''))
        await temp.sync()
      } finally {
        await temp.close()
      }

      const previous = this.handle
      this.handle = null
      await previous?.close()
      try {
        await rename(tempPath, this.options.path)
      } catch (err) {
        await rm(tempPath, { force: true })
        throw err
      } finally {
        // Appends continue on whichever log is in place
        this.handle = await open(this.options.path, 'a')
      }

      this.logger.info({ before, after: records.length }, 'cache compacted')
      return { before, after: records.length }
    })
  }

  private assertOpen(): void {
    if (!this.handle) {
      throw new Error(`Cache store ${this.options.path} is not open`)
    }
  }

  private async append(record: StoredRecord): Promise<void> {
    await this.appendLock.run('log', async () => {
      const handle = this.handle
      if (!handle) {
        throw new Error(`Cache store ${this.options.path} was closed`)
      }
      await handle.write(JSON.stringify(record) + '\n')
      await handle.sync()
    })
  }

  private replay(content: string): Map<string, MutableEntry> {
    const entries: Map<string, MutableEntry> = new Map()
    const lines = content.split('\n')

    lines.forEach((line, index) => {
      if (!line.trim()) return

      let raw: unknown
      try {
        raw = JSON.parse(line)
      } catch {
        this.logger.warn({ path: this.options.path, line: index + 1 }, 'skipping corrupt cache line')
        return
      }

      const parsed = storedRecordSchema.safeParse(raw)
      if (!parsed.success) {
        this.logger.warn({ path: this.options.path, line: index + 1 }, 'skipping invalid cache record')
        return
      }

      const record = parsed.data
      const addresses = new Set<number>()
      for (const value of record.iat_addresses) {
        const address = tryParseAddress(value)
        if (address !== null) addresses.add(address)
      }

      const normalized = normalizeKey(record.key)
      const existing = entries.get(normalized)
      entries.set(normalized, {
        key: existing?.key ?? record.key,
        markdown: existing?.markdown ?? record.markdown,
        iatAddresses: addresses,
      })
    })

    return entries
  }
}

/**
 * Open a store for the duration of `fn`
 */
export async function withCacheStore<T>(options: CacheStoreOptions, fn: (store: CacheStore) => Promise<T>): Promise<T> {
  const store = new CacheStore(options)
  await store.open()
  try {
    return await fn(store)
  } finally {
    await store.close()
  }
}
