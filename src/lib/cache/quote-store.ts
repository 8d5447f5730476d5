import { access, mkdir, readFile, readdir, rename, rm, writeFile } from 'node:fs/promises'
import { constants } from 'node:fs'
import path from 'node:path'
import { CacheEntrySchema, type CacheEntry, type Quote } from '@/lib/quotes/types'
import { normalizeQuotes } from '@/lib/quotes/normalize'
import { rangeCovers, type DateRange } from '@/lib/utils/dates'
import { CacheIOError, getErrorMessage } from '@/lib/utils/errors'

export interface QuoteCache {
  get(productId: string, range: DateRange): Promise<CacheEntry | null>
  put(productId: string, range: DateRange, quotes: readonly Quote[]): Promise<CacheEntry>
}

export interface FileQuoteCacheOptions {
  dir: string
  ttlSeconds: number
  now?: () => Date
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}

/**
 * Quote cache persisted as one JSON document per product. A new entry replaces
 * the previous one for that product; ranges are never merged.
 */
export class FileQuoteCache implements QuoteCache {
  private readonly dir: string
  private readonly ttlMs: number
  private readonly now: () => Date

  constructor(options: FileQuoteCacheOptions) {
    this.dir = options.dir
    this.ttlMs = options.ttlSeconds * 1000
    this.now = options.now ?? (() => new Date())
  }

  private filePath(productId: string): string {
    return path.join(this.dir, `${encodeURIComponent(productId)}.json`)
  }

  isExpired(entry: CacheEntry): boolean {
    const age = this.now().getTime() - Date.parse(entry.fetchedAt)
    return age > this.ttlMs
  }

  /** Stored entry regardless of range or age, or null when none exists. */
  async read(productId: string): Promise<CacheEntry | null> {
    const file = this.filePath(productId)
    let raw: string
    try {
      raw = await readFile(file, 'utf-8')
    } catch (error) {
      if (isMissingFile(error)) return null
      throw new CacheIOError(`Cannot read ${file}: ${getErrorMessage(error)}`, 'get', { cause: error })
    }

    let json: unknown
    try {
      json = JSON.parse(raw)
    } catch (error) {
      throw new CacheIOError(`Corrupt cache file ${file}`, 'get', { cause: error })
    }
    const parsed = CacheEntrySchema.safeParse(json)
    if (!parsed.success || parsed.data.productId !== productId) {
      throw new CacheIOError(`Unexpected cache document in ${file}`, 'get')
    }
    return parsed.data
  }

  async get(productId: string, range: DateRange): Promise<CacheEntry | null> {
    const key = `${productId} ${range.start}..${range.end}`
    const entry = await this.read(productId)
    if (!entry) {
      console.log(`[cache] miss for ${key}`)
      return null
    }
    if (!rangeCovers(entry.range, range)) {
      console.log(`[cache] miss for ${key} (stored ${entry.range.start}..${entry.range.end})`)
      return null
    }
    if (this.isExpired(entry)) {
      console.log(`[cache] expired for ${key} (fetched ${entry.fetchedAt})`)
      return null
    }
    console.log(`[cache] hit for ${key}`)
    return entry
  }

  async put(productId: string, range: DateRange, quotes: readonly Quote[]): Promise<CacheEntry> {
    const entry: CacheEntry = {
      productId,
      range: { start: range.start, end: range.end },
      fetchedAt: this.now().toISOString(),
      quotes: normalizeQuotes(quotes),
    }
    const file = this.filePath(productId)
    // Unique per call so overlapping writes for one product never share a temp file
    const tmp = `${file}.${process.pid}.${Date.now()}.${Math.random().toString(36).slice(2)}.tmp`
    try {
      await mkdir(this.dir, { recursive: true })
      await writeFile(tmp, JSON.stringify(entry), 'utf-8')
      await rename(tmp, file)
    } catch (error) {
      await rm(tmp, { force: true }).catch(() => undefined)
      throw new CacheIOError(`Cannot write ${file}: ${getErrorMessage(error)}`, 'set', { cause: error })
    }
    return entry
  }

  async delete(productId: string): Promise<void> {
    try {
      await rm(this.filePath(productId), { force: true })
    } catch (error) {
      throw new CacheIOError(`Cannot delete cache for ${productId}: ${getErrorMessage(error)}`, 'delete', { cause: error })
    }
  }

  async clear(): Promise<number> {
    let names: string[]
    try {
      names = await readdir(this.dir)
    } catch (error) {
      if (isMissingFile(error)) return 0
      throw new CacheIOError(`Cannot list ${this.dir}: ${getErrorMessage(error)}`, 'delete', { cause: error })
    }
    const files = names.filter((name) => name.endsWith('.json'))
    try {
      for (const name of files) {
        await rm(path.join(this.dir, name), { force: true })
      }
    } catch (error) {
      throw new CacheIOError(`Cannot clear ${this.dir}: ${getErrorMessage(error)}`, 'delete', { cause: error })
    }
    console.log(`[cache] cleared ${files.length} entries`)
    return files.length
  }

  async checkHealth(): Promise<boolean> {
    try {
      await mkdir(this.dir, { recursive: true })
      await access(this.dir, constants.R_OK | constants.W_OK)
      return true
    } catch (error) {
      console.warn('[cache] directory not writable:', error)
      return false
    }
  }
}
