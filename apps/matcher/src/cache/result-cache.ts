/**
 * Result Cache
 *
 * Durable map of (store, canonical reference) -> verdict with a TTL that
 * depends on whether the reference was found. Each store owns a namespace
 * backed by one JSON file under the cache directory.
 *
 * Writes go to a temp file which is synced and renamed over the target, so
 * a crash leaves either the previous file or the new one. Writes on one
 * namespace are serialized; concurrent lookups read the in-memory map.
 */

import { mkdir, open, readdir, readFile, rename, rm } from 'fs/promises'
import { join } from 'path'
import type { NormalizedReference } from '@refwatch/reference'
import { loggers } from '../config/logger'
import type { ILogger } from '../config/logger'
import { errorLogMeta, InputError, StorageError } from '../errors'
import { DEFAULT_ACCEPT_THRESHOLD } from '../validator/types'
import type { MatchVerdict } from '../validator/types'
import { KeyedMutex } from './keyed-mutex'
import { parseCacheFile, parseRecord, serializeEntries } from './schema'
import type { RecordPolicy } from './schema'
import type { CacheEntry, CacheStats, LoadReport } from './types'

const DAY_MS = 24 * 60 * 60 * 1000
const NAMESPACE_FILE_SUFFIX = '.json'

export interface ResultCacheOptions {
  directory: string
  /** TTL for verdicts with isValid = true */
  ttlFoundMs?: number
  /** TTL for everything else */
  ttlNotFoundMs?: number
  /** Persisted records whose isValid disagrees with this threshold are dropped on load */
  acceptThreshold?: number
  now?: () => number
  logger?: ILogger
}

interface Namespace {
  storeId: string
  filePath: string
  entries: Map<string, CacheEntry>
  writes: Promise<void>
  hits: number
  misses: number
}

let tempCounter = 0

export class ResultCache {
  private readonly directory: string
  private readonly ttlFoundMs: number
  private readonly ttlNotFoundMs: number
  private readonly acceptThreshold: number
  private readonly now: () => number
  private readonly log: ILogger
  private readonly namespaces = new Map<string, Promise<Namespace>>()
  private readonly keyLocks = new KeyedMutex()

  constructor(options: ResultCacheOptions) {
    this.directory = options.directory
    this.ttlFoundMs = options.ttlFoundMs ?? 10 * DAY_MS
    this.ttlNotFoundMs = options.ttlNotFoundMs ?? 4 * DAY_MS
    this.acceptThreshold = options.acceptThreshold ?? DEFAULT_ACCEPT_THRESHOLD
    this.now = options.now ?? Date.now
    this.log = options.logger ?? loggers.cache
  }

  /**
   * Load a store's namespace and purge what expired while the process was down.
   * Later calls return the already loaded namespace.
   */
  async open(storeId: string): Promise<LoadReport> {
    const existing = this.namespaces.get(storeId)
    if (existing) {
      const namespace = await existing
      return { storeId, loaded: namespace.entries.size, dropped: 0, purged: 0 }
    }

    let report: LoadReport = { storeId, loaded: 0, dropped: 0, purged: 0 }
    const loading = this.load(storeId).then((result) => {
      report = result.report
      return result.namespace
    })
    this.namespaces.set(storeId, loading)
    await loading
    return report
  }

  /**
   * Unexpired entry for the reference, or undefined. Expired entries stay in
   * place until purgeExpired() or an overwrite removes them.
   */
  async lookup(
    storeId: string,
    reference: NormalizedReference,
    now: number = this.now()
  ): Promise<CacheEntry | undefined> {
    const namespace = await this.namespace(storeId)
    const entry = namespace.entries.get(reference.canonical)

    if (!entry || now >= entry.expiresAt) {
      namespace.misses++
      return undefined
    }

    namespace.hits++
    return entry
  }

  /**
   * Insert or replace the verdict for a reference and persist the namespace.
   * A failed write is logged and the entry stays in memory for this run.
   *
   * @throws InputError when the reference has no canonical form
   */
  async store(
    storeId: string,
    reference: NormalizedReference,
    verdict: MatchVerdict,
    now: number = this.now()
  ): Promise<CacheEntry> {
    if (!reference.canonical) {
      throw new InputError('Cannot cache a verdict for an empty reference', { storeId })
    }

    const namespace = await this.namespace(storeId)
    const entry = this.entryFor(storeId, reference, verdict, now)

    namespace.entries.set(entry.key, entry)
    await this.persist(namespace)
    return entry
  }

  /**
   * The entry store() would save, without touching any namespace.
   */
  entryFor(
    storeId: string,
    reference: NormalizedReference,
    verdict: MatchVerdict,
    now: number = this.now()
  ): CacheEntry {
    const ttl = verdict.isValid ? this.ttlFoundMs : this.ttlNotFoundMs
    return Object.freeze({
      key: reference.canonical,
      storeId,
      verdict,
      fetchedAt: now,
      expiresAt: now + ttl,
    })
  }

  /**
   * Remove entries with expiresAt <= now. Without a storeId every open
   * namespace is purged. Returns the number of removed entries.
   */
  async purgeExpired(storeId?: string, now: number = this.now()): Promise<number> {
    const targets = storeId
      ? [await this.namespace(storeId)]
      : await Promise.all(this.namespaces.values())

    let removed = 0
    for (const namespace of targets) {
      const count = purgeNamespace(namespace, now)
      if (count > 0) {
        removed += count
        this.log.info('CACHE_PURGED', { storeId: namespace.storeId, removed: count })
        await this.persist(namespace)
      }
    }
    return removed
  }

  async stats(storeId: string, now: number = this.now()): Promise<CacheStats> {
    const namespace = await this.namespace(storeId)
    let found = 0
    let expired = 0

    for (const entry of namespace.entries.values()) {
      if (now >= entry.expiresAt) {
        expired++
      } else if (entry.verdict.isValid) {
        found++
      }
    }

    const total = namespace.entries.size
    return {
      storeId,
      total,
      found,
      notFound: total - found - expired,
      expired,
      hits: namespace.hits,
      misses: namespace.misses,
    }
  }

  async clear(storeId: string): Promise<void> {
    const namespace = await this.namespace(storeId)
    namespace.entries.clear()
    this.log.info('CACHE_CLEARED', { storeId })
    await this.persist(namespace)
  }

  /**
   * Run a task while holding the per-(store, reference) lock. Used to keep a
   * lookup-fetch-store sequence from racing another for the same key.
   */
  withKey<T>(storeId: string, reference: NormalizedReference, task: () => Promise<T>): Promise<T> {
    return this.keyLocks.run(`${storeId}\u0000${reference.canonical}`, task)
  }

  /** Resolves once every queued write has settled */
  async flush(): Promise<void> {
    const namespaces = await Promise.all(this.namespaces.values())
    await Promise.all(namespaces.map((namespace) => namespace.writes))
  }

  /**
   * Store ids with a namespace file in the cache directory.
   * A missing directory means no stores yet.
   */
  async knownStores(): Promise<string[]> {
    let names: string[]
    try {
      names = await readdir(this.directory)
    } catch (error) {
      if (isNotFound(error)) return []
      throw new StorageError('read', `Cache directory not readable: ${this.directory}`, undefined, { cause: error })
    }

    const storeIds: string[] = []
    for (const name of names) {
      if (!name.endsWith(NAMESPACE_FILE_SUFFIX)) continue
      try {
        storeIds.push(decodeURIComponent(name.slice(0, -NAMESPACE_FILE_SUFFIX.length)))
      } catch {
        this.log.debug('CACHE_FILE_IGNORED', { name })
      }
    }
    return storeIds.sort()
  }

  filePathFor(storeId: string): string {
    return join(this.directory, `${encodeURIComponent(storeId)}${NAMESPACE_FILE_SUFFIX}`)
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Internals
  // ─────────────────────────────────────────────────────────────────────────────

  private async namespace(storeId: string): Promise<Namespace> {
    const existing = this.namespaces.get(storeId)
    if (existing) return existing

    await this.open(storeId)
    return this.namespace(storeId)
  }

  private async load(storeId: string): Promise<{ namespace: Namespace; report: LoadReport }> {
    const namespace: Namespace = {
      storeId,
      filePath: this.filePathFor(storeId),
      entries: new Map(),
      writes: Promise.resolve(),
      hits: 0,
      misses: 0,
    }
    const report: LoadReport = { storeId, loaded: 0, dropped: 0, purged: 0 }

    const raw = await this.readNamespaceFile(namespace)
    if (raw === null) {
      return { namespace, report }
    }

    const parsed = parseCacheFile(raw)
    if (!parsed.ok) {
      this.log.warn('CACHE_FILE_CORRUPT', {
        storeId,
        filePath: namespace.filePath,
        reason: parsed.error,
      })
      return { namespace, report }
    }

    const now = this.now()
    const policy: RecordPolicy = {
      acceptThreshold: this.acceptThreshold,
      ttlFoundMs: this.ttlFoundMs,
      ttlNotFoundMs: this.ttlNotFoundMs,
    }
    for (const [key, value] of parsed.records) {
      const entry = parseRecord(storeId, key, value, policy)
      if (!entry) {
        report.dropped++
      } else if (now >= entry.expiresAt) {
        report.purged++
      } else {
        namespace.entries.set(key, entry)
      }
    }
    report.loaded = namespace.entries.size

    if (report.dropped > 0) {
      this.log.warn('CACHE_ENTRIES_DROPPED', { storeId, dropped: report.dropped })
    }
    this.log.debug('CACHE_LOADED', { ...report })

    if (report.dropped > 0 || report.purged > 0) {
      await this.persist(namespace)
    }
    return { namespace, report }
  }

  /** File contents, or null when there is nothing usable to read */
  private async readNamespaceFile(namespace: Namespace): Promise<string | null> {
    try {
      return await readFile(namespace.filePath, 'utf-8')
    } catch (error) {
      if (isNotFound(error)) return null

      const storageError = new StorageError(
        'read',
        `Failed to read cache file for ${namespace.storeId}`,
        { storeId: namespace.storeId, filePath: namespace.filePath },
        { cause: error }
      )
      this.log.warn('CACHE_READ_FAILED', errorLogMeta(storageError), error)
      return null
    }
  }

  private persist(namespace: Namespace): Promise<void> {
    const write = namespace.writes.then(() => this.writeNamespace(namespace))
    namespace.writes = write
    return write
  }

  /** Never rejects: write failures are logged so the run can go on */
  private async writeNamespace(namespace: Namespace): Promise<void> {
    const contents = serializeEntries(namespace.storeId, namespace.entries.values())
    const tempPath = `${namespace.filePath}.${process.pid}.${++tempCounter}.tmp`

    try {
      await mkdir(this.directory, { recursive: true })
      const handle = await open(tempPath, 'w')
      try {
        await handle.writeFile(contents, 'utf-8')
        await handle.sync()
      } finally {
        await handle.close()
      }
      await rename(tempPath, namespace.filePath)
    } catch (error) {
      const storageError = new StorageError(
        'write',
        `Failed to write cache file for ${namespace.storeId}`,
        { storeId: namespace.storeId, filePath: namespace.filePath },
        { cause: error }
      )
      this.log.error('CACHE_WRITE_FAILED', errorLogMeta(storageError), error)
      await rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
        this.log.debug('CACHE_TEMP_CLEANUP_FAILED', { tempPath, error: String(cleanupError) })
      })
    }
  }
}

function purgeNamespace(namespace: Namespace, now: number): number {
  let removed = 0
  for (const [key, entry] of namespace.entries) {
    if (now >= entry.expiresAt) {
      namespace.entries.delete(key)
      removed++
    }
  }
  return removed
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}
