import { DEFAULTS } from '../../constants/index.js';
import { logger } from '../../utils/logger.js';
import { CrateNotFoundError, RegistryUnreachableError } from '../../utils/errors.js';
import { runWithConcurrency } from '../../utils/concurrency-pool.js';
import type { CrateStore } from './crate-store.js';
import { hoursToMs, isFresh, normalizeCrateName, toCrateRecord } from './crate-record.js';
import type { CachedCrateRecord, FetchOptions, RawIndexEntry, RegistryLookup, RegistryTransport } from './types.js';

export interface RegistryClientOptions {
  store: CrateStore;
  transport: RegistryTransport;
  cacheAgeHours: number;
  /** Fetch pool size for fetchMany */
  concurrency?: number;
  now?: () => Date;
}

interface PendingLookup {
  request: Promise<RegistryLookup>;
  forced: boolean;
}

/**
 * Cache-first access to crate metadata.
 *
 * One instance covers one run: every crate is looked up at most once unless
 * `force` is set, and concurrent lookups of the same crate share a request.
 */
export class RegistryClient {
  private readonly store: CrateStore;
  private readonly transport: RegistryTransport;
  private readonly cacheAgeMs: number;
  private readonly concurrency: number;
  private readonly now: () => Date;
  private readonly memo = new Map<string, RegistryLookup>();
  private readonly inFlight = new Map<string, PendingLookup>();

  constructor(options: RegistryClientOptions) {
    this.store = options.store;
    this.transport = options.transport;
    this.cacheAgeMs = hoursToMs(options.cacheAgeHours);
    this.concurrency = options.concurrency ?? DEFAULTS.CONCURRENCY;
    this.now = options.now ?? (() => new Date());
  }

  async fetch(name: string, options: FetchOptions = {}): Promise<RegistryLookup> {
    const crate = normalizeCrateName(name);

    const force = options.force === true;
    const pending = this.inFlight.get(crate);
    // A forced call cannot reuse a lookup that may be answered from cache.
    if (pending && (pending.forced || !force)) {
      return pending.request;
    }

    if (!force) {
      const memoized = this.memo.get(crate);
      if (memoized) {
        return memoized;
      }
    }

    const request = this.load(crate, options).finally(() => {
      if (this.inFlight.get(crate)?.request === request) {
        this.inFlight.delete(crate);
      }
    });
    this.inFlight.set(crate, { request, forced: force });

    const lookup = await request;
    this.memo.set(crate, lookup);
    return lookup;
  }

  /**
   * Fetch several crates through the bounded pool. Keys are normalized names.
   */
  async fetchMany(names: Iterable<string>, options: FetchOptions = {}): Promise<Map<string, RegistryLookup>> {
    const unique = [...new Set([...names].map(normalizeCrateName))];
    const lookups = await runWithConcurrency(unique, this.concurrency, name => this.fetch(name, options));
    const result = new Map<string, RegistryLookup>();
    unique.forEach((name, index) => result.set(name, lookups[index]));
    return result;
  }

  private async load(crate: string, options: FetchOptions): Promise<RegistryLookup> {
    const now = this.now();
    const cached = await this.store.get(crate);

    if (cached && !options.force && isFresh(cached, now, this.cacheAgeMs)) {
      logger.debug(`Using cached metadata for '${crate}'`, { fetchedAt: cached.fetchedAt });
      return { record: cached, stale: false, source: 'cache' };
    }

    let entries: RawIndexEntry[] | null;
    try {
      entries = await this.transport.fetchCrate(crate, options.signal);
    } catch (error) {
      if (cached) {
        logger.warn(`Registry unreachable for '${crate}', using cached metadata from ${cached.fetchedAt}`, { error });
        return { record: cached, stale: true, source: 'stale-cache', fallback: 'unreachable' };
      }
      throw new RegistryUnreachableError(crate, error, { noCachedCopy: true });
    }

    if (entries === null) {
      if (cached) {
        logger.warn(`Registry no longer lists '${crate}', using cached metadata from ${cached.fetchedAt}`);
        return { record: cached, stale: true, source: 'stale-cache', fallback: 'not-listed' };
      }
      throw new CrateNotFoundError(crate);
    }

    const record = toCrateRecord(crate, entries, now);
    await this.persist(record);
    logger.debug(`Fetched '${crate}' from registry`, { versions: record.versions.length });
    return { record, stale: false, source: 'network' };
  }

  private async persist(record: CachedCrateRecord): Promise<void> {
    try {
      await this.store.put(record);
    } catch (error) {
      // The fetched data is still valid for this run.
      logger.warn(`Failed to cache metadata for '${record.crate}'`, { error });
    }
  }
}
