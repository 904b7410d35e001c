import { USER_AGENT } from '../../constants/index.js';
import { logger } from '../../utils/logger.js';
import { RegistryUnreachableError } from '../../utils/errors.js';
import { normalizeCrateName, isRawIndexEntry } from './crate-record.js';
import type { RawIndexEntry, RegistryTransport } from './types.js';

/** Status codes the sparse index uses to say "no such crate". */
const NOT_FOUND_STATUSES = new Set([404, 410, 451]);

export type FetchFn = typeof fetch;

export interface SparseIndexTransportOptions {
  registryUrl: string;
  timeoutMs: number;
  /** Injectable for tests; defaults to the global fetch */
  fetchImpl?: FetchFn;
}

/**
 * Relative path of a crate's file in the sparse index:
 * `1/a`, `2/ab`, `3/a/abc`, `se/rd/serde`.
 */
export function indexPath(name: string): string {
  const lower = normalizeCrateName(name);
  switch (lower.length) {
    case 0:
      throw new RegistryUnreachableError(name, 'empty crate name');
    case 1:
      return `1/${lower}`;
    case 2:
      return `2/${lower}`;
    case 3:
      return `3/${lower[0]}/${lower}`;
    default:
      return `${lower.slice(0, 2)}/${lower.slice(2, 4)}/${lower}`;
  }
}

/**
 * Parse a sparse index body: one JSON object per non-empty line.
 */
export function parseIndexBody(name: string, body: string): RawIndexEntry[] {
  const entries: RawIndexEntry[] = [];
  const lines = body.split('\n');
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trim();
    if (line === '') {
      continue;
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch (error) {
      throw new RegistryUnreachableError(name, `malformed index line ${i + 1}: ${error instanceof Error ? error.message : String(error)}`);
    }
    if (!isRawIndexEntry(parsed)) {
      throw new RegistryUnreachableError(name, `unexpected index entry shape on line ${i + 1}`);
    }
    entries.push(parsed);
  }
  return entries;
}

/**
 * Reads crate metadata from a Cargo sparse index over HTTPS.
 */
export class SparseIndexTransport implements RegistryTransport {
  private readonly registryUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchFn;

  constructor(options: SparseIndexTransportOptions) {
    this.registryUrl = options.registryUrl.replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async fetchCrate(name: string, signal?: AbortSignal): Promise<RawIndexEntry[] | null> {
    const url = `${this.registryUrl}/${indexPath(name)}`;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);
    const onAbort = (): void => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      logger.debug(`GET ${url}`);
      const response = await this.fetchImpl(url, {
        headers: {
          'User-Agent': USER_AGENT,
          'Accept': 'text/plain'
        },
        signal: controller.signal
      });

      if (NOT_FOUND_STATUSES.has(response.status)) {
        logger.debug(`Registry has no crate '${name}'`, { status: response.status });
        return null;
      }
      if (!response.ok) {
        throw new RegistryUnreachableError(name, `HTTP ${response.status} ${response.statusText}`.trim());
      }

      const body = await response.text();
      return parseIndexBody(name, body);
    } catch (error) {
      if (error instanceof RegistryUnreachableError) {
        throw error;
      }
      if (controller.signal.aborted && !signal?.aborted) {
        throw new RegistryUnreachableError(name, `request timed out after ${this.timeoutMs}ms`);
      }
      throw new RegistryUnreachableError(name, error);
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onAbort);
    }
  }
}
